/**
 * Test Registry Domain Types
 */

export type TestStatus = 'pending' | 'skipped' | 'passed' | 'failed' | 'timed-out';

export const STATUS_LABELS: Readonly<Record<TestStatus, string>> = {
  pending: 'PENDING',
  skipped: 'SKIPPED',
  passed: 'PASSED',
  failed: 'FAILED',
  'timed-out': 'TIMED OUT',
};

/**
 * Outcome of one named test
 */
export interface TestOutcome {
  readonly status: TestStatus;
  /** Tests removed by exclusion rules, keyed by package */
  readonly excludedTests: Readonly<Record<string, readonly string[]>>;
  /** Tests that skipped themselves at run time, keyed by package */
  readonly skippedTests: Readonly<Record<string, readonly string[]>>;
  readonly durationMs: number;
}

export const pendingOutcome = (): TestOutcome => ({
  status: 'pending',
  excludedTests: {},
  skippedTests: {},
  durationMs: 0,
});

export const outcomeWithStatus = (status: TestStatus, durationMs = 0): TestOutcome => ({
  ...pendingOutcome(),
  status,
  durationMs,
});

/**
 * Dependencies of each scheduled test, restricted to the scheduled set
 */
export type TestDependencyGraph = ReadonlyMap<string, readonly string[]>;
