/**
 * Result Collector
 * Single consumer of a dispatch: turns task results into suites and console lines
 */

import type { HarnessLogger } from '../../core/logger.ts';
import type { TestSuite } from '../reporting/types.ts';
import { suitesFromGoTestOutput } from '../reporting/go-test-output.ts';
import { createTestSuiteWithFailure, withCaseSuffix } from '../reporting/xunit.ts';
import { PACKAGE_EXCLUDED } from '../test-execution/test-worker.ts';
import type { TaskResult } from '../test-execution/types.ts';

export interface CollectorOptions {
  /** Go duration the tasks ran under, quoted in timeout failures */
  readonly timeout: string;
  /** Appended to every case name */
  readonly suffix: string;
  /** Case name for failures that carry no per-test detail */
  readonly caseName: string;
  readonly suppressOutput: boolean;
  readonly logger: HarnessLogger;
}

export interface CollectedResults<T extends TaskResult> {
  readonly results: readonly T[];
  readonly suites: readonly TestSuite[];
  readonly passed: boolean;
  readonly excludedTests: Readonly<Record<string, readonly string[]>>;
  readonly skippedTests: Readonly<Record<string, readonly string[]>>;
}

const formatList = (names: readonly string[]): string => `[${names.join(' ')}]`;

/**
 * Suites for one result, before the suffix is applied
 */
export const suitesForResult = (result: TaskResult, timeout: string, caseName: string): TestSuite[] => {
  switch (result.status) {
    case 'build-failed':
      return [createTestSuiteWithFailure(result.pkg, caseName, 'build failure', result.output, result.duration)];
    case 'timed-out':
      return [
        createTestSuiteWithFailure(result.pkg, caseName, `test timed out after ${timeout}`, '', result.duration),
      ];
    case 'test-passed':
    case 'test-failed': {
      if (result.output.includes('no test files') || result.output.includes(PACKAGE_EXCLUDED)) {
        return [];
      }
      const suites = suitesFromGoTestOutput(result.pkg, result.output, result.duration);
      // a failed run must leave a failure behind even when its output names no test
      if (result.status === 'test-failed' && !suites.some((suite) => suite.failures > 0)) {
        return [createTestSuiteWithFailure(result.pkg, caseName, 'error', result.output, result.duration)];
      }
      return suites;
    }
  }
};

/**
 * Output of the failing cases in `suite`
 */
const failureText = (suite: TestSuite): string => {
  return suite.cases.map((c) => c.failure?.data ?? '').join('').trimEnd();
};

const skippedCases = (suites: readonly TestSuite[]): string[] => {
  return suites.flatMap((suite) => suite.cases.filter((c) => c.skipped === true).map((c) => c.name));
};

/**
 * Drains `results` and prints one `ok`/`fail` line per suite as it arrives
 */
export const collectResults = async <T extends TaskResult>(
  results: AsyncIterable<T>,
  options: CollectorOptions,
): Promise<CollectedResults<T>> => {
  const { logger } = options;
  const received: T[] = [];
  const suites: TestSuite[] = [];
  const excludedTests: Record<string, readonly string[]> = {};
  const skippedTests: Record<string, readonly string[]> = {};
  let passed = true;

  for await (const result of results) {
    received.push(result);
    const produced = suitesForResult(result, options.timeout, options.caseName);

    const skipped = skippedCases(produced);
    if (skipped.length > 0) {
      skippedTests[result.pkg] = skipped;
    }
    if (result.excludedTests.length > 0) {
      excludedTests[result.pkg] = result.excludedTests;
    }

    for (const suite of produced) {
      if (suite.failures > 0) {
        passed = false;
      }
      if (!options.suppressOutput) {
        if (suite.failures > 0) {
          if (result.status === 'timed-out') {
            logger.fail(`[TIMED OUT after ${options.timeout}] ${result.pkg}`);
          } else {
            logger.fail(`${result.pkg}\n${failureText(suite)}`);
          }
        } else {
          logger.pass(result.pkg);
        }
        if (suite.skip > 0) {
          logger.pass(`${result.pkg} (skipped tests: ${formatList(skippedTests[result.pkg] ?? [])})`);
        }
      }
      suites.push(withCaseSuffix(suite, options.suffix));
    }

    if (result.excludedTests.length > 0 && !options.suppressOutput) {
      logger.pass(`${result.pkg} (excluded tests: ${formatList(result.excludedTests)})`);
    }
  }

  return { results: received, suites, passed, excludedTests, skippedTests };
};
