/**
 * Test Execution Domain Types
 * Following Totality principle
 */

import type { Result } from '../../shared/result.ts';
import { failure, success } from '../../shared/result.ts';
import type { ValidationError } from '../../shared/errors.ts';
import { createValidationError } from '../../shared/errors.ts';

/**
 * Outcome of one package task
 */
export type TaskStatus = 'build-failed' | 'test-passed' | 'test-failed' | 'timed-out';

/**
 * One unit of work: a package and the tests to run in it.
 * An empty `specificTests` means every test in the package.
 */
export interface TestTask {
  readonly pkg: string;
  readonly specificTests: readonly string[];
  readonly excludedTests: readonly string[];
}

/**
 * Produced exactly once per task
 */
export interface TaskResult {
  readonly pkg: string;
  readonly status: TaskStatus;
  readonly output: string;
  readonly duration: number; // in milliseconds
  readonly excludedTests: readonly string[];
}

/**
 * Process execution result
 */
export interface ProcessResult {
  readonly exitCode: number; // -1 when the child was terminated by a signal
  readonly signal?: string;
  readonly stdout: string;
  readonly stderr: string;
  readonly output: string; // stdout and stderr interleaved
  readonly duration: number; // in milliseconds
  readonly killed: boolean;
  readonly timedOut: boolean;
}

export interface ProcessOptions {
  readonly cwd?: string;
  readonly env?: Record<string, string>;
  readonly timeout?: number; // in milliseconds
}

/**
 * Process executor interface (implemented by infrastructure)
 */
export interface ProcessExecutor {
  execute(
    command: readonly string[],
    options?: ProcessOptions,
  ): Promise<Result<ProcessResult, Error>>;
}

/**
 * Options for one `go test` dispatch
 */
export interface GoTestOptions {
  /** Go duration string passed to `-timeout`, e.g. "20m" */
  readonly timeout: string;
  /** Extra `go test` flags placed before the package */
  readonly args: readonly string[];
  /** Arguments for the test binary placed after the package */
  readonly nonTestArgs: readonly string[];
  readonly numWorkers: number;
  /** Request `-json` events from `go test` */
  readonly json: boolean;
  /** Added to the test timeout to form the subprocess deadline */
  readonly graceMs: number;
  /** Upper bound of the random delay before each worker starts */
  readonly staggerMs: number;
  readonly cwd?: string;
  readonly env?: Record<string, string>;
}

export const DEFAULT_TEST_TIMEOUT = '20m';
export const DEFAULT_COVERAGE_TIMEOUT = '5m';
export const DEFAULT_GRACE_MS = 60_000;

/**
 * Worker count - Smart Constructor, values below one clamp to one
 */
export class WorkerCount {
  private constructor(private readonly count: number) {}

  static create(count: number): Result<WorkerCount, ValidationError> {
    if (!Number.isInteger(count)) {
      return failure(createValidationError({
        kind: 'InvalidFormat',
        field: 'numTestWorkers',
        expected: 'integer',
        actual: String(count),
      }));
    }

    return success(new WorkerCount(Math.max(1, count)));
  }

  get value(): number {
    return this.count;
  }

  getValue(): number {
    return this.count;
  }
}

/**
 * Exit code classification
 */
export type ExitCodeClassification =
  | { type: 'success'; code: 0 }
  | { type: 'test-failure'; code: 1 }
  | { type: 'build-error'; code: 2 }
  | { type: 'timeout'; code: number }
  | { type: 'killed'; code: number; signal: string }
  | { type: 'unknown'; code: number };

/**
 * Classify exit code
 */
export const classifyExitCode = (result: ProcessResult): ExitCodeClassification => {
  if (result.timedOut) {
    return { type: 'timeout', code: result.exitCode };
  }

  if (result.exitCode === 0) {
    return { type: 'success', code: 0 };
  }

  if (result.exitCode === 1 && !result.killed) {
    return { type: 'test-failure', code: 1 };
  }

  if (result.exitCode === 2) {
    return { type: 'build-error', code: 2 };
  }

  if (result.killed && result.signal) {
    return { type: 'killed', code: result.exitCode, signal: result.signal };
  }

  return { type: 'unknown', code: result.exitCode };
};
