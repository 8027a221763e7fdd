/**
 * Test Execution Engine Domain
 * Exports all public interfaces and implementations
 */

export type {
  ExitCodeClassification,
  GoTestOptions,
  ProcessExecutor,
  ProcessOptions,
  ProcessResult,
  TaskResult,
  TaskStatus,
  TestTask,
} from './types.ts';

export {
  classifyExitCode,
  DEFAULT_COVERAGE_TIMEOUT,
  DEFAULT_GRACE_MS,
  DEFAULT_TEST_TIMEOUT,
  WorkerCount,
} from './types.ts';

export { formatSeconds, parseGoDuration } from './duration.ts';
export { GoTestCommandBuilder, overrideRunFlag, testsExpression } from './command-builder.ts';
export { ResultChannel, WorkerPool, type WorkerPoolOptions } from './worker-pool.ts';
export {
  classifyTaskStatus,
  excludedPackageResult,
  GoTestWorker,
  isBuildFailure,
  PACKAGE_EXCLUDED,
} from './test-worker.ts';
export {
  BUILD_CASE,
  BUILD_FAILURE,
  BuildChecker,
  type BuildCheckOptions,
  type BuildCheckResult,
  suiteFromBuildOutput,
} from './build-checker.ts';
export {
  type CoverageOptions,
  CoverageRunner,
  type CoverageTaskResult,
  type ProfileStore,
} from './coverage-runner.ts';
