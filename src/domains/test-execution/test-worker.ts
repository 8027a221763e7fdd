/**
 * Runs one package task through `go test` and classifies the outcome
 */

import type { EventBus } from '../../shared/events.ts';
import { createEvent } from '../../shared/events.ts';
import { hasBuildFailEvent } from '../reporting/go-test-output.ts';
import { GoTestCommandBuilder } from './command-builder.ts';
import { parseGoDuration } from './duration.ts';
import type {
  GoTestOptions,
  ProcessExecutor,
  ProcessResult,
  TaskResult,
  TaskStatus,
  TestTask,
} from './types.ts';
import { classifyExitCode } from './types.ts';
import { WorkerPool } from './worker-pool.ts';
import type { ResultChannel } from './worker-pool.ts';

export const PACKAGE_EXCLUDED = 'package excluded';

/**
 * Whether a failed run means the package (or its test binary) did not build.
 * Exit codes only count when the process exited by itself.
 */
export const isBuildFailure = (result: ProcessResult, pkg: string): boolean => {
  const header = `# ${pkg}`;
  const exit = classifyExitCode(result);

  if (exit.type === 'build-error') {
    return true;
  }
  if (exit.type !== 'timeout' && exit.type !== 'killed' && result.exitCode >= 0) {
    if (hasBuildFailEvent(result.output, pkg)) {
      return true;
    }
    if (exit.type === 'test-failure') {
      // setup failures count as build failures
      return result.output.startsWith(header) && result.output.endsWith('[setup failed]\n');
    }
  }

  return result.output.startsWith(header);
};

export const classifyTaskStatus = (result: ProcessResult, pkg: string): TaskStatus => {
  if (!result.timedOut && result.exitCode === 0) {
    return 'test-passed';
  }
  if (isBuildFailure(result, pkg)) {
    return 'build-failed';
  }
  if (result.timedOut) {
    return 'timed-out';
  }
  return 'test-failed';
};

/**
 * Result for a package whose every test is excluded; nothing is spawned
 */
export const excludedPackageResult = (task: TestTask): TaskResult => ({
  pkg: task.pkg,
  status: 'test-passed',
  output: PACKAGE_EXCLUDED,
  duration: 0,
  excludedTests: task.excludedTests,
});

export class GoTestWorker {
  constructor(
    private readonly executor: ProcessExecutor,
    private readonly options: GoTestOptions,
    private readonly eventBus?: EventBus,
  ) {}

  async run(task: TestTask): Promise<TaskResult> {
    const timeout = parseGoDuration(this.options.timeout);
    if (!timeout.ok) {
      return {
        pkg: task.pkg,
        status: 'test-failed',
        output: `cannot parse timeout "${this.options.timeout}": ${timeout.error}`,
        duration: 0,
        excludedTests: task.excludedTests,
      };
    }

    await this.eventBus?.emit(createEvent({ type: 'task:started', pkg: task.pkg }));

    const command = GoTestCommandBuilder.build(task, this.options);
    const started = Date.now();
    const execution = await this.executor.execute(command, {
      cwd: this.options.cwd,
      env: this.options.env,
      timeout: timeout.data + this.options.graceMs,
    });

    const result: TaskResult = execution.ok
      ? {
        pkg: task.pkg,
        status: classifyTaskStatus(execution.data, task.pkg),
        output: execution.data.output,
        duration: execution.data.duration,
        excludedTests: task.excludedTests,
      }
      : this.failed(task, `${command.join(' ')}: ${execution.error.message}`, Date.now() - started);

    await this.eventBus?.emit(createEvent({
      type: 'task:completed',
      pkg: task.pkg,
      status: result.status,
      duration: result.duration,
    }));

    return result;
  }

  failed(task: TestTask, output: string, duration = 0): TaskResult {
    return {
      pkg: task.pkg,
      status: 'test-failed',
      output,
      duration,
      excludedTests: task.excludedTests,
    };
  }

  /**
   * Fans tasks out over the pool; `excluded` tasks resolve without a subprocess
   */
  dispatch(
    tasks: readonly TestTask[],
    excluded: readonly TestTask[] = [],
  ): ResultChannel<TaskResult> {
    const pool = new WorkerPool<TestTask, TaskResult>(
      (task) => this.run(task),
      (task, error) => this.failed(task, error.message),
      { workers: this.options.numWorkers, staggerMs: this.options.staggerMs },
    );
    return pool.run(tasks, excluded.map(excludedPackageResult));
  }
}
