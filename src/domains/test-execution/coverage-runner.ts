/**
 * Coverage runner: one `go test -cover` per package, each writing its own profile
 */

import type { Result } from '../../shared/result.ts';
import type { EventBus } from '../../shared/events.ts';
import { createEvent } from '../../shared/events.ts';
import { parseCoverProfile } from '../reporting/coverage-profile.ts';
import type { CoverageProfile } from '../reporting/types.ts';
import { GoTestCommandBuilder } from './command-builder.ts';
import { parseGoDuration } from './duration.ts';
import { classifyTaskStatus } from './test-worker.ts';
import type { ProcessExecutor, TaskResult } from './types.ts';
import { WorkerPool } from './worker-pool.ts';
import type { ResultChannel } from './worker-pool.ts';

/**
 * Scratch files for cover profiles
 */
export interface ProfileStore {
  allocate(pkg: string): Promise<Result<string, Error>>;
  read(path: string): Promise<Result<string, Error>>;
  release(path: string): Promise<Result<void, Error>>;
}

export interface CoverageOptions {
  readonly timeout: string;
  readonly args: readonly string[];
  readonly numWorkers: number;
  readonly graceMs: number;
  readonly cwd?: string;
  readonly env?: Record<string, string>;
}

export interface CoverageTaskResult extends TaskResult {
  /** Present when the package passed */
  readonly profile?: CoverageProfile;
}

export class CoverageRunner {
  constructor(
    private readonly executor: ProcessExecutor,
    private readonly store: ProfileStore,
    private readonly options: CoverageOptions,
    private readonly eventBus?: EventBus,
  ) {}

  async run(pkg: string): Promise<CoverageTaskResult> {
    const timeout = parseGoDuration(this.options.timeout);
    if (!timeout.ok) {
      return this.failed(pkg, `cannot parse timeout "${this.options.timeout}": ${timeout.error}`);
    }

    const allocated = await this.store.allocate(pkg);
    if (!allocated.ok) {
      return this.failed(pkg, `cannot create cover profile: ${allocated.error.message}`);
    }
    const profilePath = allocated.data;

    await this.eventBus?.emit(createEvent({ type: 'task:started', pkg }));

    const command = GoTestCommandBuilder.coverage(pkg, profilePath, this.options.timeout, this.options.args);
    const execution = await this.executor.execute(command, {
      cwd: this.options.cwd,
      env: this.options.env,
      timeout: timeout.data + this.options.graceMs,
    });

    let result: CoverageTaskResult = execution.ok
      ? {
        pkg,
        status: classifyTaskStatus(execution.data, pkg),
        output: execution.data.output,
        duration: execution.data.duration,
        excludedTests: [],
      }
      : this.failed(pkg, `${command.join(' ')}: ${execution.error.message}`);

    if (result.status === 'test-passed') {
      result = await this.attachProfile(result, profilePath);
    }

    const released = await this.store.release(profilePath);
    if (!released.ok) {
      result = this.failed(pkg, `cannot remove cover profile ${profilePath}: ${released.error.message}`);
    }

    await this.eventBus?.emit(createEvent({
      type: 'task:completed',
      pkg,
      status: result.status,
      duration: result.duration,
    }));

    return result;
  }

  dispatch(pkgs: readonly string[]): ResultChannel<CoverageTaskResult> {
    const pool = new WorkerPool<string, CoverageTaskResult>(
      (pkg) => this.run(pkg),
      (pkg, error) => this.failed(pkg, error.message),
      { workers: this.options.numWorkers },
    );
    return pool.run(pkgs);
  }

  private async attachProfile(result: CoverageTaskResult, path: string): Promise<CoverageTaskResult> {
    const text = await this.store.read(path);
    if (!text.ok) {
      return this.failed(result.pkg, `cannot read cover profile ${path}: ${text.error.message}`);
    }
    const profile = parseCoverProfile(text.data);
    if (!profile.ok) {
      return this.failed(result.pkg, `cannot parse cover profile ${path}: ${JSON.stringify(profile.error.details)}`);
    }
    return { ...result, profile: profile.data };
  }

  private failed(pkg: string, output: string): CoverageTaskResult {
    return { pkg, status: 'test-failed', output, duration: 0, excludedTests: [] };
  }
}
