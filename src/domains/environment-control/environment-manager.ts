/**
 * Environment Manager - per-test work directories and environment
 */

import { join } from '../../deps.ts';
import type { HarnessLogger } from '../../core/logger.ts';
import type { Result } from '../../shared/result.ts';
import { failure, success } from '../../shared/result.ts';
import type { DomainError } from '../../shared/errors.ts';
import { createDomainError } from '../../shared/errors.ts';
import type { EventBus } from '../../shared/events.ts';
import { createEvent } from '../../shared/events.ts';
import type { HostInfo } from '../exclusion/types.ts';
import type { ProcessExecutor } from '../test-execution/types.ts';
import type {
  EnvFileSystem,
  EnvironmentVariables,
  SystemEnvironment,
  TestEnvironment,
  TestEnvironmentConfig,
} from './types.ts';

/**
 * Case-name suffix: `[linux,amd64]`, or `[race - linux,amd64]` with a base
 */
export const genTestNameSuffix = (base: string | undefined, host: HostInfo): string => {
  const axes = `${host.os},${host.arch}`;
  return base ? `[${base} - ${axes}]` : `[${axes}]`;
};

export class EnvironmentManager {
  constructor(
    private readonly system: SystemEnvironment,
    private readonly fs: EnvFileSystem,
    private readonly executor: ProcessExecutor,
    private readonly logger?: HarnessLogger,
    private readonly eventBus?: EventBus,
  ) {}

  /**
   * Prepares the work directory, environment and Go cache for one test
   */
  async initTest(config: TestEnvironmentConfig): Promise<Result<TestEnvironment, DomainError>> {
    this.logger?.logInfo(`hostname = "${this.system.getHostname()}"`);

    const rootDir = join(config.tmpRoot ?? join(this.system.getHomeDir(), 'tmp'), config.testName);
    const root = await this.fs.ensureDir(rootDir);
    if (!root.ok) {
      return failure(this.workDirError(rootDir, root.error));
    }

    const workDir = await this.fs.makeTempDir(rootDir);
    if (!workDir.ok) {
      return failure(this.workDirError(rootDir, workDir.error));
    }

    const binDir = join(workDir.data, 'bin');
    const bin = await this.fs.ensureDir(binDir);
    if (!bin.ok) {
      return this.abandon(workDir.data, this.workDirError(binDir, bin.error));
    }

    const env: EnvironmentVariables = {
      ...this.system.getAllEnv(),
      ...config.env,
      TMPDIR: workDir.data,
    };

    await this.eventBus?.emit(createEvent({
      type: 'env:workdir-created',
      testName: config.testName,
      workDir: workDir.data,
    }));
    this.logger?.logDebug(`work directory ${workDir.data}`);

    if (config.cleanGo) {
      const cleaned = await this.cleanGoCache(config.cwd, env);
      if (!cleaned.ok) {
        return this.abandon(workDir.data, cleaned.error);
      }
    }

    for (const path of config.staleFiles) {
      const removed = await this.fs.remove(path);
      if (!removed.ok) {
        return this.abandon(workDir.data, createDomainError({
          domain: 'resource',
          kind: 'RemoveFailed',
          details: { path, error: removed.error.message },
        }));
      }
    }

    return success({ testName: config.testName, rootDir, workDir: workDir.data, binDir, env });
  }

  /**
   * Removes the work directory
   */
  async cleanup(environment: TestEnvironment): Promise<Result<void, DomainError>> {
    const removed = await this.fs.remove(environment.workDir);

    await this.eventBus?.emit(createEvent({
      type: 'env:cleanup-complete',
      testName: environment.testName,
      errors: removed.ok ? 0 : 1,
    }));

    if (!removed.ok) {
      return failure(createDomainError({
        domain: 'environment',
        kind: 'CleanupFailed',
        details: { path: environment.workDir, error: removed.error.message },
      }));
    }
    return success(undefined);
  }

  private async cleanGoCache(cwd: string, env: EnvironmentVariables): Promise<Result<void, DomainError>> {
    const command = ['go', 'clean', '-testcache'];
    const result = await this.executor.execute(command, { cwd, env: { ...env } });

    if (!result.ok) {
      return failure(createDomainError({
        domain: 'environment',
        kind: 'GoCleanFailed',
        details: { command: command.join(' '), error: result.error.message },
      }));
    }
    if (result.data.exitCode !== 0) {
      return failure(createDomainError({
        domain: 'environment',
        kind: 'GoCleanFailed',
        details: { command: command.join(' '), exitCode: result.data.exitCode, output: result.data.output },
      }));
    }
    return success(undefined);
  }

  /**
   * Drops a half-prepared work directory; `error` stays the reported one
   */
  private async abandon(workDir: string, error: DomainError): Promise<Result<TestEnvironment, DomainError>> {
    const removed = await this.fs.remove(workDir);
    if (!removed.ok) {
      this.logger?.logWarning(`could not remove ${workDir}: ${removed.error.message}`);
    }
    return failure(error);
  }

  private workDirError(path: string, error: Error): DomainError {
    return createDomainError({
      domain: 'environment',
      kind: 'WorkDirCreationFailed',
      details: { path, error: error.message },
    });
  }
}
