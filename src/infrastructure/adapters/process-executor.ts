/**
 * Process Executor Adapter
 * Runs external binaries through execa
 */

import { execa } from '../../deps.ts';
import type { HarnessLogger } from '../../core/logger.ts';
import type { Result } from '../../shared/result.ts';
import { failure, success, toError } from '../../shared/result.ts';
import type {
  ProcessExecutor,
  ProcessOptions,
  ProcessResult,
} from '../../domains/test-execution/types.ts';

class ExecaProcessExecutor implements ProcessExecutor {
  constructor(private readonly logger?: HarnessLogger) {}

  async execute(
    command: readonly string[],
    options: ProcessOptions = {},
  ): Promise<Result<ProcessResult, Error>> {
    const [file, ...args] = command;
    if (!file) {
      return failure(new Error('empty command'));
    }

    this.logger?.logCommand(command);
    if (options.cwd) {
      this.logger?.logDebug(`📁 Working directory: ${options.cwd}`);
    }

    const startTime = Date.now();
    try {
      const result = await execa(file, args, {
        cwd: options.cwd,
        env: options.env,
        timeout: options.timeout,
        reject: false,
        all: true,
        stdin: 'ignore',
        stripFinalNewline: false,
      });
      const duration = Date.now() - startTime;

      // no exit code and no signal: the binary never started
      const exitCode = Number.isInteger(result.exitCode) ? result.exitCode : -1;
      if (result.failed && exitCode === -1 && !result.timedOut && !result.signal) {
        const message = result instanceof Error ? result.message : `failed to start ${file}`;
        this.logger?.logDebug(`❌ Command execution failed: ${message}`);
        return failure(new Error(message));
      }

      this.logger?.logDebug(
        `⏱️  ${file} exited with ${exitCode} after ${duration}ms${result.timedOut ? ' (timed out)' : ''}`,
      );

      return success({
        exitCode,
        signal: result.signal ?? undefined,
        stdout: result.stdout,
        stderr: result.stderr,
        output: result.all ?? result.stdout + result.stderr,
        duration,
        killed: result.killed,
        timedOut: result.timedOut,
      });
    } catch (error) {
      const err = toError(error);
      this.logger?.logDebug(`❌ Command execution failed: ${err.message}`);
      return failure(err);
    }
  }
}

/**
 * Create process executor
 */
export function createProcessExecutor(logger?: HarnessLogger): ProcessExecutor {
  return new ExecaProcessExecutor(logger);
}
