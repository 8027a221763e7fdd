/**
 * Application State Manager
 * Manages application lifecycle following Totality principle
 */

import type { Result } from '../../shared/result.ts';
import { failure, success } from '../../shared/result.ts';
import type { AppError } from '../../shared/errors.ts';
import { createDomainError } from '../../shared/errors.ts';
import type { EventBus } from '../../shared/events.ts';
import { createEvent } from '../../shared/events.ts';
import { DEFAULT_CONFIG_FILE } from '../../config/loader.ts';
import { WorkerCount } from '../test-execution/types.ts';
import type { ApplicationConfig, ApplicationState, ParsedCliArgs } from './types.ts';
import { isCommand, isValidStateTransition, OutputDirectory, PartIndex } from './types.ts';
import { splitList } from './cli-parser.ts';

/**
 * Application State Manager
 */
export class ApplicationStateManager {
  private state: ApplicationState;
  private eventBus?: EventBus;

  constructor(private readonly now: () => number = Date.now) {
    this.state = { type: 'initializing', startTime: now() };
  }

  /**
   * Set event bus for domain events
   */
  setEventBus(eventBus: EventBus): void {
    this.eventBus = eventBus;
  }

  /**
   * Get current state (immutable)
   */
  getState(): Readonly<ApplicationState> {
    return this.state;
  }

  /**
   * Initialize application with configuration
   */
  async initialize(config: ApplicationConfig): Promise<Result<void, AppError>> {
    if (this.state.type !== 'initializing') {
      return failure(createDomainError({
        domain: 'application',
        kind: 'StateTransitionInvalid',
        details: { from: this.state.type, to: 'running' },
      }));
    }

    this.state = {
      type: 'running',
      config,
      startTime: this.state.startTime,
    };

    await this.eventBus?.emit(createEvent({
      type: 'app:initialized',
      command: config.command,
    }));

    return success(undefined);
  }

  /**
   * Start graceful shutdown
   */
  async startShutdown(reason: string, exitCode: number = 0): Promise<Result<void, AppError>> {
    const currentType = this.state.type;

    if (!isValidStateTransition(currentType, 'shutting-down')) {
      return failure(createDomainError({
        domain: 'application',
        kind: 'StateTransitionInvalid',
        details: { from: currentType, to: 'shutting-down' },
      }));
    }

    this.state = {
      type: 'shutting-down',
      reason,
      exitCode,
    };

    await this.eventBus?.emit(createEvent({
      type: 'app:shutdown-started',
      reason,
    }));

    return success(undefined);
  }

  /**
   * Complete termination
   */
  terminate(exitCode: number): Result<void, AppError> {
    const currentType = this.state.type;

    if (!isValidStateTransition(currentType, 'terminated')) {
      return failure(createDomainError({
        domain: 'application',
        kind: 'StateTransitionInvalid',
        details: { from: currentType, to: 'terminated' },
      }));
    }

    const duration = this.now() - (
      this.state.type === 'initializing' || this.state.type === 'running' ? this.state.startTime : 0
    );

    this.state = {
      type: 'terminated',
      exitCode,
      duration,
    };

    return success(undefined);
  }

  /**
   * Handle domain error
   */
  async handleError(error: Error, severity: 'fatal' | 'recoverable'): Promise<void> {
    await this.eventBus?.emit(createEvent({
      type: 'app:error-trapped',
      error,
      severity,
    }));

    if (severity === 'fatal') {
      await this.startShutdown(`Fatal error: ${error.message}`, 1);
    }
  }
}

/**
 * Environment variables that stand in for flags
 */
export interface ConfigEnvironment {
  getEnv(name: string): string | undefined;
  getCpuCount(): number;
}

/**
 * Create application configuration from parsed CLI args
 */
export const createApplicationConfig = (
  args: ParsedCliArgs,
  environment: ConfigEnvironment,
): Result<ApplicationConfig, AppError> => {
  if (!args.command) {
    return failure(createDomainError({
      domain: 'orchestrator',
      kind: 'MissingArgument',
      details: { argument: 'command' },
    }));
  }
  if (!isCommand(args.command)) {
    return failure(createDomainError({
      domain: 'orchestrator',
      kind: 'UnknownCommand',
      details: { command: args.command },
    }));
  }

  // Create validated value objects
  const workerCountResult = WorkerCount.create(args.numTestWorkers ?? environment.getCpuCount());
  if (!workerCountResult.ok) {
    return failure(workerCountResult.error);
  }

  const envPart = environment.getEnv('PART');
  const partIndexResult = PartIndex.create(args.part ?? (envPart ? Number(envPart) : -1));
  if (!partIndexResult.ok) {
    return failure(partIndexResult.error);
  }

  let outputDir: OutputDirectory | undefined;
  if (args.outputDir !== undefined) {
    const outputDirResult = OutputDirectory.create(args.outputDir);
    if (!outputDirResult.ok) {
      return failure(outputDirResult.error);
    }
    outputDir = outputDirResult.data;
  }

  let positional = args.args;
  if (args.command === 'run' && positional.length === 0) {
    positional = splitList(environment.getEnv('TEST'));
  }
  if ((args.command === 'run' || args.command === 'project') && positional.length === 0) {
    return failure(createDomainError({
      domain: 'orchestrator',
      kind: 'MissingArgument',
      details: { command: args.command, argument: args.command === 'run' ? 'test' : 'project' },
    }));
  }

  const config: ApplicationConfig = {
    command: args.command,
    args: positional,
    configPath: args.config ?? environment.getEnv('PKGTEST_CONFIG') ?? DEFAULT_CONFIG_FILE,
    workerCount: workerCountResult.data,
    outputDir,
    pkgs: args.pkgs,
    partIndex: partIndexResult.data,
    cleanGo: args.cleanGo,
    logLevel: environment.getEnv('DEBUG') ? 'debug' : args.logLevel,
    color: args.color,
    verbose: args.verbose,
  };

  return success(config);
};
