/**
 * Domain Orchestrator
 * Parses the command line, loads configuration and runs one command
 */

import { resolve } from '../../deps.ts';
import { consoleSink, HarnessLogger } from '../../core/logger.ts';
import type { LogSink } from '../../core/logger.ts';
import type { Result } from '../../shared/result.ts';
import { success } from '../../shared/result.ts';
import type { AppError } from '../../shared/errors.ts';
import { formatError } from '../../shared/errors.ts';
import type { EventBus } from '../../shared/events.ts';
import type { ConfigReader, LoadedConfig } from '../../config/loader.ts';
import { loadConfig } from '../../config/loader.ts';
import type { ProjectSpec } from '../../config/schema.ts';
import {
  ApplicationStateManager,
  createApplicationConfig,
  createHelpOutput,
  createVersionOutput,
  parseCli,
} from '../application-control/index.ts';
import type { ApplicationConfig } from '../application-control/index.ts';
import { EnvironmentManager } from '../environment-control/environment-manager.ts';
import type { EnvFileSystem, SystemEnvironment } from '../environment-control/types.ts';
import { detectHost } from '../exclusion/predicates.ts';
import { GoPackageLister } from '../package-discovery/package-lister.ts';
import { TestFunctionFinder } from '../package-discovery/test-function-finder.ts';
import type { SourceReader } from '../package-discovery/types.ts';
import { formatPollReport, ProjectPoller } from '../polling/project-poller.ts';
import type { FileWriter } from '../reporting/types.ts';
import type { ProcessExecutor } from '../test-execution/types.ts';
import { DEFAULT_GRACE_MS } from '../test-execution/types.ts';
import { TestRegistry } from '../test-registry/registry.ts';
import type { TestOutcome } from '../test-registry/types.ts';
import type { ProfileStoreFactory } from './go-test-runner.ts';
import { GoTestRunner } from './go-test-runner.ts';
import { TestRunner } from './test-runner.ts';

export const EXIT_PASSED = 0;
export const EXIT_FAILED = 1;
export const EXIT_USAGE = 2;

export type HarnessFileSystem = ConfigReader & SourceReader & FileWriter & EnvFileSystem;

/**
 * Infrastructure the orchestrator composes domain services from
 */
export interface OrchestratorAdapters {
  readonly system: SystemEnvironment;
  readonly fileSystem: HarnessFileSystem;
  readonly createExecutor: (logger: HarnessLogger) => ProcessExecutor;
  readonly profileStores: ProfileStoreFactory;
  readonly sink?: LogSink;
}

/**
 * Orchestrator Configuration
 */
export interface OrchestratorConfig {
  /** Added to each test timeout to form the subprocess deadline */
  readonly graceMs: number;
  /** Upper bound of the random delay before each worker starts */
  readonly staggerMs: number;
}

export const DEFAULT_ORCHESTRATOR_CONFIG: OrchestratorConfig = {
  graceMs: DEFAULT_GRACE_MS,
  staggerMs: 0,
};

export const allPassed = (outcomes: ReadonlyMap<string, TestOutcome>): boolean => {
  return [...outcomes.values()].every((outcome) => outcome.status === 'passed');
};

export class DomainOrchestrator {
  private readonly sink: LogSink;
  private readonly stateManager = new ApplicationStateManager();

  constructor(
    private readonly adapters: OrchestratorAdapters,
    private readonly eventBus: EventBus,
    private readonly config: OrchestratorConfig = DEFAULT_ORCHESTRATOR_CONFIG,
  ) {
    this.sink = adapters.sink ?? consoleSink;
    this.stateManager.setEventBus(eventBus);
  }

  /**
   * Main orchestration entry point; resolves to the process exit code
   */
  async orchestrate(argv: readonly string[]): Promise<number> {
    const parsed = parseCli(argv);
    if (!parsed.ok) {
      return this.usageError(parsed.error);
    }
    if (parsed.data.help) {
      const help = createHelpOutput();
      this.sink.out(help.content);
      return help.exitCode;
    }
    if (parsed.data.version) {
      const version = createVersionOutput();
      this.sink.out(version.content);
      return version.exitCode;
    }

    const appConfig = createApplicationConfig(parsed.data, this.adapters.system);
    if (!appConfig.ok) {
      return this.usageError(appConfig.error);
    }

    const logger = HarnessLogger.create(appConfig.data.logLevel, {
      color: appConfig.data.color,
      sink: this.sink,
    });
    if (!logger.ok) {
      return this.usageError(logger.error);
    }

    const initialized = await this.stateManager.initialize(appConfig.data);
    if (!initialized.ok) {
      logger.data.logError(formatError(initialized.error));
      return this.terminate(EXIT_FAILED);
    }

    const exitCode = await this.execute(appConfig.data, logger.data);
    return this.terminate(exitCode);
  }

  private async execute(appConfig: ApplicationConfig, logger: HarnessLogger): Promise<number> {
    const cwd = this.adapters.system.getCwd();
    const loaded = await loadConfig(appConfig.configPath, this.adapters.fileSystem, cwd);
    if (!loaded.ok) {
      logger.logError(formatError(loaded.error));
      return EXIT_FAILED;
    }
    logger.logDebug(`configuration ${loaded.data.path}`);

    const registry = new TestRegistry(loaded.data.config);
    const executor = this.adapters.createExecutor(logger);

    const result = await this.dispatch(appConfig, registry, loaded.data, executor, logger);
    if (!result.ok) {
      logger.logError(formatError(result.error));
      await this.stateManager.handleError(new Error(formatError(result.error)), 'fatal');
      return EXIT_FAILED;
    }
    return result.data;
  }

  private dispatch(
    appConfig: ApplicationConfig,
    registry: TestRegistry,
    loaded: LoadedConfig,
    executor: ProcessExecutor,
    logger: HarnessLogger,
  ): Promise<Result<number, AppError>> {
    switch (appConfig.command) {
      case 'list':
        return Promise.resolve(this.list(registry, logger));
      case 'poll':
        return this.poll(appConfig.args, registry, loaded, executor, logger);
      case 'project':
        return this.project(appConfig, registry, loaded, executor, logger);
      case 'run':
        return this.run(appConfig, appConfig.args, registry, loaded, executor, logger);
    }
  }

  private list(registry: TestRegistry, logger: HarnessLogger): Result<number, AppError> {
    for (const name of registry.listTests()) {
      logger.print(name);
    }
    return success(EXIT_PASSED);
  }

  private async poll(
    tests: readonly string[],
    registry: TestRegistry,
    loaded: LoadedConfig,
    executor: ProcessExecutor,
    logger: HarnessLogger,
  ): Promise<Result<number, AppError>> {
    for (const name of tests) {
      const known = registry.getTest(name);
      if (!known.ok) {
        return known;
      }
    }

    const entries: [string, ProjectSpec][] = [];
    for (const name of registry.projectsForTests(tests)) {
      const project = registry.getProject(name);
      if (!project.ok) {
        return project;
      }
      entries.push([name, project.data]);
    }
    const projects = Object.fromEntries(entries);

    const poller = new ProjectPoller(executor, loaded.baseDir, logger);
    const report = await poller.poll(projects);
    if (!report.ok) {
      return report;
    }

    const triggered = registry.testsForProjects(report.data.changed)
      .filter((name) => tests.length === 0 || tests.includes(name));
    logger.print(formatPollReport(report.data, triggered).trimEnd());
    return success(EXIT_PASSED);
  }

  private async project(
    appConfig: ApplicationConfig,
    registry: TestRegistry,
    loaded: LoadedConfig,
    executor: ProcessExecutor,
    logger: HarnessLogger,
  ): Promise<Result<number, AppError>> {
    for (const name of appConfig.args) {
      const known = registry.getProject(name);
      if (!known.ok) {
        return known;
      }
    }

    const tests = registry.testsForProjects(appConfig.args);
    if (tests.length === 0) {
      logger.logWarning(`no tests attached to ${appConfig.args.join(', ')}`);
      return success(EXIT_PASSED);
    }
    return this.run(appConfig, tests, registry, loaded, executor, logger);
  }

  private async run(
    appConfig: ApplicationConfig,
    tests: readonly string[],
    registry: TestRegistry,
    loaded: LoadedConfig,
    executor: ProcessExecutor,
    logger: HarnessLogger,
  ): Promise<Result<number, AppError>> {
    const { system, fileSystem } = this.adapters;
    const host = detectHost({ platform: system.getPlatform(), arch: system.getArch(), env: system.getAllEnv() });
    const moduleRoot = resolve(loaded.baseDir, loaded.config.root);

    const goTests = new GoTestRunner(
      executor,
      new GoPackageLister(executor),
      new TestFunctionFinder(fileSystem),
      this.adapters.profileStores,
      {
        moduleRoot,
        numWorkers: appConfig.workerCount.value,
        pkgs: appConfig.pkgs,
        partIndex: appConfig.partIndex.value,
        host,
        graceMs: this.config.graceMs,
        staggerMs: this.config.staggerMs,
      },
      logger,
      this.eventBus,
    );

    const runner = new TestRunner(
      loaded.config,
      registry,
      new EnvironmentManager(system, fileSystem, executor, logger, this.eventBus),
      goTests,
      fileSystem,
      system,
      {
        outputDir: appConfig.outputDir?.value,
        cleanGo: appConfig.cleanGo,
        partIndex: appConfig.partIndex.value,
        host,
        moduleRoot,
      },
      logger,
      this.eventBus,
    );

    const stopProgress = appConfig.verbose ? this.trackProgress(logger) : undefined;
    const outcomes = await runner.runTests(tests);
    stopProgress?.();
    if (!outcomes.ok) {
      return outcomes;
    }
    return success(allPassed(outcomes.data) ? EXIT_PASSED : EXIT_FAILED);
  }

  /**
   * Progress lines per finished package while verbose
   */
  private trackProgress(logger: HarnessLogger): () => void {
    let total = 0;
    let done = 0;
    const offStarted = this.eventBus.on('dispatch:started', (event) => {
      if (event.type === 'dispatch:started') {
        total = event.packages;
        done = 0;
      }
    });
    const offCompleted = this.eventBus.on('task:completed', (event) => {
      if (event.type === 'task:completed') {
        done++;
        logger.logProgress(done, total, event.pkg);
      }
    });
    return () => {
      offStarted();
      offCompleted();
    };
  }

  private usageError(error: AppError): number {
    this.sink.err(`❌ ${formatError(error)}`);
    this.sink.err('Run "pkgtest --help" for usage.');
    return this.terminate(EXIT_USAGE);
  }

  private terminate(exitCode: number): number {
    const terminated = this.stateManager.terminate(exitCode);
    if (!terminated.ok) {
      this.sink.err(`❌ ${formatError(terminated.error)}`);
    }
    return exitCode;
  }
}
