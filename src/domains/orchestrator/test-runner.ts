/**
 * Test Runner
 * Runs named tests end to end: environment, execution, reports, status
 */

import { join } from '../../deps.ts';
import type { HarnessLogger } from '../../core/logger.ts';
import type { Result } from '../../shared/result.ts';
import { failure, success } from '../../shared/result.ts';
import type { AppError } from '../../shared/errors.ts';
import { formatError } from '../../shared/errors.ts';
import { ownEntry } from '../../shared/record.ts';
import type { EventBus } from '../../shared/events.ts';
import { createEvent } from '../../shared/events.ts';
import type { HarnessConfig } from '../../config/schema.ts';
import type { EnvironmentManager } from '../environment-control/environment-manager.ts';
import type { SystemEnvironment, TestEnvironment } from '../environment-control/types.ts';
import type { HostInfo } from '../exclusion/types.ts';
import type { FileWriter } from '../reporting/types.ts';
import { ReportWriter } from '../reporting/report-writer.ts';
import { createStatusDocument } from '../reporting/status-file.ts';
import { formatSeconds } from '../test-execution/duration.ts';
import type { TestRegistry } from '../test-registry/registry.ts';
import { scheduleTests } from '../test-registry/registry.ts';
import type { TestOutcome } from '../test-registry/types.ts';
import { outcomeWithStatus, STATUS_LABELS } from '../test-registry/types.ts';
import type { GoTestRunner } from './go-test-runner.ts';

export interface TestRunnerSettings {
  /** From --output-dir; otherwise $WORKSPACE, otherwise $HOME/tmp/<test> */
  readonly outputDir?: string;
  readonly tmpRoot?: string;
  readonly cleanGo: boolean;
  readonly partIndex: number;
  readonly host: HostInfo;
  readonly moduleRoot: string;
}

/**
 * One `<name>: <STATUS> (<seconds>s)` line per test, in name order
 */
export const formatSummary = (outcomes: ReadonlyMap<string, TestOutcome>): string => {
  return [...outcomes.entries()]
    .map(([name, outcome]) => `${name}: ${STATUS_LABELS[outcome.status]} (${formatSeconds(outcome.durationMs)}s)`)
    .join('\n');
};

export class TestRunner {
  constructor(
    private readonly config: HarnessConfig,
    private readonly registry: TestRegistry,
    private readonly environment: EnvironmentManager,
    private readonly goTests: GoTestRunner,
    private readonly fileWriter: FileWriter,
    private readonly system: SystemEnvironment,
    private readonly settings: TestRunnerSettings,
    private readonly logger: HarnessLogger,
    private readonly eventBus?: EventBus,
  ) {}

  outputDirFor(testName: string): string {
    return this.settings.outputDir ??
      this.system.getEnv('WORKSPACE') ??
      join(this.system.getHomeDir(), 'tmp', testName);
  }

  /**
   * Runs `tests` in dependency order and prints the summary table.
   * Fails only on errors that leave no report behind.
   */
  async runTests(tests: readonly string[]): Promise<Result<Map<string, TestOutcome>, AppError>> {
    for (const name of tests) {
      const known = this.registry.getTest(name);
      if (!known.ok) {
        return known;
      }
    }

    const graph = this.registry.createDependencyGraph(tests);
    if (!graph.ok) {
      return graph;
    }

    let internalError: AppError | undefined;
    const outcomes = await scheduleTests(graph.data, async (name) => {
      if (internalError) {
        return outcomeWithStatus('skipped');
      }
      this.logger.print(`##### Running test "${name}" #####`);
      const outcome = await this.runTest(name);
      if (!outcome.ok) {
        internalError = outcome.error;
        return outcomeWithStatus('failed');
      }
      this.logger.print(`##### ${STATUS_LABELS[outcome.data.status]} #####`);
      return outcome.data;
    });

    if (internalError) {
      return failure(internalError);
    }

    this.logger.logSummary(formatSummary(outcomes));
    return success(outcomes);
  }

  /**
   * One named test. Init and execution errors become an error report with a
   * failed status; a report that cannot be written is returned as an error.
   */
  async runTest(name: string): Promise<Result<TestOutcome, AppError>> {
    const spec = this.registry.getTest(name);
    if (!spec.ok) {
      return spec;
    }

    await this.eventBus?.emit(createEvent({ type: 'test:started', testName: name }));
    this.logger.logStageStart(name);
    const started = Date.now();

    const writer = new ReportWriter(this.fileWriter, this.outputDirFor(name));
    const initialized = await this.environment.initTest({
      testName: name,
      tmpRoot: this.settings.tmpRoot,
      cleanGo: this.settings.cleanGo,
      staleFiles: [
        writer.pathFor('tests', name),
        writer.pathFor('status', name),
        writer.pathFor('cobertura', name),
      ],
      env: spec.data.env,
      cwd: this.settings.moduleRoot,
    });
    if (!initialized.ok) {
      return this.finishWithError(name, writer, initialized.error, started);
    }

    const outcome = await this.execute(name, writer, initialized.data, started);

    const cleaned = await this.environment.cleanup(initialized.data);
    if (!cleaned.ok) {
      this.logger.logWarning(`cleanup failed: ${formatError(cleaned.error)}`);
    }

    return outcome;
  }

  private async execute(
    name: string,
    writer: ReportWriter,
    environment: TestEnvironment,
    started: number,
  ): Promise<Result<TestOutcome, AppError>> {
    const spec = this.registry.getTest(name);
    if (!spec.ok) {
      return spec;
    }

    const exclusions = spec.data.exclusions.flatMap((set) => ownEntry(this.config.exclusions, set) ?? []);
    const ran = await this.goTests.run(name, spec.data, environment, exclusions);
    if (!ran.ok) {
      return this.finishWithError(name, writer, ran.error, started);
    }

    const xunit = await writer.writeXunit(name, ran.data.suites);
    if (!xunit.ok) {
      return xunit;
    }
    if (ran.data.coverage) {
      const cobertura = await writer.writeCobertura(name, ran.data.coverage);
      if (!cobertura.ok) {
        return cobertura;
      }
    }

    return this.finish(name, writer, ran.data.outcome, started);
  }

  private async finishWithError(
    name: string,
    writer: ReportWriter,
    error: AppError,
    started: number,
  ): Promise<Result<TestOutcome, AppError>> {
    const message = formatError(error);
    this.logger.logError(message);

    const written = await writer.writeErrorReport(name, message);
    if (!written.ok) {
      return written;
    }
    return this.finish(name, writer, outcomeWithStatus('failed'), started);
  }

  private async finish(
    name: string,
    writer: ReportWriter,
    outcome: TestOutcome,
    started: number,
  ): Promise<Result<TestOutcome, AppError>> {
    const final: TestOutcome = { ...outcome, durationMs: Date.now() - started };

    const status = await writer.writeStatus(createStatusDocument({
      testName: name,
      outcome: final,
      host: this.settings.host,
      partIndex: this.settings.partIndex,
      now: new Date(),
    }));
    if (!status.ok) {
      return status;
    }

    this.logger.logStageComplete(name, final.durationMs, final.status === 'passed');
    await this.eventBus?.emit(createEvent({ type: 'test:completed', testName: name, status: final.status }));
    return success(final);
  }
}
