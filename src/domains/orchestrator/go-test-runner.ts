/**
 * Go Test Runner
 * Runs one named test of kind `test`, `coverage` or `build` inside a prepared environment
 */

import type { HarnessLogger } from '../../core/logger.ts';
import type { Result } from '../../shared/result.ts';
import { failure, success } from '../../shared/result.ts';
import type { AppError } from '../../shared/errors.ts';
import { formatError } from '../../shared/errors.ts';
import type { EventBus } from '../../shared/events.ts';
import { createEvent } from '../../shared/events.ts';
import type { TestSpec } from '../../config/schema.ts';
import type { TestEnvironment } from '../environment-control/types.ts';
import { genTestNameSuffix } from '../environment-control/environment-manager.ts';
import type { ExclusionRuleConfig, HostInfo } from '../exclusion/types.ts';
import { compileExclusions, describeExclusions, filterExcludedTests } from '../exclusion/exclusion-engine.ts';
import type { GoPackageLister } from '../package-discovery/package-lister.ts';
import type { TestFunctionFinder } from '../package-discovery/test-function-finder.ts';
import { createMatcher, discoverTests } from '../package-discovery/test-function-finder.ts';
import { coverageReportFromProfile, mergeProfiles } from '../reporting/coverage-profile.ts';
import type { CoverageProfile, CoverageReport, TestSuite } from '../reporting/types.ts';
import { createTestSuiteWithFailure } from '../reporting/xunit.ts';
import { BuildChecker } from '../test-execution/build-checker.ts';
import { GoTestCommandBuilder } from '../test-execution/command-builder.ts';
import type { ProfileStore } from '../test-execution/coverage-runner.ts';
import { CoverageRunner } from '../test-execution/coverage-runner.ts';
import { GoTestWorker } from '../test-execution/test-worker.ts';
import type { ProcessExecutor, TestTask } from '../test-execution/types.ts';
import { DEFAULT_COVERAGE_TIMEOUT, DEFAULT_TEST_TIMEOUT } from '../test-execution/types.ts';
import type { TestOutcome } from '../test-registry/types.ts';
import { identifyPackagesToTest } from '../test-registry/sharding.ts';
import { collectResults } from './result-collector.ts';

/**
 * Settings shared by every named test of one invocation
 */
export interface RunSettings {
  /** Directory `go` runs in */
  readonly moduleRoot: string;
  readonly numWorkers: number;
  /** Replaces the configured package patterns when non-empty */
  readonly pkgs: readonly string[];
  readonly partIndex: number;
  readonly host: HostInfo;
  readonly graceMs: number;
  readonly staggerMs: number;
}

export interface KindResult {
  readonly outcome: TestOutcome;
  readonly suites: readonly TestSuite[];
  readonly coverage?: CoverageReport;
}

export type ProfileStoreFactory = (dir: string) => ProfileStore;

const failedWith = (suite: TestSuite): KindResult => ({
  outcome: { status: 'failed', excludedTests: {}, skippedTests: {}, durationMs: 0 },
  suites: [suite],
});

export class GoTestRunner {
  constructor(
    private readonly executor: ProcessExecutor,
    private readonly lister: GoPackageLister,
    private readonly finder: TestFunctionFinder,
    private readonly profileStores: ProfileStoreFactory,
    private readonly settings: RunSettings,
    private readonly logger: HarnessLogger,
    private readonly eventBus?: EventBus,
  ) {}

  run(
    name: string,
    spec: TestSpec,
    environment: TestEnvironment,
    exclusions: readonly ExclusionRuleConfig[],
  ): Promise<Result<KindResult, AppError>> {
    switch (spec.kind) {
      case 'build':
        return this.goBuild(spec, environment);
      case 'coverage':
        return this.goCoverage(name, spec, environment);
      case 'test':
        return this.goTest(name, spec, environment, exclusions);
    }
  }

  async goTest(
    name: string,
    spec: TestSpec,
    environment: TestEnvironment,
    exclusions: readonly ExclusionRuleConfig[],
  ): Promise<Result<KindResult, AppError>> {
    const started = Date.now();
    const timeout = spec.timeout ?? DEFAULT_TEST_TIMEOUT;
    const suffix = genTestNameSuffix(spec.suffix, this.settings.host);
    const caseName = `${name} ${suffix}`;
    const env = { ...environment.env, ...spec.env };

    const rules = compileExclusions(exclusions, this.settings.host);
    if (!rules.ok) {
      return rules;
    }
    const active = describeExclusions(rules.data);
    if (active.length > 0) {
      this.logger.logDebug(`exclusions:\n${active.join('\n')}`);
    }

    const matcher = createMatcher(spec.testPattern, spec.requireTestingT);
    if (!matcher.ok) {
      return matcher;
    }

    const pkgs = await this.selectPackages(spec, env);
    if (!pkgs.ok) {
      return success(failedWith(createTestSuiteWithFailure(
        'goListPackagesAndFuncs',
        caseName,
        'package listing failure',
        formatError(pkgs.error),
        0,
      )));
    }
    if (pkgs.data.length === 0) {
      this.logger.logWarning(`no packages to test for "${name}"`);
      return success({
        outcome: { status: 'passed', excludedTests: {}, skippedTests: {}, durationMs: Date.now() - started },
        suites: [],
      });
    }

    if (spec.prebuild) {
      const built = await this.buildTestDependencies(pkgs.data, spec.args, env);
      if (!built.ok) {
        return success(failedWith(createTestSuiteWithFailure(
          'BuildTestDependencies',
          caseName,
          'dependencies build failure',
          built.error,
          0,
        )));
      }
    }

    const discovered = await discoverTests(this.lister, this.finder, pkgs.data, matcher.data, {
      cwd: this.settings.moduleRoot,
      env,
    });
    if (!discovered.ok) {
      return success(failedWith(createTestSuiteWithFailure(
        'goListPackagesAndFuncs',
        caseName,
        'package listing failure',
        formatError(discovered.error),
        0,
      )));
    }

    const tasks: TestTask[] = [];
    const excluded: TestTask[] = [];
    for (const pkg of discovered.data.packages) {
      const filter = filterExcludedTests(pkg, discovered.data.tests.get(pkg) ?? [], rules.data);
      const task = { pkg, specificTests: filter.specificTests, excludedTests: filter.excludedTests };
      (filter.include ? tasks : excluded).push(task);
    }

    const numWorkers = spec.numWorkers ?? this.settings.numWorkers;
    this.logger.logInfo(`running tests using ${numWorkers} workers...`);
    await this.eventBus?.emit(createEvent({
      type: 'dispatch:started',
      testName: name,
      packages: tasks.length,
      workers: numWorkers,
    }));

    const worker = new GoTestWorker(this.executor, {
      timeout,
      args: spec.args,
      nonTestArgs: spec.nonTestArgs,
      numWorkers,
      json: true,
      graceMs: this.settings.graceMs,
      staggerMs: this.settings.staggerMs,
      cwd: this.settings.moduleRoot,
      env,
    }, this.eventBus);

    const collected = await collectResults(worker.dispatch(tasks, excluded), {
      timeout,
      suffix,
      caseName: 'Test',
      suppressOutput: spec.suppressOutput,
      logger: this.logger,
    });

    await this.eventBus?.emit(createEvent({
      type: 'dispatch:completed',
      testName: name,
      results: collected.results.length,
      passed: collected.passed,
    }));

    return success({
      outcome: {
        status: collected.passed ? 'passed' : 'failed',
        excludedTests: collected.excludedTests,
        skippedTests: collected.skippedTests,
        durationMs: Date.now() - started,
      },
      suites: collected.suites,
    });
  }

  async goCoverage(
    name: string,
    spec: TestSpec,
    environment: TestEnvironment,
  ): Promise<Result<KindResult, AppError>> {
    const started = Date.now();
    const timeout = spec.timeout ?? DEFAULT_COVERAGE_TIMEOUT;
    const env = { ...environment.env, ...spec.env };
    const caseName = 'TestCoverage';

    const selected = await this.selectPackages(spec, env);
    // one profile per package, so patterns are expanded here
    const pkgs = selected.ok && selected.data.length > 0
      ? await this.lister.listImportPaths(selected.data, { cwd: this.settings.moduleRoot, env })
      : selected;
    if (!pkgs.ok) {
      return success(failedWith(createTestSuiteWithFailure(
        'ListPackages',
        caseName,
        'package listing failure',
        formatError(pkgs.error),
        0,
      )));
    }

    if (spec.prebuild && pkgs.data.length > 0) {
      const built = await this.buildTestDependencies(pkgs.data, spec.args, env);
      if (!built.ok) {
        return success(failedWith(createTestSuiteWithFailure(
          'BuildTestDependencies',
          caseName,
          'dependencies build failure',
          built.error,
          0,
        )));
      }
    }

    const numWorkers = spec.numWorkers ?? this.settings.numWorkers;
    await this.eventBus?.emit(createEvent({
      type: 'dispatch:started',
      testName: name,
      packages: pkgs.data.length,
      workers: numWorkers,
    }));

    const runner = new CoverageRunner(this.executor, this.profileStores(environment.workDir), {
      timeout,
      args: spec.args,
      numWorkers,
      graceMs: this.settings.graceMs,
      cwd: this.settings.moduleRoot,
      env,
    }, this.eventBus);

    const collected = await collectResults(runner.dispatch(pkgs.data), {
      timeout,
      suffix: '',
      caseName,
      suppressOutput: spec.suppressOutput,
      logger: this.logger,
    });

    await this.eventBus?.emit(createEvent({
      type: 'dispatch:completed',
      testName: name,
      results: collected.results.length,
      passed: collected.passed,
    }));

    const profiles: CoverageProfile[] = [];
    for (const result of collected.results) {
      if (result.profile) {
        profiles.push(result.profile);
      }
    }

    return success({
      outcome: {
        status: collected.passed ? 'passed' : 'failed',
        excludedTests: {},
        skippedTests: collected.skippedTests,
        durationMs: Date.now() - started,
      },
      suites: collected.suites,
      coverage: coverageReportFromProfile(mergeProfiles(profiles), [this.settings.moduleRoot], Date.now()),
    });
  }

  async goBuild(spec: TestSpec, environment: TestEnvironment): Promise<Result<KindResult, AppError>> {
    const started = Date.now();
    const patterns = this.settings.pkgs.length > 0 ? this.settings.pkgs : spec.packages;
    const checker = new BuildChecker(this.executor, {
      args: spec.args,
      cwd: this.settings.moduleRoot,
      env: { ...environment.env, ...spec.env },
    });

    const checked = await checker.check(patterns);
    for (const suite of checked.suites) {
      for (const testCase of suite.cases) {
        this.logger.fail(`${testCase.classname}\n${testCase.failure?.data ?? ''}`);
      }
    }
    if (checked.passed) {
      this.logger.pass(patterns.join(' '));
    }

    return success({
      outcome: {
        status: checked.passed ? 'passed' : 'failed',
        excludedTests: {},
        skippedTests: {},
        durationMs: Date.now() - started,
      },
      suites: checked.suites,
    });
  }

  /**
   * Packages for the configured part, expanded through `go list`
   */
  private selectPackages(spec: TestSpec, env: Record<string, string>): Promise<Result<string[], AppError>> {
    const patterns = this.settings.pkgs.length > 0 ? this.settings.pkgs : spec.packages;
    return identifyPackagesToTest(spec.parts, this.settings.partIndex, patterns, async (selected) => {
      if (selected.length === 0) {
        return success([]);
      }
      return await this.lister.listImportPaths(selected, { cwd: this.settings.moduleRoot, env });
    });
  }

  /**
   * Compiles every test binary without running a test
   */
  private async buildTestDependencies(
    pkgs: readonly string[],
    args: readonly string[],
    env: Record<string, string>,
  ): Promise<Result<void, string>> {
    const command = GoTestCommandBuilder.buildDependencies(pkgs, args);
    const execution = await this.executor.execute(command, { cwd: this.settings.moduleRoot, env });
    if (!execution.ok) {
      return failure(`${command.join(' ')}: ${execution.error.message}`);
    }
    if (execution.data.exitCode !== 0) {
      return failure(execution.data.output);
    }
    return success(undefined);
  }
}
