/**
 * pkgtest - a concurrent Go package test harness
 *
 * Runs named tests from a `pkgtest.json` file: lists packages and their test
 * functions, drops the tests an exclusion table names for this host, fans
 * `go test` out over a worker pool and writes xUnit, Cobertura and status
 * files for each test.
 *
 * @module
 */

export { main } from './src/main.ts';

// Orchestration
export {
  DomainOrchestrator,
  EXIT_FAILED,
  EXIT_PASSED,
  EXIT_USAGE,
  formatSummary,
  GoTestRunner,
  TestRunner,
} from './src/domains/orchestrator/index.ts';
export type { OrchestratorAdapters, OrchestratorConfig } from './src/domains/orchestrator/index.ts';

// Command line
export { createApplicationConfig, parseCli } from './src/domains/application-control/index.ts';
export type { ApplicationConfig, Command, ParsedCliArgs } from './src/domains/application-control/index.ts';

// Configuration
export { DEFAULT_CONFIG_FILE, loadConfig, parseConfig } from './src/config/loader.ts';
export type { LoadedConfig } from './src/config/loader.ts';
export { HarnessConfigSchema, TestSpecSchema } from './src/config/schema.ts';
export type { HarnessConfig, ProjectSpec, TestKind, TestSpec } from './src/config/schema.ts';

// Domains
export { compileExclusions, detectHost, filterExcludedTests } from './src/domains/exclusion/index.ts';
export type { ExclusionRuleConfig, HostInfo } from './src/domains/exclusion/index.ts';
export { discoverTests, GoPackageLister, TestFunctionFinder } from './src/domains/package-discovery/index.ts';
export { identifyPackagesToTest, scheduleTests, TestRegistry } from './src/domains/test-registry/index.ts';
export type { TestOutcome, TestStatus } from './src/domains/test-registry/index.ts';
export { BuildChecker, CoverageRunner, GoTestWorker, WorkerPool } from './src/domains/test-execution/index.ts';
export type { ProcessExecutor, TaskResult, TestTask } from './src/domains/test-execution/index.ts';
export { renderCoberturaReport, renderXunitReport, ReportWriter } from './src/domains/reporting/index.ts';
export type { CoverageReport, TestSuite } from './src/domains/reporting/index.ts';
export { EnvironmentManager } from './src/domains/environment-control/index.ts';
export { ProjectPoller } from './src/domains/polling/index.ts';

// Infrastructure
export { createInfrastructureAdapters } from './src/infrastructure/index.ts';

// Shared
export { HarnessLogger } from './src/core/logger.ts';
export type { LogLevel, LogSink } from './src/core/logger.ts';
export { createEventBus } from './src/shared/event-bus.ts';
export type { DomainEvent, EventBus } from './src/shared/events.ts';
export type { Result } from './src/shared/result.ts';
export { failure, success } from './src/shared/result.ts';
export type { AppError, DomainError, ValidationError } from './src/shared/errors.ts';
export { formatError } from './src/shared/errors.ts';
