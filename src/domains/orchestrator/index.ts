/**
 * Domain Orchestrator
 * Exports the main orchestrator that coordinates all domains
 */

export {
  allPassed,
  DEFAULT_ORCHESTRATOR_CONFIG,
  DomainOrchestrator,
  EXIT_FAILED,
  EXIT_PASSED,
  EXIT_USAGE,
  type HarnessFileSystem,
  type OrchestratorAdapters,
  type OrchestratorConfig,
} from './domain-orchestrator.ts';
export { GoTestRunner, type KindResult, type ProfileStoreFactory, type RunSettings } from './go-test-runner.ts';
export { collectResults, type CollectedResults, type CollectorOptions, suitesForResult } from './result-collector.ts';
export { formatSummary, TestRunner, type TestRunnerSettings } from './test-runner.ts';
