/**
 * Exclusion Domain
 */

export type {
  ExclusionFilter,
  ExclusionRule,
  ExclusionRuleConfig,
  HostInfo,
  PlatformPredicate,
} from './types.ts';
export type { HostFacts } from './predicates.ts';
export { detectHost, matchesHost } from './predicates.ts';
export { compileExclusions, describeExclusions, filterExcludedTests } from './exclusion-engine.ts';
