/**
 * Test Registry Domain
 */

export type { TestDependencyGraph, TestOutcome, TestStatus } from './types.ts';
export { outcomeWithStatus, pendingOutcome, STATUS_LABELS } from './types.ts';
export { findCycle, scheduleTests, TestRegistry } from './registry.ts';
export type { PackageExpander } from './sharding.ts';
export { identifyPackagesToTest, NO_PART, splitPart } from './sharding.ts';
