/**
 * Test Registry
 * Named tests from configuration and the order they run in
 */

import type { Result } from '../../shared/result.ts';
import { failure, success } from '../../shared/result.ts';
import type { DomainError } from '../../shared/errors.ts';
import { createDomainError } from '../../shared/errors.ts';
import { ownEntry } from '../../shared/record.ts';
import type { HarnessConfig, ProjectSpec, TestSpec } from '../../config/schema.ts';
import type { TestDependencyGraph, TestOutcome } from './types.ts';
import { outcomeWithStatus, pendingOutcome } from './types.ts';

const BLOCKING: ReadonlySet<string> = new Set(['skipped', 'failed', 'timed-out']);

export class TestRegistry {
  constructor(private readonly config: HarnessConfig) {}

  /**
   * Every configured test name, sorted
   */
  listTests(): string[] {
    return Object.keys(this.config.tests).sort();
  }

  getTest(name: string): Result<TestSpec, DomainError> {
    const spec = ownEntry(this.config.tests, name);
    if (!spec) {
      return failure(createDomainError({
        domain: 'registry',
        kind: 'TestNotFound',
        details: { test: name, known: this.listTests() },
      }));
    }
    return success(spec);
  }

  getProject(name: string): Result<ProjectSpec, DomainError> {
    const project = ownEntry(this.config.projects, name);
    if (!project) {
      return failure(createDomainError({
        domain: 'registry',
        kind: 'ProjectNotFound',
        details: { project: name, known: Object.keys(this.config.projects).sort() },
      }));
    }
    return success(project);
  }

  /**
   * Sorted names of the tests attached to any of `projects`
   */
  testsForProjects(projects: readonly string[]): string[] {
    return this.listTests().filter((name) =>
      (ownEntry(this.config.tests, name)?.projects ?? []).some((project) => projects.includes(project))
    );
  }

  /**
   * Projects attached to any of `tests`, or every project when none given
   */
  projectsForTests(tests: readonly string[]): string[] {
    if (tests.length === 0) {
      return Object.keys(this.config.projects).sort();
    }
    const names = new Set<string>();
    for (const test of tests) {
      for (const project of ownEntry(this.config.tests, test)?.projects ?? []) {
        names.add(project);
      }
    }
    return [...names].sort();
  }

  /**
   * Dependency graph over `tests`; edges leaving the set are dropped
   */
  createDependencyGraph(tests: readonly string[]): Result<TestDependencyGraph, DomainError> {
    const graph = new Map<string, readonly string[]>();
    for (const test of tests) {
      const deps = ownEntry(this.config.tests, test)?.dependsOn ?? [];
      graph.set(test, deps.filter((dep) => tests.includes(dep)));
    }

    const cycle = findCycle(graph);
    if (cycle) {
      return failure(createDomainError({
        domain: 'registry',
        kind: 'DependencyCycle',
        details: { cycle },
      }));
    }
    return success(graph);
  }
}

/**
 * First dependency loop found, as the path that closes it
 */
export const findCycle = (graph: TestDependencyGraph): string[] | undefined => {
  const visited = new Set<string>();
  const stack: string[] = [];

  const visit = (name: string): string[] | undefined => {
    visited.add(name);
    stack.push(name);
    for (const dep of graph.get(name) ?? []) {
      const index = stack.indexOf(dep);
      if (index !== -1) {
        return [...stack.slice(index), dep];
      }
      if (!visited.has(dep)) {
        const cycle = visit(dep);
        if (cycle) {
          return cycle;
        }
      }
    }
    stack.pop();
    return undefined;
  };

  for (const name of graph.keys()) {
    if (!visited.has(name)) {
      const cycle = visit(name);
      if (cycle) {
        return cycle;
      }
    }
  }
  return undefined;
};

/**
 * Runs tests one at a time in name order, each once its dependencies are
 * done. A test whose dependency was skipped, failed or timed out is skipped.
 */
export const scheduleTests = async (
  graph: TestDependencyGraph,
  run: (test: string) => Promise<TestOutcome>,
): Promise<Map<string, TestOutcome>> => {
  const tests = [...graph.keys()].sort();
  const results = new Map<string, TestOutcome>(tests.map((test) => [test, pendingOutcome()]));

  for (let round = 0; round < tests.length; round++) {
    const next = tests.find((test) => {
      if (results.get(test)?.status !== 'pending') {
        return false;
      }
      return (graph.get(test) ?? []).every((dep) => results.get(dep)?.status !== 'pending') ||
        (graph.get(test) ?? []).some((dep) => BLOCKING.has(results.get(dep)?.status ?? ''));
    });
    if (next === undefined) {
      break;
    }

    const blocked = (graph.get(next) ?? []).some((dep) => BLOCKING.has(results.get(dep)?.status ?? ''));
    results.set(next, blocked ? outcomeWithStatus('skipped') : await run(next));
  }

  return results;
};
