import { test } from 'node:test';
import assert from 'node:assert/strict';
import { parseConfig } from '../src/config/loader.ts';
import type { HarnessConfig } from '../src/config/schema.ts';
import {
  findCycle,
  outcomeWithStatus,
  scheduleTests,
  TestRegistry,
} from '../src/domains/test-registry/index.ts';
import type { TestOutcome, TestStatus } from '../src/domains/test-registry/index.ts';

const config = (raw: unknown): HarnessConfig => {
  const parsed = parseConfig(JSON.stringify(raw), 'pkgtest.json');
  if (!parsed.ok) {
    throw new Error(JSON.stringify(parsed.error.details));
  }
  return parsed.data;
};

const REGISTRY = new TestRegistry(config({
  tests: {
    'go-build': { kind: 'build' },
    'go-test': { dependsOn: ['go-build'], projects: ['core'] },
    'go-race': { dependsOn: ['go-test'], args: ['-race'], projects: ['core'] },
    'go-lint': { projects: ['tools'] },
  },
  projects: {
    core: { path: 'core' },
    tools: { path: 'tools', branch: 'main' },
  },
}));

test('TestRegistry.listTests - sorted names', () => {
  assert.deepEqual(REGISTRY.listTests(), ['go-build', 'go-lint', 'go-race', 'go-test']);
});

test('TestRegistry.getTest - unknown names list the known ones', () => {
  assert.deepEqual(REGISTRY.getTest('go-vet'), {
    ok: false,
    error: {
      domain: 'registry',
      kind: 'TestNotFound',
      details: { test: 'go-vet', known: ['go-build', 'go-lint', 'go-race', 'go-test'] },
    },
  });

  const found = REGISTRY.getTest('go-race');
  assert.equal(found.ok, true);
  if (found.ok) {
    assert.deepEqual(found.data.args, ['-race']);
  }
});

test('TestRegistry.getProject - defaults the remote', () => {
  assert.deepEqual(REGISTRY.getProject('tools'), {
    ok: true,
    data: { path: 'tools', branch: 'main', remote: 'origin' },
  });
  assert.deepEqual(REGISTRY.getProject('web'), {
    ok: false,
    error: { domain: 'registry', kind: 'ProjectNotFound', details: { project: 'web', known: ['core', 'tools'] } },
  });
});

test('TestRegistry - inherited object members are unknown names', () => {
  const found = REGISTRY.getTest('toString');
  assert.equal(found.ok ? 'found' : found.error.kind, 'TestNotFound');
  const project = REGISTRY.getProject('constructor');
  assert.equal(project.ok ? 'found' : project.error.kind, 'ProjectNotFound');
  assert.deepEqual(REGISTRY.projectsForTests(['__proto__']), []);
});

test('TestRegistry - tests and projects map both ways', () => {
  assert.deepEqual(REGISTRY.testsForProjects(['core']), ['go-race', 'go-test']);
  assert.deepEqual(REGISTRY.testsForProjects(['web']), []);
  assert.deepEqual(REGISTRY.projectsForTests([]), ['core', 'tools']);
  assert.deepEqual(REGISTRY.projectsForTests(['go-lint', 'go-test']), ['core', 'tools']);
  assert.deepEqual(REGISTRY.projectsForTests(['go-build']), []);
});

test('TestRegistry.createDependencyGraph - drops edges leaving the set', () => {
  const graph = REGISTRY.createDependencyGraph(['go-race', 'go-test']);

  assert.equal(graph.ok, true);
  if (graph.ok) {
    assert.deepEqual([...graph.data.entries()], [
      ['go-race', ['go-test']],
      ['go-test', []],
    ]);
  }
});

test('TestRegistry.createDependencyGraph - reports cycles', () => {
  const registry = new TestRegistry(config({
    tests: { a: { dependsOn: ['b'] }, b: { dependsOn: ['a'] } },
  }));

  assert.deepEqual(registry.createDependencyGraph(['a', 'b']), {
    ok: false,
    error: { domain: 'registry', kind: 'DependencyCycle', details: { cycle: ['a', 'b', 'a'] } },
  });
});

test('findCycle - acyclic graphs and self loops', () => {
  assert.equal(findCycle(new Map([['a', ['b']], ['b', []]])), undefined);
  assert.deepEqual(findCycle(new Map([['a', []], ['b', ['b']]])), ['b', 'b']);
});

const FULL_GRAPH = new Map<string, readonly string[]>([
  ['go-build', []],
  ['go-test', ['go-build']],
  ['go-race', ['go-test']],
]);

test('scheduleTests - dependencies run first', async () => {
  const ran: string[] = [];

  const results = await scheduleTests(FULL_GRAPH, (name) => {
    ran.push(name);
    return Promise.resolve(outcomeWithStatus('passed'));
  });

  assert.deepEqual(ran, ['go-build', 'go-test', 'go-race']);
  assert.deepEqual([...results.values()].map((outcome) => outcome.status), ['passed', 'passed', 'passed']);
});

test('scheduleTests - a failed dependency skips everything after it', async () => {
  const ran: string[] = [];

  const results = await scheduleTests(FULL_GRAPH, (name): Promise<TestOutcome> => {
    ran.push(name);
    return Promise.resolve(outcomeWithStatus('failed'));
  });

  assert.deepEqual(ran, ['go-build']);
  const statuses: Record<string, TestStatus> = {};
  for (const [name, outcome] of results) {
    statuses[name] = outcome.status;
  }
  assert.deepEqual(statuses, { 'go-build': 'failed', 'go-race': 'skipped', 'go-test': 'skipped' });
});

test('scheduleTests - independent tests run in name order', async () => {
  const ran: string[] = [];
  const graph = new Map<string, readonly string[]>([['b', []], ['a', []], ['c', ['b']]]);

  await scheduleTests(graph, (name) => {
    ran.push(name);
    return Promise.resolve(outcomeWithStatus(name === 'a' ? 'timed-out' : 'passed'));
  });

  assert.deepEqual(ran, ['a', 'b', 'c']);
});
