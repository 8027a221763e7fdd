import { test } from 'node:test';
import assert from 'node:assert/strict';
import {
  GoTestCommandBuilder,
  overrideRunFlag,
  testsExpression,
} from '../src/domains/test-execution/command-builder.ts';
import type { TestTask } from '../src/domains/test-execution/types.ts';

const task = (specificTests: string[]): TestTask => ({
  pkg: 'example.com/a',
  specificTests,
  excludedTests: [],
});

test('testsExpression - anchors the alternation', () => {
  assert.equal(testsExpression(['TestA', 'TestB']), '^(TestA|TestB)$');
});

test('overrideRunFlag - replaces every spelling of -run', () => {
  assert.deepEqual(overrideRunFlag(['-v', '-run', 'Foo', '-count=1'], 'X'), ['-v', '-run', 'X', '-count=1']);
  assert.deepEqual(overrideRunFlag(['--run=Foo'], 'X'), ['-run=X']);
  assert.deepEqual(overrideRunFlag(['-run'], 'X'), ['-run', 'X']);
});

test('overrideRunFlag - appends -run when absent', () => {
  assert.deepEqual(overrideRunFlag(['-v'], 'X'), ['-v', '-run', 'X']);
});

test('GoTestCommandBuilder.build - selects specific tests', () => {
  const command = GoTestCommandBuilder.build(task(['TestA', 'TestB']), {
    timeout: '20m',
    args: ['-race'],
    nonTestArgs: ['-integration'],
    json: true,
  });

  assert.deepEqual(command, [
    'go',
    'test',
    '-json',
    '-timeout',
    '20m',
    '-v',
    '-race',
    '-run',
    '^(TestA|TestB)$',
    'example.com/a',
    '-integration',
  ]);
});

test('GoTestCommandBuilder.build - keeps a configured -run for all tests', () => {
  const options = { timeout: '1m', args: ['-run', 'Foo'], nonTestArgs: [], json: false };

  assert.deepEqual(
    GoTestCommandBuilder.build(task([]), options),
    ['go', 'test', '-timeout', '1m', '-v', '-run', 'Foo', 'example.com/a'],
  );
  assert.deepEqual(
    GoTestCommandBuilder.build(task(['TestA']), options),
    ['go', 'test', '-timeout', '1m', '-v', '-run', '^(TestA)$', 'example.com/a'],
  );
});

test('GoTestCommandBuilder - dependency, build and coverage commands', () => {
  assert.deepEqual(
    GoTestCommandBuilder.buildDependencies(['a', 'b'], ['-race']),
    ['go', 'test', '-race', '-run', '^$', 'a', 'b'],
  );
  assert.deepEqual(
    GoTestCommandBuilder.goBuild('./...', ['-tags', 'netgo']),
    ['go', 'build', '-v', '-tags', 'netgo', './...'],
  );
  assert.deepEqual(
    GoTestCommandBuilder.coverage('a', '/tmp/a.out', '5m', ['-race']),
    ['go', 'test', '-cover', '-coverprofile', '/tmp/a.out', '-timeout', '5m', '-v', '-race', 'a'],
  );
});
