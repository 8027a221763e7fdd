import { test } from 'node:test';
import assert from 'node:assert/strict';
import {
  hasBuildFailEvent,
  parseGoTestOutput,
  suitesFromGoTestOutput,
} from '../src/domains/reporting/go-test-output.ts';
import { jsonEvent } from './helpers/fakes.ts';

const PKG = 'example.com/a';
const BUILD_ID = `${PKG} [${PKG}.test]`;

test('parseGoTestOutput - separates events from plain lines', () => {
  const parsed = parseGoTestOutput(`go: downloading example.com/dep v1.0.0\n${jsonEvent({ Action: 'start', Package: PKG })}\n`);

  assert.deepEqual(parsed.events, [{ Action: 'start', Package: PKG }]);
  assert.deepEqual(parsed.plain, ['go: downloading example.com/dep v1.0.0']);
});

test('suitesFromGoTestOutput - folds JSON events into one suite per package', () => {
  const output = [
    jsonEvent({ Action: 'run', Package: PKG, Test: 'TestA' }),
    jsonEvent({ Action: 'output', Package: PKG, Test: 'TestA', Output: '=== RUN   TestA\n' }),
    jsonEvent({ Action: 'pass', Package: PKG, Test: 'TestA', Elapsed: 0.01 }),
    jsonEvent({ Action: 'run', Package: PKG, Test: 'TestB' }),
    jsonEvent({ Action: 'output', Package: PKG, Test: 'TestB', Output: 'b_test.go:9: want 2, got 3\n' }),
    jsonEvent({ Action: 'run', Package: PKG, Test: 'TestB/sub' }),
    jsonEvent({ Action: 'fail', Package: PKG, Test: 'TestB/sub', Elapsed: 0 }),
    jsonEvent({ Action: 'fail', Package: PKG, Test: 'TestB', Elapsed: 0.02 }),
    jsonEvent({ Action: 'skip', Package: PKG, Test: 'TestC', Elapsed: 0 }),
    jsonEvent({ Action: 'output', Package: PKG, Output: 'FAIL\n' }),
    jsonEvent({ Action: 'fail', Package: PKG, Elapsed: 0.5 }),
  ].join('');

  assert.deepEqual(suitesFromGoTestOutput(PKG, output, 900), [{
    name: PKG,
    tests: 3,
    failures: 1,
    errors: 0,
    skip: 1,
    time: '0.50',
    cases: [
      { classname: PKG, name: 'TestA', time: '0.01' },
      {
        classname: PKG,
        name: 'TestB',
        time: '0.02',
        failure: { message: 'error', data: 'b_test.go:9: want 2, got 3\n' },
      },
      { classname: PKG, name: 'TestC', time: '0.00', skipped: true },
    ],
  }]);
});

test('suitesFromGoTestOutput - a test without an outcome failed when its package did', () => {
  const output = [
    jsonEvent({ Action: 'run', Package: PKG, Test: 'TestPanics' }),
    jsonEvent({ Action: 'output', Package: PKG, Test: 'TestPanics', Output: 'panic: boom\n' }),
    jsonEvent({ Action: 'fail', Package: PKG, Elapsed: 0.1 }),
  ].join('');

  const [suite] = suitesFromGoTestOutput(PKG, output, 100);
  assert.deepEqual(suite.cases, [{
    classname: PKG,
    name: 'TestPanics',
    time: '0.00',
    failure: { message: 'error', data: 'panic: boom\n' },
  }]);
});

test('suitesFromGoTestOutput - build failures become one Test case', () => {
  const output = [
    jsonEvent({ ImportPath: BUILD_ID, Action: 'build-output', Output: `# ${PKG}\n` }),
    jsonEvent({ ImportPath: BUILD_ID, Action: 'build-output', Output: 'a.go:3:2: undefined: x\n' }),
    jsonEvent({ ImportPath: BUILD_ID, Action: 'build-fail' }),
    jsonEvent({ Action: 'fail', Package: PKG, Elapsed: 0, FailedBuild: BUILD_ID }),
  ].join('');

  assert.deepEqual(suitesFromGoTestOutput(PKG, output, 0), [{
    name: PKG,
    tests: 1,
    failures: 1,
    errors: 0,
    skip: 0,
    time: '0.00',
    cases: [{
      classname: PKG,
      name: 'Test',
      time: '0.00',
      failure: { message: 'build failure', data: `# ${PKG}\na.go:3:2: undefined: x\n` },
    }],
  }]);
});

test('suitesFromGoTestOutput - falls back to plain -v text', () => {
  const output = [
    '=== RUN   TestX',
    '--- PASS: TestX (0.00s)',
    '=== RUN   TestY',
    '    y_test.go:5: boom',
    '--- FAIL: TestY (0.10s)',
    'FAIL',
    'FAIL\texample.com/t\t0.123s',
    '',
  ].join('\n');

  const [suite] = suitesFromGoTestOutput('example.com/t', output, 150);

  assert.equal(suite.name, 'example.com/t');
  assert.equal(suite.time, '0.15');
  assert.equal(suite.failures, 1);
  assert.deepEqual(suite.cases, [
    { classname: 'example.com/t', name: 'TestX', time: '0.00' },
    {
      classname: 'example.com/t',
      name: 'TestY',
      time: '0.10',
      failure: { message: 'error', data: '    y_test.go:5: boom\n' },
    },
  ]);
});

test('hasBuildFailEvent - recognises the build failed summary line', () => {
  const output = jsonEvent({ Action: 'output', Package: PKG, Output: `FAIL\t${PKG} [build failed]\n` });
  assert.equal(hasBuildFailEvent(output, PKG), true);
  assert.equal(hasBuildFailEvent(jsonEvent({ Action: 'fail', Package: PKG }), PKG), false);
});
