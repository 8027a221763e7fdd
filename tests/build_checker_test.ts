import { test } from 'node:test';
import assert from 'node:assert/strict';
import { BuildChecker, suiteFromBuildOutput } from '../src/domains/test-execution/build-checker.ts';
import { FakeExecutor, processResult } from './helpers/fakes.ts';

test('suiteFromBuildOutput - one Build case per failing package', () => {
  const output = [
    '# example.com/a',
    'a.go:1: x',
    'a.go:2: y',
    '# example.com/b',
    'link: warning: ignoring duplicate symbol',
    '# example.com/a',
    'again',
    '',
  ].join('\n');

  assert.deepEqual(suiteFromBuildOutput('./...', output), {
    name: './...',
    tests: 1,
    failures: 1,
    errors: 0,
    skip: 0,
    time: '0.00',
    cases: [{
      classname: 'example.com/a',
      name: 'Build',
      time: '0.00',
      failure: { message: 'build failure', data: 'a.go:1: x\na.go:2: y' },
    }],
  });
});

test('suiteFromBuildOutput - output without headers names the pattern', () => {
  const suite = suiteFromBuildOutput('./cmd/...', 'go: cannot find main module\n');

  assert.deepEqual(suite.cases, [{
    classname: './cmd/...',
    name: 'Build',
    time: '0.00',
    failure: { message: 'build failure', data: 'go: cannot find main module' },
  }]);
});

test('BuildChecker.check - only failing patterns produce suites', async () => {
  const executor = new FakeExecutor((command) =>
    command.includes('./b/...')
      ? processResult({ exitCode: 1, output: '# example.com/b\nb.go:3: undefined: z\n' })
      : processResult()
  );
  const checker = new BuildChecker(executor, { args: [], cwd: '/src' });

  const checked = await checker.check(['./a/...', './b/...']);

  assert.equal(checked.passed, false);
  assert.equal(checked.suites.length, 1);
  assert.equal(checked.suites[0].name, './b/...');
  assert.deepEqual(checked.suites[0].cases.map((c) => [c.classname, c.failure?.data]), [
    ['example.com/b', 'b.go:3: undefined: z'],
  ]);
  assert.deepEqual(executor.commands(), ['go build -v ./a/...', 'go build -v ./b/...']);
});

test('BuildChecker.check - every pattern building passes', async () => {
  const checker = new BuildChecker(new FakeExecutor(), { args: ['-tags', 'netgo'] });

  assert.deepEqual(await checker.check(['./...']), { passed: true, suites: [] });
});
