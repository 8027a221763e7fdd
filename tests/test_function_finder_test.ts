import { test } from 'node:test';
import assert from 'node:assert/strict';
import {
  createMatcher,
  discoverTests,
  GoPackageLister,
  parseTestFunctions,
  TestFunctionFinder,
} from '../src/domains/package-discovery/index.ts';
import type { TestFunctionMatcher } from '../src/domains/package-discovery/index.ts';
import { FakeExecutor, MemoryFileSystem, processResult } from './helpers/fakes.ts';

const SOURCE = `package a

import "testing"

func TestAdd(t *testing.T) {
}

func TestHelper(x int) bool { return true }

func (s *suite) TestMethod(t *testing.T) {}

func BenchmarkAdd(b *testing.B) {}

func Test_underscore(t *testing.T) {
}
`;

const matcher = (pattern?: string, requireTestingT = false): TestFunctionMatcher => {
  const created = createMatcher(pattern, requireTestingT);
  if (!created.ok) {
    throw new Error(`invalid pattern ${pattern}`);
  }
  return created.data;
};

test('parseTestFunctions - top-level functions matching the name pattern', () => {
  assert.deepEqual(parseTestFunctions(SOURCE, matcher()), ['TestAdd', 'TestHelper', 'Test_underscore']);
});

test('parseTestFunctions - optionally requires a *testing.T signature', () => {
  assert.deepEqual(parseTestFunctions(SOURCE, matcher('^Test', true)), ['TestAdd', 'Test_underscore']);
});

test('parseTestFunctions - custom name pattern', () => {
  assert.deepEqual(parseTestFunctions(SOURCE, matcher('^Benchmark')), ['BenchmarkAdd']);
});

test('createMatcher - rejects an invalid pattern', () => {
  const created = createMatcher('(');
  assert.equal(created.ok, false);
  if (!created.ok) {
    assert.equal(created.error.kind, 'ParseFailed');
  }
});

test('TestFunctionFinder - merges files without duplicates', async () => {
  const fs = new MemoryFileSystem({
    '/src/a/a_test.go': 'func TestAdd(t *testing.T) {\n}\n',
    '/src/a/x_test.go': 'func TestAdd(t *testing.T) {\n}\nfunc TestSub(t *testing.T) {\n}\n',
  });
  const finder = new TestFunctionFinder(fs);

  const found = await finder.find(
    { importPath: 'example.com/a', dir: '/src/a', testFiles: ['a_test.go', 'x_test.go'] },
    matcher(),
  );

  assert.deepEqual(found, { ok: true, data: ['TestAdd', 'TestSub'] });
});

test('TestFunctionFinder - an unreadable file is a ParseFailed error', async () => {
  const finder = new TestFunctionFinder(new MemoryFileSystem());

  const found = await finder.find(
    { importPath: 'example.com/a', dir: '/src/a', testFiles: ['gone_test.go'] },
    matcher(),
  );

  assert.equal(found.ok, false);
  if (!found.ok) {
    assert.equal(found.error.kind, 'ParseFailed');
    assert.deepEqual(found.error.details, {
      path: '/src/a/gone_test.go',
      message: "ENOENT: no such file, open '/src/a/gone_test.go'",
    });
  }
});

test('discoverTests - drops packages without matching tests', async () => {
  const executor = new FakeExecutor(() =>
    processResult({
      stdout: 'example.com/a\t/src/a\ta_test.go\t\nexample.com/b\t/src/b\tb_test.go\t\nexample.com/c\t/src/c\t\t\n',
    })
  );
  const fs = new MemoryFileSystem({
    '/src/a/a_test.go': 'func TestAdd(t *testing.T) {\n}\n',
    '/src/b/b_test.go': 'func helper() {\n}\n',
  });

  const discovered = await discoverTests(
    new GoPackageLister(executor),
    new TestFunctionFinder(fs),
    ['./...'],
    matcher(),
  );

  assert.equal(discovered.ok, true);
  if (discovered.ok) {
    assert.deepEqual(discovered.data.packages, ['example.com/a']);
    assert.deepEqual([...discovered.data.tests.entries()], [['example.com/a', ['TestAdd']]]);
  }
});
