import { test } from 'node:test';
import assert from 'node:assert/strict';
import { fileURLToPath } from 'node:url';
import { loadConfig, parseConfig } from '../src/config/loader.ts';
import { createFileSystemAdapter } from '../src/infrastructure/index.ts';
import { MemoryFileSystem } from './helpers/fakes.ts';

test('parseConfig - fills in defaults', () => {
  const parsed = parseConfig('{"tests":{"unit":{}}}', 'pkgtest.json');

  assert.deepEqual(parsed, {
    ok: true,
    data: {
      root: '.',
      tests: {
        unit: {
          kind: 'test',
          packages: ['./...'],
          args: [],
          nonTestArgs: [],
          exclusions: [],
          testPattern: '^Test',
          requireTestingT: false,
          parts: [],
          dependsOn: [],
          projects: [],
          suppressOutput: false,
          prebuild: true,
          env: {},
        },
      },
      exclusions: {},
      projects: {},
    },
  });
});

test('parseConfig - reports references to unknown names', () => {
  const text = JSON.stringify({
    tests: { unit: { exclusions: ['flaky'], dependsOn: ['lint'], projects: ['core'] } },
  });

  assert.deepEqual(parseConfig(text, 'pkgtest.json'), {
    ok: false,
    error: {
      domain: 'application',
      kind: 'ConfigInvalid',
      details: {
        path: 'pkgtest.json',
        issues: [
          'tests.unit.exclusions: unknown exclusion set "flaky"',
          'tests.unit.dependsOn: unknown test "lint"',
          'tests.unit.projects: unknown project "core"',
        ],
      },
    },
  });
});

test('parseConfig - inherited object members are not names', () => {
  const text = JSON.stringify({
    tests: { unit: { exclusions: ['constructor'], dependsOn: ['toString'], projects: ['hasOwnProperty'] } },
  });

  const parsed = parseConfig(text, 'pkgtest.json');

  assert.equal(parsed.ok, false);
  if (!parsed.ok) {
    assert.deepEqual(parsed.error.details, {
      path: 'pkgtest.json',
      issues: [
        'tests.unit.exclusions: unknown exclusion set "constructor"',
        'tests.unit.dependsOn: unknown test "toString"',
        'tests.unit.projects: unknown project "hasOwnProperty"',
      ],
    });
  }
});

test('parseConfig - rejects unknown keys', () => {
  const parsed = parseConfig('{"tests":{"unit":{"kinds":"test"}}}', 'pkgtest.json');

  assert.equal(parsed.ok, false);
  if (!parsed.ok) {
    assert.deepEqual(parsed.error.details, {
      path: 'pkgtest.json',
      issues: ["tests.unit: Unrecognized key(s) in object: 'kinds'"],
    });
  }
});

test('parseConfig - rejects malformed JSON', () => {
  const parsed = parseConfig('{', 'pkgtest.json');
  assert.equal(parsed.ok, false);
  if (!parsed.ok) {
    assert.equal(parsed.error.kind, 'ConfigInvalid');
  }
});

test('loadConfig - resolves the path and base directory', async () => {
  const fs = new MemoryFileSystem({ '/work/ci/pkgtest.json': '{"root":"..","tests":{"unit":{}}}' });

  const loaded = await loadConfig('ci/pkgtest.json', fs, '/work');

  assert.equal(loaded.ok, true);
  if (loaded.ok) {
    assert.equal(loaded.data.path, '/work/ci/pkgtest.json');
    assert.equal(loaded.data.baseDir, '/work/ci');
    assert.equal(loaded.data.config.root, '..');
  }
});

test('loadConfig - a missing file is ConfigNotFound', async () => {
  assert.deepEqual(await loadConfig('pkgtest.json', new MemoryFileSystem(), '/work'), {
    ok: false,
    error: { domain: 'application', kind: 'ConfigNotFound', details: { path: '/work/pkgtest.json' } },
  });
});

test('loadConfig - the bundled example configuration is valid', async () => {
  const path = fileURLToPath(new URL('../pkgtest.json', import.meta.url));

  const loaded = await loadConfig(path, createFileSystemAdapter(), '/');

  assert.equal(loaded.ok, true);
  if (loaded.ok) {
    assert.deepEqual(Object.keys(loaded.data.config.tests).sort(), ['go-build', 'go-coverage', 'go-race', 'go-test']);
    assert.equal(loaded.data.config.tests['go-race'].timeout, '30m');
  }
});
