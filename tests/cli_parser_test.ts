import { test } from 'node:test';
import assert from 'node:assert/strict';
import {
  ApplicationStateManager,
  createApplicationConfig,
  createVersionOutput,
  isValidStateTransition,
  OutputDirectory,
  parseCli,
  PartIndex,
} from '../src/domains/application-control/index.ts';
import type { ParsedCliArgs } from '../src/domains/application-control/index.ts';
import { formatError } from '../src/shared/errors.ts';
import { FakeSystem } from './helpers/fakes.ts';

const parse = (args: string[]): ParsedCliArgs => {
  const result = parseCli(args);
  if (!result.ok) {
    throw new Error(formatError(result.error));
  }
  return result.data;
};

test('parseCli - defaults', () => {
  const parsed = parse(['run', 'go-test']);

  assert.equal(parsed.command, 'run');
  assert.deepEqual(parsed.args, ['go-test']);
  assert.equal(parsed.config, undefined);
  assert.equal(parsed.numTestWorkers, undefined);
  assert.equal(parsed.part, undefined);
  assert.deepEqual(parsed.pkgs, []);
  assert.equal(parsed.cleanGo, true);
  assert.equal(parsed.color, true);
  assert.equal(parsed.logLevel, 'info');
  assert.equal(parsed.verbose, false);
  assert.equal(parsed.help, false);
});

test('parseCli - short aliases and lists', () => {
  const parsed = parse([
    '-c',
    'ci/pkgtest.json',
    '-n',
    '8',
    '-o',
    '/reports',
    '--pkgs',
    './cmd/..., ./lib/...',
    '--part=-1',
    '-l',
    'debug',
    '-v',
    'run',
    'go-test',
    'go-race',
  ]);

  assert.equal(parsed.config, 'ci/pkgtest.json');
  assert.equal(parsed.numTestWorkers, 8);
  assert.equal(parsed.outputDir, '/reports');
  assert.deepEqual(parsed.pkgs, ['./cmd/...', './lib/...']);
  assert.equal(parsed.part, -1);
  assert.equal(parsed.logLevel, 'debug');
  assert.equal(parsed.verbose, true);
  assert.deepEqual(parsed.args, ['go-test', 'go-race']);
});

test('parseCli - negated booleans', () => {
  const parsed = parse(['--no-clean-go', '--no-color', 'list']);
  assert.equal(parsed.cleanGo, false);
  assert.equal(parsed.color, false);
  assert.equal(parsed.command, 'list');
});

test('parseCli - rejects unknown flags', () => {
  const result = parseCli(['--bogus', 'list']);
  assert.equal(result.ok, false);
  if (!result.ok) {
    assert.deepEqual(result.error, {
      kind: 'InvalidFormat',
      field: 'flag',
      expected: 'a known option, see --help',
      actual: '--bogus',
    });
  }
});

test('parseCli - rejects a non-integer worker count', () => {
  const result = parseCli(['-n', 'four', 'list']);
  assert.equal(result.ok, false);
  if (!result.ok) {
    assert.equal(formatError(result.error), "Field 'num-test-workers' has invalid format. Expected: integer, Actual: four");
  }
});

test('parseCli - rejects an unknown log level', () => {
  const result = parseCli(['-l', 'loud', 'list']);
  assert.equal(result.ok, false);
  if (!result.ok) {
    assert.equal(result.error.kind, 'PatternMismatch');
  }
});

test('createVersionOutput - names the tool', () => {
  assert.deepEqual(createVersionOutput(), { content: 'pkgtest version 0.1.0', exitCode: 0 });
});

test('createApplicationConfig - falls back to the environment', () => {
  const system = new FakeSystem({
    TEST: 'go-test, go-race',
    PART: '2',
    PKGTEST_CONFIG: 'ci/pkgtest.json',
    DEBUG: '1',
  });

  const config = createApplicationConfig(parse(['run']), system);
  assert.equal(config.ok, true);
  if (config.ok) {
    assert.deepEqual(config.data.args, ['go-test', 'go-race']);
    assert.equal(config.data.workerCount.value, 4);
    assert.equal(config.data.partIndex.value, 2);
    assert.equal(config.data.configPath, 'ci/pkgtest.json');
    assert.equal(config.data.logLevel, 'debug');
    assert.equal(config.data.outputDir, undefined);
  }
});

test('createApplicationConfig - flags win over the environment', () => {
  const system = new FakeSystem({ PART: '2', PKGTEST_CONFIG: 'ci/pkgtest.json' });

  const config = createApplicationConfig(parse(['-c', 'other.json', '-p', '0', '-n', '0', 'list']), system);
  assert.equal(config.ok, true);
  if (config.ok) {
    assert.equal(config.data.configPath, 'other.json');
    assert.equal(config.data.partIndex.value, 0);
    assert.equal(config.data.workerCount.value, 1);
  }
});

test('createApplicationConfig - default configuration file', () => {
  const config = createApplicationConfig(parse(['list']), new FakeSystem());
  assert.equal(config.ok, true);
  if (config.ok) {
    assert.equal(config.data.configPath, 'pkgtest.json');
    assert.equal(config.data.partIndex.value, -1);
  }
});

test('createApplicationConfig - command errors', () => {
  const system = new FakeSystem();

  assert.deepEqual(createApplicationConfig(parse([]), system), {
    ok: false,
    error: { domain: 'orchestrator', kind: 'MissingArgument', details: { argument: 'command' } },
  });
  assert.deepEqual(createApplicationConfig(parse(['deploy']), system), {
    ok: false,
    error: { domain: 'orchestrator', kind: 'UnknownCommand', details: { command: 'deploy' } },
  });
  assert.deepEqual(createApplicationConfig(parse(['project']), system), {
    ok: false,
    error: {
      domain: 'orchestrator',
      kind: 'MissingArgument',
      details: { command: 'project', argument: 'project' },
    },
  });
});

test('createApplicationConfig - rejects a part below -1', () => {
  const config = createApplicationConfig(parse(['--part=-2', 'list']), new FakeSystem());
  assert.deepEqual(config, {
    ok: false,
    error: { kind: 'OutOfRange', field: 'part', min: -1, value: -2 },
  });
});

test('PartIndex and OutputDirectory - smart constructors', () => {
  assert.equal(PartIndex.create(1.5).ok, false);
  const dir = OutputDirectory.create('  /reports ');
  assert.equal(dir.ok, true);
  if (dir.ok) {
    assert.equal(dir.data.value, '/reports');
  }
  assert.equal(OutputDirectory.create(' ').ok, false);
});

test('ApplicationStateManager - lifecycle', async () => {
  let now = 100;
  const manager = new ApplicationStateManager(() => now);
  const config = createApplicationConfig(parse(['list']), new FakeSystem());
  assert.equal(config.ok, true);
  if (!config.ok) {
    return;
  }

  const initialized = await manager.initialize(config.data);
  assert.equal(initialized.ok, true);
  assert.equal(manager.getState().type, 'running');

  const again = await manager.initialize(config.data);
  assert.equal(again.ok, false);

  now = 350;
  assert.equal(manager.terminate(0).ok, true);
  assert.deepEqual(manager.getState(), { type: 'terminated', exitCode: 0, duration: 250 });
  assert.equal(isValidStateTransition('terminated', 'running'), false);
});
