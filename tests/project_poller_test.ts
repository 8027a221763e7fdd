import { test } from 'node:test';
import assert from 'node:assert/strict';
import { formatPollReport, ProjectPoller, upstreamRef } from '../src/domains/polling/project-poller.ts';
import type { ProjectSpec } from '../src/config/schema.ts';
import { FakeExecutor, processResult } from './helpers/fakes.ts';

const PROJECTS: Record<string, ProjectSpec> = {
  tools: { path: '../tools', remote: 'origin' },
  core: { path: 'core', branch: 'main', remote: 'upstream' },
};

const REVISIONS: Record<string, string> = {
  '/repo/core HEAD': 'aaa',
  '/repo/core upstream/main': 'bbb',
  '/tools HEAD': 'ccc',
  '/tools @{upstream}': 'ccc',
};

const gitExecutor = () =>
  new FakeExecutor((command, options) => {
    if (command[1] === 'rev-parse') {
      return processResult({ stdout: `${REVISIONS[`${options.cwd} ${command[2]}`]}\n` });
    }
    return processResult();
  });

test('upstreamRef - configured branch or the tracking branch', () => {
  assert.equal(upstreamRef({ path: '.', branch: 'main', remote: 'origin' }), 'origin/main');
  assert.equal(upstreamRef({ path: '.', remote: 'origin' }), '@{upstream}');
});

test('ProjectPoller.poll - projects whose upstream moved', async () => {
  const executor = gitExecutor();
  const poller = new ProjectPoller(executor, '/repo');

  const report = await poller.poll(PROJECTS);

  assert.deepEqual(report, {
    ok: true,
    data: {
      checked: [
        { project: 'core', head: 'aaa', upstream: 'bbb' },
        { project: 'tools', head: 'ccc', upstream: 'ccc' },
      ],
      changed: ['core'],
    },
  });
  assert.deepEqual(executor.calls.map((call) => `${call.options.cwd}: ${call.command.join(' ')}`), [
    '/repo/core: git fetch upstream main',
    '/repo/core: git rev-parse HEAD',
    '/repo/core: git rev-parse upstream/main',
    '/tools: git fetch origin',
    '/tools: git rev-parse HEAD',
    '/tools: git rev-parse @{upstream}',
  ]);
});

test('ProjectPoller.poll - a failed fetch names the project', async () => {
  const executor = new FakeExecutor(() => processResult({ exitCode: 128, output: 'fatal: no remote\n' }));

  assert.deepEqual(await new ProjectPoller(executor, '/repo').poll(PROJECTS), {
    ok: false,
    error: {
      domain: 'polling',
      kind: 'FetchFailed',
      details: { project: 'core', error: 'git fetch upstream main exited with 128: fatal: no remote' },
    },
  });
});

test('ProjectPoller.check - git missing from PATH', async () => {
  const executor = new FakeExecutor((command) =>
    command[1] === 'rev-parse' ? new Error('spawn git ENOENT') : processResult()
  );

  assert.deepEqual(await new ProjectPoller(executor, '/repo').check('core', PROJECTS.core), {
    ok: false,
    error: {
      domain: 'polling',
      kind: 'RevisionLookupFailed',
      details: { project: 'core', error: 'git rev-parse HEAD: spawn git ENOENT' },
    },
  });
});

test('formatPollReport - changed projects and their tests', () => {
  assert.equal(formatPollReport({ checked: [], changed: [] }, ['go-test']), 'No changes.\n');
  assert.equal(
    formatPollReport({ checked: [], changed: ['core'] }, ['go-race', 'go-test']),
    'Projects with new changes:\ncore\n\nTests to run:\ngo-race\ngo-test\n',
  );
});
