import { test } from 'node:test';
import assert from 'node:assert/strict';
import { toError, tryResult } from '../src/shared/result.ts';
import { formatError } from '../src/shared/errors.ts';
import { createEventBus } from '../src/shared/event-bus.ts';
import { createEvent } from '../src/shared/events.ts';

test('tryResult - captures thrown values as errors', async () => {
  const thrown = await tryResult(() => {
    throw 'oops';
  });
  assert.equal(thrown.ok, false);
  if (!thrown.ok) {
    assert.equal(thrown.error.message, 'oops');
  }

  const resolved = await tryResult(() => Promise.resolve('done'));
  assert.deepEqual(resolved, { ok: true, data: 'done' });
});

test('toError - keeps Error instances', () => {
  const error = new Error('kept');
  assert.equal(toError(error), error);
  assert.equal(toError(42).message, '42');
});

test('formatError - validation errors', () => {
  assert.equal(formatError({ kind: 'EmptyInput', field: 'timeout' }), "Field 'timeout' cannot be empty");
  assert.equal(
    formatError({ kind: 'OutOfRange', field: 'part', min: -1, value: -3 }),
    "Field 'part' value -3 is out of range -1 to +∞",
  );
  assert.equal(
    formatError({ kind: 'InvalidFormat', field: 'part', expected: 'integer', actual: 'x' }),
    "Field 'part' has invalid format. Expected: integer, Actual: x",
  );
});

test('formatError - domain errors', () => {
  assert.equal(
    formatError({ domain: 'registry', kind: 'TestNotFound', details: { test: 'go-race' } }),
    '[registry] TestNotFound: {"test":"go-race"}',
  );
});

test('EventBus - delivers to subscribers until unsubscribed', async () => {
  const bus = createEventBus();
  const seen: string[] = [];

  const off = bus.on('test:started', (event) => {
    if (event.type === 'test:started') {
      seen.push(event.testName);
    }
  });

  await bus.emit(createEvent({ type: 'test:started', testName: 'go-test' }));
  off();
  await bus.emit(createEvent({ type: 'test:started', testName: 'go-race' }));

  assert.deepEqual(seen, ['go-test']);
});
