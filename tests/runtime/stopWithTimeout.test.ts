import assert from 'node:assert/strict';
import { test } from '../testHarness';
import { stopWithTimeout } from '../../src/runtime/stopWithTimeout';
import { createCaptureLogger } from '../fakes/logger';

const delay = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

test('stopWithTimeout logs stopped on clean shutdown', async () => {
  const { log, entries } = createCaptureLogger();
  const result = await stopWithTimeout('transport', async () => {
    await delay(5);
  }, 50, log);

  assert.equal(result.kind, 'stopped');
  assert.deepEqual(entries, [{ level: 'debug', message: 'transport stopped', context: undefined }]);
});

test('stopWithTimeout logs timeout without clean stop', async () => {
  const { log, entries } = createCaptureLogger();
  const result = await stopWithTimeout('transport', async () => {
    await delay(30);
  }, 5, log);

  assert.equal(result.kind, 'timeout');
  await delay(40);

  assert.deepEqual(entries, [{ level: 'warn', message: 'transport stop timed out', context: { timeoutMs: 5 } }]);
});

test('stopWithTimeout still reports a late failure', async () => {
  const { log, entries } = createCaptureLogger();
  const result = await stopWithTimeout('transport', async () => {
    await delay(20);
    throw new Error('socket hang up');
  }, 5, log);

  assert.equal(result.kind, 'timeout');
  await delay(40);
  assert.deepEqual(
    entries.map((entry) => entry.message),
    ['transport stop timed out', 'failed to stop transport'],
  );
  assert.equal(entries[1].context?.message, 'socket hang up');
});

test('stopWithTimeout logs errors on failure', async () => {
  const { log, entries } = createCaptureLogger();
  const result = await stopWithTimeout('transport', async () => {
    throw new Error('boom');
  }, 50, log);

  assert.equal(result.kind, 'error');
  assert.deepEqual(entries, [{ level: 'error', message: 'failed to stop transport', context: { message: 'boom' } }]);
});
