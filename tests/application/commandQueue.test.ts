import assert from 'node:assert/strict';
import { test } from '../testHarness';
import { CommandQueue } from '../../src/application/playback/commandQueue';
import { createCaptureLogger, messages } from '../fakes/logger';

test('command queue drains in arrival order', () => {
  const { log } = createCaptureLogger();
  const queue = new CommandQueue(4, log);
  queue.offer('pause');
  queue.offer('restart');
  assert.equal(queue.size, 2);
  assert.deepEqual(queue.drain(), ['pause', 'restart']);
  assert.equal(queue.size, 0);
  assert.deepEqual(queue.drain(), []);
});

test('full command queue drops pause and restart', () => {
  const { log, entries } = createCaptureLogger();
  const queue = new CommandQueue(2, log);
  assert.equal(queue.offer('pause'), true);
  assert.equal(queue.offer('restart'), true);
  assert.equal(queue.offer('pause'), false);
  assert.deepEqual(queue.drain(), ['pause', 'restart']);
  assert.deepEqual(messages(entries, 'warn'), ['command queue full; dropping command']);
});

test('full command queue makes room for stop and quit', () => {
  const { log } = createCaptureLogger();
  const queue = new CommandQueue(2, log);
  queue.offer('pause');
  queue.offer('restart');
  assert.equal(queue.offer('stop'), true);
  assert.equal(queue.offer('quit'), true);
  assert.deepEqual(queue.drain(), ['stop', 'quit']);
});

test('command queue rejects a non-positive capacity', () => {
  assert.throws(() => new CommandQueue(0), /positive integer/);
  assert.throws(() => new CommandQueue(1.5), /positive integer/);
});
