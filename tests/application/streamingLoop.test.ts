import assert from 'node:assert/strict';
import { test } from '../testHarness';
import { StreamingLoop } from '../../src/application/playback/streamingLoop';
import { CommandQueue } from '../../src/application/playback/commandQueue';
import { TransportController } from '../../src/application/playback/transportController';
import { PlaybackState } from '../../src/domain/playback/playbackState';
import type { PlaybackLogger } from '../../src/shared/logging/logger';
import { FakeTransport } from '../fakes/transport';
import { ManualClock } from '../fakes/manualClock';
import { MemoryAudioSource, numberedFrames } from '../fakes/audioSource';
import { createCaptureLogger, messages, type LogEntry } from '../fakes/logger';

const CHUNK_BYTES = 352 * 4;

type Harness = {
  transport: FakeTransport;
  clock: ManualClock;
  source: MemoryAudioSource;
  commands: CommandQueue;
  controller: TransportController;
  loop: StreamingLoop;
  entries: LogEntry[];
  sleeps: number[];
};

function setup(options: {
  frames: number;
  latency?: number;
  onSleep?: (harness: Harness) => void;
}): Harness {
  const transport = new FakeTransport(options.latency ?? 4410, 44100);
  const clock = new ManualClock();
  const source = new MemoryAudioSource(numberedFrames(options.frames));
  const { log, entries } = createCaptureLogger();
  const quiet: PlaybackLogger = createCaptureLogger().log;
  const commands = new CommandQueue(16, quiet);
  const controller = new TransportController(transport, clock, quiet);
  const sleeps: number[] = [];
  const harness: Harness = {
    transport,
    clock,
    source,
    commands,
    controller,
    entries,
    sleeps,
    loop: new StreamingLoop({
      transport,
      controller,
      clock,
      source,
      commands,
      bytesPerFrame: 4,
      chunkBytes: CHUNK_BYTES,
      idleSleepMs: 5,
      sleep: async (ms) => {
        sleeps.push(ms);
        options.onSleep?.(harness);
      },
      log,
    }),
  };
  return harness;
}

test('streams every frame and keeps polling after the source is exhausted', async () => {
  const harness = setup({
    frames: 8820,
    onSleep: ({ clock, transport, sleeps }) => {
      clock.advanceMs(1);
      if (sleeps.length === 100) {
        transport.alive = false;
      }
    },
  });

  const result = await harness.loop.run();

  assert.deepEqual(result, { reason: 'transport-ended', frames: 8820, bytes: 35_280, chunks: 26 });
  assert.equal(harness.transport.sent.length, 26);
  assert.equal(harness.transport.sent[25].length, 80);
  assert.equal(harness.sleeps.length, 100);
  assert.equal(harness.sleeps[0], 0);
  assert.equal(harness.sleeps[99], 5);
  assert.equal(harness.source.reads, 27);
  assert.equal(harness.loop.framesTransferred, 8820);
});

test('sends only while playing and the receiver accepts frames', async () => {
  const harness = setup({ frames: 352 * 10 });
  for (let i = 0; i < 8; i += 1) {
    harness.transport.accepting = i % 2 === 0;
    if (i === 4) harness.commands.offer('pause');
    if (i === 6) harness.commands.offer('restart');
    await harness.loop.iterate();
  }

  assert.equal(harness.transport.sent.length, 3);
  assert.equal(harness.transport.sentBytes, 3 * CHUNK_BYTES);
  assert.deepEqual(
    harness.transport.sent.map((chunk) => chunk.readUInt32LE(0)),
    [0, 352, 704],
  );
  assert.deepEqual(harness.transport.calls, ['pause', 'flush', 'startAt']);
});

test('a chunk read while a pause lands is sent after restart', async () => {
  const harness = setup({ frames: 352 * 4 });
  harness.source.onRead = () => {
    harness.source.onRead = null;
    harness.commands.offer('pause');
  };

  assert.equal(await harness.loop.iterate(), false);
  assert.equal(harness.controller.state, PlaybackState.PAUSED);
  assert.equal(harness.transport.sent.length, 0);

  harness.commands.offer('restart');
  assert.equal(await harness.loop.iterate(), true);
  assert.equal(await harness.loop.iterate(), true);
  assert.deepEqual(
    harness.transport.sent.map((chunk) => chunk.readUInt32LE(0)),
    [0, 352],
  );
  assert.equal(harness.source.reads, 2);
});

test('progress is logged at most once per second once frames exceed the latency', async () => {
  const harness = setup({ frames: 352 * 30, latency: 441 });
  for (let k = 0; k < 25; k += 1) {
    await harness.loop.iterate();
    harness.clock.advanceMs(125);
  }

  const progress = harness.entries.filter((entry) => entry.message === 'playback progress');
  assert.equal(progress.length, 3);
  assert.equal(progress[0].context?.elapsedMs, 1000);
  // 2816 frames sent minus 441 latency is 2375 ticks, 53 ms after truncation.
  assert.equal(progress[0].context?.playedMs, 53);
  assert.equal(progress[1].context?.elapsedMs, 2000);
  assert.equal(progress[2].context?.elapsedMs, 3000);
});

test('no progress while the sent frames are within the latency', async () => {
  const harness = setup({ frames: 352 * 30, latency: 1_000_000 });
  for (let k = 0; k < 25; k += 1) {
    await harness.loop.iterate();
    harness.clock.advanceMs(125);
  }
  assert.equal(harness.entries.some((entry) => entry.message === 'playback progress'), false);
});

test('keepalive fires every 30 s measured from the previous keepalive', async () => {
  const harness = setup({ frames: 0 });
  for (let k = 0; k < 11; k += 1) {
    await harness.loop.iterate();
    harness.clock.advanceMs(7000);
  }

  assert.equal(harness.transport.count('keepalive'), 2);
  assert.deepEqual(
    harness.entries
      .filter((entry) => entry.message === 'keepalive')
      .map((entry) => entry.context?.elapsedMs),
    [35_000, 70_000],
  );
});

test('stop ends the loop and later commands are ignored', async () => {
  const harness = setup({
    frames: 352 * 100,
    onSleep: ({ commands, sleeps }) => {
      if (sleeps.length === 2) {
        commands.offer('stop');
        commands.offer('restart');
      }
    },
  });

  const result = await harness.loop.run();

  assert.equal(result.reason, 'shutdown');
  assert.equal(result.chunks, 2);
  assert.deepEqual(harness.transport.calls, ['stop', 'flush']);
  assert.deepEqual(messages(harness.entries, 'debug').filter((m) => m.startsWith('command')), [
    'command ignored after shutdown',
  ]);
});

test('a rejected send is not counted', async () => {
  const harness = setup({ frames: 352 });
  harness.transport.sendOk = false;
  assert.equal(await harness.loop.iterate(), false);
  assert.equal(harness.loop.framesTransferred, 0);
  assert.deepEqual(messages(harness.entries, 'warn'), ['chunk send failed']);
});

test('chunk size must be a whole number of frames', () => {
  const transport = new FakeTransport();
  const clock = new ManualClock();
  assert.throws(
    () =>
      new StreamingLoop({
        transport,
        controller: new TransportController(transport, clock, createCaptureLogger().log),
        clock,
        source: new MemoryAudioSource(Buffer.alloc(0)),
        bytesPerFrame: 4,
        chunkBytes: 1406,
      }),
    /not a multiple of 4 bytes per frame/,
  );
});
