import { createLogger, type PlaybackLogger } from '@/shared/logging/logger';
import { bestEffort, bestEffortSync } from '@/shared/bestEffort';
import type { ClockPort } from '@/ports/ClockPort';
import type { TransportClient, TransportFactory } from '@/ports/TransportClientPort';
import type { AudioSource, AudioSourceOpener } from '@/ports/AudioSourcePort';
import type { KeyInput, NtpFileStore, ReceiverResolver } from '@/ports/SessionIoPort';
import {
  createPlaybackSession,
  floatVolume,
  type AudioFormat,
  type StreamRequest,
  type TransportSettings,
} from '@/domain/playback/session';
import { formatNtpSeconds, ntpToUnixMs, ticksToMs } from '@/domain/time/ntpTime';
import { CommandQueue } from '@/application/playback/commandQueue';
import { TransportController } from '@/application/playback/transportController';
import { planStart } from '@/application/playback/playbackScheduler';
import { StreamingLoop, type StreamingResult } from '@/application/playback/streamingLoop';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;

export type StreamSessionDeps = {
  clock: ClockPort;
  createTransport: TransportFactory;
  openSource: AudioSourceOpener;
  ntpFiles: NtpFileStore;
  resolver: ReceiverResolver;
  /** Only consulted in interactive mode. */
  keyInput?: KeyInput;
  /** Tears the transport connection down; the runtime bounds it with a timeout. */
  disconnect?: (transport: TransportClient) => Promise<void>;
  log?: PlaybackLogger;
};

export type StreamSessionSettings = {
  format: AudioFormat;
  defaultLatencyTicks: number;
  /** Frames per chunk; the loop reads `chunkFrames * bytesPerFrame` bytes at most. */
  chunkFrames: number;
  commandQueueCapacity: number;
  idleSleepMs: number;
};

export type StreamSessionOutcome = {
  exitCode: number;
  result: StreamingResult | null;
};

/**
 * One command line run: optional NTP dump, connect, delayed start, the
 * streaming loop, and teardown. Resolves to the process exit code; startup
 * I/O failures (missing input or start file) reject.
 */
export async function runStreamSession(
  request: StreamRequest,
  settings: StreamSessionSettings,
  deps: StreamSessionDeps,
): Promise<StreamSessionOutcome> {
  const log = deps.log ?? createLogger('Playback', 'Session');
  const { clock } = deps;

  if (request.ntpFile) {
    const now = clock.now();
    await deps.ntpFiles.writeNtp(request.ntpFile, now);
    log.info('wrote current NTP', {
      file: request.ntpFile,
      ntp: now.toString(),
      at: new Date(ntpToUnixMs(now)).toISOString(),
    });
    return { exitCode: EXIT_OK, result: null };
  }

  const latencyTicks =
    request.latency !== null && request.latency >= 0 ? request.latency : settings.defaultLatencyTicks;
  const host = await deps.resolver.resolve(request.serverAddress);
  const transportSettings: TransportSettings = {
    ...settings.format,
    host,
    codec: request.codec,
    crypto: request.crypto,
    latencyTicks,
    gainDb: floatVolume(request.volume),
    password: request.password,
    secret: request.secret,
    streamName: request.streamName,
  };
  const transport = deps.createTransport(transportSettings, clock);

  let start = request.start;
  let source: AudioSource;
  try {
    if (request.startFile) {
      start = await deps.ntpFiles.readStartTime(request.startFile);
    }
    source = await deps.openSource(request.filename);
  } catch (error) {
    transport.destroy();
    throw error;
  }

  let connected: boolean;
  try {
    connected = await transport.connect(request.port, true);
  } catch (error) {
    transport.destroy();
    await closeSource(source, log);
    throw error;
  }
  if (!connected) {
    transport.destroy();
    await closeSource(source, log);
    log.error('cannot connect to receiver', { host: request.serverAddress, port: request.port });
    return { exitCode: EXIT_FAILURE, result: null };
  }

  const session = createPlaybackSession(transportSettings, {
    port: request.port,
    volume: request.volume,
    latency: transport.latency,
    sampleRate: transport.sampleRate,
  });
  log.info('connected', {
    host: request.serverAddress,
    port: session.port,
    latencyMs: ticksToMs(session.latency, session.sampleRate),
  });

  const plan = planStart(
    {
      base: start,
      waitMs: request.waitMs,
      latencyTicks: session.latency,
      sampleRate: session.sampleRate,
    },
    clock,
  );
  if (plan) {
    log.info('scheduled start', {
      now: formatNtpSeconds(plan.now),
      startAt: formatNtpSeconds(plan.startAt),
      inMs: plan.inMs,
    });
    transport.startAt(plan.startAt);
  }

  const commands = new CommandQueue(settings.commandQueueCapacity);
  const controller = new TransportController(transport, clock);
  const keyInput = request.interactive ? deps.keyInput : undefined;
  keyInput?.start((command) => {
    commands.offer(command);
  });

  try {
    const loop = new StreamingLoop({
      transport,
      controller,
      clock,
      source,
      commands,
      bytesPerFrame: session.bytesPerFrame,
      chunkBytes: settings.chunkFrames * session.bytesPerFrame,
      idleSleepMs: settings.idleSleepMs,
    });
    const result = await loop.run();
    log.info('streaming finished', { reason: result.reason, frames: result.frames });
    return { exitCode: EXIT_OK, result };
  } finally {
    if (keyInput) {
      bestEffortSync(() => keyInput.stop(), {
        fallback: undefined,
        onError: 'debug',
        label: 'key listener stop failed',
        log,
      });
    }
    await closeSource(source, log);
    try {
      await (deps.disconnect ?? ((client: TransportClient) => client.disconnect()))(transport);
    } finally {
      transport.destroy();
    }
  }
}

async function closeSource(source: AudioSource, log: PlaybackLogger): Promise<void> {
  await bestEffort(() => source.close(), {
    fallback: undefined,
    onError: 'debug',
    label: 'audio source close failed',
    log,
  });
}
