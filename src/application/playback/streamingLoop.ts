import { setImmediate as yieldToEventLoop, setTimeout as delay } from 'node:timers/promises';
import { createLogger, type PlaybackLogger } from '@/shared/logging/logger';
import type { ClockPort } from '@/ports/ClockPort';
import type { TransportClient } from '@/ports/TransportClientPort';
import type { AudioSource } from '@/ports/AudioSourcePort';
import { formatNtpSeconds, ntpToMs, ticksToMs, type NtpTime } from '@/domain/time/ntpTime';
import type { CommandQueue } from '@/application/playback/commandQueue';
import type { TransportController } from '@/application/playback/transportController';
import { TimeGate } from '@/application/playback/timeGate';

export const STATUS_INTERVAL_MS = 1000;
export const KEEPALIVE_INTERVAL_MS = 30_000;
export const DEFAULT_IDLE_SLEEP_MS = 2;

export type StreamingLoopOptions = {
  transport: TransportClient;
  controller: TransportController;
  clock: ClockPort;
  source: AudioSource;
  commands?: CommandQueue;
  bytesPerFrame: number;
  /** Upper bound for one read; a whole number of frames. */
  chunkBytes: number;
  idleSleepMs?: number;
  /** Waits between iterations; 0 means yield without a timer. */
  sleep?: (ms: number) => Promise<void>;
  log?: PlaybackLogger;
};

export type StreamingExitReason = 'transport-ended' | 'shutdown';

export type StreamingResult = {
  reason: StreamingExitReason;
  frames: number;
  bytes: number;
  chunks: number;
};

export type ProgressReport = {
  at: string;
  elapsedMs: number;
  playedMs: number;
};

const defaultSleep = async (ms: number): Promise<void> => {
  if (ms > 0) {
    await delay(ms);
    return;
  }
  await yieldToEventLoop();
};

/**
 * Single-threaded polling loop feeding the transport. Each iteration applies
 * queued commands, runs the progress and keepalive gates, then moves at most
 * one chunk when the local state is PLAYING, the receiver accepts frames and
 * the source still has data.
 *
 * The loop ends only when the transport session is no longer playing or a
 * stop was applied. An exhausted source keeps polling so keepalives continue
 * until the receiver has played out.
 */
export class StreamingLoop {
  private readonly log: PlaybackLogger;
  private readonly latency: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly idleSleepMs: number;
  private readonly statusGate: TimeGate;
  private readonly keepaliveGate: TimeGate;
  private readonly startedAt: NtpTime;
  private frames = 0;
  private bytes = 0;
  private chunks = 0;
  private sourceDrained = false;
  private pending: Buffer | null = null;

  constructor(private readonly options: StreamingLoopOptions) {
    if (options.bytesPerFrame <= 0 || options.chunkBytes % options.bytesPerFrame !== 0) {
      throw new Error(
        `chunk size ${options.chunkBytes} is not a multiple of ${options.bytesPerFrame} bytes per frame`,
      );
    }
    this.log = options.log ?? createLogger('Playback', 'Stream');
    this.latency = options.transport.latency;
    this.sleep = options.sleep ?? defaultSleep;
    this.idleSleepMs = options.idleSleepMs ?? DEFAULT_IDLE_SLEEP_MS;
    this.startedAt = options.clock.now();
    this.statusGate = new TimeGate(STATUS_INTERVAL_MS, 0n);
    this.keepaliveGate = new TimeGate(KEEPALIVE_INTERVAL_MS, this.startedAt);
  }

  public get framesTransferred(): number {
    return this.frames;
  }

  public async run(): Promise<StreamingResult> {
    this.log.debug('streaming loop started', {
      at: formatNtpSeconds(this.startedAt),
      latency: this.latency,
      chunkBytes: this.options.chunkBytes,
    });
    for (;;) {
      const sent = await this.iterate();
      const reason = this.exitReason();
      if (reason) {
        return this.finish(reason);
      }
      await this.sleep(sent ? 0 : this.idleSleepMs);
    }
  }

  /**
   * Runs one iteration and reports whether a chunk was sent.
   */
  public async iterate(): Promise<boolean> {
    this.applyCommands();
    if (this.options.controller.shutdownRequested) {
      return false;
    }

    const now = this.options.clock.now();
    if (this.statusGate.tryPass(now) && this.frames > this.latency) {
      this.log.info('playback progress', this.progress(now));
    }
    if (this.keepaliveGate.tryPass(now)) {
      this.log.info('keepalive', this.progress(now));
      this.options.transport.keepalive();
    }

    return this.transferChunk();
  }

  private applyCommands(): void {
    const { commands, controller } = this.options;
    if (!commands) {
      return;
    }
    for (const command of commands.drain()) {
      if (controller.shutdownRequested) {
        this.log.debug('command ignored after shutdown', { command });
        continue;
      }
      controller.apply(command);
    }
  }

  private async transferChunk(): Promise<boolean> {
    const { controller, transport, source, chunkBytes, bytesPerFrame } = this.options;
    if (this.sourceDrained || !controller.isPlaying() || !transport.acceptFrames()) {
      return false;
    }
    const data = this.pending ?? (await source.read(chunkBytes));
    this.pending = null;
    if (!data || data.length === 0) {
      this.sourceDrained = true;
      this.log.debug('audio source exhausted', { frames: this.frames, bytes: this.bytes });
      return false;
    }
    // A command may have landed while the read was pending.
    this.applyCommands();
    if (!controller.isPlaying()) {
      this.pending = data;
      this.log.debug('chunk held back after state change', { state: controller.state });
      return false;
    }
    const result = transport.sendChunk(data);
    if (!result.ok) {
      this.log.warn('chunk send failed', { bytes: data.length, frames: this.frames });
      return false;
    }
    this.frames += Math.floor(data.length / bytesPerFrame);
    this.bytes += data.length;
    this.chunks += 1;
    this.log.spam('chunk sent', {
      bytes: data.length,
      frames: this.frames,
      playtime: formatNtpSeconds(result.playtime),
    });
    return true;
  }

  private exitReason(): StreamingExitReason | null {
    if (this.options.controller.shutdownRequested) {
      return 'shutdown';
    }
    if (!this.options.transport.isPlaying) {
      return 'transport-ended';
    }
    return null;
  }

  private progress(now: NtpTime): ProgressReport {
    const played = this.frames > this.latency ? this.frames - this.latency : 0;
    return {
      at: formatNtpSeconds(now),
      elapsedMs: ntpToMs(now - this.startedAt),
      playedMs: ticksToMs(played, this.options.transport.sampleRate),
    };
  }

  private finish(reason: StreamingExitReason): StreamingResult {
    const result: StreamingResult = {
      reason,
      frames: this.frames,
      bytes: this.bytes,
      chunks: this.chunks,
    };
    this.log.debug('streaming loop finished', result);
    return result;
  }
}
