import net from 'node:net';
import { createLogger, type PlaybackLogger } from '@/shared/logging/logger';
import { errorMessage } from '@/shared/bestEffort';
import type { ClockPort } from '@/ports/ClockPort';
import type { SendResult, TransportClient } from '@/ports/TransportClientPort';
import { MUTED_GAIN_DB, bytesPerFrame, type TransportSettings } from '@/domain/playback/session';
import { ntpToTicks, ticksToNtp, type NtpTime } from '@/domain/time/ntpTime';

const TCP_KEEPALIVE_DELAY_MS = 10_000;

/**
 * Streams raw interleaved little-endian PCM to a TCP PCM ingest (a snapserver
 * tcp source or a line-in ingest that takes an optional `<name>\n` header).
 *
 * Such a sink neither negotiates latency nor reports buffer state, so the
 * receiver clock is modelled here: frame 0 renders at `playStart` (the start
 * time plus the latency) and later frames follow at the sample rate. Frames
 * are accepted while less than one latency worth is queued ahead of the
 * render position.
 */
export class PcmTcpTransport implements TransportClient {
  private readonly frameBytes: number;
  private readonly latencyNtp: NtpTime;
  private socket: net.Socket | null = null;
  private connected = false;
  private stopped = false;
  private paused = false;
  private playStart: NtpTime | null = null;
  private framesQueued = 0;
  private gainDb = 0;

  constructor(
    private readonly settings: TransportSettings,
    private readonly clock: ClockPort,
    private readonly log: PlaybackLogger = createLogger('Transport', 'PcmTcp'),
  ) {
    this.frameBytes = bytesPerFrame(settings);
    this.latencyNtp = ticksToNtp(settings.latencyTicks, settings.sampleRate);
  }

  public get latency(): number {
    return this.settings.latencyTicks;
  }

  public get sampleRate(): number {
    return this.settings.sampleRate;
  }

  public get isPlaying(): boolean {
    if (!this.connected || this.stopped) {
      return false;
    }
    if (this.paused || this.playStart === null) {
      return true;
    }
    return this.clock.now() < this.playStart + ticksToNtp(this.framesQueued, this.sampleRate);
  }

  public async connect(port: number, setVolume: boolean): Promise<boolean> {
    const unsupported = this.unsupportedFeatures();
    if (unsupported.length > 0) {
      this.log.error('pcm tcp transport cannot provide the requested session', {
        host: this.settings.host,
        unsupported,
      });
      return false;
    }

    let socket: net.Socket;
    try {
      socket = await openSocket(this.settings.host, port);
    } catch (error) {
      this.log.warn('pcm tcp connect failed', {
        host: this.settings.host,
        port,
        message: errorMessage(error),
      });
      return false;
    }

    socket.setNoDelay(true);
    socket.setKeepAlive(true, TCP_KEEPALIVE_DELAY_MS);
    socket.on('error', (error) => {
      this.log.warn('pcm tcp socket error', { host: this.settings.host, message: error.message });
      this.connected = false;
    });
    socket.on('close', () => {
      this.connected = false;
    });
    if (this.settings.streamName) {
      socket.write(`${this.settings.streamName}\n`);
    }

    this.socket = socket;
    this.connected = true;
    this.stopped = false;
    this.gainDb = setVolume ? this.settings.gainDb : 0;
    this.log.info('pcm tcp connected', {
      host: this.settings.host,
      port,
      latency: this.latency,
      gainDb: this.gainDb,
    });
    return true;
  }

  public async disconnect(): Promise<void> {
    const socket = this.socket;
    this.connected = false;
    if (!socket || socket.destroyed) {
      return;
    }
    await new Promise<void>((resolve) => {
      socket.end(() => resolve());
    });
  }

  public destroy(): void {
    this.connected = false;
    this.socket?.destroy();
    this.socket = null;
  }

  public startAt(ntp: NtpTime): void {
    const now = this.clock.now();
    const requested = ntp + this.latencyNtp;
    this.playStart = requested < now ? now : requested;
    this.framesQueued = 0;
    this.paused = false;
    this.log.debug('start scheduled', { startAt: ntp.toString(), late: requested < now });
  }

  public pause(): void {
    this.paused = true;
  }

  public stop(): void {
    this.stopped = true;
    this.paused = false;
  }

  public flush(): void {
    this.playStart = null;
    this.framesQueued = 0;
  }

  public keepalive(): void {
    if (!this.socket || this.socket.destroyed) {
      this.log.warn('keepalive on closed connection', { host: this.settings.host });
      this.connected = false;
      return;
    }
    this.log.debug('keepalive', { host: this.settings.host, framesQueued: this.framesQueued });
  }

  public acceptFrames(): boolean {
    if (!this.connected || this.stopped || this.paused || !this.socket) {
      return false;
    }
    if (this.socket.writableNeedDrain) {
      return false;
    }
    const now = this.clock.now();
    if (this.playStart === null) {
      this.playStart = now + this.latencyNtp;
    }
    const rendered = now > this.playStart ? ntpToTicks(now - this.playStart, this.sampleRate) : 0;
    return this.framesQueued - rendered < this.latency;
  }

  public sendChunk(chunk: Buffer): SendResult {
    const socket = this.socket;
    if (!socket || socket.destroyed || !this.connected || this.stopped) {
      this.connected = false;
      return { ok: false, playtime: 0n };
    }
    if (this.playStart === null) {
      this.playStart = this.clock.now() + this.latencyNtp;
    }
    const playtime = this.playStart + ticksToNtp(this.framesQueued, this.sampleRate);
    socket.write(this.applyGain(chunk));
    this.framesQueued += Math.floor(chunk.length / this.frameBytes);
    return { ok: true, playtime };
  }

  private unsupportedFeatures(): string[] {
    const unsupported: string[] = [];
    if (this.settings.codec !== 'pcm') unsupported.push(`codec ${this.settings.codec}`);
    if (this.settings.crypto !== 'clear') unsupported.push(`encryption ${this.settings.crypto}`);
    if (this.settings.password) unsupported.push('password');
    if (this.settings.secret) unsupported.push('secret');
    return unsupported;
  }

  private applyGain(chunk: Buffer): Buffer {
    if (this.gainDb >= 0 || this.settings.bitDepth !== 16) {
      return chunk;
    }
    if (this.gainDb <= MUTED_GAIN_DB) {
      return Buffer.alloc(chunk.length);
    }
    const factor = 10 ** (this.gainDb / 20);
    const out = Buffer.from(chunk);
    for (let offset = 0; offset + 1 < out.length; offset += 2) {
      const scaled = Math.round(out.readInt16LE(offset) * factor);
      out.writeInt16LE(Math.max(-32768, Math.min(32767, scaled)), offset);
    }
    return out;
  }
}

export function createPcmTcpTransport(settings: TransportSettings, clock: ClockPort): TransportClient {
  return new PcmTcpTransport(settings, clock);
}

function openSocket(host: string, port: number): Promise<net.Socket> {
  return new Promise<net.Socket>((resolve, reject) => {
    const socket = net.createConnection({ host, port });
    const onError = (error: Error): void => {
      socket.destroy();
      reject(error);
    };
    socket.once('error', onError);
    socket.once('connect', () => {
      socket.off('error', onError);
      resolve(socket);
    });
  });
}
