export type AudioCodec = 'pcm' | 'alac';
export type CryptoMode = 'clear' | 'rsa';

/**
 * Format of the audio handed to the transport. Interleaved signed PCM.
 */
export interface AudioFormat {
  sampleRate: number;
  channels: number;
  bitDepth: number;
}

/**
 * What the user asked for on the command line, before any connection exists.
 */
export interface StreamRequest {
  serverAddress: string;
  filename: string;
  port: number;
  /** 0..100 */
  volume: number;
  /** Requested output latency in sample ticks; null selects the default. */
  latency: number | null;
  codec: AudioCodec;
  crypto: CryptoMode;
  waitMs: number;
  /** Absolute NTP start; null when none was given. */
  start: bigint | null;
  startFile: string | null;
  ntpFile: string | null;
  password: string | null;
  secret: string | null;
  interactive: boolean;
  streamName: string | null;
}

/**
 * Connection parameters handed to a transport factory.
 */
export interface TransportSettings extends AudioFormat {
  host: string;
  codec: AudioCodec;
  crypto: CryptoMode;
  latencyTicks: number;
  /** Gain in dB, see {@link floatVolume}. */
  gainDb: number;
  password: string | null;
  secret: string | null;
  streamName: string | null;
}

/**
 * Session record frozen once the transport is connected.
 */
export interface PlaybackSession extends AudioFormat {
  readonly host: string;
  readonly port: number;
  readonly codec: AudioCodec;
  readonly crypto: CryptoMode;
  readonly volume: number;
  readonly gainDb: number;
  /** Output latency reported by the receiver, in sample ticks. */
  readonly latency: number;
  readonly bytesPerFrame: number;
}

export const MUTED_GAIN_DB = -144;

export function bytesPerFrame(format: Pick<AudioFormat, 'channels' | 'bitDepth'>): number {
  return format.channels * (format.bitDepth / 8);
}

/**
 * Maps a 0..100 volume onto the receiver gain in dB: 0 mutes, 1..100 spread
 * linearly over -30..0 dB.
 */
export function floatVolume(percent: number): number {
  const volume = Math.min(100, Math.max(0, Math.round(percent)));
  if (volume === 0) {
    return MUTED_GAIN_DB;
  }
  return ((volume - 100) * 30) / 100;
}

export function createPlaybackSession(
  settings: TransportSettings,
  connection: { port: number; volume: number; latency: number; sampleRate: number },
): PlaybackSession {
  return Object.freeze({
    host: settings.host,
    port: connection.port,
    codec: settings.codec,
    crypto: settings.crypto,
    volume: connection.volume,
    gainDb: settings.gainDb,
    latency: connection.latency,
    sampleRate: connection.sampleRate,
    channels: settings.channels,
    bitDepth: settings.bitDepth,
    bytesPerFrame: bytesPerFrame(settings),
  });
}
