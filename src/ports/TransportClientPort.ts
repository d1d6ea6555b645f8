import type { NtpTime } from '@/domain/time/ntpTime';
import type { TransportSettings } from '@/domain/playback/session';
import type { ClockPort } from '@/ports/ClockPort';

export type SendResult = {
  ok: boolean;
  /** NTP time at which the first frame of the chunk renders on the receiver. */
  playtime: NtpTime;
};

/**
 * Session with a remote receiver. Handshake, encryption, encoding and wire
 * framing live behind this port; the playback core only sees the signals
 * below.
 */
export interface TransportClient {
  /** False once the receiver session has ended or failed. */
  readonly isPlaying: boolean;
  /** Output latency negotiated with the receiver, in sample ticks. */
  readonly latency: number;
  readonly sampleRate: number;

  connect(port: number, setVolume: boolean): Promise<boolean>;
  disconnect(): Promise<void>;
  destroy(): void;

  startAt(ntp: NtpTime): void;
  pause(): void;
  stop(): void;
  flush(): void;
  keepalive(): void;

  /** Backpressure: true when the receiver has room for another chunk. */
  acceptFrames(): boolean;
  sendChunk(chunk: Buffer): SendResult;
}

export type TransportFactory = (settings: TransportSettings, clock: ClockPort) => TransportClient;
