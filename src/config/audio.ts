import type { AudioFormat } from '@/domain/playback/session';
import { msToTicks } from '@/domain/time/ntpTime';

// The client always streams 44.1 kHz 16-bit stereo.
export const SESSION_AUDIO_FORMAT: AudioFormat = {
  sampleRate: 44100,
  channels: 2,
  bitDepth: 16,
};

/** Frames per chunk handed to the transport (one RTP packet worth). */
export const MAX_SAMPLES_PER_CHUNK = 352;

export const DEFAULT_PORT = 5000;
export const DEFAULT_VOLUME = 50;
export const DEFAULT_LATENCY_TICKS = msToTicks(1000, SESSION_AUDIO_FORMAT.sampleRate);
