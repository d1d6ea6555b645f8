import type { NtpTime } from '@/domain/time/ntpTime';
import type { PlaybackCommand } from '@/domain/playback/playbackState';

/** Start-time and NTP-dump files, each holding one decimal NTP value. */
export interface NtpFileStore {
  readStartTime(path: string): Promise<NtpTime>;
  writeNtp(path: string, value: NtpTime): Promise<void>;
}

/** Resolves a receiver name to an address the transport can dial. */
export interface ReceiverResolver {
  resolve(address: string): Promise<string>;
}

/**
 * Interactive key input. The listener only forwards decoded commands; it
 * never touches the transport.
 */
export interface KeyInput {
  start(onCommand: (command: PlaybackCommand) => void): void;
  stop(): void;
}
