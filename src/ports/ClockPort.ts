import type { NtpTime } from '@/domain/time/ntpTime';

/**
 * Reads the shared NTP time domain. Readings never decrease within a
 * process. The host clock is assumed to be synchronised with the receiver.
 */
export interface ClockPort {
  now: () => NtpTime;
}
