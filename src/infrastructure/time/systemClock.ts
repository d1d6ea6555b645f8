import { performance } from 'node:perf_hooks';
import type { ClockPort } from '@/ports/ClockPort';
import { unixMicrosToNtp, type NtpTime } from '@/domain/time/ntpTime';

/**
 * Host clock in the NTP domain at microsecond resolution. The reading is
 * clamped to the previous one so it never goes backwards.
 */
export function createSystemClock(readUnixMicros = wallClockMicros): ClockPort {
  let last: NtpTime = 0n;
  return {
    now: () => {
      const ntp = unixMicrosToNtp(readUnixMicros());
      if (ntp > last) {
        last = ntp;
      }
      return last;
    },
  };
}

function wallClockMicros(): bigint {
  return BigInt(Math.floor((performance.timeOrigin + performance.now()) * 1000));
}

export const systemClock: ClockPort = createSystemClock();
