import { msToNtp, type NtpTime } from '@/domain/time/ntpTime';

/**
 * Opens at most once per interval of clock progress. Passing resets the
 * reference time to the reading that opened it.
 */
export class TimeGate {
  private readonly interval: NtpTime;

  constructor(intervalMs: number, private last: NtpTime) {
    this.interval = msToNtp(intervalMs);
  }

  public tryPass(now: NtpTime): boolean {
    if (now - this.last < this.interval) {
      return false;
    }
    this.last = now;
    return true;
  }
}
