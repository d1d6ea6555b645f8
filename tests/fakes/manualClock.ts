import type { ClockPort } from '../../src/ports/ClockPort';
import { msToNtp } from '../../src/domain/time/ntpTime';

/** 2023-11-14 in NTP seconds; any fixed value works. */
export const T0 = 3_908_937_600n << 32n;

export class ManualClock implements ClockPort {
  constructor(public current: bigint = T0) {}

  public now = (): bigint => this.current;

  public advanceMs(ms: number): void {
    this.current += msToNtp(ms);
  }
}
