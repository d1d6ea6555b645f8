import type { ClockPort } from '@/ports/ClockPort';
import { msToNtp, ntpToMs, ticksToNtp, type NtpTime } from '@/domain/time/ntpTime';

/** Lead time applied when playback is restarted interactively. */
export const RESTART_LEAD_MS = 200;

export type StartRequest = {
  /** Absolute NTP start; the current clock reading when absent. */
  base?: NtpTime | null;
  waitMs: number;
  latencyTicks: number;
  sampleRate: number;
};

export type StartPlan = {
  now: NtpTime;
  startAt: NtpTime;
  /** Delay until the first frame is heard, 0 when the start is already past. */
  inMs: number;
};

/**
 * Start time to hand to `startAt`: the base plus the wait, moved earlier by
 * the receiver latency so the first frame is heard at base + wait. The result
 * may lie in the past; the transport then starts as soon as it can.
 */
export function computeStart(request: StartRequest, clock: ClockPort): NtpTime {
  const base = request.base ?? clock.now();
  return base + msToNtp(request.waitMs) - ticksToNtp(request.latencyTicks, request.sampleRate);
}

/**
 * Plans a delayed start from the command line options. Returns null when
 * neither an absolute start nor a wait was given, in which case streaming
 * starts immediately without a `startAt` call.
 */
export function planStart(request: StartRequest, clock: ClockPort): StartPlan | null {
  if (!request.base && request.waitMs <= 0) {
    return null;
  }
  const now = clock.now();
  const latencyNtp = ticksToNtp(request.latencyTicks, request.sampleRate);
  const startAt = computeStart({ ...request, base: request.base || now }, clock);
  const inMs = startAt + latencyNtp > now ? ntpToMs(startAt - now + latencyNtp) : 0;
  return { now, startAt, inMs };
}

export function computeRestart(
  clock: ClockPort,
  latencyTicks: number,
  sampleRate: number,
): NtpTime {
  return computeStart({ waitMs: RESTART_LEAD_MS, latencyTicks, sampleRate }, clock);
}
