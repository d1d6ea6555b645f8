/**
 * Fixed-point time arithmetic for the shared NTP domain.
 *
 * An NTP timestamp is a 64-bit value: the upper 32 bits count seconds since
 * 1900, the lower 32 bits are the binary fraction of a second. Sample ticks
 * count audio frames at the session sample rate. Every conversion is integer
 * `bigint` arithmetic and truncates; values past 2^64 wrap silently, which a
 * single streaming session never reaches.
 */
export type NtpTime = bigint;

const NTP_EPOCH_DELTA_SECONDS = 2208988800n; // seconds between 1900 and 1970 epochs
const FRACTION_MASK = 0xffffffffn;

function toBigInt(value: number | bigint): bigint {
  return typeof value === 'bigint' ? value : BigInt(Math.trunc(value));
}

export function msToNtp(ms: number | bigint): NtpTime {
  return ((toBigInt(ms) << 22n) / 1000n) << 10n;
}

export function ntpToMs(ntp: NtpTime): number {
  return Number(((ntp >> 10n) * 1000n) >> 22n);
}

export function ticksToNtp(ticks: number | bigint, sampleRate: number): NtpTime {
  return ((toBigInt(ticks) << 16n) / toBigInt(sampleRate)) << 16n;
}

export function ntpToTicks(ntp: NtpTime, sampleRate: number): number {
  return Number(((ntp >> 16n) * toBigInt(sampleRate)) >> 16n);
}

export function msToTicks(ms: number | bigint, sampleRate: number): number {
  return Number((toBigInt(ms) * toBigInt(sampleRate)) / 1000n);
}

export function ticksToMs(ticks: number | bigint, sampleRate: number): number {
  return ntpToMs(ticksToNtp(ticks, sampleRate));
}

/**
 * Convert a Unix timestamp in microseconds to an NTP timestamp.
 */
export function unixMicrosToNtp(unixMicros: bigint): NtpTime {
  const micros = unixMicros < 0n ? 0n : unixMicros;
  const seconds = micros / 1_000_000n + NTP_EPOCH_DELTA_SECONDS;
  const fraction = ((micros % 1_000_000n) << 32n) / 1_000_000n;
  return (seconds << 32n) | fraction;
}

/**
 * Convert an NTP timestamp to Unix milliseconds.
 */
export function ntpToUnixMs(ntp: NtpTime): number {
  const unixSeconds = (ntp >> 32n) - NTP_EPOCH_DELTA_SECONDS;
  const millis = ((ntp & FRACTION_MASK) * 1000n) >> 32n;
  return Number(unixSeconds * 1000n + millis);
}

/**
 * Renders `seconds.millis` of the NTP value, the form used in progress lines.
 */
export function formatNtpSeconds(ntp: NtpTime): string {
  const seconds = ntp >> 32n;
  const millis = ((ntp & FRACTION_MASK) * 1000n) >> 32n;
  return `${seconds}.${millis.toString().padStart(3, '0')}`;
}

/**
 * Parses a decimal NTP value as written by `--ntp-file` or read by
 * `--start-file`.
 */
export function parseNtp(raw: string): NtpTime {
  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new Error(`invalid NTP value: ${JSON.stringify(raw)}`);
  }
  return BigInt(trimmed);
}
