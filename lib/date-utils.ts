import { fromAbsolute, type ZonedDateTime } from "@internationalized/date";

// 0001-01-01T00:00:00Z .. 9999-12-31T23:59:59.999Z, the range a four digit year can print
const MIN_EPOCH_MS = -62_135_596_800_000;
const MAX_EPOCH_MS = 253_402_300_799_999;

const UTC_INSTANT_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(?:\.(\d{1,6}))?Z$/;

function pad(value: number, width: number = 2): string {
  return String(value).padStart(width, "0");
}

function formatWholeSeconds(zonedDateTime: ZonedDateTime): string {
  const year = pad(zonedDateTime.year, 4);
  const month = pad(zonedDateTime.month);
  const day = pad(zonedDateTime.day);
  const hour = pad(zonedDateTime.hour);
  const minute = pad(zonedDateTime.minute);
  const second = pad(zonedDateTime.second);

  return `${year}-${month}-${day}T${hour}:${minute}:${second}`;
}

/**
 * Check that an epoch millisecond value is a usable instant
 */
export function isValidEpochMs(epochMs: number): boolean {
  return (
    Number.isFinite(epochMs) && epochMs >= MIN_EPOCH_MS && epochMs <= MAX_EPOCH_MS
  );
}

/**
 * Current time in whole microseconds since the epoch.
 * Date.now() only resolves milliseconds, so the high resolution timer supplies the rest.
 */
export function nowEpochMicros(): number {
  return Math.round((performance.timeOrigin + performance.now()) * 1000);
}

/**
 * Format an instant as UTC ISO8601 with microsecond precision
 * @param epochMicros - Microseconds since the epoch
 * @returns e.g. "2025-09-16T13:16:40.302827Z"
 */
export function formatUtcMicros(epochMicros: number): string {
  const micros = Math.floor(epochMicros);
  const wholeSecondMs = Math.floor(micros / 1_000_000) * 1000;
  const fraction = micros - wholeSecondMs * 1000;
  const zoned = fromAbsolute(wholeSecondMs, "UTC");

  return `${formatWholeSeconds(zoned)}.${pad(fraction, 6)}Z`;
}

/**
 * Format an instant as UTC ISO8601 at second precision (sub-second part truncated)
 * @param epochMs - Milliseconds since the epoch
 * @returns e.g. "2025-09-16T12:16:42Z"
 */
export function formatUtcSeconds(epochMs: number): string {
  const wholeSecondMs = Math.floor(epochMs / 1000) * 1000;
  return `${formatWholeSeconds(fromAbsolute(wholeSecondMs, "UTC"))}Z`;
}

/**
 * Parse a UTC ISO8601 instant as produced by formatUtcMicros or formatUtcSeconds
 * @returns Microseconds since the epoch, or null when the string is not in that form
 */
export function parseUtcInstant(value: string): number | null {
  const match = UTC_INSTANT_PATTERN.exec(value);
  if (!match) return null;

  const [, year, month, day, hour, minute, second, fraction] = match;
  const epochMs = Date.UTC(
    Number(year),
    Number(month) - 1,
    Number(day),
    Number(hour),
    Number(minute),
    Number(second),
  );
  if (Number.isNaN(epochMs)) return null;

  const micros = fraction ? Number(fraction.padEnd(6, "0")) : 0;
  return epochMs * 1000 + micros;
}
