/**
 * Timestamp normalization.
 *
 * Everything persisted is epoch milliseconds. Values arriving from outside (provider expiry,
 * schedule start times) may be ISO-8601 strings with or without an offset; a string without
 * an offset is read as UTC, and anything that is not ISO-8601 is rejected.
 */

export type Timestamp = Date | number | string;

export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

// Date, optional `T` or space separated time, optional `Z` or `±hh[:]mm` offset.
const ISO_8601 =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?)?(Z|[+-]\d{2}:?\d{2})?$/i;

const offsetMinutes = (offset: string | undefined) => {
  if (offset === undefined || offset.toUpperCase() === 'Z') return 0;
  const sign = offset.startsWith('-') ? -1 : 1;
  const digits = offset.slice(1).replace(':', '');
  const hours = Number(digits.slice(0, 2));
  const minutes = Number(digits.slice(2));
  if (hours > 23 || minutes > 59) return null;
  return sign * (hours * 60 + minutes);
};

const parseIso = (text: string): number | null => {
  const match = ISO_8601.exec(text);
  if (!match) return null;
  const [, y, mo, d, h = '0', mi = '0', sec = '0', frac = '', offset] = match;
  const [year, month, day, hour, minute, second] = [y, mo, d, h, mi, sec].map(Number);
  if (hour > 23 || minute > 59 || second > 59) return null;
  const shift = offsetMinutes(offset);
  if (shift === null) return null;

  const wall = Date.UTC(year, month - 1, day, hour, minute, second, Number(frac.padEnd(3, '0').slice(0, 3)));
  // Date.UTC rolls 2025-02-30 over into March.
  const check = new Date(wall);
  if (check.getUTCFullYear() !== year || check.getUTCMonth() !== month - 1 || check.getUTCDate() !== day) {
    return null;
  }
  return wall - shift * 60_000;
};

/** Parses to epoch ms, or `null` when the value is not a valid timestamp. */
export function parseTimestamp(value: Timestamp): number | null {
  if (value instanceof Date) {
    const ms = value.getTime();
    return Number.isNaN(ms) ? null : ms;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  return parseIso(value.trim());
}

export function toEpochMs(value: Timestamp): number {
  const ms = parseTimestamp(value);
  if (ms === null) {
    throw new RangeError(`Invalid timestamp: ${String(value)}`);
  }
  return ms;
}

/** Whole seconds from `nowMs` until `expiresAtMs`, never negative. */
export const secondsUntil = (expiresAtMs: number, nowMs: number) =>
  Math.max(0, Math.floor((expiresAtMs - nowMs) / 1000));

export const toIso = (ms: number) => new Date(ms).toISOString();

export const toIsoOrNull = (ms: number | null) => (ms === null ? null : toIso(ms));
