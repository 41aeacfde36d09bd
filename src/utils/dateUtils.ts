const DAY_MS = 24 * 60 * 60 * 1000;

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

// Date holds at most 8.64e15 ms either side of the epoch
const MAX_TIMESTAMP_SECONDS = 8.64e12;

function inDateRange(seconds: number): number | null {
  return Math.abs(seconds) <= MAX_TIMESTAMP_SECONDS ? seconds : null;
}

/**
 * Parse a Tautulli `added_at` value (seconds since epoch, number or numeric string).
 * Returns null for anything that is not an integer or lies outside the range a
 * Date can represent; fractional numbers are truncated.
 */
export function parseUnixTimestamp(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? inDateRange(Math.trunc(value)) : null;
  }
  if (typeof value === 'string' && /^\s*[+-]?\d+\s*$/.test(value)) {
    return inDateRange(parseInt(value, 10));
  }
  return null;
}

export function fromUnixTimestamp(seconds: number): Date {
  return new Date(seconds * 1000);
}

/**
 * Start of the lookback window
 */
export function getCutoffDate(lookbackDays: number, now: Date = new Date()): Date {
  return new Date(now.getTime() - lookbackDays * DAY_MS);
}

/**
 * ISO-8601 in local time without offset, e.g. "2026-01-28T10:30:00"
 */
export function toLocalIsoString(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
    `T${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/**
 * "YYYY-MM-DD HH:MM" in local time
 */
export function formatShortDateTime(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
    ` ${pad(date.getHours())}:${pad(date.getMinutes())}`
  );
}
