export const LOCAL_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export function normalizeToUtcDateOnly(input: unknown): Date {
  const date =
    input instanceof Date
      ? input
      : typeof input === 'string' || typeof input === 'number'
        ? new Date(input)
        : new Date(NaN);

  if (!Number.isFinite(date.getTime())) {
    throw new Error('Invalid date');
  }

  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
}

export function getUtcTodayDateOnly(now: Date = new Date()): Date {
  return normalizeToUtcDateOnly(now);
}

/**
 * Format a UTC-normalized Date as the "YYYY-MM-DD" string stored in the database.
 */
export function formatDateOnly(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * True when `value` is a "YYYY-MM-DD" string naming a real calendar day.
 *
 * `new Date('2024-02-30')` rolls over to March 1st, so the round trip has to match.
 */
export function isLocalDateString(value: unknown): value is string {
  if (typeof value !== 'string' || !LOCAL_DATE_PATTERN.test(value)) return false;

  const parsed = new Date(`${value}T00:00:00Z`);
  if (!Number.isFinite(parsed.getTime())) return false;
  return formatDateOnly(parsed) === value;
}

/**
 * Shift a UTC-normalized date by a number of calendar days.
 */
export function addUtcDays(date: Date, days: number): Date {
  const next = new Date(date.getTime());
  next.setUTCDate(next.getUTCDate() + days);
  return next;
}
