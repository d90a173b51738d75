import { addUtcDays, formatDateOnly, normalizeToUtcDateOnly } from './date';

export const SUMMARY_PERIODS = ['day', 'week', 'month', 'year', 'all'] as const;

export type SummaryPeriodName = (typeof SUMMARY_PERIODS)[number];

export const DEFAULT_SUMMARY_PERIOD: SummaryPeriodName = 'month';

/**
 * Inclusive date range; a null bound is open.
 */
export type DateRange = {
  from: string | null;
  to: string | null;
};

const summaryPeriodSet = new Set<string>(SUMMARY_PERIODS);

export function isSummaryPeriodName(value: unknown): value is SummaryPeriodName {
  return typeof value === 'string' && summaryPeriodSet.has(value);
}

/**
 * Resolve a named period into the date range that ends on `today`.
 *
 * Weeks start on Monday. `all` is unbounded on both ends so future-dated records still count.
 */
export function resolvePeriod(name: SummaryPeriodName, today: Date): DateRange {
  const day = normalizeToUtcDateOnly(today);
  const to = formatDateOnly(day);

  switch (name) {
    case 'day':
      return { from: to, to };
    case 'week': {
      const daysSinceMonday = (day.getUTCDay() + 6) % 7;
      return { from: formatDateOnly(addUtcDays(day, -daysSinceMonday)), to };
    }
    case 'month':
      return { from: formatDateOnly(new Date(Date.UTC(day.getUTCFullYear(), day.getUTCMonth(), 1))), to };
    case 'year':
      return { from: formatDateOnly(new Date(Date.UTC(day.getUTCFullYear(), 0, 1))), to };
    case 'all':
      return { from: null, to: null };
  }
}
