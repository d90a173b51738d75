import { z } from 'zod';
import { ACTIVITY_CATEGORIES, type ActivityCategory } from '../../../shared/emissionFactors';
import type {
  ActivityRecord,
  ActivityRecordStore,
  RecordQuery,
  SortOrder
} from '../storage/activityRecordStore';
import { toValidationError } from '../utils/errors';
import type { DateRange } from '../utils/period';
import { activityCategorySchema, createRecordSchema, localDateSchema } from './activityValidation';
import { computeEmissions } from './emissionCalculator';

export const DEFAULT_LIST_LIMIT = 100;
export const MAX_LIST_LIMIT = 500;

export type RecordFilter = {
  category?: ActivityCategory;
  from?: string;
  to?: string;
  limit?: number;
  order?: SortOrder;
};

export type CategoryBreakdown = {
  category: ActivityCategory;
  total: number;
  count: number;
};

export type EmissionsSummary = DateRange & {
  total: number;
  count: number;
  byCategory: Record<ActivityCategory, number>;
  breakdown: CategoryBreakdown[];
};

const listFilterSchema = z
  .object({
    category: activityCategorySchema.optional(),
    from: localDateSchema.optional(),
    to: localDateSchema.optional(),
    limit: z.coerce
      .number({ invalid_type_error: 'Limit must be a whole number.' })
      .int('Limit must be a whole number.')
      .min(1, 'Limit must be at least 1.')
      .max(MAX_LIST_LIMIT, `Limit cannot exceed ${MAX_LIST_LIMIT}.`)
      .optional(),
    order: z.enum(['asc', 'desc'], { errorMap: () => ({ message: 'Order must be asc or desc.' }) }).optional(),
  })
  .refine((filter) => !filter.from || !filter.to || filter.from <= filter.to, {
    message: 'Start date must be on or before end date.',
    path: ['to'],
  });

export function resolveListLimit(filter: RecordFilter): number {
  return Math.min(filter.limit ?? DEFAULT_LIST_LIMIT, MAX_LIST_LIMIT);
}

/**
 * Validate untrusted filter input (query strings, JSON) into a RecordFilter.
 * Blank values are treated as absent.
 */
export function parseRecordFilter(input: Record<string, unknown>): RecordFilter {
  const cleaned: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(input)) {
    if (value === undefined || value === null) continue;
    if (typeof value === 'string' && value.trim() === '') continue;
    cleaned[key] = value;
  }

  const parsed = listFilterSchema.safeParse(cleaned);
  if (!parsed.success) {
    throw toValidationError(parsed.error, 'Invalid record filter');
  }
  return parsed.data;
}

/**
 * Create/list/summarize activity records, composing the emission calculator with storage.
 */
export class RecordService {
  private readonly store: ActivityRecordStore;

  constructor(store: ActivityRecordStore) {
    this.store = store;
  }

  /**
   * Validate and persist a record. Emissions are always derived from category and quantity.
   *
   * Throws ValidationError for bad input and StorageError when the write fails; neither leaves a row behind.
   */
  create(input: { userId: number; date: unknown; category: unknown; quantity: unknown }): ActivityRecord {
    const parsed = createRecordSchema.safeParse(input);
    if (!parsed.success) {
      throw toValidationError(parsed.error, 'Invalid activity record');
    }

    const { userId, date, category, quantity } = parsed.data;
    const emissions = computeEmissions(category, quantity);
    return this.store.insert({ userId, date, category, quantity, emissions });
  }

  /**
   * Records for a user, newest first unless `order: 'asc'` is requested.
   *
   * The result is lazy and can be iterated repeatedly; each pass queries the table again.
   */
  list(userId: number, filter: RecordFilter = {}): Iterable<ActivityRecord> {
    const query: RecordQuery = {
      category: filter.category,
      from: filter.from,
      to: filter.to,
      limit: resolveListLimit(filter),
      order: filter.order ?? 'desc',
    };
    return this.store.iterate(userId, query);
  }

  /**
   * Total emissions (and a per-category breakdown) for records dated within `period`.
   */
  summarize(userId: number, period: DateRange): EmissionsSummary {
    const rows = this.store.emissionsInRange(userId, {
      from: period.from ?? undefined,
      to: period.to ?? undefined,
    });

    // Plain left-to-right addition in date order, so the total matches summing the listed records.
    const breakdown: CategoryBreakdown[] = ACTIVITY_CATEGORIES.map((category) => ({ category, total: 0, count: 0 }));
    let total = 0;
    for (const row of rows) {
      total += row.emissions;
      const entry = breakdown[ACTIVITY_CATEGORIES.indexOf(row.category)];
      entry.total += row.emissions;
      entry.count += 1;
    }

    const byCategory: Record<ActivityCategory, number> = { transport: 0, electricity: 0, diet: 0, water: 0 };
    for (const entry of breakdown) {
      byCategory[entry.category] = entry.total;
    }

    return { from: period.from, to: period.to, total, count: rows.length, byCategory, breakdown };
  }

  countForUser(userId: number): number {
    return this.store.countForUser(userId);
  }
}
