import { isActivityCategory, type ActivityCategory } from '../../../shared/emissionFactors';
import type { SqliteDatabase } from '../config/database';
import { StorageError, withStorage } from '../utils/errors';

export type ActivityRecord = {
  id: number;
  userId: number;
  date: string;
  category: ActivityCategory;
  quantity: number;
  emissions: number;
  createdAt: string;
};

export type NewActivityRecord = Omit<ActivityRecord, 'id' | 'createdAt'>;

export type SortOrder = 'asc' | 'desc';

export type RecordQuery = {
  category?: ActivityCategory;
  from?: string;
  to?: string;
  limit: number;
  order: SortOrder;
};

export type RecordEmissions = Pick<ActivityRecord, 'category' | 'emissions'>;

type ActivityRecordRow = {
  id: number;
  user_id: number;
  date: string;
  category: string;
  quantity: number;
  emissions: number;
  created_at: string;
};

type RecordEmissionsRow = {
  id: number;
  category: string;
  emissions: number;
};

type QueryParams = Record<string, string | number>;

const RECORD_COLUMNS = 'id, user_id, date, category, quantity, emissions, created_at';

function toActivityRecord(row: ActivityRecordRow): ActivityRecord {
  if (!isActivityCategory(row.category)) {
    throw new StorageError(`Stored record ${row.id} has unknown category "${row.category}"`);
  }

  return {
    id: row.id,
    userId: row.user_id,
    date: row.date,
    category: row.category,
    quantity: row.quantity,
    emissions: row.emissions,
    createdAt: row.created_at,
  };
}

/**
 * Build the WHERE clause shared by listing and aggregation. Dates compare lexically as "YYYY-MM-DD".
 */
function buildFilter(userId: number, filter: { category?: ActivityCategory; from?: string; to?: string }) {
  const clauses = ['user_id = @userId'];
  const params: QueryParams = { userId };

  if (filter.category) {
    clauses.push('category = @category');
    params.category = filter.category;
  }
  if (filter.from) {
    clauses.push('date >= @from');
    params.from = filter.from;
  }
  if (filter.to) {
    clauses.push('date <= @to');
    params.to = filter.to;
  }

  return { where: clauses.join(' AND '), params };
}

/**
 * SQLite access for the activity_records table.
 */
export class ActivityRecordStore {
  private readonly db: SqliteDatabase;

  constructor(db: SqliteDatabase) {
    this.db = db;
  }

  /**
   * Insert one record inside its own write transaction and return the stored row.
   */
  insert(record: NewActivityRecord): ActivityRecord {
    return withStorage('save activity record', () => {
      const insertRecord = this.db.transaction((input: NewActivityRecord) => {
        const result = this.db
          .prepare<QueryParams>(
            `INSERT INTO activity_records (user_id, date, category, quantity, emissions)
             VALUES (@userId, @date, @category, @quantity, @emissions)`
          )
          .run({
            userId: input.userId,
            date: input.date,
            category: input.category,
            quantity: input.quantity,
            emissions: input.emissions,
          });

        const row = this.db
          .prepare<[number], ActivityRecordRow>(`SELECT ${RECORD_COLUMNS} FROM activity_records WHERE id = ?`)
          .get(Number(result.lastInsertRowid));
        if (!row) {
          throw new StorageError('Inserted activity record could not be read back');
        }
        return toActivityRecord(row);
      });

      return insertRecord(record);
    });
  }

  /**
   * Lazily iterate a user's records. Every call to `[Symbol.iterator]` re-runs the query, so the
   * returned iterable can be walked more than once and always reflects the current table.
   */
  iterate(userId: number, query: RecordQuery): Iterable<ActivityRecord> {
    const { where, params } = buildFilter(userId, query);
    const direction = query.order === 'asc' ? 'ASC' : 'DESC';
    const sql = `SELECT ${RECORD_COLUMNS} FROM activity_records
                 WHERE ${where}
                 ORDER BY date ${direction}, id ${direction}
                 LIMIT @limit`;
    const db = this.db;

    return {
      *[Symbol.iterator]() {
        const rows = withStorage('list activity records', () =>
          db.prepare<QueryParams, ActivityRecordRow>(sql).iterate({ ...params, limit: query.limit })
        );
        try {
          while (true) {
            const next = withStorage('list activity records', () => rows.next());
            if (next.done) return;
            yield toActivityRecord(next.value);
          }
        } finally {
          // Release the statement when a consumer stops early; the connection is busy until then.
          rows.return?.();
        }
      },
    };
  }

  /**
   * Category and emissions of a user's records within an optional date range, oldest first.
   */
  emissionsInRange(userId: number, range: { from?: string; to?: string }): RecordEmissions[] {
    const { where, params } = buildFilter(userId, range);

    const rows = withStorage('summarize activity records', () =>
      this.db
        .prepare<QueryParams, RecordEmissionsRow>(
          `SELECT id, category, emissions
           FROM activity_records
           WHERE ${where}
           ORDER BY date ASC, id ASC`
        )
        .all(params)
    );

    return rows.map((row) => {
      if (!isActivityCategory(row.category)) {
        throw new StorageError(`Stored record ${row.id} has unknown category "${row.category}"`);
      }
      return { category: row.category, emissions: row.emissions };
    });
  }

  countForUser(userId: number): number {
    const row = withStorage('count activity records', () =>
      this.db
        .prepare<[number], { count: number }>('SELECT COUNT(*) AS count FROM activity_records WHERE user_id = ?')
        .get(userId)
    );
    return row?.count ?? 0;
  }
}
