import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { openDatabase, type SqliteDatabase } from '../config/database';
import { ActivityRecordStore } from '../storage/activityRecordStore';
import { UserStore } from '../storage/userStore';
import { StorageError, ValidationError } from '../utils/errors';
import { parseRecordFilter, RecordService } from './recordService';

function captureValidationError(fn: () => unknown): ValidationError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ValidationError) return err;
    throw err;
  }
  throw new Error('Expected a ValidationError');
}

describe('RecordService', () => {
  let db: SqliteDatabase;
  let service: RecordService;
  let userId: number;
  let otherUserId: number;

  beforeEach(() => {
    db = openDatabase(':memory:');
    const users = new UserStore(db);
    userId = users.insert({ username: 'alex', email: 'alex@example.com', passwordHash: 'hash' }).id;
    otherUserId = users.insert({ username: 'sam', email: 'sam@example.com', passwordHash: 'hash' }).id;
    service = new RecordService(new ActivityRecordStore(db));
  });

  afterEach(() => {
    if (db.open) db.close();
  });

  describe('create', () => {
    it('computes and stores emissions for a transport record', () => {
      const record = service.create({ userId, date: '2024-01-01', category: 'transport', quantity: 100 });

      expect(record).toMatchObject({
        userId,
        date: '2024-01-01',
        category: 'transport',
        quantity: 100,
        emissions: 20,
      });
      expect(record.id).toBeGreaterThan(0);
      expect(typeof record.createdAt).toBe('string');
    });

    it('accepts form strings for quantity and date', () => {
      const record = service.create({ userId, date: ' 2024-02-29 ', category: 'electricity', quantity: ' 12.5 ' });
      expect(record.date).toBe('2024-02-29');
      expect(record.quantity).toBe(12.5);
      expect(record.emissions).toBe(12.5 * 0.37);
    });

    it('accepts a zero quantity', () => {
      expect(service.create({ userId, date: '2024-01-01', category: 'diet', quantity: 0 }).emissions).toBe(0);
    });

    it('rejects an unknown category and persists nothing', () => {
      const err = captureValidationError(() =>
        service.create({ userId, date: '2024-01-01', category: 'unknown', quantity: 5 })
      );
      expect(err.fieldErrors).toEqual({ category: 'Choose a recognized category.' });
      expect(service.countForUser(userId)).toBe(0);
    });

    it('rejects a negative quantity and persists nothing', () => {
      const err = captureValidationError(() =>
        service.create({ userId, date: '2024-01-01', category: 'transport', quantity: -1 })
      );
      expect(err.fieldErrors).toEqual({ quantity: 'Quantity cannot be negative.' });
      expect(service.countForUser(userId)).toBe(0);
    });

    it.each([
      ['', 'Please enter a value.'],
      ['abc', 'Please enter a valid number.'],
      ['0x10', 'Please enter a valid number.'],
      ['1e3', 'Please enter a valid number.'],
      ['0b11', 'Please enter a valid number.'],
      ['.5', 'Please enter a valid number.'],
      [undefined, 'Please enter a value.'],
    ])('rejects quantity %j', (quantity, message) => {
      const err = captureValidationError(() =>
        service.create({ userId, date: '2024-01-01', category: 'water', quantity })
      );
      expect(err.fieldErrors.quantity).toBe(message);
    });

    it('stores nothing for non-decimal quantity strings', () => {
      for (const quantity of ['0x10', '1e3', '5.']) {
        expect(() => service.create({ userId, date: '2024-01-01', category: 'transport', quantity })).toThrow(
          ValidationError
        );
      }
      expect(service.countForUser(userId)).toBe(0);
    });

    it('enforces the per-category maximum', () => {
      const err = captureValidationError(() =>
        service.create({ userId, date: '2024-01-01', category: 'electricity', quantity: '100000' })
      );
      expect(err.fieldErrors).toEqual({ quantity: 'Value cannot exceed 99,999 kWh.' });
    });

    it('rejects dates that are not real calendar days', () => {
      const err = captureValidationError(() =>
        service.create({ userId, date: '2023-02-29', category: 'transport', quantity: 1 })
      );
      expect(err.fieldErrors).toEqual({ date: 'Enter a valid date as YYYY-MM-DD.' });
    });

    it('reports every invalid field at once', () => {
      const err = captureValidationError(() =>
        service.create({ userId, date: 'yesterday', category: 'flights', quantity: 'lots' })
      );
      expect(Object.keys(err.fieldErrors).sort()).toEqual(['category', 'date', 'quantity']);
    });

    it('raises StorageError when the insert fails and leaves the table unchanged', () => {
      expect(() => service.create({ userId: 9999, date: '2024-01-01', category: 'transport', quantity: 1 })).toThrow(
        StorageError
      );
      const row = db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM activity_records').get();
      expect(row?.count).toBe(0);
    });

    it('raises StorageError when the database is unavailable', () => {
      db.close();
      expect(() => service.create({ userId, date: '2024-01-01', category: 'transport', quantity: 1 })).toThrow(
        StorageError
      );
    });
  });

  describe('list', () => {
    beforeEach(() => {
      service.create({ userId, date: '2024-01-02', category: 'electricity', quantity: 10 });
      service.create({ userId, date: '2024-01-01', category: 'transport', quantity: 100 });
      service.create({ userId, date: '2024-01-03', category: 'diet', quantity: 2 });
      service.create({ userId: otherUserId, date: '2024-01-02', category: 'water', quantity: 50 });
    });

    it('returns the stored values, newest date first, for the owner only', () => {
      const records = Array.from(service.list(userId));
      expect(records.map((record) => [record.date, record.category, record.quantity, record.emissions])).toEqual([
        ['2024-01-03', 'diet', 2, 2 * 2.5],
        ['2024-01-02', 'electricity', 10, 10 * 0.37],
        ['2024-01-01', 'transport', 100, 20],
      ]);
    });

    it('can be iterated more than once and sees records created in between', () => {
      const listing = service.list(userId, { order: 'asc' });
      expect(Array.from(listing)).toHaveLength(3);

      service.create({ userId, date: '2024-01-04', category: 'water', quantity: 1000 });
      const secondPass = Array.from(listing);
      expect(secondPass).toHaveLength(4);
      expect(secondPass[3]?.date).toBe('2024-01-04');
    });

    it('releases the query when iteration stops early', () => {
      for (const record of service.list(userId)) {
        expect(record.date).toBe('2024-01-03');
        break;
      }
      expect(service.create({ userId, date: '2024-01-05', category: 'diet', quantity: 1 }).id).toBeGreaterThan(0);
    });

    it('filters by category, date range and limit', () => {
      expect(Array.from(service.list(userId, { category: 'transport' })).map((r) => r.date)).toEqual(['2024-01-01']);
      expect(Array.from(service.list(userId, { from: '2024-01-02', to: '2024-01-02' })).map((r) => r.category)).toEqual([
        'electricity',
      ]);
      expect(Array.from(service.list(userId, { limit: 2, order: 'asc' })).map((r) => r.date)).toEqual([
        '2024-01-01',
        '2024-01-02',
      ]);
    });

    it('is empty when nothing matches', () => {
      expect(Array.from(service.list(userId, { from: '2025-01-01' }))).toEqual([]);
    });
  });

  describe('summarize', () => {
    it('totals emissions overall and per category', () => {
      const created = [
        service.create({ userId, date: '2024-01-01', category: 'transport', quantity: 100 }),
        service.create({ userId, date: '2024-01-05', category: 'transport', quantity: 42.5 }),
        service.create({ userId, date: '2024-01-10', category: 'electricity', quantity: 300 }),
        service.create({ userId, date: '2024-01-20', category: 'water', quantity: 150 }),
      ];
      service.create({ userId: otherUserId, date: '2024-01-01', category: 'diet', quantity: 10 });

      const summary = service.summarize(userId, { from: null, to: null });
      const expectedTotal = created.reduce((sum, record) => sum + record.emissions, 0);

      expect(summary.count).toBe(4);
      expect(summary.total).toBe(expectedTotal);
      expect(summary.byCategory.transport).toBe(created[0].emissions + created[1].emissions);
      expect(summary.byCategory.electricity).toBe(300 * 0.37);
      expect(summary.byCategory.water).toBe(150 * 0.0015);
      expect(summary.byCategory.diet).toBe(0);
      expect(summary.breakdown.map((entry) => [entry.category, entry.count])).toEqual([
        ['transport', 2],
        ['electricity', 1],
        ['diet', 0],
        ['water', 1],
      ]);
    });

    it('adds emissions in date order exactly as the listed records do', () => {
      const created = Array.from({ length: 10 }, (_, index) =>
        service.create({ userId, date: `2024-03-${String(index + 1).padStart(2, '0')}`, category: 'transport', quantity: 0.5 })
      );
      const expectedTotal = created.reduce((sum, record) => sum + record.emissions, 0);

      const summary = service.summarize(userId, { from: null, to: null });
      expect(expectedTotal).toBe(0.9999999999999999);
      expect(summary.total).toBe(expectedTotal);
      expect(summary.byCategory.transport).toBe(expectedTotal);
    });

    it('only counts records inside the period', () => {
      service.create({ userId, date: '2023-12-31', category: 'transport', quantity: 100 });
      service.create({ userId, date: '2024-01-15', category: 'transport', quantity: 50 });
      service.create({ userId, date: '2024-02-01', category: 'transport', quantity: 25 });

      const summary = service.summarize(userId, { from: '2024-01-01', to: '2024-01-31' });
      expect(summary).toMatchObject({ from: '2024-01-01', to: '2024-01-31', count: 1, total: 10 });
    });

    it('returns zeros when there are no records', () => {
      const summary = service.summarize(userId, { from: null, to: null });
      expect(summary.total).toBe(0);
      expect(summary.count).toBe(0);
      expect(summary.byCategory).toEqual({ transport: 0, electricity: 0, diet: 0, water: 0 });
    });
  });
});

describe('parseRecordFilter', () => {
  it('drops blank values and coerces the limit', () => {
    expect(parseRecordFilter({ category: '', from: '2024-01-01', to: ' ', limit: '5', order: 'asc' })).toEqual({
      from: '2024-01-01',
      limit: 5,
      order: 'asc',
    });
  });

  it('rejects an inverted range', () => {
    const err = captureValidationError(() => parseRecordFilter({ from: '2024-02-01', to: '2024-01-01' }));
    expect(err.fieldErrors).toEqual({ to: 'Start date must be on or before end date.' });
  });

  it('rejects unknown categories and oversized limits', () => {
    const err = captureValidationError(() => parseRecordFilter({ category: 'flights', limit: '1000' }));
    expect(err.fieldErrors).toEqual({
      category: 'Choose a recognized category.',
      limit: 'Limit cannot exceed 500.',
    });
  });
});
