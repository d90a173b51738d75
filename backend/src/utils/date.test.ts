import { describe, expect, it } from 'vitest';
import { addUtcDays, formatDateOnly, isLocalDateString, normalizeToUtcDateOnly } from './date';
import { resolvePeriod } from './period';

describe('isLocalDateString', () => {
  it('accepts real calendar days', () => {
    expect(isLocalDateString('2024-01-01')).toBe(true);
    expect(isLocalDateString('2024-02-29')).toBe(true);
  });

  it('rejects rolled-over days and other formats', () => {
    expect(isLocalDateString('2023-02-29')).toBe(false);
    expect(isLocalDateString('2024-13-01')).toBe(false);
    expect(isLocalDateString('2024-1-1')).toBe(false);
    expect(isLocalDateString('2024-01-01T00:00:00Z')).toBe(false);
    expect(isLocalDateString(20240101)).toBe(false);
  });
});

describe('date helpers', () => {
  it('normalizes to midnight UTC and formats as YYYY-MM-DD', () => {
    const date = normalizeToUtcDateOnly('2024-03-14T18:45:00Z');
    expect(date.toISOString()).toBe('2024-03-14T00:00:00.000Z');
    expect(formatDateOnly(date)).toBe('2024-03-14');
  });

  it('throws for unparseable input', () => {
    expect(() => normalizeToUtcDateOnly('not a date')).toThrow('Invalid date');
  });

  it('adds days across month boundaries', () => {
    expect(formatDateOnly(addUtcDays(normalizeToUtcDateOnly('2024-02-28'), 2))).toBe('2024-03-01');
  });
});

describe('resolvePeriod', () => {
  // 2024-03-14 is a Thursday.
  const today = new Date('2024-03-14T09:30:00Z');

  it('resolves calendar periods ending today', () => {
    expect(resolvePeriod('day', today)).toEqual({ from: '2024-03-14', to: '2024-03-14' });
    expect(resolvePeriod('week', today)).toEqual({ from: '2024-03-11', to: '2024-03-14' });
    expect(resolvePeriod('month', today)).toEqual({ from: '2024-03-01', to: '2024-03-14' });
    expect(resolvePeriod('year', today)).toEqual({ from: '2024-01-01', to: '2024-03-14' });
  });

  it('starts the week on Monday even when today is Sunday', () => {
    expect(resolvePeriod('week', new Date('2024-03-17T12:00:00Z'))).toEqual({ from: '2024-03-11', to: '2024-03-17' });
  });

  it('leaves "all" unbounded', () => {
    expect(resolvePeriod('all', today)).toEqual({ from: null, to: null });
  });
});
