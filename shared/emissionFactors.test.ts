import { describe, expect, it } from 'vitest';
import { ACTIVITY_CATEGORIES, EMISSION_FACTORS, formatEmissions, isActivityCategory } from './emissionFactors';

describe('emission factor table', () => {
  it('has one entry per category, keyed by its own name', () => {
    for (const category of ACTIVITY_CATEGORIES) {
      expect(EMISSION_FACTORS[category].category).toBe(category);
      expect(EMISSION_FACTORS[category].factor).toBeGreaterThanOrEqual(0);
    }
  });

  it('narrows known category names only', () => {
    expect(isActivityCategory('water')).toBe(true);
    expect(isActivityCategory('Water')).toBe(false);
    expect(isActivityCategory('flights')).toBe(false);
    expect(isActivityCategory(3)).toBe(false);
  });

  it('formats emissions with two decimals and grouped thousands', () => {
    expect(formatEmissions(20)).toBe('20.00');
    expect(formatEmissions(1234.567)).toBe('1,234.57');
  });
});
