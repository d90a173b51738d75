import { EMISSION_FACTORS, isActivityCategory, type ActivityCategory } from '../../../shared/emissionFactors';
import { ValidationError } from '../utils/errors';

const MONTHS_PER_YEAR = 12;

/**
 * Estimate kg CO2e for a quantity of activity.
 *
 * Returns exactly `quantity * factor` with no rounding; display code is responsible for formatting.
 * Throws ValidationError for an unknown category or a quantity that is negative/non-finite.
 */
export function computeEmissions(category: string, quantity: number): number {
  if (!isActivityCategory(category)) {
    throw new ValidationError('Unknown activity category', { category: 'Choose a recognized category.' });
  }
  if (!Number.isFinite(quantity) || quantity < 0) {
    throw new ValidationError('Invalid quantity', { quantity: 'Quantity must be a non-negative number.' });
  }

  return quantity * EMISSION_FACTORS[category].factor;
}

/**
 * Project a typical month of activity onto a full year.
 */
export function estimateAnnualEmissions(category: ActivityCategory, monthlyQuantity: number): number {
  return computeEmissions(category, monthlyQuantity) * MONTHS_PER_YEAR;
}
