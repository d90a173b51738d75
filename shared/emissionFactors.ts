/**
 * Activity categories a record can be logged under.
 *
 * The order here is the display order used by forms and summary breakdowns.
 */
export const ACTIVITY_CATEGORIES = ['transport', 'electricity', 'diet', 'water'] as const;

export type ActivityCategory = (typeof ACTIVITY_CATEGORIES)[number];

export type EmissionFactor = {
  category: ActivityCategory;
  label: string;
  /** Unit the logged quantity is measured in. */
  unit: string;
  /** kg CO2e emitted per unit of quantity. */
  factor: number;
  /** Largest quantity accepted for a single record. */
  maxQuantity: number;
};

/**
 * Placeholder emission factors (kg CO2e per unit).
 *
 * These are rounded illustrative values, not sourced from a national inventory.
 */
export const EMISSION_FACTORS: Record<ActivityCategory, EmissionFactor> = {
  transport: { category: 'transport', label: 'Transport', unit: 'km', factor: 0.2, maxQuantity: 10_000 },
  electricity: { category: 'electricity', label: 'Electricity', unit: 'kWh', factor: 0.37, maxQuantity: 99_999 },
  diet: { category: 'diet', label: 'Diet', unit: 'meal', factor: 2.5, maxQuantity: 1_000 },
  water: { category: 'water', label: 'Water', unit: 'litre', factor: 0.0015, maxQuantity: 100_000 },
};

export const EMISSIONS_UNIT = 'kg CO2e';

const activityCategorySet = new Set<string>(ACTIVITY_CATEGORIES);

export function isActivityCategory(value: unknown): value is ActivityCategory {
  return typeof value === 'string' && activityCategorySet.has(value);
}

/**
 * Format an emissions value for display (two decimals, grouped thousands).
 */
export function formatEmissions(value: number): string {
  return value.toLocaleString('en-US', { minimumFractionDigits: 2, maximumFractionDigits: 2 });
}
