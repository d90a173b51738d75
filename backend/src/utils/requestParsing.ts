/**
 * Parse a value into a positive integer (>= 1).
 *
 * Intended for query params like `?limit=` where we want strict integer semantics.
 * Returns `null` for invalid inputs rather than throwing so callers can map to 400s.
 */
export function parsePositiveInteger(value: unknown): number | null {
  const numeric = typeof value === 'number' ? value : typeof value === 'string' ? Number(value) : Number.NaN;
  if (!Number.isFinite(numeric) || !Number.isInteger(numeric) || numeric <= 0) {
    return null;
  }
  return numeric;
}

/**
 * Read a single-valued query/form field, treating blanks and repeated params as absent.
 */
export function readOptionalString(value: unknown): string | undefined {
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

/**
 * Read a form field back as the string the user typed, for re-rendering a rejected form.
 */
export function readFormValue(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return '';
}
