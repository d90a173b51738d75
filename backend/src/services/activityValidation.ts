import { z } from 'zod';
import { ACTIVITY_CATEGORIES, EMISSION_FACTORS } from '../../../shared/emissionFactors';
import { isLocalDateString } from '../utils/date';

export const activityCategorySchema = z.enum(ACTIVITY_CATEGORIES, {
  errorMap: () => ({ message: 'Choose a recognized category.' }),
});

const DECIMAL_PATTERN = /^-?\d+(\.\d+)?$/;

/**
 * Quantities arrive as numbers (JSON) or strings (HTML forms); both end up as a finite number >= 0.
 * Strings must be plain decimals: no exponents, hex, binary or bare points.
 */
export const quantitySchema = z
  .union(
    [
      z.number(),
      z
        .string()
        .trim()
        .min(1, 'Please enter a value.')
        .regex(DECIMAL_PATTERN, 'Please enter a valid number.')
        .transform(Number),
    ],
    {
      errorMap: () => ({ message: 'Please enter a value.' }),
    }
  )
  .pipe(
    z
      .number({ invalid_type_error: 'Please enter a valid number.' })
      .finite('Please enter a valid number.')
      .nonnegative('Quantity cannot be negative.')
  );

export const localDateSchema = z
  .string({ required_error: 'Please enter a date.', invalid_type_error: 'Please enter a date.' })
  .trim()
  .refine((value) => isLocalDateString(value), 'Enter a valid date as YYYY-MM-DD.');

function refineQuantityLimit(
  value: { category: keyof typeof EMISSION_FACTORS; quantity: number },
  ctx: z.RefinementCtx
): void {
  const { maxQuantity, unit } = EMISSION_FACTORS[value.category];
  if (value.quantity > maxQuantity) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['quantity'],
      message: `Value cannot exceed ${maxQuantity.toLocaleString('en-US')} ${unit}.`,
    });
  }
}

/**
 * Category + quantity, as accepted by the calculator endpoint.
 */
export const activityInputSchema = z
  .object({
    category: activityCategorySchema,
    quantity: quantitySchema,
  })
  .superRefine(refineQuantityLimit);

export const createRecordSchema = z
  .object({
    userId: z.number().int().positive(),
    date: localDateSchema,
    category: activityCategorySchema,
    quantity: quantitySchema,
  })
  .superRefine(refineQuantityLimit);

export type ActivityInput = z.infer<typeof activityInputSchema>;
export type CreateRecordInput = z.infer<typeof createRecordSchema>;
