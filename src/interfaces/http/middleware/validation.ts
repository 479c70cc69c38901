/**
 * Request Input Validation
 * Layer: Interfaces (HTTP)
 *
 * Controllers run each request part through a Zod schema before touching
 * it: valid input comes back typed and coerced ("true" → true), invalid input
 * throws a ValidationError (400) that the global error handler turns into a
 * response. The controller's own logic never sees unchecked input.
 *
 *   const { force } = parseInput(forceQuerySchema, req.query);
 *
 * Parsing returns the data instead of writing it back onto the request:
 * Express 5 exposes `req.query` through a getter, so it cannot be replaced.
 */
import { DECIMAL_PATTERN } from '@domain/entities/FundRecord';
import { ValidationError } from '@shared/errors/AppError';
import { z } from 'zod/v4';

export function parseInput<T extends z.ZodType>(schema: T, input: unknown): z.output<T> {
  const result = schema.safeParse(input);

  if (!result.success) {
    const messages = result.error.issues.map((issue) => issue.message).join('; ');
    throw new ValidationError(messages);
  }

  return result.data;
}

/** `?force=true` on the update endpoints. */
export const forceQuerySchema = z.object({
  force: z.stringbool().optional().default(false),
});

export const collectionParamsSchema = z.object({
  collection: z.string().trim().min(1, 'collection is required'),
});

/** Body of `POST /funds/simulate-dividend`; numbers are read back as decimal strings. */
export const dividendSimulationSchema = z.object({
  ticker: z.string().trim().min(1, 'ticker is required'),
  investmentAmount: z
    .union([z.number(), z.string().trim()])
    .transform((value) => String(value))
    .refine(
      (value) => DECIMAL_PATTERN.test(value) && !value.startsWith('-') && /[1-9]/.test(value),
      'investmentAmount must be a positive decimal amount',
    ),
  holdingPeriodMonths: z
    .number()
    .int('holdingPeriodMonths must be a whole number')
    .min(1, 'holdingPeriodMonths must be at least 1')
    .max(600, 'holdingPeriodMonths must be at most 600'),
});
