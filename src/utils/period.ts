import { z } from 'zod';
import { InvalidPeriodError } from '../errors.js';

export const periodSchema = z
  .string()
  .trim()
  .regex(/^\d{4}-(0[1-9]|1[0-2])$/)
  .brand<'Period'>();

/** Year-month token such as `2025-06`, validated. */
export type Period = z.infer<typeof periodSchema>;

export function parsePeriod(token: string): Period {
  const parsed = periodSchema.safeParse(token);
  if (!parsed.success) {
    throw new InvalidPeriodError(token);
  }
  return parsed.data;
}

export function parseOptionalPeriod(token: string | undefined): Period | undefined {
  if (token === undefined || token.trim() === '') return undefined;
  return parsePeriod(token);
}
