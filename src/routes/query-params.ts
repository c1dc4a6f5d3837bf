import { z } from 'zod';
import { parseOptionalPeriod } from '../utils/period.js';

export const periodParam = z
  .string()
  .optional()
  .transform((value) => parseOptionalPeriod(value));

export const booleanParam = z
  .union([z.string(), z.boolean()])
  .optional()
  .transform((value) => {
    if (value === undefined) return undefined;
    if (typeof value === 'boolean') return value;
    const normalized = value.toLowerCase();
    return normalized === 'true' || normalized === '1' || normalized === 'on';
  });

export function pagingSchema(maxLimit: number, defaultLimit: number) {
  return z.object({
    offset: z.coerce.number().int().min(0).default(0),
    limit: z.coerce.number().int().min(1).max(maxLimit).default(defaultLimit),
  });
}

export const optionalText = z
  .string()
  .transform((value) => value.trim())
  .pipe(z.string().min(1))
  .optional();
