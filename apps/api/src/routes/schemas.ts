import { z } from 'zod';
import { loanRecordSchema } from '@loansim/engine';

export const loansSchema = z.array(loanRecordSchema).min(1).max(50);

export const runRequestSchema = z.object({
  loans: loansSchema,
  config: z.record(z.unknown()),
  upfrontPennies: z.number().int().min(0).max(Number.MAX_SAFE_INTEGER).default(0),
  includeMonths: z.boolean().default(false),
});

export const searchRequestSchema = z.object({
  loans: loansSchema,
  config: z.record(z.unknown()),
  stepPennies: z.number().int().positive().max(Number.MAX_SAFE_INTEGER).optional(),
});

export const storedSearchRequestSchema = searchRequestSchema.omit({ loans: true });
