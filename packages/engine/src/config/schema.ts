import { z } from 'zod';
import { ConfigurationError } from '../errors.js';
import type { SimulationConfig } from './types.js';

export const DEFAULT_HORIZON_MONTHS = 120;
export const DEFAULT_START_MONTH = 9; // October

const monthIndex = z.number().int().min(0).max(11);

export const simulationOptionsSchema = z.object({
  annualSavingsRate: z.number().min(0),
  employerContributionPennies: z.number().int().min(0).optional(),
  employerContributionMonth: monthIndex.optional(),
  autoPayRateDiscount: z.number().min(0).default(0),
  horizonMonths: z.number().int().min(1).max(600).default(DEFAULT_HORIZON_MONTHS),
  startMonth: monthIndex.default(DEFAULT_START_MONTH),
  dayCountBasis: z.union([z.literal(365), z.literal(365.25)]).default(365),
  accrualBasis: z.enum(['balance', 'principal']).default('balance'),
  employerContributionMode: z.enum(['extra_payment', 'bill_credit']).default('extra_payment'),
});

export type SimulationOptions = z.input<typeof simulationOptionsSchema>;

export function resolveSimulationConfig(options: unknown): SimulationConfig {
  const parsed = simulationOptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map((i) => `${i.path.join('.') || 'options'}: ${i.message}`).join(', '),
    );
  }

  const opts = parsed.data;
  const hasAmount = opts.employerContributionPennies !== undefined;
  const hasMonth = opts.employerContributionMonth !== undefined;
  if (hasAmount !== hasMonth) {
    throw new ConfigurationError('Employer contribution amount and month must be given together');
  }

  return {
    annualSavingsRate: opts.annualSavingsRate,
    employerContribution:
      opts.employerContributionPennies !== undefined && opts.employerContributionMonth !== undefined
        ? { amountPennies: opts.employerContributionPennies, month: opts.employerContributionMonth }
        : null,
    autoPayRateDiscount: opts.autoPayRateDiscount,
    horizonMonths: opts.horizonMonths,
    startMonth: opts.startMonth,
    policy: {
      dayCountBasis: opts.dayCountBasis,
      accrualBasis: opts.accrualBasis,
      employerContributionMode: opts.employerContributionMode,
    },
  };
}
