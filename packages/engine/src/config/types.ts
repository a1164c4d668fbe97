import type { AccrualBasis, DayCountBasis } from '../loan/types.js';

/**
 * `extra_payment`: the employer's money is an extra avalanche payment and the
 * borrower still pays the full minimum.
 * `bill_credit`: it first offsets that month's minimum bill; any surplus is
 * applied as an extra payment.
 */
export type EmployerContributionMode = 'extra_payment' | 'bill_credit';

export interface SimulationPolicy {
  dayCountBasis: DayCountBasis;
  accrualBasis: AccrualBasis;
  employerContributionMode: EmployerContributionMode;
}

export interface EmployerContribution {
  amountPennies: number;
  /** 0 = January … 11 = December */
  month: number;
}

export interface SimulationConfig {
  annualSavingsRate: number;
  employerContribution: EmployerContribution | null;
  autoPayRateDiscount: number;
  horizonMonths: number;
  startMonth: number;
  policy: SimulationPolicy;
}
