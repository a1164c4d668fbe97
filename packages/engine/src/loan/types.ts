export type DayCountBasis = 365 | 365.25;

/** Which part of the balance interest accrues on each month. */
export type AccrualBasis = 'balance' | 'principal';

export interface LoanTerms {
  dayCountBasis: DayCountBasis;
  accrualBasis: AccrualBasis;
}

export interface LoanOptions {
  terms?: LoanTerms;
  /** Subtracted from every loan's annual rate, floored at zero. */
  rateDiscount?: number;
}

export interface LoanState {
  name: string;
  interestRate: number;
  principalPennies: number;
  accruedInterestPennies: number;
  balancePennies: number;
}
