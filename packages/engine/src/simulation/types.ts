import type { LoanState } from '../loan/types.js';

export interface MonthStats {
  monthsRemaining: number;
  /** Calendar month index, 0 = January. */
  calendarMonth: number;
  balancePennies: number;
  totalPaidPennies: number;
  minimumPaymentPennies: number;
  loans: LoanState[];
}

export interface SimulationObserver {
  onMonth?: (stats: MonthStats) => void;
}

export interface SimulationResult {
  upfrontPennies: number;
  totalPaidPennies: number;
  presentValuePennies: number;
  finalBalancePennies: number;
  monthsSimulated: number;
}
