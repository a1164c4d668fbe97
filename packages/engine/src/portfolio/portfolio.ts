import { Loan } from '../loan/loan.js';
import type { LoanOptions } from '../loan/types.js';
import type { LoanRecord } from '../records/types.js';

export class LoanPortfolio {
  readonly loans: readonly Loan[];

  constructor(loans: Loan[]) {
    // Highest rate first, fixed for the portfolio's life; sort is stable on ties.
    this.loans = [...loans].sort((a, b) => b.interestRate - a.interestRate);
  }

  static fromRecords(records: readonly LoanRecord[], options: LoanOptions = {}): LoanPortfolio {
    return new LoanPortfolio(records.map((r) => Loan.fromRecord(r, options)));
  }

  balancePennies(): number {
    return this.loans.reduce((sum, l) => sum + l.balancePennies, 0);
  }

  minimumPayment(monthsRemaining: number): number {
    return this.loans.reduce((sum, l) => sum + l.minimumPaymentPennies(monthsRemaining), 0);
  }

  // Minimums are priced before this month's interest and paid after it.
  simulateOneMonthMinimumPayments(monthsRemaining: number): number {
    let amountPaid = 0;
    for (const loan of this.loans) {
      const minimum = loan.minimumPaymentPennies(monthsRemaining);
      loan.accrueOneMonthInterest();
      const payment = Math.min(minimum, loan.balancePennies);
      loan.makePayment(payment);
      amountPaid += payment;
    }
    return amountPaid;
  }

  makeAdditionalPayment(amount: number): number {
    let remaining = amount;
    for (const loan of this.loans) {
      if (remaining <= 0) break;
      const balance = loan.balancePennies;
      if (balance <= 0) continue;

      if (balance <= remaining) {
        loan.makePayment(balance);
        remaining -= balance;
        continue;
      }
      loan.makePayment(remaining);
      remaining = 0;
    }
    return amount - remaining;
  }
}
