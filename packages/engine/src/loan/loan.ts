import Decimal from 'decimal.js';
import { InvariantViolationError } from '../errors.js';
import type { LoanRecord } from '../records/types.js';
import type { LoanOptions, LoanState, LoanTerms } from './types.js';

export const DEFAULT_LOAN_TERMS: LoanTerms = {
  dayCountBasis: 365,
  accrualBasis: 'balance',
};

function assertPennies(value: number, what: string): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new InvariantViolationError(`${what} must be a non-negative whole number of pennies, got ${value}`);
  }
}

export class Loan {
  readonly name: string;
  readonly interestRate: number;
  readonly monthlyRate: Decimal;
  private principal: number;
  private accruedInterest: number;

  constructor(
    name: string,
    principalPennies: number,
    accruedInterestPennies: number,
    interestRate: number,
    private readonly terms: LoanTerms = DEFAULT_LOAN_TERMS,
  ) {
    assertPennies(principalPennies, `${name} principal`);
    assertPennies(accruedInterestPennies, `${name} accrued interest`);
    if (!(interestRate >= 0 && interestRate < 1)) {
      throw new InvariantViolationError(`${name} interest rate must be in [0, 1), got ${interestRate}`);
    }
    this.name = name;
    this.principal = principalPennies;
    this.accruedInterest = accruedInterestPennies;
    this.interestRate = interestRate;
    // 365 days of daily compounding, re-expressed as twelve equal monthly periods.
    this.monthlyRate = this.dailyRate.plus(1).pow(365).pow(new Decimal(1).div(12)).minus(1);
  }

  static fromRecord(record: LoanRecord, options: LoanOptions = {}): Loan {
    const rate = Math.max(0, record.interestRate - (options.rateDiscount ?? 0));
    return new Loan(
      record.name,
      record.principalPennies,
      record.currentInterestPennies,
      rate,
      options.terms ?? DEFAULT_LOAN_TERMS,
    );
  }

  get principalPennies(): number {
    return this.principal;
  }

  get accruedInterestPennies(): number {
    return this.accruedInterest;
  }

  get balancePennies(): number {
    return this.principal + this.accruedInterest;
  }

  get dailyRate(): Decimal {
    return new Decimal(this.interestRate).div(this.terms.dayCountBasis);
  }

  accrueOneMonthInterest(): number {
    const basis = this.terms.accrualBasis === 'principal' ? this.principal : this.balancePennies;
    const interest = new Decimal(basis).times(this.monthlyRate).ceil().toNumber();
    this.accruedInterest += interest;
    return interest;
  }

  minimumPaymentPennies(monthsRemaining: number): number {
    if (!Number.isInteger(monthsRemaining) || monthsRemaining < 0) {
      throw new InvariantViolationError(`months remaining must be a non-negative integer, got ${monthsRemaining}`);
    }
    const balance = this.balancePennies;
    if (monthsRemaining === 0) return balance;

    if (this.monthlyRate.isZero()) {
      return new Decimal(balance).div(monthsRemaining).ceil().toNumber();
    }

    const growth = this.monthlyRate.plus(1).pow(monthsRemaining);
    return new Decimal(balance)
      .times(this.monthlyRate.times(growth).div(growth.minus(1)))
      .ceil()
      .toNumber();
  }

  makePayment(amountPennies: number): void {
    assertPennies(amountPennies, `payment to ${this.name}`);
    if (amountPennies > this.balancePennies) {
      throw new InvariantViolationError(
        `Overpaid loan ${this.name} by ${amountPennies - this.balancePennies} pennies`,
      );
    }

    if (amountPennies < this.accruedInterest) {
      this.accruedInterest -= amountPennies;
      return;
    }
    this.principal -= amountPennies - this.accruedInterest;
    this.accruedInterest = 0;
  }

  snapshot(): LoanState {
    return {
      name: this.name,
      interestRate: this.interestRate,
      principalPennies: this.principal,
      accruedInterestPennies: this.accruedInterest,
      balancePennies: this.balancePennies,
    };
  }
}
