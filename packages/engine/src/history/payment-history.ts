import Decimal from 'decimal.js';
import { InvariantViolationError } from '../errors.js';

/**
 * Running totals of cash paid out, both nominal and discounted back to the
 * start of the simulation at the savings rate compounded monthly.
 */
export class PaymentHistory {
  private totalPaid = 0;
  private presentValue = new Decimal(0);
  private readonly monthlyGrowth: Decimal;

  constructor(readonly savingsRate: number) {
    this.monthlyGrowth = new Decimal(savingsRate).div(12).plus(1);
  }

  recordPayment(amountPennies: number, monthsInFuture: number): void {
    if (!(amountPennies >= 0)) {
      throw new InvariantViolationError(`payment amount must be non-negative, got ${amountPennies}`);
    }
    if (!Number.isInteger(monthsInFuture) || monthsInFuture < 0) {
      throw new InvariantViolationError(`months in future must be a non-negative integer, got ${monthsInFuture}`);
    }

    this.totalPaid += amountPennies;
    this.presentValue = this.presentValue.plus(
      new Decimal(amountPennies).div(this.monthlyGrowth.pow(monthsInFuture)),
    );
  }

  get totalPaidPennies(): number {
    return this.totalPaid;
  }

  get presentValuePennies(): number {
    return this.presentValue.toNumber();
  }
}
