import type { SimulationConfig } from '../config/types.js';
import { PaymentHistory } from '../history/payment-history.js';
import { LoanPortfolio } from '../portfolio/portfolio.js';
import type { LoanRecord } from '../records/types.js';
import type { SimulationObserver, SimulationResult } from './types.js';

/** One independent repayment run over a fresh copy of the loans. */
export class Simulation {
  readonly portfolio: LoanPortfolio;
  readonly history: PaymentHistory;
  private upfrontPennies = 0;

  constructor(
    records: readonly LoanRecord[],
    private readonly config: SimulationConfig,
  ) {
    this.portfolio = LoanPortfolio.fromRecords(records, {
      terms: {
        dayCountBasis: config.policy.dayCountBasis,
        accrualBasis: config.policy.accrualBasis,
      },
      rateDiscount: config.autoPayRateDiscount,
    });
    this.history = new PaymentHistory(config.annualSavingsRate);
  }

  /** Lump-sum payment made today, before the first month. */
  makeEarlyPayment(amountPennies: number): number {
    const applied = this.portfolio.makeAdditionalPayment(amountPennies);
    this.history.recordPayment(applied, 0);
    this.upfrontPennies += applied;
    return applied;
  }

  run(observer: SimulationObserver = {}): SimulationResult {
    const { horizonMonths, employerContribution } = this.config;
    let monthsRemaining = horizonMonths;
    let currentMonth = this.config.startMonth;

    while (monthsRemaining > 0) {
      if (observer.onMonth) {
        observer.onMonth({
          monthsRemaining,
          calendarMonth: currentMonth,
          balancePennies: this.portfolio.balancePennies(),
          totalPaidPennies: this.history.totalPaidPennies,
          minimumPaymentPennies: this.portfolio.minimumPayment(monthsRemaining),
          loans: this.portfolio.loans.map((l) => l.snapshot()),
        });
      }

      const minimumPayment = this.portfolio.simulateOneMonthMinimumPayments(monthsRemaining);
      const monthsInFuture = horizonMonths - monthsRemaining + 1;
      const employerAmount =
        employerContribution && employerContribution.month === currentMonth ? employerContribution.amountPennies : 0;

      if (this.config.policy.employerContributionMode === 'bill_credit') {
        const bill = minimumPayment - employerAmount;
        if (bill > 0) {
          this.history.recordPayment(bill, monthsInFuture);
        } else if (bill < 0) {
          this.portfolio.makeAdditionalPayment(-bill);
        }
      } else {
        this.history.recordPayment(minimumPayment, monthsInFuture);
        if (employerAmount > 0) {
          this.portfolio.makeAdditionalPayment(employerAmount);
        }
      }

      monthsRemaining--;
      currentMonth = (currentMonth + 1) % 12;
    }

    return {
      upfrontPennies: this.upfrontPennies,
      totalPaidPennies: this.history.totalPaidPennies,
      presentValuePennies: this.history.presentValuePennies,
      finalBalancePennies: this.portfolio.balancePennies(),
      monthsSimulated: horizonMonths,
    };
  }
}

export function simulateStrategy(
  records: readonly LoanRecord[],
  config: SimulationConfig,
  upfrontPennies: number,
  observer?: SimulationObserver,
): SimulationResult {
  const sim = new Simulation(records, config);
  sim.makeEarlyPayment(upfrontPennies);
  return sim.run(observer);
}
