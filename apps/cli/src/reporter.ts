import {
  formatMoney,
  type LoanRecord,
  type MonthStats,
  type SimulationObserver,
  type SimulationResult,
  type StrategySearchResult,
} from '@loansim/engine';

export type Verbosity = 0 | 1 | 2 | 3;

export interface Reporter {
  start(records: readonly LoanRecord[]): void;
  observer: SimulationObserver | undefined;
  onCandidate(outcome: SimulationResult): void;
  done(result: StrategySearchResult): void;
}

export function createReporter(verbosity: Verbosity, write: (line: string) => void): Reporter {
  const onMonth = (stats: MonthStats) => {
    write(
      `[${stats.monthsRemaining}] Loans: ${formatMoney(stats.balancePennies)} ` +
        `Total Paid: ${formatMoney(stats.totalPaidPennies)} ` +
        `Minimum: ${formatMoney(stats.minimumPaymentPennies)}`,
    );
    if (verbosity < 3) return;
    for (const loan of stats.loans) {
      write(`\t${loan.name} ${loan.interestRate} ${formatMoney(loan.balancePennies)}`);
    }
  };

  return {
    start(records) {
      if (verbosity < 1) return;
      const balance = records.reduce((sum, r) => sum + r.principalPennies + r.currentInterestPennies, 0);
      write(`Simulating ${records.length} loan(s), starting balance ${formatMoney(balance)}`);
    },
    observer: verbosity >= 2 ? { onMonth } : undefined,
    onCandidate(outcome) {
      if (verbosity < 1) return;
      write(
        `${formatMoney(outcome.upfrontPennies)}: paid ${formatMoney(outcome.totalPaidPennies)}, ` +
          `present value ${formatMoney(outcome.presentValuePennies)}`,
      );
    },
    done(result) {
      write(
        `Best early payment: ${formatMoney(result.best.upfrontPennies)} ` +
          `results in ${formatMoney(result.best.presentValuePennies)}`,
      );
    },
  };
}
