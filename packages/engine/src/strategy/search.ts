import type { SimulationConfig } from '../config/types.js';
import { ConfigurationError } from '../errors.js';
import { LoanPortfolio } from '../portfolio/portfolio.js';
import type { LoanRecord } from '../records/types.js';
import { simulateStrategy } from '../simulation/engine.js';
import type { SimulationResult } from '../simulation/types.js';
import type { StrategySearchOptions, StrategySearchResult } from './types.js';

export const DEFAULT_STEP_PENNIES = 100_000;
/** Upper bound on simulations per search; a finer step over the same balance is rejected. */
export const MAX_SEARCH_CANDIDATES = 10_000;

export function candidateUpfrontPayments(startingBalancePennies: number, stepPennies: number): number[] {
  const count = Math.max(1, Math.floor(startingBalancePennies / stepPennies));
  if (count > MAX_SEARCH_CANDIDATES) {
    throw new ConfigurationError(
      `step of ${stepPennies} pennies gives ${count} candidates for a balance of ${startingBalancePennies} pennies; ` +
        `at most ${MAX_SEARCH_CANDIDATES} are allowed`,
    );
  }
  return Array.from({ length: count }, (_, k) => k * stepPennies);
}

/**
 * Tries every upfront payment on the step grid below the starting balance
 * and keeps the one with the lowest present-value cost. The whole range is
 * scanned; the cost curve is not assumed to be unimodal.
 */
export function searchStrategies(
  records: readonly LoanRecord[],
  config: SimulationConfig,
  options: StrategySearchOptions = {},
): StrategySearchResult {
  const stepPennies = options.stepPennies ?? DEFAULT_STEP_PENNIES;
  if (!Number.isInteger(stepPennies) || stepPennies <= 0) {
    throw new ConfigurationError(`step must be a positive whole number of pennies, got ${stepPennies}`);
  }

  const startingBalancePennies = LoanPortfolio.fromRecords(records).balancePennies();
  const candidates: SimulationResult[] = [];
  let best: SimulationResult | undefined;

  for (const upfront of candidateUpfrontPayments(startingBalancePennies, stepPennies)) {
    const outcome = simulateStrategy(records, config, upfront, options.observer);
    candidates.push(outcome);
    options.onCandidate?.(outcome, candidates.length - 1);
    if (!best || outcome.presentValuePennies < best.presentValuePennies) {
      best = outcome;
    }
  }

  if (!best) {
    throw new ConfigurationError('No candidate upfront payments to evaluate');
  }

  return { startingBalancePennies, stepPennies, best, candidates };
}
