import type { SimulationObserver, SimulationResult } from '../simulation/types.js';

export interface StrategySearchOptions {
  /** Spacing between candidate upfront payments. Defaults to $1,000. */
  stepPennies?: number;
  onCandidate?: (outcome: SimulationResult, index: number) => void;
  /** Receives month stats from every candidate run. */
  observer?: SimulationObserver;
}

export interface StrategySearchResult {
  startingBalancePennies: number;
  stepPennies: number;
  best: SimulationResult;
  candidates: SimulationResult[];
}
