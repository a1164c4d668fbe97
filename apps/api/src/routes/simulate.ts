import { Hono } from 'hono';
import {
  Simulation,
  searchStrategies,
  resolveSimulationConfig,
  formatMoney,
  type MonthStats,
  type SimulationResult,
  type StrategySearchResult,
} from '@loansim/engine';
import { validationError } from '../errors.js';
import { readJson } from './json.js';
import { runRequestSchema, searchRequestSchema } from './schemas.js';

export function formatSimulationResult(result: SimulationResult) {
  return {
    ...result,
    upfrontFormatted: formatMoney(result.upfrontPennies),
    totalPaidFormatted: formatMoney(result.totalPaidPennies),
    presentValueFormatted: formatMoney(result.presentValuePennies),
    finalBalanceFormatted: formatMoney(result.finalBalancePennies),
  };
}

export function formatSearchResult(result: StrategySearchResult) {
  return {
    startingBalancePennies: result.startingBalancePennies,
    startingBalanceFormatted: formatMoney(result.startingBalancePennies),
    stepPennies: result.stepPennies,
    best: formatSimulationResult(result.best),
    candidates: result.candidates.map(formatSimulationResult),
  };
}

export function simulateRoutes() {
  const router = new Hono();

  // POST /run — one strategy, optionally with the month-by-month trace
  router.post('/run', async (c) => {
    const parsed = runRequestSchema.safeParse(await readJson(c));
    if (!parsed.success) {
      throw validationError(parsed.error.issues.map((i) => i.message).join(', '));
    }

    const { loans, upfrontPennies, includeMonths } = parsed.data;
    const config = resolveSimulationConfig(parsed.data.config);
    const months: MonthStats[] = [];

    const sim = new Simulation(loans, config);
    sim.makeEarlyPayment(upfrontPennies);
    const result = sim.run(includeMonths ? { onMonth: (m) => months.push(m) } : {});

    return c.json({
      ...formatSimulationResult(result),
      ...(includeMonths ? { months } : {}),
    });
  });

  // POST /search — best upfront payment over the candidate grid
  router.post('/search', async (c) => {
    const parsed = searchRequestSchema.safeParse(await readJson(c));
    if (!parsed.success) {
      throw validationError(parsed.error.issues.map((i) => i.message).join(', '));
    }

    const config = resolveSimulationConfig(parsed.data.config);
    const result = searchStrategies(parsed.data.loans, config, { stepPennies: parsed.data.stepPennies });

    return c.json(formatSearchResult(result));
  });

  return router;
}
