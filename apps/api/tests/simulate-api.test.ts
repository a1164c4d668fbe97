import { describe, it, expect, beforeAll } from 'vitest';
import { z } from 'zod';
import type { Hono } from 'hono';
import { createApp } from '../src/app.js';
import { api, createTestDb } from './helpers.js';

const freeLoan = { name: 'Free', principalPennies: 120000, currentInterestPennies: 0, interestRate: 0 };
const autoLoan = { name: 'Auto', principalPennies: 1000000, currentInterestPennies: 0, interestRate: 0.05 };

const searchResponse = z.object({
  best: z.object({ upfrontPennies: z.number(), presentValuePennies: z.number() }),
  candidates: z.array(z.object({ upfrontPennies: z.number(), presentValuePennies: z.number() })),
});

describe('Simulation API', () => {
  let app: Hono;

  beforeAll(() => {
    app = createApp(createTestDb());
  });

  it('GET /health', async () => {
    const { status, data } = await api(app, 'GET', '/health');
    expect(status).toBe(200);
    expect(data).toEqual({ status: 'ok', version: '0.1.0' });
  });

  describe('POST /api/v1/simulate/run', () => {
    it('returns totals with formatted fields', async () => {
      const { status, data } = await api(app, 'POST', '/api/v1/simulate/run', {
        loans: [freeLoan],
        config: { annualSavingsRate: 0 },
      });

      expect(status).toBe(200);
      expect(data).toEqual({
        upfrontPennies: 0,
        upfrontFormatted: '$0.00',
        totalPaidPennies: 120000,
        totalPaidFormatted: '$1,200.00',
        presentValuePennies: 120000,
        presentValueFormatted: '$1,200.00',
        finalBalancePennies: 0,
        finalBalanceFormatted: '$0.00',
        monthsSimulated: 120,
      });
    });

    it('applies the upfront payment', async () => {
      const { status, data } = await api(app, 'POST', '/api/v1/simulate/run', {
        loans: [freeLoan],
        config: { annualSavingsRate: 0 },
        upfrontPennies: 20000,
      });
      expect(status).toBe(200);
      expect(data).toMatchObject({ upfrontPennies: 20000, totalPaidPennies: 120000 });
    });

    it('includes the month trace on request', async () => {
      const { status, data } = await api(app, 'POST', '/api/v1/simulate/run', {
        loans: [{ ...freeLoan, principalPennies: 3000 }],
        config: { annualSavingsRate: 0, horizonMonths: 3 },
        includeMonths: true,
      });
      expect(status).toBe(200);
      expect(data).toHaveProperty('months.length', 3);
      expect(data).toHaveProperty('months.0.balancePennies', 3000);
      expect(data).toHaveProperty('months.1.balancePennies', 2000);
      expect(data).toHaveProperty('months.1.loans.0.name', 'Free');
    });

    it('rejects a partially specified employer contribution', async () => {
      const { status, data } = await api(app, 'POST', '/api/v1/simulate/run', {
        loans: [freeLoan],
        config: { annualSavingsRate: 0.03, employerContributionPennies: 100000 },
      });
      expect(status).toBe(400);
      expect(data).toEqual({
        error: {
          code: 'CONFIGURATION',
          message: 'Employer contribution amount and month must be given together',
          suggestion: 'Check the simulation config',
        },
      });
    });

    it('rejects out-of-range loan rates', async () => {
      const { status, data } = await api(app, 'POST', '/api/v1/simulate/run', {
        loans: [{ ...freeLoan, interestRate: 1 }],
        config: { annualSavingsRate: 0.03 },
      });
      expect(status).toBe(400);
      expect(data).toHaveProperty('error.code', 'VALIDATION_ERROR');
    });

    it('rejects a body that is not JSON', async () => {
      const { status, data } = await api(app, 'POST', '/api/v1/simulate/run', '{not json');
      expect(status).toBe(400);
      expect(data).toHaveProperty('error.message', 'Request body must be valid JSON');
    });
  });

  describe('POST /api/v1/simulate/search', () => {
    it('finds the best upfront payment', async () => {
      const { status, data } = await api(app, 'POST', '/api/v1/simulate/search', {
        loans: [autoLoan],
        config: { annualSavingsRate: 0.03 },
      });

      expect(status).toBe(200);
      expect(data).toMatchObject({
        startingBalancePennies: 1000000,
        startingBalanceFormatted: '$10,000.00',
        stepPennies: 100000,
        best: { upfrontPennies: 900000, upfrontFormatted: '$9,000.00' },
      });

      const parsed = searchResponse.parse(data);
      expect(parsed.candidates).toHaveLength(10);
      expect(parsed.best.presentValuePennies).toBe(Math.min(...parsed.candidates.map((c) => c.presentValuePennies)));
    });

    it('honours a custom step', async () => {
      const { data } = await api(app, 'POST', '/api/v1/simulate/search', {
        loans: [autoLoan],
        config: { annualSavingsRate: 0.03 },
        stepPennies: 500000,
      });
      expect(searchResponse.parse(data).candidates.map((c) => c.upfrontPennies)).toEqual([0, 500000]);
    });

    it('rejects a step that would produce too many candidates', async () => {
      const { status, data } = await api(app, 'POST', '/api/v1/simulate/search', {
        loans: [autoLoan],
        config: { annualSavingsRate: 0.03 },
        stepPennies: 1,
      });
      expect(status).toBe(400);
      expect(data).toEqual({
        error: {
          code: 'CONFIGURATION',
          message:
            'step of 1 pennies gives 1000000 candidates for a balance of 1000000 pennies; at most 10000 are allowed',
          suggestion: 'Check the simulation config',
        },
      });
    });

    it('rejects balances beyond whole-penny precision', async () => {
      const { status, data } = await api(app, 'POST', '/api/v1/simulate/search', {
        loans: [{ ...autoLoan, principalPennies: 1e22 }],
        config: { annualSavingsRate: 0.03 },
      });
      expect(status).toBe(400);
      expect(data).toHaveProperty('error.code', 'VALIDATION_ERROR');
      expect(data).toHaveProperty('error.message', 'is too large');
    });

    it('requires at least one loan', async () => {
      const { status } = await api(app, 'POST', '/api/v1/simulate/search', {
        loans: [],
        config: { annualSavingsRate: 0.03 },
      });
      expect(status).toBe(400);
    });
  });
});

describe('API key auth', () => {
  let app: Hono;

  beforeAll(() => {
    app = createApp(createTestDb(), { apiKey: 'test-secret' });
  });

  it('rejects requests without a key', async () => {
    const { status, data } = await api(app, 'GET', '/api/v1/loans');
    expect(status).toBe(401);
    expect(data).toHaveProperty('error.message', 'Missing Authorization header');
  });

  it('rejects the wrong key', async () => {
    const { status, data } = await api(app, 'GET', '/api/v1/loans', undefined, { Authorization: 'Bearer nope' });
    expect(status).toBe(401);
    expect(data).toHaveProperty('error.message', 'Invalid API key');
  });

  it('accepts the configured key', async () => {
    const { status } = await api(app, 'GET', '/api/v1/loans', undefined, { Authorization: 'Bearer test-secret' });
    expect(status).toBe(200);
  });

  it('leaves /health open', async () => {
    const { status } = await api(app, 'GET', '/health');
    expect(status).toBe(200);
  });
});
