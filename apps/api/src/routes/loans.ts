import { Hono } from 'hono';
import {
  type DB,
  type StoredLoanRecord,
  loanRecordSchema,
  formatMoney,
  parseLoanCsv,
  listLoanRecords,
  getLoanRecord,
  insertLoanRecords,
  deleteLoanRecord,
  resolveSimulationConfig,
  searchStrategies,
} from '@loansim/engine';
import { notFound, validationError } from '../errors.js';
import { readJson } from './json.js';
import { storedSearchRequestSchema } from './schemas.js';
import { formatSearchResult } from './simulate.js';

function formatLoan(loan: StoredLoanRecord) {
  return {
    ...loan,
    principalFormatted: formatMoney(loan.principalPennies),
    currentInterestFormatted: formatMoney(loan.currentInterestPennies),
    balanceFormatted: formatMoney(loan.principalPennies + loan.currentInterestPennies),
  };
}

export function loanRoutes(db: DB) {
  const router = new Hono();

  // GET / — list stored loans in input order
  router.get('/', (c) => {
    const loans = listLoanRecords(db);
    const totalCents = loans.reduce((sum, l) => sum + l.principalPennies + l.currentInterestPennies, 0);
    return c.json({
      loans: loans.map(formatLoan),
      summary: {
        count: loans.length,
        totalBalancePennies: totalCents,
        totalBalanceFormatted: formatMoney(totalCents),
      },
    });
  });

  // GET /:id
  router.get('/:id', (c) => {
    const id = c.req.param('id');
    const loan = getLoanRecord(db, id);
    if (!loan) throw notFound('Loan', id);
    return c.json(formatLoan(loan));
  });

  // POST / — add one loan
  router.post('/', async (c) => {
    const parsed = loanRecordSchema.safeParse(await readJson(c));
    if (!parsed.success) {
      throw validationError(parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join(', '));
    }

    const [stored] = insertLoanRecords(db, [parsed.data]);
    return c.json(formatLoan(stored), 201);
  });

  // POST /import — CSV body with the name,principal,current_interest,interest_rate header
  router.post('/import', async (c) => {
    const records = parseLoanCsv(await c.req.text());
    const stored = insertLoanRecords(db, records);
    return c.json({ imported: stored.length, loans: stored.map(formatLoan) }, 201);
  });

  // DELETE /:id
  router.delete('/:id', (c) => {
    const id = c.req.param('id');
    if (!deleteLoanRecord(db, id)) throw notFound('Loan', id);
    return c.json({ deleted: id });
  });

  // POST /search — strategy search over every stored loan
  router.post('/search', async (c) => {
    const parsed = storedSearchRequestSchema.safeParse(await readJson(c));
    if (!parsed.success) {
      throw validationError(parsed.error.issues.map((i) => i.message).join(', '));
    }

    const loans = listLoanRecords(db);
    if (loans.length === 0) {
      throw validationError('No loans stored; add some with POST /api/v1/loans or /api/v1/loans/import');
    }

    const config = resolveSimulationConfig(parsed.data.config);
    const result = searchStrategies(loans, config, { stepPennies: parsed.data.stepPennies });
    return c.json(formatSearchResult(result));
  });

  return router;
}
