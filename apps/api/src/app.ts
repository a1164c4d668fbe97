import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger } from 'hono/logger';
import type { DB } from '@loansim/engine';
import { simulateRoutes } from './routes/simulate.js';
import { loanRoutes } from './routes/loans.js';
import { apiKeyAuth } from './middleware/auth.js';
import { toAppError } from './errors.js';

export interface AppOptions {
  /** Bearer token required on /api/v1 routes. Unset disables auth. */
  apiKey?: string;
}

export function createApp(db: DB, options: AppOptions = {}) {
  const app = new Hono();

  app.use('*', cors());
  app.use('*', logger());

  app.onError((err, c) => {
    const appErr = toAppError(err);
    return c.json(
      {
        error: {
          code: appErr.code,
          message: appErr.message,
          suggestion: appErr.suggestion,
        },
      },
      appErr.status,
    );
  });

  app.get('/health', (c) => c.json({ status: 'ok', version: '0.1.0' }));

  app.use('/api/v1/*', apiKeyAuth(options.apiKey));

  app.route('/api/v1/simulate', simulateRoutes());
  app.route('/api/v1/loans', loanRoutes(db));

  return app;
}
