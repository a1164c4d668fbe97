import { fileURLToPath } from 'node:url';
import { createDb, type DB } from './index.js';

export function migrate(db: DB): void {
  db.$client.exec(`
    CREATE TABLE IF NOT EXISTS loan_records (
      id TEXT PRIMARY KEY,
      name TEXT NOT NULL,
      principal_cents INTEGER NOT NULL CHECK(principal_cents >= 0),
      current_interest_cents INTEGER NOT NULL DEFAULT 0 CHECK(current_interest_cents >= 0),
      interest_rate REAL NOT NULL CHECK(interest_rate >= 0 AND interest_rate < 1),
      sort_order INTEGER NOT NULL DEFAULT 0,
      created_at TEXT NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_loan_records_sort ON loan_records(sort_order);
  `);
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  const dbPath = process.env.LOANSIM_DB_PATH ?? './data/loansim.db';
  migrate(createDb(dbPath));
  console.log(`Migrated ${dbPath}`);
}
