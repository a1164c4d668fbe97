import { createDb, migrate, type DB } from '@loansim/engine';

const dbPath = process.env.LOANSIM_DB_PATH ?? './data/loansim.db';
export const db: DB = createDb(dbPath);
migrate(db);
