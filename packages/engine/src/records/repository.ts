import { asc, eq, sql } from 'drizzle-orm';
import type { DB } from '../db/index.js';
import { loanRecords } from '../db/schema.js';
import type { LoanRecord, StoredLoanRecord } from './types.js';

function toStored(row: typeof loanRecords.$inferSelect): StoredLoanRecord {
  return {
    id: row.id,
    name: row.name,
    principalPennies: row.principalCents,
    currentInterestPennies: row.currentInterestCents,
    interestRate: row.interestRate,
    createdAt: row.createdAt,
  };
}

/** Stored records in insertion order, which the portfolio's tie-breaking relies on. */
export function listLoanRecords(db: DB): StoredLoanRecord[] {
  return db
    .select()
    .from(loanRecords)
    .orderBy(asc(loanRecords.sortOrder))
    .all()
    .map(toStored);
}

export function getLoanRecord(db: DB, id: string): StoredLoanRecord | null {
  const row = db.select().from(loanRecords).where(eq(loanRecords.id, id)).get();
  return row ? toStored(row) : null;
}

export function insertLoanRecords(db: DB, records: readonly LoanRecord[]): StoredLoanRecord[] {
  if (records.length === 0) return [];

  return db.transaction((tx) => {
    const last = tx
      .select({ max: sql<number | null>`MAX(${loanRecords.sortOrder})` })
      .from(loanRecords)
      .get();
    const base = (last?.max ?? -1) + 1;

    return tx
      .insert(loanRecords)
      .values(
        records.map((r, i) => ({
          name: r.name,
          principalCents: r.principalPennies,
          currentInterestCents: r.currentInterestPennies,
          interestRate: r.interestRate,
          sortOrder: base + i,
        })),
      )
      .returning()
      .all()
      .map(toStored);
  });
}

export function deleteLoanRecord(db: DB, id: string): boolean {
  const result = db.delete(loanRecords).where(eq(loanRecords.id, id)).run();
  return result.changes > 0;
}
