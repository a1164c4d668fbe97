import { sqliteTable, text, integer, real, index } from 'drizzle-orm/sqlite-core';
import { createId } from '@paralleldrive/cuid2';

export const loanRecords = sqliteTable('loan_records', {
  id: text('id').primaryKey().$defaultFn(() => createId()),
  name: text('name').notNull(),
  principalCents: integer('principal_cents').notNull(),
  currentInterestCents: integer('current_interest_cents').notNull().default(0),
  interestRate: real('interest_rate').notNull(),
  sortOrder: integer('sort_order').notNull().default(0),
  createdAt: text('created_at').notNull().$defaultFn(() => new Date().toISOString()),
}, (table) => [
  index('idx_loan_records_sort').on(table.sortOrder),
]);
