import { z } from 'zod';

export const loanRecordSchema = z.object({
  name: z.string().min(1),
  principalPennies: z.number().int().min(0).max(Number.MAX_SAFE_INTEGER, 'is too large'),
  currentInterestPennies: z.number().int().min(0).max(Number.MAX_SAFE_INTEGER, 'is too large'),
  interestRate: z.number().min(0).lt(1),
});

/** One validated row of loan input. Never mutated; each simulation builds its own Loans from it. */
export type LoanRecord = Readonly<z.infer<typeof loanRecordSchema>>;

export interface StoredLoanRecord extends LoanRecord {
  id: string;
  createdAt: string;
}
