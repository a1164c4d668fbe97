import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { InputValidationError } from '../errors.js';
import { toPennies } from '../math/money.js';
import { loanRecordSchema, type LoanRecord } from './types.js';

export const EXPECTED_COLUMNS = ['name', 'principal', 'current_interest', 'interest_rate'] as const;

const RECORD_COLUMNS = new Map<string, string>([
  ['name', 'name'],
  ['principalPennies', 'principal'],
  ['currentInterestPennies', 'current_interest'],
  ['interestRate', 'interest_rate'],
]);

// Plain decimals only: no exponents, hex or binary literals.
const decimalString = z
  .string()
  .trim()
  .regex(/^-?\d+(\.\d+)?$/, 'is not a number');

const csvRowSchema = z.tuple([z.string().trim().min(1, 'is empty'), decimalString, decimalString, decimalString]);

/** Splits one CSV line, honouring double-quoted fields and "" escapes. */
export function splitCsvLine(line: string): string[] {
  const fields: string[] = [];
  let current = '';
  let inQuotes = false;

  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (inQuotes) {
      if (ch === '"' && line[i + 1] === '"') {
        current += '"';
        i++;
      } else if (ch === '"') {
        inQuotes = false;
      } else {
        current += ch;
      }
    } else if (ch === '"') {
      inQuotes = true;
    } else if (ch === ',') {
      fields.push(current);
      current = '';
    } else {
      current += ch;
    }
  }
  fields.push(current);
  return fields;
}

export function parseLoanCsv(text: string): LoanRecord[] {
  const lines = text.replace(/^\uFEFF/, '').split(/\r?\n/).filter((l) => l.trim() !== '');
  if (lines.length === 0) {
    throw new InputValidationError('Loan file is empty');
  }

  const header = splitCsvLine(lines[0]).map((h) => h.trim());
  if (header.length !== EXPECTED_COLUMNS.length || header.some((h, i) => h !== EXPECTED_COLUMNS[i])) {
    throw new InputValidationError(`Columns expected to be ${EXPECTED_COLUMNS.join(',')}, got ${header.join(',')}`);
  }

  return lines.slice(1).map((line, row) => {
    const fields = splitCsvLine(line);
    if (fields.length !== EXPECTED_COLUMNS.length) {
      throw new InputValidationError(`expected ${EXPECTED_COLUMNS.length} columns, got ${fields.length}`, row);
    }
    const parsed = csvRowSchema.safeParse(fields);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const column = typeof issue.path[0] === 'number' ? EXPECTED_COLUMNS[issue.path[0]] : undefined;
      throw new InputValidationError(column ? `${column} ${issue.message}` : issue.message, row);
    }

    const [name, principal, currentInterest, rate] = parsed.data;
    const record: LoanRecord = {
      name,
      principalPennies: toPennies(principal),
      currentInterestPennies: toPennies(currentInterest),
      interestRate: Number(rate),
    };

    if (record.principalPennies < 0) {
      throw new InputValidationError(`${name} principal should be non-negative.`, row);
    }
    if (record.currentInterestPennies < 0) {
      throw new InputValidationError(`${name} current_interest should be non-negative.`, row);
    }
    if (!(record.interestRate >= 0 && record.interestRate < 1)) {
      throw new InputValidationError(`${name} interest_rate should be between 0.0 and 1.0.`, row);
    }

    const checked = loanRecordSchema.safeParse(record);
    if (!checked.success) {
      const issue = checked.error.issues[0];
      const column = RECORD_COLUMNS.get(String(issue.path[0])) ?? issue.path.join('.');
      throw new InputValidationError(`${name} ${column} ${issue.message}`, row);
    }
    return checked.data;
  });
}

export function loadLoanFile(path: string): LoanRecord[] {
  return parseLoanCsv(readFileSync(path, 'utf-8'));
}
