import { z } from 'zod';
import { FinancialField, FinancialRecord, financialFields } from '../../domain/entities/FinancialRecord.js';

export const storedKeys = {
  bankBalance: 'bank_balance',
  mutualFunds: 'mutual_funds',
  stocks: 'stocks',
  loan: 'loan',
  creditScore: 'credit_score',
} as const satisfies Record<FinancialField, string>;

// Anything that is not a finite number reads as "not available".
const storedAmount = z.number().finite().nullish().catch(undefined);

export const StoredFinancialRecordSchema = z.object({
  bank_balance: storedAmount,
  mutual_funds: storedAmount,
  stocks: storedAmount,
  loan: storedAmount,
  credit_score: storedAmount,
});

export type StoredFinancialRecordDTO = z.infer<typeof StoredFinancialRecordSchema>;

const updatedAmount = z.number().int().nullable().optional();

export const FinanceUpdateSchema = z
  .object({
    bank_balance: updatedAmount,
    mutual_funds: updatedAmount,
    stocks: updatedAmount,
    loan: updatedAmount,
    credit_score: updatedAmount,
  })
  .strict();

export type FinanceUpdateDTO = z.infer<typeof FinanceUpdateSchema>;

export const parseStoredFinancialRecord = (entry: unknown): FinancialRecord => {
  const parsed = StoredFinancialRecordSchema.safeParse(entry);
  if (!parsed.success) {
    return {};
  }

  const record: FinancialRecord = {};
  for (const field of financialFields) {
    const value = parsed.data[storedKeys[field]];
    if (typeof value === 'number') {
      record[field] = value;
    }
  }

  return record;
};

export const toStoredFinancialRecord = (record: FinancialRecord): Record<string, number> => {
  const stored: Record<string, number> = {};
  for (const field of financialFields) {
    const value = record[field];
    if (value !== undefined) {
      stored[storedKeys[field]] = value;
    }
  }

  return stored;
};

/** Merges an update into a copy of the record; a `null` value removes the field. */
export const applyFinanceUpdate = (record: FinancialRecord, update: FinanceUpdateDTO): FinancialRecord => {
  const merged: FinancialRecord = { ...record };
  for (const field of financialFields) {
    const value = update[storedKeys[field]];
    if (value === null) {
      delete merged[field];
    } else if (value !== undefined) {
      merged[field] = value;
    }
  }

  return merged;
};
