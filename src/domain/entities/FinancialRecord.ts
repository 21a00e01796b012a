export const financialFields = ['bankBalance', 'mutualFunds', 'stocks', 'loan', 'creditScore'] as const;

export type FinancialField = (typeof financialFields)[number];

/**
 * Snapshot of a user's finances. A field that is missing means "not available",
 * which is not the same as a field holding 0.
 */
export type FinancialRecord = Partial<Record<FinancialField, number>>;

export const emptyFinancialRecord = (): FinancialRecord => ({});

export const zeroedFinancialRecord = (): FinancialRecord => ({
  bankBalance: 0,
  mutualFunds: 0,
  stocks: 0,
  loan: 0,
  creditScore: 0,
});
