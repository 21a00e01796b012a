import { FinancialRecord } from '../entities/FinancialRecord.js';

export interface NetWorthBreakdown {
  assets: number;
  liabilities: number;
  netWorth: number;
}

// Missing fields count as zero here, unlike single-field lookups.
export const calculateNetWorth = (record: FinancialRecord): NetWorthBreakdown => {
  const assets = (record.bankBalance ?? 0) + (record.mutualFunds ?? 0) + (record.stocks ?? 0);
  const liabilities = record.loan ?? 0;

  return {
    assets,
    liabilities,
    netWorth: assets - liabilities,
  };
};
