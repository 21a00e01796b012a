import { describe, expect, it } from 'vitest';
import { calculateNetWorth } from '../NetWorthCalculator.js';

describe('calculateNetWorth', () => {
  it('subtracts the loan from the sum of assets', () => {
    const result = calculateNetWorth({
      bankBalance: 850000,
      mutualFunds: 600000,
      stocks: 400000,
      loan: 300000,
      creditScore: 820,
    });

    expect(result).toEqual({ assets: 1850000, liabilities: 300000, netWorth: 1550000 });
  });

  it('treats missing fields as zero', () => {
    expect(calculateNetWorth({ bankBalance: 500 }).netWorth).toBe(500);
    expect(calculateNetWorth({}).netWorth).toBe(0);
  });

  it('ignores the credit score', () => {
    expect(calculateNetWorth({ creditScore: 750 }).netWorth).toBe(0);
  });

  it('goes negative when liabilities exceed assets', () => {
    expect(calculateNetWorth({ bankBalance: 1000, loan: 26000 }).netWorth).toBe(-25000);
  });
});
