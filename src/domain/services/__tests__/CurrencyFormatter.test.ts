import { describe, expect, it } from 'vitest';
import { formatAmount, formatRupees, formatScore } from '../CurrencyFormatter.js';

describe('formatAmount', () => {
  it('groups thousands with commas', () => {
    expect(formatAmount(850000)).toBe('850,000');
    expect(formatAmount(1550000)).toBe('1,550,000');
  });

  it('leaves small values ungrouped', () => {
    expect(formatAmount(0)).toBe('0');
    expect(formatAmount(999)).toBe('999');
  });

  it('drops decimal places', () => {
    expect(formatAmount(1234.4)).toBe('1,234');
  });

  it('prints negative zero as zero', () => {
    expect(formatAmount(-0)).toBe('0');
    expect(formatAmount(-0.4)).toBe('0');
    expect(formatRupees(-0)).toBe('₹0');
  });

  it('keeps the sign of negative values', () => {
    expect(formatAmount(-25000)).toBe('-25,000');
  });
});

describe('formatRupees', () => {
  it('prefixes the rupee symbol', () => {
    expect(formatRupees(300000)).toBe('₹300,000');
  });
});

describe('formatScore', () => {
  it('renders a plain integer without separators', () => {
    expect(formatScore(820)).toBe('820');
    expect(formatScore(1200)).toBe('1200');
  });
});
