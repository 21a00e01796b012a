const CURRENCY_SYMBOL = '₹';

const groupedInteger = new Intl.NumberFormat('en-US', {
  maximumFractionDigits: 0,
  useGrouping: true,
});

export const formatAmount = (value: number): string => {
  const rounded = Math.round(value);
  // -0, and negatives that round to it, print as "0".
  return groupedInteger.format(rounded === 0 ? 0 : rounded);
};

export const formatRupees = (value: number): string => `${CURRENCY_SYMBOL}${formatAmount(value)}`;

export const formatScore = (value: number): string => Math.round(value).toString();
