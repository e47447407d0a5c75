// src/delegates/ConversionRate.ts

/** Purchased / entries as a 0..1 fraction; 0 when there are no entries. */
export function conversionRate(totalEntries: number, totalPurchased: number): number {
  if (!Number.isFinite(totalEntries) || totalEntries <= 0) return 0;
  return totalPurchased / totalEntries;
}

export function formatPercent(rate: number, digits = 2): string {
  return `${(rate * 100).toFixed(digits)}%`;
}
