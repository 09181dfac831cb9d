/**
 * Format plain amounts for display (no currency symbol).
 */
const AMOUNT_FORMAT = new Intl.NumberFormat("en-US", {
  minimumFractionDigits: 0,
  maximumFractionDigits: 0,
});

export function formatAmount(amount: number): string {
  return AMOUNT_FORMAT.format(Number.isFinite(amount) ? amount : 0);
}

/** Decimal rate to percent string, e.g. 0.125 → "12.5%". */
export function formatPercent(rate: number, fractionDigits: number = 1): string {
  return `${(rate * 100).toFixed(fractionDigits)}%`;
}
