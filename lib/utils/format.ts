/**
 * Number formatting for text reports.
 */
const WHOLE_FORMAT = new Intl.NumberFormat("en-AU", {
  minimumFractionDigits: 0,
  maximumFractionDigits: 0,
});

const TWO_DP_FORMAT = new Intl.NumberFormat("en-AU", {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

/** Dollar amount: "$1.23M" from a million up, else "$12,345". */
export function fmt(value: number): string {
  if (Math.abs(value) >= 1_000_000) {
    return `$${TWO_DP_FORMAT.format(value / 1_000_000)}M`;
  }
  return `$${WHOLE_FORMAT.format(value)}`;
}

/** Decimal rate as a percentage: formatPercent(0.0625, 2) → "6.25%". */
export function formatPercent(rate: number, digits = 1): string {
  return `${(rate * 100).toFixed(digits)}%`;
}

/** Whole number with thousands separators. */
export function formatNumber(value: number): string {
  return WHOLE_FORMAT.format(value);
}
