const usdFormatter = new Intl.NumberFormat("en-US", {
  style: "currency",
  currency: "USD",
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

/**
 * Format a dollar amount, e.g. `$1,200,000.00`
 */
export function formatUsd(value: number): string {
  return usdFormatter.format(value);
}

/**
 * Format a number with a fixed number of decimals
 */
export function formatFixed(value: number, digits = 2): string {
  return value.toFixed(digits);
}
