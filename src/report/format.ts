const currency = new Intl.NumberFormat('en-US', {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

/** $1,234.56; negative amounts as -$12.00 */
export function formatCurrency(value: number): string {
  const formatted = `$${currency.format(Math.abs(value))}`;
  return value < 0 ? `-${formatted}` : formatted;
}

/** 75.3% */
export function formatPercent(value: number): string {
  return `${value.toFixed(1)}%`;
}
