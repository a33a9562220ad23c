/**
 * Format currency and rates for display.
 */
const CURRENCY_FORMAT = new Intl.NumberFormat("en-US", {
  style: "currency",
  currency: "USD",
  minimumFractionDigits: 0,
  maximumFractionDigits: 0,
});

const CURRENCY_FORMAT_CENTS = new Intl.NumberFormat("en-US", {
  style: "currency",
  currency: "USD",
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

const PERCENT_FORMAT = new Intl.NumberFormat("en-US", {
  style: "percent",
  minimumFractionDigits: 1,
  maximumFractionDigits: 1,
});

export function formatCurrency(amount: number, options?: { cents?: boolean }): string {
  return (options?.cents ? CURRENCY_FORMAT_CENTS : CURRENCY_FORMAT).format(amount);
}

/** 0.1 → "10.0%" */
export function formatPercent(rate: number): string {
  return PERCENT_FORMAT.format(rate);
}
