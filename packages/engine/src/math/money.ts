import Decimal from 'decimal.js';

export function formatMoney(amountCents: number): string {
  const amount = new Decimal(amountCents).dividedBy(100).toDecimalPlaces(2);
  const isNegative = amount.isNegative() && !amount.isZero();
  const [whole, fraction] = amount.abs().toFixed(2).split('.');
  return `${isNegative ? '-' : ''}$${whole.replace(/\B(?=(\d{3})+(?!\d))/g, ',')}.${fraction}`;
}

/**
 * Converts a currency amount (e.g. "1234.565") to whole pennies, rounding up.
 * Goes through Decimal so "0.29" becomes 29 and not 29.000000000000004 → 30.
 */
export function toPennies(units: string | number): number {
  return new Decimal(units).times(100).ceil().toNumber();
}
