import { describe, it, expect } from 'vitest';
import { formatMoney, toPennies } from '../src/math/money.js';

describe('formatMoney', () => {
  it('formats a positive USD amount with cents', () => {
    expect(formatMoney(123456)).toBe('$1,234.56');
  });

  it('formats negative amount', () => {
    expect(formatMoney(-500000)).toBe('-$5,000.00');
  });

  it('formats zero', () => {
    expect(formatMoney(0)).toBe('$0.00');
  });

  it('rounds fractional pennies half up', () => {
    expect(formatMoney(12345.5)).toBe('$123.46');
  });

  it('formats large amount with separators', () => {
    expect(formatMoney(123456789)).toBe('$1,234,567.89');
  });
});

describe('toPennies', () => {
  it('converts whole units', () => {
    expect(toPennies('100')).toBe(10000);
  });

  it('does not drift on binary-unfriendly decimals', () => {
    expect(toPennies('0.29')).toBe(29);
    expect(toPennies(1.1)).toBe(110);
  });

  it('rounds sub-penny amounts up', () => {
    expect(toPennies('100.001')).toBe(10001);
    expect(toPennies('100.005')).toBe(10001);
  });
});
