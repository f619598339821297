import {
  formatDollars,
  formatPercent,
  parseDollarAmount,
  percentOf,
  roundToCents,
} from '../../utils/math';

describe('roundToCents', () => {
  it('should round to two decimal places', () => {
    expect(roundToCents(40.004)).toBe(40);
    expect(roundToCents(10.126)).toBe(10.13);
    expect(roundToCents(-3.338)).toBe(-3.34);
  });

  it('should leave whole-cent amounts unchanged', () => {
    expect(roundToCents(1234.56)).toBe(1234.56);
    expect(roundToCents(0)).toBe(0);
  });
});

describe('parseDollarAmount', () => {
  it('should parse dollar-formatted values', () => {
    expect(parseDollarAmount('$1,234.56')).toBe(1234.56);
    expect(parseDollarAmount('$25.00')).toBe(25);
    expect(parseDollarAmount(' 980 ')).toBe(980);
  });

  it('should parse negative values', () => {
    expect(parseDollarAmount('-$12.50')).toBe(-12.5);
  });

  it('should return null for non-numeric values', () => {
    expect(parseDollarAmount('')).toBeNull();
    expect(parseDollarAmount('$')).toBeNull();
    expect(parseDollarAmount('n/a')).toBeNull();
    expect(parseDollarAmount('$12.3.4')).toBeNull();
  });
});

describe('formatDollars', () => {
  it('should format with two decimals and no grouping', () => {
    expect(formatDollars(40)).toBe('$40.00');
    expect(formatDollars(1234.5)).toBe('$1234.50');
  });
});

describe('formatPercent', () => {
  it('should format with two decimals', () => {
    expect(formatPercent(20)).toBe('20.00%');
    expect(formatPercent(100 / 3)).toBe('33.33%');
  });
});

describe('percentOf', () => {
  it('should return the share on a 0-100 scale', () => {
    expect(percentOf(50, 200)).toBe(25);
  });

  it('should return 0 for a zero whole', () => {
    expect(percentOf(10, 0)).toBe(0);
  });
});
