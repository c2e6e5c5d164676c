import { isNonNegativeFinite, percentOf, roundTo, safeRatio, sum } from '../../utils/math';

describe('sum', () => {
  it('should add all values', () => {
    expect(sum([20000, 8000, 5000, 2000])).toBe(35000);
  });

  it('should return 0 for an empty list', () => {
    expect(sum([])).toBe(0);
  });
});

describe('safeRatio', () => {
  it('should divide', () => {
    expect(safeRatio(15000, 50000)).toBe(0.3);
  });

  it('should return 0 when dividing by zero', () => {
    expect(safeRatio(1000, 0)).toBe(0);
  });
});

describe('percentOf', () => {
  it('should round to two decimals', () => {
    expect(percentOf(20000, 35000)).toBe(57.14);
    expect(percentOf(1, 3)).toBe(33.33);
  });

  it('should return 0 for a zero whole', () => {
    expect(percentOf(500, 0)).toBe(0);
  });
});

describe('roundTo', () => {
  it('should round to the given decimals', () => {
    expect(roundTo(25000 / 6, 2)).toBe(4166.67);
    expect(roundTo(2.5, 0)).toBe(3);
  });
});

describe('isNonNegativeFinite', () => {
  it('should accept zero and positive numbers', () => {
    expect(isNonNegativeFinite(0)).toBe(true);
    expect(isNonNegativeFinite(12.5)).toBe(true);
  });

  it('should reject negative and non-finite numbers', () => {
    expect(isNonNegativeFinite(-0.01)).toBe(false);
    expect(isNonNegativeFinite(Number.NaN)).toBe(false);
    expect(isNonNegativeFinite(Number.POSITIVE_INFINITY)).toBe(false);
  });
});
