// src/tests/billing/money.test.ts
import {
  compareAmounts,
  currencyExponent,
  fitsCurrency,
  fromCents,
  fromMinorUnits,
  normalizeAmount,
  toCents,
  toMinorUnits
} from '../../lib/billing/utils/money';

describe('money', () => {
  describe('normalizeAmount', () => {
    it('pads to two fraction digits', () => {
      expect(normalizeAmount('10')).toBe('10.00');
      expect(normalizeAmount('49.5')).toBe('49.50');
      expect(normalizeAmount(29.99)).toBe('29.99');
      expect(normalizeAmount(' 007.10 ')).toBe('7.10');
    });

    it('rejects more than two fraction digits', () => {
      expect(normalizeAmount('1.005')).toBeNull();
      expect(normalizeAmount(0.001)).toBeNull();
    });

    it('rejects values that are not decimals', () => {
      expect(normalizeAmount('12abc')).toBeNull();
      expect(normalizeAmount('')).toBeNull();
      expect(normalizeAmount(Number.NaN)).toBeNull();
      expect(normalizeAmount(Number.POSITIVE_INFINITY)).toBeNull();
    });

    it('keeps the sign of negative amounts except for zero', () => {
      expect(normalizeAmount('-3.5')).toBe('-3.50');
      expect(normalizeAmount('-0')).toBe('0.00');
    });
  });

  it('converts between decimals and cents without float drift', () => {
    expect(toCents('0.29')).toBe(29);
    expect(toCents('1234.56')).toBe(123456);
    expect(toCents('-2.05')).toBe(-205);
    expect(fromCents(5)).toBe('0.05');
    expect(fromCents(-1999)).toBe('-19.99');
  });

  it('uses whole units for zero-decimal currencies', () => {
    expect(toMinorUnits('25.00', 'USD')).toBe(2500);
    expect(toMinorUnits('1500.00', 'JPY')).toBe(1500);
    expect(fromMinorUnits(1500, 'jpy')).toBe('1500.00');
    expect(fromMinorUnits(4950, 'EUR')).toBe('49.50');
  });

  it('uses thousandths for three-decimal currencies', () => {
    expect(currencyExponent('kwd')).toBe(3);
    expect(toMinorUnits('10.00', 'KWD')).toBe(10000);
    expect(toMinorUnits('1.25', 'BHD')).toBe(1250);
    expect(fromMinorUnits(1250, 'BHD')).toBe('1.25');
  });

  it('refuses fraction digits a zero-decimal currency cannot carry', () => {
    expect(fitsCurrency('100.50', 'JPY')).toBe(false);
    expect(fitsCurrency('100.00', 'JPY')).toBe(true);
    expect(fitsCurrency('100.50', 'USD')).toBe(true);
    expect(() => toMinorUnits('100.50', 'JPY')).toThrow(RangeError);
  });

  it('compares amounts by value', () => {
    expect(compareAmounts('10.00', '9.99')).toBe(1);
    expect(compareAmounts('5.00', '5.00')).toBe(0);
    expect(compareAmounts('0.10', '1.00')).toBe(-1);
  });
});
