// src/lib/billing/utils/money.ts

/** Fixed-point decimal with exactly two fraction digits, e.g. "29.99". */
export type DecimalAmount = string;

/** What callers may hand in before normalization. */
export type AmountInput = number | string;

const DECIMAL_PATTERN = /^-?\d+(\.\d{1,2})?$/;

// Currencies the processor expects in whole units
const ZERO_DECIMAL_CURRENCIES = new Set([
  'BIF', 'CLP', 'DJF', 'GNF', 'JPY', 'KMF', 'KRW', 'MGA',
  'PYG', 'RWF', 'UGX', 'VND', 'VUV', 'XAF', 'XOF', 'XPF'
]);

// Currencies the processor expects in thousandths
const THREE_DECIMAL_CURRENCIES = new Set(['BHD', 'JOD', 'KWD', 'OMR', 'TND']);

/**
 * Normalizes an amount to its two-digit decimal form. Returns null when the
 * value is not a finite number or carries more than two fraction digits.
 */
export function normalizeAmount(value: AmountInput): DecimalAmount | null {
  if (typeof value === 'number') {
    if (!Number.isFinite(value) || Math.round(value * 100) / 100 !== value) {
      return null;
    }
    return value.toFixed(2);
  }

  const trimmed = value.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) {
    return null;
  }

  const negative = trimmed.startsWith('-');
  const [whole, fraction = ''] = (negative ? trimmed.slice(1) : trimmed).split('.');
  const wholeDigits = whole.replace(/^0+(?=\d)/, '');
  const normalized = `${wholeDigits}.${fraction.padEnd(2, '0')}`;

  return negative && normalized !== '0.00' ? `-${normalized}` : normalized;
}

/** Integer count of cents; exact for any normalized amount. */
export function toCents(amount: DecimalAmount): number {
  const negative = amount.startsWith('-');
  const [whole, fraction = ''] = (negative ? amount.slice(1) : amount).split('.');
  const cents = Number(whole) * 100 + Number(fraction.padEnd(2, '0').slice(0, 2));
  return negative ? -cents : cents;
}

export function fromCents(cents: number): DecimalAmount {
  const negative = cents < 0;
  const absolute = Math.abs(cents);
  const whole = Math.floor(absolute / 100);
  const fraction = String(absolute % 100).padStart(2, '0');
  return `${negative ? '-' : ''}${whole}.${fraction}`;
}

/** Number of fraction digits in the processor's minor unit for `currency`. */
export function currencyExponent(currency: string): 0 | 2 | 3 {
  const code = currency.toUpperCase();
  if (ZERO_DECIMAL_CURRENCIES.has(code)) {
    return 0;
  }
  return THREE_DECIMAL_CURRENCIES.has(code) ? 3 : 2;
}

/** False when `amount` carries fraction digits the currency cannot express. */
export function fitsCurrency(amount: DecimalAmount, currency: string): boolean {
  return currencyExponent(currency) !== 0 || toCents(amount) % 100 === 0;
}

/**
 * Amount in the processor's smallest currency unit. Throws a RangeError for
 * an amount the currency cannot express; validation rejects those earlier.
 */
export function toMinorUnits(amount: DecimalAmount, currency: string): number {
  const cents = toCents(amount);

  switch (currencyExponent(currency)) {
    case 0:
      if (cents % 100 !== 0) {
        throw new RangeError(`${currency.toUpperCase()} amounts cannot have fraction digits: ${amount}`);
      }
      return cents / 100;
    case 3:
      // Three-decimal amounts must end in 0 at the processor
      return cents * 10;
    default:
      return cents;
  }
}

export function fromMinorUnits(minor: number, currency: string): DecimalAmount {
  switch (currencyExponent(currency)) {
    case 0:
      return fromCents(minor * 100);
    case 3:
      return fromCents(Math.round(minor / 10));
    default:
      return fromCents(minor);
  }
}

export function compareAmounts(a: DecimalAmount, b: DecimalAmount): number {
  return Math.sign(toCents(a) - toCents(b));
}
