/**
 * Exact coin amounts
 *
 * Amounts are held as a bigint count of the currency's smallest unit, so
 * decimal strings such as "0.1" convert without floating-point error.
 */

import type { CurrencyType } from './types';

export type AmountParseFailure = 'not-numeric' | 'too-precise';

/**
 * Thrown by CoinAmount.parse. `reason` tells the caller which rule failed.
 */
export class AmountParseError extends Error {
  constructor(
    readonly reason: AmountParseFailure,
    readonly input: string
  ) {
    super(
      reason === 'not-numeric'
        ? `'${input}' is not a decimal number`
        : `'${input}' is more precise than the smallest unit`
    );
    this.name = 'AmountParseError';
  }
}

// Plain decimal notation only; exponent notation is rejected
const DECIMAL_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)$/;

export class CoinAmount {
  private constructor(
    readonly currency: CurrencyType,
    readonly units: bigint
  ) {
    Object.freeze(this);
  }

  static fromUnits(currency: CurrencyType, units: bigint): CoinAmount {
    return new CoinAmount(currency, units);
  }

  static zero(currency: CurrencyType): CoinAmount {
    return new CoinAmount(currency, 0n);
  }

  /**
   * Parse a decimal string expressed in the currency's display unit.
   * Trailing fractional zeros beyond the unit precision are allowed.
   *
   * @throws AmountParseError
   */
  static parse(currency: CurrencyType, text: string): CoinAmount {
    if (!DECIMAL_PATTERN.test(text)) {
      throw new AmountParseError('not-numeric', text);
    }

    const negative = text.startsWith('-');
    const unsigned = text.replace(/^[+-]/, '');
    const [whole, fraction = ''] = unsigned.split('.');
    const significant = fraction.replace(/0+$/, '');

    if (significant.length > currency.unitExponent) {
      throw new AmountParseError('too-precise', text);
    }

    const units = BigInt((whole || '0') + significant.padEnd(currency.unitExponent, '0'));
    return new CoinAmount(currency, negative ? -units : units);
  }

  signum(): -1 | 0 | 1 {
    if (this.units < 0n) return -1;
    return this.units > 0n ? 1 : 0;
  }

  isNegative(): boolean {
    return this.units < 0n;
  }

  isZero(): boolean {
    return this.units === 0n;
  }

  equals(other: CoinAmount): boolean {
    return this.currency.id === other.currency.id && this.units === other.units;
  }

  /**
   * Decimal string in the display unit, e.g. "0.1"
   */
  toPlainString(): string {
    return formatAmount(this.currency, this);
  }

  toString(): string {
    return `${this.toPlainString()} ${this.currency.symbol}`;
  }
}

/**
 * Fixed-point decimal for `amount` using the precision of `currency`.
 * Trailing fractional zeros and a dangling decimal point are dropped.
 */
export function formatAmount(currency: CurrencyType, amount: CoinAmount): string {
  const sign = amount.units < 0n ? '-' : '';
  const digits = (amount.units < 0n ? -amount.units : amount.units).toString();
  const exponent = currency.unitExponent;

  if (exponent === 0) {
    return `${sign}${digits}`;
  }

  const padded = digits.padStart(exponent + 1, '0');
  const whole = padded.slice(0, -exponent);
  const fraction = padded.slice(-exponent).replace(/0+$/, '');
  return fraction ? `${sign}${whole}.${fraction}` : `${sign}${whole}`;
}
