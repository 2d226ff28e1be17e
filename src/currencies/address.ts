import type { CurrencyType } from './types';

/**
 * An address that an AddressCodec has validated for `currency`.
 */
export class PaymentAddress {
  constructor(
    readonly currency: CurrencyType,
    readonly value: string
  ) {
    Object.freeze(this);
  }

  equals(other: PaymentAddress): boolean {
    return this.currency.id === other.currency.id && this.value === other.value;
  }

  toString(): string {
    return this.value;
  }
}
