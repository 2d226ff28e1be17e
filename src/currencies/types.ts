/**
 * Currency Types
 *
 * Describes a currency that payment URIs can name. New currencies are
 * added by registering a CurrencyType with its own AddressCodec.
 */

import type { PaymentAddress } from './address';

/**
 * Validates address strings for one currency
 */
export interface AddressCodec {
  /**
   * Decode `token` as an address of `currency`.
   * Returns null when the token is not a valid address for it.
   */
  decode(currency: CurrencyType, token: string): PaymentAddress | null;
}

export interface CurrencyType {
  /** Unique id, e.g. 'bitcoin-testnet' */
  readonly id: string;
  /** Human-readable name */
  readonly name: string;
  /** Ticker shown next to amounts */
  readonly symbol: string;
  /** URI scheme without the colon. Several currencies may share one. */
  readonly uriScheme: string;
  /** Decimal places between the display unit and the smallest unit (8 for BTC) */
  readonly unitExponent: number;
  readonly addressCodec: AddressCodec;
}
