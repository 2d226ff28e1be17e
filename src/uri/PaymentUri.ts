/**
 * Payment URI
 *
 * Parses payment URIs of the form
 *
 *   bitcoin:<address>
 *   bitcoin:<address>?<name1>=<value1>&<name2>=<value2>
 *   bitcoin://<address>?...        (non-standard, accepted)
 *   bitcoin:?r=<payment request URL>
 *
 * into an immutable PaymentUri, and builds the canonical string back.
 * Parsing is all-or-nothing: either a PaymentUri is returned or a
 * PaymentUriParseError is thrown.
 *
 * Name/value pairs:
 * - names are case-insensitive and may appear only once
 * - `amount` is a plain decimal in the currency's display unit
 * - `label`, `message` and `r` are URL-encoded UTF-8 text
 * - `req-` names are required directives; none are supported, so they
 *   always reject the URI
 * - other names are kept verbatim, URL-decoded
 *
 * @see https://github.com/bitcoin/bips/blob/master/bip-0021.mediawiki
 */

import { InvalidArgumentError, MissingDestinationError, PaymentUriError } from '../errors';
import type { PaymentAddress } from '../currencies/address';
import type { CoinAmount } from '../currencies/amount';
import { defaultRegistry } from '../currencies';
import type { CurrencyRegistry } from '../currencies/registry';
import type { CurrencyType } from '../currencies/types';
import { createLogger } from '../utils/logger';
import { buildPaymentUri } from './builder';
import {
  FIELD_ADDRESS,
  FIELD_AMOUNT,
  FIELD_LABEL,
  FIELD_MESSAGE,
  FIELD_PAYMENT_REQUEST_URL,
} from './constants';
import { FieldStoreBuilder, fieldValue } from './fieldStore';
import type { FieldMap, PaymentUriField } from './fieldStore';
import { parseParameters } from './parameters';
import { resolveAddress, splitPaymentUri } from './splitter';

const log = createLogger('URI:PARSER');

export interface ParseOptions {
  /**
   * Expected currency. Its scheme must prefix the input and the address
   * is validated for it alone.
   */
  currency?: CurrencyType;
  /** Registry to resolve schemes with. Defaults to the configured registry. */
  registry?: CurrencyRegistry;
}

export type SafeParseResult =
  | { success: true; uri: PaymentUri }
  | { success: false; error: PaymentUriError };

export class PaymentUri {
  /**
   * Currency of the address, or the one the caller supplied.
   * Undefined for an address-less URI parsed without an expected currency.
   */
  readonly currencyType: CurrencyType | undefined;
  private readonly fields: FieldMap;

  private constructor(currencyType: CurrencyType | undefined, fields: FieldMap) {
    this.currencyType = currencyType;
    this.fields = fields;
    Object.freeze(this);
  }

  /**
   * Parse `input` as a payment URI
   *
   * @throws PaymentUriParseError describing the first problem found
   */
  static parse(input: string, options: ParseOptions = {}): PaymentUri {
    const registry = options.registry ?? defaultRegistry();
    log.debug('Attempting to parse payment URI', {
      input,
      currency: options.currency?.id ?? 'any',
    });

    const { candidates, addressToken, queryTokens } = splitPaymentUri(
      input,
      registry,
      options.currency
    );

    const fields = new FieldStoreBuilder();
    let currencyType = options.currency;

    // The amount is read in the address's currency, so resolve it first
    if (addressToken.length > 0) {
      const address = resolveAddress(addressToken, candidates, registry);
      fields.put(FIELD_ADDRESS, { kind: 'address', value: address });
      currencyType = address.currency;
    }

    parseParameters(queryTokens, currencyType, fields);
    const sealed = fields.seal();

    const requestUrl = fieldValue(sealed, FIELD_PAYMENT_REQUEST_URL, 'text');
    if (addressToken.length === 0 && requestUrl === undefined) {
      throw new MissingDestinationError();
    }

    return new PaymentUri(currencyType, sealed);
  }

  /**
   * Build the canonical URI string for the given fields
   */
  static build(
    address: PaymentAddress,
    amount?: CoinAmount | null,
    label?: string | null,
    message?: string | null
  ): string {
    return buildPaymentUri(address, amount, label, message);
  }

  /**
   * The recipient address. Absent when the URI only carries a
   * payment-request URL (`r=`), a form older wallets cannot use.
   */
  address(): PaymentAddress | undefined {
    return fieldValue(this.fields, FIELD_ADDRESS, 'address');
  }

  amount(): CoinAmount | undefined {
    return fieldValue(this.fields, FIELD_AMOUNT, 'amount');
  }

  label(): string | undefined {
    return fieldValue(this.fields, FIELD_LABEL, 'text');
  }

  message(): string | undefined {
    return fieldValue(this.fields, FIELD_MESSAGE, 'text');
  }

  /**
   * URL a payment request (BIP70) may be fetched from. Never fetched here.
   */
  paymentRequestUrl(): string | undefined {
    return fieldValue(this.fields, FIELD_PAYMENT_REQUEST_URL, 'text');
  }

  /**
   * Any field by name, including ones this library does not interpret
   */
  get(name: string): PaymentUriField | undefined {
    return this.fields.get(name.toLowerCase());
  }

  /**
   * Field names in the order they were parsed
   */
  fieldNames(): string[] {
    return Array.from(this.fields.keys());
  }

  /**
   * Canonical form of this URI's address, amount, label and message.
   * Fields the builder does not emit (`r`, unknown names) are dropped.
   *
   * @throws InvalidArgumentError when the URI has no address
   */
  toUriString(): string {
    const address = this.address();
    if (!address) {
      throw new InvalidArgumentError('Cannot build a payment URI without an address');
    }
    return buildPaymentUri(address, this.amount(), this.label(), this.message());
  }

  /**
   * Debug representation listing every field in parse order
   */
  toString(): string {
    const entries = Array.from(this.fields.entries()).map(
      ([name, field]) => `'${name}'='${field.value.toString()}'`
    );
    return `PaymentUri[${entries.join(',')}]`;
  }
}

/**
 * Parse `input` as a payment URI
 *
 * @throws PaymentUriParseError
 */
export function parsePaymentUri(input: string, options: ParseOptions = {}): PaymentUri {
  return PaymentUri.parse(input, options);
}

/**
 * Parse without throwing for invalid input. Errors that are not
 * PaymentUriErrors are programming errors and still propagate.
 */
export function safeParsePaymentUri(input: string, options: ParseOptions = {}): SafeParseResult {
  try {
    return { success: true, uri: PaymentUri.parse(input, options) };
  } catch (error) {
    if (error instanceof PaymentUriError) {
      return { success: false, error };
    }
    throw error;
  }
}
