/**
 * Parameter-Pair Parser
 *
 * Turns the raw `name=value` tokens of the query into typed fields:
 *
 * - `amount` is parsed as an exact amount of the resolved currency
 * - names prefixed with `req-` are required directives; none are
 *   understood, so any of them rejects the URI
 * - every other name with a non-empty value is URL-decoded and kept as
 *   text, including names this library does not know
 */

import {
  AmbiguousCurrencyError,
  InvalidAmountError,
  NegativeAmountError,
  PrecisionError,
  RequiredFieldUnknownError,
  UriSyntaxError,
} from '../errors';
import { AmountParseError, CoinAmount } from '../currencies/amount';
import type { CurrencyType } from '../currencies/types';
import { FIELD_AMOUNT, NAME_VALUE_SEPARATOR, REQUIRED_FIELD_PREFIX } from './constants';
import { decodeFieldValue } from './encoding';
import type { FieldStoreBuilder } from './fieldStore';

/**
 * Parse each token into `fields`
 *
 * @param currency - Currency the amount is read in; undefined when the URI has no address
 */
export function parseParameters(
  tokens: readonly string[],
  currency: CurrencyType | undefined,
  fields: FieldStoreBuilder
): void {
  for (const token of tokens) {
    const sepIndex = token.indexOf(NAME_VALUE_SEPARATOR);
    if (sepIndex === -1) {
      throw new UriSyntaxError(`Malformed payment URI - no separator in '${token}'`, { token });
    }
    if (sepIndex === 0) {
      throw new UriSyntaxError(`Malformed payment URI - empty name '${token}'`, { token });
    }

    const name = token.slice(0, sepIndex).toLowerCase();
    const rawValue = token.slice(sepIndex + 1);

    if (name === FIELD_AMOUNT) {
      fields.put(name, { kind: 'amount', value: parseAmountField(rawValue, currency) });
    } else if (name.startsWith(REQUIRED_FIELD_PREFIX)) {
      throw new RequiredFieldUnknownError(name);
    } else if (rawValue.length > 0) {
      fields.put(name, { kind: 'text', value: decodeFieldValue(rawValue) });
    }
  }
}

function parseAmountField(rawValue: string, currency: CurrencyType | undefined): CoinAmount {
  if (!currency) {
    throw new AmbiguousCurrencyError(FIELD_AMOUNT);
  }

  let amount: CoinAmount;
  try {
    amount = CoinAmount.parse(currency, rawValue);
  } catch (error) {
    if (error instanceof AmountParseError) {
      throw error.reason === 'too-precise'
        ? new PrecisionError(rawValue, currency.unitExponent)
        : new InvalidAmountError(rawValue);
    }
    throw error;
  }

  if (amount.isNegative()) {
    throw new NegativeAmountError(rawValue);
  }
  return amount;
}
