/**
 * Canonical Builder
 *
 * Produces the one canonical string for an address, amount, label and
 * message: `<scheme>:<address>?amount=…&label=…&message=…`, fields in that
 * order, empty ones left out.
 */

import { InvalidArgumentError } from '../errors';
import type { PaymentAddress } from '../currencies/address';
import { formatAmount } from '../currencies/amount';
import type { CoinAmount } from '../currencies/amount';
import { canonicalScheme } from '../currencies/registry';
import {
  FIELD_AMOUNT,
  FIELD_LABEL,
  FIELD_MESSAGE,
  NAME_VALUE_SEPARATOR,
  PAIR_SEPARATOR,
  QUERY_SEPARATOR,
} from './constants';
import { encodeFieldValue } from './encoding';

/**
 * @throws InvalidArgumentError for a negative amount, or an amount of another currency
 */
export function buildPaymentUri(
  address: PaymentAddress,
  amount?: CoinAmount | null,
  label?: string | null,
  message?: string | null
): string {
  const currency = address.currency;

  if (amount && amount.isNegative()) {
    throw new InvalidArgumentError('Amount must not be negative', {
      amount: amount.toPlainString(),
    });
  }
  if (amount && amount.currency.id !== currency.id) {
    throw new InvalidArgumentError(
      `Amount is in ${amount.currency.id} but the address is for ${currency.id}`,
      { amountCurrency: amount.currency.id, addressCurrency: currency.id }
    );
  }

  const pairs: string[] = [];
  if (amount) {
    pairs.push(FIELD_AMOUNT + NAME_VALUE_SEPARATOR + formatAmount(currency, amount));
  }
  if (label) {
    pairs.push(FIELD_LABEL + NAME_VALUE_SEPARATOR + encodeFieldValue(label));
  }
  if (message) {
    pairs.push(FIELD_MESSAGE + NAME_VALUE_SEPARATOR + encodeFieldValue(message));
  }

  const base = `${canonicalScheme(currency)}:${address.value}`;
  return pairs.length > 0 ? base + QUERY_SEPARATOR + pairs.join(PAIR_SEPARATOR) : base;
}
