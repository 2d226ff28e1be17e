/**
 * Scheme & Address Splitter
 *
 * Checks the raw input is a URI, finds the candidate currencies for its
 * scheme, strips the scheme prefix and separates the address token from
 * the query tokens. Nothing here is URL-decoded: `%26` inside a label must
 * not be mistaken for a pair separator.
 */

import { InvalidAddressError, UnsupportedSchemeError, UriSyntaxError } from '../errors';
import type { PaymentAddress } from '../currencies/address';
import type { CurrencyRegistry } from '../currencies/registry';
import type { CurrencyType } from '../currencies/types';
import { createLogger } from '../utils/logger';
import { PAIR_SEPARATOR, QUERY_SEPARATOR } from './constants';

const log = createLogger('URI:SPLITTER');

const SCHEME_PATTERN = /^([A-Za-z][A-Za-z0-9+.-]*):/;
const ILLEGAL_CHARACTER = /[\s\u0000-\u001f\u007f"<>\\^`{|}]/;
const MALFORMED_ESCAPE = /%(?![0-9A-Fa-f]{2})/;

export interface SplitPaymentUri {
  /** Scheme as written in the input */
  scheme: string;
  /** Currencies to try for the address, in resolution order */
  candidates: readonly CurrencyType[];
  /** May be empty when the URI relies on a payment-request URL */
  addressToken: string;
  /** Raw `name=value` tokens */
  queryTokens: string[];
}

/**
 * Reject anything that is not a syntactically valid URI and return its scheme
 *
 * @throws UriSyntaxError
 */
export function checkUriSyntax(input: string): string {
  const match = SCHEME_PATTERN.exec(input);
  if (!match) {
    throw new UriSyntaxError(`Unrecognisable URI format: ${input}`, { input });
  }

  const illegal = ILLEGAL_CHARACTER.exec(input);
  if (illegal) {
    throw new UriSyntaxError(`Bad URI syntax: illegal character at index ${illegal.index}`, {
      input,
      index: illegal.index,
    });
  }

  const escape = MALFORMED_ESCAPE.exec(input);
  if (escape) {
    throw new UriSyntaxError(`Bad URI syntax: malformed escape at index ${escape.index}`, {
      input,
      index: escape.index,
    });
  }

  return match[1];
}

/**
 * Split `input` into scheme, candidates, address token and query tokens
 *
 * @param currency - When given, the only candidate; its scheme must prefix the input
 */
export function splitPaymentUri(
  input: string,
  registry: CurrencyRegistry,
  currency?: CurrencyType
): SplitPaymentUri {
  const scheme = checkUriSyntax(input);

  const candidates = currency ? [currency] : registry.resolveSchemeCandidates(scheme);
  if (candidates.length === 0) {
    throw new UnsupportedSchemeError(scheme);
  }

  const remainder = stripScheme(input, registry.canonicalScheme(candidates[0]));
  if (remainder === null) {
    throw new UnsupportedSchemeError(scheme);
  }

  const parts = remainder.split(QUERY_SEPARATOR);
  if (parts.length > 2) {
    throw new UriSyntaxError(`Too many question marks in URI '${input}'`, { input });
  }

  const [addressToken, query = ''] = parts;
  return { scheme, candidates, addressToken, queryTokens: splitQuery(query) };
}

/**
 * Remove `scheme://` or `scheme:` (case-sensitive, in that order).
 * Returns null when neither prefixes the input.
 */
function stripScheme(input: string, scheme: string): string | null {
  for (const prefix of [`${scheme}://`, `${scheme}:`]) {
    if (input.startsWith(prefix)) {
      return input.slice(prefix.length);
    }
  }
  return null;
}

/**
 * Split the query into pair tokens. Trailing empty tokens are dropped, so
 * `addr?` and `addr?amount=1&` carry no empty pair.
 */
function splitQuery(query: string): string[] {
  if (query.length === 0) {
    return [];
  }
  const tokens = query.split(PAIR_SEPARATOR);
  while (tokens.length > 0 && tokens[tokens.length - 1] === '') {
    tokens.pop();
  }
  return tokens;
}

/**
 * Decode `token` under each candidate in order and return the first match.
 *
 * KNOWN AMBIGUITY: this is first-match-wins, not an ambiguity check. When
 * two registered currencies share a scheme and both accept the same
 * address string, the one registered first is chosen silently and the
 * other is never tried. Funds could go to the wrong chain if registration
 * order does not reflect the caller's intent.
 *
 * @throws InvalidAddressError when no candidate accepts the token
 */
export function resolveAddress(
  token: string,
  candidates: readonly CurrencyType[],
  registry: CurrencyRegistry
): PaymentAddress {
  for (const candidate of candidates) {
    const address = registry.decodeAddress(candidate, token);
    if (address) {
      log.debug('Resolved address currency', {
        currency: candidate.id,
        candidates: candidates.map((c) => c.id),
      });
      return address;
    }
  }

  throw new InvalidAddressError(
    token,
    candidates.map((c) => c.id)
  );
}
