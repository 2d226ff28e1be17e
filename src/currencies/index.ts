/**
 * Currency Module
 *
 * Exports the registry and the built-in currencies, and builds the
 * default registry from configuration.
 */

import { getConfig } from '../config';
import type { PaymentUriConfig } from '../config';
import { BUILTIN_CURRENCIES } from './builtin';
import { CurrencyRegistry } from './registry';

export { CurrencyRegistry, canonicalScheme } from './registry';
export type { CurrencyRegistryConfig } from './registry';
export { PaymentAddress } from './address';
export { CoinAmount, AmountParseError, formatAmount } from './amount';
export type { AmountParseFailure } from './amount';
export { BitcoinAddressCodec, litecoinNetwork, parkbyteTestNetwork } from './bitcoinCodec';
export { BUILTIN_CURRENCIES } from './builtin';
export type { AddressCodec, CurrencyType } from './types';

/**
 * Registry holding the configured built-in currencies, in configured order
 */
export function createDefaultRegistry(config: PaymentUriConfig = getConfig()): CurrencyRegistry {
  const registry = new CurrencyRegistry({ debug: true });
  for (const id of config.currencies) {
    registry.register(BUILTIN_CURRENCIES[id]);
  }
  return registry;
}

let sharedRegistry: CurrencyRegistry | null = null;

/**
 * Registry used when a caller does not pass one. Built on first use.
 */
export function defaultRegistry(): CurrencyRegistry {
  if (!sharedRegistry) {
    sharedRegistry = createDefaultRegistry();
  }
  return sharedRegistry;
}
