/**
 * payment-uri
 *
 * Parse and build BIP21-style cryptocurrency payment URIs.
 *
 * ```typescript
 * import { PaymentUri } from 'payment-uri';
 *
 * const uri = PaymentUri.parse('bitcoin:1BvBMSEYstWetqTFn5Au4m4GFg7xJaNVN2?amount=0.1');
 * uri.amount()?.units; // 10000000n
 * ```
 */

// Payment URIs
export * from './uri';

// Currencies
export {
  CurrencyRegistry,
  canonicalScheme,
  PaymentAddress,
  CoinAmount,
  AmountParseError,
  formatAmount,
  BitcoinAddressCodec,
  litecoinNetwork,
  parkbyteTestNetwork,
  BUILTIN_CURRENCIES,
  createDefaultRegistry,
  defaultRegistry,
} from './currencies';
export type {
  AddressCodec,
  AmountParseFailure,
  CurrencyRegistryConfig,
  CurrencyType,
} from './currencies';

// Errors
export * from './errors';

// Configuration
export { loadConfig, getConfig, resetConfig, BUILTIN_CURRENCY_IDS } from './config';
export type { BuiltinCurrencyId, PaymentUriConfig, EnvSource } from './config';

// Logging
export { createLogger, setLogLevel, getConfiguredLogLevel, LogLevel } from './utils/logger';
export type { Logger } from './utils/logger';
