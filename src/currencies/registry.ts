/**
 * Currency Registry
 *
 * Central registry of the currencies payment URIs may name.
 *
 * Registration order matters: when several currencies share a URI scheme
 * (Bitcoin mainnet, testnet and regtest all use `bitcoin:`), the parser
 * tries them in the order they were registered and the first whose codec
 * accepts the address wins. Register the currency you want to prefer first.
 */

import { createLogger } from '../utils/logger';
import type { PaymentAddress } from './address';
import type { CurrencyType } from './types';

const log = createLogger('CURRENCIES:REGISTRY');

export interface CurrencyRegistryConfig {
  debug?: boolean;
}

/**
 * Scheme a currency's URIs are written with
 */
export function canonicalScheme(currency: CurrencyType): string {
  return currency.uriScheme;
}

/**
 * Currency Registry
 *
 * Manages registration and lookup of currencies by id and by URI scheme.
 */
class CurrencyRegistry {
  private currencies: Map<string, CurrencyType> = new Map();
  private config: CurrencyRegistryConfig;

  constructor(config: CurrencyRegistryConfig = {}) {
    this.config = config;
  }

  /**
   * Register a currency. It becomes the last candidate for its scheme.
   */
  register(currency: CurrencyType): void {
    if (this.currencies.has(currency.id)) {
      throw new Error(`Currency '${currency.id}' is already registered`);
    }

    this.currencies.set(currency.id, currency);

    if (this.config.debug) {
      log.debug('Registered currency', {
        id: currency.id,
        scheme: currency.uriScheme,
        position: this.currencies.size,
      });
    }
  }

  /**
   * Unregister a currency by ID
   */
  unregister(id: string): boolean {
    return this.currencies.delete(id);
  }

  get(id: string): CurrencyType | undefined {
    return this.currencies.get(id);
  }

  /**
   * All registered currencies in registration order
   */
  getAll(): CurrencyType[] {
    return Array.from(this.currencies.values());
  }

  getIds(): string[] {
    return Array.from(this.currencies.keys());
  }

  has(id: string): boolean {
    return this.currencies.has(id);
  }

  /**
   * Currencies claiming `scheme` (compared case-insensitively), in
   * registration order. An empty list means the scheme is unknown.
   */
  resolveSchemeCandidates(scheme: string): readonly CurrencyType[] {
    const wanted = scheme.toLowerCase();
    return this.getAll().filter((currency) => currency.uriScheme.toLowerCase() === wanted);
  }

  canonicalScheme(currency: CurrencyType): string {
    return canonicalScheme(currency);
  }

  /**
   * Validate `token` as an address of `currency` using the currency's codec
   */
  decodeAddress(currency: CurrencyType, token: string): PaymentAddress | null {
    return currency.addressCodec.decode(currency, token);
  }

  get count(): number {
    return this.currencies.size;
  }
}

export { CurrencyRegistry };
