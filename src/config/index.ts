/**
 * Library Configuration
 *
 * Reads the environment variables the library understands and validates
 * them against the zod schema:
 *
 *   LOG_LEVEL               error | warn | info | debug | trace (default: info)
 *   PAYMENT_URI_CURRENCIES  comma-separated currency ids, in resolution order
 *                           (default: every built-in currency)
 */

import { ConfigurationError } from '../errors';
import { BUILTIN_CURRENCY_IDS, validateConfigSchema } from './schema';
import type { PaymentUriConfig } from './schema';

export { BUILTIN_CURRENCY_IDS, PaymentUriConfigSchema, validateConfigSchema } from './schema';
export type { BuiltinCurrencyId, PaymentUriConfig, ConfigValidationResult } from './schema';

export type EnvSource = Record<string, string | undefined>;

/**
 * Parse a comma-separated list, dropping blanks
 */
function parseList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * Build and validate a configuration from environment variables
 *
 * @throws ConfigurationError listing every invalid setting
 */
export function loadConfig(env: EnvSource): PaymentUriConfig {
  const raw = {
    logLevel: env.LOG_LEVEL?.trim().toLowerCase() || 'info',
    currencies: env.PAYMENT_URI_CURRENCIES
      ? parseList(env.PAYMENT_URI_CURRENCIES)
      : [...BUILTIN_CURRENCY_IDS],
  };

  const result = validateConfigSchema(raw);
  if (!result.success) {
    throw new ConfigurationError(result.errors);
  }
  return result.config;
}

let cachedConfig: PaymentUriConfig | null = null;

/**
 * Configuration from process.env, validated once and cached
 */
export function getConfig(): PaymentUriConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig(process.env);
  }
  return cachedConfig;
}

/**
 * Drop the cached configuration so the next getConfig() re-reads the environment
 */
export function resetConfig(): void {
  cachedConfig = null;
}
