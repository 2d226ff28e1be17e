/**
 * Configuration Validation Schema
 *
 * Zod schemas for runtime validation of library configuration.
 * Provides detailed error messages when configuration is invalid.
 */

import { z } from 'zod';

// =============================================================================
// Basic Type Schemas
// =============================================================================

export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug', 'trace']);

/**
 * Ids of the currencies shipped with the library, in their default
 * resolution order.
 */
export const BUILTIN_CURRENCY_IDS = [
  'bitcoin',
  'bitcoin-testnet',
  'bitcoin-regtest',
  'litecoin',
  'parkbyte-test',
] as const;

export const CurrencyIdSchema = z.enum(BUILTIN_CURRENCY_IDS);

export type BuiltinCurrencyId = z.infer<typeof CurrencyIdSchema>;

// =============================================================================
// Config Schema
// =============================================================================

export const PaymentUriConfigSchema = z.object({
  logLevel: LogLevelSchema,
  // Order is the candidate order for schemes shared by several currencies
  currencies: z
    .array(CurrencyIdSchema)
    .min(1, 'at least one currency must be enabled')
    .refine((ids) => new Set(ids).size === ids.length, 'currency ids must be unique'),
});

export type PaymentUriConfig = z.infer<typeof PaymentUriConfigSchema>;

// =============================================================================
// Validation Functions
// =============================================================================

export type ConfigValidationResult =
  | { success: true; config: PaymentUriConfig; errors: [] }
  | { success: false; errors: string[] };

/**
 * Validate configuration and return detailed errors
 */
export function validateConfigSchema(config: unknown): ConfigValidationResult {
  const result = PaymentUriConfigSchema.safeParse(config);

  if (result.success) {
    return { success: true, config: result.data, errors: [] };
  }

  // Format Zod errors into readable messages
  const errors = result.error.issues.map((issue: z.ZodIssue) => {
    const path = issue.path.join('.');
    return `${path}: ${issue.message}`;
  });

  return { success: false, errors };
}
