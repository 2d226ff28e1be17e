/**
 * Payment URI Module Exports
 */

export { PaymentUri, parsePaymentUri, safeParsePaymentUri } from './PaymentUri';
export type { ParseOptions, SafeParseResult } from './PaymentUri';
export { buildPaymentUri } from './builder';
export { encodeFieldValue, decodeFieldValue } from './encoding';
export type { PaymentUriField, PaymentUriFieldKind } from './fieldStore';
export * from './constants';
