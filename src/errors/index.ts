/**
 * Error Module Exports
 */

import { PaymentUriError } from './PaymentUriError';

export {
  ErrorCodes,
  PaymentUriError,
  PaymentUriParseError,
  UriSyntaxError,
  UnsupportedSchemeError,
  InvalidAddressError,
  DuplicateFieldError,
  RequiredFieldUnknownError,
  InvalidAmountError,
  PrecisionError,
  NegativeAmountError,
  MissingDestinationError,
  AmbiguousCurrencyError,
  InvalidArgumentError,
  ConfigurationError,
} from './PaymentUriError';
export type { ErrorCode, PaymentUriErrorJson } from './PaymentUriError';

/**
 * Check whether a thrown value is one of this library's errors
 */
export const isPaymentUriError = PaymentUriError.isPaymentUriError;
