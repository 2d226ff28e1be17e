/**
 * Payment URI Error Class Hierarchy
 *
 * Every failure the parser or builder can report is one of the classes
 * below. Each carries a machine-readable `code` and, where one exists,
 * the offending token in `details`. Messages are written for end users
 * and can be shown verbatim.
 *
 * ## Usage
 *
 * ```typescript
 * try {
 *   PaymentUri.parse(input);
 * } catch (error) {
 *   if (isPaymentUriError(error)) {
 *     showToUser(error.message);
 *   }
 *   throw error;
 * }
 * ```
 */

/**
 * Serialized error structure
 */
export interface PaymentUriErrorJson {
  error: string;
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * Error codes for machine-readable error identification
 */
export const ErrorCodes = {
  // Parse errors
  SYNTAX_ERROR: 'SYNTAX_ERROR',
  UNSUPPORTED_SCHEME: 'UNSUPPORTED_SCHEME',
  INVALID_ADDRESS: 'INVALID_ADDRESS',
  DUPLICATE_FIELD: 'DUPLICATE_FIELD',
  REQUIRED_FIELD_UNKNOWN: 'REQUIRED_FIELD_UNKNOWN',
  INVALID_AMOUNT: 'INVALID_AMOUNT',
  AMOUNT_PRECISION: 'AMOUNT_PRECISION',
  NEGATIVE_AMOUNT: 'NEGATIVE_AMOUNT',
  MISSING_DESTINATION: 'MISSING_DESTINATION',
  AMBIGUOUS_CURRENCY: 'AMBIGUOUS_CURRENCY',

  // Build errors
  INVALID_ARGUMENT: 'INVALID_ARGUMENT',

  // Setup errors
  INVALID_CONFIG: 'INVALID_CONFIG',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Base error class
 *
 * All payment URI errors extend this class so callers can tell them
 * apart from programming errors with a single check.
 */
export class PaymentUriError extends Error {
  readonly code: ErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(message: string, code: ErrorCode, details?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.details = details;

    // Maintain proper stack trace for V8
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to a plain serializable object
   */
  toJSON(): PaymentUriErrorJson {
    return {
      error: this.name.replace('Error', ''),
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }

  static isPaymentUriError(error: unknown): error is PaymentUriError {
    return error instanceof PaymentUriError;
  }
}

// =============================================================================
// Parse Errors
// =============================================================================

/**
 * Raised for any input that is not a valid payment URI. Parsing is
 * all-or-nothing: no partial result accompanies this error.
 */
export class PaymentUriParseError extends PaymentUriError {}

export class UriSyntaxError extends PaymentUriParseError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.SYNTAX_ERROR, details);
  }
}

export class UnsupportedSchemeError extends PaymentUriParseError {
  constructor(scheme: string) {
    super(`Unsupported URI scheme: ${scheme}`, ErrorCodes.UNSUPPORTED_SCHEME, { scheme });
  }
}

export class InvalidAddressError extends PaymentUriParseError {
  constructor(address: string, candidates: readonly string[]) {
    super(`Bad address: ${address}`, ErrorCodes.INVALID_ADDRESS, { address, candidates });
  }
}

export class DuplicateFieldError extends PaymentUriParseError {
  constructor(field: string) {
    super(`'${field}' is duplicated, URI is invalid`, ErrorCodes.DUPLICATE_FIELD, { field });
  }
}

export class RequiredFieldUnknownError extends PaymentUriParseError {
  constructor(field: string) {
    super(
      `'${field}' is required but not known, this URI is not valid`,
      ErrorCodes.REQUIRED_FIELD_UNKNOWN,
      { field }
    );
  }
}

export class InvalidAmountError extends PaymentUriParseError {
  constructor(value: string) {
    super(`'${value}' is not a valid amount`, ErrorCodes.INVALID_AMOUNT, { value });
  }
}

export class PrecisionError extends PaymentUriParseError {
  constructor(value: string, maxDecimals: number) {
    super(`'${value}' has too many decimal places`, ErrorCodes.AMOUNT_PRECISION, {
      value,
      maxDecimals,
    });
  }
}

export class NegativeAmountError extends PaymentUriParseError {
  constructor(value: string) {
    super(`'${value}' Negative coins specified`, ErrorCodes.NEGATIVE_AMOUNT, { value });
  }
}

export class MissingDestinationError extends PaymentUriParseError {
  constructor() {
    super('No address and no r= parameter found', ErrorCodes.MISSING_DESTINATION);
  }
}

export class AmbiguousCurrencyError extends PaymentUriParseError {
  constructor(field: string) {
    super(
      `Cannot read '${field}' without an address or an explicit currency`,
      ErrorCodes.AMBIGUOUS_CURRENCY,
      { field }
    );
  }
}

// =============================================================================
// Build Errors
// =============================================================================

export class InvalidArgumentError extends PaymentUriError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.INVALID_ARGUMENT, details);
  }
}

// =============================================================================
// Setup Errors
// =============================================================================

export class ConfigurationError extends PaymentUriError {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Configuration validation failed: ${issues.join('; ')}`, ErrorCodes.INVALID_CONFIG, {
      issues,
    });
    this.issues = issues;
  }
}
