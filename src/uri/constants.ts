/**
 * Payment URI field names and separators
 */

export const FIELD_ADDRESS = 'address';
export const FIELD_AMOUNT = 'amount';
export const FIELD_LABEL = 'label';
export const FIELD_MESSAGE = 'message';
export const FIELD_PAYMENT_REQUEST_URL = 'r';

/** Names with this prefix must be understood or the URI is rejected */
export const REQUIRED_FIELD_PREFIX = 'req-';

export const QUERY_SEPARATOR = '?';
export const PAIR_SEPARATOR = '&';
export const NAME_VALUE_SEPARATOR = '=';
