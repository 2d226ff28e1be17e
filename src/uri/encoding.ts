/**
 * Free-text field encoding
 *
 * Values are written with form percent-encoding: every UTF-8 byte outside
 * `A-Z a-z 0-9 - _ . *` is escaped, and a space is always `%20`, never `+`.
 * On the way in, `+` is read as a space before percent-decoding.
 */

import { UriSyntaxError } from '../errors';

// encodeURIComponent leaves these alone; form encoding escapes them
const EXTRA_RESERVED = /[!'()~]/g;

const escapeCharacter = (char: string): string =>
  `%${char.charCodeAt(0).toString(16).toUpperCase()}`;

export function encodeFieldValue(value: string): string {
  return encodeURIComponent(value).replace(EXTRA_RESERVED, escapeCharacter);
}

/**
 * @throws UriSyntaxError when the escapes do not decode as UTF-8
 */
export function decodeFieldValue(raw: string): string {
  try {
    return decodeURIComponent(raw.replace(/\+/g, ' '));
  } catch (error) {
    if (error instanceof URIError) {
      throw new UriSyntaxError(`Malformed percent-encoding in '${raw}'`, { value: raw });
    }
    throw error;
  }
}
