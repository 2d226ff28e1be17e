import { describe, it, expect } from 'vitest';
import { decodeFieldValue, encodeFieldValue } from '../../../src/uri/encoding';
import { UriSyntaxError } from '../../../src/errors';

describe('encodeFieldValue', () => {
  it('encodes spaces as %20, never +', () => {
    expect(encodeFieldValue('Tom & Jerry')).toBe('Tom%20%26%20Jerry');
  });

  it('escapes a literal plus', () => {
    expect(encodeFieldValue('a+b')).toBe('a%2Bb');
  });

  it('escapes the characters form encoding reserves', () => {
    expect(encodeFieldValue("100% (net)!~'")).toBe('100%25%20%28net%29%21%7E%27');
  });

  it('leaves unreserved characters alone', () => {
    expect(encodeFieldValue('Aa0-_.*')).toBe('Aa0-_.*');
  });

  it('encodes UTF-8 bytes', () => {
    expect(encodeFieldValue('café')).toBe('caf%C3%A9');
    expect(encodeFieldValue('₿')).toBe('%E2%82%BF');
  });
});

describe('decodeFieldValue', () => {
  it('decodes percent escapes', () => {
    expect(decodeFieldValue('Tom%20%26%20Jerry')).toBe('Tom & Jerry');
    expect(decodeFieldValue('caf%C3%A9')).toBe('café');
  });

  it('reads + as a space and %2B as a plus', () => {
    expect(decodeFieldValue('a+b%2Bc')).toBe('a b+c');
  });

  it('rejects escapes that do not form UTF-8', () => {
    expect(() => decodeFieldValue('%C3')).toThrow(UriSyntaxError);
  });
});
