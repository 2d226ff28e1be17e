import { describe, it, expect } from 'vitest';
import { checkUriSyntax, resolveAddress, splitPaymentUri } from '../../../src/uri/splitter';
import { CurrencyRegistry } from '../../../src/currencies/registry';
import {
  InvalidAddressError,
  UnsupportedSchemeError,
  UriSyntaxError,
} from '../../../src/errors';
import { fakeCurrency } from '../../fixtures/currencies';

const coinA = fakeCurrency('coin-a', 'coin', /^a/);
const coinB = fakeCurrency('coin-b', 'coin', /^b/);
const other = fakeCurrency('other', 'other', /^o/);

function buildRegistry(): CurrencyRegistry {
  const registry = new CurrencyRegistry();
  registry.register(coinA);
  registry.register(coinB);
  registry.register(other);
  return registry;
}

describe('checkUriSyntax', () => {
  it('returns the scheme', () => {
    expect(checkUriSyntax('coin:abc')).toBe('coin');
    expect(checkUriSyntax('web+coin.x-1://abc')).toBe('web+coin.x-1');
  });

  it('rejects input without a scheme', () => {
    expect(() => checkUriSyntax('abc')).toThrow('Unrecognisable URI format: abc');
    expect(() => checkUriSyntax('1coin:abc')).toThrow(UriSyntaxError);
    expect(() => checkUriSyntax(':abc')).toThrow(UriSyntaxError);
  });

  it.each([
    ['a space', 'coin:abc?label=a b'],
    ['a tab', 'coin:abc\t'],
    ['a newline', 'coin:abc\n'],
    ['a double quote', 'coin:abc?label="x"'],
    ['an angle bracket', 'coin:<abc>'],
    ['a pipe', 'coin:abc|def'],
  ])('rejects %s', (_what, input) => {
    expect(() => checkUriSyntax(input)).toThrow(UriSyntaxError);
  });

  it('reports the index of the illegal character', () => {
    expect(() => checkUriSyntax('coin:ab c')).toThrow('Bad URI syntax: illegal character at index 7');
  });

  it('rejects malformed percent escapes', () => {
    expect(() => checkUriSyntax('coin:abc?label=100%')).toThrow(
      'Bad URI syntax: malformed escape at index 18'
    );
    expect(() => checkUriSyntax('coin:abc?label=%zz')).toThrow(UriSyntaxError);
  });

  it('accepts non-ASCII text', () => {
    expect(checkUriSyntax('coin:abc?label=café')).toBe('coin');
  });
});

describe('splitPaymentUri', () => {
  const registry = buildRegistry();

  it('separates address and query tokens', () => {
    expect(splitPaymentUri('coin:abc?x=1&y=2', registry)).toEqual({
      scheme: 'coin',
      candidates: [coinA, coinB],
      addressToken: 'abc',
      queryTokens: ['x=1', 'y=2'],
    });
  });

  it('accepts the scheme:// form', () => {
    expect(splitPaymentUri('coin://abc', registry).addressToken).toBe('abc');
  });

  it('returns no query tokens for an address-only URI', () => {
    expect(splitPaymentUri('coin:abc', registry).queryTokens).toEqual([]);
    expect(splitPaymentUri('coin:abc?', registry).queryTokens).toEqual([]);
  });

  it('drops trailing empty tokens but keeps inner ones', () => {
    expect(splitPaymentUri('coin:abc?x=1&&', registry).queryTokens).toEqual(['x=1']);
    expect(splitPaymentUri('coin:abc?x=1&&y=2', registry).queryTokens).toEqual(['x=1', '', 'y=2']);
  });

  it('allows an empty address', () => {
    const split = splitPaymentUri('coin:?r=x', registry);

    expect(split.addressToken).toBe('');
    expect(split.queryTokens).toEqual(['r=x']);
  });

  it('does not decode escaped separators', () => {
    expect(splitPaymentUri('coin:abc?label=Tom%20%26%20Jerry', registry).queryTokens).toEqual([
      'label=Tom%20%26%20Jerry',
    ]);
  });

  it('rejects more than one question mark', () => {
    expect(() => splitPaymentUri('coin:abc?a=1?b=2', registry)).toThrow(UriSyntaxError);
    expect(() => splitPaymentUri('coin:abc??', registry)).toThrow(
      "Too many question marks in URI 'coin:abc??'"
    );
  });

  it('rejects schemes no currency claims', () => {
    expect(() => splitPaymentUri('ethereum:0xabc', registry)).toThrow(
      new UnsupportedSchemeError('ethereum')
    );
  });

  it('strips the scheme case-sensitively', () => {
    expect(() => splitPaymentUri('COIN:abc', registry)).toThrow('Unsupported URI scheme: COIN');
  });

  it('uses only the supplied currency when one is given', () => {
    const split = splitPaymentUri('other:oak', registry, other);

    expect(split.candidates).toEqual([other]);
    expect(split.addressToken).toBe('oak');
  });

  it("rejects input whose scheme is not the supplied currency's", () => {
    expect(() => splitPaymentUri('coin:abc', registry, other)).toThrow(
      'Unsupported URI scheme: coin'
    );
  });
});

describe('resolveAddress', () => {
  const registry = buildRegistry();

  it('binds the address to the first candidate that accepts it', () => {
    const address = resolveAddress('b42', [coinA, coinB], registry);

    expect(address.currency).toBe(coinB);
    expect(address.value).toBe('b42');
  });

  it('stops at the first match even when later candidates also accept', () => {
    const lenient = fakeCurrency('lenient', 'coin', /.*/);

    expect(resolveAddress('a1', [coinA, lenient], registry).currency).toBe(coinA);
    expect(resolveAddress('a1', [lenient, coinA], registry).currency).toBe(lenient);
  });

  it('fails when no candidate accepts the token', () => {
    try {
      resolveAddress('zzz', [coinA, coinB], registry);
      expect.unreachable('expected InvalidAddressError');
    } catch (error) {
      if (!(error instanceof InvalidAddressError)) throw error;
      expect(error.message).toBe('Bad address: zzz');
      expect(error.details).toEqual({ address: 'zzz', candidates: ['coin-a', 'coin-b'] });
    }
  });
});
