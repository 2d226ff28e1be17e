import { describe, it, expect } from 'vitest';
import { FieldStoreBuilder, fieldValue } from '../../../src/uri/fieldStore';
import { DuplicateFieldError } from '../../../src/errors';
import { CoinAmount } from '../../../src/currencies/amount';
import { BUILTIN_CURRENCIES } from '../../../src/currencies/builtin';

describe('FieldStoreBuilder', () => {
  it('keeps fields in insertion order', () => {
    const fields = new FieldStoreBuilder()
      .put('message', { kind: 'text', value: 'm' })
      .put('label', { kind: 'text', value: 'l' })
      .seal();

    expect(Array.from(fields.keys())).toEqual(['message', 'label']);
  });

  it('rejects a name that is already present', () => {
    const builder = new FieldStoreBuilder().put('label', { kind: 'text', value: 'a' });

    expect(() => builder.put('label', { kind: 'text', value: 'a' })).toThrow(DuplicateFieldError);
  });

  it('refuses fields after sealing', () => {
    const builder = new FieldStoreBuilder();
    builder.seal();

    expect(() => builder.put('label', { kind: 'text', value: 'a' })).toThrow(
      'Field store is sealed'
    );
  });

  it('seals into a frozen map without mutators', () => {
    const builder = new FieldStoreBuilder().put('label', { kind: 'text', value: 'a' });
    const fields = builder.seal();

    expect(Object.isFrozen(fields)).toBe(true);
    expect('set' in fields).toBe(false);
    expect('delete' in fields).toBe(false);
    expect('clear' in fields).toBe(false);
    expect(fields.size).toBe(1);
    expect(fields.has('label')).toBe(true);
    expect(Array.from(fields)).toEqual([['label', { kind: 'text', value: 'a' }]]);
  });

  it('visits every field with forEach', () => {
    const fields = new FieldStoreBuilder()
      .put('label', { kind: 'text', value: 'a' })
      .put('message', { kind: 'text', value: 'b' })
      .seal();
    const seen: string[] = [];

    fields.forEach((field, name, map) => {
      seen.push(`${name}:${field.value}`);
      expect(map).toBe(fields);
    });

    expect(seen).toEqual(['label:a', 'message:b']);
  });

  it('freezes stored fields', () => {
    const fields = new FieldStoreBuilder().put('label', { kind: 'text', value: 'a' }).seal();

    expect(Object.isFrozen(fields.get('label'))).toBe(true);
  });
});

describe('fieldValue', () => {
  const amount = CoinAmount.fromUnits(BUILTIN_CURRENCIES.bitcoin, 5n);
  const fields = new FieldStoreBuilder()
    .put('amount', { kind: 'amount', value: amount })
    .put('address', { kind: 'text', value: 'opaque' })
    .seal();

  it('returns the value when the kind matches', () => {
    expect(fieldValue(fields, 'amount', 'amount')).toBe(amount);
  });

  it('returns undefined for a different kind or a missing name', () => {
    expect(fieldValue(fields, 'address', 'address')).toBeUndefined();
    expect(fieldValue(fields, 'amount', 'text')).toBeUndefined();
    expect(fieldValue(fields, 'label', 'text')).toBeUndefined();
  });
});
