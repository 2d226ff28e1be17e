/**
 * Field Store
 *
 * Parsed fields are accumulated in a FieldStoreBuilder, which rejects a
 * name seen before, then sealed into the frozen read-only map a PaymentUri
 * holds.
 */

import { DuplicateFieldError } from '../errors';
import type { CoinAmount } from '../currencies/amount';
import type { PaymentAddress } from '../currencies/address';

export type PaymentUriField =
  | { readonly kind: 'address'; readonly value: PaymentAddress }
  | { readonly kind: 'amount'; readonly value: CoinAmount }
  | { readonly kind: 'text'; readonly value: string };

export type PaymentUriFieldKind = PaymentUriField['kind'];

export type FieldMap = ReadonlyMap<string, PaymentUriField>;

export class FieldStoreBuilder {
  private readonly entries = new Map<string, PaymentUriField>();
  private sealed = false;

  /**
   * Add a field. A repeated name fails even when the values are equal.
   *
   * @throws DuplicateFieldError
   */
  put(name: string, field: PaymentUriField): this {
    if (this.sealed) {
      throw new Error('Field store is sealed');
    }
    if (this.entries.has(name)) {
      throw new DuplicateFieldError(name);
    }
    this.entries.set(name, Object.freeze(field));
    return this;
  }

  /**
   * Finish accumulation. The builder accepts no further fields.
   */
  seal(): FieldMap {
    this.sealed = true;
    return new SealedFieldMap(new Map(this.entries));
  }
}

/**
 * Read-only view over a private copy of the fields. Exposes no mutators.
 */
class SealedFieldMap implements FieldMap {
  private readonly entriesByName: Map<string, PaymentUriField>;

  constructor(entries: Map<string, PaymentUriField>) {
    this.entriesByName = entries;
    Object.freeze(this);
  }

  get size(): number {
    return this.entriesByName.size;
  }

  get(name: string): PaymentUriField | undefined {
    return this.entriesByName.get(name);
  }

  has(name: string): boolean {
    return this.entriesByName.has(name);
  }

  forEach(
    callback: (field: PaymentUriField, name: string, map: FieldMap) => void,
    thisArg?: unknown
  ): void {
    this.entriesByName.forEach((field, name) => callback.call(thisArg, field, name, this));
  }

  keys() {
    return this.entriesByName.keys();
  }

  values() {
    return this.entriesByName.values();
  }

  entries() {
    return this.entriesByName.entries();
  }

  [Symbol.iterator]() {
    return this.entriesByName[Symbol.iterator]();
  }
}

/**
 * Value of a field when it has the expected kind
 */
export function fieldValue<K extends PaymentUriFieldKind>(
  fields: FieldMap,
  name: string,
  kind: K
): Extract<PaymentUriField, { kind: K }>['value'] | undefined {
  const field = fields.get(name);
  if (field === undefined || !isKind(field, kind)) {
    return undefined;
  }
  return field.value;
}

function isKind<K extends PaymentUriFieldKind>(
  field: PaymentUriField,
  kind: K
): field is Extract<PaymentUriField, { kind: K }> {
  return field.kind === kind;
}
