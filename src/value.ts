/**
 * Ordered JSON value model. Objects are member sequences rather than
 * dictionaries: keys may repeat and their order is part of the value.
 */

import { encodeUtf8 } from './utf8.js';

/** A decoded JSON document. */
export type Value = null | boolean | string | JsonNumber | Value[] | OrderedObject;

/**
 * A JSON number kept as its literal text, so that a decode/encode round trip
 * reproduces it exactly and the caller picks the precision.
 */
export class JsonNumber {
  constructor(readonly text: string) {}

  toNumber(): number {
    return Number(this.text);
  }

  /** Exact integer value; throws RangeError for a non-integral literal. */
  toBigInt(): bigint {
    if (!/^-?[0-9]+$/.test(this.text)) {
      throw new RangeError(`${this.text} is not an integer literal`);
    }
    return BigInt(this.text);
  }

  toString(): string {
    return this.text;
  }
}

export interface Member<V = Value> {
  key: string;
  value: V;
}

/**
 * Object as an ordered list of members. Host values of any kind may be
 * stored when the object is built for encoding; decoding produces
 * `OrderedObject<Value>`.
 */
export class OrderedObject<V = Value> implements Iterable<Member<V>> {
  private readonly members: Member<V>[] = [];

  constructor(members: Iterable<Member<V>> = []) {
    for (const m of members) this.members.push({ key: m.key, value: m.value });
  }

  static fromEntries<V>(entries: Iterable<readonly [string, V]>): OrderedObject<V> {
    const obj = new OrderedObject<V>();
    for (const [key, value] of entries) obj.append(key, value);
    return obj;
  }

  get length(): number {
    return this.members.length;
  }

  append(key: string, value: V): this {
    this.members.push({ key, value });
    return this;
  }

  at(index: number): Member<V> | undefined {
    return this.members[index];
  }

  /** Value of the first member named `key`. */
  get(key: string): V | undefined {
    return this.members.find((m) => m.key === key)?.value;
  }

  getAll(key: string): V[] {
    return this.members.filter((m) => m.key === key).map((m) => m.value);
  }

  has(key: string): boolean {
    return this.members.some((m) => m.key === key);
  }

  keys(): string[] {
    return this.members.map((m) => m.key);
  }

  toArray(): Member<V>[] {
    return this.members.map((m) => ({ key: m.key, value: m.value }));
  }

  [Symbol.iterator](): Iterator<Member<V>> {
    return this.members[Symbol.iterator]();
  }
}

/**
 * Bytes that already hold one JSON value. They are copied to the output
 * as they are (after validation and compaction) and never re-parsed into
 * the model. An empty RawValue encodes as `null`.
 */
export class RawValue {
  constructor(readonly bytes: Uint8Array) {}

  static from(text: string): RawValue {
    return new RawValue(encodeUtf8(text));
  }

  get length(): number {
    return this.bytes.length;
  }

  toString(): string {
    return new TextDecoder().decode(this.bytes);
  }
}

export function isJsonObject(v: Value): v is OrderedObject {
  return v instanceof OrderedObject;
}

export function isJsonArray(v: Value): v is Value[] {
  return Array.isArray(v);
}

export function isJsonString(v: Value): v is string {
  return typeof v === 'string';
}

export function isJsonNumber(v: Value): v is JsonNumber {
  return v instanceof JsonNumber;
}

export function isJsonBoolean(v: Value): v is boolean {
  return typeof v === 'boolean';
}

export function isJsonNull(v: Value): v is null {
  return v === null;
}

/**
 * Structural equality. Member order matters for objects just as element
 * order does for arrays; numbers are equal when their texts are.
 */
export function valueEquals(a: Value, b: Value): boolean {
  if (a === b) return true;
  if (a instanceof JsonNumber) return b instanceof JsonNumber && a.text === b.text;
  if (Array.isArray(a)) {
    if (!Array.isArray(b) || a.length !== b.length) return false;
    return a.every((item, i) => valueEquals(item, b[i]!));
  }
  if (a instanceof OrderedObject) {
    if (!(b instanceof OrderedObject) || a.length !== b.length) return false;
    for (let i = 0; i < a.length; i++) {
      const x = a.at(i)!;
      const y = b.at(i)!;
      if (x.key !== y.key || !valueEquals(x.value, y.value)) return false;
    }
    return true;
  }
  return false;
}

export type PlainValue = null | boolean | string | number | PlainValue[] | { [key: string]: PlainValue };

/**
 * Convert to plain JavaScript data. Duplicate keys collapse with the last
 * one winning and numbers become doubles, so this loses information.
 */
export function toPlain(v: Value): PlainValue {
  if (v instanceof JsonNumber) return v.toNumber();
  if (Array.isArray(v)) return v.map(toPlain);
  if (v instanceof OrderedObject) {
    return Object.fromEntries(v.toArray().map((m) => [m.key, toPlain(m.value)]));
  }
  return v;
}
