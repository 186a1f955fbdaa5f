/**
 * Recursive-descent JSON parser. Builds the ordered value model, keeping
 * duplicate keys and member order exactly as they appear in the input.
 */

import { JsonSyntaxError } from './errors.js';
import { Byte, Scanner, type ScanOptions } from './scanner.js';
import { encodeUtf8 } from './utf8.js';
import { JsonNumber, OrderedObject, type Value } from './value.js';

export interface ParseOptions extends ScanOptions {
  /** Max nesting depth (default 10000) */
  maxDepth?: number;
}

export const DEFAULT_MAX_DEPTH = 10000;

export function toBytes(data: Uint8Array | string): Uint8Array {
  return typeof data === 'string' ? encodeUtf8(data) : data;
}

/**
 * Decode one JSON document into the value model. Anything but whitespace
 * after the value is an error.
 */
export function decode(data: Uint8Array | string, options: ParseOptions = {}): Value {
  const p = new Parser(toBytes(data), options);
  p.skipWhitespace();
  const value = p.parseValue(0);
  p.expectEnd();
  return value;
}

/** Report whether `data` holds exactly one well-formed JSON value. */
export function valid(data: Uint8Array | string): boolean {
  try {
    checkValid(toBytes(data));
    return true;
  } catch (err) {
    if (err instanceof JsonSyntaxError) return false;
    throw err;
  }
}

/** Throw the first syntax error in `data`, if there is one. */
export function checkValid(data: Uint8Array, options: ParseOptions = {}): void {
  const p = new Parser(data, options);
  p.skipWhitespace();
  p.skipValue(0);
  p.expectEnd();
}

export class Parser extends Scanner {
  private readonly maxDepth: number;

  constructor(data: Uint8Array, options: ParseOptions = {}) {
    super(data, options);
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  }

  expectEnd(): void {
    this.skipWhitespace();
    if (!this.atEnd) this.failAt('after top-level value');
  }

  private enter(depth: number): void {
    if (depth >= this.maxDepth) this.fail('exceeded max depth');
  }

  /**
   * Walk an object whose `{` is the current byte. `onKey` is called with
   * the read position on the member's value and must consume that value.
   */
  readObject(depth: number, onKey: (key: string) => void): void {
    this.enter(depth);
    this.pos++;
    this.skipWhitespace();
    if (this.peek() === Byte.RBrace) {
      this.pos++;
      return;
    }
    for (;;) {
      if (this.peek() !== Byte.Quote) this.failAt('looking for beginning of object key string');
      const key = this.readString();
      this.skipWhitespace();
      if (this.peek() !== Byte.Colon) this.failAt('after object key');
      this.pos++;
      this.skipWhitespace();
      onKey(key);
      this.skipWhitespace();
      const c = this.peek();
      if (c === Byte.Comma) {
        this.pos++;
        this.skipWhitespace();
        continue;
      }
      if (c === Byte.RBrace) {
        this.pos++;
        return;
      }
      this.failAt('after object key:value pair');
    }
  }

  /** Walk an array whose `[` is the current byte; `onElement` consumes each element. */
  readArray(depth: number, onElement: (index: number) => void): void {
    this.enter(depth);
    this.pos++;
    this.skipWhitespace();
    if (this.peek() === Byte.RBracket) {
      this.pos++;
      return;
    }
    for (let i = 0; ; i++) {
      onElement(i);
      this.skipWhitespace();
      const c = this.peek();
      if (c === Byte.Comma) {
        this.pos++;
        this.skipWhitespace();
        continue;
      }
      if (c === Byte.RBracket) {
        this.pos++;
        return;
      }
      this.failAt('after array element');
    }
  }

  parseValue(depth: number): Value {
    const c = this.peek();
    switch (c) {
      case Byte.LBrace: {
        const obj = new OrderedObject();
        this.readObject(depth, (key) => {
          obj.append(key, this.parseValue(depth + 1));
        });
        return obj;
      }
      case Byte.LBracket: {
        const arr: Value[] = [];
        this.readArray(depth, () => {
          arr.push(this.parseValue(depth + 1));
        });
        return arr;
      }
      case Byte.Quote:
        return this.readString();
      default:
        if (c === Byte.Minus || (c >= Byte.Zero && c <= Byte.Nine)) {
          return new JsonNumber(this.readNumber());
        }
        return this.readLiteral();
    }
  }

  /** Consume one value without building it. */
  skipValue(depth: number): void {
    const c = this.peek();
    switch (c) {
      case Byte.LBrace:
        this.readObject(depth, () => this.skipValue(depth + 1));
        return;
      case Byte.LBracket:
        this.readArray(depth, () => this.skipValue(depth + 1));
        return;
      case Byte.Quote:
        this.readString();
        return;
      default:
        if (c === Byte.Minus || (c >= Byte.Zero && c <= Byte.Nine)) {
          this.readNumber();
          return;
        }
        this.readLiteral();
    }
  }

  /** Consume one value and return the bytes it spans. */
  rawValue(depth: number): Uint8Array {
    const start = this.pos;
    this.skipValue(depth);
    return this.data.subarray(start, this.pos);
  }
}
