/**
 * Typed decoding: JSON bytes → host values shaped by a type descriptor.
 *
 * The input is checked for syntax before anything is stored, so a malformed
 * document never leaves a target half filled. A value that does not fit its
 * slot is skipped and decoding carries on; the first such mismatch is thrown
 * once the whole document has been read.
 */

import {
  InvalidUnmarshalError,
  JsonError,
  JsonSyntaxError,
  UnknownFieldError,
  UnmarshalTypeError,
} from './errors.js';
import { fieldPlan, type PlanField } from './fields.js';
import { isValidNumber, parseFloatText, parseIntText, type IntParseOptions } from './number.js';
import { Parser, checkValid, toBytes, type ParseOptions } from './parser.js';
import { Byte } from './scanner.js';
import {
  indirect,
  zeroValue,
  type ArrayType,
  type HookType,
  type MapType,
  type RecordType,
  type StructType,
  type Type,
  type TypeDescriptor,
} from './types.js';
import { encodeUtf8 } from './utf8.js';
import { JsonNumber, OrderedObject, RawValue } from './value.js';

export interface DecodeOptions extends ParseOptions, IntParseOptions {
  /** Fail on object keys that match no struct field (default false) */
  disallowUnknownFields?: boolean;
}

interface JsonUnmarshaler {
  unmarshalJSON(data: Uint8Array): void;
}

interface TextUnmarshaler {
  unmarshalText(text: string): void;
}

function isJsonUnmarshaler(v: object): v is JsonUnmarshaler {
  return typeof Reflect.get(v, 'unmarshalJSON') === 'function';
}

function isTextUnmarshaler(v: object): v is TextUnmarshaler {
  return typeof Reflect.get(v, 'unmarshalText') === 'function';
}

const BASE64 = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

function decodeBase64(s: string): Uint8Array | number {
  const text = s.replace(/[\r\n]/g, '');
  if (!BASE64.test(text)) {
    const bad = text.search(/[^A-Za-z0-9+/=]/);
    return bad >= 0 ? bad : text.length - (text.length % 4);
  }
  return new Uint8Array(Buffer.from(text, 'base64'));
}

function isNumberStart(c: number): boolean {
  return c === Byte.Minus || (c >= Byte.Zero && c <= Byte.Nine);
}

function startsScalar(c: number): boolean {
  return c === Byte.LowerN || c === Byte.LowerT || c === Byte.LowerF || c === Byte.Quote || isNumberStart(c);
}

/** Set a property without tripping over `__proto__` and friends. */
function defineEntry(obj: object, key: string, value: unknown): void {
  Object.defineProperty(obj, key, { value, writable: true, enumerable: true, configurable: true });
}

/** Shallow check that a decoded value has the host shape its descriptor promises. */
function conforms<T>(v: unknown, d: Type<T>): v is T {
  return fits(v, d);
}

function fits(v: unknown, d: TypeDescriptor): boolean {
  switch (d.kind) {
    case 'bool':
      return typeof v === 'boolean';
    case 'int':
    case 'float':
      return typeof v === 'number';
    case 'bigint':
      return typeof v === 'bigint';
    case 'string':
      return typeof v === 'string';
    case 'bytes':
      return v === null || v instanceof Uint8Array;
    case 'number':
      return v instanceof JsonNumber;
    case 'raw':
      return v === null || v instanceof RawValue;
    case 'object':
      return v === null || v instanceof OrderedObject;
    case 'slice':
      return v === null || Array.isArray(v);
    case 'array':
      return Array.isArray(v);
    case 'map':
      return v === null || v instanceof Map;
    case 'record':
      return v === null || (typeof v === 'object' && !Array.isArray(v));
    case 'pointer':
      return v === null || fits(v, d.elem);
    case 'struct':
      return typeof v === 'object' && v !== null;
    case 'value':
    case 'hook':
      return true;
  }
}

class Binder extends Parser {
  /** First non-fatal error; thrown after the document is consumed. */
  saved: JsonError | undefined;
  private readonly fieldStack: string[] = [];
  private structName: string | undefined;

  constructor(
    data: Uint8Array,
    private readonly options: DecodeOptions
  ) {
    super(data, options);
  }

  private save(err: JsonError): void {
    this.saved ??= err;
  }

  private typeError(value: string, d: TypeDescriptor, byteOffset: number): void {
    const inField = this.structName !== undefined && this.fieldStack.length > 0;
    this.save(
      new UnmarshalTypeError(value, d.name, {
        byteOffset,
        struct: inField ? this.structName : undefined,
        field: inField ? this.fieldStack.join('.') : undefined,
      })
    );
  }

  /** Record that the next value does not fit `d` and skip it. */
  private mismatch(d: TypeDescriptor, depth: number): void {
    const c = this.peek();
    const start = this.pos;
    this.skipValue(depth);
    if (c === Byte.LBrace) this.typeError('object', d, start + 1);
    else if (c === Byte.LBracket) this.typeError('array', d, start + 1);
    else if (c === Byte.Quote) this.typeError('string', d, this.pos);
    else if (isNumberStart(c)) this.typeError('number', d, this.pos);
    else this.typeError('bool', d, this.pos);
  }

  /** Decode the next value into the slot currently holding `current`; returns the slot's new content. */
  value(d: TypeDescriptor, current: unknown, depth: number): unknown {
    if (d.kind === 'hook') return this.hook(d, current, depth);

    if (this.peek() === Byte.LowerN) {
      this.readLiteral();
      return this.nullFor(d, current);
    }

    if (d.kind === 'pointer') {
      const target = current ?? zeroValue(d.elem);
      return this.value(d.elem, target, depth);
    }

    if (typeof current === 'object' && current !== null) {
      if (isJsonUnmarshaler(current)) {
        current.unmarshalJSON(this.rawValue(depth).slice());
        return current;
      }
      if (isTextUnmarshaler(current)) {
        if (this.peek() !== Byte.Quote) {
          this.mismatch(d, depth);
          return current;
        }
        current.unmarshalText(this.readString());
        return current;
      }
    }

    const c = this.peek();
    switch (d.kind) {
      case 'value':
        return this.parseValue(depth);
      case 'raw':
        return new RawValue(this.rawValue(depth).slice());
      case 'object':
        if (c !== Byte.LBrace) break;
        return this.parseValue(depth);
      case 'bool':
        if (c !== Byte.LowerT && c !== Byte.LowerF) break;
        return this.readLiteral();
      case 'string':
        if (c !== Byte.Quote) break;
        return this.readString();
      case 'bytes':
        if (c !== Byte.Quote) break;
        return this.base64(current);
      case 'int':
      case 'bigint':
      case 'float':
        if (!isNumberStart(c)) break;
        return this.numeric(d, this.readNumber(), current);
      case 'number':
        if (c === Byte.Quote) {
          const start = this.pos;
          const s = this.readString();
          if (!isValidNumber(s)) {
            this.save(
              new JsonError(`invalid number literal, trying to unmarshal ${JSON.stringify(s)} into Number`, {
                byteOffset: start + 1,
              })
            );
            return current;
          }
          return new JsonNumber(s);
        }
        if (!isNumberStart(c)) break;
        return new JsonNumber(this.readNumber());
      case 'slice':
        if (c === Byte.Quote && d.elem.kind === 'int' && d.elem.min === 0 && d.elem.max === 0xff) {
          const bytes = this.base64(null);
          return bytes === null ? current : Array.from(bytes);
        }
        if (c !== Byte.LBracket) break;
        return this.slice(d.elem, depth);
      case 'array':
        if (c !== Byte.LBracket) break;
        return this.array(d, current, depth);
      case 'map':
        if (c !== Byte.LBrace) break;
        return this.map(d, current, depth);
      case 'record':
        if (c !== Byte.LBrace) break;
        return this.record(d, current, depth);
      case 'struct':
        if (c !== Byte.LBrace) break;
        return this.struct(d, current, depth);
    }
    this.mismatch(d, depth);
    return current;
  }

  /** What `null` leaves in a slot: nil for reference kinds, the old value otherwise. */
  private nullFor(d: TypeDescriptor, current: unknown): unknown {
    switch (d.kind) {
      case 'pointer':
      case 'slice':
      case 'map':
      case 'record':
      case 'bytes':
      case 'raw':
      case 'object':
      case 'value':
        return null;
      default:
        return current;
    }
  }

  private hook(d: HookType, current: unknown, depth: number): unknown {
    const { hooks } = d;
    const existing = current === undefined ? hooks.zero() : current;
    if (hooks.unmarshalJSON) {
      return hooks.unmarshalJSON(this.rawValue(depth).slice(), existing);
    }
    if (hooks.unmarshalText) {
      const c = this.peek();
      if (c === Byte.LowerN) {
        this.readLiteral();
        return existing;
      }
      if (c !== Byte.Quote) {
        this.mismatch(d, depth);
        return existing;
      }
      return hooks.unmarshalText(this.readString(), existing);
    }
    return this.parseValue(depth);
  }

  private base64(current: unknown): Uint8Array | null {
    const start = this.pos;
    const decoded = decodeBase64(this.readString());
    if (typeof decoded === 'number') {
      this.save(new JsonError(`illegal base64 data at input byte ${decoded}`, { byteOffset: start + 1 }));
      return current instanceof Uint8Array ? current : null;
    }
    return decoded;
  }

  private numeric(d: TypeDescriptor, text: string, current: unknown): unknown {
    const end = this.pos;
    if (d.kind === 'float') {
      const n = parseFloatText(text, d.bits);
      if (n !== undefined) return n;
    } else if (d.kind === 'int') {
      const n = parseIntText(text, BigInt(d.min), BigInt(d.max), this.options);
      if (n !== undefined) return Number(n);
    } else if (d.kind === 'bigint') {
      const n = parseIntText(text, d.min, d.max, this.options);
      if (n !== undefined) return n;
    }
    this.typeError(`number ${text}`, d, end);
    return current;
  }

  private slice(elem: TypeDescriptor, depth: number): unknown[] {
    const out: unknown[] = [];
    this.readArray(depth, () => {
      out.push(this.value(elem, zeroValue(elem), depth + 1));
    });
    return out;
  }

  /** Surplus elements are dropped; missing ones are zeroed. */
  private array(d: ArrayType, current: unknown, depth: number): unknown[] {
    const existing = Array.isArray(current) ? current : [];
    const out: unknown[] = [];
    this.readArray(depth, (i) => {
      if (i < d.length) {
        out.push(this.value(d.elem, i < existing.length ? existing[i] : zeroValue(d.elem), depth + 1));
      } else {
        this.skipValue(depth + 1);
      }
    });
    while (out.length < d.length) out.push(zeroValue(d.elem));
    return out;
  }

  private map(d: MapType, current: unknown, depth: number): Map<unknown, unknown> {
    const out = current instanceof Map ? current : new Map<unknown, unknown>();
    this.readObject(depth, (key) => {
      const keyEnd = this.pos;
      const value = this.value(d.elem, zeroValue(d.elem), depth + 1);
      const k = this.mapKey(key, d.key, keyEnd);
      if (k !== undefined) out.set(k, value);
    });
    return out;
  }

  private mapKey(key: string, d: TypeDescriptor, offset: number): unknown {
    switch (d.kind) {
      case 'string':
        return key;
      case 'hook':
        if (d.hooks.unmarshalText) return d.hooks.unmarshalText(key, d.hooks.zero());
        break;
      case 'int': {
        const n = parseIntText(key, BigInt(d.min), BigInt(d.max));
        if (n !== undefined) return Number(n);
        this.typeError(`number ${key}`, d, offset);
        return undefined;
      }
      case 'bigint': {
        const n = parseIntText(key, d.min, d.max);
        if (n !== undefined) return n;
        this.typeError(`number ${key}`, d, offset);
        return undefined;
      }
    }
    throw new InvalidUnmarshalError(`unsupported map key type ${d.name}`);
  }

  private record(d: RecordType, current: unknown, depth: number): object {
    const out = typeof current === 'object' && current !== null ? current : {};
    this.readObject(depth, (key) => {
      defineEntry(out, key, this.value(d.elem, zeroValue(d.elem), depth + 1));
    });
    return out;
  }

  private struct(d: StructType, current: unknown, depth: number): object {
    const target = current === null || current === undefined ? d.create() : current;
    if (typeof target !== 'object' || target === null) {
      throw new InvalidUnmarshalError(`cannot decode ${d.name} into ${typeof target}`);
    }
    const plan = fieldPlan(d);
    this.readObject(depth, (key) => {
      const f = plan.byName.get(key) ?? plan.byFoldedName.get(key.toLowerCase());
      if (f === undefined) {
        if (this.options.disallowUnknownFields) {
          this.save(new UnknownFieldError(key, { byteOffset: this.pos }));
        }
        this.skipValue(depth + 1);
        return;
      }
      const holder = this.holder(target, f);
      const last = f.path[f.path.length - 1]!;
      const outerStruct = this.structName;
      this.structName = d.name;
      this.fieldStack.push(f.name);
      const existing = Reflect.get(holder, last.prop);
      const next = f.quoted ? this.quoted(f, existing, depth + 1) : this.value(f.type, existing, depth + 1);
      Reflect.set(holder, last.prop, next);
      this.fieldStack.pop();
      this.structName = outerStruct;
    });
    return target;
  }

  /** Object holding the field's last property, allocating embedded structs on the way. */
  private holder(target: object, f: PlanField): object {
    let cur = target;
    for (const step of f.path.slice(0, -1)) {
      let next: unknown = Reflect.get(cur, step.prop);
      if (typeof next !== 'object' || next === null) {
        next = zeroValue(indirect(step.type));
        Reflect.set(cur, step.prop, next);
      }
      if (typeof next !== 'object' || next === null) {
        throw new InvalidUnmarshalError(`cannot set embedded field ${step.prop}`);
      }
      cur = next;
    }
    return cur;
  }

  /** A `string`-tagged field: the scalar literal travels inside a JSON string. */
  private quoted(f: PlanField, current: unknown, depth: number): unknown {
    const c = this.peek();
    if (c === Byte.LowerN) {
      this.readLiteral();
      return this.nullFor(f.type, current);
    }
    const start = this.pos;
    if (c !== Byte.Quote) {
      this.skipValue(depth);
      this.save(
        new JsonError(`invalid use of ,string struct tag, trying to unmarshal unquoted value into ${f.type.name}`, {
          byteOffset: start + 1,
        })
      );
      return current;
    }
    const text = this.readString();
    const invalid = (): JsonError =>
      new JsonError(
        `invalid use of ,string struct tag, trying to unmarshal ${JSON.stringify(text)} into ${f.type.name}`,
        { byteOffset: start + 1 }
      );
    const inner = new Binder(encodeUtf8(text), this.options);
    if (!startsScalar(inner.peek())) {
      this.save(invalid());
      return current;
    }
    let result: unknown;
    try {
      result = inner.value(f.type, current, depth);
    } catch (err) {
      if (!(err instanceof JsonSyntaxError)) throw err;
      this.save(invalid());
      return current;
    }
    if (inner.saved !== undefined || !inner.atEnd) {
      this.save(invalid());
      return current;
    }
    return result;
  }
}

/**
 * Decode one JSON document into a value of the described type. When `target`
 * is given, structs, maps and records are filled in place and returned.
 */
export function decodeInto<T>(
  data: Uint8Array | string,
  type: Type<T>,
  target?: T,
  options: DecodeOptions = {}
): T {
  const bytes = toBytes(data);
  checkValid(bytes, options);
  if (target !== undefined && type.kind === 'struct' && (typeof target !== 'object' || target === null)) {
    throw new InvalidUnmarshalError(`cannot decode ${type.name} into ${target === null ? 'null' : typeof target}`);
  }
  const b = new Binder(bytes, options);
  b.skipWhitespace();
  const result = b.value(type, target === undefined ? zeroValue(type) : target, 0);
  b.expectEnd();
  if (b.saved !== undefined) throw b.saved;
  if (!conforms(result, type)) {
    throw new InvalidUnmarshalError(`decoded value does not fit ${type.name}`);
  }
  return result;
}
