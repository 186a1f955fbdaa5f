/**
 * Encoding: host value → JSON bytes.
 *
 * Each value is adapted in a fixed order: a JSON hook (descriptor hook, then
 * a `marshalJSON` method on the value), then a text hook, then the structural
 * rule for its kind. Without a descriptor the kind is inferred at run time.
 * Host maps and records are written in key order; `OrderedObject` members are
 * written exactly as stored.
 */

import {
  MarshalerError,
  UnsupportedTypeError,
  UnsupportedValueError,
} from './errors.js';
import { encodeString } from './escape.js';
import { fieldPlan, type PlanField } from './fields.js';
import { compact, indent } from './indent.js';
import { formatFloat, formatInt, isValidNumber } from './number.js';
import { DEFAULT_MAX_DEPTH } from './parser.js';
import {
  structFor,
  t,
  zeroValue,
  type HookType,
  type MapType,
  type StructType,
  type TypeDescriptor,
} from './types.js';
import { encodeUtf8 } from './utf8.js';
import { JsonNumber, OrderedObject, RawValue } from './value.js';
import { ByteWriter } from './writer.js';

export interface EncodeOptions {
  /** Escape `<`, `>`, `&` and friends for embedding in HTML (default true) */
  escapeHTML?: boolean;
  /** Max nesting depth (default 10000) */
  maxDepth?: number;
}

interface JsonMarshaler {
  marshalJSON(): Uint8Array | string;
}

interface TextMarshaler {
  marshalText(): string;
}

function hasMethod<K extends string>(v: unknown, name: K): v is Record<K, (...args: never[]) => unknown> {
  return typeof v === 'object' && v !== null && typeof Reflect.get(v, name) === 'function';
}

function isJsonMarshaler(v: unknown): v is JsonMarshaler {
  return hasMethod(v, 'marshalJSON');
}

function isTextMarshaler(v: unknown): v is TextMarshaler {
  return hasMethod(v, 'marshalText');
}

function isPlainObject(v: object): v is Record<string, unknown> {
  const proto: unknown = Object.getPrototypeOf(v);
  return proto === null || proto === Object.prototype;
}

function isByteElem(d: TypeDescriptor): boolean {
  return d.kind === 'int' && d.min === 0 && d.max === 0xff;
}

function describe(v: unknown): string {
  if (v === null) return 'null';
  if (typeof v === 'object') return v.constructor?.name ?? 'object';
  return typeof v;
}

function toBase64(bytes: Uint8Array | readonly number[]): string {
  const buf = bytes instanceof Uint8Array ? Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength) : Buffer.from(bytes);
  return buf.toString('base64');
}

const utf8Order = (a: string, b: string): number => {
  const aa = encodeUtf8(a);
  const bb = encodeUtf8(b);
  for (let i = 0; i < Math.min(aa.length, bb.length); i++) {
    if (aa[i]! !== bb[i]!) return aa[i]! - bb[i]!;
  }
  return aa.length - bb.length;
};

/** Whether `omitempty` drops the value. Structs are never empty. */
export function isEmptyValue(v: unknown, d: TypeDescriptor): boolean {
  if (v === undefined) return true;
  switch (d.kind) {
    case 'bool':
      return v === false;
    case 'int':
    case 'float':
      return v === 0;
    case 'bigint':
      return v === 0n || v === 0;
    case 'string':
      return v === '';
    case 'number':
      return v === null || (v instanceof JsonNumber && v.text === '');
    case 'bytes':
    case 'slice':
      return v === null || (Array.isArray(v) || v instanceof Uint8Array ? v.length === 0 : false);
    case 'raw':
      return v === null || (v instanceof RawValue && v.length === 0);
    case 'object':
      return v === null || (v instanceof OrderedObject && v.length === 0);
    case 'array':
      return d.length === 0;
    case 'map':
      return v === null || (v instanceof Map && v.size === 0);
    case 'record':
      return v === null || (typeof v === 'object' && Object.keys(v).length === 0);
    case 'value':
    case 'pointer':
      return v === null;
    case 'struct':
      return false;
    case 'hook':
      return d.hooks.isEmpty ? d.hooks.isEmpty(v) : v === null;
  }
}

class EncodeState {
  readonly out = new ByteWriter();
  private readonly escapeHTML: boolean;
  private readonly maxDepth: number;
  /** Containers on the current path, for cycle detection. */
  private readonly active = new Set<object>();

  constructor(options: EncodeOptions) {
    this.escapeHTML = options.escapeHTML ?? true;
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  }

  private string(s: string): void {
    this.out.writeAscii(encodeString(s, this.escapeHTML));
  }

  private enter(container: object, d: TypeDescriptor, depth: number): void {
    if (depth >= this.maxDepth) {
      throw new UnsupportedValueError(d.name, `exceeded max depth encoding ${d.name}`);
    }
    if (this.active.has(container)) {
      throw new UnsupportedValueError(d.name, `encountered a cycle via ${d.name}`);
    }
    this.active.add(container);
  }

  private leave(container: object): void {
    this.active.delete(container);
  }

  private mismatch(v: unknown, d: TypeDescriptor): never {
    throw new UnsupportedTypeError(`${describe(v)} as ${d.name}`);
  }

  /** Validate and compact hook output into the buffer. */
  private rawJSON(data: Uint8Array | string, typeName: string, hook: string): void {
    let compacted: Uint8Array;
    try {
      compacted = compact(data, this.escapeHTML);
    } catch (err) {
      throw new MarshalerError(typeName, hook, err);
    }
    this.out.write(compacted);
  }

  private callJSONHook(call: () => Uint8Array | string, typeName: string): void {
    let data: Uint8Array | string;
    try {
      data = call();
    } catch (err) {
      throw new MarshalerError(typeName, 'marshalJSON', err);
    }
    this.rawJSON(data, typeName, 'marshalJSON');
  }

  private callTextHook(call: () => string, typeName: string): void {
    let text: string;
    try {
      text = call();
    } catch (err) {
      throw new MarshalerError(typeName, 'marshalText', err);
    }
    this.string(text);
  }

  private jsonMethod(m: JsonMarshaler): void {
    this.callJSONHook(() => m.marshalJSON(), describe(m));
  }

  private textMethod(m: TextMarshaler): void {
    this.callTextHook(() => m.marshalText(), describe(m));
  }

  encode(v: unknown, d: TypeDescriptor, depth: number, quoted = false): void {
    if (d.kind === 'hook') {
      this.hook(v, d, depth);
      return;
    }
    if (d.kind !== 'pointer' && d.kind !== 'raw' && v !== null && v !== undefined) {
      if (isJsonMarshaler(v)) {
        this.jsonMethod(v);
        return;
      }
      if (isTextMarshaler(v)) {
        this.textMethod(v);
        return;
      }
    }
    switch (d.kind) {
      case 'value':
        this.dynamic(v, depth);
        return;
      case 'pointer':
        if (v === null || v === undefined) {
          const elem = d.elem;
          if (elem.kind === 'hook' && elem.hooks.pointerReceiver && elem.hooks.marshalJSON) {
            const marshal = elem.hooks.marshalJSON;
            this.callJSONHook(() => marshal.call(elem.hooks, undefined), elem.name);
            return;
          }
          this.out.writeAscii('null');
          return;
        }
        this.encode(v, d.elem, depth, quoted);
        return;
      case 'bool':
        if (typeof v !== 'boolean') this.mismatch(v, d);
        this.out.writeAscii(quoted ? `"${v}"` : String(v));
        return;
      case 'int':
        if (typeof v !== 'number') this.mismatch(v, d);
        if (!Number.isInteger(v) || v < d.min || v > d.max) {
          throw new UnsupportedValueError(String(v), `${v} out of range for ${d.name}`);
        }
        this.scalar(formatInt(v), quoted);
        return;
      case 'bigint': {
        if (typeof v !== 'bigint' && typeof v !== 'number') this.mismatch(v, d);
        const n = typeof v === 'bigint' ? v : BigInt(formatInt(v));
        if (n < d.min || n > d.max) {
          throw new UnsupportedValueError(String(v), `${v} out of range for ${d.name}`);
        }
        this.scalar(formatInt(n), quoted);
        return;
      }
      case 'float':
        if (typeof v !== 'number') this.mismatch(v, d);
        this.scalar(formatFloat(v, d.bits), quoted);
        return;
      case 'string':
        if (typeof v !== 'string') this.mismatch(v, d);
        this.string(quoted ? encodeString(v, this.escapeHTML) : v);
        return;
      case 'number':
        if (v !== null && v !== undefined && !(v instanceof JsonNumber)) this.mismatch(v, d);
        this.number(v ?? undefined, quoted);
        return;
      case 'bytes':
        if (v === null || v === undefined) {
          this.out.writeAscii('null');
          return;
        }
        if (!(v instanceof Uint8Array)) this.mismatch(v, d);
        this.out.writeAscii(`"${toBase64(v)}"`);
        return;
      case 'raw':
        if (v === null || v === undefined || (v instanceof RawValue && v.length === 0)) {
          this.out.writeAscii('null');
          return;
        }
        if (!(v instanceof RawValue)) this.mismatch(v, d);
        this.rawJSON(v.bytes, d.name, 'marshalJSON');
        return;
      case 'object':
        if (v === null || v === undefined) {
          this.out.writeAscii('null');
          return;
        }
        if (!(v instanceof OrderedObject)) this.mismatch(v, d);
        this.ordered(v, depth);
        return;
      case 'slice':
        if (v === null || v === undefined) {
          this.out.writeAscii('null');
          return;
        }
        if (isByteElem(d.elem) && (v instanceof Uint8Array || Array.isArray(v))) {
          this.out.writeAscii(`"${toBase64(v)}"`);
          return;
        }
        if (!Array.isArray(v)) this.mismatch(v, d);
        this.array(v, d.elem, d, depth);
        return;
      case 'array':
        if (!Array.isArray(v)) this.mismatch(v, d);
        this.array(v, d.elem, d, depth);
        return;
      case 'map':
        if (v === null || v === undefined) {
          this.out.writeAscii('null');
          return;
        }
        if (!(v instanceof Map)) this.mismatch(v, d);
        this.map(v, d, depth);
        return;
      case 'record':
        if (v === null || v === undefined) {
          this.out.writeAscii('null');
          return;
        }
        if (typeof v !== 'object') this.mismatch(v, d);
        this.record(v, d.elem, d, depth);
        return;
      case 'struct':
        if (typeof v !== 'object' || v === null) this.mismatch(v, d);
        this.struct(v, d, depth);
        return;
    }
  }

  private scalar(text: string, quoted: boolean): void {
    this.out.writeAscii(quoted ? `"${text}"` : text);
  }

  private number(n: JsonNumber | undefined, quoted: boolean): void {
    const text = n === undefined || n.text === '' ? '0' : n.text;
    if (!isValidNumber(text)) {
      throw new UnsupportedValueError(text, `invalid number literal ${JSON.stringify(text)}`);
    }
    this.scalar(text, quoted);
  }

  private hook(v: unknown, d: HookType, depth: number): void {
    const { hooks } = d;
    if (hooks.marshalJSON) {
      const marshal = hooks.marshalJSON;
      this.callJSONHook(() => marshal.call(hooks, v), d.name);
      return;
    }
    if (hooks.marshalText) {
      const marshal = hooks.marshalText;
      this.callTextHook(() => marshal.call(hooks, v), d.name);
      return;
    }
    this.dynamic(v, depth);
  }

  private array(items: readonly unknown[], elem: TypeDescriptor, d: TypeDescriptor, depth: number): void {
    this.enter(items, d, depth);
    this.out.writeByte(0x5b);
    items.forEach((item, i) => {
      if (i > 0) this.out.writeByte(0x2c);
      this.encode(item, elem, depth + 1);
    });
    this.out.writeByte(0x5d);
    this.leave(items);
  }

  private ordered(obj: OrderedObject<unknown>, depth: number): void {
    this.enter(obj, t.object, depth);
    this.out.writeByte(0x7b);
    let i = 0;
    for (const m of obj) {
      if (i++ > 0) this.out.writeByte(0x2c);
      this.string(m.key);
      this.out.writeByte(0x3a);
      this.encode(m.value, t.value, depth + 1);
    }
    this.out.writeByte(0x7d);
    this.leave(obj);
  }

  /** Members sorted by UTF-8 key order. */
  private members(entries: { key: string; value: unknown }[], elem: TypeDescriptor, depth: number): void {
    entries.sort((a, b) => utf8Order(a.key, b.key));
    this.out.writeByte(0x7b);
    entries.forEach((m, i) => {
      if (i > 0) this.out.writeByte(0x2c);
      this.string(m.key);
      this.out.writeByte(0x3a);
      this.encode(m.value, elem, depth + 1);
    });
    this.out.writeByte(0x7d);
  }

  private record(obj: object, elem: TypeDescriptor, d: TypeDescriptor, depth: number): void {
    this.enter(obj, d, depth);
    this.members(
      Object.keys(obj).map((key) => ({ key, value: Reflect.get(obj, key) })),
      elem,
      depth
    );
    this.leave(obj);
  }

  private map(m: Map<unknown, unknown>, d: MapType | undefined, depth: number): void {
    this.enter(m, d ?? t.value, depth);
    const entries: { key: string; value: unknown }[] = [];
    for (const [k, value] of m) entries.push({ key: this.mapKey(k, d?.key), value });
    this.members(entries, d?.elem ?? t.value, depth);
    this.leave(m);
  }

  /** Text of a map key: a string, a text hook's output, or a decimal integer. */
  private mapKey(k: unknown, d: TypeDescriptor | undefined): string {
    if (typeof k === 'string') return k;
    if (d?.kind === 'hook' && d.hooks.marshalText) {
      const marshal = d.hooks.marshalText;
      const hooks = d.hooks;
      return this.keyText(() => marshal.call(hooks, k), d.name);
    }
    if (isTextMarshaler(k)) {
      const m = k;
      return this.keyText(() => m.marshalText(), describe(m));
    }
    if (typeof k === 'bigint') return k.toString();
    if (typeof k === 'number' && Number.isSafeInteger(k)) return String(k);
    throw new UnsupportedValueError(describe(k), `map key of type ${d?.name ?? describe(k)}`);
  }

  private keyText(call: () => string, typeName: string): string {
    try {
      return call();
    } catch (err) {
      throw new MarshalerError(typeName, 'marshalText', err);
    }
  }

  private struct(obj: object, d: StructType, depth: number): void {
    this.enter(obj, d, depth);
    this.out.writeByte(0x7b);
    let first = true;
    for (const f of fieldPlan(d).fields) {
      const found = fieldValue(obj, f);
      if (!found.present) continue;
      if (f.omitEmpty && isEmptyValue(found.value, f.type)) continue;
      if (!first) this.out.writeByte(0x2c);
      first = false;
      this.string(f.name);
      this.out.writeByte(0x3a);
      const value = found.value === undefined ? zeroValue(f.type) : found.value;
      this.encode(value, f.type, depth + 1, f.quoted);
    }
    this.out.writeByte(0x7d);
    this.leave(obj);
  }

  private dynamic(v: unknown, depth: number): void {
    if (v === null || v === undefined) {
      this.out.writeAscii('null');
      return;
    }
    switch (typeof v) {
      case 'boolean':
        this.out.writeAscii(String(v));
        return;
      case 'number':
        this.out.writeAscii(formatFloat(v));
        return;
      case 'bigint':
        this.out.writeAscii(v.toString());
        return;
      case 'string':
        this.string(v);
        return;
      case 'object':
        break;
      default:
        throw new UnsupportedTypeError(typeof v);
    }
    if (isJsonMarshaler(v)) {
      this.jsonMethod(v);
    } else if (isTextMarshaler(v)) {
      this.textMethod(v);
    } else if (v instanceof JsonNumber) {
      this.number(v, false);
    } else if (v instanceof RawValue) {
      this.encode(v, t.raw, depth);
    } else if (v instanceof Uint8Array) {
      this.out.writeAscii(`"${toBase64(v)}"`);
    } else if (Array.isArray(v)) {
      this.array(v, t.value, t.value, depth);
    } else if (v instanceof OrderedObject) {
      this.ordered(v, depth);
    } else if (v instanceof Map) {
      this.map(v, undefined, depth);
    } else {
      const registered = structFor(v);
      if (registered) this.struct(v, registered, depth);
      else if (isPlainObject(v)) this.record(v, t.value, t.value, depth);
      else throw new UnsupportedTypeError(describe(v));
    }
  }
}

/**
 * Follow a field path. Promoted fields behind a nil embedded pointer are
 * absent rather than empty.
 */
function fieldValue(obj: object, f: PlanField): { present: boolean; value: unknown } {
  let cur: unknown = obj;
  for (let i = 0; i < f.path.length; i++) {
    if (typeof cur !== 'object' || cur === null) return { present: false, value: undefined };
    cur = Reflect.get(cur, f.path[i]!.prop);
  }
  return { present: true, value: cur };
}

/**
 * Encode a host value. With no descriptor the representation is inferred
 * from the value. Nothing is returned on failure.
 */
export function encode(value: unknown, type?: TypeDescriptor, options: EncodeOptions = {}): Uint8Array {
  const e = new EncodeState(options);
  e.encode(value, type ?? t.value, 0);
  return e.out.bytes();
}

export function encodeToString(value: unknown, type?: TypeDescriptor, options: EncodeOptions = {}): string {
  return new TextDecoder().decode(encode(value, type, options));
}

/** Encode, then lay the output out with `indent` (see there). */
export function encodeIndent(
  value: unknown,
  prefix: string,
  indentText: string,
  type?: TypeDescriptor,
  options: EncodeOptions = {}
): Uint8Array {
  return indent(encode(value, type, options), prefix, indentText);
}

