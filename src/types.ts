/**
 * Type descriptors: the shape a host value has on the wire. Encoding uses them
 * to pick a representation (falling back to runtime inference where none is
 * given); typed decoding needs them to know what to build.
 */

import type { FloatBits } from './number.js';
import { JsonNumber, type OrderedObject, type RawValue } from './value.js';

interface TypeBase<T> {
  readonly name: string;
  /** Host type carried for inference only; never set. */
  readonly __host?: T;
}

export interface BoolType extends TypeBase<boolean> {
  readonly kind: 'bool';
}

/** Integers held in JS numbers. */
export interface IntType extends TypeBase<number> {
  readonly kind: 'int';
  readonly min: number;
  readonly max: number;
}

/** 64-bit integers held in bigints. */
export interface BigIntType extends TypeBase<bigint> {
  readonly kind: 'bigint';
  readonly min: bigint;
  readonly max: bigint;
}

export interface FloatType extends TypeBase<number> {
  readonly kind: 'float';
  readonly bits: FloatBits;
}

export interface StringType extends TypeBase<string> {
  readonly kind: 'string';
}

/** Byte slice; encoded as a base64 string. */
export interface BytesType extends TypeBase<Uint8Array | null> {
  readonly kind: 'bytes';
}

export interface NumberType extends TypeBase<JsonNumber> {
  readonly kind: 'number';
}

export interface RawType extends TypeBase<RawValue | null> {
  readonly kind: 'raw';
}

/** Any value: encoded by runtime inference, decoded into the value model. */
export interface ValueType extends TypeBase<unknown> {
  readonly kind: 'value';
}

export interface ObjectType extends TypeBase<OrderedObject<unknown> | null> {
  readonly kind: 'object';
}

export interface SliceType<T = unknown> extends TypeBase<T[] | null> {
  readonly kind: 'slice';
  readonly elem: Type<T>;
}

/** Fixed-length array. */
export interface ArrayType<T = unknown> extends TypeBase<T[]> {
  readonly kind: 'array';
  readonly elem: Type<T>;
  readonly length: number;
}

export interface MapType<K = unknown, V = unknown> extends TypeBase<Map<K, V> | null> {
  readonly kind: 'map';
  readonly key: Type<K>;
  readonly elem: Type<V>;
}

/** Plain object used as a string-keyed map. */
export interface RecordType<V = unknown> extends TypeBase<Record<string, V> | null> {
  readonly kind: 'record';
  readonly elem: Type<V>;
}

/** Nullable reference; `null` (or `undefined`) is nil. */
export interface PointerType<T = unknown> extends TypeBase<T | null> {
  readonly kind: 'pointer';
  readonly elem: Type<T>;
}

export interface FieldDecl {
  /** Host property name; also the JSON name when the tag gives none. */
  readonly name: string;
  readonly type: TypeDescriptor;
  /** `"name,omitempty,string"`, `"-"` to skip */
  readonly tag?: string;
  /** Anonymous field; a struct embedded this way has its fields promoted. */
  readonly embedded?: boolean;
  /** Hidden fields never appear on the wire; embedded hidden structs are still walked. Default true */
  readonly exported?: boolean;
}

export interface StructType<T extends object = object> extends TypeBase<T> {
  readonly kind: 'struct';
  readonly fields: readonly FieldDecl[];
  create(): T;
}

/** User-supplied encode/decode overrides. */
export interface Hooks<T> {
  /** Must return one complete JSON value. Receives `undefined` for a nil pointer when `pointerReceiver` is set. */
  marshalJSON?(value: T | undefined): Uint8Array | string;
  /** Receives the raw bytes of the matched value, `null` included. */
  unmarshalJSON?(data: Uint8Array, current: T): T;
  marshalText?(value: T): string;
  unmarshalText?(text: string, current: T): T;
  /** Call `marshalJSON` for nil pointers rather than writing `null` */
  pointerReceiver?: boolean;
  zero(): T;
  isEmpty?(value: T): boolean;
}

export interface HookType<T = unknown> extends TypeBase<T> {
  readonly kind: 'hook';
  readonly hooks: Hooks<T>;
}

export type TypeDescriptor =
  | BoolType
  | IntType
  | BigIntType
  | FloatType
  | StringType
  | BytesType
  | NumberType
  | RawType
  | ValueType
  | ObjectType
  | SliceType
  | ArrayType
  | MapType
  | RecordType
  | PointerType
  | StructType
  | HookType;

/** A descriptor whose host values have type T. */
export type Type<T> = TypeDescriptor & TypeBase<T>;

/** Host type described by a descriptor. */
export type HostOf<D> = D extends TypeBase<infer T> ? T : never;

function intType(name: string, min: number, max: number): IntType {
  return { kind: 'int', name, min, max };
}

function bigIntType(name: string, min: bigint, max: bigint): BigIntType {
  return { kind: 'bigint', name, min, max };
}

function struct(name: string, fields: readonly FieldDecl[]): StructType<Record<string, unknown>>;
function struct<T extends object>(
  name: string,
  fields: readonly FieldDecl[],
  options: { create: () => T }
): StructType<T>;
function struct(
  name: string,
  fields: readonly FieldDecl[],
  options?: { create: () => object }
): StructType {
  const create = options?.create ?? ((): Record<string, unknown> => zeroFields(fields));
  return { kind: 'struct', name, fields, create };
}

const boolType: BoolType = { kind: 'bool', name: 'bool' };
const float32Type: FloatType = { kind: 'float', name: 'float32', bits: 32 };
const float64Type: FloatType = { kind: 'float', name: 'float64', bits: 64 };
const stringType: StringType = { kind: 'string', name: 'string' };
const bytesType: BytesType = { kind: 'bytes', name: '[]byte' };
const numberType: NumberType = { kind: 'number', name: 'Number' };
const rawType: RawType = { kind: 'raw', name: 'RawValue' };
const valueType: ValueType = { kind: 'value', name: 'any' };
const objectType: ObjectType = { kind: 'object', name: 'OrderedObject' };

export const t = {
  bool: boolType,
  int: intType('int', Number.MIN_SAFE_INTEGER, Number.MAX_SAFE_INTEGER),
  int8: intType('int8', -0x80, 0x7f),
  int16: intType('int16', -0x8000, 0x7fff),
  int32: intType('int32', -0x8000_0000, 0x7fff_ffff),
  uint: intType('uint', 0, Number.MAX_SAFE_INTEGER),
  uint8: intType('uint8', 0, 0xff),
  uint16: intType('uint16', 0, 0xffff),
  uint32: intType('uint32', 0, 0xffff_ffff),
  int64: bigIntType('int64', -(2n ** 63n), 2n ** 63n - 1n),
  uint64: bigIntType('uint64', 0n, 2n ** 64n - 1n),
  float32: float32Type,
  float64: float64Type,
  string: stringType,
  bytes: bytesType,
  number: numberType,
  raw: rawType,
  value: valueType,
  object: objectType,

  slice<T>(elem: Type<T>): SliceType<T> {
    return { kind: 'slice', name: `[]${elem.name}`, elem };
  },
  array<T>(elem: Type<T>, length: number): ArrayType<T> {
    return { kind: 'array', name: `[${length}]${elem.name}`, elem, length };
  },
  map<K, V>(key: Type<K>, elem: Type<V>): MapType<K, V> {
    return { kind: 'map', name: `map[${key.name}]${elem.name}`, key, elem };
  },
  record<V>(elem: Type<V>): RecordType<V> {
    return { kind: 'record', name: `map[string]${elem.name}`, elem };
  },
  pointer<T>(elem: Type<T>): PointerType<T> {
    return { kind: 'pointer', name: `*${elem.name}`, elem };
  },
  struct,
  hook<T>(name: string, hooks: Hooks<T>): HookType<T> {
    return { kind: 'hook', name, hooks };
  },
  /** The same representation under another name, for renamed scalar and byte types. */
  named<D extends TypeDescriptor>(name: string, base: D): D {
    return { ...base, name };
  },
};

export function typeName(d: TypeDescriptor): string {
  return d.name;
}

/** Step through one pointer, the way field options look at a field's type. */
export function indirect(d: TypeDescriptor): TypeDescriptor {
  return d.kind === 'pointer' ? d.elem : d;
}

export function zeroValue(d: TypeDescriptor): unknown {
  switch (d.kind) {
    case 'bool':
      return false;
    case 'int':
    case 'float':
      return 0;
    case 'bigint':
      return 0n;
    case 'string':
      return '';
    case 'array':
      return Array.from({ length: d.length }, () => zeroValue(d.elem));
    case 'struct':
      return d.create();
    case 'hook':
      return d.hooks.zero();
    case 'number':
      return new JsonNumber('');
    case 'bytes':
    case 'raw':
    case 'value':
    case 'object':
    case 'slice':
    case 'map':
    case 'record':
    case 'pointer':
      return null;
  }
}

function zeroFields(fields: readonly FieldDecl[]): Record<string, unknown> {
  const obj: Record<string, unknown> = {};
  for (const f of fields) obj[f.name] = zeroValue(f.type);
  return obj;
}

const registry = new WeakMap<object, StructType>();

/** Bind a class to its descriptor so instances encode without one being passed. */
export function registerStruct<T extends object>(ctor: abstract new (...args: never[]) => T, type: StructType<T>): void {
  const proto: unknown = ctor.prototype;
  if (typeof proto === 'object' && proto !== null) registry.set(proto, type);
}

/** Descriptor registered for the value's class, looked up along its prototype chain. */
export function structFor(value: object): StructType | undefined {
  let proto: unknown = Object.getPrototypeOf(value);
  while (proto !== null && typeof proto === 'object') {
    const found = registry.get(proto);
    if (found) return found;
    proto = Object.getPrototypeOf(proto);
  }
  return undefined;
}
