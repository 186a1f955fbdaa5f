/**
 * ordered-json: a JSON codec that keeps object member order and duplicate
 * keys, and writes byte-for-byte reproducible output (all non-ASCII escaped,
 * HTML-safe by default).
 */

export { decodeInto, type DecodeOptions } from './binder.js';
export { encode, encodeIndent, encodeToString, isEmptyValue, type EncodeOptions } from './encoder.js';
export {
  InvalidUTF8Error,
  InvalidUnmarshalError,
  JsonEOFError,
  JsonError,
  JsonSyntaxError,
  MarshalerError,
  UnknownFieldError,
  UnmarshalTypeError,
  UnsupportedTypeError,
  UnsupportedValueError,
} from './errors.js';
export { encodeString, encodeStringBytes } from './escape.js';
export { fieldPlan, parseTag, type FieldPlan, type FieldTag, type PlanField } from './fields.js';
export { compact, htmlEscape, indent } from './indent.js';
export { formatFloat, isValidNumber, type FloatBits } from './number.js';
export { DEFAULT_MAX_DEPTH, checkValid, decode, valid, type ParseOptions } from './parser.js';
export { StreamDecoder, StreamEncoder } from './stream.js';
export {
  registerStruct,
  t,
  typeName,
  zeroValue,
  type FieldDecl,
  type Hooks,
  type HostOf,
  type StructType,
  type Type,
  type TypeDescriptor,
} from './types.js';
export {
  JsonNumber,
  OrderedObject,
  RawValue,
  isJsonArray,
  isJsonBoolean,
  isJsonNull,
  isJsonNumber,
  isJsonObject,
  isJsonString,
  toPlain,
  valueEquals,
  type Member,
  type PlainValue,
  type Value,
} from './value.js';
