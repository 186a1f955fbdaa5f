/**
 * Codec errors. Every error carries the byte offset it relates to when one is
 * known; decode errors always do.
 */

type ConstructorOptions = { byteOffset?: number; cause?: unknown };

export class JsonError extends Error {
  override readonly name: string = 'JsonError';
  readonly byteOffset?: number;

  constructor(message: string, options?: ConstructorOptions) {
    super(message);
    this.byteOffset = options?.byteOffset;
    if (options?.cause !== undefined) this.cause = options.cause;
    Object.setPrototypeOf(this, JsonError.prototype);
  }

  /** Human-readable location string */
  get location(): string {
    if (this.byteOffset !== undefined) {
      return `byte offset ${this.byteOffset}`;
    }
    return '';
  }

  override toString(): string {
    const loc = this.location;
    return loc ? `${this.message} (${loc})` : this.message;
  }
}

/** Malformed input. `byteOffset` counts the bytes read before the error, the offending byte included. */
export class JsonSyntaxError extends JsonError {
  override readonly name = 'JsonSyntaxError';
  constructor(message: string, options?: ConstructorOptions) {
    super(message, options);
    Object.setPrototypeOf(this, JsonSyntaxError.prototype);
  }
}

type TypeErrorOptions = ConstructorOptions & { struct?: string; field?: string };

/** A JSON value that cannot be stored in the requested type. */
export class UnmarshalTypeError extends JsonError {
  override readonly name = 'UnmarshalTypeError';
  /** Description of the JSON value: "bool", "array", "number 1.5", ... */
  readonly value: string;
  /** Name of the type the value could not be assigned to */
  readonly type: string;
  readonly struct?: string;
  /** Dotted path of the struct field, when the value belongs to one */
  readonly field?: string;

  constructor(value: string, type: string, options?: TypeErrorOptions) {
    const message =
      options?.struct !== undefined && options.field !== undefined
        ? `cannot unmarshal ${value} into struct field ${options.struct}.${options.field} of type ${type}`
        : `cannot unmarshal ${value} into value of type ${type}`;
    super(message, options);
    this.value = value;
    this.type = type;
    this.struct = options?.struct;
    this.field = options?.field;
    Object.setPrototypeOf(this, UnmarshalTypeError.prototype);
  }
}

/** A value the encoder cannot represent: NaN, infinities, cycles, bad number text. */
export class UnsupportedValueError extends JsonError {
  override readonly name = 'UnsupportedValueError';
  readonly value: string;
  constructor(value: string, message?: string, options?: ConstructorOptions) {
    super(`unsupported value: ${message ?? value}`, options);
    this.value = value;
    Object.setPrototypeOf(this, UnsupportedValueError.prototype);
  }
}

/** A host value with no JSON representation at all. */
export class UnsupportedTypeError extends JsonError {
  override readonly name = 'UnsupportedTypeError';
  readonly type: string;
  constructor(type: string, options?: ConstructorOptions) {
    super(`unsupported type: ${type}`, options);
    this.type = type;
    Object.setPrototypeOf(this, UnsupportedTypeError.prototype);
  }
}

/** A marshal hook failed or produced something that is not JSON. */
export class MarshalerError extends JsonError {
  override readonly name = 'MarshalerError';
  readonly type: string;
  readonly hook: string;
  constructor(type: string, hook: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`error calling ${hook} for type ${type}: ${detail}`, { cause });
    this.type = type;
    this.hook = hook;
    Object.setPrototypeOf(this, MarshalerError.prototype);
  }
}

export class InvalidUTF8Error extends JsonError {
  override readonly name = 'InvalidUTF8Error';
  constructor(message: string, options?: ConstructorOptions) {
    super(message, options);
    Object.setPrototypeOf(this, InvalidUTF8Error.prototype);
  }
}

/** The decode target cannot receive a value at all; a caller bug, not bad input. */
export class InvalidUnmarshalError extends JsonError {
  override readonly name = 'InvalidUnmarshalError';
  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, InvalidUnmarshalError.prototype);
  }
}

export class UnknownFieldError extends JsonError {
  override readonly name = 'UnknownFieldError';
  readonly key: string;
  constructor(key: string, options?: ConstructorOptions) {
    super(`unknown field ${JSON.stringify(key)}`, options);
    this.key = key;
    Object.setPrototypeOf(this, UnknownFieldError.prototype);
  }
}

/** Raised by a stream decoder asked for a value after the stream ended cleanly. */
export class JsonEOFError extends JsonError {
  override readonly name = 'JsonEOFError';
  constructor(options?: ConstructorOptions) {
    super('end of input', options);
    Object.setPrototypeOf(this, JsonEOFError.prototype);
  }
}
