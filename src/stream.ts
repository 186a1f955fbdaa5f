/**
 * Incremental I/O: successive JSON values read from an async byte source,
 * and values written one per line to a Writable.
 */

import type { Writable } from 'node:stream';
import { decodeInto, type DecodeOptions } from './binder.js';
import { encode, type EncodeOptions } from './encoder.js';
import { JsonEOFError, JsonSyntaxError } from './errors.js';
import { indent } from './indent.js';
import { debug } from './logger.js';
import { decode } from './parser.js';
import { Byte } from './scanner.js';
import type { Type, TypeDescriptor } from './types.js';
import { encodeUtf8 } from './utf8.js';
import type { Value } from './value.js';

function isSpace(c: number): boolean {
  return c === Byte.Space || c === Byte.Tab || c === Byte.Newline || c === Byte.Return;
}

/** Bytes that end a bare number or literal. */
function isDelimiter(c: number): boolean {
  return (
    isSpace(c) ||
    c === Byte.Comma ||
    c === Byte.Colon ||
    c === Byte.Quote ||
    c === Byte.LBrace ||
    c === Byte.RBrace ||
    c === Byte.LBracket ||
    c === Byte.RBracket
  );
}

function concat(a: Uint8Array, b: Uint8Array): Uint8Array {
  const out = new Uint8Array(a.length + b.length);
  out.set(a);
  out.set(b, a.length);
  return out;
}

/**
 * Reads a stream of JSON values. Values may follow each other with or
 * without whitespace between them. Once a read fails, every later read
 * fails with the same error.
 */
export class StreamDecoder {
  private readonly source: AsyncIterator<Uint8Array | string>;
  private buf: Uint8Array = new Uint8Array(0);
  /** Bytes dropped from the front of `buf` so far. */
  private consumed = 0;
  private done = false;
  private err: Error | undefined;

  constructor(
    source: AsyncIterable<Uint8Array | string>,
    private readonly options: DecodeOptions = {}
  ) {
    this.source = source[Symbol.asyncIterator]();
  }

  /** Pull one more chunk; false once the source is exhausted. */
  private async fill(): Promise<boolean> {
    if (this.done) return false;
    const r = await this.source.next();
    if (r.done) {
      this.done = true;
      return false;
    }
    const chunk = typeof r.value === 'string' ? encodeUtf8(r.value) : r.value;
    debug('stream: read %d bytes (%d buffered)', chunk.length, this.buf.length);
    this.buf = concat(this.buf, chunk);
    return true;
  }

  private drop(n: number): void {
    this.buf = this.buf.subarray(n);
    this.consumed += n;
  }

  /** Skip whitespace; returns the next byte, or -1 at end of input. */
  private async peekByte(): Promise<number> {
    for (;;) {
      let i = 0;
      while (i < this.buf.length && isSpace(this.buf[i]!)) i++;
      this.drop(i);
      if (this.buf.length > 0) return this.buf[0]!;
      if (!(await this.fill())) return -1;
    }
  }

  /**
   * End of the value starting at `buf[0]`, or -1 when more input is needed.
   * At end of input whatever is buffered is handed to the parser, which
   * reports the truncation.
   */
  private scanEnd(): number {
    const b = this.buf;
    const first = b[0]!;
    if (first === Byte.LBrace || first === Byte.LBracket || first === Byte.Quote) {
      let depth = 0;
      let inString = false;
      let escaped = false;
      for (let i = 0; i < b.length; i++) {
        const c = b[i]!;
        if (inString) {
          if (escaped) escaped = false;
          else if (c === Byte.Backslash) escaped = true;
          else if (c === Byte.Quote) {
            inString = false;
            if (depth === 0) return i + 1;
          }
          continue;
        }
        if (c === Byte.Quote) inString = true;
        else if (c === Byte.LBrace || c === Byte.LBracket) depth++;
        else if (c === Byte.RBrace || c === Byte.RBracket) {
          depth--;
          if (depth === 0) return i + 1;
        }
      }
      return this.done ? b.length : -1;
    }
    let i = 0;
    while (i < b.length && !isDelimiter(b[i]!)) i++;
    if (i === 0) return 1;
    if (i === b.length && !this.done) return -1;
    return i;
  }

  /** Bytes of the next complete value, taken off the buffer. */
  private async nextValue(): Promise<{ bytes: Uint8Array; offset: number }> {
    if (this.err) throw this.err;
    if ((await this.peekByte()) === -1) {
      this.err = new JsonEOFError({ byteOffset: this.consumed });
      throw this.err;
    }
    let end = this.scanEnd();
    while (end < 0) {
      await this.fill();
      end = this.scanEnd();
    }
    const offset = this.consumed;
    const bytes = this.buf.slice(0, end);
    this.drop(end);
    return { bytes, offset };
  }

  /** Syntax errors are reported against the whole stream, not the single value. */
  private fail(err: unknown, offset: number): never {
    if (err instanceof JsonSyntaxError) {
      this.err = new JsonSyntaxError(err.message, {
        byteOffset: offset + (err.byteOffset ?? 0),
        cause: err,
      });
      throw this.err;
    }
    throw err;
  }

  /** Next value in the ordered value model. Rejects with JsonEOFError at a clean end of stream. */
  async decode(): Promise<Value> {
    const { bytes, offset } = await this.nextValue();
    try {
      return decode(bytes, this.options);
    } catch (err) {
      return this.fail(err, offset);
    }
  }

  /** Next value decoded into the described type (see `decodeInto`). */
  async decodeInto<T>(type: Type<T>, target?: T): Promise<T> {
    const { bytes, offset } = await this.nextValue();
    try {
      return decodeInto(bytes, type, target, this.options);
    } catch (err) {
      return this.fail(err, offset);
    }
  }

  /** Whether another element follows in the array or object being walked. */
  async more(): Promise<boolean> {
    if (this.err) return false;
    const c = await this.peekByte();
    return c !== -1 && c !== Byte.RBracket && c !== Byte.RBrace;
  }

  /** Input read from the source but not yet decoded. */
  buffered(): Uint8Array {
    return this.buf.slice();
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<Value, void, undefined> {
    while (await this.more()) yield await this.decode();
  }
}

/** Writes each value followed by a newline. */
export class StreamEncoder {
  private prefix = '';
  private indentText = '';
  private escapeHTML: boolean;

  constructor(
    private readonly out: Writable,
    private readonly options: EncodeOptions = {}
  ) {
    this.escapeHTML = options.escapeHTML ?? true;
  }

  setIndent(prefix: string, indentText: string): void {
    this.prefix = prefix;
    this.indentText = indentText;
  }

  setEscapeHTML(on: boolean): void {
    this.escapeHTML = on;
  }

  /** Nothing is written when encoding fails. */
  async encode(value: unknown, type?: TypeDescriptor): Promise<void> {
    let bytes = encode(value, type, { ...this.options, escapeHTML: this.escapeHTML });
    if (this.prefix !== '' || this.indentText !== '') {
      bytes = indent(bytes, this.prefix, this.indentText);
    }
    const line = concat(bytes, new Uint8Array([Byte.Newline]));
    await new Promise<void>((resolve, reject) => {
      this.out.write(line, (err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }
}
