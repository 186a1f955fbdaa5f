/**
 * Byte-level JSON scanner: whitespace, string, number and literal tokens
 * read straight from a Uint8Array. Offsets reported in errors count the bytes
 * consumed, the offending byte included.
 */

import { InvalidUTF8Error, JsonSyntaxError } from './errors.js';
import { RUNE_ERROR, decodeRune } from './utf8.js';

export const enum Byte {
  Tab = 0x09,
  Newline = 0x0a,
  Return = 0x0d,
  Space = 0x20,
  Quote = 0x22,
  Plus = 0x2b,
  Comma = 0x2c,
  Minus = 0x2d,
  Dot = 0x2e,
  Zero = 0x30,
  Nine = 0x39,
  Colon = 0x3a,
  LBracket = 0x5b,
  Backslash = 0x5c,
  RBracket = 0x5d,
  LowerF = 0x66,
  LowerN = 0x6e,
  LowerT = 0x74,
  LBrace = 0x7b,
  RBrace = 0x7d,
}

export interface ScanOptions {
  /** Reject strings containing invalid UTF-8 instead of decoding each bad byte as U+0000–U+00FF (default false) */
  strictUTF8?: boolean;
}

const utf8 = new TextDecoder('utf-8');

/** Quote a byte for an error message. */
export function quoteChar(c: number): string {
  if (c === 0x27) return "'\\''";
  if (c === Byte.Quote) return `'"'`;
  if (c === Byte.Newline) return "'\\n'";
  if (c === Byte.Return) return "'\\r'";
  if (c === Byte.Tab) return "'\\t'";
  if (c < 0x20 || c === 0x7f) return `'\\x${c.toString(16).padStart(2, '0')}'`;
  return `'${String.fromCharCode(c)}'`;
}

function isDigit(c: number): boolean {
  return c >= Byte.Zero && c <= Byte.Nine;
}

function hexValue(c: number): number {
  if (c >= 0x30 && c <= 0x39) return c - 0x30;
  if (c >= 0x41 && c <= 0x46) return c - 0x41 + 10;
  if (c >= 0x61 && c <= 0x66) return c - 0x61 + 10;
  return -1;
}

export class Scanner {
  pos = 0;
  private readonly strictUTF8: boolean;

  constructor(
    readonly data: Uint8Array,
    options: ScanOptions = {}
  ) {
    this.strictUTF8 = options.strictUTF8 ?? false;
  }

  get atEnd(): boolean {
    return this.pos >= this.data.length;
  }

  /** Current byte, or -1 at end of input. */
  peek(): number {
    return this.pos < this.data.length ? this.data[this.pos]! : -1;
  }

  skipWhitespace(): void {
    const d = this.data;
    while (this.pos < d.length) {
      const c = d[this.pos]!;
      if (c !== Byte.Space && c !== Byte.Tab && c !== Byte.Newline && c !== Byte.Return) return;
      this.pos++;
    }
  }

  fail(message: string, offset = this.pos + 1): never {
    throw new JsonSyntaxError(message, { byteOffset: offset });
  }

  /** Fail on the current byte, or with "unexpected end" when there is none. */
  failAt(context: string): never {
    const c = this.peek();
    if (c < 0) this.failEof();
    this.fail(`invalid character ${quoteChar(c)} ${context}`);
  }

  failEof(): never {
    this.fail('unexpected end of JSON input', this.data.length);
  }

  /** Read a string literal starting at the opening quote and return its content. */
  readString(): string {
    const d = this.data;
    if (d[this.pos] !== Byte.Quote) this.failAt('looking for beginning of value');
    this.pos++;
    const parts: string[] = [];
    let runStart = this.pos;
    const flush = (end: number): void => {
      if (end > runStart) parts.push(utf8.decode(d.subarray(runStart, end)));
    };
    for (;;) {
      if (this.pos >= d.length) this.failEof();
      const c = d[this.pos]!;
      if (c === Byte.Quote) {
        flush(this.pos);
        this.pos++;
        return parts.join('');
      }
      if (c < 0x20) this.fail(`invalid character ${quoteChar(c)} in string literal`);
      if (c === Byte.Backslash) {
        flush(this.pos);
        parts.push(this.readEscape());
        runStart = this.pos;
        continue;
      }
      if (c < 0x80) {
        this.pos++;
        continue;
      }
      const r = decodeRune(d, this.pos);
      if (r.valid) {
        this.pos += r.size;
        continue;
      }
      if (this.strictUTF8) {
        throw new InvalidUTF8Error('invalid UTF-8 in string literal', { byteOffset: this.pos + 1 });
      }
      flush(this.pos);
      parts.push(String.fromCharCode(c));
      this.pos++;
      runStart = this.pos;
    }
  }

  private readEscape(): string {
    const d = this.data;
    this.pos++;
    if (this.pos >= d.length) this.failEof();
    const c = d[this.pos]!;
    this.pos++;
    switch (c) {
      case Byte.Quote:
        return '"';
      case Byte.Backslash:
        return '\\';
      case 0x2f:
        return '/';
      case 0x62:
        return '\b';
      case 0x66:
        return '\f';
      case 0x6e:
        return '\n';
      case 0x72:
        return '\r';
      case 0x74:
        return '\t';
      case 0x75: {
        const hi = this.readHex4();
        if (hi < 0xd800 || hi > 0xdfff) return String.fromCharCode(hi);
        if (hi <= 0xdbff && d[this.pos] === Byte.Backslash && d[this.pos + 1] === 0x75) {
          const save = this.pos;
          this.pos += 2;
          const lo = this.readHex4();
          if (lo >= 0xdc00 && lo <= 0xdfff) return String.fromCharCode(hi, lo);
          // not a pair: the second escape stands on its own
          this.pos = save;
        }
        return String.fromCharCode(RUNE_ERROR);
      }
      default:
        this.fail(`invalid character ${quoteChar(c)} in string escape code`, this.pos);
    }
  }

  private readHex4(): number {
    const d = this.data;
    let v = 0;
    for (let i = 0; i < 4; i++) {
      if (this.pos >= d.length) this.failEof();
      const h = hexValue(d[this.pos]!);
      if (h < 0) this.fail(`invalid character ${quoteChar(d[this.pos]!)} in \\u hexadecimal character escape`);
      v = (v << 4) | h;
      this.pos++;
    }
    return v;
  }

  /** Read a number literal and return its text. */
  readNumber(): string {
    const d = this.data;
    const start = this.pos;
    const digits = (): void => {
      while (this.pos < d.length && isDigit(d[this.pos]!)) this.pos++;
    };
    const requireDigit = (): void => {
      if (this.pos >= d.length) this.failEof();
      if (!isDigit(d[this.pos]!)) this.failAt('in numeric literal');
    };
    if (d[this.pos] === Byte.Minus) {
      this.pos++;
      requireDigit();
    }
    if (d[this.pos] === Byte.Zero) {
      this.pos++;
    } else {
      requireDigit();
      digits();
    }
    if (d[this.pos] === Byte.Dot) {
      this.pos++;
      requireDigit();
      digits();
    }
    const e = d[this.pos];
    if (e === 0x65 || e === 0x45) {
      this.pos++;
      const s = d[this.pos];
      if (s === Byte.Plus || s === Byte.Minus) this.pos++;
      requireDigit();
      digits();
    }
    return utf8.decode(d.subarray(start, this.pos));
  }

  /** Read `true`, `false` or `null`. */
  readLiteral(): boolean | null {
    const c = this.peek();
    const word = c === Byte.LowerT ? 'true' : c === Byte.LowerF ? 'false' : c === Byte.LowerN ? 'null' : undefined;
    if (word === undefined) this.failAt('looking for beginning of value');
    this.pos++;
    for (let i = 1; i < word.length; i++) {
      const want = word.charCodeAt(i);
      if (this.pos >= this.data.length) this.failEof();
      if (this.data[this.pos] !== want) {
        this.failAt(`in literal ${word} (expecting ${quoteChar(want)})`);
      }
      this.pos++;
    }
    return word === 'null' ? null : word === 'true';
  }
}
