/**
 * Re-rendering of encoded JSON: compaction, indentation and HTML escaping.
 * Input is validated first, so everything outside a string literal is either
 * whitespace or punctuation.
 */

import { hex2 } from './escape.js';
import { checkValid, toBytes } from './parser.js';
import { Byte } from './scanner.js';
import { ByteWriter } from './writer.js';

function isSpace(c: number): boolean {
  return c === Byte.Space || c === Byte.Tab || c === Byte.Newline || c === Byte.Return;
}

/**
 * Write `src[i]`, escaping it when it is one of `<`, `>`, `&` or starts
 * U+2028/U+2029. Returns the number of bytes consumed.
 */
function writeHtmlSafe(out: ByteWriter, src: Uint8Array, i: number): number {
  const c = src[i]!;
  if (c === 0x3c || c === 0x3e || c === 0x26) {
    out.writeAscii(`\\u00${hex2(c)}`);
    return 1;
  }
  if (c === 0xe2 && src[i + 1] === 0x80) {
    const last = src[i + 2];
    if (last === 0xa8 || last === 0xa9) {
      out.writeAscii(`\\u202${(last & 0xf).toString(16)}`);
      return 3;
    }
  }
  out.writeByte(c);
  return 1;
}

/** Escape `<`, `>`, `&`, U+2028 and U+2029 so the JSON is safe inside an HTML script element. */
export function htmlEscape(src: Uint8Array | string): Uint8Array {
  const bytes = toBytes(src);
  const out = new ByteWriter(bytes.length + 16);
  for (let i = 0; i < bytes.length; ) i += writeHtmlSafe(out, bytes, i);
  return out.bytes();
}

/** Remove insignificant whitespace. Throws JsonSyntaxError on invalid input. */
export function compact(src: Uint8Array | string, escapeHTML = false): Uint8Array {
  const bytes = toBytes(src);
  checkValid(bytes);
  const out = new ByteWriter(bytes.length);
  let inString = false;
  let escaped = false;
  for (let i = 0; i < bytes.length; ) {
    const c = bytes[i]!;
    if (inString) {
      if (escaped) escaped = false;
      else if (c === Byte.Backslash) escaped = true;
      else if (c === Byte.Quote) inString = false;
    } else if (isSpace(c)) {
      i++;
      continue;
    } else if (c === Byte.Quote) {
      inString = true;
    }
    if (escapeHTML) {
      i += writeHtmlSafe(out, bytes, i);
    } else {
      out.writeByte(c);
      i++;
    }
  }
  return out.bytes();
}

/**
 * Lay out valid JSON with one element per line. Each line after the first
 * starts with `prefix` followed by one `indent` per nesting level; keys are
 * followed by `": "`; empty objects and arrays stay `{}` and `[]`.
 */
export function indent(src: Uint8Array | string, prefix: string, indentText: string): Uint8Array {
  const bytes = toBytes(src);
  checkValid(bytes);
  const out = new ByteWriter(bytes.length * 2);
  const enc = new TextEncoder();
  const prefixBytes = enc.encode(prefix);
  const indentBytes = enc.encode(indentText);
  const newline = (depth: number): void => {
    out.writeByte(Byte.Newline);
    out.write(prefixBytes);
    for (let i = 0; i < depth; i++) out.write(indentBytes);
  };

  let depth = 0;
  let needIndent = false;
  let inString = false;
  let escaped = false;
  for (const c of bytes) {
    if (inString) {
      out.writeByte(c);
      if (escaped) escaped = false;
      else if (c === Byte.Backslash) escaped = true;
      else if (c === Byte.Quote) inString = false;
      continue;
    }
    if (isSpace(c)) continue;
    if (needIndent && c !== Byte.RBrace && c !== Byte.RBracket) {
      needIndent = false;
      depth++;
      newline(depth);
    }
    switch (c) {
      case Byte.Quote:
        inString = true;
        out.writeByte(c);
        break;
      case Byte.LBrace:
      case Byte.LBracket:
        // held back so that empty containers print as {} and []
        needIndent = true;
        out.writeByte(c);
        break;
      case Byte.Comma:
        out.writeByte(c);
        newline(depth);
        break;
      case Byte.Colon:
        out.writeByte(c);
        out.writeByte(Byte.Space);
        break;
      case Byte.RBrace:
      case Byte.RBracket:
        if (needIndent) {
          needIndent = false;
        } else {
          depth--;
          newline(depth);
        }
        out.writeByte(c);
        break;
      default:
        out.writeByte(c);
    }
  }
  return out.bytes();
}
