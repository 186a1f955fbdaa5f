/**
 * String escaping. Output is always 7-bit ASCII: every rune outside ASCII is
 * written as a \u escape with uppercase hex digits, CJK and full-width
 * punctuation included. Bytes that are not valid UTF-8 are written one by one
 * as \u00XX of their own value.
 */

import { decodeRune } from './utf8.js';

const HEX = '0123456789ABCDEF';

export function hex2(b: number): string {
  return HEX[b >> 4]! + HEX[b & 0xf]!;
}

export function hex4(u: number): string {
  return hex2(u >> 8) + hex2(u & 0xff);
}

const NAMED: Record<number, string> = {
  0x08: '\\b',
  0x09: '\\t',
  0x0a: '\\n',
  0x0c: '\\f',
  0x0d: '\\r',
};

/** Printable ASCII escaped only in HTML-safe mode. */
const HTML_UNSAFE = new Set([0x26, 0x27, 0x2b, 0x3c, 0x3e, 0x60, 0x7f]);

function buildTable(escapeHTML: boolean): (string | null)[] {
  const table: (string | null)[] = new Array(0x80).fill(null);
  for (let b = 0; b < 0x20; b++) table[b] = NAMED[b] ?? `\\u00${hex2(b)}`;
  table[0x5c] = '\\\\';
  table[0x22] = escapeHTML ? '\\u0022' : '\\"';
  if (escapeHTML) {
    for (const b of HTML_UNSAFE) table[b] = `\\u00${hex2(b)}`;
  }
  return table;
}

const HTML_SAFE_TABLE = buildTable(true);
const PLAIN_TABLE = buildTable(false);

/** Escape text for one rune above ASCII; supplementary runes become a surrogate pair. */
export function escapeRune(r: number): string {
  if (r <= 0xffff) return `\\u${hex4(r)}`;
  const v = r - 0x10000;
  return `\\u${hex4(0xd800 + (v >> 10))}\\u${hex4(0xdc00 + (v & 0x3ff))}`;
}

/**
 * Encode a host string as a quoted JSON string. A lone surrogate is written as
 * the replacement character, which is what `TextEncoder` turns it into.
 */
export function encodeString(s: string, escapeHTML = true): string {
  const table = escapeHTML ? HTML_SAFE_TABLE : PLAIN_TABLE;
  let out = '"';
  let start = 0;
  for (let i = 0; i < s.length; ) {
    const c = s.charCodeAt(i);
    if (c < 0x80) {
      const esc = table[c];
      if (esc === null || esc === undefined) {
        i++;
        continue;
      }
      out += s.slice(start, i) + esc;
      i++;
      start = i;
      continue;
    }
    out += s.slice(start, i);
    const cp = s.codePointAt(i) ?? c;
    if (cp >= 0xd800 && cp <= 0xdfff) {
      out += escapeRune(0xfffd);
      i++;
    } else {
      out += escapeRune(cp);
      i += cp > 0xffff ? 2 : 1;
    }
    start = i;
  }
  return out + s.slice(start) + '"';
}

/**
 * Encode raw bytes, nominally UTF-8, as a quoted JSON string. For any string
 * `s`, `encodeStringBytes(encodeUtf8(s))` equals `encodeString(s)`.
 */
export function encodeStringBytes(bytes: Uint8Array, escapeHTML = true): string {
  const table = escapeHTML ? HTML_SAFE_TABLE : PLAIN_TABLE;
  let out = '"';
  for (let i = 0; i < bytes.length; ) {
    const b = bytes[i]!;
    if (b < 0x80) {
      out += table[b] ?? String.fromCharCode(b);
      i++;
      continue;
    }
    const r = decodeRune(bytes, i);
    out += r.valid ? escapeRune(r.rune) : `\\u00${hex2(b)}`;
    i += r.size;
  }
  return out + '"';
}
