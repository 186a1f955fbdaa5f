/**
 * UTF-8 helpers shared by the escaper and the scanner.
 */

export const RUNE_ERROR = 0xfffd;

/** One decoded rune; `size` is 1 for an invalid byte. */
export interface Rune {
  rune: number;
  size: number;
  valid: boolean;
}

const encoder = new TextEncoder();

export function encodeUtf8(s: string): Uint8Array {
  return encoder.encode(s);
}

function isCont(b: number | undefined): b is number {
  return b !== undefined && b >= 0x80 && b <= 0xbf;
}

/**
 * Decode the rune starting at `i`. Overlong forms, encoded surrogates, code
 * points above U+10FFFF and truncated sequences are invalid and consume a
 * single byte, so the caller can deal with the following bytes on their own.
 */
export function decodeRune(bytes: Uint8Array, i: number): Rune {
  const b0 = bytes[i];
  if (b0 === undefined) return { rune: RUNE_ERROR, size: 0, valid: false };
  if (b0 < 0x80) return { rune: b0, size: 1, valid: true };
  const invalid: Rune = { rune: RUNE_ERROR, size: 1, valid: false };
  const b1 = bytes[i + 1];
  if (b0 >= 0xc2 && b0 <= 0xdf) {
    if (!isCont(b1)) return invalid;
    return { rune: ((b0 & 0x1f) << 6) | (b1 & 0x3f), size: 2, valid: true };
  }
  if (b0 >= 0xe0 && b0 <= 0xef) {
    const lo = b0 === 0xe0 ? 0xa0 : 0x80;
    const hi = b0 === 0xed ? 0x9f : 0xbf;
    if (b1 === undefined || b1 < lo || b1 > hi) return invalid;
    const b2 = bytes[i + 2];
    if (!isCont(b2)) return invalid;
    return {
      rune: ((b0 & 0x0f) << 12) | ((b1 & 0x3f) << 6) | (b2 & 0x3f),
      size: 3,
      valid: true,
    };
  }
  if (b0 >= 0xf0 && b0 <= 0xf4) {
    const lo = b0 === 0xf0 ? 0x90 : 0x80;
    const hi = b0 === 0xf4 ? 0x8f : 0xbf;
    if (b1 === undefined || b1 < lo || b1 > hi) return invalid;
    const b2 = bytes[i + 2];
    const b3 = bytes[i + 3];
    if (!isCont(b2) || !isCont(b3)) return invalid;
    return {
      rune: ((b0 & 0x07) << 18) | ((b1 & 0x3f) << 12) | ((b2 & 0x3f) << 6) | (b3 & 0x3f),
      size: 4,
      valid: true,
    };
  }
  return invalid;
}

export function isValidUtf8(bytes: Uint8Array): boolean {
  for (let i = 0; i < bytes.length; ) {
    const r = decodeRune(bytes, i);
    if (!r.valid) return false;
    i += r.size;
  }
  return true;
}
