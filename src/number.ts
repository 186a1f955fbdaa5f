/**
 * Number formatting and parsing.
 *
 * Floats are written with the shortest decimal text that reads back as the
 * same value at their own width. Exponent notation is used below 1e-6 and
 * from 1e21 up; both limits are compared at that width, and they are the
 * limits `Number.prototype.toString` already applies.
 */

import { UnsupportedValueError } from './errors.js';

export type FloatBits = 32 | 64;

const NUMBER_RE = /^-?(?:0|[1-9][0-9]*)(?:\.[0-9]+)?(?:[eE][+-]?[0-9]+)?$/;
const INTEGER_RE = /^-?[0-9]+$/;

/** Largest power of ten an integral exponent form may expand to. */
const MAX_EXPAND_EXPONENT = 400;

export function isValidNumber(text: string): boolean {
  return NUMBER_RE.test(text);
}

function nonFinite(v: number): string {
  if (Number.isNaN(v)) return 'NaN';
  return v > 0 ? '+Inf' : '-Inf';
}

/** Shortest significant digits, at most 9, that survive a float32 round trip. */
function shortestFloat32(f: number): string {
  for (let p = 1; p < 9; p++) {
    const s = f.toPrecision(p);
    if (Math.fround(Number(s)) === f) return s;
  }
  return f.toPrecision(9);
}

export function formatFloat(v: number, bits: FloatBits = 64): string {
  const f = bits === 32 ? Math.fround(v) : v;
  if (!Number.isFinite(f)) throw new UnsupportedValueError(nonFinite(f));
  if (Object.is(f, -0)) return '-0';
  if (bits === 64) return String(f);
  return String(Number(shortestFloat32(f)));
}

export function formatInt(n: number | bigint): string {
  if (typeof n === 'bigint') return n.toString();
  if (!Number.isSafeInteger(n)) {
    throw new UnsupportedValueError(String(n), `${n} is not a safe integer`);
  }
  return String(n);
}

/** Correctly rounded parse; `undefined` when the value overflows the width. */
export function parseFloatText(text: string, bits: FloatBits = 64): number | undefined {
  const n = bits === 32 ? Math.fround(Number(text)) : Number(text);
  return Number.isFinite(n) ? n : undefined;
}

export interface IntParseOptions {
  /** Accept `1e3` or `2.50e1` when the value is integral (default false) */
  allowIntegralExponent?: boolean;
}

function expandIntegral(text: string): bigint | undefined {
  const m = /^(-?)([0-9]+)(?:\.([0-9]+))?(?:[eE]([+-]?[0-9]+))?$/.exec(text);
  if (!m) return undefined;
  const [, sign = '', whole = '', frac = '', expText = '0'] = m;
  const exp = Number(expText) - frac.length;
  let digits = (whole + frac).replace(/^0+(?=\d)/, '');
  if (exp >= 0) {
    if (exp > MAX_EXPAND_EXPONENT && digits !== '0') return undefined;
    if (digits !== '0') digits += '0'.repeat(exp);
  } else {
    const cut = digits.length + exp;
    const dropped = cut > 0 ? digits.slice(cut) : digits;
    if (/[^0]/.test(dropped)) return undefined;
    digits = cut > 0 ? digits.slice(0, cut) : '0';
  }
  return BigInt(sign + digits);
}

/**
 * Parse an exact integer within [min, max]. Literals with a fraction or an
 * exponent are refused unless `allowIntegralExponent` is set and they denote
 * an integer.
 */
export function parseIntText(
  text: string,
  min: bigint,
  max: bigint,
  options: IntParseOptions = {}
): bigint | undefined {
  let n: bigint | undefined;
  if (INTEGER_RE.test(text)) {
    n = BigInt(text);
  } else if (options.allowIntegralExponent) {
    n = expandIntegral(text);
  }
  if (n === undefined || n < min || n > max) return undefined;
  return n;
}
