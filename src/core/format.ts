/**
 * @file format.ts
 * @description Text conversion of half values: decimal printing, parsing, and
 * field decomposition.
 */

import { type half, type int4, toUint2 } from './types.js';
import { HALF, HALF_NAN, HALF_PINF, HALF_SIGN_MASK } from './layout.js';
import { Rounding, halfToSingle, doubleToHalf } from './convert.js';
import { FloatClass, classify, signBit } from './classify.js';
import { HalfParseError } from './error.js';

// Precision needed to guarantee binary -> decimal -> binary round trip
const DECIMAL_MIN_PRECISION = Math.floor(HALF.fracBits * 0.30103);
const DECIMAL_MAX_PRECISION = Math.ceil((HALF.fracBits + 1) * 0.30103) + 1;

const HEX_LITERAL = /^0x[0-9a-f]{1,4}$/i;
const DECIMAL_LITERAL = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;
const INF_LITERAL = /^[+-]?inf(inity)?$/i;
const NAN_LITERAL = /^[+-]?nan$/i;

/** Sign, exponent field, and mantissa field of a half pattern */
export interface HalfFields {
  bits: half;
  sign: 0 | 1;
  exponent: int4;
  mantissa: int4;
  type: FloatClass;
}

export function describeHalf(h: half): HalfFields {
  h = toUint2(h);
  return {
    bits: h,
    sign: signBit(h) ? 1 : 0,
    exponent: (h >> HALF.fracBits) & HALF.maxExponent,
    mantissa: h & HALF.fracMask,
    type: classify(h),
  };
}

/** Pattern as `0x` followed by four lowercase hex digits */
export function halfToHex(h: half): string {
  return '0x' + toUint2(h).toString(16).padStart(4, '0');
}

/** Pattern as `s eeeee mmmmmmmmmm` */
export function halfToBinary(h: half): string {
  const digits = toUint2(h).toString(2).padStart(16, '0');
  return digits.slice(0, 1) + ' ' + digits.slice(1, 6) + ' ' + digits.slice(6);
}

/**
 * Print a half as a decimal string.
 *
 * Uses the fewest significant digits that read back (via parseHalf) as the
 * same pattern.  If forcesci is true, scientific notation is always used.
 */
export function printHalf(h: half, forcesci: boolean = false): string {
  h = toUint2(h);
  const sgn = signBit(h) ? '-' : '';
  switch (classify(h)) {
    case FloatClass.nan:
      return 'nan';
    case FloatClass.infinity:
      return sgn + 'inf';
    case FloatClass.zero:
      return sgn + '0';
    default:
      break;
  }

  const host = halfToSingle(h);
  let res = '';
  for (let prec = DECIMAL_MIN_PRECISION; prec <= DECIMAL_MAX_PRECISION; ++prec) {
    res = forcesci ? host.toExponential(prec - 1) : host.toPrecision(prec);
    if (doubleToHalf(parseFloat(res), Rounding.nearestEven) === h) break;
  }

  // Strip trailing zeros, keeping one digit after a fixed-notation point
  if (res.includes('e')) {
    res = res.replace(/\.?0+(e)/, '$1');
  } else if (res.includes('.')) {
    res = res.replace(/(\.\d*?)0+$/, '$1');
    if (res.endsWith('.'))
      res += '0';
  }
  return res;
}

/**
 * Read a half from text.
 *
 * Accepts raw patterns (`0x0000` to `0xffff`), decimal literals, and
 * `inf`/`infinity`/`nan` with an optional sign.  A raw pattern already carries
 * its sign bit and takes no sign prefix (`-0x3c00` is rejected; write
 * `0xbc00`).  Decimal literals are narrowed with round-to-nearest-even unless
 * another rounding is given.
 */
export function parseHalf(text: string, rounding: Rounding = Rounding.nearestEven): half {
  const s = text.trim();
  if (HEX_LITERAL.test(s))
    return parseInt(s.slice(2), 16);

  const sign = s.startsWith('-') ? HALF_SIGN_MASK : 0;
  if (NAN_LITERAL.test(s))
    return sign | HALF_NAN;
  if (INF_LITERAL.test(s))
    return sign | HALF_PINF;
  if (DECIMAL_LITERAL.test(s))
    return doubleToHalf(Number(s), rounding);

  throw new HalfParseError(text);
}
