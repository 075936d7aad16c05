/**
 * @file convert.ts
 * @description Conversion between half precision and the wider IEEE 754 formats.
 *
 * Widening is exact.  Narrowing truncates the mantissa by default; gradual
 * underflow produces denormals, magnitudes below the smallest denormal flush to
 * signed zero, and overflow saturates to signed infinity.  Round-to-nearest-even
 * is available as an explicit opt-in.
 *
 * Both directions work on the most significant 32-bit word of the wider
 * encoding: it holds the sign, the whole exponent, and every mantissa bit that
 * can survive in a half.  The low word of a double only matters for NaN
 * detection and rounding.
 */

import { type half, type int4, type uint4, type uint8, toUint2, toUint4 } from './types.js';
import {
  type FloatLayout,
  HALF,
  SINGLE,
  DOUBLE,
  HALF_SIGN_MASK,
  HALF_PINF,
  HALF_NAN,
} from './layout.js';
import {
  floatToRawBits,
  floatFromRawBits,
  doubleToRawBits,
  doubleFromRawBits,
  splitWords,
  joinWords,
} from './rawbits.js';

/** How mantissa bits that do not fit in a half are discarded */
export enum Rounding {
  /** Drop the low bits (bit-compatible default) */
  truncate = 0,
  /** Round to nearest, ties to even */
  nearestEven = 1,
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

/**
 * Shift a working mantissa right, applying the rounding policy to the bits
 * shifted out.  `stickyLow` reports nonzero bits below `val` (the low word of
 * a double).
 */
function shiftOut(val: uint4, shift: int4, stickyLow: boolean, rounding: Rounding): uint4 {
  const kept = val >>> shift;
  if (rounding === Rounding.truncate) return kept;
  const midbit = 1 << (shift - 1);
  const rest = val & ((1 << shift) - 1);
  if ((rest & midbit) !== 0 && ((rest & (midbit - 1)) !== 0 || stickyLow || (kept & 1) !== 0)) {
    return kept + 1; // A carry out of the mantissa bumps the exponent
  }
  return kept;
}

/**
 * Produce the top 32-bit word of `layout` representing half `h`.
 */
function widenHalf(h: half, layout: FloatLayout<number | bigint>): uint4 {
  h = toUint2(h);
  const sign = (h & HALF_SIGN_MASK) !== 0 ? 0x8000_0000 : 0;
  let exp: int4 = (h >> HALF.fracBits) & HALF.maxExponent;
  let frac = h & HALF.fracMask;
  const expPos = layout.highFracBits;
  const fracShift = layout.highFracBits - HALF.fracBits;

  if (exp === 0) {
    if (frac === 0) {
      // Signed zero
      return sign >>> 0;
    }
    // Denormal: normalize so the leading one becomes the implicit bit
    while ((frac & (1 << HALF.fracBits)) === 0) {
      frac <<= 1;
      exp--;
    }
    exp++;
    frac &= HALF.fracMask;
  } else if (exp === HALF.maxExponent) {
    // Infinity or NaN, payload carried over
    return (sign | (layout.maxExponent << expPos) | (frac << fracShift)) >>> 0;
  }

  exp = exp - HALF.bias + layout.bias;
  return (sign | (exp << expPos) | (frac << fracShift)) >>> 0;
}

/**
 * Narrow the top 32-bit word of a `layout` encoding to half precision.
 */
function narrowToHalf(
  hi: uint4,
  stickyLow: boolean,
  layout: FloatLayout<number | bigint>,
  rounding: Rounding,
): half {
  const sign = (hi >>> 16) & HALF_SIGN_MASK;
  const rawExp = (hi >>> layout.highFracBits) & layout.maxExponent;
  let frac = hi & ((1 << layout.highFracBits) - 1);
  const exp: int4 = rawExp - layout.bias + HALF.bias;
  const fracShift = layout.highFracBits - HALF.fracBits;

  if (exp <= 0) {
    if (exp < -HALF.fracBits) {
      // Below half the smallest denormal, or a denormal of the wider format
      return sign;
    }
    frac |= 1 << layout.highFracBits;
    return sign | shiftOut(frac, fracShift + 1 - exp, stickyLow, rounding);
  }

  if (exp >= HALF.maxExponent) {
    if (rawExp === layout.maxExponent && (frac !== 0 || stickyLow)) {
      return sign | HALF_NAN | (frac >>> fracShift);
    }
    return sign | HALF_PINF;
  }

  // The exponent rides along so a rounding carry can reach it (and infinity)
  return sign | shiftOut((exp << layout.highFracBits) | frac, fracShift, stickyLow, rounding);
}

// ---------------------------------------------------------------------------
// Bit-pattern conversions
// ---------------------------------------------------------------------------

export function halfBitsToSingleBits(h: half): uint4 {
  return widenHalf(h, SINGLE);
}

export function singleBitsToHalfBits(f: uint4, rounding: Rounding = Rounding.truncate): half {
  return narrowToHalf(toUint4(f), false, SINGLE, rounding);
}

export function halfBitsToDoubleBits(h: half): uint8 {
  return joinWords(widenHalf(h, DOUBLE), 0);
}

export function doubleBitsToHalfBits(d: uint8, rounding: Rounding = Rounding.truncate): half {
  const { hi, lo } = splitWords(d);
  return narrowToHalf(hi, lo !== 0, DOUBLE, rounding);
}

// ---------------------------------------------------------------------------
// Host number conversions
// ---------------------------------------------------------------------------

/** Promote a half to single precision (returned as the exactly equal number). */
export function halfToSingle(h: half): number {
  return floatFromRawBits(halfBitsToSingleBits(h));
}

export function halfToDouble(h: half): number {
  return doubleFromRawBits(halfBitsToDoubleBits(h));
}

/**
 * Demote a single-precision value to half.
 *
 * `f` is taken as a 32-bit float: a number that is not exactly representable
 * is first rounded to the nearest single, as a host float parameter would be.
 * A NaN argument carries the host's canonical payload.
 */
export function singleToHalf(f: number, rounding: Rounding = Rounding.truncate): half {
  return singleBitsToHalfBits(floatToRawBits(f), rounding);
}

/** Demote a double-precision value to half, working on all 52 mantissa bits. */
export function doubleToHalf(d: number, rounding: Rounding = Rounding.truncate): half {
  return doubleBitsToHalfBits(doubleToRawBits(d), rounding);
}

// ---------------------------------------------------------------------------
// divmod
// ---------------------------------------------------------------------------

export interface HalfDivmod {
  quotient: half;
  remainder: half;
}

/**
 * Quotient and remainder of `x / y`, computed in single precision.
 *
 * The quotient is the plain (not floored) single-precision quotient and
 * `remainder = x - quotient * y`, each step rounded to single before both
 * results are demoted.
 */
export function divmod(x: half, y: half): HalfDivmod {
  const fx = halfToSingle(x);
  const fy = halfToSingle(y);
  const div = Math.fround(fx / fy);
  const mod = Math.fround(fx - Math.fround(div * fy));
  return { quotient: singleToHalf(div), remainder: singleToHalf(mod) };
}
