/**
 * @file neighbor.ts
 * @description Neighbor-finding operations: nextafter, spacing (and divmod).
 */

import { type half, toUint2 } from './types.js';
import { HALF, HALF_EXP_MASK, HALF_NAN, HALF_DENORM_MIN } from './layout.js';
import { halfToSingle } from './convert.js';
import { isNaN, isZero, signBit } from './classify.js';

export { divmod, type HalfDivmod } from './convert.js';

/** Offset between a value's exponent field and the exponent field of its spacing */
const SPACING_EXP_OFFSET = 24;

/**
 * Gap to the next representable half above `h`.
 *
 * Infinities and NaNs give NaN; zeros and denormals give the smallest
 * denormal.  Otherwise the result is a power of two whose exponent field is
 * `exp(h) - 24`, never less than 1.
 */
export function spacing(h: half): half {
  h = toUint2(h);
  const exp = h & HALF_EXP_MASK;
  if (exp === HALF_EXP_MASK) return HALF_NAN;
  if (exp === 0) return HALF_DENORM_MIN;
  const retExp = Math.max((exp >> HALF.fracBits) - SPACING_EXP_OFFSET, 1);
  return retExp << HALF.fracBits;
}

/**
 * The half adjacent to `x` in the direction of `y`.
 *
 * If the two compare equal (including +0 and -0) the result is `y` itself.
 * Otherwise the raw pattern moves by one, since within a sign region adjacent
 * patterns are adjacent values.
 */
export function nextafter(x: half, y: half): half {
  x = toUint2(x);
  y = toUint2(y);
  if (isNaN(x) || isNaN(y)) return HALF_NAN;

  const fx = halfToSingle(x);
  const fy = halfToSingle(y);
  if (fx === fy) return y;

  if (isZero(x)) {
    return fy > 0 ? HALF_DENORM_MIN : HALF.signMask | HALF_DENORM_MIN;
  }

  // Toward zero means one pattern down, away from zero one pattern up
  if ((fx > fy) === !signBit(x)) {
    return x - 1;
  }
  return x + 1;
}
