/**
 * @file classify.ts
 * @description Classification predicates on the raw half pattern.
 */

import type { half } from './types.js';
import { HALF_SIGN_MASK, HALF_EXP_MASK, HALF_FRAC_MASK, HALF_PINF } from './layout.js';

/** The various classes of floating-point encodings */
export enum FloatClass {
  normalized = 0,
  infinity = 1,
  zero = 2,
  nan = 3,
  denormalized = 4,
}

export function isNaN(h: half): boolean {
  return (h & HALF_EXP_MASK) === HALF_EXP_MASK && (h & HALF_FRAC_MASK) !== 0;
}

/** True for either infinity; the sign is ignored */
export function isInf(h: half): boolean {
  return (h & 0x7FFF) === HALF_PINF;
}

export function isFinite(h: half): boolean {
  return (h & HALF_EXP_MASK) !== HALF_EXP_MASK;
}

/** True for +0 and -0 */
export function isZero(h: half): boolean {
  return (h & 0x7FFF) === 0;
}

export function isDenormal(h: half): boolean {
  return (h & HALF_EXP_MASK) === 0 && (h & HALF_FRAC_MASK) !== 0;
}

/** The sign bit, also for zeros and NaNs */
export function signBit(h: half): boolean {
  return (h & HALF_SIGN_MASK) !== 0;
}

export function classify(h: half): FloatClass {
  const exp = h & HALF_EXP_MASK;
  const frac = h & HALF_FRAC_MASK;
  if (exp === 0)
    return frac === 0 ? FloatClass.zero : FloatClass.denormalized;
  if (exp === HALF_EXP_MASK)
    return frac === 0 ? FloatClass.infinity : FloatClass.nan;
  return FloatClass.normalized;
}
