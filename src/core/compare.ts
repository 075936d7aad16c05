/**
 * @file compare.ts
 * @description Ordered comparisons of half values through single-precision promotion.
 *
 * Comparisons involving a NaN are unordered: every predicate but `ne` is false.
 * The `*Nonan` family requires that neither operand is NaN.  The requirement is
 * not checked; with a NaN operand the result is whatever the promoted
 * comparison yields.
 */

import type { half } from './types.js';
import { halfToSingle } from './convert.js';

/** Equality (==); +0 and -0 compare equal */
export function eq(h1: half, h2: half): boolean {
  return halfToSingle(h1) === halfToSingle(h2);
}

/** Inequality (!=) */
export function ne(h1: half, h2: half): boolean {
  return halfToSingle(h1) !== halfToSingle(h2);
}

/** Less-than-or-equal (<=) */
export function le(h1: half, h2: half): boolean {
  return halfToSingle(h1) <= halfToSingle(h2);
}

/** Less-than (<) */
export function lt(h1: half, h2: half): boolean {
  return halfToSingle(h1) < halfToSingle(h2);
}

/** Greater-than-or-equal (>=) */
export function ge(h1: half, h2: half): boolean {
  return halfToSingle(h1) >= halfToSingle(h2);
}

/** Greater-than (>) */
export function gt(h1: half, h2: half): boolean {
  return halfToSingle(h1) > halfToSingle(h2);
}

// ---------------------------------------------------------------------------
// Variants for callers that guarantee no NaN operand
// ---------------------------------------------------------------------------

export function eqNonan(h1: half, h2: half): boolean {
  return halfToSingle(h1) === halfToSingle(h2);
}

export function leNonan(h1: half, h2: half): boolean {
  return halfToSingle(h1) <= halfToSingle(h2);
}

export function ltNonan(h1: half, h2: half): boolean {
  return halfToSingle(h1) < halfToSingle(h2);
}

export function geNonan(h1: half, h2: half): boolean {
  return halfToSingle(h1) >= halfToSingle(h2);
}

export function gtNonan(h1: half, h2: half): boolean {
  return halfToSingle(h1) > halfToSingle(h2);
}
