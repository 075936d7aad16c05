/**
 * @file sign.ts
 * @description Sign manipulation.  Only the sign bit changes, NaNs included.
 */

import { type half, toUint2 } from './types.js';
import { HALF_SIGN_MASK } from './layout.js';

export function neg(h: half): half {
  return toUint2(h ^ HALF_SIGN_MASK);
}

export function abs(h: half): half {
  return h & 0x7FFF;
}

/** Magnitude of `x` with the sign of `y` */
export function copysign(x: half, y: half): half {
  return (x & 0x7FFF) | (y & HALF_SIGN_MASK);
}
