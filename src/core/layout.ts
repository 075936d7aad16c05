/**
 * @file layout.ts
 * @description Field layouts of the three binary floating-point encodings.
 *
 * Every encoding is `sign | exponent | mantissa` from the most significant bit
 * down.  An exponent field of all zeros marks zero/denormal values, all ones
 * marks infinity/NaN.
 */

import type { int4, uint2, uint4, uint8 } from './types.js';

/**
 * Encoding information for a single floating-point format.
 *
 * Half and single patterns are numbers, double patterns are bigints.
 */
export interface FloatLayout<T extends number | bigint> {
  readonly name: 'half' | 'single' | 'double';
  /** Width of the whole encoding in bits */
  readonly totalBits: int4;
  /** Width of the exponent field */
  readonly expBits: int4;
  /** Width of the mantissa field */
  readonly fracBits: int4;
  readonly bias: int4;
  /** Exponent field with every bit set (infinity / NaN) */
  readonly maxExponent: int4;
  /**
   * Mantissa bits held in the most significant 32-bit word of the encoding.
   * Equal to fracBits for encodings of 32 bits or fewer.
   */
  readonly highFracBits: int4;

  readonly signMask: T;
  readonly expMask: T;
  readonly fracMask: T;

  readonly posZero: T;
  readonly negZero: T;
  readonly posInf: T;
  readonly negInf: T;
  /** Canonical quiet NaN (top mantissa bit set) */
  readonly nan: T;
}

export const HALF: FloatLayout<uint2> = {
  name: 'half',
  totalBits: 16,
  expBits: 5,
  fracBits: 10,
  bias: 15,
  maxExponent: 0x1F,
  highFracBits: 10,
  signMask: 0x8000,
  expMask: 0x7C00,
  fracMask: 0x03FF,
  posZero: 0x0000,
  negZero: 0x8000,
  posInf: 0x7C00,
  negInf: 0xFC00,
  nan: 0x7E00,
};

export const SINGLE: FloatLayout<uint4> = {
  name: 'single',
  totalBits: 32,
  expBits: 8,
  fracBits: 23,
  bias: 127,
  maxExponent: 0xFF,
  highFracBits: 23,
  signMask: 0x8000_0000,
  expMask: 0x7F80_0000,
  fracMask: 0x007F_FFFF,
  posZero: 0x0000_0000,
  negZero: 0x8000_0000,
  posInf: 0x7F80_0000,
  negInf: 0xFF80_0000,
  nan: 0x7FC0_0000,
};

export const DOUBLE: FloatLayout<uint8> = {
  name: 'double',
  totalBits: 64,
  expBits: 11,
  fracBits: 52,
  bias: 1023,
  maxExponent: 0x7FF,
  highFracBits: 20,
  signMask: 0x8000_0000_0000_0000n,
  expMask: 0x7FF0_0000_0000_0000n,
  fracMask: 0x000F_FFFF_FFFF_FFFFn,
  posZero: 0x0000_0000_0000_0000n,
  negZero: 0x8000_0000_0000_0000n,
  posInf: 0x7FF0_0000_0000_0000n,
  negInf: 0xFFF0_0000_0000_0000n,
  nan: 0x7FF8_0000_0000_0000n,
};

// Shorthands for the half fields, used by the predicates that work on the
// raw 16-bit pattern.
export const HALF_SIGN_MASK = HALF.signMask;
export const HALF_EXP_MASK = HALF.expMask;
export const HALF_FRAC_MASK = HALF.fracMask;
export const HALF_PZERO = HALF.posZero;
export const HALF_NZERO = HALF.negZero;
export const HALF_PINF = HALF.posInf;
export const HALF_NINF = HALF.negInf;
export const HALF_NAN = HALF.nan;
/** Smallest positive denormal, 2^-24 */
export const HALF_DENORM_MIN: uint2 = 0x0001;
/** Largest finite half, 65504 */
export const HALF_MAX: uint2 = 0x7BFF;
