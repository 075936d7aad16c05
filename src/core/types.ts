/**
 * @file types.ts
 * @description Fixed-width integer aliases used across the half-float library.
 *
 * Widths up to 32 bits are carried in a JS number; 64-bit patterns are bigint:
 *   uint2 (16-bit), int4/uint4 (32-bit) → number
 *   uint8 (64-bit)                      → bigint
 */

/** Unsigned 16-bit integer */
export type uint2 = number;
/** Signed 32-bit integer */
export type int4 = number;
/** Unsigned 32-bit integer */
export type uint4 = number;
/** Unsigned 64-bit integer */
export type uint8 = bigint;

/** A binary16 value, stored as its raw unsigned 16-bit pattern */
export type half = uint2;

// ---- Masks ----

export const UINT2_MASK = 0xFFFF;
export const UINT8_MASK = 0xFFFF_FFFF_FFFF_FFFFn;

/** Reduce a number to an unsigned 16-bit pattern */
export function toUint2(val: number): uint2 {
  return val & UINT2_MASK;
}

/** Reduce a number to an unsigned 32-bit pattern */
export function toUint4(val: number): uint4 {
  return val >>> 0;
}

/** Reduce a bigint to an unsigned 64-bit pattern */
export function toUint8(val: bigint): uint8 {
  return val & UINT8_MASK;
}
