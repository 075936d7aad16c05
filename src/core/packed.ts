/**
 * @file packed.ts
 * @description Bulk conversion between host numbers and packed 16-bit half slots.
 */

import { type half, type int4, toUint2 } from './types.js';
import { Rounding, singleToHalf, halfToSingle } from './convert.js';
import { LowlevelError } from './error.js';

function checkCapacity(needed: int4, out: { length: number }): void {
  if (out.length < needed) {
    throw new LowlevelError(`Output buffer holds ${out.length} elements, ${needed} required`);
  }
}

/**
 * Demote a sequence of numbers (taken as single precision) into half slots.
 *
 * @param values  the source values
 * @param rounding  narrowing policy, truncation unless specified
 * @param out  optional destination; must hold at least values.length slots
 * @returns the destination array
 */
export function encodeHalfArray(
  values: ArrayLike<number>,
  rounding: Rounding = Rounding.truncate,
  out?: Uint16Array,
): Uint16Array {
  const dest = out ?? new Uint16Array(values.length);
  checkCapacity(values.length, dest);
  for (let i = 0; i < values.length; ++i) {
    dest[i] = singleToHalf(values[i], rounding);
  }
  return dest;
}

/** Promote packed half slots to single precision. */
export function decodeHalfArray(halves: ArrayLike<half>, out?: Float32Array): Float32Array {
  const dest = out ?? new Float32Array(halves.length);
  checkCapacity(halves.length, dest);
  for (let i = 0; i < halves.length; ++i) {
    dest[i] = halfToSingle(halves[i]);
  }
  return dest;
}

/** Read one half slot from a byte view (big-endian unless littleEndian is set). */
export function readHalf(view: DataView, offset: int4, littleEndian: boolean = false): half {
  return view.getUint16(offset, littleEndian);
}

export function writeHalf(view: DataView, offset: int4, h: half, littleEndian: boolean = false): void {
  view.setUint16(offset, toUint2(h), littleEndian);
}
