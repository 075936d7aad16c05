/**
 * @file rawbits.ts
 * @description Same-width reinterpretation between integer patterns and host floats.
 *
 * All conversions go through one DataView over a shared 8-byte buffer, written
 * and read back within a single call.
 */

import { type uint4, type uint8, toUint8 } from './types.js';

const _convBuf = new ArrayBuffer(8);
const _convView = new DataView(_convBuf);

/**
 * Convert a JavaScript number to its IEEE 754 32-bit representation.
 * The number is first rounded to the nearest single-precision value.
 */
export function floatToRawBits(x: number): uint4 {
  _convView.setFloat32(0, x, false);
  return _convView.getUint32(0, false);
}

/** Convert a 32-bit IEEE 754 pattern to the (exactly representable) JavaScript number. */
export function floatFromRawBits(bits: uint4): number {
  _convView.setUint32(0, bits >>> 0, false);
  return _convView.getFloat32(0, false);
}

/** Convert a JavaScript number to its IEEE 754 64-bit representation. */
export function doubleToRawBits(x: number): uint8 {
  _convView.setFloat64(0, x, false); // big-endian
  const hi = _convView.getUint32(0, false);
  const lo = _convView.getUint32(4, false);
  return (BigInt(hi) << 32n) | BigInt(lo);
}

/** Convert a 64-bit IEEE 754 pattern back to a JavaScript number. */
export function doubleFromRawBits(bits: uint8): number {
  bits = toUint8(bits);
  _convView.setUint32(0, Number(bits >> 32n), false);
  _convView.setUint32(4, Number(bits & 0xFFFF_FFFFn), false);
  return _convView.getFloat64(0, false);
}

/** Split a 64-bit pattern into its high and low 32-bit words. */
export function splitWords(bits: uint8): { hi: uint4; lo: uint4 } {
  bits = toUint8(bits);
  return { hi: Number(bits >> 32n), lo: Number(bits & 0xFFFF_FFFFn) };
}

/** Join high and low 32-bit words into a 64-bit pattern. */
export function joinWords(hi: uint4, lo: uint4): uint8 {
  return (BigInt(hi >>> 0) << 32n) | BigInt(lo >>> 0);
}
