/**
 * @file index.ts
 * @description Public surface of the half-precision emulation library.
 */

export type { half, uint2, uint4, uint8, int4 } from './core/types.js';
export {
  type FloatLayout,
  HALF,
  SINGLE,
  DOUBLE,
  HALF_PZERO,
  HALF_NZERO,
  HALF_PINF,
  HALF_NINF,
  HALF_NAN,
  HALF_DENORM_MIN,
  HALF_MAX,
} from './core/layout.js';
export {
  floatToRawBits,
  floatFromRawBits,
  doubleToRawBits,
  doubleFromRawBits,
} from './core/rawbits.js';
export {
  Rounding,
  halfToSingle,
  halfToDouble,
  singleToHalf,
  doubleToHalf,
  halfBitsToSingleBits,
  singleBitsToHalfBits,
  halfBitsToDoubleBits,
  doubleBitsToHalfBits,
} from './core/convert.js';
export {
  FloatClass,
  isNaN,
  isInf,
  isFinite,
  isZero,
  isDenormal,
  signBit,
  classify,
} from './core/classify.js';
export {
  eq,
  ne,
  le,
  lt,
  ge,
  gt,
  eqNonan,
  leNonan,
  ltNonan,
  geNonan,
  gtNonan,
} from './core/compare.js';
export { spacing, nextafter, divmod, type HalfDivmod } from './core/neighbor.js';
export { neg, abs, copysign } from './core/sign.js';
export {
  type HalfFields,
  describeHalf,
  halfToHex,
  halfToBinary,
  printHalf,
  parseHalf,
} from './core/format.js';
export { encodeHalfArray, decodeHalfArray, readHalf, writeHalf } from './core/packed.js';
export { LowlevelError, HalfParseError } from './core/error.js';
