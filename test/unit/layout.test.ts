/**
 * Unit tests for the field layouts of half, single and double.
 */
import { describe, it, expect } from 'vitest';
import {
  DOUBLE,
  HALF,
  HALF_DENORM_MIN,
  HALF_MAX,
  HALF_NINF,
  HALF_NZERO,
  HALF_PINF,
  HALF_PZERO,
  SINGLE,
} from '../../src/core/layout.js';
import { doubleToRawBits, floatToRawBits } from '../../src/core/rawbits.js';
import { halfBitsToDoubleBits, halfBitsToSingleBits, halfToSingle } from '../../src/core/convert.js';

describe('half layout', () => {
  it('canonical patterns', () => {
    expect(HALF_PZERO).toBe(0x0000);
    expect(HALF_NZERO).toBe(0x8000);
    expect(HALF_PINF).toBe(0x7C00);
    expect(HALF_NINF).toBe(0xFC00);
    expect(HALF.nan).toBe(0x7E00);
  });

  it('patterns decode to their values', () => {
    expect(Object.is(halfToSingle(HALF_PZERO), 0)).toBe(true);
    expect(Object.is(halfToSingle(HALF_NZERO), -0)).toBe(true);
    expect(halfToSingle(HALF_PINF)).toBe(Infinity);
    expect(halfToSingle(HALF_NINF)).toBe(-Infinity);
    expect(halfToSingle(HALF_MAX)).toBe(65504);
    expect(halfToSingle(HALF_DENORM_MIN)).toBe(2 ** -24);
  });

  it('masks are disjoint and cover 16 bits', () => {
    expect(HALF.signMask & HALF.expMask).toBe(0);
    expect(HALF.signMask & HALF.fracMask).toBe(0);
    expect(HALF.expMask & HALF.fracMask).toBe(0);
    expect(HALF.signMask | HALF.expMask | HALF.fracMask).toBe(0xFFFF);
    expect(HALF.expMask >> HALF.fracBits).toBe(HALF.maxExponent);
  });
});

describe('single layout', () => {
  it('patterns match the host encoding', () => {
    expect(SINGLE.posZero).toBe(floatToRawBits(0));
    expect(SINGLE.negZero).toBe(floatToRawBits(-0));
    expect(SINGLE.posInf).toBe(floatToRawBits(Infinity));
    expect(SINGLE.negInf).toBe(floatToRawBits(-Infinity));
    expect(SINGLE.nan).toBe(floatToRawBits(NaN));
  });

  it('half NaN widens to the canonical single NaN', () => {
    expect(halfBitsToSingleBits(HALF.nan)).toBe(SINGLE.nan);
  });

  it('masks are disjoint and cover 32 bits', () => {
    expect((SINGLE.signMask & SINGLE.expMask) >>> 0).toBe(0);
    expect((SINGLE.signMask & SINGLE.fracMask) >>> 0).toBe(0);
    expect((SINGLE.expMask & SINGLE.fracMask) >>> 0).toBe(0);
    expect((SINGLE.signMask | SINGLE.expMask | SINGLE.fracMask) >>> 0).toBe(0xFFFF_FFFF);
    expect(SINGLE.expMask >>> SINGLE.fracBits).toBe(SINGLE.maxExponent);
  });
});

describe('double layout', () => {
  it('patterns match the host encoding', () => {
    expect(DOUBLE.posZero).toBe(doubleToRawBits(0));
    expect(DOUBLE.negZero).toBe(doubleToRawBits(-0));
    expect(DOUBLE.posInf).toBe(doubleToRawBits(Infinity));
    expect(DOUBLE.negInf).toBe(doubleToRawBits(-Infinity));
    expect(DOUBLE.nan).toBe(doubleToRawBits(NaN));
  });

  it('half NaN widens to the canonical double NaN', () => {
    expect(halfBitsToDoubleBits(HALF.nan)).toBe(DOUBLE.nan);
  });

  it('masks are disjoint and cover 64 bits', () => {
    expect(DOUBLE.signMask & DOUBLE.expMask).toBe(0n);
    expect(DOUBLE.signMask & DOUBLE.fracMask).toBe(0n);
    expect(DOUBLE.expMask & DOUBLE.fracMask).toBe(0n);
    expect(DOUBLE.signMask | DOUBLE.expMask | DOUBLE.fracMask).toBe(0xFFFF_FFFF_FFFF_FFFFn);
    expect(DOUBLE.expMask >> BigInt(DOUBLE.fracBits)).toBe(BigInt(DOUBLE.maxExponent));
  });

  it('high word holds the top 20 mantissa bits', () => {
    expect(DOUBLE.highFracBits).toBe(DOUBLE.fracBits - 32);
    expect(SINGLE.highFracBits).toBe(SINGLE.fracBits);
    expect(HALF.highFracBits).toBe(HALF.fracBits);
  });
});
