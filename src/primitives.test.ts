import { describe, it, expect } from 'vitest';
import {
  bitsToFloat32,
  bitsToFloat64,
  decodeVarInt,
  decodeVarLong,
  float32ToBits,
  float64ToBits,
  packFlags,
  readFixed16,
  readFixed32,
  readFixed64,
  toInt16,
  toInt8,
  unpackFlags,
  zigZagDecode32,
  zigZagDecode64,
  zigZagEncode32,
  zigZagEncode64,
} from './primitives';
import { BufferUnderflowError, VarIntOverflowError } from './errors';
import { MaxInt32, MaxInt64, MinInt32, MinInt64 } from './types';
import { Writer } from './writer';

describe('zigzag', () => {
  it('maps small 32-bit values alternately', () => {
    expect(zigZagEncode32(0)).toBe(0);
    expect(zigZagEncode32(-1)).toBe(1);
    expect(zigZagEncode32(1)).toBe(2);
    expect(zigZagEncode32(-2)).toBe(3);
  });

  it('maps the 32-bit extremes onto the unsigned range', () => {
    expect(zigZagEncode32(MaxInt32)).toBe(0xfffffffe);
    expect(zigZagEncode32(MinInt32)).toBe(0xffffffff);
    expect(zigZagDecode32(0xfffffffe)).toBe(MaxInt32);
    expect(zigZagDecode32(0xffffffff)).toBe(MinInt32);
  });

  it('decodes 32-bit values', () => {
    expect(zigZagDecode32(3)).toBe(-2);
    expect(zigZagDecode32(4)).toBe(2);
  });

  it('inverts 32-bit encoding across the range', () => {
    for (let v = MinInt32; v <= MaxInt32; v += 9973 * 7919) {
      expect(zigZagDecode32(zigZagEncode32(v))).toBe(v);
    }
    for (const v of [MinInt32, -65536, -1, 0, 1, 65535, MaxInt32]) {
      expect(zigZagDecode32(zigZagEncode32(v))).toBe(v);
    }
  });

  it('encodes 64-bit values', () => {
    expect(zigZagEncode64(-1000n)).toBe(1999n);
    expect(zigZagEncode64(MaxInt64)).toBe(2n ** 64n - 2n);
    expect(zigZagEncode64(MinInt64)).toBe(2n ** 64n - 1n);
  });

  it('decodes 64-bit values', () => {
    expect(zigZagDecode64(1999n)).toBe(-1000n);
    expect(zigZagDecode64(2n ** 64n - 1n)).toBe(MinInt64);
  });

  it('rejects values outside the 64-bit signed range', () => {
    expect(() => zigZagEncode64(MaxInt64 + 1n)).toThrow(RangeError);
    expect(() => zigZagEncode64(MinInt64 - 1n)).toThrow(RangeError);
  });
});

describe('flags', () => {
  it('packs least-significant bit first', () => {
    expect(packFlags([true, false, true])).toBe(5);
    expect(packFlags([false, true])).toBe(2);
    expect(packFlags([])).toBe(0);
  });

  it('packs 32 flags into an unsigned value', () => {
    expect(packFlags(new Array<boolean>(32).fill(true))).toBe(0xffffffff);
  });

  it('rejects more than 32 flags', () => {
    expect(() => packFlags(new Array<boolean>(33).fill(false))).toThrow(RangeError);
    expect(() => unpackFlags(0, 33)).toThrow(RangeError);
  });

  it('unpacks only the requested bits', () => {
    expect(unpackFlags(5, 3)).toEqual([true, false, true]);
    expect(unpackFlags(0xff, 2)).toEqual([true, true]);
  });

  it('unpacks bit 31 of a negative flags value', () => {
    const bits = unpackFlags(-1, 32);
    expect(bits).toHaveLength(32);
    expect(bits.every((b) => b)).toBe(true);
  });
});

describe('decodeVarInt', () => {
  it('reports the bytes consumed', () => {
    expect(decodeVarInt(new Uint8Array([0xac, 0x02, 0xff]))).toEqual({ value: 300, bytesRead: 2 });
  });

  it('starts at an offset', () => {
    expect(decodeVarInt(new Uint8Array([0xff, 0x7b]), 1)).toEqual({ value: 123, bytesRead: 1 });
  });

  it('reinterprets the 32-bit pattern as signed', () => {
    expect(decodeVarInt(new Uint8Array([0x80, 0x80, 0x80, 0x80, 0x08])).value).toBe(MinInt32);
  });

  it('throws on truncated input', () => {
    expect(() => decodeVarInt(new Uint8Array([0x80]))).toThrow(BufferUnderflowError);
    expect(() => decodeVarInt(new Uint8Array(0))).toThrow(
      'Buffer underflow: needed 1 bytes, only 0 available'
    );
  });

  it('throws after five continuation bytes', () => {
    expect(() => decodeVarInt(new Uint8Array([0xff, 0xff, 0xff, 0xff, 0xff, 0x01]))).toThrow(
      'Varint overflow: no terminating byte within 5 bytes'
    );
  });
});

describe('decodeVarLong', () => {
  it('decodes -1n from ten bytes', () => {
    const data = new Uint8Array([0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0x01]);
    expect(decodeVarLong(data)).toEqual({ value: -1n, bytesRead: 10 });
  });

  it('throws after ten continuation bytes', () => {
    const data = new Uint8Array(11).fill(0x80);
    expect(() => decodeVarLong(data)).toThrow(VarIntOverflowError);
  });
});

describe('fixed-width reads', () => {
  it('reads big-endian at an offset', () => {
    const data = new Uint8Array([0x00, 0x12, 0x34, 0x56, 0x78, 0x9a]);
    expect(readFixed16(data, 1)).toBe(0x1234);
    expect(readFixed32(data, 2)).toBe(0x3456789a);
  });

  it('honors the byte offset of a subarray', () => {
    const backing = new Uint8Array([0xaa, 0, 0, 0, 0, 0, 0, 0, 7]);
    expect(readFixed64(backing.subarray(1), 0)).toBe(7n);
  });

  it('throws when fewer bytes remain than the width', () => {
    expect(() => readFixed16(new Uint8Array([1, 2]), 1)).toThrow(
      'Buffer underflow: needed 2 bytes, only 1 available'
    );
    expect(() => readFixed64(new Uint8Array(7), 0)).toThrow(BufferUnderflowError);
  });
});

describe('float bits', () => {
  it('converts single precision', () => {
    expect(float32ToBits(0.5)).toBe(0x3f000000);
    expect(bitsToFloat32(0x3fc00000)).toBe(1.5);
  });

  it('converts double precision', () => {
    expect(float64ToBits(-2.5)).toBe(0xc004000000000000n);
    expect(bitsToFloat64(0x3fb999999999999an)).toBe(0.1);
  });

  it('keeps signaling NaN payloads through the fixed-width path', () => {
    const writer = new Writer();
    writer.writeFixed32(0x7fa00000);
    writer.writeFixed64(0x7ff4000000000000n);
    const data = writer.bytes();
    expect(readFixed32(data, 0)).toBe(0x7fa00000);
    expect(readFixed64(data, 4)).toBe(0x7ff4000000000000n);
    expect(Number.isNaN(bitsToFloat64(0x7ff4000000000000n))).toBe(true);
  });

  it('keeps single-precision NaN payloads through a number', () => {
    for (const bits of [0x7fa00001, 0x7f800001, 0xffa00000, 0x7fc00000, 0xffffffff]) {
      const value = bitsToFloat32(bits);
      expect(Number.isNaN(value)).toBe(true);
      expect(float32ToBits(value)).toBe(bits);
    }
  });

  it('narrows a computed NaN to the quiet single-precision pattern', () => {
    expect(float32ToBits(NaN)).toBe(0x7fc00000);
  });

  it('leaves infinities alone', () => {
    expect(bitsToFloat32(0x7f800000)).toBe(Infinity);
    expect(float32ToBits(-Infinity)).toBe(0xff800000);
  });

  it('preserves negative zero', () => {
    expect(float64ToBits(-0)).toBe(0x8000000000000000n);
    expect(Object.is(bitsToFloat32(0x80000000), -0)).toBe(true);
  });
});

describe('sign extension', () => {
  it('extends 8 and 16 bit patterns', () => {
    expect(toInt8(0xfd)).toBe(-3);
    expect(toInt8(0x7f)).toBe(127);
    expect(toInt16(0xfffe)).toBe(-2);
    expect(toInt16(0x8000)).toBe(-32768);
  });
});
