import { BufferUnderflowError, VarIntOverflowError } from "./errors";
import {
  MAX_FLAG_COUNT,
  MAX_VARINT32_BYTES,
  MAX_VARINT64_BYTES,
  MaxInt64,
  MinInt64,
} from "./types";

/**
 * Result of decoding a varint from a buffer.
 */
export interface VarIntResult<T> {
  value: T;
  bytesRead: number;
}

// Module-level scratch space for float <-> bit pattern conversion
const scratch = new DataView(new ArrayBuffer(8));

function checkAvailable(data: Uint8Array, offset: number, needed: number): void {
  if (offset < 0 || offset + needed > data.length) {
    throw new BufferUnderflowError(needed, Math.max(0, data.length - offset));
  }
}

/**
 * Decode a 32-bit varint starting at `offset`.
 *
 * At most 5 bytes are consumed. Bits beyond the 32nd are dropped and the
 * result is reinterpreted as a signed 32-bit integer, so a varint written
 * from -1 decodes back to -1.
 */
export function decodeVarInt(data: Uint8Array, offset: number = 0): VarIntResult<number> {
  let result = 0;
  let shift = 0;
  let pos = offset;

  for (let i = 0; i < MAX_VARINT32_BYTES; i++) {
    checkAvailable(data, offset, i + 1);
    const b = data[pos++];
    result |= (b & 0x7f) << shift;
    if ((b & 0x80) === 0) {
      return { value: result | 0, bytesRead: pos - offset };
    }
    shift += 7;
  }

  throw new VarIntOverflowError(MAX_VARINT32_BYTES);
}

/**
 * Decode a 64-bit varint starting at `offset`.
 *
 * At most 10 bytes are consumed; the result is a signed 64-bit bigint.
 */
export function decodeVarLong(data: Uint8Array, offset: number = 0): VarIntResult<bigint> {
  let result = 0n;
  let shift = 0n;
  let pos = offset;

  for (let i = 0; i < MAX_VARINT64_BYTES; i++) {
    checkAvailable(data, offset, i + 1);
    const b = data[pos++];
    result |= BigInt(b & 0x7f) << shift;
    if ((b & 0x80) === 0) {
      return { value: BigInt.asIntN(64, result), bytesRead: pos - offset };
    }
    shift += 7n;
  }

  throw new VarIntOverflowError(MAX_VARINT64_BYTES);
}

/**
 * Read a big-endian 16-bit value as an unsigned bit pattern.
 */
export function readFixed16(data: Uint8Array, offset: number): number {
  checkAvailable(data, offset, 2);
  return (data[offset] << 8) | data[offset + 1];
}

/**
 * Read a big-endian 32-bit value as an unsigned bit pattern.
 */
export function readFixed32(data: Uint8Array, offset: number): number {
  checkAvailable(data, offset, 4);
  return (
    ((data[offset] << 24) |
      (data[offset + 1] << 16) |
      (data[offset + 2] << 8) |
      data[offset + 3]) >>>
    0
  );
}

/**
 * Read a big-endian 64-bit value as an unsigned bit pattern.
 */
export function readFixed64(data: Uint8Array, offset: number): bigint {
  checkAvailable(data, offset, 8);
  const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
  return view.getBigUint64(offset, false);
}

/**
 * Raw IEEE 754 single-precision bit pattern of a number.
 *
 * NaNs are narrowed by hand from their double bits, so a signaling NaN
 * produced by bitsToFloat32 keeps its payload.
 */
export function float32ToBits(value: number): number {
  if (Number.isNaN(value)) {
    const bits = float64ToBits(value);
    const sign = Number(bits >> 63n);
    const mantissa = Number((bits >> 29n) & 0x7fffffn);
    return ((sign << 31) | 0x7f800000 | mantissa) >>> 0;
  }
  scratch.setFloat32(0, value, false);
  return scratch.getUint32(0, false);
}

/**
 * Number whose single-precision bit pattern is `bits`.
 *
 * A NaN pattern is widened by hand; DataView.getFloat32 would set the
 * quiet bit.
 */
export function bitsToFloat32(bits: number): number {
  const b = bits >>> 0;
  if ((b & 0x7f800000) === 0x7f800000 && (b & 0x7fffff) !== 0) {
    const sign = BigInt(b >>> 31);
    return bitsToFloat64((sign << 63n) | (0x7ffn << 52n) | (BigInt(b & 0x7fffff) << 29n));
  }
  scratch.setUint32(0, b, false);
  return scratch.getFloat32(0, false);
}

/**
 * Raw IEEE 754 double-precision bit pattern of a number.
 */
export function float64ToBits(value: number): bigint {
  scratch.setFloat64(0, value, false);
  return scratch.getBigUint64(0, false);
}

/**
 * Number whose double-precision bit pattern is `bits`.
 */
export function bitsToFloat64(bits: bigint): number {
  scratch.setBigUint64(0, BigInt.asUintN(64, bits), false);
  return scratch.getFloat64(0, false);
}

/**
 * Encode a signed 32-bit integer using ZigZag encoding.
 * The result is the unsigned 32-bit pattern.
 */
export function zigZagEncode32(n: number): number {
  return ((n << 1) ^ (n >> 31)) >>> 0;
}

/**
 * Decode a ZigZag encoded 32-bit integer.
 */
export function zigZagDecode32(n: number): number {
  return (n >>> 1) ^ -(n & 1);
}

/**
 * Encode a signed bigint using ZigZag encoding.
 * @throws RangeError if n is outside the valid 64-bit signed integer range
 */
export function zigZagEncode64(n: bigint): bigint {
  if (n < MinInt64 || n > MaxInt64) {
    throw new RangeError(
      `BigInt value ${n} is outside valid 64-bit signed integer range [${MinInt64}, ${MaxInt64}]`
    );
  }
  return BigInt.asUintN(64, (n << 1n) ^ (n >> 63n));
}

/**
 * Decode a ZigZag encoded bigint.
 */
export function zigZagDecode64(n: bigint): bigint {
  const v = BigInt.asUintN(64, n);
  return BigInt.asIntN(64, (v >> 1n) ^ -(v & 1n));
}

/**
 * Pack booleans into an unsigned integer, `bits[i]` landing on bit i
 * (least-significant first).
 * @throws RangeError for more than 32 flags
 */
export function packFlags(bits: readonly boolean[]): number {
  if (bits.length > MAX_FLAG_COUNT) {
    throw new RangeError(`Cannot pack ${bits.length} flags into ${MAX_FLAG_COUNT} bits`);
  }
  let result = 0;
  for (let i = 0; i < bits.length; i++) {
    if (bits[i]) result |= 1 << i;
  }
  return result >>> 0;
}

/**
 * Inverse of packFlags: the lowest `count` bits of `value` as booleans.
 */
export function unpackFlags(value: number, count: number): boolean[] {
  if (count > MAX_FLAG_COUNT) {
    throw new RangeError(`Cannot unpack ${count} flags from ${MAX_FLAG_COUNT} bits`);
  }
  const result: boolean[] = new Array(count);
  for (let i = 0; i < count; i++) {
    result[i] = (value & (1 << i)) !== 0;
  }
  return result;
}

/**
 * Sign-extend the low 8 bits of a number.
 */
export function toInt8(value: number): number {
  return (value << 24) >> 24;
}

/**
 * Sign-extend the low 16 bits of a number.
 */
export function toInt16(value: number): number {
  return (value << 16) >> 16;
}
