import { UsageError } from "./errors";
import {
  bitsToFloat32,
  bitsToFloat64,
  float32ToBits,
  float64ToBits,
  toInt16,
  toInt8,
  zigZagDecode32,
  zigZagDecode64,
  zigZagEncode32,
  zigZagEncode64,
} from "./primitives";
import type { Reader } from "./reader";
import {
  FieldKind,
  MaxInt16,
  MaxInt32,
  MaxInt64,
  MaxInt8,
  MinInt16,
  MinInt32,
  MinInt64,
  MinInt8,
  type ScalarKind,
  type ScalarValue,
  VarIntMode,
} from "./types";
import type { Writer } from "./writer";

/**
 * Scalar kinds that are written to the data stream (everything but Bool).
 */
export type DataKind = Exclude<ScalarKind, FieldKind.Bool>;

function describeValue(value: unknown): string {
  if (typeof value === "string") return JSON.stringify(value);
  if (typeof value === "bigint") return `${value}n`;
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  if (typeof value === "object") return "object";
  return String(value);
}

function expectInteger(value: unknown, min: number, max: number, label: string): number {
  if (typeof value !== "number" || !Number.isInteger(value)) {
    throw new UsageError(`${label} expects an integer, got ${describeValue(value)}`);
  }
  if (value < min || value > max) {
    throw new UsageError(`${label} value ${value} is outside [${min}, ${max}]`);
  }
  return value;
}

export function expectInt64(value: unknown, label: string): bigint {
  if (typeof value !== "bigint") {
    throw new UsageError(`${label} expects a bigint, got ${describeValue(value)}`);
  }
  if (value < MinInt64 || value > MaxInt64) {
    throw new UsageError(`${label} value ${value} is outside [${MinInt64}, ${MaxInt64}]`);
  }
  return value;
}

export function expectNumber(value: unknown, label: string): number {
  if (typeof value !== "number") {
    throw new UsageError(`${label} expects a number, got ${describeValue(value)}`);
  }
  return value;
}

export function expectString(value: unknown, label: string): string {
  if (typeof value !== "string") {
    throw new UsageError(`${label} expects a string, got ${describeValue(value)}`);
  }
  return value;
}

/**
 * Narrows a value to boolean.
 * @throws UsageError if it is anything else
 */
export function expectBoolean(value: unknown, label: string): boolean {
  if (typeof value !== "boolean") {
    throw new UsageError(`${label} expects a boolean, got ${describeValue(value)}`);
  }
  return value;
}

/**
 * Writes one non-boolean scalar. Int32/Int64 honor `mode`; every other kind
 * is fixed-width big-endian, except strings which are length-prefixed UTF-8.
 */
export function writeScalar(
  writer: Writer,
  kind: DataKind,
  mode: VarIntMode,
  value: unknown,
  label: string
): void {
  switch (kind) {
    case FieldKind.Byte:
      writer.writeByte(expectInteger(value, MinInt8, MaxInt8, label));
      break;
    case FieldKind.Short:
      writer.writeFixed16(expectInteger(value, MinInt16, MaxInt16, label));
      break;
    case FieldKind.Int32: {
      const v = expectInteger(value, MinInt32, MaxInt32, label);
      if (mode === VarIntMode.ZigZagUnsigned) writer.writeVarInt(zigZagEncode32(v));
      else if (mode === VarIntMode.Signed) writer.writeVarInt(v);
      else writer.writeFixed32(v);
      break;
    }
    case FieldKind.Int64: {
      const v = expectInt64(value, label);
      if (mode === VarIntMode.ZigZagUnsigned) writer.writeVarLong(zigZagEncode64(v));
      else if (mode === VarIntMode.Signed) writer.writeVarLong(v);
      else writer.writeFixed64(v);
      break;
    }
    case FieldKind.Float32:
      writer.writeFixed32(float32ToBits(expectNumber(value, label)));
      break;
    case FieldKind.Float64:
      writer.writeFixed64(float64ToBits(expectNumber(value, label)));
      break;
    case FieldKind.Char16: {
      const s = expectString(value, label);
      if (s.length !== 1) {
        throw new UsageError(`${label} expects a single UTF-16 code unit, got ${describeValue(s)}`);
      }
      writer.writeFixed16(s.charCodeAt(0));
      break;
    }
    case FieldKind.Utf8String:
      writer.writeString(expectString(value, label));
      break;
    default: {
      const unreachable: never = kind;
      throw new UsageError(`${label} has unknown kind ${String(unreachable)}`);
    }
  }
}

/**
 * Reads one non-boolean scalar, mirroring writeScalar.
 */
export function readScalar(reader: Reader, kind: DataKind, mode: VarIntMode): ScalarValue {
  switch (kind) {
    case FieldKind.Byte:
      return toInt8(reader.readByte());
    case FieldKind.Short:
      return toInt16(reader.readFixed16());
    case FieldKind.Int32:
      if (mode === VarIntMode.ZigZagUnsigned) return zigZagDecode32(reader.readVarInt());
      if (mode === VarIntMode.Signed) return reader.readVarInt();
      return reader.readFixed32() | 0;
    case FieldKind.Int64:
      if (mode === VarIntMode.ZigZagUnsigned) return zigZagDecode64(reader.readVarLong());
      if (mode === VarIntMode.Signed) return reader.readVarLong();
      return BigInt.asIntN(64, reader.readFixed64());
    case FieldKind.Float32:
      return bitsToFloat32(reader.readFixed32());
    case FieldKind.Float64:
      return bitsToFloat64(reader.readFixed64());
    case FieldKind.Char16:
      return String.fromCharCode(reader.readFixed16());
    case FieldKind.Utf8String:
      return reader.readString();
    default: {
      const unreachable: never = kind;
      throw new UsageError(`Unknown kind ${String(unreachable)}`);
    }
  }
}
