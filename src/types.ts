/**
 * Field kinds understood by the bit-packed format.
 *
 * The first nine are encodable scalars. The remaining kinds can be described
 * by a schema (so a type-description layer can hand them over verbatim) but
 * every attempt to encode or decode them is rejected.
 */
export enum FieldKind {
  Bool = "bool",
  Byte = "byte",
  Short = "short",
  Int32 = "int32",
  Int64 = "int64",
  Float32 = "float32",
  Float64 = "float64",
  Char16 = "char16",
  Utf8String = "string",
  // Describable, never encodable
  Structure = "structure",
  List = "list",
  Map = "map",
  Enum = "enum",
  Nullable = "nullable",
  Polymorphic = "polymorphic",
}

/**
 * Scalar kinds the engines can actually read and write.
 */
export type ScalarKind =
  | FieldKind.Bool
  | FieldKind.Byte
  | FieldKind.Short
  | FieldKind.Int32
  | FieldKind.Int64
  | FieldKind.Float32
  | FieldKind.Float64
  | FieldKind.Char16
  | FieldKind.Utf8String;

const SCALAR_KINDS: ReadonlySet<FieldKind> = new Set<FieldKind>([
  FieldKind.Bool,
  FieldKind.Byte,
  FieldKind.Short,
  FieldKind.Int32,
  FieldKind.Int64,
  FieldKind.Float32,
  FieldKind.Float64,
  FieldKind.Char16,
  FieldKind.Utf8String,
]);

/**
 * Returns true if the kind is one of the encodable scalars.
 */
export function isScalarKind(kind: FieldKind): kind is ScalarKind {
  return SCALAR_KINDS.has(kind);
}

/**
 * Per-field annotations recognized by the schema resolver.
 */
export type FieldAnnotation = "VarInt" | "VarUInt";

/**
 * How an Int32/Int64 field is laid out on the wire.
 */
export enum VarIntMode {
  /** Fixed-width big-endian */
  None = 0,
  /** Varint over the two's-complement bit pattern */
  Signed = 1,
  /** Zigzag-mapped, then varint */
  ZigZagUnsigned = 2,
}

/**
 * TypeScript value type carried by each scalar kind.
 */
export interface ScalarValueMap {
  [FieldKind.Bool]: boolean;
  [FieldKind.Byte]: number;
  [FieldKind.Short]: number;
  [FieldKind.Int32]: number;
  [FieldKind.Int64]: bigint;
  [FieldKind.Float32]: number;
  [FieldKind.Float64]: number;
  [FieldKind.Char16]: string;
  [FieldKind.Utf8String]: string;
}

export type ScalarValue = ScalarValueMap[ScalarKind];

/**
 * Engine state shared by the encoder and the decoder.
 */
export type EngineState = "idle" | "in-structure";

/**
 * Varint length limits.
 */
export const MAX_VARINT32_BYTES = 5;
export const MAX_VARINT64_BYTES = 10;

/**
 * The flags integer is a 32-bit varint, so a record holds at most this many
 * boolean fields.
 */
export const MAX_FLAG_COUNT = 32;

/**
 * Signed integer bounds.
 */
export const MinInt8 = -0x80;
export const MaxInt8 = 0x7f;
export const MinInt16 = -0x8000;
export const MaxInt16 = 0x7fff;
export const MinInt32 = -0x80000000;
export const MaxInt32 = 0x7fffffff;
export const MinInt64 = BigInt("-9223372036854775808"); // -2^63
export const MaxInt64 = BigInt("9223372036854775807"); // 2^63 - 1
