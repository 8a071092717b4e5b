/**
 * bitpacked-codec - schema-driven bit-packed binary codec for flat records
 *
 * Booleans are gathered into a leading varint of flags; every other field
 * follows in declaration order, fixed-width big-endian or varint encoded.
 *
 * @example
 * ```typescript
 * import { defineStructure, encode, decode, int32, bool, type Infer } from 'bitpacked-codec';
 *
 * const Payload = defineStructure('Payload', {
 *   id: int32('VarInt'),
 *   delta: int32('VarUInt'),
 *   flag1: bool(),
 *   flag2: bool(),
 *   flag3: bool(),
 * });
 * type Payload = Infer<typeof Payload>;
 *
 * const bytes = encode(Payload, { id: 123, delta: -2, flag1: true, flag2: false, flag3: true });
 * // [0x05, 0x7b, 0x03]
 * const value: Payload = decode(Payload, bytes);
 * ```
 */

// Core types
export {
  FieldKind,
  VarIntMode,
  isScalarKind,
  MAX_VARINT32_BYTES,
  MAX_VARINT64_BYTES,
  MAX_FLAG_COUNT,
  MinInt8,
  MaxInt8,
  MinInt16,
  MaxInt16,
  MinInt32,
  MaxInt32,
  MinInt64,
  MaxInt64,
} from "./types";
export type { ScalarKind, ScalarValue, ScalarValueMap, FieldAnnotation, EngineState } from "./types";

// Errors
export {
  BitPackedError,
  UsageError,
  UnsupportedKindError,
  MalformedInputError,
  BufferUnderflowError,
  VarIntOverflowError,
} from "./errors";

// Binary primitives
export {
  decodeVarInt,
  decodeVarLong,
  readFixed16,
  readFixed32,
  readFixed64,
  float32ToBits,
  bitsToFloat32,
  float64ToBits,
  bitsToFloat64,
  zigZagEncode32,
  zigZagDecode32,
  zigZagEncode64,
  zigZagDecode64,
  packFlags,
  unpackFlags,
} from "./primitives";
export type { VarIntResult } from "./primitives";

// Writer
export { Writer } from "./writer";
export type { WriterOptions } from "./writer";

// Reader
export { Reader } from "./reader";

// Schema resolution
export { resolveSchema, fieldAt, varIntModeOf } from "./schema";
export type { FieldDefinition, FieldDescriptor, StructureSchema } from "./schema";

// Engines
export { Encoder, EncodeSession } from "./encoder";
export type { EncoderOptions } from "./encoder";
export { Decoder, DecodeSession } from "./decoder";
export type { DecoderOptions } from "./decoder";

// Typed record API
export {
  bool,
  byte,
  short,
  int32,
  int64,
  float32,
  float64,
  char16,
  string,
  nested,
  list,
  map,
  enumeration,
  nullable,
  polymorphic,
  defineStructure,
  encode,
  decode,
  encodeScalar,
  decodeScalar,
} from "./format";
export type { FieldType, FieldTypes, InferFields, RecordSchema, Infer } from "./format";

/**
 * Library version.
 */
export const VERSION = "0.1.0";
