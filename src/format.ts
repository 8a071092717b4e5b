import { Decoder, type DecoderOptions } from "./decoder";
import { Encoder, type EncoderOptions } from "./encoder";
import { UnsupportedKindError, UsageError } from "./errors";
import { expectBoolean, expectInt64, expectNumber, expectString } from "./scalars";
import { type StructureSchema, resolveSchema } from "./schema";
import { type FieldAnnotation, FieldKind } from "./types";

/**
 * Describes one field of a record: its kind, its annotations, and the
 * TypeScript type of its values.
 */
export interface FieldType<T> {
  readonly kind: FieldKind;
  readonly annotations: readonly FieldAnnotation[];
  /** Narrows a decoded value to T */
  readonly narrow: (value: unknown) => T;
}

function fieldType<T>(
  kind: FieldKind,
  narrow: (value: unknown) => T,
  annotations: readonly FieldAnnotation[] = []
): FieldType<T> {
  return Object.freeze({ kind, narrow, annotations: Object.freeze([...annotations]) });
}

function unsupported<T>(kind: FieldKind): FieldType<T> {
  return fieldType(kind, () => {
    throw new UnsupportedKindError(kind, "cannot be decoded");
  });
}

// Encodable scalars
export const bool = (): FieldType<boolean> => fieldType(FieldKind.Bool, (v) => expectBoolean(v, "bool"));
export const byte = (): FieldType<number> => fieldType(FieldKind.Byte, (v) => expectNumber(v, "byte"));
export const short = (): FieldType<number> => fieldType(FieldKind.Short, (v) => expectNumber(v, "short"));
export const float32 = (): FieldType<number> => fieldType(FieldKind.Float32, (v) => expectNumber(v, "float32"));
export const float64 = (): FieldType<number> => fieldType(FieldKind.Float64, (v) => expectNumber(v, "float64"));
export const char16 = (): FieldType<string> => fieldType(FieldKind.Char16, (v) => expectString(v, "char16"));
export const string = (): FieldType<string> => fieldType(FieldKind.Utf8String, (v) => expectString(v, "string"));

/**
 * 32-bit signed integer. Fixed-width unless annotated with VarInt or VarUInt.
 */
export function int32(...annotations: FieldAnnotation[]): FieldType<number> {
  return fieldType(FieldKind.Int32, (v) => expectNumber(v, "int32"), annotations);
}

/**
 * 64-bit signed integer. Fixed-width unless annotated with VarInt or VarUInt.
 */
export function int64(...annotations: FieldAnnotation[]): FieldType<bigint> {
  return fieldType(FieldKind.Int64, (v) => expectInt64(v, "int64"), annotations);
}

// Describable kinds that the format rejects
export const nested = <T extends Record<string, unknown>>(): FieldType<T> => unsupported(FieldKind.Structure);
export const list = <T>(): FieldType<T[]> => unsupported(FieldKind.List);
export const map = <K, V>(): FieldType<Map<K, V>> => unsupported(FieldKind.Map);
export const enumeration = <T extends string>(): FieldType<T> => unsupported(FieldKind.Enum);
export const nullable = <T>(_inner: FieldType<T>): FieldType<T | null> => unsupported(FieldKind.Nullable);
export const polymorphic = <T>(): FieldType<T> => unsupported(FieldKind.Polymorphic);

export type FieldTypes = Record<string, FieldType<unknown>>;

/**
 * Record type described by a set of field types.
 */
export type InferFields<F extends FieldTypes> = {
  [K in keyof F]: F[K] extends FieldType<infer T> ? T : never;
};

/**
 * A resolved record layout together with the field types that produced it.
 */
export interface RecordSchema<T> {
  readonly structure: StructureSchema;
  readonly types: readonly FieldType<unknown>[];
  /** Phantom marker carrying the record type */
  readonly _record?: T;
}

/**
 * Utility type: the record type of a RecordSchema.
 *
 * @example
 * ```typescript
 * const Payload = defineStructure("Payload", { id: int32("VarInt"), ok: bool() });
 * type Payload = Infer<typeof Payload>;
 * // { id: number; ok: boolean }
 * ```
 */
export type Infer<S> = S extends RecordSchema<infer T> ? T : never;

// Property keys that enumerate before all others, whatever their declaration order
const ARRAY_INDEX_KEY = /^(0|[1-9][0-9]*)$/;

function isArrayIndexKey(key: string): boolean {
  return ARRAY_INDEX_KEY.test(key) && Number(key) < 2 ** 32 - 1;
}

/**
 * Defines a record type. Field order on the wire is the key order of `fields`.
 * Integer-like field names are rejected since objects enumerate them first.
 *
 * @throws UsageError on integer-like field names or more than 32 Bool fields
 *
 * @example
 * ```typescript
 * const Payload = defineStructure("Payload", {
 *   id: int32("VarInt"),
 *   delta: int32("VarUInt"),
 *   flag1: bool(),
 *   flag2: bool(),
 * });
 * ```
 */
export function defineStructure<F extends FieldTypes>(
  name: string,
  fields: F
): RecordSchema<InferFields<F>> {
  const names = Object.keys(fields);
  const indexKey = names.find(isArrayIndexKey);
  if (indexKey !== undefined) {
    throw new UsageError(
      `Field name "${indexKey}" in structure ${name} is integer-like and would not keep its declaration order`
    );
  }
  const types = names.map((fieldName) => fields[fieldName]);
  const structure = resolveSchema(
    name,
    names.map((fieldName, i) => ({
      name: fieldName,
      kind: types[i].kind,
      annotations: types[i].annotations,
    }))
  );
  return Object.freeze({ structure, types: Object.freeze(types) });
}

/**
 * Encodes a record as one structure.
 */
export function encode<T extends Record<string, unknown>>(
  schema: RecordSchema<T>,
  value: T,
  options?: EncoderOptions
): Uint8Array {
  const encoder = new Encoder(options);
  const session = encoder.beginStructure(schema.structure);
  for (const field of schema.structure.fields) {
    encoder.writeField(session, field.position, value[field.name]);
  }
  return encoder.endStructure(session);
}

/**
 * Decodes a record written by encode with the same schema.
 * Bytes after the record are ignored.
 */
export function decode<T>(
  schema: RecordSchema<T>,
  bytes: Uint8Array,
  options?: DecoderOptions
): T {
  const decoder = new Decoder(bytes, options);
  const session = decoder.beginStructure(schema.structure);
  const result: Record<string, unknown> = {};
  for (const field of schema.structure.fields) {
    result[field.name] = schema.types[field.position].narrow(decoder.readField(session, field.position));
  }
  decoder.endStructure(session);
  return result as T;
}

/**
 * Encodes a bare top-level scalar.
 *
 * @example
 * ```typescript
 * encodeScalar(int32(), 1); // [0, 0, 0, 1]
 * ```
 */
export function encodeScalar<T>(type: FieldType<T>, value: T): Uint8Array {
  return new Encoder().encodeScalar(type.kind, value);
}

/**
 * Decodes a bare top-level scalar.
 */
export function decodeScalar<T>(type: FieldType<T>, bytes: Uint8Array): T {
  return type.narrow(new Decoder(bytes).decodeScalar(type.kind));
}
