import { UsageError } from "./errors";
import { type FieldAnnotation, FieldKind, MAX_FLAG_COUNT, VarIntMode } from "./types";

/**
 * One field as handed over by a type-description layer, in declaration order.
 */
export interface FieldDefinition {
  name: string;
  kind: FieldKind;
  annotations?: readonly FieldAnnotation[];
}

/**
 * A resolved field.
 */
export interface FieldDescriptor {
  readonly position: number;
  readonly name: string;
  readonly kind: FieldKind;
  readonly varIntMode: VarIntMode;
}

/**
 * Immutable field layout of one record type.
 *
 * `booleanPositions` lists the Bool fields in declaration order; the i-th of
 * them owns bit i of the flags integer, which `flagBits` records per position.
 */
export interface StructureSchema {
  readonly name: string;
  readonly fields: readonly FieldDescriptor[];
  readonly booleanPositions: readonly number[];
  readonly flagBits: ReadonlyMap<number, number>;
}

/**
 * Varint mode implied by a field's annotations. VarUInt wins over VarInt.
 */
export function varIntModeOf(annotations: readonly FieldAnnotation[] = []): VarIntMode {
  if (annotations.includes("VarUInt")) return VarIntMode.ZigZagUnsigned;
  if (annotations.includes("VarInt")) return VarIntMode.Signed;
  return VarIntMode.None;
}

/**
 * Resolves field definitions into a StructureSchema.
 *
 * Annotations on kinds other than Int32/Int64 have no effect.
 *
 * @throws UsageError on duplicate field names or more than 32 Bool fields
 */
export function resolveSchema(name: string, definitions: readonly FieldDefinition[]): StructureSchema {
  const seen = new Set<string>();
  const fields: FieldDescriptor[] = [];
  const booleanPositions: number[] = [];
  const flagBits = new Map<number, number>();

  definitions.forEach((def, position) => {
    if (seen.has(def.name)) {
      throw new UsageError(`Duplicate field "${def.name}" in structure ${name}`);
    }
    seen.add(def.name);

    const varIntEligible = def.kind === FieldKind.Int32 || def.kind === FieldKind.Int64;
    fields.push(
      Object.freeze({
        position,
        name: def.name,
        kind: def.kind,
        varIntMode: varIntEligible ? varIntModeOf(def.annotations) : VarIntMode.None,
      })
    );

    if (def.kind === FieldKind.Bool) {
      flagBits.set(position, booleanPositions.length);
      booleanPositions.push(position);
    }
  });

  if (booleanPositions.length > MAX_FLAG_COUNT) {
    throw new UsageError(
      `Structure ${name} has ${booleanPositions.length} boolean fields, at most ${MAX_FLAG_COUNT} are supported`
    );
  }

  return Object.freeze({
    name,
    fields: Object.freeze(fields),
    booleanPositions: Object.freeze(booleanPositions),
    flagBits,
  });
}

/**
 * Looks up a field by position.
 * @throws UsageError if the position is not declared by the schema
 */
export function fieldAt(schema: StructureSchema, position: number): FieldDescriptor {
  const field = schema.fields[position];
  if (field === undefined) {
    throw new UsageError(
      `Structure ${schema.name} has no field at position ${position} (${schema.fields.length} fields declared)`
    );
  }
  return field;
}
