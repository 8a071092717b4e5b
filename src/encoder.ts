import { UnsupportedKindError, UsageError } from "./errors";
import { packFlags } from "./primitives";
import { expectBoolean, writeScalar } from "./scalars";
import { type FieldDescriptor, type StructureSchema, fieldAt } from "./schema";
import { type EngineState, FieldKind, VarIntMode, isScalarKind } from "./types";
import { Writer } from "./writer";

const DEFAULT_DATA_CAPACITY = 256;

/**
 * Options for Encoder configuration.
 */
export interface EncoderOptions {
  /** Initial capacity of the data buffer reused by every structure. Default: 256 */
  initialCapacity?: number;
  /** Warn through console.warn when a structure ends with fields never written. Default: false */
  warnOnUnwrittenFields?: boolean;
}

/**
 * State of one structure being encoded.
 *
 * Boolean values are held back until the structure ends; every other field
 * is serialized into `data` as soon as it is written. `data` is the owning
 * encoder's sink, rewound for each structure.
 */
export class EncodeSession {
  readonly schema: StructureSchema;
  readonly booleans: boolean[];
  readonly data: Writer;
  readonly written: Set<number> = new Set();
  private _open: boolean = true;

  constructor(schema: StructureSchema, data: Writer) {
    this.schema = schema;
    this.booleans = new Array<boolean>(schema.booleanPositions.length).fill(false);
    this.data = data;
  }

  /**
   * Returns true until the owning encoder ends the structure.
   */
  get isOpen(): boolean {
    return this._open;
  }

  /** @internal */
  close(): void {
    this._open = false;
  }
}

function label(schema: StructureSchema, field: FieldDescriptor): string {
  return `Field ${schema.name}.${field.name}`;
}

/**
 * Encoder drives one structure at a time into the bit-packed wire format:
 * `varint(flags)` followed by the non-boolean fields in declaration order.
 *
 * @example
 * ```typescript
 * const schema = resolveSchema("Payload", [
 *   { name: "id", kind: FieldKind.Int32, annotations: ["VarInt"] },
 *   { name: "active", kind: FieldKind.Bool },
 * ]);
 *
 * const encoder = new Encoder();
 * const session = encoder.beginStructure(schema);
 * encoder.writeScalarField(session, 0, 123);
 * encoder.setBooleanField(session, 1, true);
 * const bytes = encoder.endStructure(session); // [0x01, 0x7b]
 * ```
 */
export class Encoder {
  private active: EncodeSession | null = null;
  private readonly data: Writer;
  private readonly warnOnUnwrittenFields: boolean;

  constructor(options: EncoderOptions = {}) {
    this.data = new Writer({ initialCapacity: options.initialCapacity ?? DEFAULT_DATA_CAPACITY });
    this.warnOnUnwrittenFields = options.warnOnUnwrittenFields ?? false;
  }

  /**
   * Returns "in-structure" while a session is open, "idle" otherwise.
   */
  get state(): EngineState {
    return this.active === null ? "idle" : "in-structure";
  }

  /**
   * Opens a structure.
   *
   * @throws UsageError if a structure is already open; the open session is left untouched
   */
  beginStructure(schema: StructureSchema): EncodeSession {
    if (this.active !== null) {
      throw new UsageError(
        `Cannot begin structure ${schema.name} while ${this.active.schema.name} is open: nested structures are not supported`
      );
    }
    this.data.reset();
    const session = new EncodeSession(schema, this.data);
    this.active = session;
    return session;
  }

  /**
   * Records a boolean field. Nothing is written until the structure ends.
   */
  setBooleanField(session: EncodeSession, position: number, value: boolean): void {
    this.checkSession(session);
    const field = fieldAt(session.schema, position);
    if (field.kind !== FieldKind.Bool) {
      throw new UsageError(`${label(session.schema, field)} is ${field.kind}, use writeScalarField`);
    }
    const bit = session.schema.flagBits.get(position);
    if (bit === undefined) {
      throw new UsageError(`${label(session.schema, field)} has no flag bit`);
    }
    session.booleans[bit] = expectBoolean(value, label(session.schema, field));
    session.written.add(position);
  }

  /**
   * Serializes a non-boolean field into the structure's data buffer.
   *
   * @throws UnsupportedKindError if the field is not an encodable scalar
   * @throws UsageError if the value does not fit the field's kind
   */
  writeScalarField(session: EncodeSession, position: number, value: unknown): void {
    this.checkSession(session);
    const field = fieldAt(session.schema, position);
    if (!isScalarKind(field.kind)) {
      throw new UnsupportedKindError(field.kind, `for field ${session.schema.name}.${field.name}`);
    }
    if (field.kind === FieldKind.Bool) {
      throw new UsageError(`${label(session.schema, field)} is bool, use setBooleanField`);
    }
    writeScalar(session.data, field.kind, field.varIntMode, value, label(session.schema, field));
    session.written.add(position);
  }

  /**
   * Writes any field, routing booleans to setBooleanField.
   */
  writeField(session: EncodeSession, position: number, value: unknown): void {
    this.checkSession(session);
    const field = fieldAt(session.schema, position);
    if (field.kind === FieldKind.Bool) {
      this.setBooleanField(session, position, expectBoolean(value, label(session.schema, field)));
    } else {
      this.writeScalarField(session, position, value);
    }
  }

  /**
   * Closes the structure and returns its bytes: the packed flags varint
   * followed by the accumulated field data.
   */
  endStructure(session: EncodeSession): Uint8Array {
    this.checkSession(session);

    const data = session.data.bytes();
    const out = new Writer({ initialCapacity: data.length + 5 });
    out.writeVarInt(packFlags(session.booleans));
    out.writeBytes(data);

    if (this.warnOnUnwrittenFields) {
      const missing = session.schema.fields
        .filter((field) => !session.written.has(field.position))
        .map((field) => field.name);
      if (missing.length > 0) {
        console.warn(
          `bitpacked: structure ${session.schema.name} ended with unwritten fields: ${missing.join(", ")}`
        );
      }
    }

    session.close();
    this.active = null;
    return out.bytes();
  }

  /**
   * Encodes a bare top-level scalar with no flags prefix.
   * Booleans take one byte; integers are always fixed-width.
   *
   * @throws UsageError while a structure is open
   */
  encodeScalar(kind: FieldKind, value: unknown): Uint8Array {
    if (this.active !== null) {
      throw new UsageError(`Cannot encode a top-level ${kind} while structure ${this.active.schema.name} is open`);
    }
    if (!isScalarKind(kind)) {
      throw new UnsupportedKindError(kind, "at top level");
    }

    const out = new Writer({ initialCapacity: 16 });
    if (kind === FieldKind.Bool) {
      out.writeByte(expectBoolean(value, "Top-level bool") ? 1 : 0);
    } else {
      writeScalar(out, kind, VarIntMode.None, value, `Top-level ${kind}`);
    }
    return out.bytes();
  }

  private checkSession(session: EncodeSession): void {
    if (this.active === null) {
      throw new UsageError("No structure is open on this encoder");
    }
    if (session !== this.active) {
      throw new UsageError(
        session.isOpen
          ? `Session for ${session.schema.name} belongs to another encoder`
          : `Session for ${session.schema.name} is already closed`
      );
    }
  }
}
