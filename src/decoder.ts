import { UnsupportedKindError, UsageError } from "./errors";
import { unpackFlags } from "./primitives";
import { Reader } from "./reader";
import { readScalar } from "./scalars";
import { type FieldDescriptor, type StructureSchema, fieldAt } from "./schema";
import { type EngineState, FieldKind, type ScalarValue, VarIntMode, isScalarKind } from "./types";

/**
 * Options for Decoder configuration.
 */
export interface DecoderOptions {
  /** Warn through console.warn when a structure ends with fields never read. Default: false */
  warnOnUnreadFields?: boolean;
}

/**
 * State of one structure being decoded. The flags are unpacked up front,
 * so boolean reads never touch the cursor.
 */
export class DecodeSession {
  readonly schema: StructureSchema;
  readonly booleans: readonly boolean[];
  readonly read: Set<number> = new Set();
  private _open: boolean = true;

  constructor(schema: StructureSchema, booleans: readonly boolean[]) {
    this.schema = schema;
    this.booleans = booleans;
  }

  /**
   * Returns true until the owning decoder ends the structure.
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
 * Decoder consumes bit-packed bytes positionally. The caller must read fields
 * in the order they were written, against the schema that wrote them.
 */
export class Decoder {
  private readonly reader: Reader;
  private active: DecodeSession | null = null;
  private readonly warnOnUnreadFields: boolean;

  constructor(data: Uint8Array, options: DecoderOptions = {}) {
    this.reader = new Reader(data);
    this.warnOnUnreadFields = options.warnOnUnreadFields ?? false;
  }

  /**
   * Returns the current cursor position.
   */
  get position(): number {
    return this.reader.position;
  }

  /**
   * Returns the number of bytes not yet consumed.
   */
  get remaining(): number {
    return this.reader.remaining;
  }

  /**
   * Returns "in-structure" while a session is open, "idle" otherwise.
   */
  get state(): EngineState {
    return this.active === null ? "idle" : "in-structure";
  }

  /**
   * Opens a structure and decodes its leading flags varint.
   *
   * @throws UsageError if a structure is already open
   * @throws MalformedInputError if the flags varint cannot be read
   */
  beginStructure(schema: StructureSchema): DecodeSession {
    if (this.active !== null) {
      throw new UsageError(
        `Cannot begin structure ${schema.name} while ${this.active.schema.name} is open: nested structures are not supported`
      );
    }
    const flags = this.reader.readVarInt();
    const session = new DecodeSession(schema, unpackFlags(flags, schema.booleanPositions.length));
    this.active = session;
    return session;
  }

  /**
   * Looks up a boolean field in the unpacked flags.
   */
  readBooleanField(session: DecodeSession, position: number): boolean {
    this.checkSession(session);
    const field = fieldAt(session.schema, position);
    if (field.kind !== FieldKind.Bool) {
      throw new UsageError(`${label(session.schema, field)} is ${field.kind}, use readScalarField`);
    }
    const bit = session.schema.flagBits.get(position);
    if (bit === undefined) {
      throw new UsageError(`${label(session.schema, field)} has no flag bit`);
    }
    session.read.add(position);
    return session.booleans[bit];
  }

  /**
   * Reads a non-boolean field at the cursor.
   *
   * @throws UnsupportedKindError if the field is not an encodable scalar
   * @throws MalformedInputError if the input ends early or a varint is too long
   */
  readScalarField(session: DecodeSession, position: number): ScalarValue {
    this.checkSession(session);
    const field = fieldAt(session.schema, position);
    if (!isScalarKind(field.kind)) {
      throw new UnsupportedKindError(field.kind, `for field ${session.schema.name}.${field.name}`);
    }
    if (field.kind === FieldKind.Bool) {
      throw new UsageError(`${label(session.schema, field)} is bool, use readBooleanField`);
    }
    const value = readScalar(this.reader, field.kind, field.varIntMode);
    session.read.add(position);
    return value;
  }

  /**
   * Reads any field, routing booleans to readBooleanField.
   */
  readField(session: DecodeSession, position: number): ScalarValue {
    this.checkSession(session);
    const field = fieldAt(session.schema, position);
    return field.kind === FieldKind.Bool
      ? this.readBooleanField(session, position)
      : this.readScalarField(session, position);
  }

  /**
   * Closes the structure. Fields left unread are not an error.
   */
  endStructure(session: DecodeSession): void {
    this.checkSession(session);

    if (this.warnOnUnreadFields) {
      const missing = session.schema.fields
        .filter((field) => !session.read.has(field.position))
        .map((field) => field.name);
      if (missing.length > 0) {
        console.warn(
          `bitpacked: structure ${session.schema.name} ended with unread fields: ${missing.join(", ")}`
        );
      }
    }

    session.close();
    this.active = null;
  }

  /**
   * Decodes a bare top-level scalar at the cursor.
   *
   * @throws UsageError while a structure is open
   */
  decodeScalar(kind: FieldKind): ScalarValue {
    if (this.active !== null) {
      throw new UsageError(`Cannot decode a top-level ${kind} while structure ${this.active.schema.name} is open`);
    }
    if (!isScalarKind(kind)) {
      throw new UnsupportedKindError(kind, "at top level");
    }
    if (kind === FieldKind.Bool) {
      return this.reader.readByte() !== 0;
    }
    return readScalar(this.reader, kind, VarIntMode.None);
  }

  private checkSession(session: DecodeSession): void {
    if (this.active === null) {
      throw new UsageError("No structure is open on this decoder");
    }
    if (session !== this.active) {
      throw new UsageError(
        session.isOpen
          ? `Session for ${session.schema.name} belongs to another decoder`
          : `Session for ${session.schema.name} is already closed`
      );
    }
  }
}
