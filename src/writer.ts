const INITIAL_CAPACITY = 256;
const GROWTH_FACTOR = 2;

// Module-level singleton to avoid repeated instantiation
const textEncoder = new TextEncoder();

/**
 * Options for Writer configuration.
 */
export interface WriterOptions {
  /** Initial buffer capacity. Default: 256 */
  initialCapacity?: number;
}

/**
 * Writer is a growable byte sink. Fixed-width values are written big-endian,
 * most-significant byte first.
 */
export class Writer {
  private buffer: Uint8Array;
  private view: DataView;
  private pos: number;

  constructor(options: WriterOptions = {}) {
    this.buffer = new Uint8Array(Math.max(1, options.initialCapacity ?? INITIAL_CAPACITY));
    this.view = new DataView(this.buffer.buffer);
    this.pos = 0;
  }

  /**
   * Returns the current position in the buffer.
   */
  get position(): number {
    return this.pos;
  }

  /**
   * Returns the encoded bytes.
   */
  bytes(): Uint8Array {
    return this.buffer.subarray(0, this.pos);
  }

  /**
   * Resets the writer for reuse.
   */
  reset(): void {
    this.pos = 0;
  }

  /**
   * Ensures the buffer has at least the specified capacity.
   */
  private ensureCapacity(needed: number): void {
    const required = this.pos + needed;
    if (required <= this.buffer.length) {
      return;
    }

    let newCapacity = this.buffer.length * GROWTH_FACTOR;
    while (newCapacity < required) {
      newCapacity *= GROWTH_FACTOR;
    }

    const newBuffer = new Uint8Array(newCapacity);
    newBuffer.set(this.buffer.subarray(0, this.pos));
    this.buffer = newBuffer;
    this.view = new DataView(this.buffer.buffer);
  }

  /**
   * Writes a raw byte.
   */
  writeByte(value: number): void {
    this.ensureCapacity(1);
    this.buffer[this.pos++] = value & 0xff;
  }

  /**
   * Writes raw bytes.
   */
  writeBytes(data: Uint8Array): void {
    this.ensureCapacity(data.length);
    this.buffer.set(data, this.pos);
    this.pos += data.length;
  }

  /**
   * Writes the low 16 bits of a value.
   */
  writeFixed16(value: number): void {
    this.ensureCapacity(2);
    this.view.setUint16(this.pos, value & 0xffff, false);
    this.pos += 2;
  }

  /**
   * Writes the low 32 bits of a value.
   */
  writeFixed32(value: number): void {
    this.ensureCapacity(4);
    this.view.setUint32(this.pos, value >>> 0, false);
    this.pos += 4;
  }

  /**
   * Writes the low 64 bits of a value.
   */
  writeFixed64(value: bigint): void {
    this.ensureCapacity(8);
    this.view.setBigUint64(this.pos, BigInt.asUintN(64, value), false);
    this.pos += 8;
  }

  /**
   * Writes a 32-bit varint (LEB128).
   *
   * The value is grouped as an unsigned 32-bit pattern, so negative numbers
   * always take 5 bytes.
   */
  writeVarInt(value: number): void {
    this.ensureCapacity(5); // Max 5 bytes for 32-bit
    let v = value >>> 0;
    while (v > 0x7f) {
      this.buffer[this.pos++] = (v & 0x7f) | 0x80;
      v >>>= 7;
    }
    this.buffer[this.pos++] = v;
  }

  /**
   * Writes a 64-bit varint (LEB128) over the unsigned 64-bit pattern.
   */
  writeVarLong(value: bigint): void {
    this.ensureCapacity(10); // Max 10 bytes for 64-bit
    let v = BigInt.asUintN(64, value);
    while (v > 0x7fn) {
      this.buffer[this.pos++] = Number(v & 0x7fn) | 0x80;
      v >>= 7n;
    }
    this.buffer[this.pos++] = Number(v);
  }

  /**
   * Writes a length-prefixed UTF-8 string. The prefix counts bytes, not characters.
   */
  writeString(value: string): void {
    const bytes = textEncoder.encode(value);
    this.writeVarInt(bytes.length);
    this.writeBytes(bytes);
  }
}
