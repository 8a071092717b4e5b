import { BufferUnderflowError } from "./errors";
import {
  decodeVarInt,
  decodeVarLong,
  readFixed16,
  readFixed32,
  readFixed64,
} from "./primitives";

// Module-level singleton to avoid repeated instantiation
const textDecoder = new TextDecoder();

/**
 * Reader is a forward-only cursor over an input buffer.
 * Every read advances by exactly the number of bytes it consumed.
 */
export class Reader {
  private buffer: Uint8Array;
  private pos: number;
  private end: number;

  constructor(data: Uint8Array) {
    this.buffer = data;
    this.pos = 0;
    this.end = data.length;
  }

  /**
   * Returns the current position in the buffer.
   */
  get position(): number {
    return this.pos;
  }

  /**
   * Returns the number of bytes remaining.
   */
  get remaining(): number {
    return this.end - this.pos;
  }

  /**
   * Returns true if there is more data to read.
   */
  get hasMore(): boolean {
    return this.pos < this.end;
  }

  /**
   * Checks if there are enough bytes available.
   */
  private checkAvailable(needed: number): void {
    if (this.pos + needed > this.end) {
      throw new BufferUnderflowError(needed, this.remaining);
    }
  }

  /**
   * Reads a raw byte.
   */
  readByte(): number {
    this.checkAvailable(1);
    return this.buffer[this.pos++];
  }

  /**
   * Reads raw bytes.
   */
  readBytes(length: number): Uint8Array {
    this.checkAvailable(length);
    const bytes = this.buffer.subarray(this.pos, this.pos + length);
    this.pos += length;
    return bytes;
  }

  /**
   * Reads a big-endian 16-bit unsigned pattern.
   */
  readFixed16(): number {
    const value = readFixed16(this.buffer, this.pos);
    this.pos += 2;
    return value;
  }

  /**
   * Reads a big-endian 32-bit unsigned pattern.
   */
  readFixed32(): number {
    const value = readFixed32(this.buffer, this.pos);
    this.pos += 4;
    return value;
  }

  /**
   * Reads a big-endian 64-bit unsigned pattern.
   */
  readFixed64(): bigint {
    const value = readFixed64(this.buffer, this.pos);
    this.pos += 8;
    return value;
  }

  /**
   * Reads a 32-bit varint as a signed 32-bit integer.
   */
  readVarInt(): number {
    const { value, bytesRead } = decodeVarInt(this.buffer, this.pos);
    this.pos += bytesRead;
    return value;
  }

  /**
   * Reads a 64-bit varint as a signed 64-bit bigint.
   */
  readVarLong(): bigint {
    const { value, bytesRead } = decodeVarLong(this.buffer, this.pos);
    this.pos += bytesRead;
    return value;
  }

  /**
   * Reads a length-prefixed UTF-8 string.
   */
  readString(): string {
    // Lengths are written from an unsigned byte count
    const length = this.readVarInt() >>> 0;
    const bytes = this.readBytes(length);
    return textDecoder.decode(bytes);
  }
}
