/**
 * Base error class for bit-packed codec errors.
 */
export class BitPackedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "BitPackedError";
  }
}

/**
 * Error thrown when the codec is driven incorrectly: nested structures,
 * field operations without an active session, or values that do not match
 * the schema.
 */
export class UsageError extends BitPackedError {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

/**
 * Error thrown when a field or scalar kind cannot be represented in this format.
 */
export class UnsupportedKindError extends UsageError {
  constructor(kind: string, context: string) {
    super(`Unsupported kind "${kind}" ${context}: nested records, collections, enums, nullable and polymorphic values are not supported`);
    this.name = "UnsupportedKindError";
  }
}

/**
 * Error thrown when input bytes cannot be decoded.
 */
export class MalformedInputError extends BitPackedError {
  constructor(message: string) {
    super(message);
    this.name = "MalformedInputError";
  }
}

/**
 * Error thrown when the input is exhausted during decoding.
 */
export class BufferUnderflowError extends MalformedInputError {
  constructor(needed: number, available: number) {
    super(`Buffer underflow: needed ${needed} bytes, only ${available} available`);
    this.name = "BufferUnderflowError";
  }
}

/**
 * Error thrown when a varint has no terminating byte within its maximum length.
 */
export class VarIntOverflowError extends MalformedInputError {
  constructor(maxBytes: number) {
    super(`Varint overflow: no terminating byte within ${maxBytes} bytes`);
    this.name = "VarIntOverflowError";
  }
}
