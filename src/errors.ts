import type { CompatibilityMode } from "./compatibility";

/**
 * Base error class for tagpickle errors.
 */
export class PicklerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PicklerError";
  }
}

/**
 * Error thrown while a registry is being built: an unsupported descriptor,
 * an open or empty union, a name clash. Never thrown by encode or decode.
 */
export class ConfigurationError extends PicklerError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/**
 * Error thrown when encoding fails.
 */
export class EncodeError extends PicklerError {
  constructor(message: string) {
    super(message);
    this.name = "EncodeError";
  }
}

/**
 * Error thrown when decoding fails. The buffer is not trusted past this point.
 */
export class DecodeError extends PicklerError {
  constructor(message: string) {
    super(message);
    this.name = "DecodeError";
  }
}

/**
 * Error thrown when a fixed-capacity buffer overflows during encoding.
 */
export class BufferOverflowError extends EncodeError {
  constructor(needed: number, available: number) {
    super(`Buffer overflow: needed ${needed} bytes, only ${available} available`);
    this.name = "BufferOverflowError";
  }
}

/**
 * Error thrown when writing to a writer that has been finished.
 */
export class WriterClosedError extends EncodeError {
  constructor() {
    super("Writer has been finished and is now read-only");
    this.name = "WriterClosedError";
  }
}

/**
 * Error thrown when a value does not fit the type it is encoded as.
 */
export class InvalidValueError extends EncodeError {
  constructor(expected: string, value: unknown) {
    super(`Expected ${expected} but got ${describe(value)}`);
    this.name = "InvalidValueError";
  }
}

/**
 * Error thrown when buffer is exhausted during decoding.
 */
export class BufferUnderflowError extends DecodeError {
  constructor(needed: number, available: number) {
    super(`Buffer underflow: needed ${needed} bytes, only ${available} available`);
    this.name = "BufferUnderflowError";
  }
}

/**
 * Error thrown when a marker other than the expected one is read.
 */
export class InvalidMarkerError extends DecodeError {
  constructor(expected: string, actual: number, position: number) {
    super(`Invalid marker at position ${position}: expected ${expected}, got ${actual}`);
    this.name = "InvalidMarkerError";
  }
}

/**
 * Error thrown when a wire ordinal falls outside the registry's type table.
 */
export class UnknownOrdinalError extends DecodeError {
  readonly ordinal: number;

  constructor(ordinal: number, tableSize: number) {
    super(`Unknown ordinal: ${ordinal} (type table has ${tableSize} entries)`);
    this.name = "UnknownOrdinalError";
    this.ordinal = ordinal;
  }
}

/**
 * Error thrown when a varint is not terminated within its maximum length.
 */
export class MalformedVarintError extends DecodeError {
  constructor(message: string) {
    super(message);
    this.name = "MalformedVarintError";
  }
}

/**
 * Error thrown when an interned name back-reference does not resolve.
 */
export class InterningError extends DecodeError {
  constructor(message: string) {
    super(message);
    this.name = "InterningError";
  }
}

/**
 * Error thrown when a type is not known to the registry, either because an
 * encoded value is not reachable from the root or because a decoded name
 * does not exist in the current type table.
 */
export class UnknownTypeError extends PicklerError {
  readonly typeName: string;

  constructor(typeName: string, context: string) {
    super(`Unknown type ${JSON.stringify(typeName)}: ${context}`);
    this.name = "UnknownTypeError";
    this.typeName = typeName;
  }
}

/**
 * Error thrown when encoded data does not match the current shape under the
 * active compatibility mode.
 */
export class SchemaEvolutionError extends PicklerError {
  readonly mode: CompatibilityMode;
  /** Field count of the current shape, for field-count mismatches. */
  readonly declared?: number;
  /** Field count found in the data, for field-count mismatches. */
  readonly encoded?: number;

  constructor(mode: CompatibilityMode, message: string, declared?: number, encoded?: number) {
    super(message);
    this.name = "SchemaEvolutionError";
    this.mode = mode;
    this.declared = declared;
    this.encoded = encoded;
  }
}

/**
 * Error thrown when nested structured values exceed the configured depth.
 */
export class DepthExceededError extends PicklerError {
  constructor(maxDepth: number) {
    super(`Maximum nesting depth of ${maxDepth} exceeded`);
    this.name = "DepthExceededError";
  }
}

/**
 * Error thrown when the end of stream is reached unexpectedly.
 */
export class EndOfStreamError extends DecodeError {
  constructor(message: string = "Unexpected end of stream") {
    super(message);
    this.name = "EndOfStreamError";
  }
}

/**
 * Error thrown when a framed message exceeds the maximum allowed size.
 */
export class MessageSizeExceededError extends DecodeError {
  constructor(size: number, maxSize: number) {
    super(`Message size ${size} exceeds maximum allowed size ${maxSize}`);
    this.name = "MessageSizeExceededError";
  }
}

/**
 * Error thrown when writing to a closed stream.
 */
export class StreamClosedError extends EncodeError {
  constructor() {
    super("Stream is closed");
    this.name = "StreamClosedError";
  }
}

function describe(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return `array(${value.length})`;
  if (typeof value === "bigint") return `bigint ${value}`;
  if (typeof value === "object") return value.constructor?.name ?? "object";
  if (typeof value === "string") return `string ${JSON.stringify(value)}`;
  return `${typeof value} ${String(value)}`;
}
