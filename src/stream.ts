/**
 * Framed streams of independently encoded values.
 *
 * Each frame is [length: varint][value: bytes] and carries its own interning
 * session, so one frame can be decoded, skipped or rejected without touching
 * the others.
 */

import { BufferUnderflowError, EndOfStreamError, MessageSizeExceededError, StreamClosedError } from "./errors";
import { Registry } from "./registry";
import { decodeVarInt32 } from "./varint";
import { Writer } from "./writer";

/** Default initial buffer capacity for stream writer. */
const DEFAULT_STREAM_BUFFER_CAPACITY = 4096;

/** Default maximum message size (64 MB). */
const DEFAULT_MAX_MESSAGE_SIZE = 64 * 1024 * 1024;

export interface StreamWriterOptions {
  /** Initial buffer capacity. Default: 4096 */
  initialCapacity?: number;
}

export interface StreamReaderOptions {
  /** Maximum allowed message size in bytes. Default: 64 MB */
  maxMessageSize?: number;
}

/**
 * StreamWriter appends one frame per value.
 *
 * @example
 * ```typescript
 * const stream = new StreamWriter(registry);
 * stream.write(first);
 * stream.write(second);
 * const data = stream.bytes();
 * ```
 */
export class StreamWriter<T> {
  private readonly out: Writer;
  private closed = false;
  private frames = 0;

  constructor(private readonly registry: Registry<T>, options: StreamWriterOptions = {}) {
    this.out = new Writer(options.initialCapacity ?? DEFAULT_STREAM_BUFFER_CAPACITY);
  }

  /**
   * Returns the current position (bytes written).
   */
  get position(): number {
    return this.out.position;
  }

  /**
   * Returns the number of frames written.
   */
  get count(): number {
    return this.frames;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Encodes `value` into its own frame.
   * @throws StreamClosedError if the writer is closed
   */
  write(value: T): void {
    if (this.closed) {
      throw new StreamClosedError();
    }
    this.writeMessage(this.registry.toBytes(value));
  }

  /**
   * Writes already encoded bytes as a frame.
   * @throws StreamClosedError if the writer is closed
   */
  writeMessage(data: Uint8Array): void {
    if (this.closed) {
      throw new StreamClosedError();
    }
    this.out.writeVarInt(data.length);
    this.out.writeBytes(data);
    this.frames++;
  }

  /**
   * Returns the encoded frames.
   */
  bytes(): Uint8Array {
    return this.out.bytes();
  }

  /**
   * Resets the writer for reuse, clearing all written data.
   */
  reset(): void {
    this.out.reset();
    this.frames = 0;
    this.closed = false;
  }

  /**
   * Closes the writer. No more frames can be written after closing.
   */
  close(): void {
    this.closed = true;
  }
}

/**
 * StreamReader splits a buffer into frames.
 *
 * @example
 * ```typescript
 * const reader = new StreamReader(data);
 * for (const frame of reader.messages()) {
 *   const value = registry.fromBytes(frame);
 * }
 * ```
 */
export class StreamReader implements AsyncIterable<Uint8Array> {
  private readonly buffer: Uint8Array;
  private pos: number;
  private maxMessageSize: number;

  constructor(data: Uint8Array, options: StreamReaderOptions = {}) {
    this.buffer = data;
    this.pos = 0;
    this.maxMessageSize = options.maxMessageSize ?? DEFAULT_MAX_MESSAGE_SIZE;
  }

  get position(): number {
    return this.pos;
  }

  get remaining(): number {
    return this.buffer.length - this.pos;
  }

  get hasMore(): boolean {
    return this.pos < this.buffer.length;
  }

  setMaxMessageSize(size: number): void {
    this.maxMessageSize = size;
  }

  /**
   * Reads a frame length. Returns null at a clean end of stream.
   * @throws EndOfStreamError if the length is cut short
   */
  private readLength(): number | null {
    if (this.pos >= this.buffer.length) {
      return null;
    }
    try {
      const { value, bytesRead } = decodeVarInt32(this.buffer, this.pos);
      if (value < 0) {
        throw new EndOfStreamError(`Negative frame length ${value} at position ${this.pos}`);
      }
      this.pos += bytesRead;
      return value;
    } catch (e) {
      if (e instanceof BufferUnderflowError) {
        throw new EndOfStreamError("Incomplete frame length at end of stream");
      }
      throw e;
    }
  }

  private readFrame(length: number): Uint8Array {
    if (length > this.maxMessageSize) {
      throw new MessageSizeExceededError(length, this.maxMessageSize);
    }
    if (this.pos + length > this.buffer.length) {
      throw new EndOfStreamError(`Message claims ${length} bytes but only ${this.remaining} available`);
    }
    const data = this.buffer.subarray(this.pos, this.pos + length);
    this.pos += length;
    return data;
  }

  /**
   * Reads the next frame.
   * @throws EndOfStreamError if no frame remains or it is cut short
   * @throws MessageSizeExceededError if the frame exceeds the maximum size
   */
  readMessage(): Uint8Array {
    const length = this.readLength();
    if (length === null) {
      throw new EndOfStreamError("No more messages");
    }
    return this.readFrame(length);
  }

  /**
   * Reads the next frame, or returns null at the end of the stream.
   */
  tryReadMessage(): Uint8Array | null {
    const length = this.readLength();
    return length === null ? null : this.readFrame(length);
  }

  /**
   * Reads and decodes the next frame.
   */
  read<T>(registry: Registry<T>): T {
    return registry.fromBytes(this.readMessage());
  }

  /**
   * Skips the next frame and returns the bytes skipped, length included.
   * @throws EndOfStreamError if no frame remains
   */
  skipMessage(): number {
    const start = this.pos;
    const length = this.readLength();
    if (length === null) {
      throw new EndOfStreamError("No message to skip");
    }
    if (this.pos + length > this.buffer.length) {
      throw new EndOfStreamError(`Cannot skip: message claims ${length} bytes but only ${this.remaining} available`);
    }
    this.pos += length;
    return this.pos - start;
  }

  reset(): void {
    this.pos = 0;
  }

  async *[Symbol.asyncIterator](): AsyncIterableIterator<Uint8Array> {
    yield* this.messages();
  }

  *messages(): IterableIterator<Uint8Array> {
    for (let data = this.tryReadMessage(); data !== null; data = this.tryReadMessage()) {
      yield data;
    }
  }
}

/**
 * MessageIterator decodes frames with a registry.
 *
 * Iteration stops at the first frame that fails to decode; the failure is
 * kept in `error` and the frames before it are unaffected.
 *
 * @example
 * ```typescript
 * const iterator = new MessageIterator(data, registry);
 * const values = iterator.toArray();
 * if (iterator.error !== null) {
 *   // frame iterator.count failed
 * }
 * ```
 */
export class MessageIterator<T> implements Iterable<T>, AsyncIterable<T> {
  private readonly reader: StreamReader;
  private _error: Error | null = null;
  private decoded = 0;

  constructor(
    data: Uint8Array,
    private readonly registry: Registry<T>,
    options: StreamReaderOptions = {}
  ) {
    this.reader = new StreamReader(data, options);
  }

  /**
   * Returns the error that stopped iteration, if any.
   */
  get error(): Error | null {
    return this._error;
  }

  /**
   * Returns the number of frames decoded so far.
   */
  get count(): number {
    return this.decoded;
  }

  get hasMore(): boolean {
    return this._error === null && this.reader.hasMore;
  }

  /**
   * Decodes the next frame. Returns null at the end of the stream or on error.
   */
  next(): T | null {
    if (this._error !== null) {
      return null;
    }
    try {
      const data = this.reader.tryReadMessage();
      if (data === null) {
        return null;
      }
      const value = this.registry.fromBytes(data);
      this.decoded++;
      return value;
    } catch (e) {
      this._error = e instanceof Error ? e : new Error(String(e));
      return null;
    }
  }

  async *[Symbol.asyncIterator](): AsyncIterableIterator<T> {
    yield* this[Symbol.iterator]();
  }

  *[Symbol.iterator](): IterableIterator<T> {
    for (let value = this.next(); value !== null; value = this.next()) {
      yield value;
    }
  }

  /**
   * Collects the remaining values into an array.
   */
  toArray(): T[] {
    return [...this];
  }

  reset(): void {
    this.reader.reset();
    this._error = null;
    this.decoded = 0;
  }
}
