import { BufferOverflowError, WriterClosedError } from "./errors";
import { InternStats, WriteSession } from "./interning";
import { Marker } from "./types";
import { encodeVarInt32, encodeVarInt64, sizeOfVarInt32, sizeOfVarInt64 } from "./varint";

const INITIAL_CAPACITY = 256;
const GROWTH_FACTOR = 2;

// Module-level singleton to avoid repeated instantiation
const textEncoder = new TextEncoder();

/**
 * Writer encodes values into a big-endian binary buffer.
 *
 * A writer owns the interning session for its buffer, so it must only be used
 * by one encode at a time. Call `finish()` to take the bytes; the writer is
 * read-only afterwards.
 */
export class Writer {
  private buffer: Uint8Array;
  private view: DataView;
  private pos: number;
  private finished: boolean;
  private readonly growable: boolean;

  /** Interning and depth state for this buffer. */
  readonly session: WriteSession;

  constructor(initialCapacity: number = INITIAL_CAPACITY, growable: boolean = true) {
    this.buffer = new Uint8Array(Math.max(initialCapacity, 1));
    this.view = new DataView(this.buffer.buffer);
    this.pos = 0;
    this.finished = false;
    this.growable = growable;
    this.session = new WriteSession();
  }

  /**
   * Creates a writer over a fixed number of bytes that throws
   * BufferOverflowError instead of growing.
   */
  static allocate(capacity: number): Writer {
    return new Writer(capacity, false);
  }

  /**
   * Returns the current position in the buffer.
   */
  get position(): number {
    return this.pos;
  }

  /**
   * Returns true once `finish()` has been called.
   */
  get isFinished(): boolean {
    return this.finished;
  }

  /**
   * Returns how many names were written in full and by reference.
   */
  get internStats(): InternStats {
    return this.session.stats;
  }

  /**
   * Returns the encoded bytes.
   */
  bytes(): Uint8Array {
    return this.buffer.subarray(0, this.pos);
  }

  /**
   * Returns the encoded bytes and closes the writer to further writes.
   */
  finish(): Uint8Array {
    this.finished = true;
    return this.bytes();
  }

  /**
   * Resets the writer, and its interning session, for reuse.
   */
  reset(): void {
    this.pos = 0;
    this.finished = false;
    this.session.clear();
  }

  /**
   * Ensures the buffer has at least the specified capacity.
   */
  private ensureCapacity(needed: number): void {
    if (this.finished) {
      throw new WriterClosedError();
    }
    const required = this.pos + needed;
    if (required <= this.buffer.length) {
      return;
    }
    if (!this.growable) {
      throw new BufferOverflowError(needed, this.buffer.length - this.pos);
    }

    let newCapacity = this.buffer.length * GROWTH_FACTOR;
    while (newCapacity < required) {
      newCapacity *= GROWTH_FACTOR;
    }

    const newBuffer = new Uint8Array(newCapacity);
    newBuffer.set(this.buffer);
    this.buffer = newBuffer;
    this.view = new DataView(this.buffer.buffer);
  }

  /**
   * Writes a value marker.
   */
  writeMarker(marker: Marker): void {
    this.writeVarInt(marker);
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
   * Writes a signed 32-bit ZigZag varint.
   */
  writeVarInt(value: number): void {
    this.ensureCapacity(sizeOfVarInt32(value));
    this.pos += encodeVarInt32(this.buffer, this.pos, value);
  }

  /**
   * Writes a signed 64-bit ZigZag varint.
   */
  writeVarLong(value: bigint): void {
    this.ensureCapacity(sizeOfVarInt64(value));
    this.pos += encodeVarInt64(this.buffer, this.pos, value);
  }

  /**
   * Writes a boolean.
   */
  writeBool(value: boolean): void {
    this.writeByte(value ? 1 : 0);
  }

  /**
   * Writes a signed 8-bit integer.
   */
  writeInt8(value: number): void {
    this.ensureCapacity(1);
    this.view.setInt8(this.pos, value);
    this.pos += 1;
  }

  /**
   * Writes a signed 16-bit integer.
   */
  writeInt16(value: number): void {
    this.ensureCapacity(2);
    this.view.setInt16(this.pos, value);
    this.pos += 2;
  }

  /**
   * Writes an unsigned 16-bit integer (a UTF-16 code unit).
   */
  writeUint16(value: number): void {
    this.ensureCapacity(2);
    this.view.setUint16(this.pos, value);
    this.pos += 2;
  }

  /**
   * Writes a fixed signed 32-bit integer.
   */
  writeInt32(value: number): void {
    this.ensureCapacity(4);
    this.view.setInt32(this.pos, value);
    this.pos += 4;
  }

  /**
   * Writes a fixed signed 64-bit integer.
   */
  writeInt64(value: bigint): void {
    this.ensureCapacity(8);
    this.view.setBigInt64(this.pos, value);
    this.pos += 8;
  }

  /**
   * Writes a fixed unsigned 64-bit integer.
   */
  writeUint64(value: bigint): void {
    this.ensureCapacity(8);
    this.view.setBigUint64(this.pos, value);
    this.pos += 8;
  }

  /**
   * Writes a 32-bit float (IEEE 754).
   */
  writeFloat32(value: number): void {
    this.ensureCapacity(4);
    this.view.setFloat32(this.pos, value);
    this.pos += 4;
  }

  /**
   * Writes a 64-bit float (IEEE 754).
   */
  writeFloat64(value: number): void {
    this.ensureCapacity(8);
    this.view.setFloat64(this.pos, value);
    this.pos += 8;
  }

  /**
   * Writes a varint length-prefixed UTF-8 string.
   */
  writeString(value: string): void {
    const bytes = textEncoder.encode(value);
    this.writeVarInt(bytes.length);
    this.writeBytes(bytes);
  }
}

