import { BufferUnderflowError, DecodeError } from "./errors";
import { ReadSession } from "./interning";
import { decodeVarInt32, decodeVarInt64 } from "./varint";

// Module-level singleton to avoid repeated instantiation
const textDecoder = new TextDecoder();

/**
 * Reader decodes big-endian binary data from a buffer.
 *
 * Interned name back-references are resolved by seeking, so a reader must
 * cover the whole buffer the values were written into.
 */
export class Reader {
  private buffer: Uint8Array;
  private view: DataView;
  private pos: number;
  private end: number;

  /** Interning and depth state for this buffer. */
  readonly session: ReadSession;

  constructor(data: Uint8Array) {
    this.buffer = data;
    this.view = new DataView(data.buffer, data.byteOffset, data.byteLength);
    this.pos = 0;
    this.end = data.length;
    this.session = new ReadSession();
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
   * Moves the cursor to an absolute position.
   */
  seek(position: number): void {
    if (position < 0 || position > this.end) {
      throw new DecodeError(`Cannot seek to ${position}: buffer holds ${this.end} bytes`);
    }
    this.pos = position;
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
   * Advances past `length` bytes.
   */
  skip(length: number): void {
    this.checkAvailable(length);
    this.pos += length;
  }

  /**
   * Reads a value marker. The result is not checked against the known
   * markers; callers compare it with what they expect.
   */
  readMarker(): number {
    return this.readVarInt();
  }

  /**
   * Reads a signed 32-bit ZigZag varint.
   */
  readVarInt(): number {
    const { value, bytesRead } = decodeVarInt32(this.buffer, this.pos);
    this.pos += bytesRead;
    return value;
  }

  /**
   * Reads a signed 64-bit ZigZag varint.
   */
  readVarLong(): bigint {
    const { value, bytesRead } = decodeVarInt64(this.buffer, this.pos);
    this.pos += bytesRead;
    return value;
  }

  /**
   * Reads a varint that must not be negative, such as a length or count.
   */
  readLength(): number {
    const start = this.pos;
    const value = this.readVarInt();
    if (value < 0) {
      throw new DecodeError(`Negative length ${value} at position ${start}`);
    }
    return value;
  }

  /**
   * Reads a boolean.
   */
  readBool(): boolean {
    return this.readByte() !== 0;
  }

  /**
   * Reads a signed 8-bit integer.
   */
  readInt8(): number {
    this.checkAvailable(1);
    const value = this.view.getInt8(this.pos);
    this.pos += 1;
    return value;
  }

  /**
   * Reads a signed 16-bit integer.
   */
  readInt16(): number {
    this.checkAvailable(2);
    const value = this.view.getInt16(this.pos);
    this.pos += 2;
    return value;
  }

  /**
   * Reads an unsigned 16-bit integer.
   */
  readUint16(): number {
    this.checkAvailable(2);
    const value = this.view.getUint16(this.pos);
    this.pos += 2;
    return value;
  }

  /**
   * Reads a fixed signed 32-bit integer.
   */
  readInt32(): number {
    this.checkAvailable(4);
    const value = this.view.getInt32(this.pos);
    this.pos += 4;
    return value;
  }

  /**
   * Reads a fixed signed 64-bit integer.
   */
  readInt64(): bigint {
    this.checkAvailable(8);
    const value = this.view.getBigInt64(this.pos);
    this.pos += 8;
    return value;
  }

  /**
   * Reads a fixed unsigned 64-bit integer.
   */
  readUint64(): bigint {
    this.checkAvailable(8);
    const value = this.view.getBigUint64(this.pos);
    this.pos += 8;
    return value;
  }

  /**
   * Reads a 32-bit float (IEEE 754).
   */
  readFloat32(): number {
    this.checkAvailable(4);
    const value = this.view.getFloat32(this.pos);
    this.pos += 4;
    return value;
  }

  /**
   * Reads a 64-bit float (IEEE 754).
   */
  readFloat64(): number {
    this.checkAvailable(8);
    const value = this.view.getFloat64(this.pos);
    this.pos += 8;
    return value;
  }

  /**
   * Reads a varint length-prefixed UTF-8 string.
   */
  readString(): string {
    const length = this.readLength();
    const bytes = this.readBytes(length);
    return textDecoder.decode(bytes);
  }
}
