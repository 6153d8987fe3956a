/**
 * ZigZag variable-length integers.
 *
 * Values are zig-zag mapped, then written seven bits per byte, least
 * significant group first, with the high bit as a continuation flag:
 *
 *   32-bit: at most 5 bytes (the 5th byte carries the top 4 bits)
 *   64-bit: at most 9 bytes (the 9th byte carries the top 8 bits and has
 *           no continuation flag, one byte shorter than plain LEB128)
 */

import { BufferUnderflowError, MalformedVarintError } from "./errors";
import {
  MAX_VARINT32_BYTES,
  MAX_VARINT64_BYTES,
  zigzagDecode,
  zigzagDecode64,
  zigzagEncode,
  zigzagEncode64,
} from "./types";

/**
 * Result of decoding a varint from a byte array.
 */
export interface VarIntResult<T> {
  value: T;
  bytesRead: number;
}

/**
 * Number of bytes `encodeVarInt32` writes for `value`.
 */
export function sizeOfVarInt32(value: number): number {
  const z = zigzagEncode(value);
  if (z < 0x80) return 1;
  if (z < 0x4000) return 2;
  if (z < 0x200000) return 3;
  if (z < 0x10000000) return 4;
  return 5;
}

/**
 * Number of bytes `encodeVarInt64` writes for `value`.
 */
export function sizeOfVarInt64(value: bigint): number {
  let z = zigzagEncode64(value);
  let size = 1;
  while (z >= 0x80n && size < MAX_VARINT64_BYTES) {
    z >>= 7n;
    size++;
  }
  return size;
}

/**
 * Writes `value` into `target` at `offset` and returns the bytes written.
 * The caller guarantees room for `sizeOfVarInt32(value)` bytes.
 */
export function encodeVarInt32(target: Uint8Array, offset: number, value: number): number {
  let z = zigzagEncode(value);
  let pos = offset;
  while (z >= 0x80) {
    target[pos++] = (z & 0x7f) | 0x80;
    z >>>= 7;
  }
  target[pos++] = z;
  return pos - offset;
}

/**
 * Writes `value` into `target` at `offset` and returns the bytes written.
 * The caller guarantees room for `sizeOfVarInt64(value)` bytes.
 */
export function encodeVarInt64(target: Uint8Array, offset: number, value: bigint): number {
  let z = zigzagEncode64(value);
  let pos = offset;
  for (let i = 0; i < MAX_VARINT64_BYTES - 1; i++) {
    if (z < 0x80n) {
      target[pos++] = Number(z);
      return pos - offset;
    }
    target[pos++] = Number(z & 0x7fn) | 0x80;
    z >>= 7n;
  }
  // The ninth byte takes the remaining eight bits whole.
  target[pos++] = Number(z);
  return pos - offset;
}

/**
 * Reads a 32-bit varint from `source` at `offset`.
 * @throws BufferUnderflowError if the input ends mid-sequence
 * @throws MalformedVarintError if the sequence does not terminate in 5 bytes
 */
export function decodeVarInt32(source: Uint8Array, offset: number): VarIntResult<number> {
  let result = 0;
  let multiplier = 1;

  for (let i = 0; i < MAX_VARINT32_BYTES; i++) {
    const pos = offset + i;
    if (pos >= source.length) {
      throw new BufferUnderflowError(1, 0);
    }
    const b = source[pos];

    // The 5th byte may only contribute the top 4 bits of a 32-bit value.
    if (i === MAX_VARINT32_BYTES - 1 && (b & 0xf0) !== 0) {
      throw new MalformedVarintError(`Varint overflow at offset ${offset}: value exceeds 32 bits`);
    }

    result += (b & 0x7f) * multiplier;
    if ((b & 0x80) === 0) {
      return { value: zigzagDecode(result >>> 0), bytesRead: i + 1 };
    }
    multiplier *= 0x80;
  }

  throw new MalformedVarintError(`Varint overflow at offset ${offset}: exceeded ${MAX_VARINT32_BYTES} bytes`);
}

/**
 * Reads a 64-bit varint from `source` at `offset`.
 * @throws BufferUnderflowError if the input ends mid-sequence
 */
export function decodeVarInt64(source: Uint8Array, offset: number): VarIntResult<bigint> {
  let result = 0n;
  let shift = 0n;

  for (let i = 0; i < MAX_VARINT64_BYTES; i++) {
    const pos = offset + i;
    if (pos >= source.length) {
      throw new BufferUnderflowError(1, 0);
    }
    const b = BigInt(source[pos]);

    if (i === MAX_VARINT64_BYTES - 1) {
      result |= b << shift;
      return { value: zigzagDecode64(result), bytesRead: i + 1 };
    }

    result |= (b & 0x7fn) << shift;
    if ((b & 0x80n) === 0n) {
      return { value: zigzagDecode64(result), bytesRead: i + 1 };
    }
    shift += 7n;
  }

  throw new MalformedVarintError(`Varint64 overflow at offset ${offset}`);
}
