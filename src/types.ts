/**
 * Markers that open every value on the wire.
 *
 * Markers are small negative numbers written as zig-zag varints, so each one
 * occupies a single byte. `Null` (0) doubles as the reserved wire ordinal.
 */
export enum Marker {
  Null = 0,
  Boolean = -1,
  Byte = -2,
  Short = -3,
  Char = -4,
  /** Fixed 32-bit big-endian integer */
  Int32 = -5,
  /** ZigZag varint 32-bit integer */
  Int32Var = -6,
  /** Fixed 64-bit big-endian integer */
  Int64 = -7,
  /** ZigZag varint 64-bit integer */
  Int64Var = -8,
  Float32 = -9,
  Float64 = -10,
  String = -11,
  OptionalEmpty = -12,
  OptionalPresent = -13,
  Enum = -14,
  Array = -15,
  Map = -16,
  List = -17,
  Record = -18,
  SameType = -19,
  Uuid = -20,
  InternedName = -21,
  InternedOffset = -22,
  InternedOffsetVar = -23,
}

const MARKER_NAMES: ReadonlyMap<number, string> = new Map(
  Object.entries(Marker)
    .filter((entry): entry is [string, number] => typeof entry[1] === "number")
    .map(([name, value]) => [value, name])
);

/**
 * Returns true if `value` is one of the defined markers.
 */
export function isMarker(value: number): value is Marker {
  return MARKER_NAMES.has(value);
}

/**
 * Returns the symbolic name of a marker, for error messages.
 */
export function markerName(value: number): string {
  return MARKER_NAMES.get(value) ?? `unknown(${value})`;
}

/**
 * Ordinal of a concrete type within one registry's sorted type table.
 */
export type Ordinal = number;

/**
 * Signed 32-bit integer bounds.
 */
export const MinInt32 = -0x80000000;
export const MaxInt32 = 0x7fffffff;

/**
 * Signed 64-bit integer bounds.
 */
export const MinInt64 = BigInt("-9223372036854775808"); // -2^63
export const MaxInt64 = BigInt("9223372036854775807"); // 2^63 - 1

/**
 * Maximum encoded sizes of zig-zag varints.
 */
export const MAX_VARINT32_BYTES = 5;
export const MAX_VARINT64_BYTES = 9;

/**
 * Encode a signed 32-bit integer using ZigZag encoding.
 * The result is an unsigned 32-bit number.
 */
export function zigzagEncode(n: number): number {
  return ((n << 1) ^ (n >> 31)) >>> 0;
}

/**
 * Encode a signed bigint using ZigZag encoding.
 * @throws RangeError if n is outside the valid 64-bit signed integer range
 */
export function zigzagEncode64(n: bigint): bigint {
  if (n < MinInt64 || n > MaxInt64) {
    throw new RangeError(
      `BigInt value ${n} is outside valid 64-bit signed integer range [${MinInt64}, ${MaxInt64}]`
    );
  }
  return BigInt.asUintN(64, (n << 1n) ^ (n >> 63n));
}

/**
 * Decode a ZigZag encoded integer.
 */
export function zigzagDecode(n: number): number {
  return (n >>> 1) ^ -(n & 1);
}

/**
 * Decode a ZigZag encoded bigint.
 */
export function zigzagDecode64(n: bigint): bigint {
  return BigInt.asIntN(64, (n >> 1n) ^ -(n & 1n));
}
