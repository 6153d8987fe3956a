/**
 * Leaf and container codecs.
 *
 * A field's TypeExpr is turned into one Codec, built from the leaf outward:
 * scalars are handled here, while records, unions and enums come from the
 * registry through a CodecContext. Every value starts with a marker, so any
 * encoded value can be skipped without knowing its type (see `skipValue`).
 */

import { DEFAULT_MAX_DEPTH } from "./config";
import { ScalarKind } from "./descriptors";
import { BufferUnderflowError, DecodeError, InvalidMarkerError, InvalidValueError } from "./errors";
import { skipInternedName } from "./interning";
import { Reader } from "./reader";
import { TypeExpr, ValueExpr, ValueKind } from "./type-expr";
import { Marker, MaxInt32, MaxInt64, MinInt32, MinInt64, isMarker, markerName } from "./types";
import { sizeOfVarInt32, sizeOfVarInt64 } from "./varint";
import { Writer } from "./writer";

/**
 * Writes one value.
 */
export type Encoder<T> = (writer: Writer, value: T) => void;

/**
 * Reads one value.
 */
export type Decoder<T> = (reader: Reader) => T;

/**
 * Upper bound on the bytes an encoder writes for a value.
 */
export type Sizer<T> = (value: T) => number;

/**
 * The encoder, decoder and sizer of one type expression.
 */
export interface Codec<T = unknown> {
  encode(writer: Writer, value: T): void;
  decode(reader: Reader): T;
  size(value: T): number;
}

/**
 * Leaves resolved by the registry: they need the ordinal table.
 */
export type StructuredExpr = Extract<ValueExpr, { valueKind: "enum" | "record" | "union" }>;

export interface CodecContext {
  structuredCodec(expr: StructuredExpr): Codec;
}

/** Leading elements inspected to pick an integer array's width. */
export const ARRAY_SAMPLE_SIZE = 32;

/**
 * Varints are used for an integer array when the sampled average varint size
 * is below `width - SMALL_ARRAY_MARGIN` (arrays up to ARRAY_SAMPLE_SIZE
 * elements) or `width - LARGE_ARRAY_MARGIN` (longer arrays).
 */
export const SMALL_ARRAY_MARGIN = 1;
export const LARGE_ARRAY_MARGIN = 2;

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;

/**
 * Number of bytes `value` occupies as UTF-8.
 */
export function utf8Length(value: string): number {
  let length = 0;
  for (let i = 0; i < value.length; i++) {
    const code = value.charCodeAt(i);
    if (code < 0x80) {
      length += 1;
    } else if (code < 0x800) {
      length += 2;
    } else if (code >= 0xd800 && code <= 0xdbff && i + 1 < value.length) {
      const next = value.charCodeAt(i + 1);
      if (next >= 0xdc00 && next <= 0xdfff) {
        length += 4;
        i++;
      } else {
        length += 3;
      }
    } else {
      // Lone surrogates are replaced by U+FFFD, also three bytes.
      length += 3;
    }
  }
  return length;
}

function expectMarker(reader: Reader, expected: Marker): void {
  const position = reader.position;
  const marker = reader.readMarker();
  if (marker !== expected) {
    throw new InvalidMarkerError(markerName(expected), marker, position);
  }
}

function checkInteger(value: unknown, min: number, max: number, expected: string): number {
  if (typeof value !== "number" || !Number.isInteger(value) || value < min || value > max) {
    throw new InvalidValueError(expected, value);
  }
  return value;
}

function checkInt64(value: unknown): bigint {
  if (typeof value !== "bigint" || value < MinInt64 || value > MaxInt64) {
    throw new InvalidValueError("a signed 64-bit bigint", value);
  }
  return value;
}

function checkNumber(value: unknown): number {
  if (typeof value !== "number") {
    throw new InvalidValueError("a number", value);
  }
  return value;
}

function checkString(value: unknown): string {
  if (typeof value !== "string") {
    throw new InvalidValueError("a string", value);
  }
  return value;
}

function checkChar(value: unknown): string {
  if (typeof value !== "string" || value.length !== 1) {
    throw new InvalidValueError("a single UTF-16 code unit", value);
  }
  return value;
}

function checkBool(value: unknown): boolean {
  if (typeof value !== "boolean") {
    throw new InvalidValueError("a boolean", value);
  }
  return value;
}

function checkUuid(value: unknown): string {
  if (typeof value !== "string" || !UUID_PATTERN.test(value)) {
    throw new InvalidValueError("a lower-case UUID string", value);
  }
  return value;
}

function writeUuidBody(writer: Writer, uuid: string): void {
  const hex = uuid.replace(/-/g, "");
  writer.writeUint64(BigInt(`0x${hex.slice(0, 16)}`));
  writer.writeUint64(BigInt(`0x${hex.slice(16)}`));
}

function readUuidBody(reader: Reader): string {
  const hex = reader.readUint64().toString(16).padStart(16, "0") + reader.readUint64().toString(16).padStart(16, "0");
  return `${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20)}`;
}

function int32Size(value: number): number {
  const varint = sizeOfVarInt32(value);
  return varint < 4 ? varint : 4;
}

function int64Size(value: bigint): number {
  const varint = sizeOfVarInt64(value);
  return varint < 8 ? varint : 8;
}

const SCALAR_CODECS: { readonly [K in ScalarKind]: Codec } = {
  bool: {
    encode: (writer, value) => {
      writer.writeMarker(Marker.Boolean);
      writer.writeBool(checkBool(value));
    },
    decode: (reader) => {
      expectMarker(reader, Marker.Boolean);
      return reader.readBool();
    },
    size: () => 2,
  },
  byte: {
    encode: (writer, value) => {
      writer.writeMarker(Marker.Byte);
      writer.writeInt8(checkInteger(value, -0x80, 0x7f, "a signed 8-bit integer"));
    },
    decode: (reader) => {
      expectMarker(reader, Marker.Byte);
      return reader.readInt8();
    },
    size: () => 2,
  },
  short: {
    encode: (writer, value) => {
      writer.writeMarker(Marker.Short);
      writer.writeInt16(checkInteger(value, -0x8000, 0x7fff, "a signed 16-bit integer"));
    },
    decode: (reader) => {
      expectMarker(reader, Marker.Short);
      return reader.readInt16();
    },
    size: () => 3,
  },
  char: {
    encode: (writer, value) => {
      writer.writeMarker(Marker.Char);
      writer.writeUint16(checkChar(value).charCodeAt(0));
    },
    decode: (reader) => {
      expectMarker(reader, Marker.Char);
      return String.fromCharCode(reader.readUint16());
    },
    size: () => 3,
  },
  int32: {
    encode: (writer, value) => {
      const n = checkInteger(value, MinInt32, MaxInt32, "a signed 32-bit integer");
      if (sizeOfVarInt32(n) < 4) {
        writer.writeMarker(Marker.Int32Var);
        writer.writeVarInt(n);
      } else {
        writer.writeMarker(Marker.Int32);
        writer.writeInt32(n);
      }
    },
    decode: (reader) => {
      const position = reader.position;
      const marker = reader.readMarker();
      if (marker === Marker.Int32Var) return reader.readVarInt();
      if (marker === Marker.Int32) return reader.readInt32();
      throw new InvalidMarkerError("INT32 or INT32_VAR", marker, position);
    },
    size: (value) => 1 + int32Size(checkInteger(value, MinInt32, MaxInt32, "a signed 32-bit integer")),
  },
  int64: {
    encode: (writer, value) => {
      const n = checkInt64(value);
      if (sizeOfVarInt64(n) < 8) {
        writer.writeMarker(Marker.Int64Var);
        writer.writeVarLong(n);
      } else {
        writer.writeMarker(Marker.Int64);
        writer.writeInt64(n);
      }
    },
    decode: (reader) => {
      const position = reader.position;
      const marker = reader.readMarker();
      if (marker === Marker.Int64Var) return reader.readVarLong();
      if (marker === Marker.Int64) return reader.readInt64();
      throw new InvalidMarkerError("INT64 or INT64_VAR", marker, position);
    },
    size: (value) => 1 + int64Size(checkInt64(value)),
  },
  float32: {
    encode: (writer, value) => {
      writer.writeMarker(Marker.Float32);
      writer.writeFloat32(checkNumber(value));
    },
    decode: (reader) => {
      expectMarker(reader, Marker.Float32);
      return reader.readFloat32();
    },
    size: () => 5,
  },
  float64: {
    encode: (writer, value) => {
      writer.writeMarker(Marker.Float64);
      writer.writeFloat64(checkNumber(value));
    },
    decode: (reader) => {
      expectMarker(reader, Marker.Float64);
      return reader.readFloat64();
    },
    size: () => 9,
  },
  string: {
    encode: (writer, value) => {
      writer.writeMarker(Marker.String);
      writer.writeString(checkString(value));
    },
    decode: (reader) => {
      expectMarker(reader, Marker.String);
      return reader.readString();
    },
    size: (value) => {
      const length = utf8Length(checkString(value));
      return 1 + sizeOfVarInt32(length) + length;
    },
  },
  uuid: {
    encode: (writer, value) => {
      writer.writeMarker(Marker.Uuid);
      writeUuidBody(writer, checkUuid(value));
    },
    decode: (reader) => {
      expectMarker(reader, Marker.Uuid);
      return readUuidBody(reader);
    },
    size: () => 17,
  },
};

/**
 * Marker that opens a value of the given shape.
 */
export function leadingMarker(expr: TypeExpr): Marker {
  switch (expr.kind) {
    case "array":
      return Marker.Array;
    case "list":
      return Marker.List;
    case "map":
      return Marker.Map;
    case "optional":
      return Marker.OptionalPresent;
    case "value":
      break;
  }
  switch (expr.valueKind) {
    case "bool":
      return Marker.Boolean;
    case "byte":
      return Marker.Byte;
    case "short":
      return Marker.Short;
    case "char":
      return Marker.Char;
    case "int32":
      return Marker.Int32;
    case "int64":
      return Marker.Int64;
    case "float32":
      return Marker.Float32;
    case "float64":
      return Marker.Float64;
    case "string":
      return Marker.String;
    case "uuid":
      return Marker.Uuid;
    case "enum":
      return Marker.Enum;
    case "record":
      return expr.sameType ? Marker.SameType : Marker.Record;
    case "union":
      return Marker.Record;
  }
}

function isAbsent(value: unknown): value is null | undefined {
  return value === undefined || value === null;
}

function optionalCodec(inner: Codec): Codec {
  return {
    encode: (writer, value) => {
      if (isAbsent(value)) {
        writer.writeMarker(Marker.OptionalEmpty);
        return;
      }
      writer.writeMarker(Marker.OptionalPresent);
      inner.encode(writer, value);
    },
    decode: (reader) => {
      const position = reader.position;
      const marker = reader.readMarker();
      if (marker === Marker.OptionalEmpty) return undefined;
      if (marker === Marker.OptionalPresent) return inner.decode(reader);
      throw new InvalidMarkerError("OPTIONAL_EMPTY or OPTIONAL_PRESENT", marker, position);
    },
    size: (value) => (isAbsent(value) ? 1 : 1 + inner.size(value)),
  };
}

function checkArray(value: unknown, expected: string): readonly unknown[] {
  if (!Array.isArray(value)) {
    throw new InvalidValueError(expected, value);
  }
  return value;
}

function listCodec(element: Codec): Codec {
  return {
    encode: (writer, value) => {
      const items = checkArray(value, "a list");
      writer.writeMarker(Marker.List);
      writer.writeVarInt(items.length);
      for (const item of items) {
        element.encode(writer, item);
      }
    },
    decode: (reader) => {
      expectMarker(reader, Marker.List);
      const count = reader.readLength();
      const items: unknown[] = [];
      for (let i = 0; i < count; i++) {
        items.push(element.decode(reader));
      }
      return Object.freeze(items);
    },
    size: (value) => {
      const items = checkArray(value, "a list");
      let size = 1 + sizeOfVarInt32(items.length);
      for (const item of items) {
        size += element.size(item);
      }
      return size;
    },
  };
}

function checkMap(value: unknown): ReadonlyMap<unknown, unknown> {
  if (!(value instanceof Map)) {
    throw new InvalidValueError("a Map", value);
  }
  return value;
}

function mapCodec(key: Codec, val: Codec): Codec {
  return {
    encode: (writer, value) => {
      const entries = checkMap(value);
      writer.writeMarker(Marker.Map);
      writer.writeVarInt(entries.size);
      for (const [k, v] of entries) {
        key.encode(writer, k);
        val.encode(writer, v);
      }
    },
    decode: (reader) => {
      expectMarker(reader, Marker.Map);
      const count = reader.readLength();
      const entries = new Map<unknown, unknown>();
      for (let i = 0; i < count; i++) {
        const k = key.decode(reader);
        entries.set(k, val.decode(reader));
      }
      return entries;
    },
    size: (value) => {
      const entries = checkMap(value);
      let size = 1 + sizeOfVarInt32(entries.size);
      for (const [k, v] of entries) {
        size += key.size(k) + val.size(v);
      }
      return size;
    },
  };
}

/**
 * Picks the varint form for an integer array whose elements have the given
 * varint sizes and fixed `width`.
 */
export function prefersVarint(length: number, varintSizeAt: (index: number) => number, width: number): boolean {
  const sample = Math.min(length, ARRAY_SAMPLE_SIZE);
  if (sample === 0) {
    return true;
  }
  let total = 0;
  for (let i = 0; i < sample; i++) {
    total += varintSizeAt(i);
  }
  const average = Math.floor(total / sample);
  const margin = length <= ARRAY_SAMPLE_SIZE ? SMALL_ARRAY_MARGIN : LARGE_ARRAY_MARGIN;
  return average < width - margin;
}

/**
 * Element codec of a primitive array: a body format with no per-element markers.
 */
interface ArrayBody {
  /** Element markers accepted on decode; the first is the default. */
  readonly markers: readonly Marker[];
  check(value: unknown): ArrayLike<unknown>;
  /** Marker to write for this particular array. */
  markerFor(value: ArrayLike<unknown>): Marker;
  write(writer: Writer, value: ArrayLike<unknown>, marker: Marker): void;
  read(reader: Reader, length: number, marker: Marker): unknown;
  bodySize(value: ArrayLike<unknown>, marker: Marker): number;
}

function checkInt8Array(value: unknown): Int8Array {
  if (!(value instanceof Int8Array)) throw new InvalidValueError("an Int8Array", value);
  return value;
}

function checkInt16Array(value: unknown): Int16Array {
  if (!(value instanceof Int16Array)) throw new InvalidValueError("an Int16Array", value);
  return value;
}

function checkInt32Array(value: unknown): Int32Array {
  if (!(value instanceof Int32Array)) throw new InvalidValueError("an Int32Array", value);
  return value;
}

function checkBigInt64Array(value: unknown): BigInt64Array {
  if (!(value instanceof BigInt64Array)) throw new InvalidValueError("a BigInt64Array", value);
  return value;
}

function checkFloat32Array(value: unknown): Float32Array {
  if (!(value instanceof Float32Array)) throw new InvalidValueError("a Float32Array", value);
  return value;
}

function checkFloat64Array(value: unknown): Float64Array {
  if (!(value instanceof Float64Array)) throw new InvalidValueError("a Float64Array", value);
  return value;
}

function fixedBody<A extends ArrayLike<unknown>>(
  marker: Marker,
  width: number,
  check: (value: unknown) => A,
  write: (writer: Writer, value: A, index: number) => void,
  read: (reader: Reader, length: number) => unknown
): ArrayBody {
  return {
    markers: [marker],
    check,
    markerFor: () => marker,
    write: (writer, value) => {
      const items = check(value);
      for (let i = 0; i < items.length; i++) {
        write(writer, items, i);
      }
    },
    read: (reader, length) => read(reader, length),
    bodySize: (value) => value.length * width,
  };
}

function int32Varint(items: Int32Array): boolean {
  return prefersVarint(items.length, (i) => sizeOfVarInt32(items[i]), 4);
}

function int64Varint(items: BigInt64Array): boolean {
  return prefersVarint(items.length, (i) => sizeOfVarInt64(items[i]), 8);
}

function checkBoolArray(value: unknown): readonly boolean[] {
  const items = checkArray(value, "an array of booleans");
  return items.map(checkBool);
}

function checkCharArray(value: unknown): readonly string[] {
  const items = checkArray(value, "an array of chars");
  return items.map(checkChar);
}

const PRIMITIVE_BODIES: Partial<Record<ValueKind, ArrayBody>> = {
  bool: {
    markers: [Marker.Boolean],
    check: checkBoolArray,
    markerFor: () => Marker.Boolean,
    write: (writer, value) => {
      const items = checkBoolArray(value);
      const bits = new Uint8Array(Math.ceil(items.length / 8));
      for (let i = 0; i < items.length; i++) {
        if (items[i]) bits[i >> 3] |= 1 << (i & 7);
      }
      writer.writeBytes(bits);
    },
    read: (reader, length) => {
      const bits = reader.readBytes(Math.ceil(length / 8));
      const items: boolean[] = [];
      for (let i = 0; i < length; i++) {
        items.push((bits[i >> 3] & (1 << (i & 7))) !== 0);
      }
      return Object.freeze(items);
    },
    bodySize: (value) => Math.ceil(value.length / 8),
  },
  byte: {
    markers: [Marker.Byte],
    check: checkInt8Array,
    markerFor: () => Marker.Byte,
    write: (writer, value) => {
      const items = checkInt8Array(value);
      writer.writeBytes(new Uint8Array(items.buffer, items.byteOffset, items.length));
    },
    read: (reader, length) => {
      const bytes = reader.readBytes(length);
      const items = new Int8Array(length);
      items.set(new Int8Array(bytes.buffer, bytes.byteOffset, length));
      return items;
    },
    bodySize: (value) => value.length,
  },
  short: fixedBody(
    Marker.Short,
    2,
    checkInt16Array,
    (writer, items, i) => writer.writeInt16(items[i]),
    (reader, length) => {
      const items = new Int16Array(length);
      for (let i = 0; i < length; i++) items[i] = reader.readInt16();
      return items;
    }
  ),
  char: fixedBody(
    Marker.Char,
    2,
    checkCharArray,
    (writer, items, i) => writer.writeUint16(items[i].charCodeAt(0)),
    (reader, length) => {
      const items: string[] = [];
      for (let i = 0; i < length; i++) items.push(String.fromCharCode(reader.readUint16()));
      return Object.freeze(items);
    }
  ),
  float32: fixedBody(
    Marker.Float32,
    4,
    checkFloat32Array,
    (writer, items, i) => writer.writeFloat32(items[i]),
    (reader, length) => {
      const items = new Float32Array(length);
      for (let i = 0; i < length; i++) items[i] = reader.readFloat32();
      return items;
    }
  ),
  float64: fixedBody(
    Marker.Float64,
    8,
    checkFloat64Array,
    (writer, items, i) => writer.writeFloat64(items[i]),
    (reader, length) => {
      const items = new Float64Array(length);
      for (let i = 0; i < length; i++) items[i] = reader.readFloat64();
      return items;
    }
  ),
  int32: {
    markers: [Marker.Int32, Marker.Int32Var],
    check: checkInt32Array,
    markerFor: (value) => (int32Varint(checkInt32Array(value)) ? Marker.Int32Var : Marker.Int32),
    write: (writer, value, marker) => {
      const items = checkInt32Array(value);
      for (let i = 0; i < items.length; i++) {
        if (marker === Marker.Int32Var) writer.writeVarInt(items[i]);
        else writer.writeInt32(items[i]);
      }
    },
    read: (reader, length, marker) => {
      const items = new Int32Array(length);
      for (let i = 0; i < length; i++) {
        items[i] = marker === Marker.Int32Var ? reader.readVarInt() : reader.readInt32();
      }
      return items;
    },
    bodySize: (value, marker) => {
      const items = checkInt32Array(value);
      if (marker === Marker.Int32) return items.length * 4;
      let size = 0;
      for (let i = 0; i < items.length; i++) size += sizeOfVarInt32(items[i]);
      return size;
    },
  },
  int64: {
    markers: [Marker.Int64, Marker.Int64Var],
    check: checkBigInt64Array,
    markerFor: (value) => (int64Varint(checkBigInt64Array(value)) ? Marker.Int64Var : Marker.Int64),
    write: (writer, value, marker) => {
      const items = checkBigInt64Array(value);
      for (let i = 0; i < items.length; i++) {
        if (marker === Marker.Int64Var) writer.writeVarLong(items[i]);
        else writer.writeInt64(items[i]);
      }
    },
    read: (reader, length, marker) => {
      const items = new BigInt64Array(length);
      for (let i = 0; i < length; i++) {
        items[i] = marker === Marker.Int64Var ? reader.readVarLong() : reader.readInt64();
      }
      return items;
    },
    bodySize: (value, marker) => {
      const items = checkBigInt64Array(value);
      if (marker === Marker.Int64) return items.length * 8;
      let size = 0;
      for (let i = 0; i < items.length; i++) size += sizeOfVarInt64(items[i]);
      return size;
    },
  },
};

function primitiveArrayCodec(body: ArrayBody): Codec {
  return {
    encode: (writer, value) => {
      const items = body.check(value);
      const marker = body.markerFor(items);
      writer.writeMarker(Marker.Array);
      writer.writeMarker(marker);
      writer.writeVarInt(items.length);
      body.write(writer, items, marker);
    },
    decode: (reader) => {
      expectMarker(reader, Marker.Array);
      const position = reader.position;
      const marker = reader.readMarker();
      if (!isMarker(marker) || !body.markers.includes(marker)) {
        throw new InvalidMarkerError(body.markers.map(markerName).join(" or "), marker, position);
      }
      const length = reader.readLength();
      // Every element takes at least one bit.
      if (length > reader.remaining * 8) {
        throw new BufferUnderflowError(Math.ceil(length / 8), reader.remaining);
      }
      return body.read(reader, length, marker);
    },
    size: (value) => {
      const items = body.check(value);
      const marker = body.markerFor(items);
      return 2 + sizeOfVarInt32(items.length) + body.bodySize(items, marker);
    },
  };
}

function objectArrayCodec(elementMarker: Marker, element: Codec): Codec {
  return {
    encode: (writer, value) => {
      const items = checkArray(value, "an array");
      writer.writeMarker(Marker.Array);
      writer.writeMarker(elementMarker);
      writer.writeVarInt(items.length);
      for (const item of items) {
        element.encode(writer, item);
      }
    },
    decode: (reader) => {
      expectMarker(reader, Marker.Array);
      expectMarker(reader, elementMarker);
      const length = reader.readLength();
      const items: unknown[] = [];
      for (let i = 0; i < length; i++) {
        items.push(element.decode(reader));
      }
      return Object.freeze(items);
    },
    size: (value) => {
      const items = checkArray(value, "an array");
      let size = 2 + sizeOfVarInt32(items.length);
      for (const item of items) {
        size += element.size(item);
      }
      return size;
    },
  };
}

function arrayCodec(element: TypeExpr, context: CodecContext): Codec {
  if (element.kind === "value") {
    const body = PRIMITIVE_BODIES[element.valueKind];
    if (body !== undefined) {
      return primitiveArrayCodec(body);
    }
  }
  return objectArrayCodec(leadingMarker(element), buildCodec(element, context));
}

/**
 * Composes the codec for a type expression, leaf first.
 */
export function buildCodec(expr: TypeExpr, context: CodecContext): Codec {
  switch (expr.kind) {
    case "optional":
      return optionalCodec(buildCodec(expr.wrapped, context));
    case "list":
      return listCodec(buildCodec(expr.element, context));
    case "map":
      return mapCodec(buildCodec(expr.key, context), buildCodec(expr.value, context));
    case "array":
      return arrayCodec(expr.element, context);
    case "value":
      break;
  }
  switch (expr.valueKind) {
    case "enum":
    case "record":
    case "union":
      return context.structuredCodec(expr);
    default:
      return SCALAR_CODECS[expr.valueKind];
  }
}

/** Fixed body widths of primitive array element markers. */
const FIXED_WIDTHS: ReadonlyMap<number, number> = new Map([
  [Marker.Byte, 1],
  [Marker.Short, 2],
  [Marker.Char, 2],
  [Marker.Int32, 4],
  [Marker.Int64, 8],
  [Marker.Float32, 4],
  [Marker.Float64, 8],
]);

/**
 * Reads and discards one complete value of any type.
 * @throws InvalidMarkerError if the data does not start with a value marker
 */
export function skipValue(reader: Reader, maxDepth: number = DEFAULT_MAX_DEPTH): void {
  const position = reader.position;
  const marker = reader.readMarker();

  const width = FIXED_WIDTHS.get(marker);
  if (width !== undefined) {
    reader.skip(width);
    return;
  }

  switch (marker) {
    case Marker.Null:
    case Marker.OptionalEmpty:
      return;
    case Marker.Boolean:
      reader.skip(1);
      return;
    case Marker.Int32Var:
      reader.readVarInt();
      return;
    case Marker.Int64Var:
      reader.readVarLong();
      return;
    case Marker.String:
      reader.skip(reader.readLength());
      return;
    case Marker.Uuid:
      reader.skip(16);
      return;
    case Marker.Enum:
      reader.readVarInt();
      reader.skip(8);
      reader.readVarInt();
      return;
    case Marker.OptionalPresent:
      skipNested(reader, maxDepth, () => skipValue(reader, maxDepth));
      return;
    case Marker.Array:
      skipNested(reader, maxDepth, () => skipArrayBody(reader, maxDepth));
      return;
    case Marker.List:
      skipNested(reader, maxDepth, () => skipValues(reader, reader.readLength(), maxDepth));
      return;
    case Marker.Map:
      skipNested(reader, maxDepth, () => skipValues(reader, reader.readLength() * 2, maxDepth));
      return;
    case Marker.Record:
      skipNested(reader, maxDepth, () => {
        reader.readVarInt();
        skipInternedName(reader);
        skipValues(reader, reader.readLength(), maxDepth);
      });
      return;
    case Marker.SameType:
      skipNested(reader, maxDepth, () => skipValues(reader, reader.readLength(), maxDepth));
      return;
    default:
      throw new InvalidMarkerError("a value", marker, position);
  }
}

function skipNested(reader: Reader, maxDepth: number, skip: () => void): void {
  reader.session.enter(maxDepth);
  try {
    skip();
  } finally {
    reader.session.leave();
  }
}

function skipValues(reader: Reader, count: number, maxDepth: number): void {
  for (let i = 0; i < count; i++) {
    skipValue(reader, maxDepth);
  }
}

function skipArrayBody(reader: Reader, maxDepth: number): void {
  const marker = reader.readMarker();
  const length = reader.readLength();

  const width = FIXED_WIDTHS.get(marker);
  if (width !== undefined) {
    reader.skip(width * length);
    return;
  }
  switch (marker) {
    case Marker.Boolean:
      reader.skip(Math.ceil(length / 8));
      return;
    case Marker.Int32Var:
      for (let i = 0; i < length; i++) reader.readVarInt();
      return;
    case Marker.Int64Var:
      for (let i = 0; i < length; i++) reader.readVarLong();
      return;
    case Marker.Null:
    case Marker.InternedName:
    case Marker.InternedOffset:
    case Marker.InternedOffsetVar:
      throw new DecodeError(`Array element marker ${markerName(marker)} does not describe a value`);
    default:
      skipValues(reader, length, maxDepth);
  }
}
