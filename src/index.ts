/**
 * tagpickle - binary serialization for immutable records and closed unions
 *
 * The shape of a root type is described once with `t`; a registry derived
 * from it encodes and decodes every record, union, enum and container
 * reachable from the root.
 *
 * @example
 * ```typescript
 * import { t, pickle, unpickle, Infer } from 'tagpickle';
 *
 * const Point = t.record("geo.Point", { x: t.int32(), y: t.int32() });
 * type Point = Infer<typeof Point>;
 *
 * const data = pickle(Point, { kind: "geo.Point", x: 1, y: 2 });
 * const point: Point = unpickle(Point, data);
 * ```
 */

// Markers and integer helpers
export {
  Marker,
  type Ordinal,
  MinInt32,
  MaxInt32,
  MinInt64,
  MaxInt64,
  MAX_VARINT32_BYTES,
  MAX_VARINT64_BYTES,
  isMarker,
  markerName,
  zigzagEncode,
  zigzagEncode64,
  zigzagDecode,
  zigzagDecode64,
} from "./types";

export {
  type VarIntResult,
  sizeOfVarInt32,
  sizeOfVarInt64,
  encodeVarInt32,
  encodeVarInt64,
  decodeVarInt32,
  decodeVarInt64,
} from "./varint";

// Errors
export {
  PicklerError,
  ConfigurationError,
  EncodeError,
  DecodeError,
  BufferOverflowError,
  BufferUnderflowError,
  WriterClosedError,
  InvalidValueError,
  InvalidMarkerError,
  UnknownOrdinalError,
  MalformedVarintError,
  InterningError,
  UnknownTypeError,
  SchemaEvolutionError,
  DepthExceededError,
  EndOfStreamError,
  MessageSizeExceededError,
  StreamClosedError,
} from "./errors";

// Descriptors and type analysis
export {
  t,
  isDescriptor,
  isTagged,
  type Desc,
  type Descriptor,
  type Infer,
  type ScalarKind,
  type ScalarDescriptor,
  type EnumDescriptor,
  type RecordDescriptor,
  type UnionDescriptor,
  type ListDescriptor,
  type OptionalDescriptor,
  type MapDescriptor,
  type ArrayDescriptor,
  type LazyDescriptor,
  type ConcreteType,
  type Fallback,
  type RecordOptions,
  type RecordValue,
  type Tagged,
} from "./descriptors";

export {
  analyze,
  discoverReachableTypes,
  toTreeString,
  type TypeExpr,
  type ValueExpr,
  type ValueKind,
} from "./type-expr";

export { enumSignature, recordSignature } from "./signature";

// Compatibility and configuration
export { CompatibilityMode, validateFieldCount } from "./compatibility";
export {
  COMPATIBILITY_ENV,
  MAX_DEPTH_ENV,
  DEFAULT_MAX_DEPTH,
  resolveOptions,
  type Logger,
  type PicklerOptions,
  type ResolvedOptions,
} from "./config";

// Codecs
export {
  ARRAY_SAMPLE_SIZE,
  SMALL_ARRAY_MARGIN,
  LARGE_ARRAY_MARGIN,
  skipValue,
  type Codec,
  type Encoder,
  type Decoder,
  type Sizer,
} from "./codecs";

export { type InternStats } from "./interning";

// Streaming support
export {
  StreamWriter,
  StreamReader,
  MessageIterator,
  type StreamWriterOptions,
  type StreamReaderOptions,
} from "./stream";

export { Writer } from "./writer";
export { Reader } from "./reader";

// Registry
import type { Desc } from "./descriptors";
import { registerRootType } from "./registry";
export { Registry, RegistryCache, defaultCache, registerRootType } from "./registry";

/**
 * Library version.
 */
export const VERSION = "0.1.0";

/**
 * Encodes a value of `root` using the default registry cache.
 */
export function pickle<T>(root: Desc<T>, value: T): Uint8Array {
  return registerRootType(root).toBytes(value);
}

/**
 * Decodes a value of `root` using the default registry cache.
 */
export function unpickle<T>(root: Desc<T>, data: Uint8Array): T {
  return registerRootType(root).fromBytes(data);
}
