import { Codec, CodecContext, Decoder, Encoder, Sizer, StructuredExpr, buildCodec, skipValue, utf8Length } from "./codecs";
import { CompatibilityMode, validateFieldCount } from "./compatibility";
import { PicklerOptions, ResolvedOptions, resolveOptions } from "./config";
import {
  ConcreteType,
  Desc,
  EnumDescriptor,
  RecordDescriptor,
  RecordLike,
  UnionDescriptor,
  isTagged,
} from "./descriptors";
import {
  ConfigurationError,
  DecodeError,
  InvalidValueError,
  SchemaEvolutionError,
  UnknownOrdinalError,
  UnknownTypeError,
} from "./errors";
import { internOrReference, maxInternedSize, readInternedName } from "./interning";
import { Reader } from "./reader";
import { enumSignature, recordSignature } from "./signature";
import { analyze, discoverReachableTypes, fieldNames, resolve, unionRecords } from "./type-expr";
import { Marker, Ordinal, markerName } from "./types";
import { sizeOfVarInt32 } from "./varint";
import { Writer } from "./writer";

/**
 * Per-ordinal state of a record. The field chains are filled after every
 * entry of the table exists, so chains of mutually recursive records can
 * capture each other.
 */
interface RecordInfo {
  readonly tag: "record";
  readonly ordinal: Ordinal;
  readonly type: RecordDescriptor;
  readonly signature: bigint;
  readonly fieldNames: readonly string[];
  /** Marker, ordinal, worst-case name and field count. */
  readonly headerSize: number;
  readonly encoders: Encoder<unknown>[];
  readonly decoders: Decoder<unknown>[];
  readonly sizers: Sizer<unknown>[];
}

interface EnumInfo {
  readonly tag: "enum";
  readonly ordinal: Ordinal;
  readonly type: EnumDescriptor;
  readonly signature: bigint;
  readonly indexOf: ReadonlyMap<string, number>;
}

type TypeInfo = RecordInfo | EnumInfo;

function describeRoot(root: Desc): string {
  const d = resolve(root);
  return d.tag === "record" || d.tag === "union" || d.tag === "enum" ? d.name : d.tag;
}

/**
 * Registry maps every record and enum reachable from one root type to an
 * ordinal and holds the codecs built for them.
 *
 * Ordinals are indices into the name-sorted type table, so two registries
 * built from the same root agree on them. Once built a registry is read-only
 * and may be shared.
 *
 * @example
 * ```typescript
 * const registry = new Registry(Shape);
 * const bytes = registry.toBytes({ kind: "geo.Circle", radius: 2 });
 * const shape = registry.fromBytes(bytes);
 * ```
 */
export class Registry<T = unknown> {
  readonly options: ResolvedOptions;
  private readonly rootName: string;
  private readonly table: readonly TypeInfo[];
  private readonly byName: ReadonlyMap<string, TypeInfo>;
  private readonly byType: ReadonlyMap<ConcreteType, TypeInfo>;
  private readonly recordCodecs = new Map<RecordDescriptor, Codec>();
  private readonly sameTypeCodecs = new Map<RecordDescriptor, Codec>();
  private readonly unionCodecs = new Map<UnionDescriptor, Codec>();
  private readonly enumCodecs = new Map<EnumDescriptor, Codec>();
  private readonly rootCodec: Codec<T>;

  /**
   * @throws ConfigurationError if the root, or anything reachable from it,
   * cannot be encoded
   */
  constructor(root: Desc<T>, options: PicklerOptions = {}) {
    this.options = resolveOptions(options);
    this.rootName = describeRoot(root);

    const rootType = resolve(root);
    if (rootType.tag !== "record" && rootType.tag !== "union") {
      throw new ConfigurationError(`Root type ${this.rootName} must be a record or a union, not ${rootType.tag}`);
    }

    const types = discoverReachableTypes(root);
    if (!types.some((type) => type.tag === "record")) {
      throw new ConfigurationError(`Root type ${this.rootName} reaches no record`);
    }

    const table = types.map((type, ordinal) => this.createInfo(type, ordinal));
    this.table = table;
    this.byName = new Map(table.map((info) => [info.type.name, info]));
    this.byType = new Map(table.map((info) => [info.type, info]));

    const context: CodecContext = { structuredCodec: (expr) => this.structuredCodec(expr) };
    for (const info of table) {
      if (info.tag !== "record") continue;
      for (const name of info.fieldNames) {
        const codec = buildCodec(analyze(info.type.fields[name], info.type), context);
        info.encoders.push((writer, value) => codec.encode(writer, value));
        info.decoders.push((reader) => codec.decode(reader));
        info.sizers.push((value) => codec.size(value));
      }
    }

    // The root's declared type is erased in the codec chains.
    this.rootCodec = this.structuredCodec(
      rootType.tag === "record"
        ? { kind: "value", valueKind: "record", type: rootType, sameType: false }
        : { kind: "value", valueKind: "union", type: rootType }
    ) as Codec<T>;

    const { logger, compatibility } = this.options;
    if (compatibility !== CompatibilityMode.NONE) {
      logger.warn(
        `tagpickle: registry for ${this.rootName} decodes with compatibility mode ${compatibility}; ` +
          `field count mismatches will not be reported`
      );
    }
    logger.debug(
      `tagpickle: registry for ${this.rootName} holds ${table.length} types: ` +
        table.map((info) => `${info.ordinal}=${info.type.name}`).join(", ")
    );
  }

  private createInfo(type: ConcreteType, ordinal: Ordinal): TypeInfo {
    if (type.tag === "enum") {
      return {
        tag: "enum",
        ordinal,
        type,
        signature: enumSignature(type),
        indexOf: new Map(type.constants.map((constant, index) => [constant, index])),
      };
    }
    const names = fieldNames(type);
    return {
      tag: "record",
      ordinal,
      type,
      signature: recordSignature(type),
      fieldNames: names,
      headerSize:
        1 + sizeOfVarInt32(ordinal + 1) + maxInternedSize(utf8Length(type.name)) + sizeOfVarInt32(names.length),
      encoders: [],
      decoders: [],
      sizers: [],
    };
  }

  /**
   * Number of entries in the type table.
   */
  get size(): number {
    return this.table.length;
  }

  /**
   * Returns the ordinal of a record or enum reachable from the root.
   * @throws UnknownTypeError for any other type
   */
  ordinalOf(type: Desc): Ordinal {
    const d = resolve(type);
    const info = d.tag === "record" || d.tag === "enum" ? this.byType.get(d) : undefined;
    if (info === undefined) {
      throw new UnknownTypeError(describeRoot(type), `not a record or enum reachable from ${this.rootName}`);
    }
    return info.ordinal;
  }

  /**
   * Returns the 64-bit shape signature of a record or enum reachable from the
   * root. Records hash their field names and types; enums their constants.
   * @throws UnknownTypeError for any other type
   */
  signatureOf(type: Desc): bigint {
    return this.table[this.ordinalOf(type)].signature;
  }

  /**
   * Returns the type at `ordinal`.
   * @throws UnknownOrdinalError outside the table
   */
  typeAt(ordinal: Ordinal): ConcreteType {
    const info = this.table[ordinal];
    if (!Number.isInteger(ordinal) || info === undefined) {
      throw new UnknownOrdinalError(ordinal, this.table.length);
    }
    return info.type;
  }

  /**
   * Encodes `value` and returns the number of bytes written.
   */
  encode(value: T, writer: Writer): number {
    const start = writer.position;
    this.rootCodec.encode(writer, value);
    return writer.position - start;
  }

  /**
   * Decodes one value of the root type.
   */
  decode(reader: Reader): T {
    return this.rootCodec.decode(reader);
  }

  /**
   * Upper bound on the bytes `encode` writes for `value`.
   */
  maxEncodedSize(value: T): number {
    return this.rootCodec.size(value);
  }

  /**
   * Encodes a batch of values. Type names are written once for the batch.
   */
  encodeMany(values: readonly T[], writer: Writer): number {
    const start = writer.position;
    writer.writeMarker(Marker.Array);
    writer.writeMarker(Marker.Record);
    writer.writeVarInt(values.length);
    for (const value of values) {
      this.rootCodec.encode(writer, value);
    }
    return writer.position - start;
  }

  /**
   * Decodes a batch written by `encodeMany`.
   */
  decodeMany(reader: Reader): readonly T[] {
    this.expect(reader, Marker.Array);
    this.expect(reader, Marker.Record);
    const count = reader.readLength();
    const values: T[] = [];
    for (let i = 0; i < count; i++) {
      values.push(this.rootCodec.decode(reader));
    }
    return Object.freeze(values);
  }

  /**
   * Encodes `value` into a new buffer sized by `maxEncodedSize`.
   */
  toBytes(value: T): Uint8Array {
    const writer = Writer.allocate(this.maxEncodedSize(value));
    this.encode(value, writer);
    return writer.finish();
  }

  /**
   * Decodes a buffer holding exactly one value.
   * @throws DecodeError if bytes remain after the value
   */
  fromBytes(bytes: Uint8Array): T {
    const reader = new Reader(bytes);
    const value = this.decode(reader);
    if (reader.hasMore) {
      throw new DecodeError(`${reader.remaining} trailing bytes after ${this.rootName} value`);
    }
    return value;
  }

  private expect(reader: Reader, expected: Marker): void {
    const position = reader.position;
    const marker = reader.readMarker();
    if (marker !== expected) {
      throw new DecodeError(`Expected ${markerName(expected)} at position ${position}, got ${markerName(marker)}`);
    }
  }

  private infoOf(type: ConcreteType): TypeInfo {
    const info = this.byType.get(type);
    if (info === undefined) {
      throw new UnknownTypeError(type.name, `not reachable from ${this.rootName}`);
    }
    return info;
  }

  private recordInfo(type: RecordDescriptor): RecordInfo {
    const info = this.infoOf(type);
    if (info.tag !== "record") {
      throw new UnknownTypeError(type.name, "registered as an enum");
    }
    return info;
  }

  private structuredCodec(expr: StructuredExpr): Codec {
    switch (expr.valueKind) {
      case "enum": {
        const type = expr.type;
        return memo(this.enumCodecs, type, () => this.enumCodec(type));
      }
      case "record": {
        const type = expr.type;
        return expr.sameType
          ? memo(this.sameTypeCodecs, type, () => this.sameTypeCodec(this.recordInfo(type)))
          : memo(this.recordCodecs, type, () => this.recordCodec(type));
      }
      case "union": {
        const type = expr.type;
        return memo(this.unionCodecs, type, () => this.unionCodec(type));
      }
    }
  }

  private recordCodec(type: RecordDescriptor): Codec {
    const info = this.recordInfo(type);
    const accepts = (found: RecordInfo): boolean => found === info;
    return {
      encode: (writer, value) => this.writeRecord(writer, info, this.checkKind(value, info)),
      decode: (reader) => this.readRecord(reader, type.name, accepts),
      size: (value) => this.recordSize(info, this.checkKind(value, info)),
    };
  }

  private unionCodec(union: UnionDescriptor): Codec {
    const members = new Map<string, RecordInfo>();
    for (const record of unionRecords(union)) {
      members.set(record.name, this.recordInfo(record));
    }
    const dispatch = (value: unknown): [RecordInfo, RecordLike] => {
      if (!isTagged(value)) {
        throw new InvalidValueError(`a ${union.name} value`, value);
      }
      const info = members.get(value.kind);
      if (info === undefined) {
        throw new UnknownTypeError(value.kind, `not a member of union ${union.name}`);
      }
      return [info, value];
    };
    return {
      encode: (writer, value) => {
        const [info, record] = dispatch(value);
        this.writeRecord(writer, info, record);
      },
      decode: (reader) => this.readRecord(reader, union.name, (found) => members.get(found.type.name) === found),
      size: (value) => {
        const [info, record] = dispatch(value);
        return this.recordSize(info, record);
      },
    };
  }

  private sameTypeCodec(info: RecordInfo): Codec {
    return {
      encode: (writer, value) => {
        const record = this.checkKind(value, info);
        writer.session.enter(this.options.maxDepth);
        try {
          writer.writeMarker(Marker.SameType);
          writer.writeVarInt(info.fieldNames.length);
          this.writeFields(writer, info, record);
        } finally {
          writer.session.leave();
        }
      },
      decode: (reader) => {
        this.expect(reader, Marker.SameType);
        return this.readFields(reader, info, reader.readLength());
      },
      size: (value) => 1 + sizeOfVarInt32(info.fieldNames.length) + this.fieldsSize(info, this.checkKind(value, info)),
    };
  }

  private enumCodec(type: EnumDescriptor): Codec {
    const info = this.infoOf(type);
    if (info.tag !== "enum") {
      throw new UnknownTypeError(type.name, "registered as a record");
    }
    const indexOf = (value: unknown): number => {
      const index = typeof value === "string" ? info.indexOf.get(value) : undefined;
      if (index === undefined) {
        throw new InvalidValueError(`one of ${type.name} ${type.constants.join(", ")}`, value);
      }
      return index;
    };
    return {
      encode: (writer, value) => {
        const index = indexOf(value);
        writer.writeMarker(Marker.Enum);
        writer.writeVarInt(info.ordinal + 1);
        writer.writeInt64(info.signature);
        writer.writeVarInt(index);
      },
      decode: (reader) => {
        this.expect(reader, Marker.Enum);
        const ordinal = reader.readVarInt() - 1;
        const found = this.table[ordinal];
        if (ordinal < 0 || found === undefined) {
          throw new UnknownOrdinalError(ordinal, this.table.length);
        }
        if (found !== info) {
          throw new DecodeError(`Found ordinal ${ordinal} (${found.type.name}) where enum ${type.name} was expected`);
        }
        // Checked in every mode: constants decode by index.
        const signature = reader.readInt64();
        if (signature !== info.signature) {
          throw new SchemaEvolutionError(
            this.options.compatibility,
            `Enum ${type.name} signature ${signature} does not match the current constants (${info.signature})`
          );
        }
        const index = reader.readVarInt();
        if (index < 0 || index >= type.constants.length) {
          throw new DecodeError(`Enum ${type.name} has no constant at index ${index}; it declares ${type.constants.length}`);
        }
        return type.constants[index];
      },
      size: (value) => 1 + sizeOfVarInt32(info.ordinal + 1) + 8 + sizeOfVarInt32(indexOf(value)),
    };
  }

  private checkKind(value: unknown, info: RecordInfo): RecordLike {
    if (!isTagged(value)) {
      throw new InvalidValueError(`a ${info.type.name} value`, value);
    }
    if (value.kind !== info.type.name) {
      throw new UnknownTypeError(value.kind, `expected ${info.type.name}`);
    }
    return value;
  }

  private writeRecord(writer: Writer, info: RecordInfo, value: RecordLike): void {
    writer.session.enter(this.options.maxDepth);
    try {
      writer.writeMarker(Marker.Record);
      writer.writeVarInt(info.ordinal + 1);
      internOrReference(writer, info.type.name);
      writer.writeVarInt(info.fieldNames.length);
      this.writeFields(writer, info, value);
    } finally {
      writer.session.leave();
    }
  }

  private writeFields(writer: Writer, info: RecordInfo, value: RecordLike): void {
    const { encoders, fieldNames: names } = info;
    for (let i = 0; i < encoders.length; i++) {
      encoders[i](writer, value[names[i]]);
    }
  }

  private recordSize(info: RecordInfo, value: RecordLike): number {
    return info.headerSize + this.fieldsSize(info, value);
  }

  private fieldsSize(info: RecordInfo, value: RecordLike): number {
    const { sizers, fieldNames: names } = info;
    let size = 0;
    for (let i = 0; i < sizers.length; i++) {
      size += sizers[i](value[names[i]]);
    }
    return size;
  }

  /**
   * Reads a RECORD value. The interned name is authoritative: when it differs
   * from the table entry at the encoded ordinal, the name is looked up.
   */
  private readRecord(reader: Reader, declared: string, accepts: (info: RecordInfo) => boolean): unknown {
    this.expect(reader, Marker.Record);
    const wireOrdinal = reader.readVarInt();
    if (wireOrdinal <= 0) {
      throw new DecodeError(`Wire ordinal ${wireOrdinal} is reserved; a ${declared} value was expected`);
    }
    const ordinal = wireOrdinal - 1;
    let info = this.table[ordinal];
    if (info === undefined) {
      throw new UnknownOrdinalError(ordinal, this.table.length);
    }

    const name = readInternedName(reader);
    if (info.type.name !== name) {
      const named = this.byName.get(name);
      if (named === undefined) {
        throw new UnknownTypeError(name, `not reachable from ${this.rootName}`);
      }
      info = named;
    }
    if (info.tag !== "record" || !accepts(info)) {
      throw new DecodeError(`Found ${name} where a ${declared} value was expected`);
    }
    return this.readFields(reader, info, reader.readLength());
  }

  private readFields(reader: Reader, info: RecordInfo, encoded: number): unknown {
    const { compatibility: mode, maxDepth } = this.options;
    const declared = info.fieldNames.length;
    const error = validateFieldCount(mode, declared, encoded);
    if (error !== null) {
      throw error;
    }

    reader.session.enter(maxDepth);
    try {
      const { decoders, fieldNames: names } = info;
      const fields: Record<string, unknown> = {};
      const present = Math.min(encoded, declared);
      for (let i = 0; i < present; i++) {
        fields[names[i]] = decoders[i](reader);
      }
      for (let i = declared; i < encoded; i++) {
        skipValue(reader, maxDepth);
      }
      if (encoded >= declared) {
        return Object.freeze({ kind: info.type.name, ...fields });
      }
      return this.fallback(info, encoded, fields);
    } finally {
      reader.session.leave();
    }
  }

  private fallback(info: RecordInfo, arity: number, fields: Readonly<Record<string, unknown>>): unknown {
    const mode = this.options.compatibility;
    const construct = info.type.fallbacks.get(arity);
    if (construct === undefined) {
      throw new SchemaEvolutionError(
        mode,
        `${info.type.name} has no fallback for ${arity} fields (declares ${info.fieldNames.length})`,
        info.fieldNames.length,
        arity
      );
    }
    const value = construct(fields);
    if (!isTagged(value) || value.kind !== info.type.name) {
      throw new SchemaEvolutionError(
        mode,
        `Fallback for ${arity} fields of ${info.type.name} did not return a ${info.type.name} value`,
        info.fieldNames.length,
        arity
      );
    }
    return Object.freeze(value);
  }
}

function memo<K, V>(cache: Map<K, V>, key: K, create: () => V): V {
  const existing = cache.get(key);
  if (existing !== undefined) {
    return existing;
  }
  const created = create();
  cache.set(key, created);
  return created;
}

/**
 * Builds each root's registry at most once. Registries are held weakly by
 * their root descriptor.
 */
export class RegistryCache {
  private readonly registries = new WeakMap<Desc, Registry>();

  constructor(private readonly options: PicklerOptions = {}) {}

  get<T>(root: Desc<T>): Registry<T> {
    const existing = this.registries.get(root);
    if (existing !== undefined) {
      // Entries are keyed by their own root.
      return existing as Registry<T>;
    }
    const registry = new Registry<T>(root, this.options);
    this.registries.set(root, registry);
    return registry;
  }

  has(root: Desc): boolean {
    return this.registries.has(root);
  }
}

/**
 * Global default cache, configured from the environment.
 */
export const defaultCache = new RegistryCache();

/**
 * Returns the registry for `root`, building it on first use.
 */
export function registerRootType<T>(root: Desc<T>, cache: RegistryCache = defaultCache): Registry<T> {
  return cache.get(root);
}
