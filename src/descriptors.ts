/**
 * Type descriptors.
 *
 * Types are erased at run time, so a registry learns the shape of a value
 * graph from descriptors built with `t`. Each builder is typed so that
 * `Infer<typeof D>` is the TypeScript type of the values `D` describes.
 *
 * @example
 * ```typescript
 * const Point = t.record("geo.Point", { x: t.int32(), y: t.int32() });
 * type Point = Infer<typeof Point>; // { readonly kind: "geo.Point"; readonly x: number; readonly y: number }
 *
 * interface Tree { kind: "geo.Tree"; value: number; children: readonly Tree[] }
 * const Tree: Desc<Tree> = t.record("geo.Tree", {
 *   value: t.int32(),
 *   children: t.list(t.lazy<Tree>(() => Tree)),
 * });
 * ```
 */

export declare const valueType: unique symbol;

export interface Phantom<T> {
  readonly value: T;
}

/**
 * Carries the described value type. Never present at run time.
 */
export interface Typed<T> {
  readonly [valueType]?: Phantom<T>;
}

export type ScalarKind =
  | "bool"
  | "byte"
  | "short"
  | "char"
  | "int32"
  | "int64"
  | "float32"
  | "float64"
  | "string"
  | "uuid";

export interface ScalarDescriptor<K extends ScalarKind = ScalarKind> {
  readonly tag: "scalar";
  readonly scalar: K;
}

export interface EnumDescriptor {
  readonly tag: "enum";
  readonly name: string;
  readonly constants: readonly string[];
}

/**
 * Builds a complete value from the first `arity` fields of older data.
 */
export type Fallback = (fields: Readonly<Record<string, unknown>>) => unknown;

export interface RecordDescriptor {
  readonly tag: "record";
  readonly name: string;
  readonly fields: Readonly<Record<string, Desc>>;
  readonly fallbacks: ReadonlyMap<number, Fallback>;
}

export interface UnionDescriptor {
  readonly tag: "union";
  readonly name: string;
  readonly members: () => readonly Desc[];
}

export interface ListDescriptor {
  readonly tag: "list";
  readonly element: Desc;
}

export interface OptionalDescriptor {
  readonly tag: "optional";
  readonly wrapped: Desc;
}

export interface MapDescriptor {
  readonly tag: "map";
  readonly key: Desc;
  readonly value: Desc;
}

export interface ArrayDescriptor {
  readonly tag: "array";
  readonly element: Desc;
}

export interface LazyDescriptor {
  readonly tag: "lazy";
  readonly get: () => Desc;
}

export type Descriptor =
  | ScalarDescriptor
  | EnumDescriptor
  | RecordDescriptor
  | UnionDescriptor
  | ListDescriptor
  | OptionalDescriptor
  | MapDescriptor
  | ArrayDescriptor
  | LazyDescriptor;

/**
 * A descriptor of values of type `T`.
 */
export type Desc<T = unknown> = Descriptor & Typed<T>;

/**
 * The value type a descriptor describes.
 */
export type Infer<D extends Desc> = D extends Typed<infer T> ? T : never;

/**
 * Record and enum descriptors: the types that receive ordinals.
 */
export type ConcreteType = RecordDescriptor | EnumDescriptor;

/**
 * Any value carrying a discriminant.
 */
export interface Tagged {
  readonly kind: string;
}

/**
 * A record value as seen by the codecs: a discriminant plus named fields.
 */
export type RecordLike = Tagged & { readonly [field: string]: unknown };

export type FieldMap = Readonly<Record<string, Desc>>;

type OptionalKeys<F extends FieldMap> = {
  [K in keyof F]: undefined extends Infer<F[K]> ? K : never;
}[keyof F];

type Simplify<T> = { [K in keyof T]: T[K] } & {};

export type RecordValue<N extends string, F extends FieldMap> = Simplify<
  { readonly kind: N } & {
    readonly [K in Exclude<keyof F, OptionalKeys<F>>]: Infer<F[K]>;
  } & {
    readonly [K in OptionalKeys<F>]?: Infer<F[K]>;
  }
>;

export interface RecordOptions<V> {
  /**
   * Constructors for data written when the record had fewer fields, keyed by
   * that field count. Used under BACKWARDS and ALL compatibility.
   */
  fallbacks?: { readonly [arity: number]: (fields: Partial<Omit<V, "kind">>) => V };
}

export type ArrayValue<E extends Desc> = [E] extends [ScalarDescriptor<"byte">]
  ? Int8Array
  : [E] extends [ScalarDescriptor<"short">]
    ? Int16Array
    : [E] extends [ScalarDescriptor<"int32">]
      ? Int32Array
      : [E] extends [ScalarDescriptor<"int64">]
        ? BigInt64Array
        : [E] extends [ScalarDescriptor<"float32">]
          ? Float32Array
          : [E] extends [ScalarDescriptor<"float64">]
            ? Float64Array
            : readonly Infer<E>[];

function scalar<K extends ScalarKind, T>(kind: K): ScalarDescriptor<K> & Typed<T> {
  const desc: ScalarDescriptor<K> = { tag: "scalar", scalar: kind };
  return Object.freeze(desc);
}

function isThunk<M>(members: M | (() => M)): members is () => M {
  return typeof members === "function";
}

function toFallbackMap<V>(fallbacks: RecordOptions<V>["fallbacks"]): ReadonlyMap<number, Fallback> {
  const map = new Map<number, Fallback>();
  if (fallbacks === undefined) {
    return map;
  }
  for (const [arity, fallback] of Object.entries(fallbacks)) {
    // The record's value type is erased here; the registry checks the result's kind.
    map.set(Number(arity), fallback as Fallback);
  }
  return map;
}

/**
 * Descriptor builders.
 */
export const t = {
  bool: () => scalar<"bool", boolean>("bool"),
  /** Signed 8-bit integer. */
  byte: () => scalar<"byte", number>("byte"),
  /** Signed 16-bit integer. */
  short: () => scalar<"short", number>("short"),
  /** A single UTF-16 code unit, as a one-character string. */
  char: () => scalar<"char", string>("char"),
  int32: () => scalar<"int32", number>("int32"),
  int64: () => scalar<"int64", bigint>("int64"),
  float32: () => scalar<"float32", number>("float32"),
  float64: () => scalar<"float64", number>("float64"),
  string: () => scalar<"string", string>("string"),
  /** A UUID in canonical lower-case 8-4-4-4-12 hex form. */
  uuid: () => scalar<"uuid", string>("uuid"),

  enumeration<C extends string>(name: string, constants: readonly C[]): EnumDescriptor & Typed<C> {
    const desc: EnumDescriptor = { tag: "enum", name, constants: Object.freeze([...constants]) };
    return Object.freeze(desc);
  },

  /**
   * A structured value. Fields are encoded in the key order of `fields`;
   * `kind` is reserved for the discriminant and always equals `name`.
   */
  record<N extends string, F extends FieldMap>(
    name: N,
    fields: F,
    options: RecordOptions<RecordValue<N, F>> = {}
  ): RecordDescriptor & Typed<RecordValue<N, F>> {
    const desc: RecordDescriptor = {
      tag: "record",
      name,
      fields: Object.freeze({ ...fields }),
      fallbacks: toFallbackMap(options.fallbacks),
    };
    return Object.freeze(desc);
  },

  /**
   * A closed set of records (or nested unions). Pass a function when members
   * are declared after the union.
   */
  union<N extends string, M extends readonly Desc<Tagged>[]>(
    name: N,
    members: M | (() => M)
  ): UnionDescriptor & Typed<Infer<M[number]>> {
    const desc: UnionDescriptor = {
      tag: "union",
      name,
      members: isThunk(members) ? members : () => members,
    };
    return Object.freeze(desc);
  },

  list<E extends Desc>(element: E): ListDescriptor & Typed<readonly Infer<E>[]> {
    const desc: ListDescriptor = { tag: "list", element };
    return Object.freeze(desc);
  },

  optional<E extends Desc>(wrapped: E): OptionalDescriptor & Typed<Infer<E> | undefined> {
    const desc: OptionalDescriptor = { tag: "optional", wrapped };
    return Object.freeze(desc);
  },

  map<K extends Desc, V extends Desc>(
    key: K,
    value: V
  ): MapDescriptor & Typed<ReadonlyMap<Infer<K>, Infer<V>>> {
    const desc: MapDescriptor = { tag: "map", key, value };
    return Object.freeze(desc);
  },

  /**
   * A fixed-length array. Numeric elements use the matching typed array.
   */
  array<E extends Desc>(element: E): ArrayDescriptor & Typed<ArrayValue<E>> {
    const desc: ArrayDescriptor = { tag: "array", element };
    return Object.freeze(desc);
  },

  /**
   * Defers a reference, for recursive and forward-declared types.
   */
  lazy<T>(get: () => Desc<T>): LazyDescriptor & Typed<T> {
    const desc: LazyDescriptor = { tag: "lazy", get };
    return Object.freeze(desc);
  },
};

const TAGS: ReadonlySet<string> = new Set([
  "scalar",
  "enum",
  "record",
  "union",
  "list",
  "optional",
  "map",
  "array",
  "lazy",
]);

/**
 * Returns true if `value` looks like a descriptor built by `t`.
 */
export function isDescriptor(value: unknown): value is Desc {
  return (
    typeof value === "object" &&
    value !== null &&
    "tag" in value &&
    typeof value.tag === "string" &&
    TAGS.has(value.tag)
  );
}

/**
 * Returns true if `value` is a record value, i.e. carries a string `kind`.
 */
export function isTagged(value: unknown): value is RecordLike {
  return typeof value === "object" && value !== null && "kind" in value && typeof value.kind === "string";
}
