import {
  ConcreteType,
  Desc,
  Descriptor,
  EnumDescriptor,
  RecordDescriptor,
  ScalarKind,
  UnionDescriptor,
  isDescriptor,
} from "./descriptors";
import { ConfigurationError } from "./errors";

/**
 * Kind of a leaf in a type expression.
 */
export type ValueKind = ScalarKind | "enum" | "record" | "union";

export type ValueExpr =
  | { readonly kind: "value"; readonly valueKind: ScalarKind }
  | { readonly kind: "value"; readonly valueKind: "enum"; readonly type: EnumDescriptor }
  | {
      readonly kind: "value";
      readonly valueKind: "record";
      readonly type: RecordDescriptor;
      /** The record is the one whose field is being analyzed. */
      readonly sameType: boolean;
    }
  | { readonly kind: "value"; readonly valueKind: "union"; readonly type: UnionDescriptor };

/**
 * The container shape of a field type, with its leaves classified.
 */
export type TypeExpr =
  | { readonly kind: "array"; readonly element: TypeExpr }
  | { readonly kind: "list"; readonly element: TypeExpr }
  | { readonly kind: "optional"; readonly wrapped: TypeExpr }
  | { readonly kind: "map"; readonly key: TypeExpr; readonly value: TypeExpr }
  | ValueExpr;

/** Scalar kinds, plus enums, allowed as map keys. */
const MAP_KEY_KINDS: ReadonlySet<ValueKind> = new Set<ValueKind>([
  "bool",
  "byte",
  "short",
  "char",
  "int32",
  "int64",
  "float32",
  "float64",
  "string",
  "uuid",
  "enum",
]);

/** Guards against lazy descriptors that only ever return lazy descriptors. */
const MAX_LAZY_HOPS = 64;

/**
 * Follows lazy references to a concrete descriptor.
 * @throws ConfigurationError if a reference does not produce a descriptor
 */
export function resolve(desc: Desc): Exclude<Descriptor, { tag: "lazy" }> {
  let current: unknown = desc;
  for (let hops = 0; hops <= MAX_LAZY_HOPS; hops++) {
    if (!isDescriptor(current)) {
      throw new ConfigurationError(`Unsupported type descriptor: ${String(current)}`);
    }
    if (current.tag !== "lazy") {
      return current;
    }
    current = current.get();
  }
  throw new ConfigurationError(`Lazy descriptor did not resolve within ${MAX_LAZY_HOPS} references`);
}

/**
 * Classifies a field's type into a container tree.
 *
 * Pure: the same descriptor always produces an equal expression. A record
 * leaf equal to `enclosing` is flagged `sameType`.
 * @throws ConfigurationError on shapes that cannot be encoded
 */
export function analyze(desc: Desc, enclosing?: RecordDescriptor): TypeExpr {
  const d = resolve(desc);
  switch (d.tag) {
    case "scalar":
      return { kind: "value", valueKind: d.scalar };
    case "enum":
      return { kind: "value", valueKind: "enum", type: d };
    case "record":
      return { kind: "value", valueKind: "record", type: d, sameType: d === enclosing };
    case "union":
      return { kind: "value", valueKind: "union", type: d };
    case "array":
      return { kind: "array", element: analyze(d.element, enclosing) };
    case "list":
      return { kind: "list", element: analyze(d.element, enclosing) };
    case "optional": {
      const wrapped = analyze(d.wrapped, enclosing);
      if (wrapped.kind === "optional") {
        throw new ConfigurationError(
          `Nested optional ${toTreeString({ kind: "optional", wrapped })} cannot be encoded: ` +
            "an absent inner value is indistinguishable from an absent outer one"
        );
      }
      return { kind: "optional", wrapped };
    }
    case "map": {
      const key = analyze(d.key, enclosing);
      if (key.kind !== "value" || !MAP_KEY_KINDS.has(key.valueKind)) {
        throw new ConfigurationError(
          `Map key ${toTreeString(key)} is not supported; keys must be scalars, strings, UUIDs or enums`
        );
      }
      return { kind: "map", key, value: analyze(d.value, enclosing) };
    }
    default:
      return unsupported(d);
  }
}

function unsupported(desc: never): never {
  throw new ConfigurationError(`Unsupported type descriptor: ${JSON.stringify(desc)}`);
}

/**
 * Renders an expression, e.g. `LIST(OPTIONAL(ARRAY(INT32)))`.
 */
export function toTreeString(expr: TypeExpr): string {
  switch (expr.kind) {
    case "array":
      return `ARRAY(${toTreeString(expr.element)})`;
    case "list":
      return `LIST(${toTreeString(expr.element)})`;
    case "optional":
      return `OPTIONAL(${toTreeString(expr.wrapped)})`;
    case "map":
      return `MAP(${toTreeString(expr.key)}, ${toTreeString(expr.value)})`;
    case "value":
      return valueString(expr);
  }
}

function valueString(expr: ValueExpr): string {
  switch (expr.valueKind) {
    case "enum":
      return `ENUM(${expr.type.name})`;
    case "record":
      return expr.sameType ? `SAME_TYPE(${expr.type.name})` : `RECORD(${expr.type.name})`;
    case "union":
      return `UNION(${expr.type.name})`;
    default:
      return expr.valueKind.toUpperCase();
  }
}

/**
 * Field names of a record, in encoding order.
 */
export function fieldNames(record: RecordDescriptor): readonly string[] {
  return Object.keys(record.fields);
}

/**
 * The direct members of a union, resolved.
 * @throws ConfigurationError if a member is not a record or union
 */
export function unionMembers(union: UnionDescriptor): readonly (RecordDescriptor | UnionDescriptor)[] {
  const members = union.members();
  if (members.length === 0) {
    throw new ConfigurationError(`Union ${union.name} has no members`);
  }
  return members.map((member) => {
    const d = resolve(member);
    if (d.tag !== "record" && d.tag !== "union") {
      throw new ConfigurationError(`Union ${union.name} member ${d.tag} is not a record or union`);
    }
    return d;
  });
}

/**
 * Every record reachable through a union's members, nested unions included.
 */
export function unionRecords(union: UnionDescriptor): readonly RecordDescriptor[] {
  const records: RecordDescriptor[] = [];
  const seen = new Set<UnionDescriptor>();
  const walk = (u: UnionDescriptor): void => {
    if (seen.has(u)) return;
    seen.add(u);
    for (const member of unionMembers(u)) {
      if (member.tag === "record") {
        if (!records.includes(member)) records.push(member);
      } else {
        walk(member);
      }
    }
  };
  walk(union);
  return records;
}

const INDEX_KEY = /^(0|[1-9]\d*)$/;

function validateRecord(record: RecordDescriptor): void {
  const names = fieldNames(record);
  for (const name of names) {
    if (name === "kind") {
      throw new ConfigurationError(`Record ${record.name} declares a field named "kind", which holds the type name`);
    }
    if (INDEX_KEY.test(name)) {
      throw new ConfigurationError(
        `Record ${record.name} field "${name}" is an integer key, which does not keep declaration order`
      );
    }
  }
  for (const arity of record.fallbacks.keys()) {
    if (!Number.isInteger(arity) || arity < 0 || arity >= names.length) {
      throw new ConfigurationError(
        `Record ${record.name} has a fallback for ${arity} fields; expected 0 to ${names.length - 1}`
      );
    }
  }
}

/**
 * Finds every record and enum reachable from `root`, sorted by name.
 *
 * Record fields, union members and container element, key and value types
 * are followed. Unions are walked but not returned.
 * @throws ConfigurationError on an invalid shape or two types sharing a name
 */
export function discoverReachableTypes(root: Desc): ConcreteType[] {
  const byName = new Map<string, Descriptor>();
  const visited = new Set<Descriptor>();
  const concrete: ConcreteType[] = [];

  const claim = (d: ConcreteType | UnionDescriptor): void => {
    const existing = byName.get(d.name);
    if (existing !== undefined && existing !== d) {
      throw new ConfigurationError(`Two different types are named ${d.name}`);
    }
    byName.set(d.name, d);
  };

  const visit = (desc: Desc, enclosing?: RecordDescriptor): void => {
    const expr = analyze(desc, enclosing);
    visitExpr(expr);
  };

  const visitExpr = (expr: TypeExpr): void => {
    switch (expr.kind) {
      case "array":
      case "list":
        visitExpr(expr.element);
        return;
      case "optional":
        visitExpr(expr.wrapped);
        return;
      case "map":
        visitExpr(expr.key);
        visitExpr(expr.value);
        return;
      case "value":
        break;
    }
    switch (expr.valueKind) {
      case "enum":
        if (visited.has(expr.type)) return;
        visited.add(expr.type);
        claim(expr.type);
        concrete.push(expr.type);
        return;
      case "record": {
        const record = expr.type;
        if (visited.has(record)) return;
        visited.add(record);
        claim(record);
        validateRecord(record);
        concrete.push(record);
        for (const field of Object.values(record.fields)) {
          visit(field, record);
        }
        return;
      }
      case "union": {
        const union = expr.type;
        if (visited.has(union)) return;
        visited.add(union);
        claim(union);
        for (const member of unionMembers(union)) {
          visit(member);
        }
        return;
      }
      default:
        return;
    }
  };

  visit(root);
  return concrete.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
}
