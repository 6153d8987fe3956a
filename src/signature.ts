import { createHash } from "node:crypto";
import { EnumDescriptor, RecordDescriptor } from "./descriptors";
import { analyze, fieldNames, toTreeString } from "./type-expr";

/**
 * Last segment of a dotted type name.
 */
export function simpleName(name: string): string {
  const dot = name.lastIndexOf(".");
  return dot === -1 ? name : name.slice(dot + 1);
}

/** First eight bytes of SHA-256 over `parts` joined by `!`, as a signed big-endian integer. */
function hashSignature(parts: readonly string[]): bigint {
  return createHash("sha256").update(parts.join("!"), "utf8").digest().readBigInt64BE(0);
}

/**
 * 64-bit fingerprint of an enum's constants, written with every enum value.
 *
 * Hashes `Name!CONST_A!CONST_B...`. Only the simple name contributes, so
 * moving an enum to another namespace keeps its signature.
 */
export function enumSignature(type: EnumDescriptor): bigint {
  return hashSignature([simpleName(type.name), ...type.constants]);
}

/**
 * 64-bit fingerprint of a record's shape: `Name!TYPE_1!field1!TYPE_2!field2...`
 * with each field's type as its tree string, in declaration order.
 */
export function recordSignature(type: RecordDescriptor): bigint {
  const parts = [simpleName(type.name)];
  for (const name of fieldNames(type)) {
    parts.push(toTreeString(analyze(type.fields[name], type)), name);
  }
  return hashSignature(parts);
}
