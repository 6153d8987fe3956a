/**
 * Type name interning.
 *
 * Within one buffer a type name is written in full once. Every later
 * occurrence is a back-reference: the (negative) distance from the start of
 * the reference to the start of the first occurrence.
 *
 *   first:  [INTERNED_NAME][length: varint][utf8 bytes]
 *   later:  [INTERNED_OFFSET_VAR][offset: varint]      when the varint is < 4 bytes
 *           [INTERNED_OFFSET][offset: int32 big-endian] otherwise
 *
 * Sessions belong to exactly one Writer or Reader and are discarded with it.
 */

import { DepthExceededError, InterningError, InvalidMarkerError } from "./errors";
import type { Reader } from "./reader";
import { Marker, markerName } from "./types";
import { sizeOfVarInt32 } from "./varint";
import type { Writer } from "./writer";

/**
 * A deduplicated type name.
 */
export type InternedName = string;

/**
 * Byte position of the first occurrence of a name in the current buffer.
 */
export type InternedPosition = number;

/**
 * Distance from a back-reference to the first occurrence. Always negative.
 */
export type InternedOffset = number;

/**
 * Counters describing how names were written into one buffer.
 */
export interface InternStats {
  namesWritten: number;
  referencesWritten: number;
}

/**
 * Nesting depth counter shared by both session kinds.
 */
abstract class Session {
  private depth = 0;

  /**
   * Enters one level of structured-value nesting.
   * @throws DepthExceededError past `maxDepth`
   */
  enter(maxDepth: number): void {
    if (this.depth >= maxDepth) {
      throw new DepthExceededError(maxDepth);
    }
    this.depth++;
  }

  get currentDepth(): number {
    return this.depth;
  }

  leave(): void {
    this.depth--;
  }

  protected resetDepth(): void {
    this.depth = 0;
  }
}

/**
 * Per-buffer state of one encode: the name -> first position map.
 */
export class WriteSession extends Session {
  private readonly positions = new Map<InternedName, InternedPosition>();
  private names = 0;
  private references = 0;

  positionOf(name: InternedName): InternedPosition | undefined {
    return this.positions.get(name);
  }

  recordName(name: InternedName, position: InternedPosition): void {
    this.positions.set(name, position);
    this.names++;
  }

  recordReference(): void {
    this.references++;
  }

  get stats(): InternStats {
    return { namesWritten: this.names, referencesWritten: this.references };
  }

  clear(): void {
    this.positions.clear();
    this.names = 0;
    this.references = 0;
    this.resetDepth();
  }
}

/**
 * Per-buffer state of one decode: names already resolved, by position.
 */
export class ReadSession extends Session {
  private readonly names = new Map<InternedPosition, InternedName>();

  nameAt(position: InternedPosition): InternedName | undefined {
    return this.names.get(position);
  }

  recordName(position: InternedPosition, name: InternedName): void {
    this.names.set(position, name);
  }
}

/**
 * Writes `name` in full on its first occurrence in the writer's buffer and as
 * a back-reference afterwards. Returns the bytes written.
 */
export function internOrReference(writer: Writer, name: InternedName): number {
  const session = writer.session;
  const start = writer.position;
  const first = session.positionOf(name);

  if (first === undefined) {
    session.recordName(name, start);
    writer.writeMarker(Marker.InternedName);
    writer.writeString(name);
    return writer.position - start;
  }

  const offset: InternedOffset = first - start;
  if (sizeOfVarInt32(offset) < 4) {
    writer.writeMarker(Marker.InternedOffsetVar);
    writer.writeVarInt(offset);
  } else {
    writer.writeMarker(Marker.InternedOffset);
    writer.writeInt32(offset);
  }
  session.recordReference();
  return writer.position - start;
}

/**
 * Upper bound on the bytes `internOrReference` writes for `name` with a UTF-8
 * length of `byteLength`: whichever is larger of the full form and the
 * widest back-reference.
 */
export function maxInternedSize(byteLength: number): number {
  return 1 + Math.max(sizeOfVarInt32(byteLength) + byteLength, 4);
}

/**
 * Reads an interned name or resolves a back-reference to one.
 * @throws InterningError on a forward or out-of-range back-reference
 */
export function readInternedName(reader: Reader): InternedName {
  const start = reader.position;
  const marker = reader.readMarker();

  switch (marker) {
    case Marker.InternedName: {
      const name = reader.readString();
      reader.session.recordName(start, name);
      return name;
    }
    case Marker.InternedOffsetVar:
      return resolveReference(reader, start, reader.readVarInt());
    case Marker.InternedOffset:
      return resolveReference(reader, start, reader.readInt32());
    default:
      throw new InvalidMarkerError("an interned name", marker, start);
  }
}

/**
 * Skips an interned name or back-reference without resolving it.
 */
export function skipInternedName(reader: Reader): void {
  const start = reader.position;
  const marker = reader.readMarker();

  switch (marker) {
    case Marker.InternedName:
      reader.readString();
      return;
    case Marker.InternedOffsetVar:
      reader.readVarInt();
      return;
    case Marker.InternedOffset:
      reader.readInt32();
      return;
    default:
      throw new InvalidMarkerError("an interned name", marker, start);
  }
}

function resolveReference(reader: Reader, start: InternedPosition, offset: InternedOffset): InternedName {
  const target = start + offset;
  if (offset >= 0 || target < 0) {
    throw new InterningError(
      `Interned offset ${offset} at position ${start} does not point backwards into the buffer`
    );
  }

  const cached = reader.session.nameAt(target);
  if (cached !== undefined) {
    return cached;
  }

  const resume = reader.position;
  reader.seek(target);
  const marker = reader.readMarker();
  if (marker !== Marker.InternedName) {
    throw new InterningError(
      `Interned offset ${offset} at position ${start} points at ${markerName(marker)}, not a name`
    );
  }
  const name = reader.readString();
  reader.seek(resume);
  reader.session.recordName(target, name);
  return name;
}
