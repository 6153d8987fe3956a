import { describe, it, expect } from 'vitest';
import { Codec, CodecContext, buildCodec, prefersVarint, skipValue, utf8Length } from './codecs';
import { Desc, t } from './descriptors';
import { analyze } from './type-expr';
import { Writer } from './writer';
import { Reader } from './reader';
import { Marker, MaxInt32, MinInt32, MinInt64 } from './types';
import { internOrReference } from './interning';
import {
  BufferUnderflowError,
  DecodeError,
  DepthExceededError,
  InvalidMarkerError,
  InvalidValueError,
} from './errors';

const noStructured: CodecContext = {
  structuredCodec: () => {
    throw new Error('no structured types here');
  },
};

function codecFor(desc: Desc): Codec {
  return buildCodec(analyze(desc), noStructured);
}

function encode(desc: Desc, value: unknown): Uint8Array {
  const writer = new Writer();
  codecFor(desc).encode(writer, value);
  return writer.bytes();
}

function decode(desc: Desc, bytes: Uint8Array): unknown {
  return codecFor(desc).decode(new Reader(bytes));
}

describe('scalar codecs', () => {
  it('writes small int32 values as varints', () => {
    expect(encode(t.int32(), 1)).toEqual(new Uint8Array([11, 2]));
    expect(encode(t.int32(), -1048576)).toEqual(new Uint8Array([11, 0xff, 0xff, 0x7f]));
  });

  it('writes wide int32 values fixed', () => {
    expect(encode(t.int32(), 1048576)).toEqual(new Uint8Array([9, 0x00, 0x10, 0x00, 0x00]));
    expect(decode(t.int32(), new Uint8Array([9, 0x00, 0x10, 0x00, 0x00]))).toBe(1048576);
  });

  it('picks the int64 form the same way', () => {
    expect(encode(t.int64(), 1n)).toEqual(new Uint8Array([15, 2]));
    expect(encode(t.int64(), MinInt64)).toEqual(new Uint8Array([13, 0x80, 0, 0, 0, 0, 0, 0, 0]));
    expect(decode(t.int64(), new Uint8Array([13, 0x80, 0, 0, 0, 0, 0, 0, 0]))).toBe(MinInt64);
  });

  it('writes the remaining scalars', () => {
    expect(encode(t.bool(), true)).toEqual(new Uint8Array([1, 1]));
    expect(encode(t.short(), -2)).toEqual(new Uint8Array([5, 0xff, 0xfe]));
    expect(encode(t.char(), 'A')).toEqual(new Uint8Array([7, 0, 65]));
    expect(encode(t.string(), 'hé')).toEqual(new Uint8Array([21, 6, 0x68, 0xc3, 0xa9]));
    expect(encode(t.uuid(), '123e4567-e89b-12d3-a456-426614174000')).toEqual(
      new Uint8Array([39, 0x12, 0x3e, 0x45, 0x67, 0xe8, 0x9b, 0x12, 0xd3, 0xa4, 0x56, 0x42, 0x66, 0x14, 0x17, 0x40, 0x00])
    );
  });

  it('accepts only the lower-case UUID form it decodes to', () => {
    const uuid = '123e4567-e89b-12d3-a456-426614174000';
    expect(decode(t.uuid(), encode(t.uuid(), uuid))).toBe(uuid);
    expect(() => encode(t.uuid(), '123E4567-E89B-12D3-A456-426614174000')).toThrow(InvalidValueError);
  });

  it('round-trips floats', () => {
    expect(decode(t.float32(), encode(t.float32(), 1.5))).toBe(1.5);
    expect(decode(t.float64(), encode(t.float64(), -0.1))).toBe(-0.1);
  });

  it('sizes scalars exactly', () => {
    const cases: [Desc, unknown][] = [
      [t.int32(), 1],
      [t.int32(), 1048576],
      [t.int64(), MinInt64],
      [t.string(), 'hé'],
      [t.uuid(), '123e4567-e89b-12d3-a456-426614174000'],
      [t.char(), 'A'],
    ];
    for (const [desc, value] of cases) {
      expect(codecFor(desc).size(value)).toBe(encode(desc, value).length);
    }
  });

  it('rejects values of the wrong type', () => {
    expect(() => encode(t.int32(), 1.5)).toThrow(InvalidValueError);
    expect(() => encode(t.int32(), MaxInt32 + 1)).toThrow(InvalidValueError);
    expect(() => encode(t.byte(), 200)).toThrow(InvalidValueError);
    expect(() => encode(t.int64(), 1)).toThrow(InvalidValueError);
    expect(() => encode(t.string(), 5)).toThrow('Expected a string but got number 5');
    expect(() => encode(t.char(), 'ab')).toThrow(InvalidValueError);
    expect(() => encode(t.uuid(), 'not-a-uuid')).toThrow(InvalidValueError);
  });

  it('rejects unexpected markers', () => {
    expect(() => decode(t.int32(), new Uint8Array([21, 0]))).toThrow(InvalidMarkerError);
    expect(() => decode(t.bool(), new Uint8Array([3, 0]))).toThrow(InvalidMarkerError);
  });
});

describe('utf8Length', () => {
  it('counts encoded bytes', () => {
    expect(utf8Length('a')).toBe(1);
    expect(utf8Length('é')).toBe(2);
    expect(utf8Length('中')).toBe(3);
    expect(utf8Length('😀')).toBe(4);
    expect(utf8Length('\ud800')).toBe(3);
  });
});

describe('container codecs', () => {
  it('writes optionals', () => {
    expect(encode(t.optional(t.int32()), undefined)).toEqual(new Uint8Array([23]));
    expect(encode(t.optional(t.int32()), null)).toEqual(new Uint8Array([23]));
    expect(encode(t.optional(t.int32()), 5)).toEqual(new Uint8Array([25, 11, 10]));
    expect(decode(t.optional(t.int32()), new Uint8Array([23]))).toBeUndefined();
  });

  it('writes lists', () => {
    expect(encode(t.list(t.string()), ['a', 'b'])).toEqual(new Uint8Array([33, 4, 21, 2, 97, 21, 2, 98]));
  });

  it('decodes lists frozen', () => {
    const list = decode(t.list(t.string()), new Uint8Array([33, 4, 21, 2, 97, 21, 2, 98]));
    expect(list).toEqual(['a', 'b']);
    expect(Object.isFrozen(list)).toBe(true);
  });

  it('writes maps in insertion order', () => {
    expect(encode(t.map(t.string(), t.int32()), new Map([['a', 1]]))).toEqual(
      new Uint8Array([31, 2, 21, 2, 97, 11, 2])
    );
    const desc = t.map(t.int32(), t.string());
    const decoded = decode(desc, encode(desc, new Map([[3, 'c'], [1, 'a'], [2, 'b']])));
    expect(decoded).toBeInstanceOf(Map);
    expect(decoded instanceof Map ? [...decoded.keys()] : []).toEqual([3, 1, 2]);
  });

  it('rejects non-containers', () => {
    expect(() => encode(t.list(t.int32()), 'abc')).toThrow(InvalidValueError);
    expect(() => encode(t.map(t.string(), t.int32()), { a: 1 })).toThrow('Expected a Map but got Object');
  });

  it('nests containers', () => {
    const desc = t.list(t.optional(t.map(t.string(), t.list(t.int32()))));
    const value = [undefined, new Map([['xs', [1, 2, 3]]]), new Map<string, number[]>()];
    const bytes = encode(desc, value);
    expect(decode(desc, bytes)).toEqual(value);
    expect(codecFor(desc).size(value)).toBe(bytes.length);
  });
});

describe('arrays', () => {
  it('packs booleans into a bitset', () => {
    const bits = [true, false, true, true, false, false, false, false, true];
    expect(encode(t.array(t.bool()), bits)).toEqual(new Uint8Array([29, 1, 18, 13, 1]));
    expect(decode(t.array(t.bool()), new Uint8Array([29, 1, 18, 13, 1]))).toEqual(bits);
  });

  it('writes bytes raw', () => {
    expect(encode(t.array(t.byte()), Int8Array.of(-1, 2))).toEqual(new Uint8Array([29, 3, 4, 0xff, 2]));
    expect(decode(t.array(t.byte()), new Uint8Array([29, 3, 4, 0xff, 2]))).toEqual(Int8Array.of(-1, 2));
  });

  it('writes chars as code units', () => {
    expect(encode(t.array(t.char()), ['h', 'i'])).toEqual(new Uint8Array([29, 7, 4, 0, 104, 0, 105]));
  });

  it('uses varints for small int32 values', () => {
    const values = new Int32Array(100);
    for (let i = 0; i < values.length; i++) values[i] = i % 64;
    const bytes = encode(t.array(t.int32()), values);
    expect(Array.from(bytes.subarray(0, 4))).toEqual([29, 11, 0xc8, 0x01]);
    expect(bytes.length).toBe(104);
    expect(codecFor(t.array(t.int32())).size(values)).toBe(104);
    expect(decode(t.array(t.int32()), bytes)).toEqual(values);
  });

  it('uses fixed width for full-range int32 values', () => {
    const values = new Int32Array(100);
    for (let i = 0; i < values.length; i++) values[i] = i % 2 === 0 ? MaxInt32 : MinInt32;
    const bytes = encode(t.array(t.int32()), values);
    expect(bytes[1]).toBe(9);
    expect(bytes.length).toBe(404);
    expect(decode(t.array(t.int32()), bytes)).toEqual(values);
  });

  it('demands a wider margin from longer arrays', () => {
    expect(encode(t.array(t.int32()), new Int32Array(2).fill(1000))).toEqual(
      new Uint8Array([29, 11, 4, 0xd0, 0x0f, 0xd0, 0x0f])
    );
    const long = encode(t.array(t.int32()), new Int32Array(40).fill(1000));
    expect(long[1]).toBe(9);
    expect(long.length).toBe(163);
  });

  it('writes empty integer arrays as varints', () => {
    expect(encode(t.array(t.int32()), new Int32Array(0))).toEqual(new Uint8Array([29, 11, 0]));
  });

  it('chooses int64 width the same way', () => {
    expect(encode(t.array(t.int64()), BigInt64Array.of(1n, 2n))).toEqual(new Uint8Array([29, 15, 4, 2, 4]));
  });

  it('round-trips float arrays', () => {
    const desc = t.array(t.float64());
    expect(decode(desc, encode(desc, Float64Array.of(1.5, -2.25)))).toEqual(Float64Array.of(1.5, -2.25));
  });

  it('marks each element of object arrays', () => {
    expect(encode(t.array(t.string()), ['x'])).toEqual(new Uint8Array([29, 21, 2, 21, 2, 120]));
  });

  it('rejects plain arrays where a typed array is expected', () => {
    expect(() => encode(t.array(t.int32()), [1, 2])).toThrow('Expected an Int32Array but got array(2)');
  });

  it('rejects an element marker the type does not accept', () => {
    expect(() => decode(t.array(t.int32()), new Uint8Array([29, 21, 0]))).toThrow(InvalidMarkerError);
  });

  it('rejects lengths the buffer cannot hold', () => {
    expect(() => decode(t.array(t.int32()), new Uint8Array([29, 11, 0xd0, 0x0f]))).toThrow(BufferUnderflowError);
  });
});

describe('prefersVarint', () => {
  it('compares the truncated average against the width', () => {
    expect(prefersVarint(0, () => 5, 4)).toBe(true);
    expect(prefersVarint(10, () => 2, 4)).toBe(true);
    expect(prefersVarint(10, () => 3, 4)).toBe(false);
    expect(prefersVarint(33, () => 2, 4)).toBe(false);
    expect(prefersVarint(33, () => 1, 4)).toBe(true);
  });

  it('samples only the leading elements', () => {
    expect(prefersVarint(1000, (i) => (i < 32 ? 1 : 5), 4)).toBe(true);
  });
});

describe('skipValue', () => {
  it('lands on the next value for every shape', () => {
    const writer = new Writer();
    const ends: number[] = [];
    const append = (desc: Desc, value: unknown): void => {
      codecFor(desc).encode(writer, value);
      ends.push(writer.position);
    };

    append(t.list(t.map(t.string(), t.list(t.int32()))), [new Map([['k', [1, 1048576]]])]);
    append(t.array(t.bool()), [true, false, true]);
    append(t.optional(t.string()), 'present');
    append(t.optional(t.string()), undefined);
    append(t.uuid(), '123e4567-e89b-12d3-a456-426614174000');
    append(t.float32(), 2.5);
    append(t.int64(), MinInt64);
    append(t.array(t.int32()), new Int32Array(40).fill(1000));
    append(t.array(t.int64()), BigInt64Array.of(1n));
    append(t.array(t.string()), ['a', 'b']);

    writer.writeMarker(Marker.Record);
    writer.writeVarInt(1);
    internOrReference(writer, 'a.B');
    writer.writeVarInt(1);
    codecFor(t.int32()).encode(writer, 5);
    ends.push(writer.position);

    writer.writeMarker(Marker.SameType);
    writer.writeVarInt(0);
    ends.push(writer.position);

    writer.writeMarker(Marker.Enum);
    writer.writeVarInt(1);
    writer.writeInt64(0n);
    writer.writeVarInt(2);
    ends.push(writer.position);

    const reader = new Reader(writer.bytes());
    for (const end of ends) {
      skipValue(reader);
      expect(reader.position).toBe(end);
    }
    expect(reader.hasMore).toBe(false);
  });

  it('refuses to skip a bare interned name', () => {
    const writer = new Writer();
    internOrReference(writer, 'a.B');
    expect(() => skipValue(new Reader(writer.bytes()))).toThrow(InvalidMarkerError);
  });

  it('refuses array elements that are not values', () => {
    expect(() => skipValue(new Reader(new Uint8Array([29, 0, 2])))).toThrow(DecodeError);
  });

  it('enforces the depth limit', () => {
    const desc = t.list(t.list(t.list(t.list(t.int32()))));
    const bytes = encode(desc, [[[[1]]]]);
    const reader = new Reader(bytes);
    expect(() => skipValue(reader, 3)).toThrow(DepthExceededError);
    const fresh = new Reader(bytes);
    skipValue(fresh, 4);
    expect(fresh.hasMore).toBe(false);
  });
});
