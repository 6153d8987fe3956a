import { describe, it, expect } from 'vitest';
import { MessageIterator, StreamReader, StreamWriter } from './stream';
import { Registry } from './registry';
import { t } from './descriptors';
import { DecodeError, EndOfStreamError, MessageSizeExceededError, StreamClosedError } from './errors';

const quiet = { warn: () => undefined, debug: () => undefined };
const Point = t.record('geo.Point', { x: t.int32(), y: t.int32() });

describe('StreamWriter', () => {
  it('frames each value with its length', () => {
    const registry = new Registry(Point, { logger: quiet });
    const stream = new StreamWriter(registry);
    stream.write({ kind: 'geo.Point', x: 1, y: 2 });
    stream.write({ kind: 'geo.Point', x: 3, y: 4 });

    const data = stream.bytes();
    expect(stream.count).toBe(2);
    expect(data.length).toBe(38);
    expect(data[0]).toBe(36);
    expect(data[19]).toBe(36);
  });

  it('interns names per frame', () => {
    const registry = new Registry(Point, { logger: quiet });
    const stream = new StreamWriter(registry);
    stream.write({ kind: 'geo.Point', x: 1, y: 2 });
    stream.write({ kind: 'geo.Point', x: 1, y: 2 });
    const data = stream.bytes();
    expect(data.subarray(1, 19)).toEqual(data.subarray(20, 38));
  });

  it('writes raw frames', () => {
    const stream = new StreamWriter(new Registry(Point, { logger: quiet }));
    stream.writeMessage(new Uint8Array([1, 2, 3]));
    stream.writeMessage(new Uint8Array(0));
    expect(stream.bytes()).toEqual(new Uint8Array([6, 1, 2, 3, 0]));
    expect(stream.position).toBe(5);
  });

  it('writes long lengths as multi-byte varints', () => {
    const stream = new StreamWriter(new Registry(Point, { logger: quiet }));
    stream.writeMessage(new Uint8Array(300));
    expect(Array.from(stream.bytes().subarray(0, 2))).toEqual([0xd8, 0x04]);
    expect(stream.bytes().length).toBe(302);
  });

  it('refuses writes after close until reset', () => {
    const stream = new StreamWriter(new Registry(Point, { logger: quiet }));
    stream.close();
    expect(stream.isClosed).toBe(true);
    expect(() => stream.write({ kind: 'geo.Point', x: 1, y: 2 })).toThrow(StreamClosedError);
    expect(() => stream.writeMessage(new Uint8Array(1))).toThrow(StreamClosedError);
    stream.reset();
    stream.writeMessage(new Uint8Array([9]));
    expect(stream.bytes()).toEqual(new Uint8Array([2, 9]));
    expect(stream.count).toBe(1);
  });
});

describe('StreamReader', () => {
  it('reads frames in order', () => {
    const reader = new StreamReader(new Uint8Array([6, 1, 2, 3, 0, 2, 9]));
    expect(reader.readMessage()).toEqual(new Uint8Array([1, 2, 3]));
    expect(reader.readMessage()).toEqual(new Uint8Array(0));
    expect(reader.tryReadMessage()).toEqual(new Uint8Array([9]));
    expect(reader.tryReadMessage()).toBeNull();
    expect(() => reader.readMessage()).toThrow('No more messages');
  });

  it('iterates frames', () => {
    const reader = new StreamReader(new Uint8Array([2, 7, 2, 8]));
    expect([...reader.messages()]).toEqual([new Uint8Array([7]), new Uint8Array([8])]);
  });

  it('iterates frames asynchronously', async () => {
    const reader = new StreamReader(new Uint8Array([2, 7, 2, 8]));
    const frames: Uint8Array[] = [];
    for await (const frame of reader) {
      frames.push(frame);
    }
    expect(frames).toEqual([new Uint8Array([7]), new Uint8Array([8])]);
  });

  it('skips frames', () => {
    const reader = new StreamReader(new Uint8Array([6, 1, 2, 3, 2, 9]));
    expect(reader.skipMessage()).toBe(4);
    expect(reader.readMessage()).toEqual(new Uint8Array([9]));
    expect(() => reader.skipMessage()).toThrow(EndOfStreamError);
  });

  it('rejects truncated frames', () => {
    expect(() => new StreamReader(new Uint8Array([10, 1, 2])).readMessage()).toThrow(
      'Message claims 5 bytes but only 2 available'
    );
    expect(() => new StreamReader(new Uint8Array([0x80])).readMessage()).toThrow(
      'Incomplete frame length at end of stream'
    );
    expect(() => new StreamReader(new Uint8Array([1])).readMessage()).toThrow(EndOfStreamError);
  });

  it('enforces the maximum frame size', () => {
    const reader = new StreamReader(new Uint8Array([6, 1, 2, 3]), { maxMessageSize: 2 });
    expect(() => reader.readMessage()).toThrow(MessageSizeExceededError);
    reader.reset();
    reader.setMaxMessageSize(3);
    expect(reader.readMessage()).toEqual(new Uint8Array([1, 2, 3]));
  });

  it('decodes frames with a registry', () => {
    const registry = new Registry(Point, { logger: quiet });
    const stream = new StreamWriter(registry);
    stream.write({ kind: 'geo.Point', x: 5, y: 6 });
    expect(new StreamReader(stream.bytes()).read(registry)).toEqual({ kind: 'geo.Point', x: 5, y: 6 });
  });
});

describe('MessageIterator', () => {
  it('decodes every frame', () => {
    const registry = new Registry(Point, { logger: quiet });
    const stream = new StreamWriter(registry);
    stream.write({ kind: 'geo.Point', x: 1, y: 2 });
    stream.write({ kind: 'geo.Point', x: 3, y: 4 });

    const iterator = new MessageIterator(stream.bytes(), registry);
    expect(iterator.toArray()).toEqual([
      { kind: 'geo.Point', x: 1, y: 2 },
      { kind: 'geo.Point', x: 3, y: 4 },
    ]);
    expect(iterator.count).toBe(2);
    expect(iterator.error).toBeNull();
    expect(iterator.hasMore).toBe(false);
  });

  it('stops at the first frame that fails to decode', () => {
    const registry = new Registry(Point, { logger: quiet });
    const stream = new StreamWriter(registry);
    stream.write({ kind: 'geo.Point', x: 1, y: 2 });
    stream.writeMessage(new Uint8Array([35, 0]));
    stream.write({ kind: 'geo.Point', x: 3, y: 4 });

    const iterator = new MessageIterator(stream.bytes(), registry);
    expect(iterator.toArray()).toEqual([{ kind: 'geo.Point', x: 1, y: 2 }]);
    expect(iterator.error).toBeInstanceOf(DecodeError);
    expect(iterator.count).toBe(1);
    expect(iterator.next()).toBeNull();
  });

  it('iterates asynchronously and restarts after reset', async () => {
    const registry = new Registry(Point, { logger: quiet });
    const stream = new StreamWriter(registry);
    stream.write({ kind: 'geo.Point', x: 1, y: 2 });

    const iterator = new MessageIterator(stream.bytes(), registry);
    const values: unknown[] = [];
    for await (const value of iterator) {
      values.push(value);
    }
    expect(values).toEqual([{ kind: 'geo.Point', x: 1, y: 2 }]);
    iterator.reset();
    expect(iterator.next()).toEqual({ kind: 'geo.Point', x: 1, y: 2 });
  });
});
