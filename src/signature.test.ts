import { createHash } from 'node:crypto';
import { describe, it, expect } from 'vitest';
import { t } from './descriptors';
import { enumSignature, recordSignature, simpleName } from './signature';

describe('enumSignature', () => {
  it('is stable for the same constants', () => {
    const first = t.enumeration('geo.Color', ['RED', 'GREEN']);
    const second = t.enumeration('geo.Color', ['RED', 'GREEN']);
    expect(enumSignature(first)).toBe(enumSignature(second));
  });

  it('ignores the namespace', () => {
    const here = t.enumeration('geo.Color', ['RED', 'GREEN']);
    const there = t.enumeration('paint.Color', ['RED', 'GREEN']);
    expect(enumSignature(here)).toBe(enumSignature(there));
  });

  it('changes with the constants and their order', () => {
    const base = enumSignature(t.enumeration('geo.Color', ['RED', 'GREEN']));
    expect(enumSignature(t.enumeration('geo.Color', ['GREEN', 'RED']))).not.toBe(base);
    expect(enumSignature(t.enumeration('geo.Color', ['RED', 'GREEN', 'BLUE']))).not.toBe(base);
    expect(enumSignature(t.enumeration('geo.Colour', ['RED', 'GREEN']))).not.toBe(base);
  });
});

describe('recordSignature', () => {
  const point = (name: string) => t.record(name, { x: t.int32(), y: t.int32() });

  it('hashes the simple name then each field type and name', () => {
    const expected = createHash('sha256').update('Point!INT32!x!INT32!y').digest().readBigInt64BE(0);
    expect(recordSignature(point('geo.Point'))).toBe(expected);
  });

  it('is stable for the same shape and ignores the namespace', () => {
    expect(recordSignature(point('geo.Point'))).toBe(recordSignature(point('geo.Point')));
    expect(recordSignature(point('plot.Point'))).toBe(recordSignature(point('geo.Point')));
  });

  it('changes with a field type, name or position', () => {
    const base = recordSignature(point('geo.Point'));
    expect(recordSignature(t.record('geo.Point', { x: t.int64(), y: t.int32() }))).not.toBe(base);
    expect(recordSignature(t.record('geo.Point', { x: t.int32(), z: t.int32() }))).not.toBe(base);
    expect(recordSignature(t.record('geo.Point', { y: t.int32(), x: t.int32() }))).not.toBe(base);
    expect(recordSignature(t.record('geo.Point', { x: t.int32(), y: t.list(t.int32()) }))).not.toBe(base);
  });
});

describe('simpleName', () => {
  it('drops the namespace', () => {
    expect(simpleName('geo.shapes.Circle')).toBe('Circle');
    expect(simpleName('Circle')).toBe('Circle');
  });
});
