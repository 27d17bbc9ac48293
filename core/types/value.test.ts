import { describe, it, expect } from 'vitest';
import { NULL, display, fromJSON, list, lookupPath, map, num, str, toJSON } from './value';

describe('Value', () => {
  it('converts decoded JSON, turning non-finite numbers into null', () => {
    expect(fromJSON({ a: [1, 'x', true, null], b: Number.NaN })).toEqual(
      map([
        ['a', list([num(1), str('x'), { kind: 'bool', value: true }, NULL])],
        ['b', NULL]
      ])
    );
  });

  it('keeps a "__proto__" key as data on the way back out', () => {
    const value = fromJSON(JSON.parse('{"__proto__":{"x":1},"y":2}'));
    const json = toJSON(value);
    expect(Object.keys(json ?? {})).toEqual(['__proto__', 'y']);
    expect(JSON.stringify(json)).toBe('{"__proto__":{"x":1},"y":2}');
  });

  it('displays scalars plainly and containers as compact JSON', () => {
    expect(display(NULL)).toBe('');
    expect(display(str('a b'))).toBe('a b');
    expect(display(num(1.5))).toBe('1.5');
    expect(display(fromJSON(false))).toBe('false');
    expect(display(fromJSON({ k: [1, { z: null }] }))).toBe('{"k":[1,{"z":null}]}');
  });

  it('reports where a path lookup stopped', () => {
    const value = fromJSON({ body: { data: { keys: ['a'] }, text: 'x' } });
    expect(lookupPath(value, ['body', 'data', 'keys'])).toEqual({ value: list([str('a')]) });
    expect(lookupPath(value, ['body', 'missing', 'keys'])).toEqual({ value: NULL, missingAt: 1 });
    expect(lookupPath(value, ['body', 'text', 'length'])).toEqual({ value: NULL, missingAt: 2 });
    expect(lookupPath(value, [])).toEqual({ value });
  });
});
