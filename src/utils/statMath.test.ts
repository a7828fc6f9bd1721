import { canonicalJson, deepFreeze, mean, populationStdDev, sha256 } from './statMath';

describe('statMath', () => {
  test('mean and population standard deviation', () => {
    const values = [2, 4, 4, 4, 5, 5, 7, 9];
    expect(mean(values)).toBe(5);
    expect(populationStdDev(values)).toBe(2);
  });

  test('empty inputs give 0', () => {
    expect(mean([])).toBe(0);
    expect(populationStdDev([])).toBe(0);
  });

  test('canonicalJson sorts keys at every level and drops undefined', () => {
    const a = canonicalJson({ b: 1, a: { d: [2, { z: 1, y: 2 }], c: undefined } });
    expect(a).toBe('{"a":{"d":[2,{"y":2,"z":1}]},"b":1}');
  });

  test('canonicalJson writes non-finite numbers as null', () => {
    expect(canonicalJson({ x: Number.NaN, y: Infinity })).toBe('{"x":null,"y":null}');
  });

  test('equal content hashes the same regardless of key order', () => {
    expect(sha256(canonicalJson({ a: 1, b: 2 }))).toBe(sha256(canonicalJson({ b: 2, a: 1 })));
    expect(sha256('x')).toHaveLength(64);
  });

  test('deepFreeze freezes nested objects and arrays', () => {
    const value = deepFreeze({ list: [{ n: 1 }], nested: { m: 2 } });
    expect(Object.isFrozen(value)).toBe(true);
    expect(Object.isFrozen(value.list)).toBe(true);
    expect(Object.isFrozen(value.list[0])).toBe(true);
    expect(Object.isFrozen(value.nested)).toBe(true);
  });
});
