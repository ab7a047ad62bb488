import { describe, expect, it } from 'vitest';

import { hashNumber, hashPrimitive, hashString, mix32 } from '../src/core/hash.js';

const isUint32 = (n: number): boolean => Number.isInteger(n) && n >= 0 && n <= 0xffffffff;

describe('hashString', () => {
  it('hashes a range like the equivalent substring', () => {
    const text = 'say hello world';

    expect(hashString(text, 4, 9)).toBe(hashString('hello'));
    expect(hashString(text, 10)).toBe(hashString('world'));
    expect(hashString(text, 3, 3)).toBe(hashString(''));
  });

  it('covers the full UTF-16 code unit range', () => {
    const smile = '\u{1F600}';

    expect(hashString(`a${smile}b`, 1, 3)).toBe(hashString(smile));
    expect(isUint32(hashString('\u00e9t\u00e9'))).toBe(true);
  });

  it('is deterministic', () => {
    expect(hashString('interned')).toBe(hashString('interned'));
  });
});

describe('hashNumber', () => {
  it('agrees with SameValueZero', () => {
    expect(hashNumber(0)).toBe(hashNumber(-0));
    expect(hashNumber(NaN)).toBe(hashNumber(Number('not a number')));
  });

  it('separates distinct integers', () => {
    expect(hashNumber(1)).not.toBe(hashNumber(2));
    expect(hashNumber(42)).not.toBe(hashNumber(1337));
  });

  it('returns unsigned 32-bit integers', () => {
    for (const n of [0, 1, -1, 0.5, 1e300, -Infinity, 2 ** 53]) {
      expect(isUint32(hashNumber(n))).toBe(true);
    }
  });
});

describe('mix32', () => {
  it('returns unsigned 32-bit integers', () => {
    expect(isUint32(mix32(0))).toBe(true);
    expect(isUint32(mix32(-1))).toBe(true);
  });
});

describe('hashPrimitive', () => {
  it('hashes every primitive kind', () => {
    const values: unknown[] = ['s', 1, true, false, 10n, Symbol('tag'), undefined, null];
    for (const value of values) {
      const hash = hashPrimitive(value);
      expect(hash === undefined ? false : isUint32(hash)).toBe(true);
    }
  });

  it('separates booleans, null and undefined', () => {
    const hashes = new Set([
      hashPrimitive(true),
      hashPrimitive(false),
      hashPrimitive(null),
      hashPrimitive(undefined),
    ]);
    expect(hashes.size).toBe(4);
  });

  it('hashes symbols by description', () => {
    expect(hashPrimitive(Symbol('x'))).toBe(hashPrimitive(Symbol('x')));
  });

  it('declines objects and functions', () => {
    expect(hashPrimitive({})).toBeUndefined();
    expect(hashPrimitive([])).toBeUndefined();
    expect(hashPrimitive(() => 1)).toBeUndefined();
  });
});
