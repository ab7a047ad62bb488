/**
 * Hash functions for interner keys.
 * All results are unsigned 32-bit integers.
 */

const C1 = 0xcc9e2d51;
const C2 = 0x1b873593;

const NULL_HASH = 0x2f6b8a1d;
const UNDEFINED_HASH = 0x5bd1e995;
const TRUE_HASH = 0x27d4eb2d;
const FALSE_HASH = 0x165667b1;
const NAN_HASH = 0x7ff80000;
const SYMBOL_SEED = 0x3c6ef372;
const BIGINT_SEED = 0x6a09e667;

// Scratch views for reading the IEEE-754 bits of a number
const F64 = new Float64Array(1);
const U32 = new Uint32Array(F64.buffer);

// Splitmix32 finalizer
export function mix32(z: number): number {
  z = (z + 0x9e3779b9) | 0;
  z ^= z >>> 16;
  z = Math.imul(z, 0x85ebca6b);
  z ^= z >>> 13;
  z = Math.imul(z, 0xc2b2ae35);
  z ^= z >>> 16;
  return z >>> 0;
}

function fmix(h: number): number {
  h ^= h >>> 16;
  h = Math.imul(h, 0x85ebca6b);
  h ^= h >>> 13;
  h = Math.imul(h, 0xc2b2ae35);
  h ^= h >>> 16;
  return h >>> 0;
}

function mixBlock(h: number, k: number): number {
  k = Math.imul(k, C1);
  k = (k << 15) | (k >>> 17);
  k = Math.imul(k, C2);
  h ^= k;
  h = (h << 13) | (h >>> 19);
  return (Math.imul(h, 5) + 0xe6546b64) | 0;
}

/**
 * Murmur3 over the UTF-16 code units of `text[start, end)`, two units per block.
 * Hashing a range gives the same result as hashing the equivalent substring.
 */
export function hashString(text: string, start = 0, end = text.length, seed = 0): number {
  const length = end - start;
  let h = seed ^ length;
  let i = start;

  while (i + 2 <= end) {
    h = mixBlock(h, text.charCodeAt(i) | (text.charCodeAt(i + 1) << 16));
    i += 2;
  }

  if (i < end) {
    let k = Math.imul(text.charCodeAt(i), C1);
    k = (k << 15) | (k >>> 17);
    h ^= Math.imul(k, C2);
  }

  return fmix(h ^ length);
}

/**
 * Hash of a number consistent with SameValueZero: -0 and 0 agree, every NaN agrees.
 */
export function hashNumber(n: number): number {
  if (n !== n) return NAN_HASH;
  F64[0] = n === 0 ? 0 : n;
  return mix32(U32[0] ^ Math.imul(U32[1], 0x9e3779b1));
}

export function hashBigInt(n: bigint): number {
  return hashString(n.toString(16), 0, undefined, BIGINT_SEED);
}

// Symbols have no stable identity to hash; equal symbols always share a description.
export function hashSymbol(s: symbol): number {
  const description = s.description ?? '';
  return hashString(description, 0, description.length, SYMBOL_SEED);
}

/**
 * Hash a primitive. Returns undefined for objects and functions.
 */
export function hashPrimitive(value: unknown): number | undefined {
  switch (typeof value) {
    case 'string':
      return hashString(value);
    case 'number':
      return hashNumber(value);
    case 'boolean':
      return value ? TRUE_HASH : FALSE_HASH;
    case 'bigint':
      return hashBigInt(value);
    case 'symbol':
      return hashSymbol(value);
    case 'undefined':
      return UNDEFINED_HASH;
    case 'object':
      return value === null ? NULL_HASH : undefined;
    default:
      return undefined;
  }
}

/**
 * Incremental hash for ordered sequences.
 *
 * @example
 * ```typescript
 * let h = SEQUENCE_SEED;
 * for (const x of xs) h = combineHash(h, hashNumber(x));
 * const digest = finishHash(h, xs.length);
 * ```
 */
export const SEQUENCE_SEED = 0x9747b28c;

export function combineHash(h: number, elementHash: number): number {
  return mixBlock(h, elementHash | 0);
}

export function finishHash(h: number, length: number): number {
  return fmix(h ^ length);
}
