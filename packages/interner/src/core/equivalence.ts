/*
 * Equivalences
 * ------------
 * The interner delegates hashing and equality entirely to an Equivalence; it
 * adds no ordering or tie-break of its own.
 *
 *  - defaultEquivalence: primitives by SameValueZero, Hashable objects by their
 *    own hashCode()/equals(). Anything else has no value identity to intern by
 *    and is rejected.
 *  - sequenceEquivalence: element-wise over arrays, with range variants so a
 *    borrowed sub-array can be looked up in place.
 *  - textEquivalence: strings, with range variants over a borrowed string.
 */
import { UnhashableValueError } from '../errors/errors.js';
import type { Equivalence, Hashable, RangeEquivalence } from '../types/types.js';
import { SEQUENCE_SEED, combineHash, finishHash, hashPrimitive, hashString } from './hash.js';

/**
 * Runtime type guard for objects implementing hashCode()/equals().
 */
export function isHashable(value: unknown): value is Hashable {
  return (
    typeof value === 'object' &&
    value !== null &&
    typeof (value as Hashable).hashCode === 'function' &&
    typeof (value as Hashable).equals === 'function'
  );
}

/** `===`, except NaN equals NaN. */
export function sameValueZero(a: unknown, b: unknown): boolean {
  return a === b || (a !== a && b !== b);
}

export const defaultEquivalence: Equivalence<unknown> = {
  hash(value: unknown): number {
    const primitive = hashPrimitive(value);
    if (primitive !== undefined) return primitive;
    if (isHashable(value)) return value.hashCode() >>> 0;
    throw new UnhashableValueError(value);
  },

  equals(a: unknown, b: unknown): boolean {
    if (a === b) return true;
    if (isHashable(a)) return a.equals(b);
    return sameValueZero(a, b);
  },
};

/**
 * Element-wise equivalence for arrays.
 *
 * @param element - Equivalence for the elements (default: defaultEquivalence)
 */
export function sequenceEquivalence<E>(
  element: Equivalence<E> = defaultEquivalence
): RangeEquivalence<readonly E[]> {
  const hashRange = (view: readonly E[], start: number, end: number): number => {
    let h = SEQUENCE_SEED;
    for (let i = start; i < end; i++) h = combineHash(h, element.hash(view[i]));
    return finishHash(h, end - start);
  };

  const equalsRange = (
    candidate: readonly E[],
    view: readonly E[],
    start: number,
    end: number
  ): boolean => {
    if (candidate.length !== end - start) return false;
    for (let i = 0; i < candidate.length; i++) {
      if (!element.equals(candidate[i], view[start + i])) return false;
    }
    return true;
  };

  return {
    hash: (value) => hashRange(value, 0, value.length),
    equals: (a, b) => a === b || equalsRange(a, b, 0, b.length),
    hashRange,
    equalsRange,
  };
}

export const textEquivalence: RangeEquivalence<string> = {
  hash: (value) => hashString(value),
  equals: (a, b) => a === b,
  hashRange: (view, start, end) => hashString(view, start, end),
  equalsRange: (candidate, view, start, end) =>
    candidate.length === end - start && view.startsWith(candidate, start),
};
