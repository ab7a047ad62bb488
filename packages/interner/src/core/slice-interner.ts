import type { Equivalence, InternerConfig, RangeEquivalence } from '../types/types.js';
import { sequenceEquivalence } from './equivalence.js';
import { Interner } from './interner.js';
import { assertRange } from './range.js';
import type { CloneableRef, RefFactory } from './ref.js';

export interface SliceInternerConfig<E> extends Omit<InternerConfig<readonly E[]>, 'equivalence'> {
  /** Equivalence for the elements. Defaults to `defaultEquivalence`. */
  element?: Equivalence<E>;
}

/**
 * Interner for sequences. Canonical values are frozen arrays, whichever entry
 * point registered them.
 *
 * `internSlice` deduplicates a borrowed range of an array in place and copies
 * it only on a miss; `internArray`, `intern` and `internBox` adopt an owned
 * array without copying.
 *
 * @example
 * ```typescript
 * const interner = new LocalSliceInterner<number>();
 * const a = interner.internSlice([0, 1, 2, 3], 1);
 * const b = interner.internArray([1, 2, 3]);
 * a.ptrEq(b); // true
 * ```
 */
export class SliceInterner<E, R extends CloneableRef<readonly E[], R>> extends Interner<
  readonly E[],
  R
> {
  private readonly sequence: RangeEquivalence<readonly E[]>;

  constructor(createRef: RefFactory<readonly E[], R>, config: SliceInternerConfig<E> = {}) {
    const { element, ...rest } = config;
    const sequence = sequenceEquivalence(element);
    super(createRef, {
      clone: (value) => value.slice(),
      ...rest,
      equivalence: sequence,
    });
    this.sequence = sequence;
  }

  /**
   * Intern `view[start, end)` without taking ownership of `view`.
   *
   * @throws {InvalidRangeError} if the range does not fit `view`
   */
  internSlice(view: readonly E[], start = 0, end = view.length): R {
    this.assertActive();
    assertRange(start, end, view.length);
    const hash = this.sequence.hashRange(view, start, end);
    const existing = this.findRange(hash, view, start, end);
    if (existing) return existing.clone();
    return this.register(hash, view.slice(start, end));
  }

  /**
   * Look up `view[start, end)` without inserting it.
   */
  tryInternSlice(view: readonly E[], start = 0, end = view.length): R | undefined {
    this.assertActive();
    assertRange(start, end, view.length);
    return this.findRange(this.sequence.hashRange(view, start, end), view, start, end)?.clone();
  }

  /**
   * Intern an owned array. On a miss the array itself becomes canonical and is
   * frozen; the caller must not keep mutating it.
   */
  internArray(owned: E[]): R {
    return this.intern(owned);
  }

  protected register(hash: number, value: readonly E[]): R {
    return super.register(hash, Object.freeze(value));
  }

  private findRange(hash: number, view: readonly E[], start: number, end: number): R | undefined {
    return this.table.find(hash, (candidate) =>
      this.sequence.equalsRange(candidate, view, start, end)
    );
  }
}
