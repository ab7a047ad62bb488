import type { InternerConfig } from '../types/types.js';
import { textEquivalence } from './equivalence.js';
import { Interner } from './interner.js';
import { assertRange } from './range.js';
import type { CloneableRef, RefFactory } from './ref.js';

/**
 * Copy of `text` backed by its own characters. A plain substring may keep
 * referencing, and so retain, the whole string it was cut from.
 */
const detach = (text: string): string => (' ' + text).slice(1);

export type TextInternerConfig = Omit<InternerConfig<string>, 'equivalence' | 'clone'>;

/**
 * Interner for text.
 *
 * `internStr` deduplicates a range of a borrowed string, hashing and comparing
 * it in place; the substring is materialized only on a miss. `internString`
 * registers an owned string as is.
 */
export class TextInterner<R extends CloneableRef<string, R>> extends Interner<string, R> {
  constructor(createRef: RefFactory<string, R>, config: TextInternerConfig = {}) {
    super(createRef, { ...config, equivalence: textEquivalence });
  }

  /**
   * Intern `view[start, end)`.
   *
   * @throws {InvalidRangeError} if the range does not fit `view`
   */
  internStr(view: string, start = 0, end = view.length): R {
    this.assertActive();
    assertRange(start, end, view.length);
    const hash = textEquivalence.hashRange(view, start, end);
    const existing = this.findRange(hash, view, start, end);
    if (existing) return existing.clone();
    const text = end - start < view.length ? detach(view.slice(start, end)) : view;
    return this.register(hash, text);
  }

  tryInternStr(view: string, start = 0, end = view.length): R | undefined {
    this.assertActive();
    assertRange(start, end, view.length);
    return this.findRange(textEquivalence.hashRange(view, start, end), view, start, end)?.clone();
  }

  internString(owned: string): R {
    return this.intern(owned);
  }

  private findRange(hash: number, view: string, start: number, end: number): R | undefined {
    return this.table.find(hash, (candidate) =>
      textEquivalence.equalsRange(candidate, view, start, end)
    );
  }
}
