/*
 * Interner
 * --------
 * Generic deduplicating table behind reference-counted refs. The ownership
 * model (single-domain or atomic) is chosen by the RefFactory; everything else
 * lives here once.
 *
 * Entry lifecycle
 *  - miss: the value becomes canonical, the table keeps one ref, the caller
 *    gets a clone (count 2)
 *  - hit: the caller gets another clone of the canonical ref; an owned input
 *    that is a different object is disposed
 *  - compact(): entries whose only holder is the table are released and
 *    removed, then the bucket map is rebuilt
 *
 * Lookups (tryIntern, has) never allocate a canonical value. internCloned()
 * duplicates its input only on a miss.
 *
 * The table has no internal locking. Refs taken out of an AtomicInterner may
 * be cloned and released from anywhere; intern()/compact() on a shared table
 * must be serialized by the caller.
 */
import { AggregateDisposalError, InternerDisposedError } from '../errors/errors.js';
import type { Equivalence, Finalizer, InternerConfig } from '../types/types.js';
import type { Box } from './box.js';
import { defaultEquivalence } from './equivalence.js';
import { InternTable } from './intern-table.js';
import type { CloneableRef, Ref, RefFactory } from './ref.js';
import { cloneValue, disposeValue } from './traits.js';

const DEFAULT_NAME = 'interner';
const DEFAULT_COLLISION_WARNING_THRESHOLD = 8;

/**
 * Lookup-only view of an interner.
 */
export interface ReadonlyInterner<T, R> {
  readonly name: string;
  readonly size: number;
  tryIntern(value: T): R | undefined;
  has(value: T): boolean;
  values(): IterableIterator<T>;
}

function* valuesOf<T>(refs: Iterable<Ref<T>>): IterableIterator<T> {
  for (const ref of refs) yield ref.value;
}

export class Interner<T, R extends CloneableRef<T, R>> implements ReadonlyInterner<T, R> {
  readonly name: string;

  protected readonly table: InternTable<T, R>;
  protected readonly equivalence: Equivalence<T>;

  private readonly cloneFn: (value: T) => T;
  private readonly disposeFn: Finalizer<T>;
  private disposed = false;

  constructor(
    private readonly createRef: RefFactory<T, R>,
    config: InternerConfig<T> = {}
  ) {
    this.name = config.name ?? DEFAULT_NAME;
    this.equivalence = config.equivalence ?? defaultEquivalence;
    this.cloneFn = config.clone ?? cloneValue;
    this.disposeFn = config.dispose ?? disposeValue;
    this.table = new InternTable<T, R>({
      name: this.name,
      collisionWarningThreshold:
        config.collisionWarningThreshold ?? DEFAULT_COLLISION_WARNING_THRESHOLD,
      warn: config.onWarning ?? ((message) => console.warn(message)),
    });
  }

  /** Number of canonical entries currently in the table. */
  get size(): number {
    return this.table.size;
  }

  get bucketCount(): number {
    return this.table.bucketCount;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  /**
   * Look up `value` without inserting it.
   *
   * @returns a clone of the canonical ref, or undefined when no equal value is interned
   * @throws {InternerDisposedError} if the interner has been disposed
   */
  tryIntern(value: T): R | undefined {
    this.assertActive();
    return this.lookup(this.equivalence.hash(value), value)?.clone();
  }

  /**
   * Whether an equal value is interned. Does not touch reference counts.
   */
  has(value: T): boolean {
    this.assertActive();
    return this.lookup(this.equivalence.hash(value), value) !== undefined;
  }

  /**
   * Intern an owned value.
   *
   * On a hit the input is discarded (disposed unless it is the canonical
   * object itself) and a clone of the canonical ref is returned. On a miss the
   * input becomes canonical.
   */
  intern(value: T): R {
    this.assertActive();
    const hash = this.equivalence.hash(value);
    const existing = this.lookup(hash, value);
    if (existing) {
      this.discard(value, existing.value);
      return existing.clone();
    }
    return this.register(hash, value);
  }

  /**
   * Intern a borrowed value. The caller keeps `value`; a duplicate is made
   * only when no equal value is interned yet.
   */
  internCloned(value: T): R {
    this.assertActive();
    const hash = this.equivalence.hash(value);
    const existing = this.lookup(hash, value);
    if (existing) return existing.clone();
    return this.register(hash, this.cloneFn(value));
  }

  /**
   * Intern the value held by an exclusive-ownership Box, consuming the box.
   *
   * @throws {ConsumedBoxError} if the box is already empty
   */
  internBox(box: Box<T>): R {
    this.assertActive();
    return this.intern(box.take());
  }

  /**
   * Remove every entry whose only holder is the table, finalizing its value,
   * then shrink the table.
   *
   * @returns the number of entries removed
   * @throws {AggregateDisposalError} if finalizers threw; all entries are still removed
   */
  compact(): number {
    this.assertActive();
    const removed = this.table.retain((ref) => ref.strongCount > 1);
    if (removed.length > 0) this.table.shrinkToFit();
    this.releaseAll(removed);
    return removed.length;
  }

  /**
   * Release the table's ref on every entry and empty the table. Values still
   * held elsewhere stay alive; the rest are finalized.
   */
  clear(): void {
    this.assertActive();
    this.releaseAll(this.table.drain());
  }

  /**
   * Clear the table and refuse further use. Refs handed out earlier remain valid.
   *
   * Safe to call multiple times - subsequent calls are no-ops.
   */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.releaseAll(this.table.drain());
  }

  /**
   * Iterate canonical values without cloning refs.
   *
   * @throws {InternerDisposedError} if the interner has been disposed
   */
  values(): IterableIterator<T> {
    this.assertActive();
    return valuesOf(this.table.refs());
  }

  protected lookup(hash: number, value: T): R | undefined {
    return this.table.find(hash, (candidate) => this.equivalence.equals(candidate, value));
  }

  /**
   * Make `value` canonical: the table keeps the first ref, the caller gets a clone.
   */
  protected register(hash: number, value: T): R {
    const ref = this.createRef(value, this.disposeFn);
    this.table.insert(hash, ref);
    return ref.clone();
  }

  protected discard(value: T, canonical: T): void {
    if (value !== canonical) this.disposeFn(value);
  }

  protected assertActive(): void {
    if (this.disposed) throw new InternerDisposedError(this.name);
  }

  private releaseAll(refs: R[]): void {
    const errors: Error[] = [];
    for (const ref of refs) {
      try {
        ref.release();
      } catch (error) {
        errors.push(error instanceof Error ? error : new Error(String(error)));
      }
    }
    if (errors.length > 0) throw new AggregateDisposalError(errors);
  }
}
