/*
 * InternTable
 * -----------
 * Hash-bucketed set of canonical refs, shared by every interner variant.
 *
 *  - hash -> bucket of refs whose values share that hash
 *  - lookup takes a precomputed hash and a predicate over candidate values,
 *    so callers can probe with a borrowed view (a sub-array, a substring)
 *    without building an owned key first
 *  - membership is one strong holder per entry; the table never releases
 *    refs itself, callers release what retain()/drain() hand back
 */
import type { WarningSink } from '../types/types.js';
import type { Ref } from './ref.js';

const IS_DEV = typeof process !== 'undefined' && process.env?.NODE_ENV !== 'production';

export interface InternTableOptions {
  /** Owner name used in warnings. */
  name: string;
  /** Collision chain length above which a dev warning is emitted once. */
  collisionWarningThreshold: number;
  warn: WarningSink;
}

export class InternTable<T, R extends Ref<T>> {
  private buckets = new Map<number, R[]>();
  private count = 0;
  private warnedCollisions = false;

  constructor(private readonly options: InternTableOptions) {}

  /** Number of canonical entries. */
  get size(): number {
    return this.count;
  }

  /** Number of distinct hashes in use. */
  get bucketCount(): number {
    return this.buckets.size;
  }

  /**
   * Find the entry whose value has `hash` and satisfies `matches`.
   */
  find(hash: number, matches: (candidate: T) => boolean): R | undefined {
    const bucket = this.buckets.get(hash);
    if (!bucket) return undefined;
    for (const ref of bucket) {
      if (matches(ref.value)) return ref;
    }
    return undefined;
  }

  /**
   * Register a new canonical ref. The caller guarantees no equal entry exists.
   */
  insert(hash: number, ref: R): void {
    const bucket = this.buckets.get(hash);
    if (bucket) {
      bucket.push(ref);
      this.checkCollisions(bucket.length);
    } else {
      this.buckets.set(hash, [ref]);
    }
    this.count++;
  }

  /**
   * Keep entries for which `keep` returns true; remove and return the rest.
   */
  retain(keep: (ref: R) => boolean): R[] {
    const removed: R[] = [];
    for (const [hash, bucket] of this.buckets) {
      const kept: R[] = [];
      for (const ref of bucket) {
        if (keep(ref)) kept.push(ref);
        else removed.push(ref);
      }
      if (kept.length === 0) this.buckets.delete(hash);
      else if (kept.length !== bucket.length) this.buckets.set(hash, kept);
    }
    this.count -= removed.length;
    return removed;
  }

  /**
   * Rebuild the bucket map at its current size so storage held by removed
   * entries goes with the old map.
   */
  shrinkToFit(): void {
    this.buckets = new Map(this.buckets);
  }

  *refs(): IterableIterator<R> {
    for (const bucket of this.buckets.values()) yield* bucket;
  }

  /** Remove and return every entry. */
  drain(): R[] {
    const all = Array.from(this.refs());
    this.buckets = new Map();
    this.count = 0;
    return all;
  }

  private checkCollisions(chainLength: number): void {
    if (!IS_DEV || this.warnedCollisions) return;
    if (chainLength <= this.options.collisionWarningThreshold) return;
    this.warnedCollisions = true;
    this.options.warn(
      `[Interner] Collision chain of ${chainLength} entries in interner '${this.options.name}'; the equivalence hash may be weak.`
    );
  }
}
