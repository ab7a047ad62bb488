/*
 * Ref
 * ---
 * Reference-counted, read-only handle to an interned value.
 *
 * Model
 *  - A Slot is the shared allocation: the canonical value, its strong counter
 *    and the finalizer to run when the count drops to zero.
 *  - Every Ref object is exactly one strong holder of a Slot. clone() adds a
 *    holder, release() removes this one. A Ref can be released only once.
 *  - Pointer identity is Slot identity (ptrEq), independent of value equality.
 *
 * There are no weak holders, so `strongCount` is the whole count and is what
 * compaction inspects.
 */
import { ReleasedRefError } from '../errors/errors.js';
import type { Finalizer } from '../types/types.js';
import type { RefCounter } from './counter.js';

export class Slot<T> {
  constructor(
    readonly value: T,
    readonly counter: RefCounter,
    private readonly finalizer?: Finalizer<T>
  ) {}

  retain(): void {
    this.counter.increment();
  }

  release(): void {
    if (this.counter.decrement() !== 0) return;
    this.finalizer?.(this.value);
  }
}

export type RefKind = 'local' | 'atomic';

export abstract class Ref<T> {
  /**
   * Compare two refs for pointer identity.
   */
  static ptrEq<T>(a: Ref<T>, b: Ref<T>): boolean {
    return a.slot === b.slot;
  }

  abstract readonly kind: RefKind;

  private held = true;

  protected constructor(protected readonly slot: Slot<T>) {}

  /**
   * The referenced value.
   *
   * @throws {ReleasedRefError} if this holder already released
   */
  get value(): T {
    this.assertHeld('read');
    return this.slot.value;
  }

  /** Number of live strong holders of the underlying slot. */
  get strongCount(): number {
    return this.slot.counter.load();
  }

  get released(): boolean {
    return !this.held;
  }

  /** True when both refs point at the same allocation. */
  ptrEq(other: Ref<T>): boolean {
    return this.slot === other.slot;
  }

  /**
   * Add a strong holder and return a new ref of the same kind.
   *
   * @throws {ReleasedRefError} if this holder already released
   */
  abstract clone(): Ref<T>;

  /**
   * Drop this holder's reference. The value is finalized when the last
   * holder releases.
   *
   * @throws {ReleasedRefError} if called twice on the same ref
   */
  release(): void {
    this.assertHeld('release');
    this.held = false;
    this.slot.release();
  }

  /** Retains the slot on behalf of a clone. */
  protected retainSlot(): Slot<T> {
    this.assertHeld('clone');
    this.slot.retain();
    return this.slot;
  }

  private assertHeld(operation: string): void {
    if (!this.held) throw new ReleasedRefError(operation);
  }
}

/**
 * A Ref type whose clone() preserves its own type.
 */
export type CloneableRef<T, R> = { clone(): R } & Ref<T>;

/**
 * Builds the first ref (count 1) for a freshly interned value.
 */
export type RefFactory<T, R extends CloneableRef<T, R>> = (value: T, finalizer: Finalizer<T>) => R;
