import type { Finalizer } from '../types/types.js';
import { AtomicCounter } from './counter.js';
import { Ref, Slot } from './ref.js';

/**
 * Ref for the cross-domain model.
 *
 * The strong count lives in shared memory and is updated atomically, so
 * holders in different execution contexts can clone and release without
 * external locking. `countBuffer` exposes that memory for agents that track
 * the count from another thread.
 */
export class AtomicRef<T> extends Ref<T> {
  static create<T>(value: T, finalizer?: Finalizer<T>): AtomicRef<T> {
    const counter = new AtomicCounter();
    return new AtomicRef(new Slot(value, counter, finalizer), counter);
  }

  readonly kind = 'atomic' as const;

  private constructor(
    slot: Slot<T>,
    private readonly counter: AtomicCounter
  ) {
    super(slot);
  }

  get countBuffer(): SharedArrayBuffer {
    return this.counter.buffer;
  }

  clone(): AtomicRef<T> {
    return new AtomicRef(this.retainSlot(), this.counter);
  }
}
