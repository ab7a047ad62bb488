import type { Finalizer } from '../types/types.js';
import { LocalCounter } from './counter.js';
import { Ref, Slot } from './ref.js';

/**
 * Ref for the single-domain model. Its count is a plain field, so clone()
 * and release() must not race across threads of control.
 */
export class LocalRef<T> extends Ref<T> {
  static create<T>(value: T, finalizer?: Finalizer<T>): LocalRef<T> {
    return new LocalRef(new Slot(value, new LocalCounter(), finalizer));
  }

  readonly kind = 'local' as const;

  private constructor(slot: Slot<T>) {
    super(slot);
  }

  clone(): LocalRef<T> {
    return new LocalRef(this.retainSlot());
  }
}
