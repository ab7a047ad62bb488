/*
 * Cross-domain interners.
 *
 * Refs count holders atomically in shared memory, so refs taken out of the
 * table can be cloned and released from concurrent contexts. The table itself
 * is not locked: serialize intern()/compact() on a shared instance.
 */
import { AtomicRef } from '../core/atomic-ref.js';
import { Interner } from '../core/interner.js';
import { SliceInterner, type SliceInternerConfig } from '../core/slice-interner.js';
import { TextInterner, type TextInternerConfig } from '../core/text-interner.js';
import type { InternerConfig } from '../types/types.js';

export class AtomicInterner<T> extends Interner<T, AtomicRef<T>> {
  constructor(config?: InternerConfig<T>) {
    super(AtomicRef.create, config);
  }
}

export class AtomicSliceInterner<E> extends SliceInterner<E, AtomicRef<readonly E[]>> {
  constructor(config?: SliceInternerConfig<E>) {
    super(AtomicRef.create, config);
  }
}

export class AtomicTextInterner extends TextInterner<AtomicRef<string>> {
  constructor(config?: TextInternerConfig) {
    super(AtomicRef.create, config);
  }
}
