/*
 * Single-domain interners.
 *
 * Refs count holders with a plain field. Use these when every holder lives in
 * one execution context, or when access is externally synchronized.
 */
import { Interner } from '../core/interner.js';
import { LocalRef } from '../core/local-ref.js';
import { SliceInterner, type SliceInternerConfig } from '../core/slice-interner.js';
import { TextInterner, type TextInternerConfig } from '../core/text-interner.js';
import type { InternerConfig } from '../types/types.js';

/**
 * @example
 * ```typescript
 * const interner = new LocalInterner<number>();
 * const a = interner.intern(42);
 * const b = interner.intern(42);
 * a.ptrEq(b); // true
 * ```
 */
export class LocalInterner<T> extends Interner<T, LocalRef<T>> {
  constructor(config?: InternerConfig<T>) {
    super(LocalRef.create, config);
  }
}

export class LocalSliceInterner<E> extends SliceInterner<E, LocalRef<readonly E[]>> {
  constructor(config?: SliceInternerConfig<E>) {
    super(LocalRef.create, config);
  }
}

export class LocalTextInterner extends TextInterner<LocalRef<string>> {
  constructor(config?: TextInternerConfig) {
    super(LocalRef.create, config);
  }
}
