export { AtomicInterner, AtomicSliceInterner, AtomicTextInterner } from './api/atomic.js';
export { LocalInterner, LocalSliceInterner, LocalTextInterner } from './api/local.js';

export { Interner } from './core/interner.js';
export type { ReadonlyInterner } from './core/interner.js';
export { SliceInterner } from './core/slice-interner.js';
export type { SliceInternerConfig } from './core/slice-interner.js';
export { TextInterner } from './core/text-interner.js';
export type { TextInternerConfig } from './core/text-interner.js';

export { Ref } from './core/ref.js';
export type { CloneableRef, RefFactory, RefKind } from './core/ref.js';
export { LocalRef } from './core/local-ref.js';
export { AtomicRef } from './core/atomic-ref.js';
export { AtomicCounter, LocalCounter } from './core/counter.js';
export type { RefCounter } from './core/counter.js';
export { Box } from './core/box.js';

export {
  defaultEquivalence,
  isHashable,
  sameValueZero,
  sequenceEquivalence,
  textEquivalence,
} from './core/equivalence.js';
export { combineHash, finishHash, hashNumber, hashString, SEQUENCE_SEED } from './core/hash.js';
export { cloneValue, disposeValue } from './core/traits.js';

export type {
  Cloneable,
  Disposable,
  Equivalence,
  Finalizer,
  Hashable,
  InternerConfig,
  RangeEquivalence,
  WarningSink,
} from './types/types.js';

// Errors
export {
  AggregateDisposalError,
  ConsumedBoxError,
  InternerDisposedError,
  InvalidRangeError,
  ReleasedRefError,
  UncloneableValueError,
  UnhashableValueError,
} from './errors/errors.js';
