import { UncloneableValueError } from '../errors/errors.js';
import type { Cloneable, Disposable } from '../types/types.js';

export function isCloneable<T>(value: unknown): value is Cloneable<T> {
  return (
    typeof value === 'object' &&
    value !== null &&
    typeof (value as Cloneable<T>).clone === 'function'
  );
}

export function isDisposable(value: unknown): value is Disposable {
  return (
    typeof value === 'object' &&
    value !== null &&
    (typeof (value as Disposable).dispose === 'function' ||
      typeof (value as Disposable).close === 'function')
  );
}

/**
 * Default duplication for internCloned(). Primitives are returned as is,
 * Cloneable objects clone themselves and arrays are copied shallowly, so
 * their elements keep their prototypes.
 *
 * @throws {UncloneableValueError} for any other object
 */
export function cloneValue<T>(value: T): T {
  if (typeof value !== 'object' || value === null) return value;
  if (isCloneable<T>(value)) return value.clone();
  // Same elements in a fresh array; the result keeps the type of `value`
  if (Array.isArray(value)) return Object.assign([], value);
  throw new UncloneableValueError(value);
}

/**
 * Default finalizer: releases resources of values that expose dispose() or close().
 */
export function disposeValue(value: unknown): void {
  if (!isDisposable(value)) return;
  const disposeFn = value.dispose ?? value.close;
  disposeFn?.call(value);
}
