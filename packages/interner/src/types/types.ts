/**
 * Hash and equality for a key type.
 *
 * `hash` must agree with `equals`: values that compare equal must hash equal.
 * Hashes are treated as unsigned 32-bit integers.
 */
export interface Equivalence<T> {
  hash(value: T): number;
  equals(a: T, b: T): boolean;
}

/**
 * Equivalence that can also hash and compare a sub-range of a borrowed view
 * without materializing it.
 *
 * `hashRange(v, 0, v.length)` must equal `hash(v)`.
 */
export interface RangeEquivalence<V, T extends V = V> extends Equivalence<T> {
  hashRange(view: V, start: number, end: number): number;
  /** True when `candidate` equals `view[start, end)`. */
  equalsRange(candidate: T, view: V, start: number, end: number): boolean;
}

/**
 * Objects that define their own value identity, in the manner of
 * `hashCode()` / `equals()` pairs.
 */
export interface Hashable {
  hashCode(): number;
  equals(other: unknown): boolean;
}

export interface Cloneable<T> {
  clone(): T;
}

/**
 * Values that own releasable resources. Either method is enough.
 */
export interface Disposable {
  dispose?: () => void;
  close?: () => void;
}

/** Invoked once with a value when nothing refers to it anymore. */
export type Finalizer<T> = (value: T) => void;

export type WarningSink = (message: string) => void;

/**
 * Interner configuration.
 */
export interface InternerConfig<T> {
  /** Optional name for diagnostics and error messages. */
  name?: string;
  /** Defaults to `defaultEquivalence` (primitives and Hashable objects). */
  equivalence?: Equivalence<T>;
  /**
   * Duplicates a borrowed value on the `internCloned()` miss path.
   * Defaults to `cloneValue`.
   */
  clone?: (value: T) => T;
  /**
   * Releases a value's resources. Runs for values discarded on an intern hit
   * and for canonical values once their last ref is released.
   * Defaults to calling `dispose()` or `close()` when present.
   */
  dispose?: Finalizer<T>;
  /** Collision chain length that triggers a dev warning. Default 8. */
  collisionWarningThreshold?: number;
  /** Replaces console.warn for dev warnings. */
  onWarning?: WarningSink;
}
