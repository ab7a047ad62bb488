import { describe, expect, it, vi } from 'vitest';

import { AtomicRef } from '../src/core/atomic-ref.js';
import { LocalRef } from '../src/core/local-ref.js';
import { Ref, type RefKind } from '../src/core/ref.js';
import { ReleasedRefError } from '../src/errors/errors.js';
import type { Finalizer } from '../src/types/types.js';

interface RefVariant {
  name: string;
  kind: RefKind;
  create<T>(value: T, finalizer?: Finalizer<T>): LocalRef<T> | AtomicRef<T>;
}

const variants: RefVariant[] = [
  { name: 'LocalRef', kind: 'local', create: (value, finalizer) => LocalRef.create(value, finalizer) },
  {
    name: 'AtomicRef',
    kind: 'atomic',
    create: (value, finalizer) => AtomicRef.create(value, finalizer),
  },
];

describe.each(variants)('$name', ({ kind, create }) => {
  it('starts with a single holder', () => {
    const ref = create('alpha');

    expect(ref.kind).toBe(kind);
    expect(ref.value).toBe('alpha');
    expect(ref.strongCount).toBe(1);
    expect(ref.released).toBe(false);
  });

  it('clones onto the same allocation', () => {
    const ref = create({ n: 1 });
    const copy = ref.clone();

    expect(copy.kind).toBe(kind);
    expect(copy.ptrEq(ref)).toBe(true);
    expect(Ref.ptrEq(ref, copy)).toBe(true);
    expect(copy.value).toBe(ref.value);
    expect(ref.strongCount).toBe(2);
    expect(copy.strongCount).toBe(2);
  });

  it('distinguishes pointer identity from value equality', () => {
    const a = create('same');
    const b = create('same');

    expect(a.value).toBe(b.value);
    expect(a.ptrEq(b)).toBe(false);
  });

  it('decrements on release and rejects further use of the released ref', () => {
    const ref = create(7);
    const copy = ref.clone();

    copy.release();

    expect(copy.released).toBe(true);
    expect(ref.strongCount).toBe(1);
    expect(() => copy.value).toThrowError(ReleasedRefError);
    expect(() => copy.clone()).toThrowError(ReleasedRefError);
    expect(() => copy.release()).toThrowError(ReleasedRefError);
    expect(ref.value).toBe(7);
  });

  it('runs the finalizer once, when the last holder releases', () => {
    const finalizer = vi.fn();
    const ref = create('payload', finalizer);
    const copy = ref.clone();

    ref.release();
    expect(finalizer).not.toHaveBeenCalled();

    copy.release();
    expect(finalizer).toHaveBeenCalledTimes(1);
    expect(finalizer).toHaveBeenCalledWith('payload');
    expect(copy.strongCount).toBe(0);
  });
});

describe('AtomicRef', () => {
  it('exposes its count through shared memory', () => {
    const ref = AtomicRef.create('shared');
    const copy = ref.clone();
    const view = new Int32Array(ref.countBuffer);

    expect(Atomics.load(view, 0)).toBe(2);
    expect(copy.countBuffer).toBe(ref.countBuffer);

    copy.release();
    expect(Atomics.load(view, 0)).toBe(1);
  });
});
