import { describe, expect, it } from 'vitest';

import { AtomicCounter, LocalCounter } from '../src/core/counter.js';

describe('LocalCounter', () => {
  it('starts with one holder and tracks increments and decrements', () => {
    const counter = new LocalCounter();

    expect(counter.load()).toBe(1);
    expect(counter.increment()).toBe(2);
    expect(counter.increment()).toBe(3);
    expect(counter.decrement()).toBe(2);
    expect(counter.load()).toBe(2);
  });
});

describe('AtomicCounter', () => {
  it('starts with one holder and returns updated counts', () => {
    const counter = new AtomicCounter();

    expect(counter.load()).toBe(1);
    expect(counter.increment()).toBe(2);
    expect(counter.decrement()).toBe(1);
    expect(counter.decrement()).toBe(0);
  });

  it('keeps the count in shared memory', () => {
    const counter = new AtomicCounter();
    const view = new Int32Array(counter.buffer);

    counter.increment();
    expect(Atomics.load(view, 0)).toBe(2);

    // Another agent updating the same memory
    Atomics.add(view, 0, 3);
    expect(counter.load()).toBe(5);
  });

  it('attaches to an existing buffer without resetting it', () => {
    const original = new AtomicCounter();
    original.increment();

    const attached = new AtomicCounter(original.buffer);
    expect(attached.load()).toBe(2);

    attached.increment();
    expect(original.load()).toBe(3);
  });
});
