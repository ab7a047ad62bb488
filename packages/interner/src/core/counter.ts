/*
 * Strong reference counters
 * -------------------------
 * The only axis on which the two ownership models differ.
 *
 *  - LocalCounter: plain number field. Updates are only coherent when every
 *    holder lives in one execution context (or callers synchronize).
 *  - AtomicCounter: a single Int32 cell in a SharedArrayBuffer, updated with
 *    Atomics. Agents that receive `buffer` (e.g. worker threads) observe and
 *    update the same count without extra locking.
 *
 * Counters start at 1: a counter exists only because someone holds a ref.
 */

export interface RefCounter {
  /** Current number of strong holders. */
  load(): number;
  /** Adds a holder and returns the updated count. */
  increment(): number;
  /** Removes a holder and returns the updated count. */
  decrement(): number;
}

export class LocalCounter implements RefCounter {
  private count = 1;

  load(): number {
    return this.count;
  }

  increment(): number {
    return ++this.count;
  }

  decrement(): number {
    return --this.count;
  }
}

const COUNT_INDEX = 0;

export class AtomicCounter implements RefCounter {
  /** Shared memory backing the count. */
  readonly buffer: SharedArrayBuffer;
  private readonly cell: Int32Array;

  constructor(buffer?: SharedArrayBuffer) {
    this.buffer = buffer ?? new SharedArrayBuffer(Int32Array.BYTES_PER_ELEMENT);
    this.cell = new Int32Array(this.buffer, 0, 1);
    if (!buffer) Atomics.store(this.cell, COUNT_INDEX, 1);
  }

  load(): number {
    return Atomics.load(this.cell, COUNT_INDEX);
  }

  increment(): number {
    // Atomics.add returns the previous value
    return Atomics.add(this.cell, COUNT_INDEX, 1) + 1;
  }

  decrement(): number {
    return Atomics.sub(this.cell, COUNT_INDEX, 1) - 1;
  }
}
