import { Worker } from 'node:worker_threads';
import { describe, expect, it } from 'vitest';

import { AtomicInterner } from '../src/api/atomic.js';

const ROUNDS = 200_000;

// Signals `ready`, then takes and drops a reference `rounds` times.
const HOLDER_SOURCE = `
const { parentPort, workerData } = require('node:worker_threads');
const count = new Int32Array(workerData.countBuffer);
const ready = new Int32Array(workerData.readyBuffer);
Atomics.store(ready, 0, 1);
Atomics.notify(ready, 0);
for (let i = 0; i < workerData.rounds; i++) {
  Atomics.add(count, 0, 1);
  Atomics.sub(count, 0, 1);
}
parentPort.postMessage(Atomics.load(count, 0));
`;

function runHolder(countBuffer: SharedArrayBuffer, readyBuffer: SharedArrayBuffer): Worker {
  return new Worker(HOLDER_SOURCE, {
    eval: true,
    workerData: { countBuffer, readyBuffer, rounds: ROUNDS },
  });
}

function finished(worker: Worker): Promise<number> {
  return new Promise((resolve, reject) => {
    worker.once('error', reject);
    worker.once('exit', (code) => {
      if (code !== 0) reject(new Error(`Worker exited with code ${code}`));
    });
    worker.once('message', (value: number) => resolve(value));
  });
}

describe('AtomicInterner across threads', () => {
  it('keeps the count exact while another thread clones and releases concurrently', async () => {
    const interner = new AtomicInterner<string>();
    const ref = interner.intern('shared');
    const readyBuffer = new SharedArrayBuffer(Int32Array.BYTES_PER_ELEMENT);

    const worker = runHolder(ref.countBuffer, readyBuffer);
    const done = finished(worker);

    Atomics.wait(new Int32Array(readyBuffer), 0, 0, 5_000);
    for (let i = 0; i < ROUNDS; i++) ref.clone().release();

    await done;

    expect(ref.strongCount).toBe(2);
    expect(interner.compact()).toBe(0);

    ref.release();
    expect(interner.compact()).toBe(1);
    expect(interner.size).toBe(0);
  });
});
