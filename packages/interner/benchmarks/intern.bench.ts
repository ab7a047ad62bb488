/**
 * Interning Performance Benchmark
 *
 * Measures the hit and miss paths of each entry point against both ownership
 * models.
 *
 * Scenarios:
 * 1. tryIntern hit (lookup only, no allocation)
 * 2. intern / internCloned hit on a warm table
 * 3. internStr over a substring of a larger buffer (borrowed view)
 * 4. internSlice over a sub-range (borrowed view)
 * 5. Churn: intern 1000 short-lived values then compact()
 */

import { Bench } from 'tinybench';
import { AtomicInterner, AtomicTextInterner } from '../src/api/atomic.js';
import { LocalInterner, LocalSliceInterner, LocalTextInterner } from '../src/api/local.js';

// ==================== Test Setup ====================

const WORDS = Array.from({ length: 1000 }, (_, i) => `word-${i % 250}`);
const LINE = WORDS.join(' ');

const localNumbers = new LocalInterner<number>();
const atomicNumbers = new AtomicInterner<number>();
for (let i = 0; i < 1000; i++) {
  localNumbers.intern(i);
  atomicNumbers.intern(i);
}

const localText = new LocalTextInterner();
const atomicText = new AtomicTextInterner();
for (const word of WORDS) {
  localText.internString(word);
  atomicText.internString(word);
}

const slices = new LocalSliceInterner<number>();
const SEQUENCE = Array.from({ length: 64 }, (_, i) => i);
slices.internSlice(SEQUENCE, 8, 40);

// ==================== Benchmark ====================

const bench = new Bench({
  time: 1000,
  iterations: 10,
  warmupIterations: 5,
});

bench.add('local: tryIntern hit', () => {
  const ref = localNumbers.tryIntern(500);
  if (!ref) throw new Error('Invalid');
  ref.release();
});

bench.add('atomic: tryIntern hit', () => {
  const ref = atomicNumbers.tryIntern(500);
  if (!ref) throw new Error('Invalid');
  ref.release();
});

bench.add('local: intern hit', () => {
  localNumbers.intern(42).release();
});

bench.add('atomic: intern hit', () => {
  atomicNumbers.intern(42).release();
});

bench.add('local: internCloned hit (text)', () => {
  localText.internCloned('word-7').release();
});

bench.add('local: internStr substring hit', () => {
  // "word-0" starts the line
  localText.internStr(LINE, 0, 6).release();
});

bench.add('atomic: internStr substring hit', () => {
  atomicText.internStr(LINE, 0, 6).release();
});

bench.add('local: internSlice range hit', () => {
  slices.internSlice(SEQUENCE, 8, 40).release();
});

bench.add('churn: 1000 misses + compact', () => {
  const interner = new LocalInterner<string>();
  for (let i = 0; i < 1000; i++) interner.intern(`tmp-${i}`).release();
  if (interner.compact() !== 1000) throw new Error('Invalid');
});

// ==================== Run Benchmark ====================

await bench.run();

console.log('\n' + '='.repeat(80));
console.log('Interning Performance Results');
console.log('='.repeat(80) + '\n');

console.table(
  bench.tasks.map((task) => ({
    'Test Case': task.name,
    'ops/sec': task.result?.period
      ? `${(1000 / task.result.period).toLocaleString('en-US', { maximumFractionDigits: 0 })}`
      : 'N/A',
    'avg (ms)': task.result?.period ? task.result.period.toFixed(4) : 'N/A',
    hz: task.result?.hz ? task.result.hz.toFixed(2) : 'N/A',
  }))
);
