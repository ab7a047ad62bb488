import { describe, expect, it } from 'vitest';

import * as api from '../src/index.js';

describe('public api', () => {
  it('exports both ownership models for every value shape', () => {
    expect(new api.LocalInterner<number>()).toBeInstanceOf(api.Interner);
    expect(new api.AtomicInterner<number>()).toBeInstanceOf(api.Interner);
    expect(new api.LocalSliceInterner<number>()).toBeInstanceOf(api.SliceInterner);
    expect(new api.AtomicSliceInterner<number>()).toBeInstanceOf(api.SliceInterner);
    expect(new api.LocalTextInterner()).toBeInstanceOf(api.TextInterner);
    expect(new api.AtomicTextInterner()).toBeInstanceOf(api.TextInterner);
  });

  it('exports refs, helpers and errors', () => {
    expect(api.LocalRef.create(1)).toBeInstanceOf(api.Ref);
    expect(api.AtomicRef.create(1)).toBeInstanceOf(api.Ref);
    expect(typeof api.defaultEquivalence.hash).toBe('function');
    expect(typeof api.hashString).toBe('function');
    expect(new api.ReleasedRefError('read')).toBeInstanceOf(Error);
  });

  it('keeps tables of different ownership models independent', () => {
    const local = new api.LocalTextInterner();
    const atomic = new api.AtomicTextInterner();

    const a = local.internStr('shared');
    const b = atomic.internStr('shared');

    expect(a.kind).toBe('local');
    expect(b.kind).toBe('atomic');
    expect(api.Ref.ptrEq(a, b)).toBe(false);
  });
});
