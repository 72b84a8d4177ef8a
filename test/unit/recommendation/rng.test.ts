import { describe, it, expect } from 'vitest';
import { createRng, pickIndex } from '../../../src/recommendation/rng.js';

describe('createRng', () => {
  it('repeats the same sequence for the same seed', () => {
    const a = createRng(42);
    const b = createRng(42);
    const seqA = Array.from({ length: 5 }, () => a());
    const seqB = Array.from({ length: 5 }, () => b());

    expect(seqA).toEqual(seqB);
    for (const value of seqA) {
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });

  it('differs between seeds', () => {
    expect(createRng(1)()).not.toBe(createRng(2)());
  });
});

describe('pickIndex', () => {
  it('stays inside the range at the edges', () => {
    expect(pickIndex(() => 0, 3)).toBe(0);
    expect(pickIndex(() => 0.999999, 3)).toBe(2);
    expect(pickIndex(() => 1, 3)).toBe(2);
  });
});
