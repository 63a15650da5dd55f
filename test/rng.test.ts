import { describe, expect, test } from 'vitest';
import { RNG } from '../src/sim/rng';

describe('RNG', () => {
  test('same seed, same sequence', () => {
    const a = new RNG(2027);
    const b = new RNG(2027);
    for (let i = 0; i < 20; i++) expect(a.nextU32()).toBe(b.nextU32());
  });

  test('float stays in [0, 1)', () => {
    const rng = new RNG(9);
    for (let i = 0; i < 1000; i++) {
      const f = rng.float();
      expect(f).toBeGreaterThanOrEqual(0);
      expect(f).toBeLessThan(1);
    }
  });

  test('sampleDistinct draws unique indices in range', () => {
    const rng = new RNG(4);
    for (let round = 0; round < 20; round++) {
      const picks = rng.sampleDistinct(12, 7);
      expect(picks).toHaveLength(7);
      expect(new Set(picks).size).toBe(7);
      for (const p of picks) {
        expect(p).toBeGreaterThanOrEqual(0);
        expect(p).toBeLessThan(12);
      }
    }
    expect(rng.sampleDistinct(5, 5).sort()).toEqual([0, 1, 2, 3, 4]);
  });

  test('clone continues the same stream', () => {
    const rng = new RNG(77);
    rng.nextU32();
    const copy = rng.clone();
    expect(copy.float()).toBe(rng.float());
  });

  test('seed 0 is remapped', () => {
    expect(new RNG(0).nextU32()).not.toBe(0);
  });
});
