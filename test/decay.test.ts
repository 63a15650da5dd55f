import { describe, expect, test } from 'vitest';
import { Linear } from '../src/decay';
import { PreconditionError } from '../src/errors';

describe('Linear', () => {
  test('moves from start to end over the horizon', () => {
    const x = new Linear({ from: 0, to: 1, over: 4 });
    expect(x.evaluate(0)).toBe(0);
    expect(x.evaluate(2)).toBe(0.5);
    expect(x.evaluate(4)).toBe(1);
  });

  test('clamps at the end value by default', () => {
    expect(new Linear({ from: 0, to: 1, over: 4 }).evaluate(10)).toBe(1);
    expect(new Linear({ from: 2, to: 0.5, over: 3 }).evaluate(10)).toBe(0.5);
  });

  test('runs past the end value when unclamped', () => {
    const x = new Linear({ from: 0.5, to: 1, over: 2, clamp: false });
    expect(x.evaluate(4)).toBe(1.5);
  });

  test('rejects a non-positive horizon', () => {
    expect(() => new Linear({ from: 0, to: 1, over: 0 })).toThrow(PreconditionError);
    expect(() => new Linear({ from: Number.NaN, to: 1, over: 1 })).toThrow(PreconditionError);
  });
});
