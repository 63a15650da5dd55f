import { ensure, isPositiveInteger } from '../errors';

export interface SumTreeLeaf {
  /** Slot index (leaf position, 0-based). */
  index: number;
  value: number;
}

/**
 * Complete binary tree where each internal node holds the sum of its children.
 *
 * Leaves are stored after the `leafCount - 1` internal nodes, so leaf `i` lives
 * at `leafCount - 1 + i` and node `n` has children `2n + 1` and `2n + 2`.
 *
 * ```
 *           [10]
 *         /      \
 *       [6]      [4]
 *      /   \    /   \
 *    [3]  [3] [2]  [2]
 * ```
 */
export class SumTree {
  private readonly tree: Float64Array;
  private readonly leafOffset: number;
  private maxValue = 0;

  readonly leafCount: number;

  constructor(capacity: number) {
    ensure(isPositiveInteger(capacity), `SumTree capacity must be a positive integer, got ${capacity}`);
    this.leafCount = nextPowerOfTwo(capacity);
    this.leafOffset = this.leafCount - 1;
    this.tree = new Float64Array(2 * this.leafCount - 1);
  }

  /** O(log n). Setting a leaf to its current value changes nothing. */
  update(index: number, value: number): void {
    ensure(
      Number.isInteger(index) && index >= 0 && index < this.leafCount,
      `SumTree index ${index} out of range [0, ${this.leafCount})`,
    );
    ensure(Number.isFinite(value) && value >= 0, `SumTree values must be finite and non-negative, got ${value}`);

    let ix = this.leafOffset + index;
    const change = value - this.tree[ix];
    this.tree[ix] = value;
    while (ix > 0) {
      ix = (ix - 1) >> 1;
      this.tree[ix] += change;
    }

    if (value > this.maxValue) this.maxValue = value;
  }

  /**
   * Weighted descent: for `target` drawn uniformly from [0, sum()), the chance
   * of landing on a leaf is proportional to its value.
   */
  find(target: number): SumTreeLeaf {
    let ix = 0;
    let remaining = target;
    while (ix < this.leafOffset) {
      const left = 2 * ix + 1;
      if (remaining <= this.tree[left]) {
        ix = left;
      } else {
        remaining -= this.tree[left];
        ix = left + 1;
      }
    }
    return { index: ix - this.leafOffset, value: this.tree[ix] };
  }

  get(index: number): number {
    ensure(
      Number.isInteger(index) && index >= 0 && index < this.leafCount,
      `SumTree index ${index} out of range [0, ${this.leafCount})`,
    );
    return this.tree[this.leafOffset + index];
  }

  sum(): number {
    return this.tree[0];
  }

  /** Largest value ever written to a leaf; never decreases. */
  max(): number {
    return this.maxValue;
  }
}

export function nextPowerOfTwo(n: number): number {
  let p = 1;
  while (p < n) p *= 2;
  return p;
}
