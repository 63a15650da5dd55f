/** Seeded xorshift32 generator so replay sampling can be reproduced from a seed. */
export class RNG {
  private state: number;

  constructor(seed: number) {
    this.state = seed >>> 0;
    if (this.state === 0) this.state = 0x6d2b79f5;
  }

  nextU32(): number {
    let x = this.state;
    x ^= x << 13;
    x ^= x >>> 17;
    x ^= x << 5;
    this.state = x >>> 0;
    return this.state;
  }

  /** Uniform float in [0, 1). */
  float(): number {
    return this.nextU32() / 0x100000000;
  }

  /** Uniform float in [min, max). */
  range(min: number, max: number): number {
    return min + (max - min) * this.float();
  }

  int(min: number, maxExclusive: number): number {
    return Math.floor(this.range(min, maxExclusive));
  }

  /**
   * Draw `k` distinct integers from [0, n) with a partial Fisher-Yates shuffle.
   * Order is the draw order, not sorted. Only swapped positions are stored,
   * so the cost is O(k) whatever `n` is.
   */
  sampleDistinct(n: number, k: number): number[] {
    const swapped = new Map<number, number>();
    const out: number[] = [];
    for (let i = 0; i < Math.min(k, n); i++) {
      const j = this.int(i, n);
      const picked = swapped.get(j) ?? j;
      swapped.set(j, swapped.get(i) ?? i);
      out.push(picked);
    }
    return out;
  }

  clone(): RNG {
    const rng = new RNG(1);
    rng.state = this.state;
    return rng;
  }
}
