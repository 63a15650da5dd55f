import { RingBuffer } from '../ds/ring_buffer';
import { ensure, isPositiveInteger } from '../errors';
import { RNG } from '../sim/rng';
import { zipExperiences, type Exp, type ExpBatch } from './exp';

/**
 * Fixed-size experience store with uniform sampling. Once full, the oldest
 * transitions are overwritten.
 */
export class ReplayMemory<S, A> {
  private readonly memory: RingBuffer<Exp<S, A>>;
  private readonly rng: RNG;
  readonly batchSize: number;

  constructor(capacity: number, batchSize: number, rng: RNG = new RNG(Date.now())) {
    this.memory = new RingBuffer<Exp<S, A>>(capacity);
    ensure(isPositiveInteger(batchSize), `batchSize must be a positive integer, got ${batchSize}`);
    ensure(batchSize <= capacity, `batchSize (${batchSize}) must not exceed capacity (${capacity})`);
    this.batchSize = batchSize;
    this.rng = rng;
  }

  /** Start from a full memory holding `records`; capacity is `records.length`. */
  static from<S, A>(records: readonly Exp<S, A>[], batchSize: number, rng?: RNG): ReplayMemory<S, A> {
    ensure(records.length > 0, 'ReplayMemory.from needs at least one record');
    const memory = new ReplayMemory<S, A>(records.length, batchSize, rng);
    for (const exp of records) memory.push(exp);
    return memory;
  }

  get length(): number {
    return this.memory.length;
  }

  get capacity(): number {
    return this.memory.capacity;
  }

  /** Returns the slot the experience was written to. */
  push(exp: Exp<S, A>): number {
    return this.memory.push(exp);
  }

  /**
   * `batchSize` distinct experiences drawn uniformly without replacement, or
   * `null` while fewer than `batchSize` are stored.
   */
  sample(): readonly Exp<S, A>[] | null {
    if (this.batchSize > this.memory.length) return null;
    return this.rng
      .sampleDistinct(this.memory.length, this.batchSize)
      .map((ix) => this.memory.at(ix));
  }

  sampleZipped(): ExpBatch<S, A> | null {
    const experiences = this.sample();
    if (experiences === null) return null;
    return zipExperiences(experiences, this.batchSize);
  }
}
