import { Linear } from '../decay';
import { RingBuffer } from '../ds/ring_buffer';
import { SumTree } from '../ds/sum_tree';
import { ensure, isPositiveInteger } from '../errors';
import { RNG } from '../sim/rng';
import { zipExperiences, type Exp, type ExpBatch } from './exp';

/** Priority given to new slots before any TD error has been seen, and the lowest any slot can hold. */
export const MIN_PRIORITY = 1e-5;

export interface PrioritizedMemoryOptions {
  capacity: number;
  batchSize: number;
  /** Prioritization exponent: 0 gives uniform sampling, 1 full prioritization. */
  alpha: number;
  /** Importance-sampling exponent at episode 0; annealed linearly to 1. */
  beta0: number;
  /** Episode at which beta reaches 1. */
  numEpisodes: number;
}

export interface PrioritizedSample<T> {
  experiences: T;
  /** Importance-sampling weights, normalized so the largest is 1. */
  weights: number[];
  /** Slot indices to hand back to `updatePriorities`. */
  indices: number[];
}

/**
 * w_i = (n * p_i)^-beta, divided by the largest w_i.
 */
export function importanceWeights(probs: readonly number[], n: number, beta: number): number[] {
  ensure(probs.length > 0, 'importanceWeights needs at least one probability');
  const raw = probs.map((p) => Math.pow(n * p, -beta));
  const wMax = raw.reduce((a, b) => Math.max(a, b), -Infinity);
  return raw.map((w) => w / wMax);
}

/**
 * Proportional prioritized experience replay (Schaul et al., 2015).
 *
 * Slot `i` of the ring buffer and leaf `i` of the sum tree always describe the
 * same transition. New transitions enter with the highest priority seen so far
 * so each one is likely to be replayed at least once before its TD error is
 * known. Sampling is with replacement and biased toward high priorities; the
 * returned weights correct that bias.
 */
export class PrioritizedReplayMemory<S, A> {
  private readonly memory: RingBuffer<Exp<S, A>>;
  private readonly priorities: SumTree;
  private readonly betaSchedule: Linear;
  private readonly rng: RNG;
  readonly batchSize: number;
  readonly alpha: number;

  constructor(options: PrioritizedMemoryOptions, rng: RNG = new RNG(Date.now())) {
    const { capacity, batchSize, alpha, beta0, numEpisodes } = options;
    ensure(isPositiveInteger(batchSize), `batchSize must be a positive integer, got ${batchSize}`);
    ensure(batchSize <= capacity, `batchSize (${batchSize}) must not exceed capacity (${capacity})`);
    ensure(Number.isFinite(alpha) && alpha >= 0, `alpha must be a non-negative number, got ${alpha}`);
    ensure(isPositiveInteger(numEpisodes), `numEpisodes must be a positive integer, got ${numEpisodes}`);

    this.memory = new RingBuffer<Exp<S, A>>(capacity);
    this.priorities = new SumTree(capacity);
    this.betaSchedule = new Linear({ from: beta0, to: 1, over: numEpisodes, clamp: false });
    this.batchSize = batchSize;
    this.alpha = alpha;
    this.rng = rng;
  }

  get length(): number {
    return this.memory.length;
  }

  get capacity(): number {
    return this.memory.capacity;
  }

  push(exp: Exp<S, A>): number {
    const ix = this.memory.push(exp);
    this.priorities.update(ix, Math.max(this.priorities.max(), MIN_PRIORITY));
    return ix;
  }

  /** Importance-sampling exponent for `episode`; exceeds 1 past the horizon. */
  beta(episode: number): number {
    return this.betaSchedule.evaluate(episode);
  }

  /**
   * Draw `batchSize` transitions with probability proportional to priority.
   * Returns `null` while fewer than `batchSize` transitions are stored.
   */
  sample(episode: number): PrioritizedSample<Exp<S, A>[]> | null {
    if (this.batchSize > this.memory.length) return null;

    const total = this.priorities.sum();
    const last = this.memory.length - 1;
    const experiences: Exp<S, A>[] = [];
    const probs: number[] = [];
    const indices: number[] = [];

    for (let i = 0; i < this.batchSize; i++) {
      const found = this.priorities.find(this.rng.range(0, total));
      // Rounding can walk into leaves past the written region before the buffer fills.
      const ix = Math.min(found.index, last);
      experiences.push(this.memory.at(ix));
      probs.push(this.priorities.get(ix) / total);
      indices.push(ix);
    }

    const weights = importanceWeights(probs, this.memory.length, this.beta(episode));
    return { experiences, weights, indices };
  }

  sampleZipped(episode: number): PrioritizedSample<ExpBatch<S, A>> | null {
    const sampled = this.sample(episode);
    if (sampled === null) return null;
    return {
      experiences: zipExperiences(sampled.experiences, this.batchSize),
      weights: sampled.weights,
      indices: sampled.indices,
    };
  }

  /** Set each sampled slot's priority to |tdError|^alpha, floored at `MIN_PRIORITY`. */
  updatePriorities(indices: readonly number[], tdErrors: readonly number[]): void {
    ensure(
      indices.length === tdErrors.length,
      `indices (${indices.length}) and tdErrors (${tdErrors.length}) must have the same length`,
    );
    for (let i = 0; i < indices.length; i++) {
      const ix = indices[i];
      ensure(ix < this.memory.length, `slot ${ix} has not been written yet`);
      this.priorities.update(ix, Math.max(Math.pow(Math.abs(tdErrors[i]), this.alpha), MIN_PRIORITY));
    }
  }

  totalPriority(): number {
    return this.priorities.sum();
  }

  maxPriority(): number {
    return this.priorities.max();
  }

  priorityAt(index: number): number {
    return this.priorities.get(index);
  }
}
