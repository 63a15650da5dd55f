import type { ExpBatch } from '../memory';
import type { Learner } from '../runner/runner';
import { RNG } from '../sim/rng';

export interface QTableOptions {
  learningRate?: number;
  discount?: number;
  /** Fixed exploration rate for `act`. */
  epsilon?: number;
}

/**
 * Tabular action-value learner over integer states. Updates are scaled by the
 * importance-sampling weight when one is supplied.
 */
export class QTable<A> implements Learner<number, A> {
  private readonly values: Float64Array;
  private readonly actionIndex = new Map<A, number>();
  private readonly learningRate: number;
  private readonly discount: number;
  private readonly epsilon: number;

  constructor(
    private readonly numStates: number,
    private readonly actionSet: readonly A[],
    options: QTableOptions = {},
    private readonly rng: RNG = new RNG(Date.now()),
  ) {
    this.values = new Float64Array(numStates * actionSet.length);
    actionSet.forEach((a, i) => this.actionIndex.set(a, i));
    this.learningRate = options.learningRate ?? 0.1;
    this.discount = options.discount ?? 0.95;
    this.epsilon = options.epsilon ?? 0.1;
  }

  value(state: number, action: A): number {
    return this.values[this.offset(state, action)];
  }

  maxValue(state: number): number {
    let best = -Infinity;
    for (let i = 0; i < this.actionSet.length; i++) {
      best = Math.max(best, this.values[state * this.actionSet.length + i]);
    }
    return best;
  }

  /** Highest-valued action; ties go to the earliest in `actions`. */
  greedy(state: number, actions: readonly A[] = this.actionSet): A {
    let best = actions[0];
    let bestValue = -Infinity;
    for (const a of actions) {
      const v = this.value(state, a);
      if (v > bestValue) {
        bestValue = v;
        best = a;
      }
    }
    return best;
  }

  act(state: number, actions: readonly A[] = this.actionSet): A {
    if (this.rng.float() < this.epsilon) return actions[this.rng.int(0, actions.length)];
    return this.greedy(state, actions);
  }

  learn(batch: ExpBatch<number, A>, weights: readonly number[] | null): number[] {
    const tdErrors: number[] = [];
    for (let i = 0; i < batch.states.length; i++) {
      const ix = this.offset(batch.states[i], batch.actions[i]);
      const next = batch.nextStates[i];
      const target = batch.rewards[i] + (next === null ? 0 : this.discount * this.maxValue(next));
      const td = target - this.values[ix];
      this.values[ix] += this.learningRate * (weights?.[i] ?? 1) * td;
      tdErrors.push(td);
    }
    return tdErrors;
  }

  private offset(state: number, action: A): number {
    const a = this.actionIndex.get(action);
    if (a === undefined || !Number.isInteger(state) || state < 0 || state >= this.numStates) {
      throw new RangeError(`No Q-value for state ${state}, action ${String(action)}`);
    }
    return state * this.actionSet.length + a;
  }
}
