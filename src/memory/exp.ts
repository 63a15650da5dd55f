import { ensure } from '../errors';

/** One transition. `nextState === null` marks the end of an episode. */
export interface Exp<S, A> {
  readonly state: S;
  readonly action: A;
  readonly reward: number;
  readonly nextState: S | null;
}

/** Column-wise batch: element `i` of every array comes from the same transition. */
export interface ExpBatch<S, A> {
  states: S[];
  actions: A[];
  rewards: number[];
  nextStates: (S | null)[];
}

export function createExp<S, A>(state: S, action: A, reward: number, nextState: S | null): Exp<S, A> {
  return Object.freeze({ state, action, reward, nextState });
}

/**
 * Transpose exactly `batchSize` records into per-field arrays, keeping the
 * order the records arrive in.
 */
export function zipExperiences<S, A>(records: Iterable<Exp<S, A>>, batchSize: number): ExpBatch<S, A> {
  const batch: ExpBatch<S, A> = { states: [], actions: [], rewards: [], nextStates: [] };
  for (const exp of records) {
    batch.states.push(exp.state);
    batch.actions.push(exp.action);
    batch.rewards.push(exp.reward);
    batch.nextStates.push(exp.nextState);
  }
  ensure(
    batch.states.length === batchSize,
    `zipExperiences expected ${batchSize} records, got ${batch.states.length}`,
  );
  return batch;
}
