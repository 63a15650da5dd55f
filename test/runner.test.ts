import { describe, expect, test } from 'vitest';
import { QTable } from '../src/ai/q_table';
import { replayRng, trainPolicy } from '../src/ai/rl';
import type { Environment, StepResult } from '../src/env';
import { createMemory, type ExpBatch } from '../src/memory';
import { learnFromMemory, runEpisodes, type Learner } from '../src/runner/runner';
import { CHAIN_ACTIONS, ChainWalk } from '../src/sim/chain_walk';
import { RNG } from '../src/sim/rng';

/** Counts up by the action value; ends after `length` steps. */
class CounterEnv implements Environment<number, number> {
  private state = 0;
  private steps = 0;

  constructor(private readonly length: number) {}

  reset(): number {
    this.state = 0;
    this.steps = 0;
    return this.state;
  }

  actions(): readonly number[] {
    return [1, 2];
  }

  step(action: number): StepResult<number> {
    this.state += action;
    this.steps += 1;
    return { nextState: this.steps >= this.length ? null : this.state, reward: 1 };
  }
}

class RecordingLearner implements Learner<number, number> {
  readonly batches: ExpBatch<number, number>[] = [];
  readonly weights: (readonly number[] | null)[] = [];

  constructor(private readonly tdError: number) {}

  learn(batch: ExpBatch<number, number>, weights: readonly number[] | null): number[] {
    this.batches.push(batch);
    this.weights.push(weights);
    return batch.states.map(() => this.tdError);
  }
}

// ─── Replay loop ────────────────────────────────────────────────────

describe('runEpisodes', () => {
  test('learns once the memory holds a full batch', () => {
    const learner = new RecordingLearner(0.5);
    const [metrics] = runEpisodes({
      env: new CounterEnv(5),
      memory: createMemory<number, number>({ capacity: 16, batchSize: 4 }, new RNG(1)),
      policy: () => 1,
      learner,
      episodes: 1,
    });
    expect(metrics).toEqual({
      episode: 1,
      totalEpisodes: 1,
      steps: 5,
      totalReward: 5,
      learnSteps: 2,
      meanAbsTdError: 0.5,
      replaySize: 5,
    });
    expect(learner.weights).toEqual([null, null]);
  });

  test('feeds TD errors back into prioritized memory', () => {
    const memory = createMemory<number, number>(
      { capacity: 16, batchSize: 2, prioritized: true, alpha: 1, numEpisodes: 4 },
      new RNG(2),
    );
    const learner = new RecordingLearner(-3);
    runEpisodes({ env: new CounterEnv(4), memory, policy: () => 2, learner, episodes: 2 });

    expect(learner.batches).toHaveLength(7);
    for (const w of learner.weights) expect(w).toHaveLength(2);
    if (memory.kind !== 'prioritized') throw new Error('expected prioritized memory');
    expect(memory.memory.maxPriority()).toBe(3);
    expect(memory.memory.length).toBe(8);
  });

  test('stops at the step cap and reports every episode', () => {
    const seen: number[] = [];
    const results = runEpisodes({
      env: new CounterEnv(100),
      memory: createMemory<number, number>({ capacity: 64, batchSize: 8 }, new RNG(3)),
      policy: (_state, actions) => actions[0],
      learner: new RecordingLearner(0),
      episodes: 3,
      maxSteps: 10,
      learnEvery: 5,
      onEpisodeEnd: (m) => seen.push(m.episode),
    });
    expect(results.map((m) => m.steps)).toEqual([10, 10, 10]);
    expect(results.map((m) => m.learnSteps)).toEqual([1, 2, 2]);
    expect(seen).toEqual([1, 2, 3]);
  });

  test('learnFromMemory returns null while seeding', () => {
    const memory = createMemory<number, number>({ capacity: 8, batchSize: 4, prioritized: true });
    expect(learnFromMemory(memory, new RecordingLearner(1), 0)).toBeNull();
  });
});

// ─── Tabular learner ────────────────────────────────────────────────

describe('QTable', () => {
  test('applies importance-weighted TD updates', () => {
    const q = new QTable(4, CHAIN_ACTIONS, { learningRate: 0.5, discount: 0.9, epsilon: 0 });
    const errors = q.learn({ states: [1], actions: ['right'], rewards: [1], nextStates: [null] }, [0.5]);
    expect(errors).toEqual([1]);
    expect(q.value(1, 'right')).toBe(0.25);
    expect(q.greedy(1)).toBe('right');

    const next = q.learn({ states: [2], actions: ['left'], rewards: [0], nextStates: [1] }, null);
    expect(next[0]).toBeCloseTo(0.225, 12);
    expect(q.value(2, 'left')).toBeCloseTo(0.1125, 12);
  });

  test('rejects unknown states', () => {
    const q = new QTable(3, CHAIN_ACTIONS);
    expect(() => q.value(3, 'left')).toThrow(RangeError);
  });
});

describe('ChainWalk', () => {
  test('walking right from the middle pays +1', () => {
    const env = new ChainWalk(7);
    expect(env.reset()).toBe(3);
    expect(env.step('right')).toEqual({ nextState: 4, reward: 0 });
    expect(env.step('right')).toEqual({ nextState: 5, reward: 0 });
    expect(env.step('right')).toEqual({ nextState: null, reward: 1 });
  });

  test('walking left pays -1', () => {
    const env = new ChainWalk(5);
    env.reset();
    env.step('left');
    expect(env.step('left')).toEqual({ nextState: null, reward: -1 });
  });
});

// ─── End to end ─────────────────────────────────────────────────────

describe('trainPolicy', () => {
  test('replayed experience beats a random policy', () => {
    const summary = trainPolicy(1337, 150);
    expect(summary.learningCurve).toHaveLength(150);
    expect(summary.memory.kind).toBe('uniform');
    expect(summary.trainedMean).toBeGreaterThan(summary.baselineMean);
  });

  test('replay sampling uses a stream apart from the policy', () => {
    const policyStream = new RNG(1337);
    const replayStream = replayRng(1337);
    const policyDraws = Array.from({ length: 8 }, () => policyStream.nextU32());
    const replayDraws = Array.from({ length: 8 }, () => replayStream.nextU32());
    expect(replayDraws).not.toEqual(policyDraws);
    expect(replayRng(1337).nextU32()).toBe(replayDraws[0]);
  });

  test('runs with prioritized replay', () => {
    const summary = trainPolicy(7, 40, { memory: { prioritized: true } });
    expect(summary.episodes).toHaveLength(40);
    expect(summary.memory.kind).toBe('prioritized');
    expect(summary.episodes.at(-1)?.learnSteps).toBeGreaterThan(0);
  });
});
