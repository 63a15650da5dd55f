import type { MemoryConfigInput } from '../config';
import type { Environment } from '../env';
import { createMemory, type Memory } from '../memory';
import { runEpisodes, type EpisodeMetrics, type Policy } from '../runner/runner';
import { CHAIN_ACTIONS, ChainWalk, type ChainAction } from '../sim/chain_walk';
import { RNG } from '../sim/rng';
import { QTable } from './q_table';

export interface TrainingSummary {
  baselineMean: number;
  trainedMean: number;
  /** trainedMean - baselineMean; rewards can be negative, so no ratio. */
  improvement: number;
  learningCurve: number[];
  episodes: EpisodeMetrics[];
  memory: Memory<number, ChainAction>;
}

export interface TrainPolicyOptions {
  memory?: MemoryConfigInput;
  chainLength?: number;
  maxSteps?: number;
  evalEpisodes?: number;
  onEpisodeEnd?: (metrics: EpisodeMetrics) => void;
}

function average(nums: number[]): number {
  return nums.reduce((a, b) => a + b, 0) / Math.max(1, nums.length);
}

/** Run `policy` without learning and return the mean episode reward. */
export function evaluatePolicy<S, A>(
  env: Environment<S, A>,
  policy: Policy<S, A>,
  episodes: number,
  maxSteps: number,
): number {
  const totals: number[] = [];
  for (let ep = 0; ep < episodes; ep++) {
    let state = env.reset();
    let total = 0;
    for (let step = 0; step < maxSteps; step++) {
      const { nextState, reward } = env.step(policy(state, env.actions()));
      total += reward;
      if (nextState === null) break;
      state = nextState;
    }
    totals.push(total);
  }
  return average(totals);
}

/** Replay sampling draws from its own stream so it never mirrors exploration. */
export function replayRng(seed: number): RNG {
  return new RNG(seed ^ 0x9e3779b9);
}

/**
 * Train a tabular learner on `ChainWalk` from replayed experience and compare
 * its greedy policy against a uniformly random one.
 */
export function trainPolicy(seed: number, episodes = 100, options: TrainPolicyOptions = {}): TrainingSummary {
  const rng = new RNG(seed);
  const env = new ChainWalk(options.chainLength ?? 7);
  const maxSteps = options.maxSteps ?? 50;
  const evalEpisodes = options.evalEpisodes ?? 20;
  const memory = createMemory<number, ChainAction>(
    { capacity: 1024, batchSize: 16, numEpisodes: Math.max(1, episodes), ...options.memory },
    replayRng(seed),
  );
  const qTable = new QTable<ChainAction>(env.length, CHAIN_ACTIONS, { epsilon: 0.2 }, rng);

  const randomPolicy: Policy<number, ChainAction> = (_state, actions) => actions[rng.int(0, actions.length)];
  const baselineMean = evaluatePolicy(env, randomPolicy, evalEpisodes, maxSteps);

  const learningCurve: number[] = [];
  const metrics = runEpisodes({
    env,
    memory,
    policy: (state, actions) => qTable.act(state, actions),
    learner: qTable,
    episodes,
    maxSteps,
    onEpisodeEnd: (m) => {
      learningCurve.push(m.totalReward);
      options.onEpisodeEnd?.(m);
    },
  });

  const trainedMean = evaluatePolicy(env, (state, actions) => qTable.greedy(state, actions), evalEpisodes, maxSteps);
  return {
    baselineMean,
    trainedMean,
    improvement: trainedMean - baselineMean,
    learningCurve,
    episodes: metrics,
    memory,
  };
}
