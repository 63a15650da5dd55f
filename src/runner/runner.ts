import type { Environment } from '../env';
import { createExp, type ExpBatch, type Memory } from '../memory';

/**
 * Whatever turns a sampled batch into a value-function update. Returns one TD
 * error per sample, in batch order; prioritized memory feeds them back as
 * priorities.
 */
export interface Learner<S, A> {
  /** `weights` is null for uniform replay. */
  learn(batch: ExpBatch<S, A>, weights: readonly number[] | null): number[];
}

export type Policy<S, A> = (state: S, actions: readonly A[]) => A;

export interface EpisodeMetrics {
  episode: number;
  totalEpisodes: number;
  steps: number;
  totalReward: number;
  /** Batches learned from during the episode. */
  learnSteps: number;
  /** Mean |TD error| over the episode's batches; 0 if none were sampled. */
  meanAbsTdError: number;
  replaySize: number;
}

export interface RunEpisodesConfig<S, A> {
  env: Environment<S, A>;
  memory: Memory<S, A>;
  policy: Policy<S, A>;
  learner: Learner<S, A>;
  episodes: number;
  /** Step cap per episode. */
  maxSteps?: number;
  /** Learn every N environment steps. */
  learnEvery?: number;
  onEpisodeEnd?: (metrics: EpisodeMetrics) => void;
}

function meanAbs(values: readonly number[]): number {
  return values.reduce((a, b) => a + Math.abs(b), 0) / Math.max(1, values.length);
}

/** One replay update. Returns the batch's TD errors, or null while the memory is still seeding. */
export function learnFromMemory<S, A>(memory: Memory<S, A>, learner: Learner<S, A>, episode: number): number[] | null {
  if (memory.kind === 'uniform') {
    const batch = memory.memory.sampleZipped();
    if (batch === null) return null;
    return learner.learn(batch, null);
  }
  const sampled = memory.memory.sampleZipped(episode);
  if (sampled === null) return null;
  const tdErrors = learner.learn(sampled.experiences, sampled.weights);
  memory.memory.updatePriorities(sampled.indices, tdErrors);
  return tdErrors;
}

/** Sequential step -> push -> sample -> learn -> update loop. */
export function runEpisodes<S, A>(config: RunEpisodesConfig<S, A>): EpisodeMetrics[] {
  const maxSteps = config.maxSteps ?? 200;
  const learnEvery = Math.max(1, config.learnEvery ?? 1);
  const results: EpisodeMetrics[] = [];

  for (let episode = 0; episode < config.episodes; episode++) {
    let state = config.env.reset();
    let totalReward = 0;
    let steps = 0;
    let learnSteps = 0;
    let tdSum = 0;

    while (steps < maxSteps) {
      const action = config.policy(state, config.env.actions());
      const { nextState, reward } = config.env.step(action);
      config.memory.memory.push(createExp(state, action, reward, nextState));
      totalReward += reward;
      steps += 1;

      if (steps % learnEvery === 0) {
        const tdErrors = learnFromMemory(config.memory, config.learner, episode);
        if (tdErrors !== null) {
          learnSteps += 1;
          tdSum += meanAbs(tdErrors);
        }
      }

      if (nextState === null) break;
      state = nextState;
    }

    const metrics: EpisodeMetrics = {
      episode: episode + 1,
      totalEpisodes: config.episodes,
      steps,
      totalReward,
      learnSteps,
      meanAbsTdError: learnSteps > 0 ? tdSum / learnSteps : 0,
      replaySize: config.memory.memory.length,
    };
    results.push(metrics);
    config.onEpisodeEnd?.(metrics);
  }
  return results;
}
