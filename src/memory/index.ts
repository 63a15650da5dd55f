import { parseMemoryConfig, type MemoryConfigInput } from '../config';
import { RNG } from '../sim/rng';
import { PrioritizedReplayMemory } from './prioritized_memory';
import { ReplayMemory } from './replay_memory';

export { createExp, zipExperiences, type Exp, type ExpBatch } from './exp';
export { ReplayMemory } from './replay_memory';
export {
  MIN_PRIORITY,
  PrioritizedReplayMemory,
  importanceWeights,
  type PrioritizedMemoryOptions,
  type PrioritizedSample,
} from './prioritized_memory';

export type Memory<S, A> =
  | { kind: 'uniform'; memory: ReplayMemory<S, A> }
  | { kind: 'prioritized'; memory: PrioritizedReplayMemory<S, A> };

/** Build the memory variant selected by `config.prioritized`. */
export function createMemory<S, A>(config: MemoryConfigInput = {}, rng?: RNG): Memory<S, A> {
  const cfg = parseMemoryConfig(config);
  if (cfg.prioritized) {
    return {
      kind: 'prioritized',
      memory: new PrioritizedReplayMemory<S, A>(
        {
          capacity: cfg.capacity,
          batchSize: cfg.batchSize,
          alpha: cfg.alpha,
          beta0: cfg.beta0,
          numEpisodes: cfg.numEpisodes,
        },
        rng,
      ),
    };
  }
  return { kind: 'uniform', memory: new ReplayMemory<S, A>(cfg.capacity, cfg.batchSize, rng) };
}
