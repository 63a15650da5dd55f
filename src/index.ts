// Data structures
export { RingBuffer } from './ds/ring_buffer';
export { SumTree, nextPowerOfTwo, type SumTreeLeaf } from './ds/sum_tree';

// Replay memories
export {
  MIN_PRIORITY,
  PrioritizedReplayMemory,
  ReplayMemory,
  createExp,
  createMemory,
  importanceWeights,
  zipExperiences,
  type Exp,
  type ExpBatch,
  type Memory,
  type PrioritizedMemoryOptions,
  type PrioritizedSample,
} from './memory';

// Schedules, config, errors
export { Linear, type Decay, type LinearOptions } from './decay';
export { memoryConfigSchema, parseMemoryConfig, type MemoryConfig, type MemoryConfigInput } from './config';
export { ConfigError, MemoryError, PreconditionError } from './errors';

// Training loop
export type { Environment, StepResult } from './env';
export {
  learnFromMemory,
  runEpisodes,
  type EpisodeMetrics,
  type Learner,
  type Policy,
  type RunEpisodesConfig,
} from './runner/runner';
export { RNG } from './sim/rng';
