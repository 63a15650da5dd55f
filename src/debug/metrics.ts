import type { TrainingSummary } from '../ai/rl';
import type { Memory } from '../memory';
import type { EpisodeMetrics } from '../runner/runner';

export class MetricsStore {
  training: TrainingSummary | null = null;
  lastEpisode = 0;
  totalEpisodes = 0;
  episodeReward = 0;
  meanAbsTdError = 0;
  replaySize = 0;
  replayCapacity = 0;
  totalPriority: number | null = null;
  maxPriority: number | null = null;
  beta: number | null = null;

  recordEpisode(metrics: EpisodeMetrics): void {
    this.lastEpisode = metrics.episode;
    this.totalEpisodes = metrics.totalEpisodes;
    this.episodeReward = metrics.totalReward;
    this.meanAbsTdError = metrics.meanAbsTdError;
    this.replaySize = metrics.replaySize;
  }

  recordMemory<S, A>(memory: Memory<S, A>): void {
    this.replaySize = memory.memory.length;
    this.replayCapacity = memory.memory.capacity;
    if (memory.kind === 'prioritized') {
      this.totalPriority = memory.memory.totalPriority();
      this.maxPriority = memory.memory.maxPriority();
      // beta is evaluated at the 0-based episode index the runner samples with
      this.beta = memory.memory.beta(Math.max(0, this.lastEpisode - 1));
    }
  }

  toLines(): string[] {
    const lines = [
      `episode: ${this.lastEpisode}/${this.totalEpisodes}`,
      `reward: ${this.episodeReward.toFixed(2)}`,
      `mean |td error|: ${this.meanAbsTdError.toFixed(4)}`,
      `replay: ${this.replaySize}/${this.replayCapacity}`,
    ];
    if (this.totalPriority !== null && this.maxPriority !== null && this.beta !== null) {
      lines.push(
        `priority total: ${this.totalPriority.toFixed(4)} | max: ${this.maxPriority.toFixed(4)}`,
        `beta: ${this.beta.toFixed(3)}`,
      );
    }
    if (this.training) {
      lines.push(
        `baseline=${this.training.baselineMean.toFixed(2)} | trained=${this.training.trainedMean.toFixed(2)} | improve=${this.training.improvement.toFixed(2)}`,
      );
    }
    return lines;
  }
}
