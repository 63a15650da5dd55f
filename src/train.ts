import { trainPolicy } from './ai/rl';
import { MetricsStore } from './debug/metrics';

const prioritized = process.argv.includes('--prioritized');
const metrics = new MetricsStore();

const summary = trainPolicy(1337, 200, {
  memory: { prioritized },
  onEpisodeEnd: (m) => {
    metrics.recordEpisode(m);
    if (m.episode % 50 === 0) console.log(`[episode ${m.episode}] reward=${m.totalReward.toFixed(2)} td=${m.meanAbsTdError.toFixed(4)}`);
  },
});

metrics.training = summary;
metrics.recordMemory(summary.memory);
console.log(`Replay: ${prioritized ? 'prioritized' : 'uniform'}`);
for (const line of metrics.toLines()) console.log(line);
