/**
 * Zod schema for the replay memory construction surface.
 */

import { z } from 'zod';
import { ConfigError } from './errors';

export const memoryConfigSchema = z
  .object({
    capacity: z.number().int().positive().default(65_536),
    batchSize: z.number().int().positive().default(128),
    prioritized: z.boolean().default(false),
    alpha: z.number().min(0).default(0.7),
    beta0: z.number().min(0).max(1).default(0.5),
    numEpisodes: z.number().int().positive().default(500),
  })
  .refine((cfg) => cfg.batchSize <= cfg.capacity, {
    message: 'batchSize must not exceed capacity',
    path: ['batchSize'],
  });

export type MemoryConfig = z.infer<typeof memoryConfigSchema>;
export type MemoryConfigInput = z.input<typeof memoryConfigSchema>;

export function parseMemoryConfig(input: unknown): MemoryConfig {
  const result = memoryConfigSchema.safeParse(input ?? {});
  if (!result.success) {
    const summary = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid memory config: ${summary}`, result.error.issues);
  }
  return result.data;
}
