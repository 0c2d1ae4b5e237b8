import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import { DEFAULT_MAX_ITERATIONS, DEFAULT_THRESHOLD } from './iterate.js';
import { DEFAULT_DAMPING, DEFAULT_SAMPLES } from './pagerank.js';

const envSchema = z.object({
  PAGERANK_DAMPING: z.coerce.number().gt(0).lt(1).default(DEFAULT_DAMPING),
  PAGERANK_SAMPLES: z.coerce.number().int().positive().default(DEFAULT_SAMPLES),
  PAGERANK_THRESHOLD: z.coerce.number().positive().default(DEFAULT_THRESHOLD),
  PAGERANK_MAX_ITERATIONS: z.coerce.number().int().positive().default(DEFAULT_MAX_ITERATIONS),
  // Unset or empty means sample with Math.random
  PAGERANK_SEED: z.preprocess(
    value => (value === '' ? undefined : value),
    z.coerce.number().int().optional(),
  ),
});

export interface RankConfig {
  damping: number;
  samples: number;
  threshold: number;
  maxIterations: number;
  seed?: number;
}

export const DEFAULT_CONFIG: RankConfig = {
  damping: DEFAULT_DAMPING,
  samples: DEFAULT_SAMPLES,
  threshold: DEFAULT_THRESHOLD,
  maxIterations: DEFAULT_MAX_ITERATIONS,
};

/**
 * Read ranking parameters from the environment. Every invalid variable is
 * reported in one ConfigurationError.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): RankConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid environment configuration:\n  ${problems.join('\n  ')}`);
  }

  const cfg = result.data;
  return {
    damping: cfg.PAGERANK_DAMPING,
    samples: cfg.PAGERANK_SAMPLES,
    threshold: cfg.PAGERANK_THRESHOLD,
    maxIterations: cfg.PAGERANK_MAX_ITERATIONS,
    seed: cfg.PAGERANK_SEED,
  };
}
