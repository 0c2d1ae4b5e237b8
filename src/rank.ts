import { type Corpus, crawl } from './corpus.js';
import { type RankConfig, DEFAULT_CONFIG } from './config.js';
import { iteratePagerank } from './iterate.js';
import { type Ranks, samplePagerank } from './pagerank.js';
import { type RandomSource, seededRandom } from './random.js';
import { formatRanks, ITERATION_TITLE, samplingTitle } from './report.js';
import { validateCorpus, validateDamping, validateSamples } from './validate.js';

export interface RankResult {
  samples: number;
  sampling: Ranks;
  iteration: Ranks;
}

export function randomFor(config: Pick<RankConfig, 'seed'>): RandomSource {
  return config.seed === undefined ? Math.random : seededRandom(config.seed);
}

/**
 * Rank one corpus with both algorithms. Configuration and structure are
 * checked before either algorithm runs.
 */
export function rankCorpus(corpus: Corpus, config: RankConfig = DEFAULT_CONFIG, random: RandomSource = randomFor(config)): RankResult {
  validateDamping(config.damping);
  validateSamples(config.samples);
  validateCorpus(corpus);

  const sampling = samplePagerank(corpus, config.damping, config.samples, random);
  const iteration = iteratePagerank(corpus, config.damping, {
    threshold: config.threshold,
    maxIterations: config.maxIterations,
  });
  return { samples: config.samples, sampling, iteration };
}

export async function rankDirectory(directory: string, config: RankConfig = DEFAULT_CONFIG): Promise<RankResult> {
  const corpus = await crawl(directory);
  return rankCorpus(corpus, config);
}

export function formatResult(result: RankResult): string {
  return [
    formatRanks(samplingTitle(result.samples), result.sampling),
    formatRanks(ITERATION_TITLE, result.iteration),
  ].join('\n');
}
