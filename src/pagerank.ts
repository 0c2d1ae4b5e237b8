/**
 * PageRank sampling — rank as visitation frequency of one long random walk.
 *
 * The walk starts on a uniformly random page. At every step the current
 * page is counted, then the next page is drawn from the transition model
 * of the current one (follow a link with probability `damping`, otherwise
 * jump anywhere; sinks jump anywhere). After `samples` steps,
 * PageRank(p) = visits(p) / samples.
 *
 * The estimate converges to the stationary distribution of the damped
 * random-surfer chain as `samples` grows; variance falls as 1/samples.
 * Independent walks can be merged by summing their visit counts before
 * normalizing.
 */

import type { Corpus } from './corpus.js';
import { type RandomSource, randomChoice, weightedChoice } from './random.js';
import { transitionModel } from './transition.js';
import { requirePages, validateCorpus, validateDamping, validateSamples } from './validate.js';

export const DEFAULT_DAMPING = 0.85;
export const DEFAULT_SAMPLES = 10000;

export type Ranks = Map<string, number>;
export type VisitCounts = Map<string, number>;

/**
 * Walk `samples` steps and return raw visit counts for every page.
 *
 * @param random Source of uniform draws in [0, 1). Default `Math.random`.
 */
export function sampleVisits(
  corpus: Corpus,
  damping: number = DEFAULT_DAMPING,
  samples: number = DEFAULT_SAMPLES,
  random: RandomSource = Math.random,
): VisitCounts {
  validateDamping(damping);
  validateSamples(samples);
  validateCorpus(corpus);
  const all = requirePages(corpus);

  const visits: VisitCounts = new Map();
  for (const page of all) visits.set(page, 0);

  // Transition weights depend only on the page, so build each row once
  const rows = new Map<string, number[]>();
  const weightsFor = (page: string): number[] => {
    let row = rows.get(page);
    if (row === undefined) {
      const model = transitionModel(corpus, page, damping);
      row = all.map(p => model.get(p) ?? 0);
      rows.set(page, row);
    }
    return row;
  };

  let current = randomChoice(all, random);
  for (let i = 0; i < samples; i++) {
    visits.set(current, (visits.get(current) ?? 0) + 1);
    current = weightedChoice(all, weightsFor(current), random);
  }

  return visits;
}

/**
 * Sum the visit counts of independent walks over the same corpus.
 */
export function mergeVisits(...batches: VisitCounts[]): VisitCounts {
  const merged: VisitCounts = new Map();
  for (const batch of batches) {
    for (const [page, count] of batch) {
      merged.set(page, (merged.get(page) ?? 0) + count);
    }
  }
  return merged;
}

export function normalizeVisits(visits: VisitCounts): Ranks {
  let total = 0;
  for (const count of visits.values()) total += count;
  if (total <= 0) {
    throw new RangeError('Cannot normalize visit counts that sum to zero');
  }

  const ranks: Ranks = new Map();
  for (const [page, count] of visits) ranks.set(page, count / total);
  return ranks;
}

/**
 * Estimate PageRank by sampling `samples` pages along one random walk.
 * Ranks sum to 1.
 */
export function samplePagerank(
  corpus: Corpus,
  damping: number = DEFAULT_DAMPING,
  samples: number = DEFAULT_SAMPLES,
  random: RandomSource = Math.random,
): Ranks {
  return normalizeVisits(sampleVisits(corpus, damping, samples, random));
}
