/**
 * Iterative PageRank — repeated application of the PageRank recurrence
 * until every page's rank is stable.
 *
 *   PR(p) = (1 - d) / N  +  d * Σ_{q → p} PR(q) / L(q)
 *
 * A sink (page with no links) is treated as linking to every page, so it
 * adds PR(q) / N to every page. With that term the ranks sum to 1 after
 * every iteration.
 *
 * Adjacency is built once as index lists; each iteration scatters rank
 * from sources to targets.
 */

import type { Corpus } from './corpus.js';
import { ConfigurationError, ConvergenceError } from './errors.js';
import { DEFAULT_DAMPING, type Ranks } from './pagerank.js';
import { requirePages, validateCorpus, validateDamping } from './validate.js';

export const DEFAULT_THRESHOLD = 0.001;
export const DEFAULT_MAX_ITERATIONS = 1000;

export interface IterateOptions {
  /** Largest per-page change still counted as converged. Default 0.001. */
  threshold?: number;
  /** Safety cap; exceeding it throws ConvergenceError. Default 1000. */
  maxIterations?: number;
}

interface IndexedCorpus {
  pages: string[];
  adj: number[][];
  sinks: number[];
}

function indexCorpus(corpus: Corpus): IndexedCorpus {
  validateCorpus(corpus);
  const pages = requirePages(corpus);
  const indexMap = new Map<string, number>();
  for (let i = 0; i < pages.length; i++) indexMap.set(pages[i], i);

  const adj: number[][] = [];
  const sinks: number[] = [];
  for (let i = 0; i < pages.length; i++) {
    const neighbors: number[] = [];
    for (const link of corpus.get(pages[i]) ?? []) {
      const j = indexMap.get(link);
      if (j !== undefined) neighbors.push(j);
    }
    adj.push(neighbors);
    if (neighbors.length === 0) sinks.push(i);
  }
  return { pages, adj, sinks };
}

function step(index: IndexedCorpus, rank: Float64Array, damping: number): Float64Array {
  const n = index.pages.length;

  let sinkMass = 0;
  for (const i of index.sinks) sinkMass += rank[i];

  const next = new Float64Array(n);
  next.fill((1 - damping) / n + (damping * sinkMass) / n);

  for (let i = 0; i < n; i++) {
    const neighbors = index.adj[i];
    if (neighbors.length === 0) continue;
    const share = (damping * rank[i]) / neighbors.length;
    for (const j of neighbors) next[j] += share;
  }
  return next;
}

function toRanks(pages: string[], rank: Float64Array): Ranks {
  const ranks: Ranks = new Map();
  for (let i = 0; i < pages.length; i++) ranks.set(pages[i], rank[i]);
  return ranks;
}

/**
 * Apply the recurrence once to `ranks`. Pages missing from `ranks` start at 0.
 */
export function iterationStep(corpus: Corpus, ranks: ReadonlyMap<string, number>, damping: number = DEFAULT_DAMPING): Ranks {
  validateDamping(damping);
  const index = indexCorpus(corpus);
  const rank: Float64Array = Float64Array.from(index.pages, p => ranks.get(p) ?? 0);
  return toRanks(index.pages, step(index, rank, damping));
}

/**
 * Compute PageRank by iterating from the uniform distribution until no
 * page changes by `threshold` or more. Returns the ranks of the first
 * stable iteration.
 */
export function iteratePagerank(corpus: Corpus, damping: number = DEFAULT_DAMPING, options: IterateOptions = {}): Ranks {
  const threshold = options.threshold ?? DEFAULT_THRESHOLD;
  const maxIterations = options.maxIterations ?? DEFAULT_MAX_ITERATIONS;
  validateDamping(damping);
  if (!(threshold > 0) || !Number.isFinite(threshold)) {
    throw new ConfigurationError(`Convergence threshold must be a positive number, got ${threshold}`);
  }
  if (!Number.isSafeInteger(maxIterations) || maxIterations <= 0) {
    throw new ConfigurationError(`Iteration cap must be a positive integer, got ${maxIterations}`);
  }

  const index = indexCorpus(corpus);
  const n = index.pages.length;
  let rank: Float64Array = new Float64Array(n).fill(1 / n);

  for (let iter = 0; iter < maxIterations; iter++) {
    const next = step(index, rank, damping);

    let stable = true;
    for (let i = 0; i < n; i++) {
      if (Math.abs(next[i] - rank[i]) >= threshold) {
        stable = false;
        break;
      }
    }

    rank = next;
    if (stable) return toRanks(index.pages, rank);
  }

  throw new ConvergenceError(maxIterations, threshold);
}
