import type { Corpus } from './corpus.js';
import { CorpusValidationError } from './errors.js';
import { requirePages, validateDamping } from './validate.js';

export type Distribution = Map<string, number>;

/**
 * Probability distribution over which page a surfer on `page` visits next.
 *
 * With probability `damping` the surfer follows one of the page's links,
 * chosen uniformly. Otherwise it jumps to any page in the corpus. A page
 * with no links is treated as linking to every page, so the result is
 * uniform.
 *
 * The corpus must already be valid (see validateCorpus); a dangling link
 * would take a follow share that no page receives.
 */
export function transitionModel(corpus: Corpus, page: string, damping: number): Distribution {
  validateDamping(damping);
  const all = requirePages(corpus);
  const links = corpus.get(page);
  if (links === undefined) {
    throw new CorpusValidationError(`"${page}" is not a page in the corpus`);
  }

  const n = all.length;
  const model: Distribution = new Map();

  // Sink: uniform over every page, itself included
  if (links.size === 0) {
    for (const p of all) model.set(p, 1 / n);
    return model;
  }

  const jump = (1 - damping) / n;
  const follow = damping / links.size;
  for (const p of all) {
    model.set(p, links.has(p) ? jump + follow : jump);
  }
  return model;
}
