import type { Corpus } from './corpus.js';
import { ConfigurationError, CorpusValidationError, EmptyCorpusError } from './errors.js';

/**
 * Printable form of an arbitrary value for an error message. Never throws,
 * whatever the value.
 */
function describeValue(value: unknown): string {
  switch (typeof value) {
    case 'string':
      return JSON.stringify(value);
    case 'bigint':
      return `${value}n`;
    case 'symbol':
      return value.toString();
    case 'function':
      return '[function]';
    case 'object':
      return value === null ? 'null' : Object.prototype.toString.call(value);
    default:
      return String(value);
  }
}

/**
 * Reject anything that is not a well-formed corpus. Never repairs the
 * input: a dangling link or a self-loop is an error, not something to strip.
 */
export function validateCorpus(value: unknown): asserts value is Corpus {
  if (!(value instanceof Map)) {
    throw new CorpusValidationError('Corpus must be a map of page to link set');
  }
  const corpus: Map<unknown, unknown> = value;

  for (const [page, links] of corpus) {
    if (typeof page !== 'string' || page.length === 0) {
      throw new CorpusValidationError(`Page identifiers must be non-empty strings, got ${describeValue(page)}`);
    }
    if (!(links instanceof Set)) {
      throw new CorpusValidationError(`Links of "${page}" must be a set`);
    }
    for (const link of links) {
      if (typeof link !== 'string') {
        throw new CorpusValidationError(`Links of "${page}" must be strings, got ${describeValue(link)}`);
      }
      if (!corpus.has(link)) {
        throw new CorpusValidationError(`"${page}" links to "${link}", which is not a page in the corpus`);
      }
      if (link === page) {
        throw new CorpusValidationError(`"${page}" links to itself`);
      }
    }
  }
}

export function validateDamping(damping: number): void {
  if (!Number.isFinite(damping) || damping <= 0 || damping >= 1) {
    throw new ConfigurationError(`Damping factor must be between 0 and 1 (exclusive), got ${damping}`);
  }
}

export function validateSamples(samples: number): void {
  if (!Number.isSafeInteger(samples) || samples <= 0) {
    throw new ConfigurationError(`Number of samples must be a positive integer, got ${samples}`);
  }
}

/**
 * Page list of a corpus that has at least one page.
 */
export function requirePages(corpus: Corpus): string[] {
  if (corpus.size === 0) throw new EmptyCorpusError();
  return [...corpus.keys()];
}
