import { describe, it, expect } from '@jest/globals';
import { ConfigurationError, CorpusValidationError, EmptyCorpusError } from '../src/errors.js';
import { requirePages, validateCorpus, validateDamping, validateSamples } from '../src/validate.js';
import { twoCycle, withSink } from './test-utils.js';

describe('validateCorpus', () => {
  it('accepts well-formed corpora', () => {
    expect(() => validateCorpus(twoCycle())).not.toThrow();
    expect(() => validateCorpus(withSink())).not.toThrow();
    expect(() => validateCorpus(new Map())).not.toThrow();
  });

  it('rejects a page that links to itself', () => {
    const corpus = new Map([
      ['A', new Set(['A', 'B'])],
      ['B', new Set<string>()],
    ]);
    expect(() => validateCorpus(corpus)).toThrow('"A" links to itself');
  });

  it('rejects a link to a page outside the corpus', () => {
    const corpus = new Map([
      ['A', new Set(['B'])],
    ]);
    expect(() => validateCorpus(corpus)).toThrow('"A" links to "B", which is not a page in the corpus');
  });

  it('rejects values that are not a map of sets', () => {
    expect(() => validateCorpus({ A: ['B'], B: [] })).toThrow('Corpus must be a map of page to link set');
    expect(() => validateCorpus(new Map([['A', ['B']], ['B', []]]))).toThrow('Links of "A" must be a set');
  });

  it('rejects malformed page identifiers', () => {
    expect(() => validateCorpus(new Map([[1, new Set()]]))).toThrow(CorpusValidationError);
    expect(() => validateCorpus(new Map([['', new Set()]]))).toThrow('Page identifiers must be non-empty strings, got ""');
  });

  it('rejects non-string links', () => {
    const corpus = new Map<string, Set<unknown>>([['A', new Set([1])]]);
    expect(() => validateCorpus(corpus)).toThrow('Links of "A" must be strings, got 1');
  });

  it('reports values that cannot be serialized as validation errors', () => {
    expect(() => validateCorpus(new Map([[1n, new Set()]]))).toThrow(CorpusValidationError);
    expect(() => validateCorpus(new Map([[1n, new Set()]]))).toThrow('Page identifiers must be non-empty strings, got 1n');

    const bigLink = new Map<string, Set<unknown>>([['A', new Set([1n])]]);
    expect(() => validateCorpus(bigLink)).toThrow(CorpusValidationError);
    expect(() => validateCorpus(bigLink)).toThrow('Links of "A" must be strings, got 1n');

    const circular: Record<string, unknown> = {};
    circular.self = circular;
    const circularLink = new Map<string, Set<unknown>>([['A', new Set([circular])]]);
    expect(() => validateCorpus(circularLink)).toThrow('Links of "A" must be strings, got [object Object]');

    const symbolKey = new Map<unknown, Set<string>>([[Symbol('page'), new Set()]]);
    expect(() => validateCorpus(symbolKey)).toThrow('Page identifiers must be non-empty strings, got Symbol(page)');
  });

  it('never mutates the input', () => {
    const corpus = new Map([
      ['A', new Set(['A', 'B'])],
      ['B', new Set<string>()],
    ]);
    expect(() => validateCorpus(corpus)).toThrow(CorpusValidationError);
    expect(corpus.get('A')).toEqual(new Set(['A', 'B']));
  });
});

describe('parameter checks', () => {
  it('accepts damping strictly between 0 and 1', () => {
    expect(() => validateDamping(0.85)).not.toThrow();
    expect(() => validateDamping(0)).toThrow(ConfigurationError);
    expect(() => validateDamping(1)).toThrow('Damping factor must be between 0 and 1 (exclusive), got 1');
    expect(() => validateDamping(Number.POSITIVE_INFINITY)).toThrow(ConfigurationError);
  });

  it('accepts only positive integer sample counts', () => {
    expect(() => validateSamples(1)).not.toThrow();
    expect(() => validateSamples(0)).toThrow('Number of samples must be a positive integer, got 0');
    expect(() => validateSamples(3.5)).toThrow(ConfigurationError);
  });

  it('requires at least one page', () => {
    expect(requirePages(withSink())).toEqual(['A', 'B', 'C']);
    expect(() => requirePages(new Map())).toThrow(EmptyCorpusError);
  });
});
