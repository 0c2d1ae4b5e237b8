export { type Corpus, type CorpusRecord, crawl, extractLinks, corpusFromRecord, corpusToRecord, pages } from './corpus.js';
export { type RankConfig, DEFAULT_CONFIG, loadConfig } from './config.js';
export { RankError, type RankErrorCode, ConfigurationError, CorpusValidationError, EmptyCorpusError, ConvergenceError } from './errors.js';
export { type IterateOptions, DEFAULT_MAX_ITERATIONS, DEFAULT_THRESHOLD, iteratePagerank, iterationStep } from './iterate.js';
export { type Ranks, type VisitCounts, DEFAULT_DAMPING, DEFAULT_SAMPLES, mergeVisits, normalizeVisits, samplePagerank, sampleVisits } from './pagerank.js';
export { type RandomSource, randomChoice, seededRandom, weightedChoice } from './random.js';
export { type RankResult, formatResult, randomFor, rankCorpus, rankDirectory } from './rank.js';
export { ITERATION_TITLE, formatRanks, ranksToRecord, samplingTitle } from './report.js';
export { type Distribution, transitionModel } from './transition.js';
export { requirePages, validateCorpus, validateDamping, validateSamples } from './validate.js';
