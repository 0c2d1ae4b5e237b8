/**
 * Error types for ranking runs. Every one of them is terminal for the
 * request that raised it: callers report the message and stop.
 */

export type RankErrorCode = 'CONFIGURATION' | 'STRUCTURE' | 'EMPTY_CORPUS' | 'NO_CONVERGENCE';

export class RankError extends Error {
  public readonly code: RankErrorCode;

  constructor(message: string, code: RankErrorCode) {
    super(message);
    this.name = 'RankError';
    this.code = code;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/** Damping factor, sample count or another tunable is out of range. */
export class ConfigurationError extends RankError {
  constructor(message: string) {
    super(message, 'CONFIGURATION');
    this.name = 'ConfigurationError';
  }
}

/** The corpus breaks a structural invariant (dangling link, self-loop, wrong types). */
export class CorpusValidationError extends RankError {
  constructor(message: string) {
    super(message, 'STRUCTURE');
    this.name = 'CorpusValidationError';
  }
}

export class EmptyCorpusError extends RankError {
  constructor() {
    super('Corpus must contain at least one page', 'EMPTY_CORPUS');
    this.name = 'EmptyCorpusError';
  }
}

export class ConvergenceError extends RankError {
  public readonly iterations: number;

  constructor(iterations: number, threshold: number) {
    super(`PageRank did not converge within ${iterations} iterations (threshold ${threshold})`, 'NO_CONVERGENCE');
    this.name = 'ConvergenceError';
    this.iterations = iterations;
  }
}
