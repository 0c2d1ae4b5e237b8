import { describe, it, expect } from '@jest/globals';
import { DEFAULT_CONFIG, loadConfig } from '../src/config.js';
import { ConfigurationError } from '../src/errors.js';

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    expect(loadConfig({})).toEqual({
      damping: 0.85,
      samples: 10000,
      threshold: 0.001,
      maxIterations: 1000,
      seed: undefined,
    });
    expect(DEFAULT_CONFIG.damping).toBe(0.85);
  });

  it('parses every variable', () => {
    const config = loadConfig({
      PAGERANK_DAMPING: '0.5',
      PAGERANK_SAMPLES: '200',
      PAGERANK_THRESHOLD: '0.0001',
      PAGERANK_MAX_ITERATIONS: '50',
      PAGERANK_SEED: '7',
    });
    expect(config).toEqual({
      damping: 0.5,
      samples: 200,
      threshold: 0.0001,
      maxIterations: 50,
      seed: 7,
    });
  });

  it('treats an empty seed as unset', () => {
    expect(loadConfig({ PAGERANK_SEED: '' }).seed).toBeUndefined();
    expect(loadConfig({ PAGERANK_SEED: '0' }).seed).toBe(0);
    expect(() => loadConfig({ PAGERANK_SEED: '1.5' })).toThrow('PAGERANK_SEED');
  });

  it('rejects damping outside (0, 1)', () => {
    expect(() => loadConfig({ PAGERANK_DAMPING: '1' })).toThrow(ConfigurationError);
    expect(() => loadConfig({ PAGERANK_DAMPING: '0' })).toThrow('PAGERANK_DAMPING');
  });

  it('rejects non-integer or non-positive sample counts', () => {
    expect(() => loadConfig({ PAGERANK_SAMPLES: '2.5' })).toThrow('PAGERANK_SAMPLES');
    expect(() => loadConfig({ PAGERANK_SAMPLES: '-1' })).toThrow('PAGERANK_SAMPLES');
    expect(() => loadConfig({ PAGERANK_SAMPLES: 'many' })).toThrow('PAGERANK_SAMPLES');
  });

  it('reports every invalid variable at once', () => {
    try {
      loadConfig({ PAGERANK_DAMPING: '2', PAGERANK_MAX_ITERATIONS: '0' });
      throw new Error('expected ConfigurationError');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof Error) {
        expect(error.message).toContain('PAGERANK_DAMPING');
        expect(error.message).toContain('PAGERANK_MAX_ITERATIONS');
      }
    }
  });
});
