import { afterEach, describe, it, expect, vi } from 'vitest';
import { ZodError } from 'zod';
import { loadDispatchConfig, toAnalysisOptions } from './config.js';
import { DEFAULT_MAX_GRAPH_DEPTH } from './dispatch/options.js';

describe('loadDispatchConfig', () => {
  it('falls back to defaults', () => {
    expect(loadDispatchConfig({})).toEqual({
      logLevel: 'info',
      maxGraphDepth: DEFAULT_MAX_GRAPH_DEPTH,
    });
  });

  it('reads the prefixed depth limit', () => {
    const config = loadDispatchConfig({ STAGECUT_MAX_GRAPH_DEPTH: '250', LOG_LEVEL: 'debug' });
    expect(config).toEqual({ logLevel: 'debug', maxGraphDepth: 250 });
  });

  it('rejects a depth limit that is not a positive integer', () => {
    expect(() => loadDispatchConfig({ STAGECUT_MAX_GRAPH_DEPTH: '0' })).toThrow(ZodError);
    expect(() => loadDispatchConfig({ STAGECUT_MAX_GRAPH_DEPTH: 'deep' })).toThrow(ZodError);
  });
});

describe('toAnalysisOptions', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('carries the depth limit', () => {
    expect(toAnalysisOptions({ logLevel: 'info', maxGraphDepth: 64 }).maxDepth).toBe(64);
  });

  it('logs at the configured level', () => {
    vi.stubEnv('NODE_ENV', 'production');
    vi.stubEnv('LOG_TO_FILE', 'false');
    vi.stubEnv('LOG_LEVEL', 'error');

    const config = loadDispatchConfig({ STAGECUT_LOG_LEVEL: 'debug' });
    expect(toAnalysisOptions(config).logger?.level).toBe('debug');
  });
});
