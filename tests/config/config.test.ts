/**
 * @file Tests for environment configuration
 */

import { DEFAULT_SCORING_CONFIG, loadConfig } from '../../src/config';

describe('loadConfig', () => {
  it('should default to in-memory backends', () => {
    const config = loadConfig({});

    expect(config.port).toBe(3000);
    expect(config.storage).toBe('memory');
    expect(config.sessionBackend).toBe('memory');
    expect(config.sessionIdleMinutes).toBe(30);
    expect(config.corsOrigins).toBe('*');
    expect(config.llm).toMatchObject({ provider: undefined, timeoutMs: 15000, maxRetries: 3 });
    expect(config.scoring).toEqual(DEFAULT_SCORING_CONFIG);
  });

  it('should infer backends from connection strings', () => {
    const config = loadConfig({ MONGODB_URI: 'mongodb://db.test:27017', REDIS_URL: 'redis://cache.test:6379' });

    expect(config.storage).toBe('mongo');
    expect(config.mongoUri).toBe('mongodb://db.test:27017');
    expect(config.sessionBackend).toBe('redis');
  });

  it('should let an explicit backend win', () => {
    const config = loadConfig({ MONGODB_URI: 'mongodb://db.test:27017', STORAGE_BACKEND: 'memory' });

    expect(config.storage).toBe('memory');
  });

  it('should parse lists, providers and scoring overrides', () => {
    const config = loadConfig({
      CORS_ORIGINS: 'http://a.test, http://b.test',
      LLM_PROVIDER: 'OpenAI',
      OPENAI_API_KEY: 'test-secret',
      PHASE_HYSTERESIS_TURNS: '5',
      RETRACTION_LOOKBACK_TURNS: '2',
    });

    expect(config.corsOrigins).toEqual(['http://a.test', 'http://b.test']);
    expect(config.llm.provider).toBe('openai');
    expect(config.llm.openaiApiKey).toBe('test-secret');
    expect(config.scoring.phase.hysteresisTurns).toBe(5);
    expect(config.scoring.retraction).toEqual({ lookbackTurns: 2, safeDangerFloor: 20 });
    expect(config.scoring.chaos.weights).toEqual(DEFAULT_SCORING_CONFIG.chaos.weights);
  });

  it('should ignore invalid numbers', () => {
    const config = loadConfig({ PORT: 'abc', SESSION_IDLE_MINUTES: '0', LLM_MAX_RETRIES: '-1' });

    expect(config.port).toBe(3000);
    expect(config.sessionIdleMinutes).toBe(30);
    expect(config.llm.maxRetries).toBe(3);
  });
});
