import { describe, expect, it } from 'vitest';
import { getServerConfig, loadConfigFromEnv, parseProviderList } from '@/config/accessors';
import { parseCoreConfig } from '@/config/types';
import { ConfigInvalidError } from '@/services/errors';

describe('core config', () => {
  it('fills defaults', () => {
    const config = parseCoreConfig({});
    expect(config.topK).toBe(10);
    expect(config.similarityThreshold).toBe(0.4);
    expect(config.resultCap).toBe(5);
    expect(config.scrape).toEqual({
      concurrency: 5,
      fetchTimeoutMs: 15_000,
      stageBudgetMs: 22_000,
      maxExpansionPerPage: 5,
    });
    expect(config.generation.providers.map((p) => p.id)).toEqual(['gemini-flash', 'openai-mini']);
    expect(config.cache.ttlSeconds).toBe(3_600);
  });

  it('rejects out-of-range values', () => {
    expect(() => parseCoreConfig({ similarityThreshold: 1.5 })).toThrow(ConfigInvalidError);
    expect(() => parseCoreConfig({ scrape: { concurrency: 0 } })).toThrow(/scrape\.concurrency/);
  });
});

describe('environment accessors', () => {
  it('parses an ordered provider list and skips bad entries', () => {
    expect(parseProviderList('openai:gpt-4o-mini, mistral:large ,gemini:gemini-2.0-flash')).toEqual([
      { id: 'openai:gpt-4o-mini', type: 'openai', model: 'gpt-4o-mini' },
      { id: 'gemini:gemini-2.0-flash', type: 'gemini', model: 'gemini-2.0-flash' },
    ]);
    expect(parseProviderList('')).toBeUndefined();
    expect(parseProviderList('bogus')).toBeUndefined();
  });

  it('reads overrides from the environment', () => {
    const config = loadConfigFromEnv({
      RECIPE_TOP_K: '3',
      RECIPE_SIMILARITY_THRESHOLD: '0.6',
      RECIPE_SCRAPE_CONCURRENCY: '2',
      RECIPE_PROVIDERS: 'openai:gpt-4o-mini',
    });
    expect(config.topK).toBe(3);
    expect(config.similarityThreshold).toBe(0.6);
    expect(config.scrape.concurrency).toBe(2);
    expect(config.scrape.fetchTimeoutMs).toBe(15_000);
    expect(config.generation.providers).toHaveLength(1);
  });

  it('fails on a malformed number', () => {
    expect(() => loadConfigFromEnv({ RECIPE_SIMILARITY_THRESHOLD: 'high' })).toThrow(ConfigInvalidError);
  });

  it('builds server settings', () => {
    const server = getServerConfig({
      PORT: '8080',
      CORS_ORIGIN: 'https://a.test, https://b.test',
      OPENAI_API_KEY: 'test-secret',
      SUPABASE_ANON_KEY: 'test-anon',
    });
    expect(server.port).toBe(8080);
    expect(server.corsOrigins).toEqual(['https://a.test', 'https://b.test']);
    expect(server.openaiApiKey).toBe('test-secret');
    expect(server.supabaseKey).toBe('test-anon');
    expect(server.geminiApiKey).toBeUndefined();
    expect(server.nodeEnv).toBe('development');
  });
});
