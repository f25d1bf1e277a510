// src/services/pipeline-deps.ts — builds the orchestrator and its collaborators from config
import type { ServerConfig } from '@/config/accessors';
import type { CoreConfig, GenerationProviderConfig } from '@/config/types';
import { CircuitBreaker, DEFAULT_BREAKER_CONFIG } from '@/stability/circuitBreaker';
import type { ResponseCache } from './cache';
import { EmbeddingUnavailableError, SearchUnavailableError, StoreUnavailableError } from './errors';
import { GenerationFallbackChain, type ProviderDescriptor } from './generation-chain';
import { logger } from './logger';
import { QueryOrchestrator, type OrchestratorDeps } from './orchestrator';
import { OpenAIEmbedder } from './providers/embeddings/openai-embedder';
import { GeminiTextGenerator } from './providers/llm/gemini-generator';
import { OpenAITextGenerator } from './providers/llm/openai-generator';
import type { Embedder, TextGenerator, VectorStore, WebSearchClient } from './providers/recipe-sources';
import { SupabaseVectorStore } from './providers/store/supabase-vector-store';
import { JsonLdPageFetcher } from './providers/web/jsonld-page-fetcher';
import { SearxngSearchClient } from './providers/web/searxng-search';
import { ScrapeCoordinator } from './scrape-coordinator';

// Stand-ins for collaborators missing credentials; the pipeline treats them as outages.
const unconfiguredEmbedder: Embedder = {
  embed: async () => {
    throw new EmbeddingUnavailableError('OPENAI_API_KEY not set');
  },
};
const unconfiguredStore: VectorStore = {
  search: async () => {
    throw new StoreUnavailableError('SUPABASE_URL / key not set');
  },
};
const unconfiguredSearch: WebSearchClient = {
  search: async () => {
    throw new SearchUnavailableError('SEARXNG_URL not set');
  },
};

function createGenerator(provider: GenerationProviderConfig, server: ServerConfig): TextGenerator | null {
  switch (provider.type) {
    case 'openai':
      return server.openaiApiKey
        ? new OpenAITextGenerator({ id: provider.id, apiKey: server.openaiApiKey, model: provider.model })
        : null;
    case 'gemini':
      return server.geminiApiKey
        ? new GeminiTextGenerator({ id: provider.id, apiKey: server.geminiApiKey, model: provider.model })
        : null;
  }
}

export function buildGenerationChain(core: CoreConfig, server: ServerConfig): GenerationFallbackChain {
  const providers: ProviderDescriptor[] = [];
  for (const provider of core.generation.providers) {
    const generator = createGenerator(provider, server);
    if (!generator) {
      logger.warn('pipeline:provider_skipped', { provider: provider.id, reason: 'missing API key' });
      continue;
    }
    providers.push({
      id: provider.id,
      generator,
      timeoutMs: provider.timeoutMs ?? core.generation.timeoutMs,
      breaker: new CircuitBreaker(provider.id, DEFAULT_BREAKER_CONFIG),
    });
  }
  if (providers.length === 0) {
    logger.warn('pipeline:no_generation_providers');
  }
  return new GenerationFallbackChain(providers);
}

export function buildPipelineDeps(
  core: CoreConfig,
  server: ServerConfig,
  cache: ResponseCache | null = null,
): OrchestratorDeps {
  const embedder = server.openaiApiKey ? new OpenAIEmbedder(server.openaiApiKey) : unconfiguredEmbedder;
  const vectorStore =
    server.supabaseUrl && server.supabaseKey
      ? SupabaseVectorStore.fromCredentials(server.supabaseUrl, server.supabaseKey)
      : unconfiguredStore;
  const searchClient = server.searxngUrl ? new SearxngSearchClient(server.searxngUrl) : unconfiguredSearch;
  const fetcher = new JsonLdPageFetcher(core.scrape.fetchTimeoutMs);

  return {
    embedder,
    vectorStore,
    scraper: new ScrapeCoordinator(fetcher, searchClient, core.scrape),
    generation: buildGenerationChain(core, server),
    cache,
  };
}

export function createQueryOrchestrator(
  core: CoreConfig,
  server: ServerConfig,
  cache: ResponseCache | null = null,
): QueryOrchestrator {
  return new QueryOrchestrator(buildPipelineDeps(core, server, cache), core);
}
