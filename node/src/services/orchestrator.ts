// node/src/services/orchestrator.ts — recipe query pipeline: vector store → web fallback → filter/rank → narrative + facts
import type { CoreConfig } from '@/config/types';
import { filterByDiet } from '@/filters/dietaryFilter';
import { CandidateRanker } from '@/reranker/candidateRanker';
import type { Candidate, RecipeQuery, RecipeResponse } from '@/types/recipe';
import { parseRecipeQuery } from '@/validation/recipeQuery.validation';
import { makeResponseCacheKey, type ResponseCache } from './cache';
import { errorMessage } from './errors';
import type { GenerationFallbackChain } from './generation-chain';
import { logger } from './logger';
import {
  buildFactsPrompt,
  buildSummaryPrompt,
  FACTS_SYSTEM,
  parseFacts,
  SUMMARY_SYSTEM,
} from './prompt-templates';
import { freezeFacts, type Embedder, type ScoredRecord, type VectorStore } from './providers/recipe-sources';
import { clampScore } from './providers/retrieval-vector-utils';
import { addSpan, createTrace, finishTrace } from './query-processing-trace';
import type { ScrapeCoordinator } from './scrape-coordinator';

export interface OrchestratorDeps {
  embedder: Embedder;
  vectorStore: VectorStore;
  scraper: ScrapeCoordinator;
  generation: GenerationFallbackChain;
  /** Optional answer cache; absent means every query runs the full pipeline. */
  cache?: ResponseCache | null;
}

export function recordToCandidate(record: ScoredRecord, discoveryIndex: number): Candidate {
  const { fields } = record;
  return Object.freeze({
    id: record.id,
    title: fields.title.trim(),
    ingredients: Object.freeze([...fields.ingredients]),
    instructions: Object.freeze([...fields.instructions]),
    source: record.id,
    url: fields.url,
    facts: freezeFacts(fields.facts),
    score: clampScore(record.similarity),
    provenance: 'database' as const,
    discoveryIndex,
  });
}

/**
 * Answers one recipe query.
 *
 * Expected failures (store or search outage, failed pages, every generation provider down)
 * degrade the response instead of failing it. Only a malformed query throws.
 * The soft deadline is advisory: crossing it logs a warning and flags the response.
 */
export class QueryOrchestrator {
  private readonly ranker: CandidateRanker;

  constructor(
    private readonly deps: OrchestratorDeps,
    private readonly config: CoreConfig,
  ) {
    this.ranker = new CandidateRanker(config.resultCap);
  }

  async answer(input: unknown): Promise<RecipeResponse> {
    const trace = createTrace();
    const query = parseRecipeQuery(input);
    const diets = query.preferences?.diets ?? [];

    let deadlineHit = false;
    const deadlineTimer = setTimeout(() => {
      deadlineHit = true;
      logger.warn('orchestrator:soft_deadline_exceeded', {
        traceId: trace.traceId,
        softDeadlineMs: this.config.softDeadlineMs,
        stagesDone: trace.spans.map((s) => s.name),
      });
    }, this.config.softDeadlineMs);

    try {
      const cacheKey = this.deps.cache ? makeResponseCacheKey(query) : null;
      if (cacheKey) {
        const cached = await this.readCache(cacheKey);
        if (cached) {
          logger.info('orchestrator:cache_hit', { traceId: trace.traceId });
          return { ...cached, degraded: { latency: false, elapsedMs: Date.now() - trace.startTime } };
        }
      }

      logger.info('orchestrator:start', {
        traceId: trace.traceId,
        query: query.text.slice(0, 200),
        diets,
      });

      let stageStart = Date.now();
      const dbCandidates = await this.searchDatabase(query.text);
      addSpan(trace, 'database', stageStart, { metadata: { candidates: dbCandidates.length } });

      let webCandidates: Candidate[] = [];
      const skipWeb = dbCandidates.length >= this.config.minDatabaseCandidates;
      if (!skipWeb) {
        stageStart = Date.now();
        const seeds = await this.deps.scraper.discoverSeeds(query.text, this.config.seedLimit);
        webCandidates = seeds.length > 0 ? await this.deps.scraper.scrape(seeds, query.text) : [];
        addSpan(trace, 'web', stageStart, { metadata: { seeds: seeds.length, candidates: webCandidates.length } });
      } else {
        logger.info('orchestrator:web_skipped', { traceId: trace.traceId, dbCandidates: dbCandidates.length });
      }

      stageStart = Date.now();
      const ranked = this.ranker.merge(filterByDiet(dbCandidates, diets), filterByDiet(webCandidates, diets));
      addSpan(trace, 'rank', stageStart, {
        metadata: {
          dbIn: dbCandidates.length,
          webIn: webCandidates.length,
          out: ranked.length,
        },
      });

      stageStart = Date.now();
      const [summary, facts] = await Promise.all([
        this.generateSummary(query, ranked),
        this.generateFacts(query, ranked),
      ]);
      addSpan(trace, 'generation', stageStart, {
        metadata: { summaryProvider: summary.provider, factsProvider: facts.provider },
      });

      const elapsedMs = finishTrace(trace);
      const latency = deadlineHit || elapsedMs > this.config.softDeadlineMs;
      const response: RecipeResponse = {
        narrative: summary.text,
        candidates: ranked,
        facts: facts.items,
        provenance: {
          usedDatabase: dbCandidates.length > 0,
          usedWeb: webCandidates.length > 0,
        },
        degraded: { latency, elapsedMs },
        generation: {
          summaryProvider: summary.provider,
          factsProvider: facts.provider,
        },
      };

      logger.info('orchestrator:done', {
        traceId: trace.traceId,
        elapsedMs,
        candidates: ranked.length,
        usedDatabase: response.provenance.usedDatabase,
        usedWeb: response.provenance.usedWeb,
        degradedLatency: latency,
        spans: trace.spans,
      });

      // Degraded answers are not cached.
      const generationComplete = summary.provider !== null && (!facts.requested || facts.provider !== null);
      if (cacheKey && ranked.length > 0 && generationComplete) {
        await this.writeCache(cacheKey, response);
      }
      return response;
    } finally {
      clearTimeout(deadlineTimer);
    }
  }

  private async searchDatabase(text: string): Promise<Candidate[]> {
    const { topK, similarityThreshold } = this.config;
    let vector: number[];
    try {
      vector = await this.deps.embedder.embed(text);
    } catch (err) {
      logger.warn('orchestrator:embedding_failed', { err: errorMessage(err) });
      return [];
    }

    let records: ScoredRecord[];
    try {
      records = await this.deps.vectorStore.search(vector, topK, similarityThreshold);
    } catch (err) {
      logger.warn('orchestrator:store_failed', { err: errorMessage(err) });
      return [];
    }

    return records
      .filter((r) => clampScore(r.similarity) >= similarityThreshold && r.fields.title.trim().length > 0)
      .slice(0, topK)
      .map((r, idx) => recordToCandidate(r, idx));
  }

  private async generateSummary(
    query: Readonly<RecipeQuery>,
    ranked: Candidate[],
  ): Promise<{ text: string; provider: string | null }> {
    const prompt = buildSummaryPrompt({ query: query.text, candidates: ranked, preferences: query.preferences });
    const result = await this.deps.generation.generate(prompt, {
      system: SUMMARY_SYSTEM,
      maxTokens: 800,
      temperature: 0.3,
      purpose: 'summary',
    });
    return result.ok ? { text: result.text, provider: result.provider } : { text: '', provider: null };
  }

  private async generateFacts(
    query: Readonly<RecipeQuery>,
    ranked: Candidate[],
  ): Promise<{ items: string[]; provider: string | null; requested: boolean }> {
    const { maxFacts } = this.config.generation;
    if (ranked.length === 0 || maxFacts === 0) return { items: [], provider: null, requested: false };

    const prompt = buildFactsPrompt({ query: query.text, candidates: ranked, maxFacts });
    const result = await this.deps.generation.generate(prompt, {
      system: FACTS_SYSTEM,
      maxTokens: 300,
      temperature: 0.7,
      purpose: 'facts',
    });
    return result.ok
      ? { items: parseFacts(result.text, maxFacts), provider: result.provider, requested: true }
      : { items: [], provider: null, requested: true };
  }

  private async readCache(key: string): Promise<RecipeResponse | null> {
    try {
      return (await this.deps.cache?.get(key)) ?? null;
    } catch (err) {
      logger.warn('orchestrator:cache_read_failed', { err: errorMessage(err) });
      return null;
    }
  }

  private async writeCache(key: string, response: RecipeResponse): Promise<void> {
    try {
      await this.deps.cache?.set(key, response, this.config.cache.ttlSeconds);
    } catch (err) {
      logger.warn('orchestrator:cache_write_failed', { err: errorMessage(err) });
    }
  }
}
