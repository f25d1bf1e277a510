// node/src/services/scrape-coordinator.ts — web fallback: search → bounded page fetch fan-out → web candidates

import { TimeoutElapsedError, withTimeout } from '@/utils/timeout';
import { WorkerPool } from '@/utils/workerPool';
import type { Candidate, RecipeFields, ScrapeTask } from '@/types/recipe';
import { normalizeUrl } from './dedup-utils';
import { errorMessage } from './errors';
import { logger } from './logger';
import { freezeFacts, type FetchedPage, type PageFetcher, type WebSearchClient } from './providers/recipe-sources';
import { clampScore, keywordOverlapScore } from './providers/retrieval-vector-utils';

export interface ScrapeOptions {
  concurrency: number;
  fetchTimeoutMs: number;
  stageBudgetMs: number;
  maxExpansionPerPage: number;
}

export interface ScrapeStats {
  seeds: number;
  tasksStarted: number;
  pagesFetched: number;
  failed: number;
  timedOut: number;
  collectionPages: number;
  expanded: number;
  budgetExhausted: boolean;
  abandoned: number;
  peakConcurrency: number;
  elapsedMs: number;
}

export interface ScrapeResult {
  candidates: Candidate[];
  stats: ScrapeStats;
}

interface QueuedTask extends ScrapeTask {
  /** Enqueue order; becomes the candidate's discovery index. */
  seq: number;
}

/** Search-query suffix nudging the engine towards recipe pages. */
const SEARCH_SUFFIX = ' recipe';

export function pageToCandidate(
  url: string,
  fields: RecipeFields,
  queryText: string,
  discoveryIndex: number,
): Candidate | null {
  const title = fields.title?.trim();
  if (!title) return null;
  const ingredients = fields.ingredients.map((i) => i.trim()).filter(Boolean);
  const instructions = fields.instructions.map((i) => i.trim()).filter(Boolean);
  if (ingredients.length === 0 && instructions.length === 0) return null;

  const score = clampScore(keywordOverlapScore(queryText, `${title} ${ingredients.join(' ')}`));
  return Object.freeze({
    id: `web:${url}`,
    title,
    ingredients: Object.freeze(ingredients),
    instructions: Object.freeze(instructions),
    source: url,
    url: fields.url ?? url,
    facts: freezeFacts(fields.facts),
    score,
    provenance: 'web' as const,
    discoveryIndex,
  });
}

export class ScrapeCoordinator {
  constructor(
    private readonly fetcher: PageFetcher,
    private readonly searchClient: WebSearchClient,
    private readonly options: ScrapeOptions,
  ) {}

  /** Seed URLs from web search. An unavailable search engine yields no seeds. */
  async discoverSeeds(queryText: string, limit: number): Promise<string[]> {
    try {
      const urls = await this.searchClient.search(`${queryText}${SEARCH_SUFFIX}`, limit);
      logger.info('scrape:seeds', { count: urls.length });
      return urls.slice(0, limit);
    } catch (err) {
      logger.warn('scrape:search_failed', { err: errorMessage(err) });
      return [];
    }
  }

  async scrape(seedUrls: readonly string[], queryText: string): Promise<Candidate[]> {
    const { candidates } = await this.scrapeWithStats(seedUrls, queryText);
    return candidates;
  }

  /**
   * Fetch every seed (and one level of collection-page links) with at most
   * `concurrency` fetches in flight. Failures and timeouts drop the page only.
   * When the stage budget runs out, whatever finished is returned and the rest is abandoned.
   */
  async scrapeWithStats(seedUrls: readonly string[], queryText: string): Promise<ScrapeResult> {
    const started = Date.now();
    const { concurrency, fetchTimeoutMs, stageBudgetMs, maxExpansionPerPage } = this.options;
    const results: Candidate[] = [];
    const seen = new Set<string>();
    let seq = 0;
    let closed = false;
    const counts = { pagesFetched: 0, failed: 0, timedOut: 0, collectionPages: 0, expanded: 0 };

    const handle = async (task: QueuedTask, pool: { enqueue(task: QueuedTask): void }) => {
      let page: FetchedPage;
      try {
        page = await withTimeout((signal) => this.fetcher.fetch(task.url, signal), fetchTimeoutMs);
      } catch (err) {
        if (closed) return;
        if (err instanceof TimeoutElapsedError) {
          counts.timedOut++;
          logger.warn('scrape:fetch_timeout', { url: task.url, timeoutMs: fetchTimeoutMs });
        } else {
          counts.failed++;
          logger.warn('scrape:fetch_failed', { url: task.url, err: errorMessage(err) });
        }
        return;
      }
      if (closed) return;
      counts.pagesFetched++;

      if (page.isCollectionPage) {
        counts.collectionPages++;
        if (task.depth > 0) {
          logger.debug('scrape:nested_collection_skipped', { url: task.url });
          return;
        }
        let added = 0;
        for (const link of page.links) {
          if (added >= maxExpansionPerPage) break;
          const url = normalizeUrl(link);
          if (seen.has(url)) continue;
          seen.add(url);
          pool.enqueue({ url, depth: 1, seq: seq++ });
          added++;
        }
        counts.expanded += added;
        logger.info('scrape:collection_expanded', { url: task.url, added });
        return;
      }

      const candidate = pageToCandidate(task.url, page.fields, queryText, task.seq);
      if (candidate) results.push(candidate);
      else logger.debug('scrape:page_without_recipe', { url: task.url });
    };

    const pool = new WorkerPool<QueuedTask>(handle, {
      concurrency,
      onError: (task, err) => logger.error('scrape:task_crashed', { url: task.url, err: errorMessage(err) }),
    });

    for (const raw of seedUrls) {
      const url = normalizeUrl(raw);
      if (seen.has(url)) continue;
      seen.add(url);
      pool.enqueue({ url, depth: 0, seq: seq++ });
    }
    const seeds = seen.size;

    const drained = await pool.drain(stageBudgetMs);
    closed = true;

    const stats: ScrapeStats = {
      seeds,
      tasksStarted: drained.started,
      ...counts,
      budgetExhausted: !drained.completed,
      abandoned: drained.abandonedQueued + drained.abandonedInFlight,
      peakConcurrency: pool.peakConcurrency,
      elapsedMs: Date.now() - started,
    };
    if (stats.budgetExhausted) {
      logger.warn('scrape:budget_exhausted', { budgetMs: stageBudgetMs, abandoned: stats.abandoned });
    }
    logger.info('scrape:done', { ...stats, candidates: results.length });

    return { candidates: [...results].sort((a, b) => a.discoveryIndex - b.discoveryIndex), stats };
  }
}
