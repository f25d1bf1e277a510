// src/services/providers/recipe-sources.ts — collaborator contracts consumed by the orchestration core
import type { RecipeFacts, RecipeFields } from '@/types/recipe';
import type { Embedding } from './retrieval-vector-utils';

export type { Embedder, Embedding } from './retrieval-vector-utils';

export interface ScoredRecord {
  id: string;
  /** Similarity in [0,1]. */
  similarity: number;
  fields: RecipeFields;
}

export interface VectorStore {
  /** Empty result is a valid outcome. Throws StoreUnavailableError on outage. */
  search(vector: Embedding, topK: number, threshold: number): Promise<ScoredRecord[]>;
}

export interface WebSearchClient {
  /** Candidate page URLs, best first. Throws SearchUnavailableError on outage. */
  search(text: string, limit: number): Promise<string[]>;
}

export interface FetchedPage {
  fields: RecipeFields;
  /** True when the page lists several recipes instead of holding one. */
  isCollectionPage: boolean;
  /** Recipe links found on a collection page. */
  links: string[];
}

export interface PageFetcher {
  /** Throws FetchTimeoutError or FetchError. The signal fires when the caller stops waiting. */
  fetch(url: string, signal?: AbortSignal): Promise<FetchedPage>;
}

export interface GenerateOptions {
  /** System instruction for the model. */
  system?: string;
  maxTokens?: number;
  temperature?: number;
  signal?: AbortSignal;
}

export interface TextGenerator {
  /** Throws ProviderError (or ProviderTimeoutError when the upstream reports one). */
  generate(prompt: string, options?: GenerateOptions): Promise<string>;
}

/** Copies a source's facts into the frozen shape a candidate carries. */
export function freezeFacts(facts: Partial<RecipeFacts> | undefined): RecipeFacts {
  return Object.freeze({
    prepTime: facts?.prepTime,
    cookTime: facts?.cookTime,
    totalTime: facts?.totalTime,
    servings: facts?.servings,
    nutrition: Object.freeze({ ...(facts?.nutrition ?? {}) }),
  });
}
