// node/src/services/providers/embeddings/openai-embedder.ts — query embeddings via OpenAI
import OpenAI from 'openai';
import { EmbeddingUnavailableError, errorMessage } from '../../errors';
import type { Embedder, Embedding } from '../retrieval-vector-utils';

export const DEFAULT_EMBEDDING_MODEL = 'text-embedding-3-small';

/** Width of the `search_recipes` RPC's `query_embedding` column. */
export const STORE_EMBEDDING_DIMENSIONS = 768;

/** The slice of the OpenAI client used here; `new OpenAI(...).embeddings` satisfies it. */
export interface EmbeddingsClient {
  create(body: { model: string; input: string; dimensions?: number }): PromiseLike<{
    data: Array<{ embedding: number[] }>;
  }>;
}

export interface OpenAIEmbedderOptions {
  model?: string;
  dimensions?: number;
  client?: EmbeddingsClient;
}

export class OpenAIEmbedder implements Embedder {
  private readonly client: EmbeddingsClient;
  private readonly model: string;
  private readonly dimensions: number;

  constructor(apiKey: string, options: OpenAIEmbedderOptions = {}) {
    this.client = options.client ?? new OpenAI({ apiKey, maxRetries: 1, timeout: 10_000 }).embeddings;
    this.model = options.model ?? DEFAULT_EMBEDDING_MODEL;
    this.dimensions = options.dimensions ?? STORE_EMBEDDING_DIMENSIONS;
  }

  async embed(text: string): Promise<Embedding> {
    try {
      const res = await this.client.create({ model: this.model, input: text, dimensions: this.dimensions });
      const vector = res.data[0]?.embedding;
      if (!vector || vector.length === 0) {
        throw new EmbeddingUnavailableError('Embedding response carried no vector');
      }
      if (vector.length !== this.dimensions) {
        throw new EmbeddingUnavailableError(
          `Embedding has ${vector.length} dimensions, store expects ${this.dimensions}`,
        );
      }
      return vector;
    } catch (err) {
      if (err instanceof EmbeddingUnavailableError) throw err;
      throw new EmbeddingUnavailableError(`Embedding failed: ${errorMessage(err)}`, { cause: err });
    }
  }
}
