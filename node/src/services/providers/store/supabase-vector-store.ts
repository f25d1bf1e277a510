// node/src/services/providers/store/supabase-vector-store.ts — pgvector similarity search through a Supabase RPC
//
// The `search_recipes` function takes (query_embedding, match_threshold, match_count)
// and returns rows ordered by similarity.
import { createClient } from '@supabase/supabase-js';
import { z } from 'zod';
import { StoreUnavailableError, errorMessage } from '../../errors';
import { logger } from '../../logger';
import type { ScoredRecord, VectorStore } from '../recipe-sources';
import type { Embedding } from '../retrieval-vector-utils';

const SEARCH_RPC = 'search_recipes';

const textList = z
  .union([z.array(z.string()), z.string()])
  .nullish()
  .transform((v) => {
    if (!v) return [];
    if (Array.isArray(v)) return v;
    return v.split(/\r?\n/).map((s) => s.trim()).filter(Boolean);
  });

const optionalText = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((v) => (v == null || v === '' ? undefined : String(v)));

export const recipeRowSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String),
  similarity: z.number(),
  title: z.string().nullish().transform((v) => v ?? ''),
  ingredients: textList,
  instructions: textList,
  source_url: z.string().nullish(),
  prep_time: optionalText,
  cook_time: optionalText,
  total_time: optionalText,
  servings: optionalText,
  facts: z.record(z.unknown()).nullish(),
});

export type RecipeRow = z.infer<typeof recipeRowSchema>;

export function rowToRecord(row: RecipeRow): ScoredRecord {
  const nutrition: Record<string, string> = {};
  for (const [key, value] of Object.entries(row.facts ?? {})) {
    if (typeof value === 'string' || typeof value === 'number') nutrition[key] = String(value);
  }
  return {
    id: row.id,
    similarity: row.similarity,
    fields: {
      title: row.title,
      ingredients: row.ingredients,
      instructions: row.instructions,
      url: row.source_url ?? undefined,
      facts: {
        prepTime: row.prep_time,
        cookTime: row.cook_time,
        totalTime: row.total_time,
        servings: row.servings,
        nutrition,
      },
    },
  };
}

/** The slice of the Supabase client the store calls. */
export interface RpcClient {
  rpc(fn: string, args: Record<string, unknown>): PromiseLike<{ data: unknown; error: { message: string } | null }>;
}

export class SupabaseVectorStore implements VectorStore {
  constructor(private readonly client: RpcClient) {}

  static fromCredentials(url: string, key: string): SupabaseVectorStore {
    const client = createClient(url, key, { auth: { persistSession: false } });
    return new SupabaseVectorStore({ rpc: (fn, args) => client.rpc(fn, args) });
  }

  async search(vector: Embedding, topK: number, threshold: number): Promise<ScoredRecord[]> {
    let response: { data: unknown; error: { message: string } | null };
    try {
      response = await this.client.rpc(SEARCH_RPC, {
        query_embedding: `[${vector.join(',')}]`,
        match_threshold: threshold,
        match_count: topK,
      });
    } catch (err) {
      throw new StoreUnavailableError(`Vector search failed: ${errorMessage(err)}`, { cause: err });
    }
    if (response.error) {
      throw new StoreUnavailableError(`Vector search failed: ${response.error.message}`);
    }

    const rows = Array.isArray(response.data) ? response.data : [];
    const records: ScoredRecord[] = [];
    for (const raw of rows) {
      const parsed = recipeRowSchema.safeParse(raw);
      if (!parsed.success) {
        logger.warn('store:row_rejected', { issues: parsed.error.errors.map((e) => e.message) });
        continue;
      }
      records.push(rowToRecord(parsed.data));
    }
    return records;
  }
}
