/**
 * Config Accessors
 * Builds the core config and the server settings from environment variables.
 */

import { parseCoreConfig, providerTypeSchema, type CoreConfig, type GenerationProviderConfig } from './types';

type Env = Record<string, string | undefined>;

function readInt(env: Env, key: string): number | undefined {
  const raw = env[key];
  if (raw == null || raw.trim() === '') return undefined;
  const n = Number(raw);
  return Number.isFinite(n) ? n : undefined;
}

/**
 * RECIPE_PROVIDERS is a comma-separated list of `type:model` entries, tried in order,
 * e.g. `gemini:gemini-2.0-flash,openai:gpt-4o-mini`.
 */
export function parseProviderList(raw: string | undefined): GenerationProviderConfig[] | undefined {
  if (!raw || !raw.trim()) return undefined;
  const providers: GenerationProviderConfig[] = [];
  for (const entry of raw.split(',')) {
    const [type, model] = entry.trim().split(':');
    const parsedType = providerTypeSchema.safeParse(type);
    if (!parsedType.success || !model) continue;
    providers.push({ id: `${parsedType.data}:${model}`, type: parsedType.data, model });
  }
  return providers.length > 0 ? providers : undefined;
}

export function loadConfigFromEnv(env: Env = process.env): CoreConfig {
  return parseCoreConfig({
    topK: readInt(env, 'RECIPE_TOP_K'),
    similarityThreshold: env.RECIPE_SIMILARITY_THRESHOLD ? Number(env.RECIPE_SIMILARITY_THRESHOLD) : undefined,
    minDatabaseCandidates: readInt(env, 'RECIPE_MIN_DB_CANDIDATES'),
    seedLimit: readInt(env, 'RECIPE_SEED_LIMIT'),
    resultCap: readInt(env, 'RECIPE_RESULT_CAP'),
    softDeadlineMs: readInt(env, 'RECIPE_SOFT_DEADLINE_MS'),
    scrape: {
      concurrency: readInt(env, 'RECIPE_SCRAPE_CONCURRENCY'),
      fetchTimeoutMs: readInt(env, 'RECIPE_FETCH_TIMEOUT_MS'),
      stageBudgetMs: readInt(env, 'RECIPE_SCRAPE_BUDGET_MS'),
    },
    generation: {
      timeoutMs: readInt(env, 'RECIPE_GENERATION_TIMEOUT_MS'),
      providers: parseProviderList(env.RECIPE_PROVIDERS),
    },
    cache: {
      ttlSeconds: readInt(env, 'RECIPE_CACHE_TTL_SECONDS'),
    },
  });
}

export interface ServerConfig {
  port: number;
  nodeEnv: string;
  corsOrigins: string[];
  openaiApiKey?: string;
  geminiApiKey?: string;
  supabaseUrl?: string;
  supabaseKey?: string;
  searxngUrl?: string;
  redisUrl?: string;
}

export function getServerConfig(env: Env = process.env): ServerConfig {
  return {
    port: parseInt(env.PORT ?? '4000', 10),
    nodeEnv: env.NODE_ENV ?? 'development',
    corsOrigins: env.CORS_ORIGIN?.split(',').map((o) => o.trim()).filter(Boolean) ?? ['http://localhost:5173'],
    openaiApiKey: env.OPENAI_API_KEY || undefined,
    geminiApiKey: env.GEMINI_API_KEY || undefined,
    supabaseUrl: env.SUPABASE_URL || undefined,
    supabaseKey: env.SUPABASE_SERVICE_ROLE_KEY || env.SUPABASE_ANON_KEY || undefined,
    searxngUrl: env.SEARXNG_URL || undefined,
    redisUrl: env.REDIS_URL || undefined,
  };
}
