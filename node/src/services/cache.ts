// node/src/services/cache.ts — Redis cache-aside for answered queries; optional when Redis unavailable
//
// Only responses with at least one recipe are stored. Cache failures never fail a request.
import crypto from 'crypto';
import Redis from 'ioredis';
import type { RecipeQuery, RecipeResponse } from '@/types/recipe';
import { errorMessage } from './errors';
import { logger } from './logger';

export interface ResponseCache {
  get(key: string): Promise<RecipeResponse | null>;
  set(key: string, value: RecipeResponse, ttlSeconds: number): Promise<void>;
}

const KEY_PREFIX = 'recipe:answer:v1:';

export function makeResponseCacheKey(query: RecipeQuery): string {
  const prefs = query.preferences;
  const material = JSON.stringify({
    text: query.text.toLowerCase().replace(/\s+/g, ' ').trim(),
    diets: [...(prefs?.diets ?? [])].sort(),
    skillLevel: prefs?.skillLevel ?? null,
    servings: prefs?.servings ?? null,
    goal: prefs?.goal?.toLowerCase() ?? null,
  });
  return KEY_PREFIX + crypto.createHash('sha256').update(material).digest('hex').slice(0, 32);
}

export class RedisResponseCache implements ResponseCache {
  constructor(private readonly redis: Redis) {}

  async get(key: string): Promise<RecipeResponse | null> {
    if (this.redis.status !== 'ready') return null;
    try {
      const raw = await this.redis.get(key);
      if (!raw) return null;
      const parsed: RecipeResponse = JSON.parse(raw);
      return parsed;
    } catch (err) {
      logger.warn('redis:get_error', { key, error: errorMessage(err) });
      return null;
    }
  }

  async set(key: string, value: RecipeResponse, ttlSeconds: number): Promise<void> {
    if (this.redis.status !== 'ready') return;
    try {
      await this.redis.set(key, JSON.stringify(value), 'EX', ttlSeconds);
    } catch (err) {
      logger.warn('redis:set_error', { key, error: errorMessage(err) });
    }
  }
}

/** Connects to REDIS_URL; returns null (cache disabled) when unset or unreachable. */
export async function initRedisResponseCache(redisUrl: string | undefined): Promise<RedisResponseCache | null> {
  if (!redisUrl || !redisUrl.trim()) {
    logger.info('redis:skipped', { reason: 'REDIS_URL not set' });
    return null;
  }

  const client = new Redis(redisUrl, {
    maxRetriesPerRequest: 3,
    retryStrategy(times) {
      if (times > 3) return null; // stop after 3 retries
      return Math.min(times * 200, 2000);
    },
  });

  client.on('error', (err: Error) => {
    logger.warn('redis:error', { error: errorMessage(err) });
  });

  try {
    await client.ping();
    logger.info('redis:connected');
    return new RedisResponseCache(client);
  } catch (err) {
    logger.warn('redis:connect_failed', { error: errorMessage(err) });
    client.disconnect();
    return null;
  }
}
