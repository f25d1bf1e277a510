/**
 * Config Types
 * Schema and defaults for the orchestration core. One parsed object is built at startup
 * and passed into the orchestrator; nothing reads process-wide settings after that.
 */

import { z } from 'zod';
import { ConfigInvalidError } from '@/services/errors';

export const providerTypeSchema = z.enum(['openai', 'gemini']);
export type ProviderType = z.infer<typeof providerTypeSchema>;

export const generationProviderSchema = z.object({
  id: z.string().min(1),
  type: providerTypeSchema,
  model: z.string().min(1),
  /** Overrides generation.timeoutMs for this provider. */
  timeoutMs: z.number().int().positive().optional(),
});
export type GenerationProviderConfig = z.infer<typeof generationProviderSchema>;

export const scrapeConfigSchema = z
  .object({
    concurrency: z.number().int().min(1).max(32).default(5),
    fetchTimeoutMs: z.number().int().positive().default(15_000),
    stageBudgetMs: z.number().int().positive().default(22_000),
    maxExpansionPerPage: z.number().int().min(0).default(5),
  })
  .default({});

export const generationConfigSchema = z
  .object({
    timeoutMs: z.number().int().positive().default(5_000),
    maxFacts: z.number().int().min(0).default(3),
    providers: z.array(generationProviderSchema).default([
      { id: 'gemini-flash', type: 'gemini', model: 'gemini-2.0-flash' },
      { id: 'openai-mini', type: 'openai', model: 'gpt-4o-mini' },
    ]),
  })
  .default({});

export const coreConfigSchema = z.object({
  topK: z.number().int().min(1).max(100).default(10),
  similarityThreshold: z.number().min(0).max(1).default(0.4),
  /** DB candidates needed to skip the web fallback. */
  minDatabaseCandidates: z.number().int().min(1).default(1),
  seedLimit: z.number().int().min(1).max(20).default(5),
  resultCap: z.number().int().min(1).max(50).default(5),
  softDeadlineMs: z.number().int().positive().default(8_000),
  scrape: scrapeConfigSchema,
  generation: generationConfigSchema,
  cache: z
    .object({
      ttlSeconds: z.number().int().positive().default(3_600),
    })
    .default({}),
});

export type CoreConfig = z.infer<typeof coreConfigSchema>;
export type CoreConfigInput = z.input<typeof coreConfigSchema>;

export function parseCoreConfig(raw: unknown): CoreConfig {
  const result = coreConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigInvalidError(`Invalid core config: ${details}`);
  }
  return result.data;
}
