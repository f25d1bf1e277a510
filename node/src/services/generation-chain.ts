// node/src/services/generation-chain.ts — ordered provider fallback for narrative + facts generation

import { CircuitBreaker } from '@/stability/circuitBreaker';
import { TimeoutElapsedError, withTimeout } from '@/utils/timeout';
import type { GenerationAttempt, GenerationResult } from '@/types/recipe';
import { ProviderError, ProviderTimeoutError, errorMessage } from './errors';
import { logger } from './logger';
import type { GenerateOptions, TextGenerator } from './providers/recipe-sources';

export interface ProviderDescriptor {
  id: string;
  generator: TextGenerator;
  timeoutMs: number;
  /** When present and open, the provider is skipped without a call. */
  breaker?: CircuitBreaker;
}

export type ChainGenerateOptions = Omit<GenerateOptions, 'signal'> & {
  /** Label for logs (e.g. "summary", "facts"). */
  purpose?: string;
};

/**
 * Tries providers in configured order, once each, every attempt under its own timeout.
 * A timeout, error or blank reply moves on to the next provider; nothing is retried.
 * Worst-case latency is the sum of the per-provider timeouts.
 */
export class GenerationFallbackChain {
  private readonly providers: readonly ProviderDescriptor[];

  constructor(providers: readonly ProviderDescriptor[]) {
    const ids = new Set<string>();
    for (const p of providers) {
      if (ids.has(p.id)) throw new Error(`Duplicate provider id: ${p.id}`);
      ids.add(p.id);
    }
    this.providers = [...providers];
  }

  get providerIds(): string[] {
    return this.providers.map((p) => p.id);
  }

  async generate(prompt: string, options: ChainGenerateOptions = {}): Promise<GenerationResult> {
    const { purpose = 'generation', ...generateOptions } = options;
    const attempts: GenerationAttempt[] = [];

    for (const provider of this.providers) {
      if (provider.breaker && !provider.breaker.canAttempt()) {
        attempts.push({ provider: provider.id, outcome: 'skipped', elapsedMs: 0, error: 'circuit open' });
        continue;
      }

      const started = Date.now();
      try {
        const text = await withTimeout(
          (signal) => provider.generator.generate(prompt, { ...generateOptions, signal }),
          provider.timeoutMs,
        );
        if (!text.trim()) throw new ProviderError(provider.id, 'empty response');

        provider.breaker?.recordSuccess();
        attempts.push({ provider: provider.id, outcome: 'ok', elapsedMs: Date.now() - started });
        logger.info('generation:ok', { purpose, provider: provider.id, attempts: attempts.length });
        return { ok: true, text: text.trim(), provider: provider.id, attempts };
      } catch (err) {
        provider.breaker?.recordFailure();
        const timedOut = err instanceof TimeoutElapsedError || err instanceof ProviderTimeoutError;
        const error = err instanceof TimeoutElapsedError
          ? new ProviderTimeoutError(provider.id, provider.timeoutMs).message
          : errorMessage(err);
        attempts.push({
          provider: provider.id,
          outcome: timedOut ? 'timeout' : 'error',
          elapsedMs: Date.now() - started,
          error,
        });
        logger.warn('generation:provider_failed', {
          purpose,
          provider: provider.id,
          outcome: timedOut ? 'timeout' : 'error',
          err: error,
        });
      }
    }

    logger.warn('generation:exhausted', { purpose, providers: this.providerIds });
    return { ok: false, attempts };
  }
}
