// node/src/services/providers/llm/openai-generator.ts — OpenAI chat completions as a TextGenerator

import OpenAI from 'openai';
import { ProviderError, ProviderTimeoutError, errorMessage } from '../../errors';
import type { GenerateOptions, TextGenerator } from '../recipe-sources';

export interface OpenAIGeneratorConfig {
  id: string;
  apiKey: string;
  model: string;
  /** Upstream request timeout; the fallback chain applies its own tighter one as well. */
  requestTimeoutMs?: number;
}

export class OpenAITextGenerator implements TextGenerator {
  private readonly client: OpenAI;

  constructor(private readonly config: OpenAIGeneratorConfig) {
    this.client = new OpenAI({
      apiKey: config.apiKey,
      maxRetries: 0,
      timeout: config.requestTimeoutMs ?? 30_000,
    });
  }

  async generate(prompt: string, options: GenerateOptions = {}): Promise<string> {
    const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [];
    if (options.system) messages.push({ role: 'system', content: options.system });
    messages.push({ role: 'user', content: prompt });

    try {
      const res = await this.client.chat.completions.create(
        {
          model: this.config.model,
          messages,
          temperature: options.temperature ?? 0.5,
          max_tokens: options.maxTokens ?? 512,
        },
        { signal: options.signal },
      );
      return res.choices[0]?.message?.content ?? '';
    } catch (err) {
      if (err instanceof OpenAI.APIConnectionTimeoutError) {
        throw new ProviderTimeoutError(this.config.id, this.config.requestTimeoutMs ?? 30_000);
      }
      throw new ProviderError(this.config.id, errorMessage(err), { cause: err });
    }
  }
}
