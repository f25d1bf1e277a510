// node/src/services/providers/llm/gemini-generator.ts — Gemini generateContent as a TextGenerator

import { FinishReason, GoogleGenAI } from '@google/genai';
import { ProviderError, errorMessage } from '../../errors';
import type { GenerateOptions, TextGenerator } from '../recipe-sources';

export interface GeminiGeneratorConfig {
  id: string;
  apiKey: string;
  model: string;
}

export class GeminiTextGenerator implements TextGenerator {
  private readonly ai: GoogleGenAI;

  constructor(private readonly config: GeminiGeneratorConfig) {
    this.ai = new GoogleGenAI({ apiKey: config.apiKey });
  }

  async generate(prompt: string, options: GenerateOptions = {}): Promise<string> {
    try {
      const response = await this.ai.models.generateContent({
        model: this.config.model,
        contents: prompt,
        config: {
          systemInstruction: options.system,
          temperature: options.temperature ?? 0.5,
          maxOutputTokens: options.maxTokens ?? 512,
          abortSignal: options.signal,
        },
      });
      const candidate = response.candidates?.[0];
      if (candidate?.finishReason === FinishReason.SAFETY) {
        throw new ProviderError(this.config.id, 'response blocked by safety filter');
      }
      return response.text?.trim() ?? '';
    } catch (err) {
      if (err instanceof ProviderError) throw err;
      throw new ProviderError(this.config.id, errorMessage(err), { cause: err });
    }
  }
}
