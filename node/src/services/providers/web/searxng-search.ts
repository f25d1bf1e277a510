// node/src/services/providers/web/searxng-search.ts — SearXNG JSON API as a WebSearchClient
import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import { normalizeUrl } from '../../dedup-utils';
import { SearchUnavailableError, errorMessage } from '../../errors';
import type { WebSearchClient } from '../recipe-sources';

const searxngResponseSchema = z.object({
  results: z
    .array(z.object({ url: z.string().optional(), title: z.string().optional() }).passthrough())
    .default([]),
});

export class SearxngSearchClient implements WebSearchClient {
  constructor(
    private readonly baseUrl: string,
    private readonly timeoutMs = 10_000,
    private readonly http: AxiosInstance = axios,
  ) {}

  async search(text: string, limit: number): Promise<string[]> {
    let data: unknown;
    try {
      const res = await this.http.get<unknown>(`${this.baseUrl.replace(/\/+$/, '')}/search`, {
        params: { q: text, format: 'json', categories: 'general' },
        timeout: this.timeoutMs,
      });
      data = res.data;
    } catch (err) {
      throw new SearchUnavailableError(`SearXNG search failed: ${errorMessage(err)}`, { cause: err });
    }

    const parsed = searxngResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new SearchUnavailableError('SearXNG returned an unexpected payload');
    }

    const urls: string[] = [];
    const seen = new Set<string>();
    for (const result of parsed.data.results) {
      if (!result.url) continue;
      const url = normalizeUrl(result.url);
      if (seen.has(url)) continue;
      seen.add(url);
      urls.push(url);
      if (urls.length >= limit) break;
    }
    return urls;
  }
}
