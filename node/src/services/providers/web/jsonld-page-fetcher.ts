// node/src/services/providers/web/jsonld-page-fetcher.ts — fetch a page, read its schema.org JSON-LD
//
// A page holding a Recipe node yields that recipe; a page whose JSON-LD is an ItemList
// (or carries several Recipe nodes) is treated as a collection page and yields its links.
import axios, { type AxiosInstance } from 'axios';
import type { RecipeFields } from '@/types/recipe';
import { FetchError, FetchTimeoutError, errorMessage } from '../../errors';
import type { FetchedPage, PageFetcher } from '../recipe-sources';

type JsonRecord = Record<string, unknown>;

const JSON_LD_SCRIPT = /<script[^>]*type\s*=\s*["']application\/ld\+json["'][^>]*>([\s\S]*?)<\/script>/gi;
const MAX_DEPTH = 5;

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function hasType(node: JsonRecord, type: string): boolean {
  const t = node['@type'];
  if (typeof t === 'string') return t === type;
  return Array.isArray(t) && t.includes(type);
}

function trimString(value: unknown): string | undefined {
  if (typeof value === 'number') return String(value);
  if (typeof value !== 'string') return undefined;
  const trimmed = value.replace(/\s+/g, ' ').trim();
  return trimmed || undefined;
}

function decodeEntities(text: string): string {
  return text
    .replace(/&quot;/g, '"')
    .replace(/&#39;|&apos;/g, "'")
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&nbsp;/g, ' ')
    .replace(/&amp;/g, '&');
}

function toStringList(value: unknown): string[] {
  if (typeof value === 'string') return [value].map((v) => decodeEntities(v).trim()).filter(Boolean);
  if (!Array.isArray(value)) return [];
  return value
    .map((v) => trimString(v))
    .filter((v): v is string => v !== undefined)
    .map(decodeEntities);
}

/** recipeInstructions may be a string, a list of strings, HowToStep nodes, or HowToSection nodes. */
export function toInstructionSteps(value: unknown, depth = 0): string[] {
  if (depth > MAX_DEPTH || value == null) return [];
  if (typeof value === 'string') {
    return value
      .split(/\r?\n/)
      .map((s) => decodeEntities(s).trim())
      .filter(Boolean);
  }
  if (Array.isArray(value)) return value.flatMap((v) => toInstructionSteps(v, depth + 1));
  if (isRecord(value)) {
    if (value.itemListElement) return toInstructionSteps(value.itemListElement, depth + 1);
    const text = trimString(value.text) ?? trimString(value.name);
    return text ? [decodeEntities(text)] : [];
  }
  return [];
}

/** Flattens top-level arrays and @graph containers into a list of nodes. */
export function collectNodes(value: unknown, depth = 0): JsonRecord[] {
  if (depth > MAX_DEPTH) return [];
  if (Array.isArray(value)) return value.flatMap((v) => collectNodes(v, depth + 1));
  if (!isRecord(value)) return [];
  const graph = value['@graph'];
  if (graph !== undefined) return [value, ...collectNodes(graph, depth + 1)];
  return [value];
}

export function recipeNodeToFields(node: JsonRecord, pageUrl: string): RecipeFields {
  const nutrition: Record<string, string> = {};
  if (isRecord(node.nutrition)) {
    for (const [key, value] of Object.entries(node.nutrition)) {
      if (key.startsWith('@')) continue;
      const text = trimString(value);
      if (text) nutrition[key] = text;
    }
  }
  const recipeYield = Array.isArray(node.recipeYield) ? node.recipeYield[0] : node.recipeYield;

  return {
    title: decodeEntities(trimString(node.name) ?? ''),
    ingredients: toStringList(node.recipeIngredient ?? node.ingredients),
    instructions: toInstructionSteps(node.recipeInstructions),
    url: trimString(node.url) ?? pageUrl,
    facts: {
      prepTime: trimString(node.prepTime),
      cookTime: trimString(node.cookTime),
      totalTime: trimString(node.totalTime),
      servings: trimString(recipeYield),
      nutrition,
    },
  };
}

function itemListLinks(node: JsonRecord, pageUrl: string): string[] {
  const elements = Array.isArray(node.itemListElement) ? node.itemListElement : [];
  const links: string[] = [];
  for (const el of elements) {
    if (!isRecord(el)) continue;
    const nested = isRecord(el.item) ? el.item : undefined;
    const href = trimString(el.url) ?? trimString(nested?.url) ?? trimString(nested?.['@id']) ?? trimString(el.item);
    if (!href) continue;
    try {
      links.push(new URL(href, pageUrl).toString());
    } catch {
      continue;
    }
  }
  return links;
}

/** Parses the JSON-LD blocks of an HTML document. Malformed blocks are ignored. */
export function parseRecipePage(html: string, pageUrl: string): FetchedPage {
  const nodes: JsonRecord[] = [];
  for (const match of html.matchAll(JSON_LD_SCRIPT)) {
    const raw = match[1]?.trim();
    if (!raw) continue;
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      continue;
    }
    nodes.push(...collectNodes(parsed));
  }

  const recipes = nodes.filter((n) => hasType(n, 'Recipe'));
  const lists = nodes.filter((n) => hasType(n, 'ItemList'));

  if (recipes.length === 1) {
    return { fields: recipeNodeToFields(recipes[0], pageUrl), isCollectionPage: false, links: [] };
  }

  const links = [
    ...lists.flatMap((l) => itemListLinks(l, pageUrl)),
    ...recipes.map((r) => trimString(r.url)).filter((u): u is string => u !== undefined),
  ];
  if (links.length > 0) {
    return { fields: { title: '', ingredients: [], instructions: [] }, isCollectionPage: true, links };
  }
  if (recipes.length > 1) {
    return { fields: recipeNodeToFields(recipes[0], pageUrl), isCollectionPage: false, links: [] };
  }
  return { fields: { title: '', ingredients: [], instructions: [] }, isCollectionPage: false, links: [] };
}

export class JsonLdPageFetcher implements PageFetcher {
  constructor(
    private readonly timeoutMs = 15_000,
    private readonly http: AxiosInstance = axios,
    private readonly userAgent = 'Mozilla/5.0 (compatible; RecipeOrchestrator/1.0)',
  ) {}

  async fetch(url: string, signal?: AbortSignal): Promise<FetchedPage> {
    let html: string;
    try {
      const res = await this.http.get<unknown>(url, {
        timeout: this.timeoutMs,
        signal,
        responseType: 'text',
        maxContentLength: 5 * 1024 * 1024,
        headers: { 'User-Agent': this.userAgent, Accept: 'text/html,application/xhtml+xml' },
      });
      html = typeof res.data === 'string' ? res.data : '';
    } catch (err) {
      if (axios.isAxiosError(err) && (err.code === 'ECONNABORTED' || err.code === 'ETIMEDOUT')) {
        throw new FetchTimeoutError(url, this.timeoutMs);
      }
      throw new FetchError(url, errorMessage(err), { cause: err });
    }
    return parseRecipePage(html, url);
  }
}
