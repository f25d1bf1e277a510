// src/services/providers/retrieval-vector-utils.ts — embedding contract + keyword helpers for relevance scoring

export type Embedding = number[];

export interface Embedder {
  embed(text: string): Promise<Embedding>;
}

const STOP_WORDS = new Set([
  'a', 'an', 'and', 'the', 'of', 'for', 'with', 'to', 'in', 'on', 'or', 'my', 'me', 'i',
  'how', 'make', 'recipe', 'recipes', 'some', 'what', 'can', 'give', 'want', 'easy', 'best',
  'show', 'find', 'please', 'dish', 'dishes', 'meal', 'meals', 'food',
]);

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^a-z0-9]+/g)
    .filter(Boolean);
}

/** Query terms worth matching: tokens longer than two chars, stop words removed, deduplicated. */
export function extractKeywords(text: string): string[] {
  return Array.from(new Set(tokenize(text).filter((t) => t.length > 2 && !STOP_WORDS.has(t))));
}

export function singularize(token: string): string {
  if (token.length > 4 && token.endsWith('ies')) return `${token.slice(0, -3)}y`;
  if (token.length > 4 && token.endsWith('oes')) return token.slice(0, -2);
  if (token.length > 3 && token.endsWith('s') && !token.endsWith('ss')) return token.slice(0, -1);
  return token;
}

/**
 * Share of query keywords present in the document, in [0,1]. Plurals fold onto the singular.
 * A query with no usable keywords scores 0.
 */
export function keywordOverlapScore(query: string, document: string): number {
  const keywords = extractKeywords(query).map(singularize);
  if (keywords.length === 0) return 0;
  const docTokens = new Set(tokenize(document).map(singularize));
  let hits = 0;
  for (const k of new Set(keywords)) {
    if (docTokens.has(k)) hits++;
  }
  return hits / new Set(keywords).size;
}

export function clampScore(score: number): number {
  if (!Number.isFinite(score)) return 0;
  return Math.max(0, Math.min(1, score));
}
