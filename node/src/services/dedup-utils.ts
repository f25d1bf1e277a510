// node/src/services/dedup-utils.ts

/** Lower-cased, whitespace-collapsed, trimmed. Punctuation is kept: "Mac & Cheese" ≠ "Mac Cheese". */
export function normalizeTitleKey(title: string | undefined | null): string {
  if (!title) return '';
  return title.toLowerCase().replace(/\s+/g, ' ').trim();
}

/**
 * Keeps the first item seen for each key. Callers order the input by precedence
 * (e.g. database copies before web copies) so the preferred copy survives.
 */
export function dedupByKey<T>(items: readonly T[], getKey: (item: T) => string): T[] {
  const seen = new Set<string>();
  const kept: T[] = [];
  for (const item of items) {
    const key = getKey(item);
    if (seen.has(key)) continue;
    seen.add(key);
    kept.push(item);
  }
  return kept;
}

/** Scheme added when missing, DuckDuckGo-style redirect wrappers unwrapped, fragment dropped. */
export function normalizeUrl(raw: string): string {
  let url = raw.trim();
  if (!/^https?:\/\//i.test(url)) url = `https://${url.replace(/^\/+/, '')}`;
  try {
    const parsed = new URL(url);
    const wrapped = parsed.hostname.endsWith('duckduckgo.com') ? parsed.searchParams.get('uddg') : null;
    if (wrapped) return normalizeUrl(wrapped);
    parsed.hash = '';
    return parsed.toString();
  } catch {
    return url;
  }
}
