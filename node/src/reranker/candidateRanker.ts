// src/reranker/candidateRanker.ts
import { dedupByKey, normalizeTitleKey } from '@/services/dedup-utils';
import type { Candidate, Provenance } from '@/types/recipe';

const SOURCE_ORDER: Record<Provenance, number> = {
  database: 0,
  web: 1,
};

export function compareCandidates(a: Candidate, b: Candidate): number {
  if (b.score !== a.score) return b.score - a.score;
  const bySource = SOURCE_ORDER[a.provenance] - SOURCE_ORDER[b.provenance];
  if (bySource !== 0) return bySource;
  return a.discoveryIndex - b.discoveryIndex;
}

/**
 * Merge database and web candidates into one ranked list.
 *
 * Pure: dedup by normalized title with the database copy winning (it carries a real
 * similarity score), sort by score desc → database before web → discovery index, then cap.
 * Returned candidates are fresh frozen copies with `rank` (1-based) attached.
 */
export function mergeCandidates(
  dbCandidates: readonly Candidate[],
  webCandidates: readonly Candidate[],
  resultCap: number,
): Candidate[] {
  const bySourceThenDiscovery = [...dbCandidates, ...webCandidates].sort((a, b) => {
    const bySource = SOURCE_ORDER[a.provenance] - SOURCE_ORDER[b.provenance];
    return bySource !== 0 ? bySource : a.discoveryIndex - b.discoveryIndex;
  });
  const unique = dedupByKey(bySourceThenDiscovery, (c) => normalizeTitleKey(c.title));

  return unique
    .sort(compareCandidates)
    .slice(0, Math.max(0, resultCap))
    .map((c, idx) => Object.freeze({ ...c, rank: idx + 1 }));
}

export class CandidateRanker {
  constructor(private readonly resultCap: number) {}

  merge(dbCandidates: readonly Candidate[], webCandidates: readonly Candidate[]): Candidate[] {
    return mergeCandidates(dbCandidates, webCandidates, this.resultCap);
  }
}
