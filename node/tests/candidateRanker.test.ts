import { describe, expect, it } from 'vitest';
import { CandidateRanker, compareCandidates, mergeCandidates } from '@/reranker/candidateRanker';
import { makeCandidate } from './helpers';

describe('candidate ranker', () => {
  it('keeps the database copy when titles collide, even with a lower score', () => {
    const db = [makeCandidate({ id: 'r1', title: 'Pasta Bake', score: 0.7 })];
    const web = [makeCandidate({ id: 'web:x', title: '  PASTA   bake ', score: 0.95, provenance: 'web' })];

    const merged = mergeCandidates(db, web, 5);
    expect(merged).toHaveLength(1);
    expect(merged[0].id).toBe('r1');
    expect(merged[0].provenance).toBe('database');
  });

  it('orders by score, then database before web, then discovery index', () => {
    const db = [
      makeCandidate({ id: 'd0', title: 'A', score: 0.6, discoveryIndex: 0 }),
      makeCandidate({ id: 'd1', title: 'B', score: 0.8, discoveryIndex: 1 }),
    ];
    const web = [
      makeCandidate({ id: 'w0', title: 'C', score: 0.8, provenance: 'web', discoveryIndex: 0 }),
      makeCandidate({ id: 'w2', title: 'D', score: 0.9, provenance: 'web', discoveryIndex: 2 }),
      makeCandidate({ id: 'w1', title: 'E', score: 0.6, provenance: 'web', discoveryIndex: 1 }),
    ];

    const merged = mergeCandidates(db, web, 10);
    expect(merged.map((c) => c.id)).toEqual(['w2', 'd1', 'w0', 'd0', 'w1']);
    expect(merged.map((c) => c.rank)).toEqual([1, 2, 3, 4, 5]);
  });

  it('breaks same-source ties by discovery index', () => {
    const a = makeCandidate({ id: 'a', title: 'A', score: 0.5, discoveryIndex: 3 });
    const b = makeCandidate({ id: 'b', title: 'B', score: 0.5, discoveryIndex: 1 });
    expect(compareCandidates(a, b)).toBeGreaterThan(0);
  });

  it('caps the list and returns frozen copies', () => {
    const db = Array.from({ length: 7 }, (_, i) =>
      makeCandidate({ id: `d${i}`, title: `Dish ${i}`, score: 1 - i / 10, discoveryIndex: i }),
    );
    const ranker = new CandidateRanker(5);

    const merged = ranker.merge(db, []);
    expect(merged.map((c) => c.id)).toEqual(['d0', 'd1', 'd2', 'd3', 'd4']);
    expect(Object.isFrozen(merged[0])).toBe(true);
    expect(db[0].rank).toBeUndefined();
  });

  it('returns an empty list for empty input', () => {
    expect(new CandidateRanker(5).merge([], [])).toEqual([]);
  });
});
