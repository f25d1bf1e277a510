import type { Candidate } from '@/types/recipe';

export function makeCandidate(overrides: Partial<Candidate> & Pick<Candidate, 'title'>): Candidate {
  return {
    id: overrides.id ?? `db:${overrides.title}`,
    ingredients: [],
    instructions: ['Cook it.'],
    source: overrides.id ?? 'test',
    facts: { nutrition: {} },
    score: 0.5,
    provenance: 'database',
    discoveryIndex: 0,
    ...overrides,
  };
}
