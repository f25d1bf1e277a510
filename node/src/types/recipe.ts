// src/types/recipe.ts
export type DietTag =
  | 'vegan'
  | 'vegetarian'
  | 'non-vegetarian'
  | 'keto'
  | 'low-carb'
  | 'gluten-free'
  | 'dairy-free'
  | 'paleo';

export const DIET_TAGS: readonly DietTag[] = [
  'vegan',
  'vegetarian',
  'non-vegetarian',
  'keto',
  'low-carb',
  'gluten-free',
  'dairy-free',
  'paleo',
];

export type SkillLevel = 'beginner' | 'intermediate' | 'advanced';

export interface Preferences {
  diets?: DietTag[];
  skillLevel?: SkillLevel;
  servings?: number;
  goal?: string;
}

export interface RecipeQuery {
  text: string;
  preferences?: Preferences;
}

export type Provenance = 'database' | 'web';

export interface RecipeFacts {
  prepTime?: string;
  cookTime?: string;
  totalTime?: string;
  servings?: string;
  nutrition: Record<string, string>;
}

/** Fields a source (store row or scraped page) hands back for one recipe. */
export interface RecipeFields {
  title: string;
  ingredients: string[];
  instructions: string[];
  url?: string;
  facts?: Partial<RecipeFacts>;
}

export interface Candidate {
  id: string;
  title: string;
  ingredients: readonly string[];
  instructions: readonly string[];
  /** DB id or page URL. */
  source: string;
  url?: string;
  facts: RecipeFacts;
  /** 0–1, higher is better. */
  score: number;
  provenance: Provenance;
  /** Position within the stage that produced it; used as the last tie-break. */
  discoveryIndex: number;
  rank?: number;
}

export interface ScrapeTask {
  url: string;
  depth: 0 | 1;
}

export type AttemptOutcome = 'ok' | 'timeout' | 'error' | 'skipped';

export interface GenerationAttempt {
  provider: string;
  outcome: AttemptOutcome;
  elapsedMs: number;
  error?: string;
}

export type GenerationResult =
  | { ok: true; text: string; provider: string; attempts: GenerationAttempt[] }
  | { ok: false; attempts: GenerationAttempt[] };

export interface RecipeResponse {
  /** Empty string when every provider failed; never absent. */
  narrative: string;
  candidates: Candidate[];
  facts: string[];
  provenance: {
    usedDatabase: boolean;
    usedWeb: boolean;
  };
  degraded: {
    latency: boolean;
    elapsedMs: number;
  };
  generation: {
    summaryProvider: string | null;
    factsProvider: string | null;
  };
}
