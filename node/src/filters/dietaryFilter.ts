// src/filters/dietaryFilter.ts
import { logger } from '@/services/logger';
import { singularize, tokenize } from '@/services/providers/retrieval-vector-utils';
import { DIET_TAGS, type Candidate, type DietTag } from '@/types/recipe';
import dietaryData from '@/data/dietary-markers.json';

/**
 * Dietary compatibility (hard filter, runs before ranking).
 *
 * Each tag maps to a predicate over the candidate's title + ingredient text. Requested tags
 * combine by AND, with one precedence rule: when "non-vegetarian" is requested together with
 * "keto" or "low-carb", the carb predicate only rejects dishes that carry a strong high-carb
 * marker (pasta, bread, noodle, flour) and no meat. Carb restriction on its own stays strict.
 */

type MarkerGroup = keyof typeof dietaryData.markers;

/** Space-padded, singularized token stream so markers match whole words and phrases. */
export interface RecipeText {
  readonly padded: string;
}

interface RuleContext {
  /** Set when non-vegetarian is requested alongside a carb-restrictive tag. */
  relaxCarbs: boolean;
}

type DietPredicate = (text: RecipeText, ctx: RuleContext) => boolean;

function normalizePhrase(phrase: string): string {
  return tokenize(phrase).map(singularize).join(' ');
}

function normalizeGroups(groups: Record<string, string[]>): Map<string, string[]> {
  return new Map(
    Object.entries(groups).map(([group, phrases]) => [
      group,
      // Longest first so "sour cream" is stripped before "cream" would be.
      phrases.map(normalizePhrase).sort((a, b) => b.length - a.length),
    ]),
  );
}

const MARKERS = normalizeGroups(dietaryData.markers);
const EXCEPTIONS = normalizeGroups(dietaryData.exceptions);

export function toRecipeText(candidate: Pick<Candidate, 'title' | 'ingredients'>): RecipeText {
  const normalized = normalizePhrase(`${candidate.title} ${candidate.ingredients.join(' ')}`);
  return { padded: ` ${normalized} ` };
}

export function hasMarker(text: RecipeText, group: MarkerGroup): boolean {
  let haystack = text.padded;
  for (const exception of EXCEPTIONS.get(group) ?? []) {
    const pattern = ` ${exception} `;
    while (haystack.includes(pattern)) haystack = haystack.replace(pattern, ' ');
  }
  return (MARKERS.get(group) ?? []).some((marker) => haystack.includes(` ${marker} `));
}

const hasMeat = (t: RecipeText) => hasMarker(t, 'meat') || hasMarker(t, 'seafood');

const carbRestricted: DietPredicate = (t, ctx) => {
  if (!ctx.relaxCarbs) return !hasMarker(t, 'highCarb');
  return !(hasMarker(t, 'strongHighCarb') && !hasMeat(t));
};

export const DIET_RULES: Readonly<Record<DietTag, DietPredicate>> = {
  vegan: (t) =>
    !hasMeat(t) && !hasMarker(t, 'dairy') && !hasMarker(t, 'egg') && !hasMarker(t, 'honey'),
  vegetarian: (t) => !hasMeat(t),
  'non-vegetarian': (t) => hasMeat(t),
  keto: carbRestricted,
  'low-carb': carbRestricted,
  'gluten-free': (t) => !hasMarker(t, 'gluten'),
  'dairy-free': (t) => !hasMarker(t, 'dairy'),
  paleo: (t) =>
    !hasMarker(t, 'grain') &&
    !hasMarker(t, 'legume') &&
    !hasMarker(t, 'dairy') &&
    !hasMarker(t, 'refinedSugar'),
};

export function accepts(
  candidate: Pick<Candidate, 'title' | 'ingredients'>,
  diets: Iterable<DietTag>,
): boolean {
  const requested = new Set<DietTag>(diets);
  if (requested.size === 0) return true;

  const ctx: RuleContext = {
    relaxCarbs:
      requested.has('non-vegetarian') && (requested.has('keto') || requested.has('low-carb')),
  };
  const text = toRecipeText(candidate);
  for (const tag of requested) {
    if (!DIET_RULES[tag](text, ctx)) return false;
  }
  return true;
}

export function filterByDiet<T extends Pick<Candidate, 'title' | 'ingredients'>>(
  candidates: readonly T[],
  diets: readonly DietTag[],
): T[] {
  if (diets.length === 0) return [...candidates];
  return candidates.filter((c) => accepts(c, diets));
}

const DIET_ALIASES: Record<string, DietTag> = {
  nonveg: 'non-vegetarian',
  'non veg': 'non-vegetarian',
  'non vegetarian': 'non-vegetarian',
  meat: 'non-vegetarian',
  ketogenic: 'keto',
  'low carb': 'low-carb',
  lowcarb: 'low-carb',
  'gluten free': 'gluten-free',
  glutenfree: 'gluten-free',
  'dairy free': 'dairy-free',
  'lactose free': 'dairy-free',
  veggie: 'vegetarian',
  'plant based': 'vegan',
};

const TAG_SET = new Set<string>(DIET_TAGS);

function isDietTag(value: string): value is DietTag {
  return TAG_SET.has(value);
}

/** Maps free-form labels ("Non-Vegetarian", "Low Carb") onto tags; unknown labels return null. */
export function normalizeDietLabel(label: string): DietTag | null {
  const spaced = label.trim().toLowerCase().replace(/[_\s-]+/g, ' ');
  const dashed = spaced.replace(/ /g, '-');
  if (isDietTag(dashed)) return dashed;
  return DIET_ALIASES[spaced] ?? null;
}

export function normalizeDietLabels(labels: readonly string[]): DietTag[] {
  const tags = new Set<DietTag>();
  for (const label of labels) {
    const tag = normalizeDietLabel(label);
    if (tag) tags.add(tag);
    else logger.warn('diet:unknown_label', { label });
  }
  return Array.from(tags);
}
