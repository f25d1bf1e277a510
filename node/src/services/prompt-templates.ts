// node/src/services/prompt-templates.ts — narrative + trivia prompts built from ranked candidates

import type { Candidate, Preferences } from '@/types/recipe';

export const SUMMARY_SYSTEM =
  'You are a friendly cooking assistant. You may ONLY describe the recipes provided. ' +
  'Do not invent ingredients or steps. Do not substitute proteins.';

export const FACTS_SYSTEM = 'You write short, accurate food trivia. One fact per line, no preamble.';

const MAX_INGREDIENTS = 15;
const MAX_STEPS = 8;

function preferenceLines(preferences: Preferences | undefined): string {
  if (!preferences) return '';
  const lines: string[] = [];
  if (preferences.diets?.length) lines.push(`Dietary needs: ${preferences.diets.join(', ')}`);
  if (preferences.skillLevel) lines.push(`Cooking skill: ${preferences.skillLevel}`);
  if (preferences.servings) lines.push(`Cooking for: ${preferences.servings} people`);
  if (preferences.goal) lines.push(`Goal: ${preferences.goal}`);
  return lines.join('\n');
}

export function formatCandidateContext(candidate: Candidate, index: number): string {
  const { facts } = candidate;
  const lines = [`[${index + 1}] ${candidate.title} (${candidate.provenance === 'database' ? 'recipe library' : 'web'})`];
  const timing = [
    facts.prepTime && `prep ${facts.prepTime}`,
    facts.cookTime && `cook ${facts.cookTime}`,
    facts.totalTime && `total ${facts.totalTime}`,
    facts.servings && `serves ${facts.servings}`,
  ].filter(Boolean);
  if (timing.length) lines.push(`Timing: ${timing.join(', ')}`);
  if (candidate.ingredients.length) {
    lines.push(`Ingredients: ${candidate.ingredients.slice(0, MAX_INGREDIENTS).join('; ')}`);
  }
  if (candidate.instructions.length) {
    lines.push(
      'Steps:',
      ...candidate.instructions.slice(0, MAX_STEPS).map((step, i) => `  ${i + 1}. ${step.replace(/\s+/g, ' ').trim()}`),
    );
  }
  if (candidate.url) lines.push(`Source URL: ${candidate.url}`);
  return lines.join('\n');
}

export function buildSummaryPrompt(params: {
  query: string;
  candidates: readonly Candidate[];
  preferences?: Preferences;
}): string {
  const { query, candidates, preferences } = params;
  const prefs = preferenceLines(preferences);

  if (candidates.length === 0) {
    return `A user asked: "${query}"
${prefs}

No matching recipes were found in the recipe library or online.
Reply in 2-3 sentences: say that nothing matched, then suggest how to rephrase or relax the request.`;
  }

  const context = candidates.map(formatCandidateContext).join('\n\n---\n\n');
  const usedWeb = candidates.some((c) => c.provenance === 'web');

  return `A user asked: "${query}"
${prefs}

Recipes found:
${context}

Instructions:
- Write a short, conversational summary that helps the user pick a recipe.
- Lead with the best match ([1]) and mention key ingredients, timing and main steps.
- Refer to other options briefly by name.${usedWeb ? '\n- For recipes from the web, cite the source URL.' : ''}
- Respect the user's dietary needs; never suggest ingredients that break them.`;
}

export function buildFactsPrompt(params: {
  query: string;
  candidates: readonly Candidate[];
  maxFacts: number;
}): string {
  const titles = params.candidates.map((c) => `- ${c.title}`).join('\n');
  return `A user is looking for: "${params.query}"
Recipes shown to them:
${titles}

Write ${params.maxFacts} short, interesting and accurate facts about these dishes, their origins or their main ingredients.
Each fact on its own line, at most 30 words, no numbering.`;
}

/** Splits a facts reply into lines, dropping bullets, numbering and blank lines. */
export function parseFacts(raw: string, maxFacts: number): string[] {
  return raw
    .split(/\r?\n/)
    .map((line) => line.replace(/^\s*(?:[-*•]|\d+[.)])\s*/, '').trim())
    .filter((line) => line.length > 0)
    .slice(0, Math.max(0, maxFacts));
}
