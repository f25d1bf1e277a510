import { z } from 'zod';
import { normalizeDietLabels } from '@/filters/dietaryFilter';
import { InvalidQueryError } from '@/services/errors';
import type { RecipeQuery } from '@/types/recipe';

export const MAX_QUERY_LENGTH = 1000;

export const preferencesSchema = z
  .object({
    /** Tags or free-form labels ("Low Carb"); unknown labels are dropped. */
    diets: z.array(z.string().min(1)).max(16).optional(),
    skillLevel: z.enum(['beginner', 'intermediate', 'advanced']).optional(),
    servings: z.number().int().positive().max(100).optional(),
    goal: z.string().trim().max(200).optional(),
  })
  .strict();

export const recipeQuerySchema = z.object({
  text: z
    .string({ required_error: 'Query text is required' })
    .trim()
    .min(1, 'Query text cannot be empty')
    .max(MAX_QUERY_LENGTH, `Query text must be at most ${MAX_QUERY_LENGTH} characters`),
  preferences: preferencesSchema.optional(),
});

/** HTTP body for POST /api/recipes/query. */
export const recipeQueryRequestSchema = z.object({
  message: z.string().min(1, 'message is required and cannot be empty'),
  preferences: preferencesSchema.optional(),
});

export type RecipeQueryRequestBody = z.infer<typeof recipeQueryRequestSchema>;

function toIssues(error: z.ZodError): Array<{ path: string; message: string }> {
  return error.errors.map((e) => ({
    path: e.path.join('.') || 'root',
    message: e.message,
  }));
}

/**
 * Validates and normalizes a query: trims text, maps diet labels onto tags and freezes the
 * result. Throws InvalidQueryError on a malformed query.
 */
export function parseRecipeQuery(input: unknown): Readonly<RecipeQuery> {
  const result = recipeQuerySchema.safeParse(input);
  if (!result.success) throw new InvalidQueryError(toIssues(result.error));

  const { text, preferences } = result.data;
  if (!preferences) return Object.freeze({ text });

  const { diets, ...rest } = preferences;
  return Object.freeze({
    text,
    preferences: Object.freeze({
      ...rest,
      ...(diets && { diets: normalizeDietLabels(diets) }),
    }),
  });
}

export function validateRecipeQueryRequest(data: unknown):
  | { success: true; data: RecipeQueryRequestBody }
  | { success: false; error: Array<{ path: string; message: string }> } {
  const result = recipeQueryRequestSchema.safeParse(data);
  if (!result.success) {
    return { success: false, error: toIssues(result.error) };
  }
  return { success: true, data: result.data };
}
