import { describe, expect, it } from 'vitest';
import { parseRecipePage, toInstructionSteps } from '@/services/providers/web/jsonld-page-fetcher';

const page = (...blocks: string[]) =>
  `<html><head>${blocks
    .map((b) => `<script type="application/ld+json">${b}</script>`)
    .join('')}</head><body></body></html>`;

describe('JSON-LD page parsing', () => {
  it('reads a Recipe node', () => {
    const html = page(
      JSON.stringify({
        '@context': 'https://schema.org',
        '@type': 'Recipe',
        name: 'Mushroom Risotto',
        recipeIngredient: ['arborio rice', 'mushrooms', 'stock &amp; wine'],
        recipeInstructions: [
          { '@type': 'HowToStep', text: 'Toast the rice.' },
          { '@type': 'HowToStep', text: 'Add stock slowly.' },
        ],
        prepTime: 'PT10M',
        cookTime: 'PT30M',
        recipeYield: ['4', '4 servings'],
        nutrition: { '@type': 'NutritionInformation', calories: '420 kcal' },
      }),
    );

    const result = parseRecipePage(html, 'https://a.test/risotto');
    expect(result.isCollectionPage).toBe(false);
    expect(result.fields).toEqual({
      title: 'Mushroom Risotto',
      ingredients: ['arborio rice', 'mushrooms', 'stock & wine'],
      instructions: ['Toast the rice.', 'Add stock slowly.'],
      url: 'https://a.test/risotto',
      facts: {
        prepTime: 'PT10M',
        cookTime: 'PT30M',
        totalTime: undefined,
        servings: '4',
        nutrition: { calories: '420 kcal' },
      },
    });
  });

  it('finds a Recipe inside @graph with a multi-type', () => {
    const html = page(
      JSON.stringify({
        '@graph': [
          { '@type': 'WebPage', name: 'Site' },
          { '@type': ['Recipe', 'NewsArticle'], name: 'Dal', recipeIngredient: ['lentils'], recipeInstructions: 'Boil.\nServe.' },
        ],
      }),
    );

    const result = parseRecipePage(html, 'https://a.test/dal');
    expect(result.fields.title).toBe('Dal');
    expect(result.fields.instructions).toEqual(['Boil.', 'Serve.']);
  });

  it('treats an ItemList as a collection page', () => {
    const html = page(
      JSON.stringify({
        '@type': 'ItemList',
        itemListElement: [
          { '@type': 'ListItem', position: 1, url: '/recipes/one' },
          { '@type': 'ListItem', position: 2, item: { '@id': 'https://b.test/two' } },
        ],
      }),
    );

    const result = parseRecipePage(html, 'https://a.test/best-soups');
    expect(result.isCollectionPage).toBe(true);
    expect(result.links).toEqual(['https://a.test/recipes/one', 'https://b.test/two']);
  });

  it('ignores malformed blocks and pages without JSON-LD', () => {
    const result = parseRecipePage(page('{not json', JSON.stringify({ '@type': 'Organization' })), 'https://a.test/x');
    expect(result).toEqual({
      fields: { title: '', ingredients: [], instructions: [] },
      isCollectionPage: false,
      links: [],
    });
  });

  it('flattens HowToSection instructions', () => {
    expect(
      toInstructionSteps([
        {
          '@type': 'HowToSection',
          name: 'Sauce',
          itemListElement: [{ '@type': 'HowToStep', text: 'Whisk.' }],
        },
        'Plate it.',
      ]),
    ).toEqual(['Whisk.', 'Plate it.']);
  });
});
