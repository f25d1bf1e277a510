import { describe, expect, it } from 'vitest';
import { dedupByKey, normalizeTitleKey, normalizeUrl } from '@/services/dedup-utils';
import {
  clampScore,
  extractKeywords,
  keywordOverlapScore,
  singularize,
} from '@/services/providers/retrieval-vector-utils';

describe('keyword helpers', () => {
  it('drops stop words and short tokens', () => {
    expect(extractKeywords('How to make the best vegan dinner for me')).toEqual(['vegan', 'dinner']);
  });

  it('folds common plurals', () => {
    expect(singularize('noodles')).toBe('noodle');
    expect(singularize('potatoes')).toBe('potato');
    expect(singularize('berries')).toBe('berry');
    expect(singularize('glass')).toBe('glass');
  });

  it('scores the share of query keywords found in the document', () => {
    expect(keywordOverlapScore('vegan dinner', 'Easy Vegan Lentil Bowl')).toBe(0.5);
    expect(keywordOverlapScore('chicken noodles', 'Chicken noodle soup')).toBe(1);
    expect(keywordOverlapScore('the', 'anything')).toBe(0);
  });

  it('clamps scores into [0,1]', () => {
    expect(clampScore(1.2)).toBe(1);
    expect(clampScore(-0.3)).toBe(0);
    expect(clampScore(Number.NaN)).toBe(0);
  });
});

describe('dedup helpers', () => {
  it('normalizes titles', () => {
    expect(normalizeTitleKey('  Mac   &  Cheese ')).toBe('mac & cheese');
    expect(normalizeTitleKey(undefined)).toBe('');
  });

  it('keeps the first item per key', () => {
    const kept = dedupByKey(['a1', 'b1', 'a2'], (s) => s[0]);
    expect(kept).toEqual(['a1', 'b1']);
  });

  it('normalizes urls', () => {
    expect(normalizeUrl('example.com/recipes/soup#comments')).toBe('https://example.com/recipes/soup');
    expect(
      normalizeUrl('https://duckduckgo.com/l/?uddg=https%3A%2F%2Fcooking.test%2Fstew&rut=abc'),
    ).toBe('https://cooking.test/stew');
  });
});
