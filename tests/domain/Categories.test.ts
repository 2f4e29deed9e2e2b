import { describe, expect, it } from 'vitest';
import {
  CATEGORIES,
  FALLBACK_CATEGORY,
  normalizeCategory,
  normalizeSubcategory,
  subcategoriesOf,
} from '../../src/domain/entities/Categories.js';

describe('category vocabulary', () => {
  it('loads the fixed category list', () => {
    expect(CATEGORIES).toHaveLength(13);
    expect(CATEGORIES).toContain('Food & Drinks');
    expect(FALLBACK_CATEGORY).toBe('Other');
    expect(subcategoriesOf('Convenience Stores')).toEqual(['7-Eleven', 'FamilyMart', 'Lawson', 'Other']);
    expect(subcategoriesOf('Unknown')).toEqual([]);
  });

  it('maps unknown categories to the fallback', () => {
    expect(normalizeCategory(' Travel ')).toBe('Travel');
    expect(normalizeCategory('Gadgets')).toBe('Other');
    expect(normalizeCategory(null)).toBe('Other');
  });

  it('keeps a subcategory only inside its own category', () => {
    expect(normalizeSubcategory('Travel', 'Hotels')).toBe('Hotels');
    expect(normalizeSubcategory('Travel', 'Cafes')).toBeNull();
    expect(normalizeSubcategory('Other', 'Anything')).toBeNull();
    expect(normalizeSubcategory('Travel', '  ')).toBeNull();
  });
});
