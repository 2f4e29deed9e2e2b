import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

const VocabularySchema = z.object({
  fallback: z.string(),
  categories: z.array(
    z.object({
      name: z.string(),
      subcategories: z.array(z.string()),
    }),
  ),
});

const vocabularyPath = fileURLToPath(new URL('../../../resources/categories.json', import.meta.url));
const vocabulary = VocabularySchema.parse(JSON.parse(readFileSync(vocabularyPath, 'utf8')));

const subcategoriesByCategory = new Map(
  vocabulary.categories.map((entry) => [entry.name, new Set(entry.subcategories)]),
);

export const FALLBACK_CATEGORY = vocabulary.fallback;

export const CATEGORIES: readonly string[] = vocabulary.categories.map((entry) => entry.name);

export const subcategoriesOf = (category: string): string[] =>
  Array.from(subcategoriesByCategory.get(category) ?? []);

export const normalizeCategory = (label: string | null | undefined): string => {
  const trimmed = label?.trim() ?? '';
  return subcategoriesByCategory.has(trimmed) ? trimmed : FALLBACK_CATEGORY;
};

/**
 * A subcategory survives only when it belongs to the vocabulary of its
 * (already normalized) category.
 */
export const normalizeSubcategory = (category: string, label: string | null | undefined): string | null => {
  const trimmed = label?.trim() ?? '';
  if (!trimmed) {
    return null;
  }

  return subcategoriesByCategory.get(category)?.has(trimmed) ? trimmed : null;
};
