/**
 * Category and tag normalization
 */

import { CategorySource } from '../../types/post';

/**
 * Non-empty path segments of the directory holding a post's `_posts` folder
 */
export function categoriesFromDir(dir: string): string[] {
  return dir.split('/').filter((segment) => segment.length > 0);
}

/**
 * Resolves a post's categories.
 *
 * Directory segments take precedence; front matter `category` / `categories`
 * is only consulted when the directory gives none. The two are never merged.
 */
export function normalizeCategories(dir: string, source: CategorySource): string[] {
  const fromDir = categoriesFromDir(dir);
  if (fromDir.length > 0) {
    return fromDir;
  }

  switch (source.kind) {
    case 'single':
      return [source.value];
    case 'list':
      return [...source.values];
    case 'none':
      return [];
  }
}

export function normalizeTags(tags: readonly string[]): string[] {
  return [...tags];
}
