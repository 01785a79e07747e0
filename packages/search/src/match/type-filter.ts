import { InvalidQueryError } from '@treescout/shared';
import type { Entry, FileCategory, MatchResult } from '../types';
import { FILE_CATEGORIES, isFileCategory } from '../walker/utils';
import { EXACT_SCORE } from './types';

/**
 * Parses `"source"` or `"image, media"` into categories.
 * @throws InvalidQueryError for names outside the fixed set
 */
export function parseCategories(text: string): ReadonlySet<FileCategory> {
  const categories = new Set<FileCategory>();
  for (const raw of text.split(',')) {
    const name = raw.trim().toLowerCase();
    if (!name) continue;
    if (!isFileCategory(name)) {
      throw new InvalidQueryError(
        `Unknown type category "${name}". Expected one of: ${FILE_CATEGORIES.join(', ')}`,
      );
    }
    categories.add(name);
  }
  if (categories.size === 0) {
    throw new InvalidQueryError('Type filter needs at least one category');
  }
  return categories;
}

export class TypeFilterMatcher {
  readonly mode = 'type' as const;
  readonly categories: ReadonlySet<FileCategory>;

  constructor(text: string) {
    this.categories = parseCategories(text);
  }

  match(entry: Entry): MatchResult | undefined {
    if (entry.kind !== 'file' || !entry.category || !this.categories.has(entry.category)) {
      return undefined;
    }
    return Object.freeze({ entry, score: EXACT_SCORE });
  }
}
