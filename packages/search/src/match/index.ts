import { InvalidQueryError } from '@treescout/shared';
import type { Entry, MatchResult, Query } from '../types';
import { ContentMatcher } from './content';
import { FuzzyNameMatcher } from './fuzzy';
import { GlobMatcher } from './glob';
import { TypeFilterMatcher } from './type-filter';
import type { MatchContext } from './types';

export * from './types';
export { ContentMatcher, compilePattern, excerptAround, scoreLineMatch } from './content';
export { FuzzyNameMatcher, scoreName } from './fuzzy';
export type { NameScore } from './fuzzy';
export { GlobMatcher } from './glob';
export { TypeFilterMatcher, parseCategories } from './type-filter';

/**
 * The closed set of match strategies. One is picked per session from
 * `Query.mode`; strategies are never combined.
 */
export type Matcher = FuzzyNameMatcher | GlobMatcher | ContentMatcher | TypeFilterMatcher;

/**
 * Builds the matcher for a query.
 * @throws InvalidQueryError when the query cannot be compiled
 */
export function createMatcher(query: Query, context: MatchContext): Matcher {
  const { config, diagnostics } = context;
  if (query.text.trim().length === 0) {
    throw new InvalidQueryError('Query must not be empty');
  }

  switch (query.mode) {
    case 'fuzzy':
      return new FuzzyNameMatcher(query.text, config.fuzzyThreshold, config.ignoreCase);
    case 'glob':
      return new GlobMatcher(query.text, config.ignoreCase);
    case 'content':
      return new ContentMatcher(
        query.text,
        {
          regex: config.regex,
          ignoreCase: config.ignoreCase,
          wholeWord: config.wholeWord,
          maxFileSize: config.maxFileSizeForContentSearch,
          excerptWidth: config.excerptWidth,
        },
        diagnostics,
      );
    case 'type':
      return new TypeFilterMatcher(query.text);
    default: {
      const unknown: never = query.mode;
      throw new InvalidQueryError(`Unknown query mode "${String(unknown)}"`);
    }
  }
}

/**
 * Runs a matcher against one entry. Only the content matcher suspends.
 */
export async function runMatcher(
  matcher: Matcher,
  entry: Entry,
  signal?: AbortSignal,
): Promise<MatchResult | undefined> {
  switch (matcher.mode) {
    case 'content':
      return matcher.match(entry, signal);
    case 'fuzzy':
    case 'glob':
    case 'type':
      return matcher.match(entry);
  }
}

/**
 * Whether a matcher looks at directory entries at all.
 */
export function matchesDirectories(matcher: Matcher): boolean {
  return matcher.mode === 'fuzzy' || matcher.mode === 'glob';
}

/**
 * Applies the `minSize` / `maxSize` file filters. Directories always pass.
 */
export function withinSizeBounds(entry: Entry, bounds: { minSize?: number; maxSize?: number }): boolean {
  if (entry.kind !== 'file') {
    return true;
  }
  const size = entry.size ?? 0;
  if (bounds.minSize !== undefined && size < bounds.minSize) return false;
  if (bounds.maxSize !== undefined && size > bounds.maxSize) return false;
  return true;
}

/**
 * Applies the `extensions` file filter. A file passes when its extension or
 * its whole lower-cased name (`.env.local`) is listed. Directories always pass.
 */
export function hasListedExtension(entry: Entry, extensions: readonly string[] | undefined): boolean {
  if (entry.kind !== 'file' || extensions === undefined) {
    return true;
  }
  return extensions.includes(entry.extension) || extensions.includes(entry.name.toLowerCase());
}
