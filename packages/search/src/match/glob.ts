import picomatch from 'picomatch';
import { InvalidQueryError } from '@treescout/shared';
import type { Entry, MatchResult } from '../types';
import { EXACT_SCORE } from './types';

/**
 * Shell-style glob match (`*`, `?`, `**`, `{a,b}`). Patterns containing a
 * slash are tested against the path relative to the root, others against the
 * base name. Binary: a hit scores 100.
 */
export class GlobMatcher {
  readonly mode = 'glob' as const;
  private readonly isMatch: picomatch.Matcher;
  private readonly matchPath: boolean;

  constructor(pattern: string, ignoreCase: boolean) {
    this.matchPath = pattern.includes('/');
    try {
      this.isMatch = picomatch(pattern, { dot: true, nocase: ignoreCase });
    } catch (error) {
      throw new InvalidQueryError(`Invalid glob pattern "${pattern}"`, { cause: error });
    }
  }

  match(entry: Entry): MatchResult | undefined {
    const target = this.matchPath ? entry.relativePath : entry.name;
    if (!this.isMatch(target)) {
      return undefined;
    }
    return Object.freeze({ entry, score: EXACT_SCORE });
  }
}
