import path from 'node:path';
import fuzzysort from 'fuzzysort';
import type { Entry, MatchResult, MatchSpan } from '../types';
import { EXACT_SCORE, FUZZY_CEILING, SUBSTRING_FLOOR } from './types';

export interface NameScore {
  score: number;
  span: MatchSpan;
}

/**
 * Scores `query` against a base name in three tiers, so that any substring
 * hit outranks any fuzzy-only hit:
 *
 * - 100: the name, or the name without its extension, equals the query
 * - 75–99: the query is a substring; longer coverage of the name scores higher
 * - 0–74: the query's characters appear in order (fuzzysort subsequence score)
 */
export function scoreName(query: string, name: string, ignoreCase = true): NameScore | undefined {
  const q = ignoreCase ? query.toLowerCase() : query;
  const target = ignoreCase ? name.toLowerCase() : name;
  const stem = target.slice(0, target.length - path.extname(target).length);

  if (q === target) {
    return { score: EXACT_SCORE, span: { start: 0, end: name.length } };
  }
  if (q === stem) {
    return { score: EXACT_SCORE, span: { start: 0, end: stem.length } };
  }

  const index = target.indexOf(q);
  if (index >= 0) {
    const coverage = q.length / target.length;
    return {
      score: SUBSTRING_FLOOR + Math.floor((EXACT_SCORE - 1 - SUBSTRING_FLOOR) * coverage),
      span: { start: index, end: index + q.length },
    };
  }

  const result = fuzzysort.single(query, name);
  if (!result || result.indexes.length === 0) {
    return undefined;
  }
  const indexes = [...result.indexes].sort((a, b) => a - b);
  // fuzzysort always folds case; a case-sensitive query must hit the same characters.
  if (!ignoreCase && indexes.map((i) => name[i]).join('') !== query.replace(/\s+/g, '')) {
    return undefined;
  }
  const normalized = Math.min(1, Math.max(0, result.score));
  return {
    score: Math.min(FUZZY_CEILING, Math.floor(normalized * (FUZZY_CEILING + 1))),
    span: { start: Math.min(...indexes), end: Math.max(...indexes) + 1 },
  };
}

export class FuzzyNameMatcher {
  readonly mode = 'fuzzy' as const;

  constructor(
    private readonly query: string,
    private readonly threshold: number,
    private readonly ignoreCase: boolean,
  ) {}

  match(entry: Entry): MatchResult | undefined {
    const scored = scoreName(this.query, entry.name, this.ignoreCase);
    if (!scored || scored.score < this.threshold) {
      return undefined;
    }
    return Object.freeze({ entry, score: scored.score, span: scored.span });
  }
}
