import type { SessionConfig } from '@treescout/shared';
import type { Diagnostics } from '../diagnostics';

/**
 * What a matcher needs from its session besides the query.
 */
export interface MatchContext {
  config: SessionConfig;
  /** Receives skipped files (binary, too large, unreadable) */
  diagnostics: Diagnostics;
}

/** Highest score a fuzzy-only (non-substring) name match can reach. */
export const FUZZY_CEILING = 74;
/** Lowest score a substring name match can reach. */
export const SUBSTRING_FLOOR = 75;
export const EXACT_SCORE = 100;
