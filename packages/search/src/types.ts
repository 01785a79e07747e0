export type EntryKind = 'file' | 'directory';

/**
 * Type categories a file can be detected as. The set is fixed; see
 * `walker/categories.json` for the extensions behind each one.
 */
export type FileCategory = 'source' | 'config' | 'image' | 'media' | 'document' | 'archive';

/**
 * One filesystem object found by the walker. Frozen once produced.
 */
export interface Entry {
  /** Absolute path */
  readonly path: string;
  /** Path relative to the search root, always with `/` separators */
  readonly relativePath: string;
  /** Base name */
  readonly name: string;
  readonly kind: EntryKind;
  /** Size in bytes (files only) */
  readonly size?: number;
  /** Last modification time in ms since the epoch (files only) */
  readonly modifiedMs?: number;
  /** Lower-case extension including the dot, `''` when there is none */
  readonly extension: string;
  readonly category?: FileCategory;
  /** Number of path segments below the root; direct children have depth 1 */
  readonly depth: number;
}

export type QueryMode = 'fuzzy' | 'glob' | 'content' | 'type';

export interface Query {
  readonly mode: QueryMode;
  readonly text: string;
}

/** Half-open character range `[start, end)` in the entry's base name. */
export interface MatchSpan {
  readonly start: number;
  readonly end: number;
}

export interface ContentMatch {
  /** 1-based line number */
  readonly line: number;
  /** 1-based column of the match within the line */
  readonly column: number;
  /** Bounded window of the line around the match; never empty */
  readonly excerpt: string;
  /** Occurrences of the pattern in the whole file */
  readonly matchCount: number;
}

export interface MatchResult {
  readonly entry: Entry;
  /** Normalized score in [0, 100] */
  readonly score: number;
  readonly span?: MatchSpan;
  readonly content?: ContentMatch;
}
