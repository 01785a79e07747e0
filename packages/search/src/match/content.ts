import { createReadStream } from 'node:fs';
import readline from 'node:readline';
import { InvalidQueryError, escapeRegExp } from '@treescout/shared';
import type { ContentMatch, Entry, MatchResult } from '../types';
import type { Diagnostics } from '../diagnostics';
import { isBinaryFile } from '../walker/utils';

export interface ContentMatcherOptions {
  /** Treat the pattern as a regular expression; otherwise a literal substring */
  regex: boolean;
  ignoreCase: boolean;
  wholeWord: boolean;
  maxFileSize: number;
  excerptWidth: number;
}

const BASE_SCORE = 80;
const WORD_BONUS = 10;
const WHOLE_LINE_BONUS = 10;
const WORD_CHAR = /\w/;

/**
 * Compiles the content pattern. Malformed regular expressions are rejected
 * rather than silently searched as literals.
 * @throws InvalidQueryError
 */
export function compilePattern(
  pattern: string,
  options: Pick<ContentMatcherOptions, 'regex' | 'ignoreCase' | 'wholeWord'>,
): RegExp {
  if (pattern.length === 0) {
    throw new InvalidQueryError('Content pattern must not be empty');
  }
  let source = options.regex ? pattern : escapeRegExp(pattern);
  if (options.wholeWord) {
    source = `\\b(?:${source})\\b`;
  }
  try {
    return new RegExp(source, options.ignoreCase ? 'i' : '');
  } catch (error) {
    throw new InvalidQueryError(`Invalid regular expression "${pattern}"`, {
      cause: error,
      details: error instanceof Error ? error.message : String(error),
    });
  }
}

function isLowSurrogate(line: string, index: number): boolean {
  const code = line.charCodeAt(index);
  return code >= 0xdc00 && code <= 0xdfff;
}

/**
 * Cuts a window of at most `width` characters out of `line`, centred on the
 * match `[start, end)`. The window never splits a surrogate pair.
 */
export function excerptAround(line: string, start: number, end: number, width: number): string {
  if (line.length <= width) {
    return line;
  }
  const matchLength = end - start;
  let from: number;
  let to: number;
  if (matchLength >= width) {
    from = start;
    to = Math.min(line.length, start + width);
  } else {
    const pad = Math.floor((width - matchLength) / 2);
    to = Math.min(line.length, Math.max(0, start - pad) + width);
    from = Math.max(0, to - width);
  }
  if (from > 0 && isLowSurrogate(line, from)) from++;
  if (to < line.length && isLowSurrogate(line, to)) to--;
  return line.slice(from, to);
}

/**
 * 80 for any hit, +10 when the hit sits on word boundaries, +10 when it
 * covers the whole trimmed line.
 */
export function scoreLineMatch(line: string, start: number, end: number): number {
  let score = BASE_SCORE;
  const before = start > 0 ? line[start - 1] : '';
  const after = end < line.length ? line[end] : '';
  if (!WORD_CHAR.test(before) && !WORD_CHAR.test(after)) {
    score += WORD_BONUS;
  }
  if (line.slice(start, end).trim() === line.trim()) {
    score += WHOLE_LINE_BONUS;
  }
  return score;
}

/**
 * Finds the first matching line of a text file and counts every occurrence
 * of the pattern in it. Large and binary files are skipped and noted; the
 * file is streamed line by line and reading stops when the signal is aborted.
 */
export class ContentMatcher {
  readonly mode = 'content' as const;
  readonly pattern: RegExp;
  private readonly counter: RegExp;

  constructor(
    text: string,
    private readonly options: ContentMatcherOptions,
    private readonly diagnostics: Diagnostics,
  ) {
    this.pattern = compilePattern(text, options);
    this.counter = new RegExp(this.pattern.source, `${this.pattern.flags}g`);
  }

  async match(entry: Entry, signal?: AbortSignal): Promise<MatchResult | undefined> {
    if (entry.kind !== 'file') {
      return undefined;
    }
    const size = entry.size ?? 0;
    if (size > this.options.maxFileSize) {
      this.diagnostics.record(
        'ContentTooLarge',
        entry.path,
        `Skipped content search: ${size} bytes exceeds ${this.options.maxFileSize}`,
      );
      return undefined;
    }

    try {
      if (await isBinaryFile(entry.path)) {
        this.diagnostics.record('UnsupportedBinaryContent', entry.path, 'Skipped binary file');
        return undefined;
      }
      if (signal?.aborted) return undefined;

      const content = await this.scan(entry.path, signal);
      if (!content) {
        return undefined;
      }
      return Object.freeze({ entry, score: content.score, content: content.match });
    } catch (error) {
      this.diagnostics.recordFsError(entry.path, error);
      return undefined;
    }
  }

  private async scan(
    filePath: string,
    signal?: AbortSignal,
  ): Promise<{ match: ContentMatch; score: number } | undefined> {
    const stream = createReadStream(filePath, { encoding: 'utf8' });
    const lines = readline.createInterface({ input: stream, crlfDelay: Infinity });
    let lineNumber = 0;
    let first: Omit<ContentMatch, 'matchCount'> | undefined;
    let score = 0;
    let matchCount = 0;
    try {
      for await (const line of lines) {
        lineNumber++;
        if (signal?.aborted) return undefined;
        // Empty lines cannot carry a non-empty excerpt.
        if (line.length === 0) continue;

        if (!first) {
          const hit = this.pattern.exec(line);
          if (!hit) continue;
          const start = hit.index;
          const end = start + hit[0].length;
          first = {
            line: lineNumber,
            column: start + 1,
            excerpt: excerptAround(line, start, end, this.options.excerptWidth),
          };
          score = scoreLineMatch(line, start, end);
        }
        matchCount += line.match(this.counter)?.length ?? 0;
      }
      return first ? { match: { ...first, matchCount }, score } : undefined;
    } finally {
      lines.close();
      stream.destroy();
    }
  }
}
