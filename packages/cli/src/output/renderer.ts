import pc from 'picocolors';
import { formatDateTime, formatSize, stripAnsi, truncateMiddle, type SearchPreset } from '@treescout/shared';
import type { DiagnosticKind, MatchResult, SessionOutcome, SessionProgress } from '@treescout/search';
import { formatTable } from './table';

const PATH_WIDTH = 60;
const EXCERPT_WIDTH = 60;
const MAX_NOTES_SHOWN = 20;

/** The part of a stderr stream the progress line needs. */
export interface StatusStream {
  isTTY?: boolean;
  write(chunk: string): boolean;
}

export interface RenderContext {
  showPreview: boolean;
  verbose?: boolean;
}

export interface JsonResult {
  path: string;
  absolutePath: string;
  kind: 'file' | 'directory';
  score: number;
  size?: number;
  /** ISO 8601 */
  modified?: string;
  line?: number;
  column?: number;
  excerpt?: string;
  matchCount?: number;
}

export interface JsonOutput {
  state: SessionOutcome['state'];
  reason?: SessionOutcome['reason'];
  stats: SessionOutcome['stats'];
  results: JsonResult[];
  diagnostics: {
    total: number;
    counts: Record<DiagnosticKind, number>;
    truncated: boolean;
  };
}

export function toJsonOutput(outcome: SessionOutcome): JsonOutput {
  return {
    state: outcome.state,
    reason: outcome.reason,
    stats: outcome.stats,
    results: outcome.results.map((result) => ({
      path: result.entry.relativePath,
      absolutePath: result.entry.path,
      kind: result.entry.kind,
      score: result.score,
      size: result.entry.size,
      modified: result.entry.modifiedMs === undefined ? undefined : new Date(result.entry.modifiedMs).toISOString(),
      line: result.content?.line,
      column: result.content?.column,
      excerpt: result.content?.excerpt,
      matchCount: result.content?.matchCount,
    })),
    diagnostics: {
      total: outcome.diagnostics.total,
      counts: { ...outcome.diagnostics.counts },
      truncated: outcome.diagnostics.truncated,
    },
  };
}

export function formatProgress(progress: SessionProgress): string {
  return `Scanning… ${progress.entriesScanned} entries · ${progress.resultCount} results · ${progress.skipped} skipped`;
}

export class OutputRenderer {
  private progressShown = false;

  constructor(
    private isJson: boolean,
    private readonly stderr: StatusStream = process.stderr,
  ) {}

  renderOutcome(outcome: SessionOutcome, context: RenderContext): void {
    if (this.isJson) {
      console.log(JSON.stringify(toJsonOutput(outcome), null, 2));
      return;
    }

    if (outcome.results.length === 0) {
      console.log('No results found.');
    } else {
      console.log(this.resultTable(outcome.results, context.showPreview));
    }
    console.log(this.summaryLine(outcome));
    this.renderDiagnostics(outcome, context.verbose ?? false);
  }

  /** Rewrites a single status line on an interactive stderr. */
  progress(progress: SessionProgress): void {
    if (this.isJson || !this.stderr.isTTY) {
      return;
    }
    this.stderr.write(`\r${pc.gray(formatProgress(progress))}\x1b[K`);
    this.progressShown = true;
  }

  clearProgress(): void {
    if (this.progressShown) {
      this.stderr.write('\r\x1b[K');
      this.progressShown = false;
    }
  }

  renderPresets(presets: Record<string, SearchPreset>): void {
    if (this.isJson) {
      console.log(JSON.stringify(presets, null, 2));
      return;
    }
    const rows = Object.entries(presets).map(([name, preset]) => ({
      name,
      title: preset.title,
      extensions: truncateMiddle((preset.extensions ?? []).join(' '), EXCERPT_WIDTH),
      patterns: preset.contentPatterns.join(' '),
    }));
    console.log(formatTable(rows, { head: ['Name', 'Title', 'Extensions', 'Patterns'] }));
  }

  log(message: string): void {
    if (!this.isJson) {
      console.log(pc.gray(message));
    }
  }

  warn(message: string): void {
    console.error(this.isJson ? JSON.stringify({ warning: message }) : pc.yellow(message));
  }

  private resultTable(results: readonly MatchResult[], showPreview: boolean): string {
    const withContent = showPreview && results.some((r) => r.content);
    const rows = results.map((result) => {
      const row: Record<string, unknown> = {
        score: result.score,
        path: truncateMiddle(result.entry.relativePath + (result.entry.kind === 'directory' ? '/' : ''), PATH_WIDTH),
        size: result.entry.size === undefined ? '' : formatSize(result.entry.size),
        modified: result.entry.modifiedMs === undefined ? '' : formatDateTime(result.entry.modifiedMs),
      };
      if (withContent) {
        const { content } = result;
        row.hits = content ? content.matchCount : '';
        // Excerpts are file text; escape sequences in them must not reach the terminal.
        row.match = content
          ? `${content.line}:${content.column} ${truncateMiddle(stripAnsi(content.excerpt).trim(), EXCERPT_WIDTH)}`
          : '';
      }
      return row;
    });
    const head = ['Score', 'Path', 'Size', 'Modified'];
    if (withContent) {
      head.push('Hits', 'Match');
    }
    return formatTable(rows, { head });
  }

  private summaryLine(outcome: SessionOutcome): string {
    const { stats } = outcome;
    const counts = `${outcome.results.length} result${outcome.results.length === 1 ? '' : 's'} · ${stats.entriesScanned} entries scanned in ${stats.durationMs} ms`;

    switch (outcome.reason) {
      case 'user-cancelled':
        return pc.yellow(`Search cancelled: ${counts}`);
      case 'timed-out':
        return pc.yellow(`Time budget exhausted: ${counts}`);
      case 'result-cap':
        return pc.green(`Stopped at the result cap: ${counts}`);
      default:
        return pc.green(`Done: ${counts}`);
    }
  }

  private renderDiagnostics(outcome: SessionOutcome, verbose: boolean): void {
    const { diagnostics } = outcome;
    if (diagnostics.total === 0) {
      return;
    }
    const breakdown = Object.entries(diagnostics.counts)
      .filter(([, count]) => count > 0)
      .map(([kind, count]) => `${kind}: ${count}`)
      .join(', ');
    console.log(pc.gray(`Skipped ${diagnostics.total} entr${diagnostics.total === 1 ? 'y' : 'ies'} (${breakdown})`));

    if (!verbose) {
      return;
    }
    for (const note of diagnostics.notes.slice(0, MAX_NOTES_SHOWN)) {
      console.log(pc.gray(`  - ${note.kind} ${note.path}: ${note.message}`));
    }
    const hidden = diagnostics.total - Math.min(diagnostics.notes.length, MAX_NOTES_SHOWN);
    if (hidden > 0) {
      console.log(pc.gray(`  ... and ${hidden} more.`));
    }
  }
}
