import { AccessDeniedError, errnoCode } from '@treescout/shared';

export type DiagnosticKind =
  | 'AccessDenied'
  | 'IoError'
  | 'UnsupportedBinaryContent'
  | 'ContentTooLarge';

export interface DiagnosticNote {
  readonly kind: DiagnosticKind;
  readonly path: string;
  readonly message: string;
}

export interface DiagnosticsSummary {
  /** Exact number of notes recorded, including those not retained */
  readonly total: number;
  readonly counts: Readonly<Record<DiagnosticKind, number>>;
  /** The first `maxNotes` notes */
  readonly notes: readonly DiagnosticNote[];
  readonly truncated: boolean;
}

export type DiagnosticListener = (note: DiagnosticNote) => void;

const DEFAULT_MAX_NOTES = 500;

/**
 * Best-effort list of per-entry problems met during a session. Counts are
 * exact; only the first `maxNotes` notes are kept.
 */
export class Diagnostics {
  private readonly notes: DiagnosticNote[] = [];
  private readonly counts: Record<DiagnosticKind, number> = {
    AccessDenied: 0,
    IoError: 0,
    UnsupportedBinaryContent: 0,
    ContentTooLarge: 0,
  };
  private total = 0;
  private listener?: DiagnosticListener;

  constructor(private readonly maxNotes: number = DEFAULT_MAX_NOTES) {}

  onRecord(listener: DiagnosticListener): void {
    this.listener = listener;
  }

  record(kind: DiagnosticKind, path: string, message: string): void {
    const note: DiagnosticNote = { kind, path, message };
    this.total++;
    this.counts[kind]++;
    if (this.notes.length < this.maxNotes) {
      this.notes.push(note);
    }
    this.listener?.(note);
  }

  /**
   * Records a failed filesystem call, classifying permission errors as
   * `AccessDenied` and everything else as `IoError`.
   */
  recordFsError(path: string, error: unknown): void {
    const code = errnoCode(error);
    if (code === 'EACCES' || code === 'EPERM') {
      this.record('AccessDenied', path, new AccessDeniedError(path, { cause: error }).message);
      return;
    }
    const message = error instanceof Error ? error.message : String(error);
    this.record('IoError', path, message);
  }

  get size(): number {
    return this.total;
  }

  count(kind: DiagnosticKind): number {
    return this.counts[kind];
  }

  summary(): DiagnosticsSummary {
    return {
      total: this.total,
      counts: { ...this.counts },
      notes: [...this.notes],
      truncated: this.total > this.notes.length,
    };
  }
}
