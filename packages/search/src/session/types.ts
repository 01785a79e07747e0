import type { Logger, SessionConfigInput } from '@treescout/shared';
import type { DiagnosticsSummary } from '../diagnostics';
import type { MatchResult, Query } from '../types';

export type SessionState = 'idle' | 'running' | 'completed' | 'cancelled' | 'failed';

export type TerminalState = Exclude<SessionState, 'idle' | 'running'>;

/**
 * Why a session stopped:
 * - `exhausted`: every entry was visited
 * - `result-cap`: the collector filled up and `stopOnCap` is set
 * - `user-cancelled`: `cancel()` was called
 * - `timed-out`: the time budget ran out
 */
export type CompletionReason = 'exhausted' | 'result-cap' | 'user-cancelled' | 'timed-out';

export interface SessionStats {
  entriesScanned: number;
  directoriesRead: number;
  matchesAccepted: number;
  durationMs: number;
}

export interface SessionProgress extends SessionStats {
  resultCount: number;
  skipped: number;
}

export interface SessionOutcome {
  state: TerminalState;
  /** Unset for failed sessions */
  reason?: CompletionReason;
  /** Set for failed sessions, and for errors raised while a stopped session wound down */
  error?: Error;
  results: readonly MatchResult[];
  diagnostics: DiagnosticsSummary;
  stats: SessionStats;
}

export type UpdateHandler = (results: readonly MatchResult[], progress: SessionProgress) => void;
export type CompleteHandler = (outcome: SessionOutcome) => void;

export interface SessionHandlers {
  onUpdate?: UpdateHandler;
  onComplete?: CompleteHandler;
}

export interface SearchSessionOptions {
  root: string;
  query: Query;
  /** Raw options; validated when the session starts */
  config?: SessionConfigInput;
  /** Receives structured session events; nothing is logged without one */
  logger?: Logger;
  sessionId?: string;
}

export type SessionEventMap = {
  state: { from: SessionState; to: SessionState };
  update: { results: readonly MatchResult[]; progress: SessionProgress };
  complete: SessionOutcome;
};
