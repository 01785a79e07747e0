/**
 * Base interface for all search events.
 * All events include common metadata fields.
 */
export interface BaseEvent {
  /** Schema version for event format compatibility */
  schemaVersion: number;
  /** ISO 8601 timestamp when the event occurred */
  timestamp: string;
  /** Unique identifier for the search session */
  sessionId: string;
  /** Event type discriminator */
  type: string;
}

/**
 * Emitted when a session moves to running.
 */
export interface SessionStarted extends BaseEvent {
  type: 'SessionStarted';
  payload: {
    root: string;
    mode: string;
    query: string;
    concurrency: number;
  };
}

/** Emitted each time ranked results are flushed to the consumer */
export interface ResultsFlushed extends BaseEvent {
  type: 'ResultsFlushed';
  payload: {
    resultCount: number;
    entriesScanned: number;
    /** Best score currently held, if any */
    topScore?: number;
  };
}

/** Emitted when an entry is skipped with a diagnostic note */
export interface EntrySkipped extends BaseEvent {
  type: 'EntrySkipped';
  payload: {
    kind: string;
    path: string;
    message: string;
  };
}

/** Emitted once a session reaches a terminal state */
export interface SessionFinished extends BaseEvent {
  type: 'SessionFinished';
  payload: {
    state: 'completed' | 'cancelled' | 'failed';
    reason?: string;
    resultCount: number;
    entriesScanned: number;
    skipped: number;
    durationMs: number;
    error?: { code: string; message: string };
  };
}

export type SearchEvent = SessionStarted | ResultsFlushed | EntrySkipped | SessionFinished;

export const EVENT_SCHEMA_VERSION = 1;
