import { EventEmitter } from 'node:events';
import { randomUUID } from 'node:crypto';
import fs from 'node:fs/promises';
import path from 'node:path';
import {
  AppError,
  EVENT_SCHEMA_VERSION,
  InvalidStateError,
  errnoCode,
  resolveSessionConfig,
  type Logger,
  type SearchEvent,
  type SessionConfig,
  type SessionConfigInput,
} from '@treescout/shared';
import { ResultCollector } from '../collector';
import { Diagnostics } from '../diagnostics';
import { ExclusionPolicy } from '../exclusion';
import {
  createMatcher,
  hasListedExtension,
  matchesDirectories,
  runMatcher,
  withinSizeBounds,
  type Matcher,
} from '../match';
import type { Entry, MatchResult, Query } from '../types';
import { Walker, resolveRoot } from '../walker';
import { WorkerPool, defaultConcurrency } from './pool';
import type {
  CompleteHandler,
  CompletionReason,
  SearchSessionOptions,
  SessionEventMap,
  SessionHandlers,
  SessionOutcome,
  SessionProgress,
  SessionState,
  TerminalState,
  UpdateHandler,
} from './types';

/** A search event before the session stamps its metadata on it. */
type EventDraft<E = SearchEvent> = E extends SearchEvent ? Omit<E, 'schemaVersion' | 'timestamp' | 'sessionId'> : never;

interface Stop {
  state: TerminalState;
  reason?: CompletionReason;
  error?: Error;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * One search over one tree. Walks the tree, matches entries on a worker pool,
 * keeps the best results in a bounded collector and streams snapshots to the
 * consumer until the tree is exhausted, the session is cancelled or the time
 * budget runs out.
 *
 * A session runs once: `idle → running → completed | cancelled | failed`.
 */
export class SearchSession extends EventEmitter {
  readonly id: string;
  readonly root: string;
  readonly query: Query;

  private _state: SessionState = 'idle';
  private readonly controller = new AbortController();
  private readonly diagnostics = new Diagnostics();
  private readonly configInput: SessionConfigInput;
  private readonly logger?: Logger;
  private logChain: Promise<void> = Promise.resolve();

  private handlers: SessionHandlers = {};
  private collector?: ResultCollector;
  private walker?: Walker;
  private stop?: Stop;
  private startedAt = 0;
  private matchesAccepted = 0;
  private acceptedSinceFlush = 0;
  private flushedChanges = 0;
  private budgetTimer?: NodeJS.Timeout;

  constructor(options: SearchSessionOptions) {
    super();
    this.id = options.sessionId ?? randomUUID();
    this.root = options.root;
    this.query = Object.freeze({ ...options.query });
    this.configInput = options.config ?? {};
    this.logger = options.logger?.child({ session: this.id.slice(0, 8) });
  }

  emit<T extends keyof SessionEventMap>(event: T, payload: SessionEventMap[T]): boolean {
    return super.emit(event, payload);
  }

  on<T extends keyof SessionEventMap>(event: T, listener: (payload: SessionEventMap[T]) => void): this {
    return super.on(event, listener);
  }

  get state(): SessionState {
    return this._state;
  }

  /** Current results in ranking order; empty before the session runs. */
  snapshot(): readonly MatchResult[] {
    return this.collector?.snapshot() ?? Object.freeze([]);
  }

  /**
   * Runs the search. Resolves with the outcome once in-flight work has
   * drained; never rejects for search failures, which end in `failed`.
   * @throws InvalidStateError when the session has already been started
   */
  start(handlers: SessionHandlers = {}): Promise<SessionOutcome> {
    if (this._state !== 'idle') {
      throw new InvalidStateError(`Cannot start a session that is ${this._state}`, {
        details: { sessionId: this.id },
      });
    }
    this.handlers = handlers;
    this.startedAt = Date.now();

    let config: SessionConfig;
    let matcher: Matcher;
    try {
      config = resolveSessionConfig(this.configInput);
      matcher = createMatcher(this.query, { config, diagnostics: this.diagnostics });
    } catch (error) {
      this.stop = { state: 'failed', error: toError(error) };
      this.setState('failed');
      return this.finish();
    }

    this.setState('running');
    return this.run(config, matcher);
  }

  /**
   * Stops a running session: the state changes at once, no new entries are
   * dispatched and later matches are discarded. Safe to call repeatedly;
   * does nothing before `start()` or after the session has ended.
   */
  cancel(): void {
    this.halt({ state: 'cancelled', reason: 'user-cancelled' });
  }

  private async run(config: SessionConfig, matcher: Matcher): Promise<SessionOutcome> {
    const collector = new ResultCollector(config.maxResults);
    this.collector = collector;
    const pool = new WorkerPool(config.concurrency ?? defaultConcurrency());
    const signal = this.controller.signal;

    this.diagnostics.onRecord((note) => this.record({ type: 'EntrySkipped', payload: { ...note } }));
    this.record({
      type: 'SessionStarted',
      payload: {
        root: this.root,
        mode: this.query.mode,
        query: this.query.text,
        concurrency: pool.concurrency,
      },
    });

    if (config.timeBudgetMs !== undefined) {
      this.budgetTimer = setTimeout(() => this.halt({ state: 'cancelled', reason: 'timed-out' }), config.timeBudgetMs);
    }
    const flushTimer = setInterval(() => {
      if (collector.changes !== this.flushedChanges) {
        this.safeFlush();
      }
    }, config.flushIntervalMs);

    try {
      const absRoot = await resolveRoot(this.root);
      const rules = config.respectGitignore ? await this.readGitignore(absRoot) : [];
      const walker = new Walker({
        policy: ExclusionPolicy.fromConfig(config, rules),
        diagnostics: this.diagnostics,
        followSymlinks: config.followSymlinks,
        includeDirectories: config.includeDirectories && matchesDirectories(matcher),
        maxDepth: config.maxDepth,
      });
      this.walker = walker;

      for await (const entry of walker.walk(absRoot, signal)) {
        if (signal.aborted) break;
        if (!withinSizeBounds(entry, config) || !hasListedExtension(entry, config.extensions)) continue;
        await pool.submit(() => this.evaluate(matcher, entry, config));
        if (signal.aborted) break;
      }
      await pool.drain();
      this.halt({ state: 'completed', reason: 'exhausted' });
    } catch (error) {
      this.fail(error);
      // Let workers already running settle before reporting.
      await pool.drain().catch((drainError: unknown) => this.fail(drainError));
    } finally {
      clearInterval(flushTimer);
      clearTimeout(this.budgetTimer);
    }

    this.safeFlush();
    return this.finish();
  }

  private async evaluate(matcher: Matcher, entry: Entry, config: SessionConfig): Promise<void> {
    const result = await runMatcher(matcher, entry, this.controller.signal);
    const collector = this.collector;
    if (!result || !collector || this._state !== 'running') {
      return;
    }
    if (!collector.offer(result)) {
      return;
    }
    this.matchesAccepted++;
    this.acceptedSinceFlush++;
    if (this.acceptedSinceFlush >= config.flushEvery) {
      this.safeFlush();
    }
    if (config.stopOnCap && collector.isFull()) {
      this.halt({ state: 'completed', reason: 'result-cap' });
    }
  }

  /**
   * Moves a running session to a terminal state and stops all work.
   * Returns false when the session was not running.
   */
  private halt(stop: Stop): boolean {
    if (this._state !== 'running') {
      return false;
    }
    this.stop = stop;
    this.setState(stop.state);
    this.collector?.seal();
    this.controller.abort();
    clearTimeout(this.budgetTimer);
    return true;
  }

  private setState(to: SessionState): void {
    const from = this._state;
    this._state = to;
    this.emit('state', { from, to });
  }

  private async readGitignore(absRoot: string): Promise<string[]> {
    const file = path.join(absRoot, '.gitignore');
    try {
      return [await fs.readFile(file, 'utf8')];
    } catch (error) {
      if (errnoCode(error) !== 'ENOENT') {
        this.diagnostics.recordFsError(file, error);
      }
      return [];
    }
  }

  private progress(): SessionProgress {
    return {
      entriesScanned: this.walker?.stats.entriesEmitted ?? 0,
      directoriesRead: this.walker?.stats.directoriesRead ?? 0,
      matchesAccepted: this.matchesAccepted,
      durationMs: Date.now() - this.startedAt,
      resultCount: this.collector?.size ?? 0,
      skipped: this.diagnostics.size,
    };
  }

  private flush(): void {
    const collector = this.collector;
    if (!collector) {
      return;
    }
    this.acceptedSinceFlush = 0;
    this.flushedChanges = collector.changes;
    const results = collector.snapshot();
    const progress = this.progress();

    this.record({
      type: 'ResultsFlushed',
      payload: {
        resultCount: results.length,
        entriesScanned: progress.entriesScanned,
        topScore: results[0]?.score,
      },
    });
    this.emit('update', { results, progress });
    const onUpdate: UpdateHandler | undefined = this.handlers.onUpdate;
    onUpdate?.(results, progress);
  }

  /** A throwing `onUpdate` handler fails the session at once. */
  private safeFlush(): void {
    try {
      this.flush();
    } catch (error) {
      this.fail(error);
    }
  }

  /**
   * Fails a running session. A session that has already stopped keeps its
   * state and carries the first such error in its outcome.
   */
  private fail(error: unknown): void {
    const failure = toError(error);
    if (!this.halt({ state: 'failed', error: failure }) && this.stop) {
      this.stop.error ??= failure;
    }
  }

  private async finish(): Promise<SessionOutcome> {
    const stop = this.stop ?? { state: 'failed', error: new Error('Session ended without a result') };
    const progress = this.progress();
    const outcome: SessionOutcome = {
      state: stop.state,
      reason: stop.reason,
      error: stop.error,
      results: this.snapshot(),
      diagnostics: this.diagnostics.summary(),
      stats: {
        entriesScanned: progress.entriesScanned,
        directoriesRead: progress.directoriesRead,
        matchesAccepted: progress.matchesAccepted,
        durationMs: progress.durationMs,
      },
    };

    this.record({
      type: 'SessionFinished',
      payload: {
        state: outcome.state,
        reason: outcome.reason,
        resultCount: outcome.results.length,
        entriesScanned: outcome.stats.entriesScanned,
        skipped: outcome.diagnostics.total,
        durationMs: outcome.stats.durationMs,
        error: outcome.error
          ? {
              code: outcome.error instanceof AppError ? outcome.error.code : 'UnknownError',
              message: outcome.error.message,
            }
          : undefined,
      },
    });
    await this.logChain;

    // The outcome is final here, so handler failures are reported, not thrown.
    try {
      this.emit('complete', outcome);
    } catch (error) {
      this.reportHandlerError('complete', error);
    }
    const onComplete: CompleteHandler | undefined = this.handlers.onComplete;
    try {
      onComplete?.(outcome);
    } catch (error) {
      this.reportHandlerError('onComplete', error);
    }
    return outcome;
  }

  private reportHandlerError(handler: string, error: unknown): void {
    const message = `Search ${handler} handler failed`;
    if (this.logger) {
      void Promise.resolve(this.logger.error(toError(error), message)).catch((logError: unknown) => {
        console.error(message, error, logError);
      });
    } else {
      console.error(message, error);
    }
  }

  private record(draft: EventDraft): void {
    const logger = this.logger;
    if (!logger) {
      return;
    }
    const event: SearchEvent = {
      schemaVersion: EVENT_SCHEMA_VERSION,
      timestamp: new Date().toISOString(),
      sessionId: this.id,
      ...draft,
    };
    this.logChain = this.logChain
      .then(() => logger.log(event))
      .catch((error: unknown) => {
        console.error(`Failed to record ${draft.type} event`, error);
      });
  }
}

/**
 * Creates and starts a session in one call. Returns the running session so
 * the caller can cancel it; `onComplete` receives the outcome.
 */
export function startSearch(
  root: string,
  query: Query,
  config: SessionConfigInput,
  onUpdate?: UpdateHandler,
  onComplete?: CompleteHandler,
): SearchSession {
  const session = new SearchSession({ root, query, config });
  void session.start({ onUpdate, onComplete });
  return session;
}
