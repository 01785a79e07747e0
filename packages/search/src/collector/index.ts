import type { MatchResult } from '../types';
import { BoundedHeap } from './heap';

export { BoundedHeap } from './heap';

/**
 * Ranking order: score descending, then shallower entries, then path.
 * Negative when `a` ranks ahead of `b`.
 */
export function compareResults(a: MatchResult, b: MatchResult): number {
  if (a.score !== b.score) {
    return b.score - a.score;
  }
  if (a.entry.depth !== b.entry.depth) {
    return a.entry.depth - b.entry.depth;
  }
  if (a.entry.path < b.entry.path) return -1;
  if (a.entry.path > b.entry.path) return 1;
  return 0;
}

/**
 * Bounded set of the best results seen so far.
 *
 * Once `maxResults` results are held, a new one gets in only by ranking ahead
 * of the current worst, which is evicted. A path is held at most once.
 * `offer` never suspends, so concurrent workers on the event loop cannot
 * interleave inside it.
 */
export class ResultCollector {
  private readonly heap: BoundedHeap<MatchResult>;
  private readonly paths = new Set<string>();
  private sealed = false;
  private version = 0;

  constructor(readonly maxResults: number) {
    if (!Number.isInteger(maxResults) || maxResults <= 0) {
      throw new RangeError(`maxResults must be a positive integer, got ${maxResults}`);
    }
    this.heap = new BoundedHeap(maxResults, compareResults);
  }

  get size(): number {
    return this.heap.size;
  }

  /** Bumped on every accepted offer; lets callers skip unchanged flushes. */
  get changes(): number {
    return this.version;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  isFull(): boolean {
    return this.heap.isFull();
  }

  /** Returns true when the result is now held. */
  offer(result: MatchResult): boolean {
    if (this.sealed || this.paths.has(result.entry.path)) {
      return false;
    }
    const evicted = this.heap.push(result);
    if (evicted === result) {
      return false;
    }
    if (evicted) {
      this.paths.delete(evicted.entry.path);
    }
    this.paths.add(result.entry.path);
    this.version++;
    return true;
  }

  /** Rejects every later offer. */
  seal(): void {
    this.sealed = true;
  }

  /** Held results in ranking order, as a frozen copy. */
  snapshot(): readonly MatchResult[] {
    return Object.freeze(this.heap.toSortedArray());
  }
}
