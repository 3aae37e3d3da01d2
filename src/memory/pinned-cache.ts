/**
 * pinned-cache.ts: TTL cache for the pinned-facts hot path.
 *
 * Pinned facts are read every turn and written rarely. Entries expire after
 * `ttlMs`; every write path calls invalidate() before returning.
 */

import type { Memory } from './types.js';

export class PinnedCache {
  private rows: readonly Memory[] | null = null;
  private refreshedAt = 0;

  constructor(
    private readonly ttlMs: number,
    private readonly clock: () => number = Date.now,
  ) {}

  /** Cached rows, or null when empty or expired. */
  get(): readonly Memory[] | null {
    if (this.rows === null || this.ttlMs <= 0) return null;
    if (this.clock() - this.refreshedAt > this.ttlMs) {
      this.invalidate();
      return null;
    }
    return this.rows;
  }

  set(rows: readonly Memory[]): void {
    if (this.ttlMs <= 0) return;
    this.rows = rows;
    this.refreshedAt = this.clock();
  }

  invalidate(): void {
    this.rows = null;
    this.refreshedAt = 0;
  }

  /** Unix ms of the last refresh, 0 when nothing is cached. */
  get lastRefreshAt(): number {
    return this.refreshedAt;
  }
}
