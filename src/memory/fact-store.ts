/**
 * FactStore: durable key/value memories.
 *
 * Pinned facts are trusted and never evicted; non-pinned facts are capped
 * (oldest first). One row per (key, pinned). Pinned reads go through a TTL
 * cache that every write invalidates before returning.
 */

import type { Db } from '../db/database.js';
import type { MemoryRow } from '../db/types.js';
import { withStorage } from '../errors.js';
import { PinnedCache } from './pinned-cache.js';
import { assertCount, normalizeMemoryInput, normalizeSeedRows } from './validation.js';
import {
  DEFAULT_NON_PINNED_CAP,
  DEFAULT_PINNED_CACHE_TTL_MS,
  SEED_TRUST_SCORE,
  type FactStoreOptions,
  type Memory,
  type SeedRow,
} from './types.js';

const DEFAULT_PINNED_LIMIT = 50;
const DEFAULT_LIST_LIMIT = 200;

function toMemory(row: MemoryRow): Memory {
  return {
    key: row.key,
    value: row.value,
    score: row.score,
    pinned: row.pinned === 1,
    createdAt: row.created_at,
  };
}

export interface ResetCounts {
  memories: number;
  turns: number;
  sessions: number;
}

export class FactStore {
  private readonly cache: PinnedCache;
  private readonly nonPinnedCap: number;
  private readonly clock: () => number;

  constructor(
    private readonly db: Db,
    options: FactStoreOptions = {},
  ) {
    this.clock = options.clock ?? Date.now;
    this.cache = new PinnedCache(options.pinnedCacheTtlMs ?? DEFAULT_PINNED_CACHE_TTL_MS, this.clock);
    this.nonPinnedCap = options.nonPinnedCap ?? DEFAULT_NON_PINNED_CAP;
    assertCount('nonPinnedCap', this.nonPinnedCap);
  }

  /**
   * Insert or overwrite the (key, pinned) row. The rewritten row becomes the newest.
   */
  upsert(key: string, value: string, score: number = 1.0, pinned: boolean = false): Memory {
    const input = normalizeMemoryInput(key, value, score);
    const createdAt = this.clock();

    withStorage('upsert memory', () => {
      const write = this.db.transaction(() => {
        this.writeRow(input.key, input.value, input.score, pinned, createdAt);
        this.cache.invalidate();
      });
      write();
    });

    return { ...input, pinned, createdAt };
  }

  pin(key: string, value: string, score: number = 1.0): Memory {
    return this.upsert(key, value, score, true);
  }

  /**
   * Non-pinned upsert followed by cap enforcement. If enforcement fails the
   * write stays and the StorageError propagates.
   */
  addNonPinned(key: string, value: string, score: number = 1.0): Memory {
    const memory = this.upsert(key, value, score, false);
    if (this.nonPinnedCap > 0) {
      this.enforceNonPinnedCap(this.nonPinnedCap);
    }
    return memory;
  }

  /**
   * Delete the oldest non-pinned rows beyond maxCount. Returns rows deleted.
   */
  enforceNonPinnedCap(maxCount: number): number {
    assertCount('maxCount', maxCount);

    const deleted = withStorage('enforce non-pinned cap', () => {
      const result = this.db.prepare(`
        DELETE FROM memories
        WHERE pinned = 0
          AND id NOT IN (
            SELECT id FROM memories
            WHERE pinned = 0
            ORDER BY created_at DESC, id DESC
            LIMIT ?
          )
      `).run(maxCount);
      this.cache.invalidate();
      return result.changes;
    });

    if (deleted > 0) {
      console.log(`[FactStore] Evicted ${deleted} non-pinned memor${deleted === 1 ? 'y' : 'ies'} (cap=${maxCount})`);
    }
    return deleted;
  }

  /**
   * Pinned memories, oldest first, at most `limit`. Served from the cache
   * while it is fresh; callers get copies, never the cached rows.
   */
  getPinned(limit: number = DEFAULT_PINNED_LIMIT): Memory[] {
    assertCount('limit', limit);

    let rows = this.cache.get();
    if (rows === null) {
      const fresh = withStorage('read pinned memories', () =>
        (this.db.prepare(`
          SELECT id, key, value, score, pinned, created_at
          FROM memories
          WHERE pinned = 1
          ORDER BY created_at ASC, id ASC
        `).all() as MemoryRow[]).map(toMemory),
      );
      this.cache.set(fresh);
      rows = fresh;
    }
    return rows.slice(0, limit).map((m) => ({ ...m }));
  }

  /** Non-pinned memories, newest first. */
  getNonPinned(limit: number = DEFAULT_LIST_LIMIT): Memory[] {
    assertCount('limit', limit);
    return withStorage('read non-pinned memories', () =>
      (this.db.prepare(`
        SELECT id, key, value, score, pinned, created_at
        FROM memories
        WHERE pinned = 0
        ORDER BY created_at DESC, id DESC
        LIMIT ?
      `).all(limit) as MemoryRow[]).map(toMemory),
    );
  }

  /** Every memory: pinned first, then newest first. */
  getMemories(limit: number = DEFAULT_LIST_LIMIT): Memory[] {
    assertCount('limit', limit);
    return withStorage('read memories', () =>
      (this.db.prepare(`
        SELECT id, key, value, score, pinned, created_at
        FROM memories
        ORDER BY pinned DESC, created_at DESC, id DESC
        LIMIT ?
      `).all(limit) as MemoryRow[]).map(toMemory),
    );
  }

  count(filter: { pinned?: boolean } = {}): number {
    return withStorage('count memories', () => {
      const row = filter.pinned === undefined
        ? this.db.prepare('SELECT COUNT(*) AS count FROM memories').get()
        : this.db.prepare('SELECT COUNT(*) AS count FROM memories WHERE pinned = ?').get(filter.pinned ? 1 : 0);
      return (row as { count: number }).count;
    });
  }

  /** Remove the pinned row for `key`. */
  unpin(key: string): boolean {
    const changes = withStorage('unpin memory', () => {
      const result = this.db.prepare('DELETE FROM memories WHERE key = ? AND pinned = 1').run(key.trim());
      this.cache.invalidate();
      return result.changes;
    });
    return changes > 0;
  }

  /** Remove both pinned and non-pinned rows for `key`. */
  forget(key: string): number {
    return withStorage('forget memory', () => {
      const result = this.db.prepare('DELETE FROM memories WHERE key = ?').run(key.trim());
      this.cache.invalidate();
      return result.changes;
    });
  }

  /**
   * Seed path: upsert all rows as pinned in one transaction. Every row is
   * validated before anything is written. Rows share one timestamp, so
   * insertion order is their order.
   */
  upsertPinnedBatch(rows: readonly SeedRow[], score: number = SEED_TRUST_SCORE): number {
    const inputs = normalizeSeedRows(rows, score);
    const createdAt = this.clock();

    withStorage('seed pinned memories', () => {
      const write = this.db.transaction(() => {
        for (const input of inputs) {
          this.writeRow(input.key, input.value, input.score, true, createdAt);
        }
        this.cache.invalidate();
      });
      write();
    });
    return inputs.length;
  }

  /** Delete memories only (seed loader --reset). */
  deleteMemories(): number {
    return withStorage('delete memories', () => {
      const result = this.db.prepare('DELETE FROM memories').run();
      this.cache.invalidate();
      return result.changes;
    });
  }

  /** Irreversibly clear memories, turns and sessions. */
  deleteAll(): ResetCounts {
    const counts = withStorage('delete all', () => {
      const wipe = this.db.transaction((): ResetCounts => {
        const turns = this.db.prepare('DELETE FROM turns').run().changes;
        const sessions = this.db.prepare('DELETE FROM sessions').run().changes;
        const memories = this.db.prepare('DELETE FROM memories').run().changes;
        this.cache.invalidate();
        return { memories, turns, sessions };
      });
      return wipe();
    });
    console.log(`[FactStore] Cleared ${counts.memories} memories, ${counts.turns} turns, ${counts.sessions} sessions`);
    return counts;
  }

  /** Last pinned-cache refresh (Unix ms), 0 when cold. */
  get pinnedCacheRefreshedAt(): number {
    return this.cache.lastRefreshAt;
  }

  // Delete + insert rather than ON CONFLICT UPDATE so the row gets a fresh id
  // and sorts as newest among rows sharing a timestamp.
  private writeRow(key: string, value: string, score: number, pinned: boolean, createdAt: number): void {
    const flag = pinned ? 1 : 0;
    this.db.prepare('DELETE FROM memories WHERE key = ? AND pinned = ?').run(key, flag);
    this.db.prepare(`
      INSERT INTO memories (key, value, score, pinned, created_at)
      VALUES (?, ?, ?, ?, ?)
    `).run(key, value, score, flag, createdAt);
  }
}
