/**
 * TurnLedger: sessions and the append-only conversation log with stage latencies.
 */

import { randomUUID } from 'crypto';
import type { Db } from '../db/database.js';
import type { SessionRow, TurnRow } from '../db/types.js';
import { InvalidInputError, withStorage } from '../errors.js';

export type TurnRole = 'user' | 'assistant';

export interface TurnLatencies {
  asrMs?: number;
  llmMs?: number;
  ttsMs?: number;
  /** Defaults to asr + llm + tts. */
  totalMs?: number;
}

export interface Turn {
  id: number;
  sessionId: string;
  role: TurnRole;
  text: string;
  asrLatencyMs: number;
  llmLatencyMs: number;
  ttsLatencyMs: number;
  totalLatencyMs: number;
  metadata: Record<string, unknown>;
  createdAt: number;
}

export interface Session {
  id: string;
  startedAt: number;
  metadata: Record<string, unknown>;
}

const ROLES: readonly TurnRole[] = ['user', 'assistant'];

function isTurnRole(value: string): value is TurnRole {
  return ROLES.some((role) => role === value);
}

function parseMetadata(json: string | null): Record<string, unknown> {
  if (!json) return {};
  try {
    const parsed: unknown = JSON.parse(json);
    if (parsed && typeof parsed === 'object' && !Array.isArray(parsed)) {
      return { ...parsed };
    }
  } catch (err) {
    console.warn(`[Ledger] Unreadable metadata ignored: ${err instanceof Error ? err.message : String(err)}`);
  }
  return {};
}

function toTurn(row: TurnRow): Turn {
  return {
    id: row.id,
    sessionId: row.session_id,
    role: isTurnRole(row.role) ? row.role : 'user',
    text: row.text,
    asrLatencyMs: row.asr_latency_ms,
    llmLatencyMs: row.llm_latency_ms,
    ttsLatencyMs: row.tts_latency_ms,
    totalLatencyMs: row.total_latency_ms,
    metadata: parseMetadata(row.metadata_json),
    createdAt: row.created_at,
  };
}

function latency(name: string, value: number | undefined): number {
  if (value === undefined) return 0;
  if (!Number.isFinite(value) || value < 0) {
    throw new InvalidInputError(`${name} latency must be a finite number >= 0, got ${String(value)}`);
  }
  return Math.round(value);
}

export class TurnLedger {
  constructor(
    private readonly db: Db,
    private readonly clock: () => number = Date.now,
  ) {}

  /** Create a session, or replace the metadata of an existing one. Returns its id. */
  startSession(id: string = randomUUID(), metadata: Record<string, unknown> = {}): string {
    const sessionId = id.trim();
    if (!sessionId) throw new InvalidInputError('Session id must be non-empty');

    withStorage('start session', () => {
      this.db.prepare(`
        INSERT INTO sessions (id, started_at, metadata_json)
        VALUES (?, ?, ?)
        ON CONFLICT(id) DO UPDATE SET metadata_json = excluded.metadata_json
      `).run(sessionId, this.clock(), JSON.stringify(metadata));
    });
    console.log(`[Ledger] Session ${sessionId} started`);
    return sessionId;
  }

  getSession(id: string): Session | null {
    const row = withStorage('read session', () =>
      this.db.prepare('SELECT id, started_at, metadata_json FROM sessions WHERE id = ?').get(id) as SessionRow | undefined,
    );
    if (!row) return null;
    return { id: row.id, startedAt: row.started_at, metadata: parseMetadata(row.metadata_json) };
  }

  /**
   * Append one turn. The session row is created on demand.
   */
  addTurn(
    sessionId: string,
    role: TurnRole,
    text: string,
    latencies: TurnLatencies = {},
    metadata: Record<string, unknown> = {},
  ): Turn {
    const sid = sessionId.trim();
    if (!sid) throw new InvalidInputError('Session id must be non-empty');
    if (!isTurnRole(role)) throw new InvalidInputError(`Unknown turn role "${String(role)}"`);
    if (typeof text !== 'string') throw new InvalidInputError('Turn text must be a string');

    const asr = latency('asr', latencies.asrMs);
    const llm = latency('llm', latencies.llmMs);
    const tts = latency('tts', latencies.ttsMs);
    const total = latencies.totalMs === undefined ? asr + llm + tts : latency('total', latencies.totalMs);
    const createdAt = this.clock();
    const metadataJson = JSON.stringify(metadata);

    const id = withStorage('append turn', () => {
      const append = this.db.transaction(() => {
        this.db.prepare(`
          INSERT INTO sessions (id, started_at, metadata_json)
          VALUES (?, ?, '{}')
          ON CONFLICT(id) DO NOTHING
        `).run(sid, createdAt);
        const result = this.db.prepare(`
          INSERT INTO turns (session_id, role, text, asr_latency_ms, llm_latency_ms, tts_latency_ms, total_latency_ms, metadata_json, created_at)
          VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
        `).run(sid, role, text, asr, llm, tts, total, metadataJson, createdAt);
        return Number(result.lastInsertRowid);
      });
      return append();
    });

    return {
      id,
      sessionId: sid,
      role,
      text,
      asrLatencyMs: asr,
      llmLatencyMs: llm,
      ttsLatencyMs: tts,
      totalLatencyMs: total,
      metadata: { ...metadata },
      createdAt,
    };
  }

  /** All turns of a session in insertion order. */
  getSessionTurns(sessionId: string): Turn[] {
    return withStorage('read session turns', () =>
      (this.db.prepare(`
        SELECT * FROM turns
        WHERE session_id = ?
        ORDER BY id ASC
      `).all(sessionId) as TurnRow[]).map(toTurn),
    );
  }

  /** Last `limit` turns of a session, oldest first. */
  getRecentTurns(sessionId: string, limit: number = 6): Turn[] {
    if (!Number.isInteger(limit) || limit < 0) {
      throw new InvalidInputError(`limit must be a non-negative integer, got ${String(limit)}`);
    }
    const rows = withStorage('read recent turns', () =>
      this.db.prepare(`
        SELECT * FROM turns
        WHERE session_id = ?
        ORDER BY id DESC
        LIMIT ?
      `).all(sessionId, limit) as TurnRow[],
    );
    return rows.reverse().map(toTurn);
  }
}
