/**
 * DocumentIndex: chunked text in SQLite plus an in-memory BM25 snapshot.
 *
 * The snapshot is rebuilt from every persisted chunk on demand and published
 * by reference swap; retrieve() captures the reference once, so a concurrent
 * rebuild is seen either fully or not at all. Ingestion marks the snapshot
 * stale until the next rebuild.
 */

import { randomUUID } from 'crypto';
import type { Db } from '../db/database.js';
import type { ChunkRow, DocumentRow } from '../db/types.js';
import { InvalidInputError, withStorage } from '../errors.js';
import { Bm25Index, DEFAULT_BM25_PARAMS, type Bm25Params } from './bm25.js';
import { chunkText, DEFAULT_MAX_CHARS } from './chunking.js';
import { tokenize } from './tokenize.js';

export interface DocumentIndexOptions {
  chunkChars?: number;
  topK?: number;
  minScore?: number;
  bm25?: Bm25Params;
  clock?: () => number;
}

export interface RetrievedChunk {
  text: string;
  score: number;
  documentId: string;
  source: string;
  sequenceNo: number;
}

export interface KnowledgeDocument {
  id: string;
  source: string;
  title: string | null;
  createdAt: number;
}

export interface IndexStatus {
  built: boolean;
  /** A chunk was ingested after the last rebuild (or nothing was built yet). */
  stale: boolean;
  chunkCount: number;
  builtAt: number | null;
}

interface IndexedChunk {
  documentId: string;
  source: string;
  sequenceNo: number;
  text: string;
}

interface Snapshot {
  readonly bm25: Bm25Index;
  readonly chunks: readonly IndexedChunk[];
  readonly builtAt: number;
}

export class DocumentIndex {
  private snapshot: Snapshot | null = null;
  private stale = true;
  private readonly chunkChars: number;
  private readonly topK: number;
  private readonly minScore: number;
  private readonly bm25Params: Bm25Params;
  private readonly clock: () => number;

  constructor(
    private readonly db: Db,
    options: DocumentIndexOptions = {},
  ) {
    this.chunkChars = options.chunkChars ?? DEFAULT_MAX_CHARS;
    if (!Number.isInteger(this.chunkChars) || this.chunkChars < 1) {
      throw new InvalidInputError(`chunkChars must be a positive integer, got ${String(this.chunkChars)}`);
    }
    this.topK = options.topK ?? 5;
    this.minScore = options.minScore ?? 0;
    this.bm25Params = options.bm25 ?? DEFAULT_BM25_PARAMS;
    this.clock = options.clock ?? Date.now;
  }

  /**
   * Chunk and persist `text` as a new document. Returns the document id.
   * Retrieval does not see it until rebuildIndex().
   */
  ingestText(source: string, text: string, options: { title?: string } = {}): string {
    const label = source.trim();
    if (!label) throw new InvalidInputError('Document source must be non-empty');
    const chunks = chunkText(text, this.chunkChars);
    if (chunks.length === 0) throw new InvalidInputError(`Document "${label}" has no text`);

    const id = randomUUID();
    const createdAt = this.clock();

    withStorage('ingest document', () => {
      const insert = this.db.transaction(() => {
        this.db.prepare('INSERT INTO documents (id, source, title, created_at) VALUES (?, ?, ?, ?)')
          .run(id, label, options.title ?? null, createdAt);
        const stmt = this.db.prepare('INSERT INTO chunks (document_id, sequence_no, text) VALUES (?, ?, ?)');
        chunks.forEach((chunk, seq) => stmt.run(id, seq, chunk));
      });
      insert();
    });

    this.stale = true;
    const oversized = chunks.filter((c) => c.length > this.chunkChars).length;
    console.log(
      `[Knowledge] Ingested "${label}" as ${id}: ${chunks.length} chunk(s)` +
        (oversized ? `, ${oversized} oversized paragraph(s)` : ''),
    );
    return id;
  }

  /** Rebuild the ranking snapshot from every persisted chunk. */
  rebuildIndex(): { chunkCount: number; builtAt: number } {
    const rows = withStorage('load chunks', () =>
      this.db.prepare(`
        SELECT c.document_id, c.sequence_no, c.text, d.source
        FROM chunks c
        JOIN documents d ON d.id = c.document_id
        ORDER BY c.id ASC
      `).all() as Array<Pick<ChunkRow, 'document_id' | 'sequence_no' | 'text'> & { source: string }>,
    );

    const chunks: IndexedChunk[] = rows.map((r) => ({
      documentId: r.document_id,
      source: r.source,
      sequenceNo: r.sequence_no,
      text: r.text,
    }));
    const next: Snapshot = {
      bm25: Bm25Index.fromTexts(chunks.map((c) => c.text), this.bm25Params),
      chunks,
      builtAt: this.clock(),
    };

    this.snapshot = next;
    this.stale = false;
    console.log(`[Knowledge] Index rebuilt: ${chunks.length} chunk(s)`);
    return { chunkCount: chunks.length, builtAt: next.builtAt };
  }

  /**
   * Top `k` chunks by BM25 score, ties by sequence number then corpus order.
   * Chunks scoring below `minScore` or matching no query term are dropped.
   * An unbuilt or empty index yields [].
   */
  retrieve(query: string, k: number = this.topK, minScore: number = this.minScore): RetrievedChunk[] {
    if (!Number.isInteger(k) || k < 0) {
      throw new InvalidInputError(`k must be a non-negative integer, got ${String(k)}`);
    }
    if (!Number.isFinite(minScore)) {
      throw new InvalidInputError(`minScore must be a finite number, got ${String(minScore)}`);
    }

    const snapshot = this.snapshot;
    if (!snapshot || snapshot.chunks.length === 0 || k === 0) return [];
    const queryTokens = tokenize(query);
    if (queryTokens.length === 0) return [];

    const scores = snapshot.bm25.scores(queryTokens);
    const ranked: Array<{ pos: number; score: number }> = [];
    scores.forEach((score, pos) => {
      if (score > 0 && score >= minScore) ranked.push({ pos, score });
    });

    ranked.sort((a, b) => {
      if (b.score !== a.score) return b.score - a.score;
      const seqA = snapshot.chunks[a.pos]?.sequenceNo ?? 0;
      const seqB = snapshot.chunks[b.pos]?.sequenceNo ?? 0;
      return seqA - seqB || a.pos - b.pos;
    });

    const results: RetrievedChunk[] = [];
    for (const { pos, score } of ranked.slice(0, k)) {
      const chunk = snapshot.chunks[pos];
      if (chunk) results.push({ ...chunk, score });
    }
    return results;
  }

  indexStatus(): IndexStatus {
    const snapshot = this.snapshot;
    return {
      built: snapshot !== null,
      stale: this.stale,
      chunkCount: snapshot?.chunks.length ?? 0,
      builtAt: snapshot?.builtAt ?? null,
    };
  }

  listDocuments(): KnowledgeDocument[] {
    return withStorage('list documents', () =>
      (this.db.prepare('SELECT id, source, title, created_at FROM documents ORDER BY created_at ASC, rowid ASC').all() as DocumentRow[])
        .map((r) => ({ id: r.id, source: r.source, title: r.title, createdAt: r.created_at })),
    );
  }

  /** Chunk texts of one document in sequence order. */
  getDocumentChunks(documentId: string): string[] {
    return withStorage('read document chunks', () =>
      (this.db.prepare('SELECT text FROM chunks WHERE document_id = ? ORDER BY sequence_no ASC').all(documentId) as Array<{ text: string }>)
        .map((r) => r.text),
    );
  }

  /** Remove every document and chunk and drop the snapshot. */
  deleteAll(): { documents: number; chunks: number } {
    const counts = withStorage('delete documents', () => {
      const wipe = this.db.transaction(() => {
        const chunks = this.db.prepare('DELETE FROM chunks').run().changes;
        const documents = this.db.prepare('DELETE FROM documents').run().changes;
        return { documents, chunks };
      });
      return wipe();
    });
    this.snapshot = null;
    this.stale = true;
    console.log(`[Knowledge] Cleared ${counts.documents} document(s), ${counts.chunks} chunk(s)`);
    return counts;
  }
}
