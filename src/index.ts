/**
 * Knowledge core: public API.
 *
 * openKnowledgeCore() opens one SQLite connection and wires the fact store,
 * turn ledger and document index over it.
 */

import { loadConfig, type CoreConfig } from './config/config.js';
import { closeDatabase, openDatabase, type Db } from './db/database.js';
import { DocumentIndex } from './knowledge/document-index.js';
import { TurnLedger } from './ledger/turn-ledger.js';
import { FactStore } from './memory/fact-store.js';
import { loadPinnedContext } from './memory/prompt.js';

export interface KnowledgeCore {
  readonly config: CoreConfig;
  readonly db: Db;
  readonly facts: FactStore;
  readonly ledger: TurnLedger;
  readonly documents: DocumentIndex;
  /** Pinned facts formatted for the prompt; "" on empty set or storage failure. */
  pinnedContext(): string;
  close(): void;
}

export function openKnowledgeCore(config: CoreConfig = loadConfig(), clock: () => number = Date.now): KnowledgeCore {
  const db = openDatabase(config.storage.path);
  const facts = new FactStore(db, {
    pinnedCacheTtlMs: config.memory.pinnedCacheTtlMs,
    nonPinnedCap: config.memory.nonPinnedCap,
    clock,
  });
  const ledger = new TurnLedger(db, clock);
  const documents = new DocumentIndex(db, {
    chunkChars: config.knowledge.chunkChars,
    topK: config.knowledge.topK,
    minScore: config.knowledge.minScore,
    clock,
  });

  return {
    config,
    db,
    facts,
    ledger,
    documents,
    pinnedContext: () => loadPinnedContext(facts, config.memory.pinnedLimit),
    close: () => closeDatabase(db),
  };
}

export { loadConfig, DEFAULT_CONFIG } from './config/config.js';
export type { CoreConfig } from './config/config.js';
export { openDatabase, compactDatabase, closeDatabase } from './db/database.js';
export type { Db } from './db/database.js';
export {
  KnowledgeCoreError,
  InvalidInputError,
  StorageError,
  ConfigurationError,
} from './errors.js';
export type { KnowledgeCoreErrorCode } from './errors.js';
export { FactStore } from './memory/fact-store.js';
export type { ResetCounts } from './memory/fact-store.js';
export { PinnedCache } from './memory/pinned-cache.js';
export { buildPinnedContext, loadPinnedContext, assemblePrompt, PINNED_CONTEXT_HEADER } from './memory/prompt.js';
export { isListMemoriesCommand, formatMemoryListing, NO_MEMORIES_REPLY } from './memory/commands.js';
export { captureFacts, dedupeCandidates } from './memory/extractor.js';
export type { FactCandidate, FactExtractor, CaptureOptions } from './memory/extractor.js';
export { parseSeedCsv, cleanSeedCell, loadSeedFile, loadSeedRows } from './memory/seed.js';
export type { SeedOptions, SeedResult } from './memory/seed.js';
export type { Memory, SeedRow, FactStoreOptions } from './memory/types.js';
export { SEED_TRUST_SCORE } from './memory/types.js';
export { TurnLedger } from './ledger/turn-ledger.js';
export type { Turn, TurnRole, TurnLatencies, Session } from './ledger/turn-ledger.js';
export { DocumentIndex } from './knowledge/document-index.js';
export type { RetrievedChunk, IndexStatus, KnowledgeDocument, DocumentIndexOptions } from './knowledge/document-index.js';
export { Bm25Index, DEFAULT_BM25_PARAMS } from './knowledge/bm25.js';
export type { Bm25Params } from './knowledge/bm25.js';
export { chunkText, splitParagraphs } from './knowledge/chunking.js';
export { tokenize } from './knowledge/tokenize.js';
export { resetStorage } from './maintenance/reset.js';
export type { ResetResult } from './maintenance/reset.js';
