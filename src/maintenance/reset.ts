/**
 * Reset utility: wipe memories, turns and sessions (optionally the knowledge
 * base too), then compact the database file.
 */

import { compactDatabase, type Db } from '../db/database.js';
import type { DocumentIndex } from '../knowledge/document-index.js';
import type { FactStore, ResetCounts } from '../memory/fact-store.js';

export interface ResetResult extends ResetCounts {
  documents: number;
  chunks: number;
}

export function resetStorage(
  db: Db,
  facts: FactStore,
  options: { documents?: DocumentIndex } = {},
): ResetResult {
  const counts = facts.deleteAll();
  const knowledge = options.documents?.deleteAll() ?? { documents: 0, chunks: 0 };
  compactDatabase(db);
  console.log('[Storage] Reset complete, database compacted');
  return { ...counts, ...knowledge };
}
