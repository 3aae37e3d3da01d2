/**
 * Wipe memories, turns and sessions and compact the database.
 *
 *   npx tsx scripts/reset.ts [--db data/knowledge.db] [--knowledge]
 *
 * --knowledge also removes every ingested document.
 */

import { loadConfig } from '../src/config/config.js';
import { closeDatabase, openDatabase } from '../src/db/database.js';
import { KnowledgeCoreError } from '../src/errors.js';
import { DocumentIndex } from '../src/knowledge/document-index.js';
import { resetStorage } from '../src/maintenance/reset.js';
import { FactStore } from '../src/memory/fact-store.js';
import { readFlag, readSwitch } from './args.js';

function main(): number {
  const args = process.argv.slice(2);
  const dbPath = readFlag(args, '--db') ?? loadConfig().storage.path;
  const withKnowledge = readSwitch(args, '--knowledge');
  if (args.length > 0) {
    console.error(`Unexpected arguments: ${args.join(' ')}`);
    console.error('Usage: reset [--db path] [--knowledge]');
    return 2;
  }

  const db = openDatabase(dbPath);
  try {
    const result = resetStorage(db, new FactStore(db), {
      documents: withKnowledge ? new DocumentIndex(db) : undefined,
    });
    console.log(
      `Removed ${result.memories} memories, ${result.turns} turns, ${result.sessions} sessions` +
        (withKnowledge ? `, ${result.documents} documents (${result.chunks} chunks)` : ''),
    );
    return 0;
  } finally {
    closeDatabase(db);
  }
}

try {
  process.exitCode = main();
} catch (err) {
  if (err instanceof KnowledgeCoreError) {
    console.error(`ERROR [${err.code}]: ${err.message}`);
    process.exitCode = 2;
  } else {
    console.error(err);
    process.exitCode = 1;
  }
}
