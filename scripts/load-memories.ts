/**
 * Load pinned memories from a CSV ("key","value") into the knowledge database.
 *
 *   npx tsx scripts/load-memories.ts seed/memories.example.csv [--db data/knowledge.db] [--keep 500] [--reset]
 */

import { loadConfig } from '../src/config/config.js';
import { closeDatabase, openDatabase } from '../src/db/database.js';
import { KnowledgeCoreError } from '../src/errors.js';
import { FactStore } from '../src/memory/fact-store.js';
import { loadSeedFile } from '../src/memory/seed.js';
import { readFlag, readSwitch } from './args.js';

function main(): number {
  const args = process.argv.slice(2);
  const config = loadConfig();

  const dbPath = readFlag(args, '--db') ?? config.storage.path;
  const keepRaw = readFlag(args, '--keep');
  const keep = keepRaw === undefined ? config.memory.nonPinnedCap : Number(keepRaw);
  const reset = readSwitch(args, '--reset');

  const csvPath = args[0];
  if (!csvPath) {
    console.error('Usage: load-memories <csv> [--db path] [--keep N] [--reset]');
    return 2;
  }
  if (!Number.isInteger(keep) || keep < 0) {
    console.error(`--keep must be a non-negative integer, got "${keepRaw ?? ''}"`);
    return 2;
  }

  const db = openDatabase(dbPath);
  try {
    const store = new FactStore(db, { nonPinnedCap: keep });
    const { loaded, pruned } = loadSeedFile(store, csvPath, { reset, keep });
    console.log(`Loaded/updated pinned memories: ${loaded}`);
    console.log(`Pruned non-pinned to latest: ${keep} (deleted ${pruned})`);
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
