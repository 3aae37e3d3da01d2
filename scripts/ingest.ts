/**
 * Ingest text files into the knowledge base and rebuild the index.
 *
 *   npx tsx scripts/ingest.ts notes.txt manual.md [--db data/knowledge.db] [--query "how do I reset"]
 */

import fs from 'fs';
import path from 'path';
import { loadConfig } from '../src/config/config.js';
import { closeDatabase, openDatabase } from '../src/db/database.js';
import { KnowledgeCoreError } from '../src/errors.js';
import { DocumentIndex } from '../src/knowledge/document-index.js';
import { readFlag } from './args.js';

function main(): number {
  const args = process.argv.slice(2);
  const config = loadConfig();
  const dbPath = readFlag(args, '--db') ?? config.storage.path;
  const query = readFlag(args, '--query');

  if (args.length === 0) {
    console.error('Usage: ingest <file...> [--db path] [--query text]');
    return 2;
  }

  const db = openDatabase(dbPath);
  try {
    const index = new DocumentIndex(db, {
      chunkChars: config.knowledge.chunkChars,
      topK: config.knowledge.topK,
      minScore: config.knowledge.minScore,
    });

    for (const file of args) {
      const text = fs.readFileSync(file, 'utf-8');
      index.ingestText(file, text, { title: path.basename(file) });
    }
    index.rebuildIndex();

    if (query) {
      for (const hit of index.retrieve(query)) {
        console.log(`${hit.score.toFixed(3)}  ${hit.source}#${hit.sequenceNo}  ${hit.text.slice(0, 120).replace(/\s+/g, ' ')}`);
      }
    }
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
