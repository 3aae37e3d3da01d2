/**
 * Seed loader: bulk pinned facts from a two-column CSV ("key","value").
 */

import fs from 'fs';
import { parse } from 'csv-parse/sync';
import { InvalidInputError } from '../errors.js';
import type { FactStore } from './fact-store.js';
import { SEED_TRUST_SCORE, type SeedRow } from './types.js';

/**
 * Normalize one CSV cell: smart quotes to plain, strip wrapping quotes,
 * "|" to "; ", collapse whitespace.
 */
export function cleanSeedCell(raw: string): string {
  let s = raw.trim()
    .replace(/[“”]/g, '"')
    .replace(/[‘’]/g, "'");

  if (s.length >= 2 && (s[0] === '"' || s[0] === "'") && s[s.length - 1] === s[0]) {
    s = s.slice(1, -1).trim();
  }

  return s.replace(/\|/g, '; ').split(/\s+/).filter(Boolean).join(' ');
}

/**
 * Parse CSV text into seed rows. Rows with fewer than two cells, empty cells
 * after cleaning, and a "key,value" header are skipped.
 */
export function parseSeedCsv(content: string): SeedRow[] {
  const records: unknown = parse(content, {
    bom: true,
    relax_column_count: true,
    relax_quotes: true,
    skip_empty_lines: true,
  });
  if (!Array.isArray(records)) return [];

  const rows: SeedRow[] = [];
  for (const record of records) {
    if (!Array.isArray(record) || record.length < 2) continue;
    const [rawKey, rawValue] = record;
    if (typeof rawKey !== 'string' || typeof rawValue !== 'string') continue;

    const key = cleanSeedCell(rawKey);
    const value = cleanSeedCell(rawValue);
    if (!key || !value) continue;
    if (key.toLowerCase() === 'key' && value.toLowerCase() === 'value') continue;

    rows.push({ key, value });
  }
  return rows;
}

export interface SeedOptions {
  /** Delete every memory before loading. */
  reset?: boolean;
  /** Non-pinned rows to keep after loading. */
  keep: number;
  score?: number;
}

export interface SeedResult {
  loaded: number;
  pruned: number;
}

export function loadSeedRows(store: FactStore, rows: readonly SeedRow[], options: SeedOptions): SeedResult {
  if (options.reset) {
    const removed = store.deleteMemories();
    console.log(`[FactStore] Seed reset removed ${removed} memories`);
  }
  const loaded = store.upsertPinnedBatch(rows, options.score ?? SEED_TRUST_SCORE);
  const pruned = store.enforceNonPinnedCap(options.keep);
  return { loaded, pruned };
}

export function loadSeedFile(store: FactStore, csvPath: string, options: SeedOptions): SeedResult {
  if (!fs.existsSync(csvPath)) {
    throw new InvalidInputError(`Seed file not found: ${csvPath}`);
  }
  const content = fs.readFileSync(csvPath, 'utf-8');
  return loadSeedRows(store, parseSeedCsv(content), options);
}
