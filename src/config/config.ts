import dotenv from 'dotenv';
import { ConfigurationError } from '../errors.js';

dotenv.config();

export interface CoreConfig {
  storage: {
    /** SQLite file path, or ':memory:' */
    path: string;
  };
  memory: {
    pinnedCacheTtlMs: number;
    nonPinnedCap: number;
    /** How many pinned facts the conversation loop injects per turn. */
    pinnedLimit: number;
  };
  knowledge: {
    chunkChars: number;
    topK: number;
    minScore: number;
  };
}

export const DEFAULT_CONFIG: CoreConfig = {
  storage: { path: 'data/knowledge.db' },
  memory: { pinnedCacheTtlMs: 15_000, nonPinnedCap: 500, pinnedLimit: 50 },
  knowledge: { chunkChars: 1200, topK: 5, minScore: 0 },
};

type Env = Record<string, string | undefined>;

function getEnvValue(env: Env, key: string, defaultValue: string): string {
  const value = env[key]?.trim();
  return value ? value : defaultValue;
}

function parseNumber(env: Env, key: string, defaultValue: number, opts: { integer?: boolean; min?: number } = {}): number {
  const raw = getEnvValue(env, key, String(defaultValue));
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigurationError(`${key} must be a number, got "${raw}"`);
  }
  if (opts.integer && !Number.isInteger(value)) {
    throw new ConfigurationError(`${key} must be an integer, got "${raw}"`);
  }
  if (opts.min !== undefined && value < opts.min) {
    throw new ConfigurationError(`${key} must be >= ${opts.min}, got "${raw}"`);
  }
  return value;
}

/**
 * Build the configuration from environment variables (.env is loaded on import).
 * Throws ConfigurationError on malformed values.
 */
export function loadConfig(env: Env = process.env): CoreConfig {
  const ttlSeconds = parseNumber(env, 'MEMORY_PINNED_CACHE_TTL_S', DEFAULT_CONFIG.memory.pinnedCacheTtlMs / 1000, { min: 0 });

  return {
    storage: {
      path: getEnvValue(env, 'KNOWLEDGE_DB_PATH', DEFAULT_CONFIG.storage.path),
    },
    memory: {
      pinnedCacheTtlMs: Math.round(ttlSeconds * 1000),
      nonPinnedCap: parseNumber(env, 'MEMORY_NON_PINNED_CAP', DEFAULT_CONFIG.memory.nonPinnedCap, { integer: true, min: 0 }),
      pinnedLimit: parseNumber(env, 'MEMORY_PINNED_LIMIT', DEFAULT_CONFIG.memory.pinnedLimit, { integer: true, min: 0 }),
    },
    knowledge: {
      chunkChars: parseNumber(env, 'KNOWLEDGE_CHUNK_CHARS', DEFAULT_CONFIG.knowledge.chunkChars, { integer: true, min: 1 }),
      topK: parseNumber(env, 'RETRIEVAL_TOP_K', DEFAULT_CONFIG.knowledge.topK, { integer: true, min: 0 }),
      minScore: parseNumber(env, 'RETRIEVAL_MIN_SCORE', DEFAULT_CONFIG.knowledge.minScore),
    },
  };
}
