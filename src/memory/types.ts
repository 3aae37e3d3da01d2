/**
 * Fact store: types.
 */

export interface Memory {
  readonly key: string;
  readonly value: string;
  readonly score: number;
  readonly pinned: boolean;
  /** Unix ms */
  readonly createdAt: number;
}

export interface SeedRow {
  key: string;
  value: string;
}

export interface FactStoreOptions {
  /** Pinned read cache lifetime; 0 disables caching. */
  pinnedCacheTtlMs?: number;
  /** Non-pinned rows kept by addNonPinned; 0 disables the cap. */
  nonPinnedCap?: number;
  clock?: () => number;
}

export const DEFAULT_PINNED_CACHE_TTL_MS = 15_000;
export const DEFAULT_NON_PINNED_CAP = 500;
/** Trust score given to seeded (hand-curated) pinned facts. */
export const SEED_TRUST_SCORE = 3.0;
