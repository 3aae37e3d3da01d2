/**
 * Fact extractor contract.
 *
 * Extraction (rules, a model, anything else) lives outside the core; it only
 * maps an utterance to candidate facts. captureFacts() is the single write path
 * from candidates into the store.
 */

import type { FactStore } from './fact-store.js';

export interface FactCandidate {
  key: string;
  value: string;
  /** 0..1, stored as the memory score */
  confidence: number;
}

export interface FactExtractor {
  extract(utterance: string): FactCandidate[];
}

export interface CaptureOptions {
  /** Store candidates as pinned (trusted) facts instead of capped ones. */
  pinned?: boolean;
}

/** Trim, drop empties and repeated (key, value) pairs, keeping first occurrence. */
export function dedupeCandidates(candidates: readonly FactCandidate[]): FactCandidate[] {
  const seen = new Set<string>();
  const out: FactCandidate[] = [];
  for (const c of candidates) {
    const key = c.key.trim();
    const value = c.value.trim();
    if (!key || !value) continue;
    const id = `${key}\u0000${value}`;
    if (seen.has(id)) continue;
    seen.add(id);
    out.push({ key, value, confidence: c.confidence });
  }
  return out;
}

/**
 * Run the extractor and write its candidates. Non-pinned writes go through
 * addNonPinned, so cap enforcement follows every one of them.
 */
export function captureFacts(
  extractor: FactExtractor,
  store: FactStore,
  utterance: string,
  options: CaptureOptions = {},
): FactCandidate[] {
  if (!utterance.trim()) return [];
  const candidates = dedupeCandidates(extractor.extract(utterance));

  for (const c of candidates) {
    const score = Number.isFinite(c.confidence) ? Math.max(0, c.confidence) : 0;
    if (options.pinned) {
      store.upsert(c.key, c.value, score, true);
    } else {
      store.addNonPinned(c.key, c.value, score);
    }
  }

  if (candidates.length > 0) {
    console.log(`[FactStore] Captured ${candidates.length} fact(s): ${candidates.map((c) => c.key).join(', ')}`);
  }
  return candidates;
}
