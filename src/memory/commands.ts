/**
 * Read-only voice commands over the fact store ("list memories").
 */

import type { FactStore } from './fact-store.js';

const LIST_COMMANDS = new Set(['list memories', 'memories', 'show memories']);

export const NO_MEMORIES_REPLY = 'No memories stored yet.';

export function isListMemoriesCommand(utterance: string): boolean {
  const normalized = utterance.trim().toLowerCase().replace(/[.!?]+$/, '').replace(/\s+/g, ' ');
  return LIST_COMMANDS.has(normalized);
}

export interface ListingOptions {
  pinnedLimit?: number;
  recentLimit?: number;
}

/** Spoken listing: pinned facts first, then recent non-pinned ones. */
export function formatMemoryListing(store: FactStore, options: ListingOptions = {}): string {
  const pinned = store.getPinned(options.pinnedLimit ?? 30);
  const recent = store.getNonPinned(options.recentLimit ?? 30);
  if (pinned.length === 0 && recent.length === 0) return NO_MEMORIES_REPLY;

  const lines: string[] = [];
  if (pinned.length > 0) {
    lines.push('Pinned memories:');
    for (const m of pinned) lines.push(`- ${m.key}: ${m.value}`);
  }
  if (recent.length > 0) {
    lines.push('Recent memories:');
    for (const m of recent) lines.push(`- ${m.key}: ${m.value}`);
  }
  return lines.join('\n');
}
