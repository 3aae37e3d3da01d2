/**
 * Pinned-facts block for the language-model prompt.
 *
 * The conversation loop injects it between the system instructions and the
 * user utterance, once per turn.
 */

import { isStorageError } from '../errors.js';
import type { FactStore } from './fact-store.js';
import type { Memory } from './types.js';

export const PINNED_CONTEXT_HEADER = 'Pinned user facts (trusted):';

/** Header plus one "- key: value" line per fact; "" when there are none. */
export function buildPinnedContext(memories: readonly Pick<Memory, 'key' | 'value'>[]): string {
  if (memories.length === 0) return '';
  const lines = [PINNED_CONTEXT_HEADER];
  for (const m of memories) lines.push(`- ${m.key}: ${m.value}`);
  return lines.join('\n');
}

/**
 * Read pinned facts and format them. A storage failure degrades to an empty
 * context so the turn can still be answered.
 */
export function loadPinnedContext(store: FactStore, limit: number): string {
  try {
    return buildPinnedContext(store.getPinned(limit));
  } catch (err) {
    if (!isStorageError(err)) throw err;
    console.warn(`[FactStore] Pinned read failed, continuing without memory context: ${err.message}`);
    return '';
  }
}

export interface PromptParts {
  systemPrompt: string;
  pinnedContext: string;
  userText: string;
}

/**
 * Completion-style prompt: system instructions, pinned facts when present,
 * then the user turn and an open assistant turn.
 */
export function assemblePrompt(parts: PromptParts): string {
  const lines = [parts.systemPrompt];
  const context = parts.pinnedContext.trim();
  if (context) lines.push(context);
  lines.push(`User: ${parts.userText}`, 'Assistant:');
  return lines.join('\n');
}
