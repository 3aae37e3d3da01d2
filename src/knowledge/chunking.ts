/**
 * Chunk text at blank-line paragraph boundaries with a max chunk size.
 * Paragraphs are never split; one longer than the bound becomes its own chunk.
 */

import { InvalidInputError } from '../errors.js';

export const DEFAULT_MAX_CHARS = 1200;
export const PARAGRAPH_SEPARATOR = '\n\n';

export function splitParagraphs(text: string): string[] {
  return text
    .replace(/\r\n?/g, '\n')
    .split(/\n[ \t]*\n/)
    .map((p) => p.trim())
    .filter(Boolean);
}

/**
 * Greedy packing: a paragraph joins the current chunk while the joined text
 * (paragraphs separated by a blank line) stays within maxChars.
 */
export function chunkText(text: string, maxChars: number = DEFAULT_MAX_CHARS): string[] {
  if (!Number.isInteger(maxChars) || maxChars < 1) {
    throw new InvalidInputError(`maxChars must be a positive integer, got ${String(maxChars)}`);
  }

  const chunks: string[] = [];
  let current = '';

  for (const p of splitParagraphs(text)) {
    if (!current) {
      current = p;
    } else if (current.length + PARAGRAPH_SEPARATOR.length + p.length <= maxChars) {
      current = `${current}${PARAGRAPH_SEPARATOR}${p}`;
    } else {
      chunks.push(current);
      current = p;
    }
  }
  if (current) chunks.push(current);

  return chunks;
}
