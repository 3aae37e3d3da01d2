/**
 * Case-folded runs of letters and digits. Queries and chunks share this tokenizer.
 */
export function tokenize(text: string): string[] {
  return text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? [];
}
