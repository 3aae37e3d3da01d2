/**
 * Write-boundary checks for memories. Nothing is written unless every check passes.
 */

import { InvalidInputError } from '../errors.js';
import type { SeedRow } from './types.js';

export interface ValidationResult {
  ok: boolean;
  reason?: string; // empty_key | empty_value | score
}

export interface NormalizedMemoryInput {
  key: string;
  value: string;
  score: number;
}

export function validateMemory(key: string, value: string, score: number): ValidationResult {
  if (typeof key !== 'string' || !key.trim()) {
    return { ok: false, reason: 'empty_key' };
  }
  if (typeof value !== 'string' || !value.trim()) {
    return { ok: false, reason: 'empty_value' };
  }
  if (typeof score !== 'number' || !Number.isFinite(score) || score < 0) {
    return { ok: false, reason: 'score' };
  }
  return { ok: true };
}

/** Validate and trim, or throw InvalidInputError. */
export function normalizeMemoryInput(key: string, value: string, score: number): NormalizedMemoryInput {
  const result = validateMemory(key, value, score);
  if (!result.ok) {
    switch (result.reason) {
      case 'empty_key':
        throw new InvalidInputError('Memory key must be a non-empty string');
      case 'empty_value':
        throw new InvalidInputError(`Memory value for "${key}" must be a non-empty string`);
      default:
        throw new InvalidInputError(`Memory score for "${key}" must be a finite number >= 0, got ${String(score)}`);
    }
  }
  return { key: key.trim(), value: value.trim(), score };
}

export function normalizeSeedRows(rows: readonly SeedRow[], score: number): NormalizedMemoryInput[] {
  return rows.map((row, i) => {
    try {
      return normalizeMemoryInput(row.key, row.value, score);
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      throw new InvalidInputError(`Seed row ${i + 1}: ${detail}`);
    }
  });
}

export function assertCount(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new InvalidInputError(`${name} must be a non-negative integer, got ${String(value)}`);
  }
}
