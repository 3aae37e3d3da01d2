/**
 * errors.ts: error kinds surfaced by the knowledge core, each with a stable `code`.
 */

export type KnowledgeCoreErrorCode = 'INVALID_INPUT' | 'STORAGE_ERROR' | 'CONFIGURATION_ERROR';

export class KnowledgeCoreError extends Error {
  constructor(
    readonly code: KnowledgeCoreErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Malformed write arguments. Raised before any statement runs. */
export class InvalidInputError extends KnowledgeCoreError {
  constructor(message: string) {
    super('INVALID_INPUT', message);
  }
}

/** Underlying SQLite / I/O failure. The driver error is kept as `cause`. */
export class StorageError extends KnowledgeCoreError {
  constructor(message: string, cause?: unknown) {
    super('STORAGE_ERROR', message, { cause });
  }
}

export class ConfigurationError extends KnowledgeCoreError {
  constructor(message: string, cause?: unknown) {
    super('CONFIGURATION_ERROR', message, { cause });
  }
}

export function isStorageError(err: unknown): err is StorageError {
  return err instanceof StorageError;
}

/**
 * Run a storage operation and rethrow driver failures as StorageError.
 * Errors that already belong to the core pass through untouched.
 */
export function withStorage<T>(operation: string, fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    if (err instanceof KnowledgeCoreError) throw err;
    const detail = err instanceof Error ? err.message : String(err);
    throw new StorageError(`${operation} failed: ${detail}`, err);
  }
}
