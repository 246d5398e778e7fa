/**
 * backend/src/shared/db/storage-error.ts
 *
 * WHY:
 * - A failing database (connection refused, timeout, bad SQL) is a server-side
 *   fault and must never look like "user not found" or "wrong password".
 * - DAL stores wrap every driver error in StorageError; callers branch on it.
 *
 * RULES:
 * - Never thrown for "row not found": that is a normal null/undefined result.
 * - No retries here. Retry policy, if any, belongs to the pool/driver.
 */

export class StorageError extends Error {
  readonly operation: string;

  constructor(operation: string, cause: unknown) {
    super(`storage operation failed: ${operation}`, { cause });
    this.name = 'StorageError';
    this.operation = operation;
  }
}

/**
 * Runs a DAL call and wraps any driver failure in StorageError.
 */
export async function withStorage<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    if (err instanceof StorageError) throw err;
    throw new StorageError(operation, err);
  }
}
