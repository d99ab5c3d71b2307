/**
 * backend/src/shared/db/persistence-error.ts
 *
 * WHY:
 * - One data-access exception type for every repository, whatever the driver throws.
 * - Keeps the driver error as `cause` and the Postgres SQLSTATE (when present)
 *   so logs stay useful without leaking pg types upward.
 *
 * RULES:
 * - Only repositories construct this.
 * - Never mapped to a client-facing message (error handler answers 500).
 */

const PERSISTENCE_ERROR_CODE = 500;

export class PersistenceError extends Error {
  readonly code: number;
  readonly sqlState: string | null;

  constructor(opts: { message: string; code?: number; sqlState?: string | null; cause?: unknown }) {
    super(opts.message, { cause: opts.cause });
    this.name = 'PersistenceError';
    this.code = opts.code ?? PERSISTENCE_ERROR_CODE;
    this.sqlState = opts.sqlState ?? null;
  }

  /**
   * Wraps anything thrown by the driver. Already-wrapped errors pass through as-is.
   */
  static from(err: unknown): PersistenceError {
    if (err instanceof PersistenceError) return err;

    return new PersistenceError({
      message: err instanceof Error ? err.message : 'Database operation failed',
      sqlState: readSqlState(err),
      cause: err,
    });
  }
}

function readSqlState(err: unknown): string | null {
  if (typeof err !== 'object' || err === null) return null;
  if (!('code' in err)) return null;
  return typeof err.code === 'string' ? err.code : null;
}
