import type { ErrorCode } from '../core/errors.js';

// Driver error codes: better-sqlite3 uses extended SQLITE_* result codes, pg uses SQLSTATE.
const SQLITE_CODES: Record<string, ErrorCode> = {
  SQLITE_CONSTRAINT_UNIQUE: 'duplicate_entry',
  SQLITE_CONSTRAINT_PRIMARYKEY: 'duplicate_entry',
  SQLITE_CONSTRAINT_FOREIGNKEY: 'invalid_reference',
  SQLITE_CONSTRAINT_NOTNULL: 'constraint_error',
  SQLITE_CONSTRAINT_CHECK: 'constraint_error',
  SQLITE_CONSTRAINT: 'constraint_error',
  SQLITE_BUSY: 'database_unavailable',
  SQLITE_LOCKED: 'database_unavailable',
  SQLITE_CANTOPEN: 'database_unavailable',
  SQLITE_READONLY: 'database_unavailable',
  SQLITE_IOERR: 'database_unavailable',
};

const SQLSTATE_CODES: Record<string, ErrorCode> = {
  '23505': 'duplicate_entry',
  '23503': 'invalid_reference',
  '23502': 'constraint_error',
  '23514': 'constraint_error',
};

const CONNECTION_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT', 'ENOTFOUND', '57P01', '53300']);

function errorCode(err: unknown): string | undefined {
  if (typeof err !== 'object' || err === null || !('code' in err)) return undefined;
  return typeof err.code === 'string' ? err.code : undefined;
}

/**
 * Classify an error raised by the storage driver (directly or through knex).
 * Returns null when the error does not come from storage.
 */
export function classifyStorageError(err: unknown): ErrorCode | null {
  const code = errorCode(err);
  if (code) {
    if (SQLITE_CODES[code]) return SQLITE_CODES[code];
    if (code.startsWith('SQLITE_')) return 'internal_error';
    if (SQLSTATE_CODES[code]) return SQLSTATE_CODES[code];
    if (CONNECTION_CODES.has(code) || code.startsWith('08')) return 'database_unavailable';
    if (/^[0-9A-Z]{5}$/.test(code)) return 'internal_error';
  }
  if (err instanceof Error && err.name === 'KnexTimeoutError') return 'database_unavailable';
  return null;
}
