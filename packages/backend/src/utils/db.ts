import type Database from 'better-sqlite3';
import { NotFoundError, PersistenceError, ValidationError } from './errors.js';

export type Db = Database.Database;

function ensureOpen(db: Db, action: string): void {
  if (!db.open) {
    throw new PersistenceError(`Cannot ${action}: the event database is closed`);
  }
}

function wrapFailure(action: string, error: unknown): Error {
  if (
    error instanceof PersistenceError ||
    error instanceof ValidationError ||
    error instanceof NotFoundError
  ) {
    return error;
  }
  return new PersistenceError(`Failed to ${action}`, { cause: error });
}

/**
 * Run one logical store operation, audit entries included, as a single transaction.
 * Nested calls join the outer transaction.
 */
export function runInTransaction<T>(db: Db, action: string, work: () => T): T {
  ensureOpen(db, action);
  try {
    return db.transaction(work)();
  } catch (error) {
    throw wrapFailure(action, error);
  }
}

/**
 * Run a read outside of a transaction
 */
export function runQuery<T>(db: Db, action: string, read: () => T): T {
  ensureOpen(db, action);
  try {
    return read();
  } catch (error) {
    throw wrapFailure(action, error);
  }
}
