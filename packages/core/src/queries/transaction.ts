import type { TasklineDb } from '../db.js';
import { getRawDb } from '../db.js';
import type { DataResult, TaskError } from '../types/results.js';
import { describeError } from '../types/results.js';

/** Carries an error result out of a better-sqlite3 transaction so it rolls back */
class Rollback extends Error {
  constructor(readonly error: TaskError) {
    super(describeError(error));
  }
}

/**
 * Run an operation inside an IMMEDIATE transaction.
 *
 * The write lock is taken before anything is read, so a bucket's positions
 * cannot change between the read and the write. An error result rolls back
 * every write the operation made and is returned as-is.
 */
export function transact<T>(db: TasklineDb, fn: () => DataResult<T>): DataResult<T> {
  const run = getRawDb(db).transaction(() => {
    const result = fn();
    if (result.type !== 'success') throw new Rollback(result);
    return result;
  });
  try {
    return run.immediate();
  } catch (err: unknown) {
    if (err instanceof Rollback) return err.error;
    throw err;
  }
}
