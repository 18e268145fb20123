import Database from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import * as schema from './schema/index.js';
import { dirname, join } from 'node:path';
import { homedir } from 'node:os';
import { mkdirSync } from 'node:fs';

export type TasklineDb = ReturnType<typeof drizzle<typeof schema>>;

/** Returns the platform-appropriate default database path */
export function getDefaultDbPath(): string {
  const platform = process.platform;
  let dir: string;

  if (platform === 'darwin') {
    dir = join(homedir(), 'Library', 'Application Support', 'taskline');
  } else if (platform === 'win32') {
    dir = join(process.env['APPDATA'] ?? join(homedir(), 'AppData', 'Roaming'), 'taskline');
  } else {
    // Linux / other
    dir = join(process.env['XDG_DATA_HOME'] ?? join(homedir(), '.local', 'share'), 'taskline');
  }

  return join(dir, 'taskline.db');
}

/** The raw SQL to create the schema from scratch (for new databases and tests) */
export const CREATE_SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS tasks (
    id TEXT PRIMARY KEY,
    owner_id TEXT NOT NULL,
    title TEXT NOT NULL,
    description TEXT,
    priority TEXT NOT NULL DEFAULT 'MEDIUM' CHECK(priority IN ('LOW', 'MEDIUM', 'HIGH')),
    project_id TEXT,
    tags TEXT,
    completed INTEGER NOT NULL DEFAULT 0,
    due_date TEXT,
    due_time TEXT,
    due_mode TEXT CHECK(due_mode IN ('fixed', 'floating')),
    position INTEGER NOT NULL DEFAULT 0,
    overdue_position INTEGER,
    completed_on_date TEXT,
    completed_on_time TEXT,
    completed_on_mode TEXT,
    version INTEGER NOT NULL DEFAULT 1,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_tasks_owner_due ON tasks(owner_id, due_date);
CREATE INDEX IF NOT EXISTS idx_tasks_owner_project ON tasks(owner_id, project_id);
CREATE INDEX IF NOT EXISTS idx_tasks_owner_completed ON tasks(owner_id, completed);

CREATE TABLE IF NOT EXISTS config (
    key TEXT PRIMARY KEY,
    value TEXT NOT NULL
);
`;

/**
 * Create a Drizzle database connection with proper pragmas.
 * If no path is given, uses the platform default.
 * Pass ':memory:' for in-memory databases (tests).
 */
export function createDb(path?: string): TasklineDb {
  const dbPath = path ?? getDefaultDbPath();

  // Ensure directory exists for file-based databases
  if (dbPath !== ':memory:') {
    mkdirSync(dirname(dbPath), { recursive: true });
  }

  const sqlite = new Database(dbPath);

  // Pragmas are per connection
  sqlite.pragma('journal_mode = WAL');
  sqlite.pragma('foreign_keys = ON');
  sqlite.pragma('busy_timeout = 5000');

  // Idempotent: all statements use IF NOT EXISTS
  sqlite.exec(CREATE_SCHEMA_SQL);

  return drizzle(sqlite, { schema });
}

/**
 * Create an in-memory database with schema applied. For tests.
 */
export function createTestDb(): TasklineDb {
  return createDb(':memory:');
}

/** Sleep utility for retry logic */
function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

function isBusyError(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'SQLITE_BUSY';
}

/**
 * Retry wrapper with exponential backoff for SQLITE_BUSY errors.
 * Wraps write operations that may fail under concurrent access.
 */
export async function withRetry<T>(fn: () => T, maxRetries = 3): Promise<T> {
  for (let i = 0; i < maxRetries; i++) {
    try {
      return fn();
    } catch (err: unknown) {
      if (isBusyError(err) && i < maxRetries - 1) {
        await sleep(100 * Math.pow(2, i)); // 100ms, 200ms, 400ms
        continue;
      }
      throw err;
    }
  }
  throw new Error('withRetry: max retries exceeded');
}

/**
 * Get the raw Database instance from a Drizzle instance.
 * Useful for operations not supported by Drizzle (transactions, pragmas, raw exec).
 */
export function getRawDb(db: TasklineDb): Database.Database {
  return db.$client;
}

/** Get the file path of the database ('' for in-memory databases) */
export function getDbPath(db: TasklineDb): string {
  const list = getRawDb(db).pragma('database_list') as Array<{ file: string }>;
  return list[0]?.file ?? '';
}
