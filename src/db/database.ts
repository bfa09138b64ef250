/**
 * SQLite connection and schema.
 *
 * One `better-sqlite3` handle is opened at startup and handed explicitly to each store; every
 * store operation is a single statement or a single `db.transaction(...)`. Driver failures are
 * translated into the error taxonomy here so callers never see raw `SqliteError`s.
 */
import Database from 'better-sqlite3';

import { AppError, InfrastructureError } from '../lib/errors';
import { logger } from '../lib/logger';

export type Db = Database.Database;

export type OpenDatabaseOptions = {
  busyTimeoutMs?: number;
};

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS users (
    user_id TEXT PRIMARY KEY,
    email TEXT NOT NULL UNIQUE,
    name TEXT,
    created_at_ms INTEGER NOT NULL,
    last_login_ms INTEGER NOT NULL
  );

  CREATE TABLE IF NOT EXISTS sessions (
    session_id TEXT PRIMARY KEY,
    user_id TEXT NOT NULL REFERENCES users(user_id) ON DELETE CASCADE,
    access_token_enc TEXT NOT NULL,
    refresh_token_enc TEXT NOT NULL,
    expires_at_ms INTEGER NOT NULL,
    created_at_ms INTEGER NOT NULL,
    last_activity_ms INTEGER NOT NULL,
    user_agent TEXT
  );
  CREATE INDEX IF NOT EXISTS idx_session_user_id ON sessions(user_id);
  CREATE INDEX IF NOT EXISTS idx_session_expires_at ON sessions(expires_at_ms);
  CREATE INDEX IF NOT EXISTS idx_session_last_activity ON sessions(last_activity_ms);

  CREATE TABLE IF NOT EXISTS dynamic_clients (
    client_id TEXT PRIMARY KEY,
    client_secret_digest TEXT NOT NULL,
    platform TEXT NOT NULL,
    redirect_uris TEXT NOT NULL,
    created_at_ms INTEGER NOT NULL,
    expires_at_ms INTEGER NOT NULL,
    last_used_ms INTEGER
  );
  CREATE INDEX IF NOT EXISTS idx_dynamic_client_expires_at ON dynamic_clients(expires_at_ms);
  CREATE INDEX IF NOT EXISTS idx_dynamic_client_platform ON dynamic_clients(platform);

  CREATE TABLE IF NOT EXISTS tasks (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    user_id TEXT NOT NULL REFERENCES users(user_id) ON DELETE RESTRICT,
    title TEXT NOT NULL,
    project TEXT,
    priority INTEGER NOT NULL DEFAULT 3,
    energy TEXT NOT NULL DEFAULT 'medium',
    time_estimate TEXT NOT NULL DEFAULT '1hr',
    notes TEXT,
    due_date TEXT,
    completed INTEGER NOT NULL DEFAULT 0,
    completed_at_ms INTEGER,
    created_at_ms INTEGER NOT NULL,
    updated_at_ms INTEGER NOT NULL,
    calendar_event_id TEXT,
    calendar_event_url TEXT,
    scheduled_start_ms INTEGER,
    scheduled_duration INTEGER
  );
  CREATE INDEX IF NOT EXISTS idx_task_user_id ON tasks(user_id);
  CREATE INDEX IF NOT EXISTS idx_task_user_completed ON tasks(user_id, completed);
`;

export const migrate = (db: Db) => {
  db.exec(SCHEMA);
};

export const openDatabase = (path: string, opts: OpenDatabaseOptions = {}): Db => {
  const db = new Database(path, { timeout: opts.busyTimeoutMs ?? 5000 });
  if (path !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }
  db.pragma('foreign_keys = ON');
  migrate(db);
  return db;
};

const RETRYABLE_CODES = new Set(['SQLITE_BUSY', 'SQLITE_BUSY_SNAPSHOT', 'SQLITE_BUSY_TIMEOUT', 'SQLITE_LOCKED']);

export const sqliteErrorCode = (err: unknown): string | undefined => {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') return err.code;
  return undefined;
};

/** Maps a driver constraint code to a domain error; `undefined` falls through to infrastructure. */
export type ConstraintMapper = (code: string) => AppError | undefined;

/**
 * Runs one store operation and translates driver failures.
 *
 * Busy/locked (the connection timeout elapsed) becomes a retryable `InfrastructureError`.
 */
export const runStoreOp = <T>(operation: string, fn: () => T, onConstraint?: ConstraintMapper): T => {
  try {
    return fn();
  } catch (err) {
    if (err instanceof AppError) throw err;
    const code = sqliteErrorCode(err);
    if (code && onConstraint && code.startsWith('SQLITE_CONSTRAINT')) {
      const mapped = onConstraint(code);
      if (mapped) throw mapped;
    }
    const retryable = code !== undefined && RETRYABLE_CODES.has(code);
    logger.error('Store', `Store operation failed: ${operation}`, { code, retryable, error: err });
    throw new InfrastructureError(
      retryable ? 'store_busy' : 'store_error',
      retryable ? 'Store is busy, retry the request' : 'Store operation failed',
      { cause: err, retryable }
    );
  }
};
