import Database from "better-sqlite3";

export type Db = Database.Database;

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS users (
    id            TEXT PRIMARY KEY,
    email         TEXT NOT NULL UNIQUE COLLATE NOCASE,
    full_name     TEXT NOT NULL,
    password_hash TEXT,
    avatar_url    TEXT,
    role          TEXT NOT NULL DEFAULT 'developer'
                  CHECK (role IN ('admin', 'manager', 'developer')),
    is_active     INTEGER NOT NULL DEFAULT 1,
    created_at    TEXT NOT NULL,
    updated_at    TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS projects (
    id                  TEXT PRIMARY KEY,
    name                TEXT NOT NULL,
    key                 TEXT NOT NULL UNIQUE COLLATE NOCASE
                        CHECK (length(key) BETWEEN 1 AND 10),
    description         TEXT,
    owner_id            TEXT NOT NULL REFERENCES users (id) ON DELETE CASCADE,
    default_assignee_id TEXT REFERENCES users (id) ON DELETE SET NULL,
    issue_counter       INTEGER NOT NULL DEFAULT 0,
    created_at          TEXT NOT NULL,
    updated_at          TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS projects_owner ON projects (owner_id);

  CREATE TABLE IF NOT EXISTS issues (
    id           TEXT PRIMARY KEY,
    project_id   TEXT NOT NULL REFERENCES projects (id) ON DELETE CASCADE,
    issue_number INTEGER NOT NULL CHECK (issue_number > 0),
    title        TEXT NOT NULL,
    description  TEXT,
    issue_type   TEXT NOT NULL DEFAULT 'task'
                 CHECK (issue_type IN ('bug', 'task', 'story', 'epic')),
    status       TEXT NOT NULL DEFAULT 'backlog'
                 CHECK (status IN ('backlog', 'to_do', 'in_progress', 'done')),
    priority     TEXT NOT NULL DEFAULT 'medium'
                 CHECK (priority IN ('highest', 'high', 'medium', 'low', 'lowest')),
    reporter_id  TEXT NOT NULL REFERENCES users (id) ON DELETE CASCADE,
    assignee_id  TEXT REFERENCES users (id) ON DELETE CASCADE,
    created_at   TEXT NOT NULL,
    updated_at   TEXT NOT NULL,
    UNIQUE (project_id, issue_number)
  );
  CREATE INDEX IF NOT EXISTS issues_assignee ON issues (assignee_id);
  CREATE INDEX IF NOT EXISTS issues_reporter ON issues (reporter_id);
  CREATE INDEX IF NOT EXISTS issues_updated ON issues (updated_at);
`;

/**
 * Open (or create) the database and make sure the schema exists.
 * Pass ":memory:" for a throwaway database.
 */
export function openDatabase(file: string): Db {
  const db = new Database(file);
  if (file !== ":memory:") {
    db.pragma("journal_mode = WAL");
  }
  db.pragma("foreign_keys = ON");
  db.pragma("busy_timeout = 5000");
  db.exec(SCHEMA);
  return db;
}

/**
 * Run `fn` as one write transaction. BEGIN IMMEDIATE takes the write lock up
 * front, so read-then-write sequences inside `fn` cannot interleave with
 * another writer. `fn` must be synchronous.
 */
export function writeTransaction<T>(db: Db, fn: () => T): T {
  return db.transaction(fn).immediate();
}

export function isUniqueViolation(err: unknown): boolean {
  return (
    err instanceof Database.SqliteError &&
    (err.code === "SQLITE_CONSTRAINT_UNIQUE" ||
      err.code === "SQLITE_CONSTRAINT_PRIMARYKEY")
  );
}

export function now(): string {
  return new Date().toISOString();
}

/** Narrow a TEXT column holding one of a fixed set of values. */
export function parseEnum<T extends string>(
  values: readonly T[],
  value: string,
  column: string
): T {
  const match = values.find((v) => v === value);
  if (match === undefined) {
    throw new Error(`Unexpected ${column} value in database: ${value}`);
  }
  return match;
}

/** `?, ?, ?` for an IN list of the given length. */
export function placeholders(count: number): string {
  return Array.from({ length: count }, () => "?").join(", ");
}
