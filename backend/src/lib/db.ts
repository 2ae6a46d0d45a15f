/**
 * Database utility functions
 */

import Database from "better-sqlite3";

export type Store = Database.Database;

/**
 * Error raised by SQLite itself (constraint failures, aborts from triggers)
 */
export interface StoreError extends Error {
  code: string;
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS categories (
    id INTEGER PRIMARY KEY,
    type TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS questions (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    question TEXT NOT NULL,
    answer TEXT NOT NULL,
    category_id INTEGER NOT NULL REFERENCES categories(id),
    difficulty INTEGER NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_questions_category ON questions(category_id);
`;

export function initSchema(db: Store): void {
  db.exec(SCHEMA);
}

/**
 * casefold(text): Unicode-aware lower-casing for search
 */
export function registerFunctions(db: Store): void {
  db.function("casefold", { deterministic: true }, (value: unknown) =>
    typeof value === "string" ? value.toLowerCase() : value
  );
}

/**
 * Opens the SQLite file at `path` (or an in-memory store for ":memory:")
 * and makes sure both tables exist
 */
export function openDatabase(path: string): Store {
  const db = new Database(path);
  if (path !== ":memory:") {
    db.pragma("journal_mode = WAL");
  }
  db.pragma("foreign_keys = ON");
  db.pragma("busy_timeout = 5000");
  registerFunctions(db);
  initSchema(db);
  return db;
}

export function isStoreError(error: unknown): error is StoreError {
  return (
    error instanceof Error &&
    "code" in error &&
    typeof error.code === "string" &&
    error.code.startsWith("SQLITE_")
  );
}
