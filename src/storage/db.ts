/**
 * Database layer using node-sqlite3-wasm
 *
 * Opens the database, applies pragmas and creates the schema. Repositories
 * take the returned handle in their constructors and read rows through zod
 * schemas, so every row they hand out has been checked against its shape.
 */

import sqlite3 from "node-sqlite3-wasm";
import type { Database } from "node-sqlite3-wasm";
import { mkdirSync } from "fs";
import { dirname } from "path";
import { z } from "zod";
import { createLogger } from "../logging";

const log = createLogger("db");

export type SqlValue = string | number | null;

/** Row schemas may transform, so only their output type is pinned */
export type RowSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export interface RunResult {
  changes: number;
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS users (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    email TEXT NOT NULL COLLATE NOCASE,
    password_hash TEXT NOT NULL,
    display_name TEXT,
    created_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
  );

  CREATE UNIQUE INDEX IF NOT EXISTS idx_users_email ON users(email);

  CREATE TABLE IF NOT EXISTS trips (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    title TEXT NOT NULL,
    description TEXT,
    photos TEXT NOT NULL DEFAULT '[]',
    tags TEXT NOT NULL DEFAULT '[]',
    latitude REAL,
    longitude REAL,
    author_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
    -- Lower-cased copies for search; SQLite folds case for ASCII only
    search_title TEXT NOT NULL DEFAULT '',
    search_description TEXT NOT NULL DEFAULT '',
    search_tags TEXT NOT NULL DEFAULT '[]',
    created_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
    updated_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
  );

  CREATE INDEX IF NOT EXISTS idx_trips_author ON trips(author_id);
`;

/**
 * Synchronous handle over one SQLite connection
 */
export class DatabaseHandle {
  private closed = false;

  constructor(private readonly db: Database) {}

  /** Run one or more statements that take no parameters */
  exec(sql: string): void {
    this.db.exec(sql);
  }

  run(sql: string, params: SqlValue[] = []): RunResult {
    const result = this.db.run(sql, params.length > 0 ? params : undefined);
    return { changes: result.changes };
  }

  /** First row, or null when the statement returns none */
  get<T>(sql: string, schema: RowSchema<T>, params: SqlValue[] = []): T | null {
    const row = this.db.get(sql, params.length > 0 ? params : undefined);
    return row == null ? null : schema.parse(row);
  }

  all<T>(sql: string, schema: RowSchema<T>, params: SqlValue[] = []): T[] {
    return this.db.all(sql, params.length > 0 ? params : undefined).map((row) => schema.parse(row));
  }

  close(): void {
    if (!this.closed) {
      this.closed = true;
      this.db.close();
    }
  }
}

/**
 * Open (or create) the database at `path`. ":memory:" gives a private
 * in-process database, used by tests.
 */
export function openDatabase(path: string): DatabaseHandle {
  if (path !== ":memory:") {
    mkdirSync(dirname(path), { recursive: true });
  }

  const db = new DatabaseHandle(new sqlite3.Database(path));

  db.exec("PRAGMA foreign_keys = ON");
  db.exec(SCHEMA);

  log.debug("Database ready", { path });
  return db;
}

/**
 * SQLite reports unique index violations as "UNIQUE constraint failed: <table>.<column>"
 */
export function isUniqueViolation(err: unknown): boolean {
  return err instanceof Error && err.message.includes("UNIQUE constraint failed");
}
