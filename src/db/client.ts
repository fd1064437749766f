import Database from "better-sqlite3";
import { drizzle } from "drizzle-orm/better-sqlite3";
import type { BaseSQLiteDatabase } from "drizzle-orm/sqlite-core";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import * as schema from "./schema.js";
import { TransientStorageError, sqliteCode } from "../errors.js";

// Covers both a connection and a transaction opened on it.
export type Db = BaseSQLiteDatabase<"sync", Database.RunResult, typeof schema>;

export interface Store {
  readonly path: string;
  /**
   * Opens a connection, runs `fn` against it and closes the connection
   * again, whether `fn` returns or throws.
   */
  use<T>(fn: (db: Db, sqlite: Database.Database) => T, operation?: string): T;
}

const TRANSIENT_CODES = new Set(["SQLITE_BUSY", "SQLITE_LOCKED"]);

function open(path: string): Database.Database {
  mkdirSync(dirname(path), { recursive: true });
  const sqlite = new Database(path);
  sqlite.pragma("journal_mode = WAL");
  sqlite.pragma("foreign_keys = ON");
  return sqlite;
}

export function createStore(path: string): Store {
  return {
    path,
    use<T>(fn: (db: Db, sqlite: Database.Database) => T, operation?: string): T {
      let sqlite: Database.Database | undefined;
      try {
        sqlite = open(path);
        return fn(drizzle(sqlite, { schema }), sqlite);
      } catch (err) {
        const code = sqliteCode(err);
        if (code && TRANSIENT_CODES.has(code)) {
          throw new TransientStorageError(`Database is busy (${code})`, {
            operation,
            cause: err,
          });
        }
        throw err;
      } finally {
        sqlite?.close();
      }
    },
  };
}

export function migrate(store: Store) {
  store.use((_db, sqlite) => {
    sqlite.exec(`
      CREATE TABLE IF NOT EXISTS contributions (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        user_id TEXT NOT NULL,
        username TEXT NOT NULL,
        description TEXT NOT NULL,
        links TEXT,
        timestamp TEXT NOT NULL,
        approved INTEGER NOT NULL DEFAULT 0,
        status TEXT NOT NULL DEFAULT 'pending',
        reviewed_by TEXT,
        reviewed_at TEXT
      );

      CREATE TABLE IF NOT EXISTS warnings (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        guild_id TEXT NOT NULL,
        user_id TEXT NOT NULL,
        moderator_id TEXT NOT NULL,
        reason TEXT NOT NULL,
        timestamp TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS moderation_logs (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        guild_id TEXT NOT NULL,
        user_id TEXT,
        moderator_id TEXT NOT NULL,
        action TEXT NOT NULL,
        reason TEXT,
        details TEXT,
        timestamp TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS club_roles (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        name TEXT NOT NULL UNIQUE,
        description TEXT
      );

      CREATE TABLE IF NOT EXISTS member_roles (
        user_id TEXT NOT NULL,
        role_id INTEGER NOT NULL,
        assigned_at TEXT NOT NULL,
        assigned_by TEXT NOT NULL,
        PRIMARY KEY (user_id, role_id),
        FOREIGN KEY (role_id) REFERENCES club_roles(id) ON DELETE CASCADE
      );

      CREATE INDEX IF NOT EXISTS idx_contributions_user
        ON contributions(user_id, timestamp);

      CREATE INDEX IF NOT EXISTS idx_contributions_status
        ON contributions(status);

      CREATE INDEX IF NOT EXISTS idx_warnings_guild_user
        ON warnings(guild_id, user_id);

      CREATE INDEX IF NOT EXISTS idx_moderation_logs_guild
        ON moderation_logs(guild_id, timestamp);

      CREATE INDEX IF NOT EXISTS idx_member_roles_role
        ON member_roles(role_id);
    `);
  }, "migrate");
}
