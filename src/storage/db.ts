import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import type { RunResult } from "better-sqlite3";
import { drizzle } from "drizzle-orm/better-sqlite3";
import type { BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import type { BaseSQLiteDatabase } from "drizzle-orm/sqlite-core";
import * as schema from "./schema.js";
import { initializeSchema } from "./migrate.js";

export type AppDatabase = BetterSQLite3Database<typeof schema>;

/** The database itself or an open transaction on it. */
export type Executor = BaseSQLiteDatabase<"sync", RunResult, typeof schema>;

export function createDatabase(databasePath: string): AppDatabase {
  if (databasePath !== ":memory:") {
    mkdirSync(dirname(databasePath), { recursive: true });
  }

  const sqlite = new Database(databasePath);
  sqlite.pragma("journal_mode = WAL");
  sqlite.pragma("foreign_keys = ON");
  initializeSchema(sqlite);

  return drizzle(sqlite, { schema });
}
