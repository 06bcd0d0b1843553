/**
 * SQLite database connection
 *
 * Single process-wide connection for the background job store.
 */

import Database from "better-sqlite3";
import { mkdirSync } from "fs";
import { dirname, join } from "path";
import { applyMigrations } from "./migrate";

let db: Database.Database | null = null;

/**
 * Database file path: explicit argument, DB_PATH, or data/search-jobs.db
 */
function resolveDbPath(explicitPath?: string): string {
  const dbPath =
    explicitPath || process.env.DB_PATH || join(process.cwd(), "data", "search-jobs.db");

  // Ensure parent directory exists (skip for :memory:)
  if (dbPath !== ":memory:") {
    mkdirSync(dirname(dbPath), { recursive: true });
  }

  return dbPath;
}

/**
 * Open the connection with required pragmas.
 * Returns the existing connection if already open.
 */
export function openDb(explicitPath?: string): Database.Database {
  if (db) {
    return db;
  }

  db = new Database(resolveDbPath(explicitPath));
  db.pragma("journal_mode = WAL");
  db.pragma("busy_timeout = 5000");

  return db;
}

/**
 * Open the connection and bring the schema up to date.
 * What SearchJobQueue needs before submit().
 */
export function openJobStore(explicitPath?: string): Database.Database {
  const store = openDb(explicitPath);
  applyMigrations(store);
  return store;
}

export function closeDb(): void {
  if (db) {
    db.close();
    db = null;
  }
}

/**
 * Get current database connection (must be opened first)
 */
export function getDb(): Database.Database {
  if (!db) {
    throw new Error("Job store not opened. Call openJobStore() or openDb() first.");
  }
  return db;
}

/**
 * Inject a connection into the singleton.
 *
 * @internal Test use only - do not use in production code
 */
export function setDbForTesting(testDb: Database.Database | null): void {
  db = testDb;
}
