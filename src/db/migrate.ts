/**
 * Database migration runner
 *
 * Applies SQL files from migrations/ (relative to the working directory)
 * in filename order, recording each in schema_migrations.
 */

import type Database from "better-sqlite3";
import { readdirSync, readFileSync } from "fs";
import { join } from "path";
import * as logger from "@/logger";

function migrationsDir(): string {
  return join(process.cwd(), "migrations");
}

function ensureMigrationsTable(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      version TEXT NOT NULL UNIQUE,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    );
  `);
}

function getAppliedMigrations(db: Database.Database): Set<string> {
  const rows = db.prepare("SELECT version FROM schema_migrations").all();
  const versions = new Set<string>();
  for (const row of rows) {
    if (typeof row === "object" && row !== null && "version" in row && typeof row.version === "string") {
      versions.add(row.version);
    }
  }
  return versions;
}

/**
 * List migration files; a missing directory means none
 */
function listMigrationFiles(): string[] {
  let files: string[];
  try {
    files = readdirSync(migrationsDir());
  } catch (err) {
    logger.warn("No migrations directory found", {
      dir: migrationsDir(),
      error: err instanceof Error ? err.message : String(err),
    });
    return [];
  }
  return files.filter((f) => f.endsWith(".sql")).sort();
}

/**
 * Apply a single migration file atomically
 */
function applyMigration(db: Database.Database, filename: string): void {
  const sql = readFileSync(join(migrationsDir(), filename), "utf-8");

  // Wrap migration + recording in a transaction
  const transaction = db.transaction(() => {
    db.exec(sql);
    db.prepare("INSERT INTO schema_migrations (version) VALUES (?)").run(filename);
  });

  transaction();
}

/**
 * Apply all pending migrations to a connection
 *
 * @returns Filenames applied in this call
 */
export function applyMigrations(db: Database.Database): string[] {
  ensureMigrationsTable(db);

  const applied = getAppliedMigrations(db);
  const pending = listMigrationFiles().filter((f) => !applied.has(f));

  for (const migration of pending) {
    logger.debug("Applying migration", { migration });
    applyMigration(db, migration);
  }

  if (pending.length > 0) {
    logger.info("Migrations applied", { count: pending.length });
  }
  return pending;
}
