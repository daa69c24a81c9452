/**
 * Database Migrations
 *
 * Numbered, append-only. Each runs inside a transaction and is stamped in
 * schema_version so reopening a file skips what is already applied.
 */

import type Database from "better-sqlite3";
import type { ILogger } from "@switchboard/shared/logging";

type Migration = (db: Database.Database) => void;

interface VersionRow {
  v: number | null;
}

export function runMigrations(db: Database.Database, log?: ILogger): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_version (
      version INTEGER PRIMARY KEY,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    );
  `);

  const row = db.prepare<[], VersionRow>("SELECT MAX(version) AS v FROM schema_version").get();
  const currentVersion = row?.v ?? -1;
  if (currentVersion >= migrations.length - 1) return;

  const stamp = db.prepare<[number]>(
    "INSERT INTO schema_version (version, applied_at) VALUES (?, datetime('now'))",
  );

  for (let i = currentVersion + 1; i < migrations.length; i++) {
    const migration = migrations[i];
    db.transaction(() => {
      migration(db);
      stamp.run(i);
    })();
    log?.info("Applied migration", { version: i });
  }
}

// ============================================
// MIGRATIONS
// ============================================

const migrations: Migration[] = [
  // 0: one table for every collection; embeddings are little-endian float32 blobs
  (db) => {
    db.exec(`
      CREATE TABLE IF NOT EXISTS vectors (
        collection TEXT NOT NULL,
        id TEXT NOT NULL,
        document TEXT NOT NULL,
        metadata TEXT NOT NULL DEFAULT '{}',
        embedding BLOB NOT NULL,
        dimensions INTEGER NOT NULL,
        updated_at TEXT NOT NULL DEFAULT (datetime('now')),
        PRIMARY KEY (collection, id)
      );
    `);
  },
];
