/**
 * Vector Database
 *
 * SQLite file holding every persistent collection (router cache, skills,
 * implants). Opened once by the composition root and shared by the indexes.
 */

import Database from "better-sqlite3";
import * as path from "path";
import * as fs from "fs";
import type { ILogger } from "@switchboard/shared/logging";
import { runMigrations } from "./migrations.js";

export function openVectorDatabase(dbPath: string, log?: ILogger): Database.Database {
  const inMemory = dbPath === ":memory:";
  if (!inMemory) {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }

  const db = new Database(dbPath);
  if (!inMemory) {
    db.pragma("journal_mode = WAL");
  }

  runMigrations(db, log);

  log?.info("Vector database ready", { path: dbPath });
  return db;
}
