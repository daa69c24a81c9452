/**
 * SQLite Vector Index Tests
 *
 * Uses in-memory SQLite with the real migrations.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import Database from "better-sqlite3";
import { runMigrations } from "../db/migrations.js";
import { SqliteVectorIndex } from "./sqlite-index.js";

let db: Database.Database;

describe("SqliteVectorIndex", () => {
  beforeEach(() => {
    db = new Database(":memory:");
    runMigrations(db);
  });

  afterEach(() => {
    db.close();
  });

  it("round-trips documents, metadata and embeddings", () => {
    const index = new SqliteVectorIndex(db, "skills");
    index.upsert([{ id: "a.mdc", document: "doc a", metadata: { filename: "a.mdc", n: 2, ok: true }, embedding: [0.5, 0.5] }]);

    expect(index.count()).toBe(1);
    expect(index.get(["a.mdc"])).toEqual([
      { id: "a.mdc", document: "doc a", metadata: { filename: "a.mdc", n: 2, ok: true } },
    ]);
    const [match] = index.query([1, 1], 1);
    expect(match.id).toBe("a.mdc");
    expect(match.distance).toBeCloseTo(0, 6);
  });

  it("keeps collections apart", () => {
    const skills = new SqliteVectorIndex(db, "skills");
    const implants = new SqliteVectorIndex(db, "implants");
    skills.upsert([{ id: "same", document: "skill", metadata: {}, embedding: [1, 0] }]);
    implants.upsert([{ id: "same", document: "implant", metadata: {}, embedding: [0, 1] }]);

    expect(skills.count()).toBe(1);
    expect(implants.get(["same"])[0].document).toBe("implant");
  });

  it("overwrites an existing id", () => {
    const index = new SqliteVectorIndex(db, "router_cache");
    index.upsert([{ id: "q1", document: "first", metadata: { target_agent: "a" }, embedding: [1, 0] }]);
    index.upsert([{ id: "q1", document: "second", metadata: { target_agent: "b" }, embedding: [0, 1] }]);

    expect(index.count()).toBe(1);
    expect(index.query([0, 1], 5)).toEqual([
      { id: "q1", document: "second", metadata: { target_agent: "b" }, distance: 0 },
    ]);
  });

  it("ranks by distance with ties broken by id", () => {
    const index = new SqliteVectorIndex(db, "skills");
    index.upsert([
      { id: "far", document: "", metadata: {}, embedding: [0, 1] },
      { id: "b", document: "", metadata: {}, embedding: [1, 0] },
      { id: "a", document: "", metadata: {}, embedding: [1, 0] },
    ]);
    expect(index.query([1, 0], 3).map(m => m.id)).toEqual(["a", "b", "far"]);
  });

  it("returns requested ids in request order and skips unknown ones", () => {
    const index = new SqliteVectorIndex(db, "skills");
    index.upsert([
      { id: "a", document: "A", metadata: {}, embedding: [1, 0] },
      { id: "b", document: "B", metadata: {}, embedding: [0, 1] },
    ]);
    expect(index.get(["b", "zzz", "a"]).map(d => d.id)).toEqual(["b", "a"]);
    expect(index.get([])).toEqual([]);
  });

  it("applies migrations only once", () => {
    runMigrations(db);
    const versions = db.prepare("SELECT version FROM schema_version").all();
    expect(versions).toEqual([{ version: 0 }]);
  });
});
