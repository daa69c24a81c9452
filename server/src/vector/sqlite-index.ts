/**
 * SQLite-backed VectorIndex
 *
 * Rows live in the shared `vectors` table, partitioned by collection name.
 * Queries load the collection's embeddings and rank them in process.
 */

import type Database from "better-sqlite3";
import { cosineDistance, compareMatches } from "./math.js";
import { isMetadata } from "./types.js";
import type { Metadata, VectorIndex, VectorRecord, IndexMatch, StoredDocument } from "./types.js";

interface DocumentRow {
  id: string;
  document: string;
  metadata: string;
}

interface VectorRow extends DocumentRow {
  embedding: Buffer;
}

interface CountRow {
  n: number;
}

function encodeEmbedding(embedding: number[]): Buffer {
  return Buffer.from(Float32Array.from(embedding).buffer);
}

function decodeEmbedding(blob: Buffer): Float32Array {
  // Copy first: the blob's byteOffset is not guaranteed to be 4-byte aligned
  const bytes = new Uint8Array(blob);
  return new Float32Array(bytes.buffer, 0, bytes.byteLength / 4);
}

function decodeMetadata(json: string): Metadata {
  const parsed: unknown = JSON.parse(json);
  return isMetadata(parsed) ? parsed : {};
}

export class SqliteVectorIndex implements VectorIndex {
  readonly name: string;
  private db: Database.Database;

  constructor(db: Database.Database, name: string) {
    this.db = db;
    this.name = name;
  }

  upsert(records: VectorRecord[]): void {
    const stmt = this.db.prepare<[string, string, string, string, Buffer, number]>(`
      INSERT INTO vectors (collection, id, document, metadata, embedding, dimensions, updated_at)
      VALUES (?, ?, ?, ?, ?, ?, datetime('now'))
      ON CONFLICT (collection, id) DO UPDATE SET
        document = excluded.document,
        metadata = excluded.metadata,
        embedding = excluded.embedding,
        dimensions = excluded.dimensions,
        updated_at = excluded.updated_at
    `);

    this.db.transaction((batch: VectorRecord[]) => {
      for (const r of batch) {
        stmt.run(this.name, r.id, r.document, JSON.stringify(r.metadata), encodeEmbedding(r.embedding), r.embedding.length);
      }
    })(records);
  }

  query(embedding: number[], k: number): IndexMatch[] {
    if (k <= 0) return [];

    const rows = this.db
      .prepare<[string], VectorRow>("SELECT id, document, metadata, embedding FROM vectors WHERE collection = ?")
      .all(this.name);

    return rows
      .map(row => ({
        id: row.id,
        document: row.document,
        metadata: decodeMetadata(row.metadata),
        distance: cosineDistance(embedding, decodeEmbedding(row.embedding)),
      }))
      .sort(compareMatches)
      .slice(0, k);
  }

  get(ids: string[]): StoredDocument[] {
    if (ids.length === 0) return [];

    const placeholders = ids.map(() => "?").join(", ");
    const rows = this.db
      .prepare<string[], DocumentRow>(
        `SELECT id, document, metadata FROM vectors WHERE collection = ? AND id IN (${placeholders})`,
      )
      .all(this.name, ...ids);

    const byId = new Map(rows.map(row => [row.id, row]));
    const found: StoredDocument[] = [];
    for (const id of ids) {
      const row = byId.get(id);
      if (row) {
        found.push({ id: row.id, document: row.document, metadata: decodeMetadata(row.metadata) });
      }
    }
    return found;
  }

  count(): number {
    const row = this.db
      .prepare<[string], CountRow>("SELECT COUNT(*) AS n FROM vectors WHERE collection = ?")
      .get(this.name);
    return row?.n ?? 0;
  }
}
