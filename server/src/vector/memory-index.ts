/**
 * In-memory VectorIndex. Brute-force cosine scan; fine for prompt libraries
 * of a few thousand entries and for tests.
 */

import { cosineDistance, compareMatches } from "./math.js";
import type { VectorIndex, VectorRecord, IndexMatch, StoredDocument } from "./types.js";

export class MemoryVectorIndex implements VectorIndex {
  readonly name: string;
  private records = new Map<string, VectorRecord>();

  constructor(name: string) {
    this.name = name;
  }

  upsert(records: VectorRecord[]): void {
    for (const record of records) {
      this.records.set(record.id, {
        ...record,
        metadata: { ...record.metadata },
        embedding: [...record.embedding],
      });
    }
  }

  query(embedding: number[], k: number): IndexMatch[] {
    if (k <= 0) return [];

    const matches: IndexMatch[] = [];
    for (const record of this.records.values()) {
      matches.push({
        id: record.id,
        document: record.document,
        metadata: { ...record.metadata },
        distance: cosineDistance(embedding, record.embedding),
      });
    }
    return matches.sort(compareMatches).slice(0, k);
  }

  get(ids: string[]): StoredDocument[] {
    const found: StoredDocument[] = [];
    for (const id of ids) {
      const record = this.records.get(id);
      if (record) {
        found.push({ id: record.id, document: record.document, metadata: { ...record.metadata } });
      }
    }
    return found;
  }

  count(): number {
    return this.records.size;
  }
}
