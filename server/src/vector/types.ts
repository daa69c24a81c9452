/**
 * Vector Store Types
 *
 * A VectorIndex is the synchronous nearest-neighbour store (memory or SQLite).
 * A Collection wraps one with an embedding function and the blocking pool and
 * is what the router and retrievers talk to.
 */

// ============================================
// RECORDS
// ============================================

export type MetadataValue = string | number | boolean;
export type Metadata = Record<string, MetadataValue>;

export interface VectorRecord {
  id: string;
  document: string;
  metadata: Metadata;
  embedding: number[];
}

export interface StoredDocument {
  id: string;
  document: string;
  metadata: Metadata;
}

export interface IndexMatch extends StoredDocument {
  /** Cosine distance, 0 = identical direction */
  distance: number;
}

// ============================================
// INDEX (synchronous)
// ============================================

export interface VectorIndex {
  readonly name: string;
  /** Insert or overwrite by id */
  upsert(records: VectorRecord[]): void;
  /** Up to k matches, ascending distance */
  query(embedding: number[], k: number): IndexMatch[];
  /** Stored documents for the ids that exist, in request order */
  get(ids: string[]): StoredDocument[];
  count(): number;
}

// ============================================
// EMBEDDINGS
// ============================================

/** Deterministic text -> fixed-dimension vector */
export interface EmbeddingFunction {
  readonly dimensions: number;
  embed(texts: string[]): Promise<number[][]>;
}

// ============================================
// COLLECTION RESULTS (column-oriented)
// ============================================

export interface QueryResult {
  ids: string[];
  distances: number[];
  metadatas: Metadata[];
  documents: string[];
}

export interface GetResult {
  ids: string[];
  metadatas: Metadata[];
  documents: string[];
}

export function isMetadata(value: unknown): value is Metadata {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return false;
  return Object.values(value).every(
    v => typeof v === "string" || typeof v === "number" || typeof v === "boolean"
  );
}
