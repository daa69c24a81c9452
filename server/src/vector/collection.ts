/**
 * Collection
 *
 * The asynchronous store the router and retrievers use: embeds text with the
 * configured EmbeddingFunction, then hands the synchronous index call to the
 * blocking pool. Results come back column-oriented.
 */

import type { BlockingPool } from "./pool.js";
import type {
  EmbeddingFunction,
  GetResult,
  Metadata,
  QueryResult,
  VectorIndex,
  VectorRecord,
} from "./types.js";

export interface CollectionOptions {
  index: VectorIndex;
  embedder: EmbeddingFunction;
  pool: BlockingPool;
}

export class Collection {
  private index: VectorIndex;
  private embedder: EmbeddingFunction;
  private pool: BlockingPool;

  constructor(options: CollectionOptions) {
    this.index = options.index;
    this.embedder = options.embedder;
    this.pool = options.pool;
  }

  get name(): string {
    return this.index.name;
  }

  async upsert(ids: string[], documents: string[], metadatas: Metadata[]): Promise<void> {
    if (ids.length !== documents.length || ids.length !== metadatas.length) {
      throw new RangeError(
        `upsert length mismatch: ${ids.length} ids, ${documents.length} documents, ${metadatas.length} metadatas`,
      );
    }
    if (ids.length === 0) return;

    const embeddings = await this.embedder.embed(documents);
    const records: VectorRecord[] = ids.map((id, i) => ({
      id,
      document: documents[i],
      metadata: metadatas[i],
      embedding: embeddings[i],
    }));

    await this.pool.run(() => this.index.upsert(records));
  }

  async query(text: string, k: number): Promise<QueryResult> {
    const [embedding] = await this.embedder.embed([text]);
    const matches = await this.pool.run(() => this.index.query(embedding, k));

    return {
      ids: matches.map(m => m.id),
      distances: matches.map(m => m.distance),
      metadatas: matches.map(m => m.metadata),
      documents: matches.map(m => m.document),
    };
  }

  async get(ids: string[]): Promise<GetResult> {
    const found = await this.pool.run(() => this.index.get(ids));
    return {
      ids: found.map(d => d.id),
      metadatas: found.map(d => d.metadata),
      documents: found.map(d => d.document),
    };
  }

  async count(): Promise<number> {
    return this.pool.run(() => this.index.count());
  }
}
