/**
 * Test helpers: a logger that records into memory, a fixed-vector embedder,
 * in-memory collections and temp-dir document trees.
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { Logger, MemoryTransport } from "@switchboard/shared/logging";
import { Collection } from "../vector/collection.js";
import { MemoryVectorIndex } from "../vector/memory-index.js";
import { BlockingPool } from "../vector/pool.js";
import type { EmbeddingFunction } from "../vector/types.js";

export function createTestLogger(): { log: Logger; memory: MemoryTransport } {
  const memory = new MemoryTransport();
  const log = new Logger({ minLevel: "trace", component: "test", transports: [memory] });
  return { log, memory };
}

/**
 * Looks texts up in a table; anything else gets `fallback` (a zero vector by
 * default, which is at distance 1 from everything). Records every call.
 */
export class FixedEmbedder implements EmbeddingFunction {
  readonly dimensions: number;
  readonly calls: string[][] = [];
  private table: Map<string, number[]>;
  private fallback: number[];

  constructor(table: Record<string, number[]>, dimensions: number, fallback?: number[]) {
    this.table = new Map(Object.entries(table));
    this.dimensions = dimensions;
    this.fallback = fallback ?? new Array<number>(dimensions).fill(0);
  }

  async embed(texts: string[]): Promise<number[][]> {
    this.calls.push([...texts]);
    return texts.map(t => this.table.get(t) ?? this.fallback);
  }
}

export function createMemoryCollection(name: string, embedder: EmbeddingFunction): {
  collection: Collection;
  index: MemoryVectorIndex;
} {
  const index = new MemoryVectorIndex(name);
  const collection = new Collection({ index, embedder, pool: new BlockingPool(2) });
  return { collection, index };
}

export function makeTempDir(prefix: string = "switchboard-test-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

/** Write files (relative path -> content) under root, creating directories */
export function writeTree(root: string, files: Record<string, string>): void {
  for (const [relative, content] of Object.entries(files)) {
    const target = path.join(root, relative);
    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.writeFileSync(target, content, "utf-8");
  }
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}
