/**
 * Embedding Functions
 *
 * - HashingEmbedder: offline feature hashing over words and word pairs.
 *   Deterministic, no model download; good enough for near-duplicate detection.
 * - OpenAIEmbedder: any OpenAI-compatible /embeddings endpoint.
 */

import { z } from "zod";
import { UpstreamError, errorMessage } from "../errors.js";
import { l2Normalize } from "./math.js";
import type { EmbeddingFunction } from "./types.js";

// ============================================
// HASHING EMBEDDER
// ============================================

/** 32-bit FNV-1a */
function fnv1a(text: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < text.length; i++) {
    hash ^= text.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

export function tokenize(text: string): string[] {
  return text.toLowerCase().split(/[^\p{L}\p{N}]+/u).filter(Boolean);
}

export class HashingEmbedder implements EmbeddingFunction {
  readonly dimensions: number;

  constructor(dimensions: number = 384) {
    if (!Number.isInteger(dimensions) || dimensions < 8) {
      throw new RangeError(`Embedding dimensions must be an integer >= 8, got ${dimensions}`);
    }
    this.dimensions = dimensions;
  }

  embedOne(text: string): number[] {
    const vector = new Array<number>(this.dimensions).fill(0);
    const tokens = tokenize(text);

    const features = [...tokens];
    for (let i = 0; i + 1 < tokens.length; i++) {
      features.push(`${tokens[i]} ${tokens[i + 1]}`);
    }

    for (const feature of features) {
      const hash = fnv1a(feature);
      // Low bits pick the slot, the top bit picks the sign
      const sign = hash & 0x80000000 ? -1 : 1;
      vector[hash % this.dimensions] += sign;
    }

    return l2Normalize(vector);
  }

  async embed(texts: string[]): Promise<number[][]> {
    return texts.map(t => this.embedOne(t));
  }
}

// ============================================
// OPENAI-COMPATIBLE EMBEDDER
// ============================================

const EmbeddingResponseSchema = z.object({
  data: z.array(z.object({
    index: z.number().int(),
    embedding: z.array(z.number()),
  })),
});

export interface OpenAIEmbedderOptions {
  apiKey: string;
  baseUrl: string;
  model: string;
  dimensions: number;
  timeoutMs?: number;
}

export class OpenAIEmbedder implements EmbeddingFunction {
  readonly dimensions: number;
  private apiKey: string;
  private baseUrl: string;
  private model: string;
  private timeoutMs: number;

  constructor(options: OpenAIEmbedderOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.model = options.model;
    this.dimensions = options.dimensions;
    this.timeoutMs = options.timeoutMs ?? 30_000;
  }

  async embed(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];

    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (this.apiKey) {
      headers["Authorization"] = `Bearer ${this.apiKey}`;
    }

    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/embeddings`, {
        method: "POST",
        headers,
        body: JSON.stringify({ model: this.model, input: texts, dimensions: this.dimensions }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new UpstreamError("embeddings", errorMessage(error), { cause: error });
    }

    if (!response.ok) {
      throw new UpstreamError("embeddings", `API error: ${response.status} ${await response.text()}`);
    }

    const parsed = EmbeddingResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new UpstreamError("embeddings", `unexpected response shape: ${parsed.error.message}`);
    }

    const vectors = [...parsed.data.data].sort((a, b) => a.index - b.index).map(d => d.embedding);
    if (vectors.length !== texts.length) {
      throw new UpstreamError("embeddings", `expected ${texts.length} embeddings, got ${vectors.length}`);
    }
    return vectors;
  }
}
