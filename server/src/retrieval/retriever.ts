/**
 * Relevance Retriever
 *
 * Indexes a directory of library documents into a vector collection and
 * returns the fragments relevant to a query. One class serves both skills and
 * implants; the instances differ in directory, collection, threshold and the
 * heading used when formatting for a prompt.
 */

import { promises as fs } from "fs";
import * as path from "path";
import type { ILogger } from "@switchboard/shared/logging";
import { createComponentLogger } from "../logging.js";
import { errorMessage } from "../errors.js";
import { LibraryFrontMatterSchema, parseFrontMatter } from "../prompts/frontmatter.js";
import type { Collection } from "../vector/collection.js";
import type { Metadata } from "../vector/types.js";

// ============================================
// TYPES
// ============================================

export interface RetrievedFragment {
  /** Document id (its filename) */
  id: string;
  description: string;
  /** Body with frontmatter removed */
  content: string;
  /** 0 for fragments fetched by id */
  distance: number;
  metadata: Metadata;
}

export interface PromptSection {
  /** e.g. "## Dynamic Skills (Contextually Loaded)" */
  heading: string;
  intro: string;
  /** Per-item label, e.g. "Skill" */
  itemLabel: string;
}

export interface RetrieverOptions {
  /** Label used in logs, e.g. "skills" */
  name: string;
  collection: Collection;
  directory: string;
  /** Keep results with distance strictly below this */
  threshold: number;
  /** Results requested from the similarity query when no limit is passed */
  defaultLimit: number;
  section: PromptSection;
  extension?: string;
  log?: ILogger;
}

export interface RetrieveOptions {
  limit?: number;
  threshold?: number;
  /** Fetch these ids instead of searching; ".mdc" is appended when absent */
  preferredIds?: readonly string[];
}

// ============================================
// RETRIEVER
// ============================================

export class RelevanceRetriever {
  readonly name: string;
  readonly directory: string;
  readonly threshold: number;
  private collection: Collection;
  private defaultLimit: number;
  private section: PromptSection;
  private extension: string;
  private log: ILogger;
  private indexing: Promise<void> | null = null;

  constructor(options: RetrieverOptions) {
    this.name = options.name;
    this.collection = options.collection;
    this.directory = options.directory;
    this.threshold = options.threshold;
    this.defaultLimit = options.defaultLimit;
    this.section = options.section;
    this.extension = options.extension ?? ".mdc";
    this.log = options.log ?? createComponentLogger(`retrieval.${options.name}`);
  }

  /** Index the directory once if the collection is empty; later calls share the first run */
  ensureIndexed(): Promise<void> {
    if (!this.indexing) {
      this.indexing = this.indexIfEmpty().catch((error: unknown) => {
        this.indexing = null;
        throw error;
      });
    }
    return this.indexing;
  }

  private async indexIfEmpty(): Promise<void> {
    if (await this.collection.count() > 0) return;
    this.log.info("Store is empty, indexing", { directory: this.directory });
    await this.index();
  }

  /**
   * Read every document in the directory and upsert it under its filename.
   * Unreadable files are logged and skipped. Returns the number indexed.
   */
  async index(directory: string = this.directory): Promise<number> {
    let filenames: string[];
    try {
      filenames = (await fs.readdir(directory))
        .filter(f => f.endsWith(this.extension))
        .sort();
    } catch (error) {
      this.log.warn("Library directory not readable", { directory, error: errorMessage(error) });
      return 0;
    }

    if (filenames.length === 0) {
      this.log.warn("No documents found", { directory });
      return 0;
    }

    const ids: string[] = [];
    const documents: string[] = [];
    const metadatas: Metadata[] = [];

    for (const filename of filenames) {
      const filePath = path.join(directory, filename);
      let content: string;
      try {
        content = await fs.readFile(filePath, "utf-8");
      } catch (error) {
        this.log.error("Error reading document", error, { path: filePath });
        continue;
      }

      const { description, body } = this.parseDocument(content, filePath);
      ids.push(filename);
      documents.push(`${description}\n\n${body}`);
      metadatas.push({ filename, description, path: filePath, body });
    }

    if (ids.length > 0) {
      await this.collection.upsert(ids, documents, metadatas);
      this.log.info("Indexed documents", { count: ids.length, directory });
    }
    return ids.length;
  }

  private parseDocument(content: string, filePath: string): { description: string; body: string } {
    try {
      const { frontMatter, body } = parseFrontMatter(content, LibraryFrontMatterSchema);
      return { description: frontMatter.description, body };
    } catch (error) {
      this.log.error("Failed to parse frontmatter", error, { path: filePath });
      return { description: "", body: content };
    }
  }

  // ============================================
  // RETRIEVAL
  // ============================================

  /** Relevant fragments; collection failures are logged and yield [] */
  async retrieve(query: string, options: RetrieveOptions = {}): Promise<RetrievedFragment[]> {
    try {
      await this.ensureIndexed();
      if (await this.collection.count() === 0) return [];

      if (options.preferredIds && options.preferredIds.length > 0) {
        const preferred = await this.getByIds(options.preferredIds);
        if (preferred.length > 0) return preferred;
      }

      return await this.search(query, options.limit ?? this.defaultLimit, options.threshold ?? this.threshold);
    } catch (error) {
      this.log.error("Retrieval failed", error, { query: query.slice(0, 100) });
      return [];
    }
  }

  /** Fetch by id in request order with distance 0; a failed fetch yields [] */
  async getByIds(ids: readonly string[]): Promise<RetrievedFragment[]> {
    const targetIds = ids.map(id => (id.endsWith(this.extension) ? id : `${id}${this.extension}`));
    try {
      const result = await this.collection.get(targetIds);
      const fragments = result.ids.map((id, i) => toFragment(id, result.metadatas[i], result.documents[i], 0));
      this.log.info("Loaded preferred documents", { requested: targetIds, found: fragments.length });
      return fragments;
    } catch (error) {
      this.log.warn("Failed to load preferred documents", { requested: targetIds, error: errorMessage(error) });
      return [];
    }
  }

  private async search(query: string, limit: number, threshold: number): Promise<RetrievedFragment[]> {
    const result = await this.collection.query(query, limit);
    const fragments: RetrievedFragment[] = [];
    result.ids.forEach((id, i) => {
      const distance = result.distances[i];
      if (distance < threshold) {
        fragments.push(toFragment(id, result.metadatas[i], result.documents[i], distance));
      }
    });
    this.log.debug("Similarity search", { candidates: result.ids.length, kept: fragments.length });
    return fragments;
  }

  // ============================================
  // FORMATTING
  // ============================================

  formatForPrompt(fragments: readonly RetrievedFragment[]): string {
    if (fragments.length === 0) return "";

    let formatted = `${this.section.heading}\n${this.section.intro}\n\n`;
    for (const fragment of fragments) {
      formatted += `### ${this.section.itemLabel}: ${fragment.id}\n`;
      formatted += `**Description**: ${fragment.description || "No description"}\n`;
      formatted += `${fragment.content}\n\n`;
    }
    return formatted;
  }
}

function toFragment(id: string, metadata: Metadata, document: string, distance: number): RetrievedFragment {
  const body = metadata.body;
  const description = metadata.description;
  return {
    id,
    description: typeof description === "string" ? description : "",
    content: typeof body === "string" ? body : document,
    distance,
    metadata,
  };
}
