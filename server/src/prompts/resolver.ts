/**
 * Prompt Resolver
 *
 * Flattens a document by replacing every reference token with the referenced
 * document's (recursively resolved) body. Each parsed node list is evaluated
 * against a visited set: the paths inherited from above plus every path an
 * earlier reference in the same list already expanded. A child list gets a
 * copy, so what it visits never leaks back to its parent's later siblings.
 *
 *   - outside the root       -> [SECURITY BLOCK: ...]
 *   - already visited        -> [CIRCULAR REFERENCE: <token>]
 *   - no such file           -> [MISSING FILE: <path>]
 *   - unreadable             -> [ERROR LOADING FILE: <path> - <reason>]
 *
 * A repeated reference in one document expands once; the repeats become
 * circular markers, which keeps diamond-shaped imports linear.
 */

import { promises as fs } from "fs";
import type { ILogger } from "@switchboard/shared/logging";
import { createComponentLogger } from "../logging.js";
import { PromptNotFoundError, SecurityViolationError, SwitchboardError, errorMessage } from "../errors.js";
import { stripFrontMatter } from "./frontmatter.js";
import { assertInsideRoot, resolveReference, type PromptLayout } from "./layout.js";
import { parsePromptDocument, type PromptNode } from "./parse.js";

// ============================================
// TYPES
// ============================================

export type ResolutionIssueKind = "security" | "circular" | "missing" | "error";

export interface ResolutionIssue {
  kind: ResolutionIssueKind;
  token: string;
  /** Absolute path, when one was computed */
  path?: string;
  message: string;
}

export interface ResolutionResult {
  text: string;
  /** Absolute path of the top-level document */
  path: string;
  /** Every inline substitution that replaced a reference with a marker */
  issues: ResolutionIssue[];
}

type LoadResult =
  | { ok: true; content: string }
  | { ok: false; kind: "missing" | "error"; message: string };

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && "code" in error && (error.code === "ENOENT" || error.code === "ENOTDIR");
}

// ============================================
// RESOLVER
// ============================================

export class PromptResolver {
  readonly layout: PromptLayout;
  private log: ILogger;

  constructor(layout: PromptLayout, log: ILogger = createComponentLogger("prompts")) {
    this.layout = layout;
    this.log = log;
  }

  /** Absolute path for a reference; throws SecurityViolationError outside the root */
  resolvePath(reference: string): string {
    return resolveReference(reference, this.layout);
  }

  async resolve(documentPath: string): Promise<string> {
    return (await this.resolveWithReport(documentPath)).text;
  }

  /**
   * Top-level entry. Raises SecurityViolationError and PromptNotFoundError;
   * everything below the top level is substituted inline.
   */
  async resolveWithReport(documentPath: string): Promise<ResolutionResult> {
    const absolutePath = this.resolvePath(documentPath);
    return this.resolveFile(absolutePath, documentPath);
  }

  /** Same as resolveWithReport() for an already absolute path; the sandbox check still runs */
  async resolveFile(absolutePath: string, reference: string = absolutePath): Promise<ResolutionResult> {
    const checked = assertInsideRoot(this.layout, absolutePath, reference);

    const loaded = await this.load(checked);
    if (!loaded.ok) {
      if (loaded.kind === "missing") throw new PromptNotFoundError(checked);
      throw new SwitchboardError(`Failed to load ${checked}: ${loaded.message}`);
    }

    const issues: ResolutionIssue[] = [];
    const nodes = parsePromptDocument(stripFrontMatter(loaded.content), this.layout);
    const text = await this.evaluate(nodes, new Set([checked]), issues);

    if (issues.length > 0) {
      this.log.warn("Resolved with substitutions", {
        document: checked,
        issues: issues.map(i => `${i.kind}:${i.token}`),
      });
    }
    return { text, path: checked, issues };
  }

  /** Expand references in free text; nothing is treated as an ancestor */
  async expand(text: string): Promise<string> {
    return this.evaluate(parsePromptDocument(text, this.layout), new Set(), []);
  }

  // ----------------------------------------
  // Evaluation
  // ----------------------------------------

  private async evaluate(
    nodes: PromptNode[],
    inherited: ReadonlySet<string>,
    issues: ResolutionIssue[],
  ): Promise<string> {
    const visited = new Set(inherited);
    const parts: string[] = [];
    for (const node of nodes) {
      parts.push(node.kind === "text" ? node.text : await this.substitute(node.token, visited, issues));
    }
    return parts.join("");
  }

  private async substitute(
    token: string,
    visited: Set<string>,
    issues: ResolutionIssue[],
  ): Promise<string> {
    let target: string;
    try {
      target = this.resolvePath(token);
    } catch (error) {
      if (error instanceof SecurityViolationError) {
        issues.push({ kind: "security", token, message: error.message });
        return `[SECURITY BLOCK: ${error.message}]`;
      }
      throw error;
    }

    if (visited.has(target)) {
      issues.push({ kind: "circular", token, path: target, message: `Circular reference to ${target}` });
      return `[CIRCULAR REFERENCE: ${token}]`;
    }

    visited.add(target);
    const loaded = await this.load(target);
    if (!loaded.ok) {
      issues.push({ kind: loaded.kind, token, path: target, message: loaded.message });
      return loaded.kind === "missing"
        ? `[MISSING FILE: ${target}]`
        : `[ERROR LOADING FILE: ${target} - ${loaded.message}]`;
    }

    const nodes = parsePromptDocument(stripFrontMatter(loaded.content), this.layout);
    return this.evaluate(nodes, visited, issues);
  }

  private async load(absolutePath: string): Promise<LoadResult> {
    try {
      return { ok: true, content: await fs.readFile(absolutePath, "utf-8") };
    } catch (error) {
      if (isMissingFileError(error)) {
        return { ok: false, kind: "missing", message: `No such file: ${absolutePath}` };
      }
      this.log.error("Failed to read prompt file", error, { path: absolutePath });
      return { ok: false, kind: "error", message: errorMessage(error) };
    }
  }
}
