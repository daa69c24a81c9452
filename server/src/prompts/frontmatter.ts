/**
 * Frontmatter
 *
 * Library documents may open with a YAML block between two `---` lines.
 * The block is parsed with `yaml` and validated against a zod schema; fields
 * the schema does not name are dropped.
 */

import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { FrontMatterError, errorMessage } from "../errors.js";

// ============================================
// SCHEMAS
// ============================================

/** Skill and implant documents */
export const LibraryFrontMatterSchema = z.object({
  description: z.string().default(""),
});

export type LibraryFrontMatter = z.infer<typeof LibraryFrontMatterSchema>;

/** Agent profiles (system_prompt.mdc) */
export const AgentFrontMatterSchema = z.object({
  description: z.string().optional(),
  /** Sub-fields are optional here; the library validator reports each missing one */
  identity: z.object({
    name: z.string().optional(),
    display_name: z.string().optional(),
    role: z.string().optional(),
    tone: z.string().optional(),
  }).optional(),
  routing: z.object({
    domain_keywords: z.array(z.string()).optional(),
    trigger_command: z.string().optional(),
  }).optional(),
  context: z.object({
    file_globs: z.array(z.string()).optional(),
  }).optional(),
  /** Skill ids loaded by id instead of by similarity, without extension */
  preferred_skills: z.array(z.string()).default([]),
  /** Skill files always imported by the profile itself, with extension */
  static_skills: z.array(z.string()).default([]),
  /** Superseded by preferred_skills/static_skills; kept so the validator can flag it */
  skills: z.unknown().optional(),
});

export type AgentFrontMatter = z.infer<typeof AgentFrontMatterSchema>;

// ============================================
// SPLITTING
// ============================================

const FRONTMATTER_PATTERN = /^---[ \t]*\n(?:([\s\S]*?)\n)?---[ \t]*(?:\n|$)([\s\S]*)$/;

export interface SplitDocument {
  /** YAML text between the delimiters, or null when there is no block */
  raw: string | null;
  /** Text after the closing delimiter (trimmed), or the whole document */
  body: string;
}

export function splitFrontMatter(content: string): SplitDocument {
  const normalized = content.replace(/\r\n/g, "\n");
  const match = normalized.match(FRONTMATTER_PATTERN);
  if (!match) return { raw: null, body: content };
  return { raw: match[1] ?? "", body: match[2].trim() };
}

/** Body with any frontmatter block removed */
export function stripFrontMatter(content: string): string {
  return splitFrontMatter(content).body;
}

// ============================================
// PARSING
// ============================================

export interface ParsedDocument<T> {
  frontMatter: T;
  body: string;
  hasFrontMatter: boolean;
}

/**
 * Split and validate. A document without a block validates `{}`, so schema
 * defaults apply. Throws FrontMatterError on bad YAML or schema mismatch.
 */
export function parseFrontMatter<S extends z.ZodTypeAny>(content: string, schema: S): ParsedDocument<z.output<S>> {
  const { raw, body } = splitFrontMatter(content);

  let data: unknown = {};
  if (raw !== null) {
    try {
      data = parseYaml(raw) ?? {};
    } catch (error) {
      throw new FrontMatterError(`Invalid YAML frontmatter: ${errorMessage(error)}`, { cause: error });
    }
  }

  const result = schema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new FrontMatterError(`Invalid frontmatter: ${issues.join("; ")}`);
  }

  return { frontMatter: result.data, body, hasFrontMatter: raw !== null };
}
