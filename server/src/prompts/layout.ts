/**
 * Prompt Library Layout & Path Resolution
 *
 * <root>/
 *   .cursor/
 *     agents/<agent>/system_prompt.mdc
 *     skills/*.mdc
 *     implants/*.mdc
 *
 * References inside documents come in several shorthand forms; all of them
 * resolve to an absolute path that must stay inside <root>.
 */

import * as fs from "fs";
import * as path from "path";
import { SecurityViolationError } from "../errors.js";

export interface PromptLayout {
  /** Sandbox root (absolute) */
  root: string;
  /** Library directory under the root */
  libraryDir: string;
  /** Agent profiles sub-area under the library directory */
  agentsArea: string;
  /** Canonical document extension */
  extension: string;
  /** Marks a reference token inside a document */
  sigil: string;
}

export const PROFILE_FILENAME = "system_prompt.mdc";

export function createLayout(root: string, overrides: Partial<Omit<PromptLayout, "root">> = {}): PromptLayout {
  return {
    root: path.resolve(root),
    libraryDir: overrides.libraryDir ?? ".cursor",
    agentsArea: overrides.agentsArea ?? "agents",
    extension: overrides.extension ?? ".mdc",
    sigil: overrides.sigil ?? "@",
  };
}

export function libraryPath(layout: PromptLayout, ...segments: string[]): string {
  return path.join(layout.root, layout.libraryDir, ...segments);
}

export function agentsDir(layout: PromptLayout): string {
  return libraryPath(layout, layout.agentsArea);
}

// ============================================
// SANDBOX
// ============================================

/** True when `target` is `root` itself or lies below it */
export function isInsideRoot(root: string, target: string): boolean {
  const rel = path.relative(root, target);
  if (rel === "") return true;
  if (path.isAbsolute(rel)) return false;
  return rel !== ".." && !rel.startsWith(`..${path.sep}`);
}

export function assertInsideRoot(layout: PromptLayout, absolutePath: string, reference: string): string {
  const resolved = path.resolve(absolutePath);
  if (!isInsideRoot(layout.root, resolved)) {
    throw new SecurityViolationError(reference);
  }
  return resolved;
}

// ============================================
// REFERENCE RESOLUTION
// ============================================

/**
 * Map a reference to an absolute path under the root.
 *
 *   @.cursor/skills/x.mdc   -> <root>/.cursor/skills/x.mdc
 *   @agents/common/p.mdc    -> <root>/.cursor/agents/common/p.mdc
 *   @skills/x.mdc           -> <root>/.cursor/skills/x.mdc if it exists, else <root>/skills/x.mdc
 *   docs/x.mdc              -> <root>/docs/x.mdc
 *
 * Throws SecurityViolationError when the result leaves the root.
 */
export function resolveReference(
  reference: string,
  layout: PromptLayout,
  exists: (p: string) => boolean = fs.existsSync,
): string {
  if (!reference.startsWith(layout.sigil)) {
    return assertInsideRoot(layout, path.join(layout.root, reference), reference);
  }

  const clean = reference.slice(layout.sigil.length);
  const firstSegment = clean.split(/[\\/]/)[0];

  if (firstSegment === layout.libraryDir) {
    return assertInsideRoot(layout, path.join(layout.root, clean), reference);
  }
  if (firstSegment === layout.agentsArea) {
    return assertInsideRoot(layout, libraryPath(layout, clean), reference);
  }

  // Only probe the library candidate when probing cannot leave the sandbox
  const inLibrary = path.resolve(libraryPath(layout, clean));
  if (isInsideRoot(layout.root, inLibrary) && exists(inLibrary)) {
    return inLibrary;
  }
  return assertInsideRoot(layout, path.join(layout.root, clean), reference);
}
