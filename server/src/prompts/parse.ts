/**
 * Reference parsing: a document becomes a flat list of literal text and
 * reference nodes. Tokens are the sigil, a path of [A-Za-z0-9_./-], and the
 * canonical extension, matched case-sensitively.
 */

import type { PromptLayout } from "./layout.js";

export type PromptNode =
  | { kind: "text"; text: string }
  | { kind: "reference"; token: string };

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export function referencePattern(layout: Pick<PromptLayout, "sigil" | "extension">): RegExp {
  return new RegExp(`${escapeRegExp(layout.sigil)}[\\w./-]+${escapeRegExp(layout.extension)}`, "g");
}

export function parsePromptDocument(
  text: string,
  layout: Pick<PromptLayout, "sigil" | "extension">,
): PromptNode[] {
  const nodes: PromptNode[] = [];
  let cursor = 0;

  for (const match of text.matchAll(referencePattern(layout))) {
    const start = match.index ?? 0;
    if (start > cursor) {
      nodes.push({ kind: "text", text: text.slice(cursor, start) });
    }
    nodes.push({ kind: "reference", token: match[0] });
    cursor = start + match[0].length;
  }

  if (cursor < text.length) {
    nodes.push({ kind: "text", text: text.slice(cursor) });
  }
  return nodes;
}

export function listReferences(text: string, layout: Pick<PromptLayout, "sigil" | "extension">): string[] {
  return parsePromptDocument(text, layout).flatMap(n => (n.kind === "reference" ? [n.token] : []));
}
