/**
 * Skills & Implants
 *
 * The two retriever instances over the prompt library: skills are task
 * knowledge loaded by id or by close match; implants are reasoning strategies
 * matched more loosely against the query, the agent's role and recent history.
 */

import type { ILogger } from "@switchboard/shared/logging";
import { historyTail, type RequestContext } from "../context/context-builder.js";
import { libraryPath, type PromptLayout } from "../prompts/layout.js";
import type { Collection } from "../vector/collection.js";
import { RelevanceRetriever, type PromptSection } from "./retriever.js";

export const SKILLS_COLLECTION = "skills_store";
export const IMPLANTS_COLLECTION = "implants_store";

export const SKILLS_SECTION: PromptSection = {
  heading: "## Dynamic Skills (Contextually Loaded)",
  intro: "The following specialized skills have been loaded to help with the request:",
  itemLabel: "Skill",
};

export const IMPLANTS_SECTION: PromptSection = {
  heading: "## Dynamic Implants (Contextually Loaded)",
  intro: "The following cognitive implants have been loaded to augment reasoning:",
  itemLabel: "Implant",
};

/** Implants suggested for each kind of task */
export const TASK_IMPLANT_MAP: Readonly<Record<string, readonly string[]>> = {
  debugging: ["implant-chain-of-code", "implant-reflexion"],
  analysis: ["implant-step-back-prompting", "implant-chain-of-verification"],
  creative: ["implant-analogical-prompting", "implant-generated-knowledge"],
  planning: ["implant-plan-and-solve-plus", "implant-skeleton-of-thought"],
};

export interface LibraryRetrieverOptions {
  layout: PromptLayout;
  collection: Collection;
  threshold?: number;
  log?: ILogger;
}

export function createSkillRetriever(options: LibraryRetrieverOptions): RelevanceRetriever {
  return new RelevanceRetriever({
    name: "skills",
    collection: options.collection,
    directory: libraryPath(options.layout, "skills"),
    threshold: options.threshold ?? 0.45,
    defaultLimit: 2,
    section: SKILLS_SECTION,
    extension: options.layout.extension,
    log: options.log,
  });
}

export function createImplantRetriever(options: LibraryRetrieverOptions): RelevanceRetriever {
  return new RelevanceRetriever({
    name: "implants",
    collection: options.collection,
    directory: libraryPath(options.layout, "implants"),
    threshold: options.threshold ?? 0.73,
    defaultLimit: 3,
    section: IMPLANTS_SECTION,
    extension: options.layout.extension,
    log: options.log,
  });
}

/** Implant search text: the query, then the role and the last 300 history characters when present */
export function composeImplantQuery(query: string, role?: string, context?: RequestContext): string {
  const parts = [`Query: ${query}`];
  if (role) parts.push(`Role: ${role}`);
  const history = context ? historyTail(context, 300) : "";
  if (history) parts.push(`Context: ${history}`);
  return parts.join("\n");
}
