/**
 * Agent Library Validation
 *
 * Checks every agent profile. Errors: missing frontmatter, incomplete
 * identity/routing/context blocks, references that do not expand cleanly.
 * Warnings: deprecated fields, skill list conventions, no description.
 */

import { promises as fs } from "fs";
import { errorMessage } from "../errors.js";
import type { AgentLibrary } from "./agent-library.js";
import { AgentFrontMatterSchema, parseFrontMatter } from "./frontmatter.js";

const IDENTITY_FIELDS = ["name", "display_name", "role", "tone"] as const;

export interface AgentValidationReport {
  agent: string;
  path: string;
  errors: string[];
  warnings: string[];
}

export interface LibraryValidationReport {
  agents: AgentValidationReport[];
  /** True when no agent has errors */
  ok: boolean;
}

export async function validateAgentLibrary(library: AgentLibrary): Promise<LibraryValidationReport> {
  const agents: AgentValidationReport[] = [];
  for (const agent of library.listAgents()) {
    agents.push(await validateAgent(library, agent));
  }
  return { agents, ok: agents.every(a => a.errors.length === 0) };
}

export async function validateAgent(library: AgentLibrary, agent: string): Promise<AgentValidationReport> {
  const profile = library.profilePath(agent);
  const report: AgentValidationReport = { agent, path: profile, errors: [], warnings: [] };

  let content: string;
  try {
    content = await fs.readFile(profile, "utf-8");
  } catch (error) {
    report.errors.push(`Cannot read profile: ${errorMessage(error)}`);
    return report;
  }

  try {
    const { frontMatter, hasFrontMatter } = parseFrontMatter(content, AgentFrontMatterSchema);
    if (!hasFrontMatter) {
      report.errors.push("Missing frontmatter");
    } else {
      const { identity, routing, context } = frontMatter;
      if (identity) {
        for (const field of IDENTITY_FIELDS) {
          if (identity[field] === undefined) report.errors.push(`Missing identity.${field}`);
        }
      }
      if (routing) {
        if (routing.domain_keywords === undefined) report.errors.push("Missing routing.domain_keywords");
        if (routing.trigger_command === undefined) report.errors.push("Missing routing.trigger_command");
      }
      if (context && context.file_globs === undefined) {
        report.errors.push("Missing context.file_globs");
      }

      if (frontMatter.skills !== undefined) {
        report.warnings.push("Deprecated 'skills' field; use 'preferred_skills' or 'static_skills'");
      }
      for (const skill of frontMatter.preferred_skills) {
        if (skill.endsWith(".mdc")) {
          report.warnings.push(`preferred_skills entry '${skill}' should not include the .mdc extension`);
        }
      }
      for (const skill of frontMatter.static_skills) {
        if (!skill.endsWith(".mdc")) {
          report.warnings.push(`static_skills entry '${skill}' should end with .mdc`);
        }
      }
      if (!frontMatter.description) {
        report.warnings.push("No description");
      }
    }
  } catch (error) {
    report.errors.push(errorMessage(error));
  }

  try {
    const { issues } = await library.loadAgentPromptWithReport(agent);
    for (const issue of issues) {
      report.errors.push(`Unresolved reference ${issue.token} (${issue.kind}): ${issue.message}`);
    }
  } catch (error) {
    report.errors.push(`Cannot resolve profile: ${errorMessage(error)}`);
  }

  return report;
}
