/**
 * Agent Library
 *
 * Discovers agent profiles under <root>/.cursor/agents and loads them through
 * the resolver. A profile is a directory holding system_prompt.mdc; the
 * shared "common" directory is never an agent.
 */

import * as fs from "fs";
import * as path from "path";
import type { ILogger } from "@switchboard/shared/logging";
import { createComponentLogger } from "../logging.js";
import { AgentNotFoundError, PromptNotFoundError, SecurityViolationError, errorMessage } from "../errors.js";
import { AgentFrontMatterSchema, parseFrontMatter, type AgentFrontMatter } from "./frontmatter.js";
import { PROFILE_FILENAME, agentsDir, isInsideRoot } from "./layout.js";
import type { PromptResolver, ResolutionResult } from "./resolver.js";

const SHARED_DIRECTORY = "common";

/**
 * Sorted names of every non-hidden subdirectory (except "common") that holds
 * a profile. A missing or unreadable directory yields [].
 */
export function scanAgents(directory: string, log?: ILogger): string[] {
  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(directory, { withFileTypes: true });
  } catch (error) {
    log?.warn("Agents directory not readable", { directory, error: errorMessage(error) });
    return [];
  }

  return entries
    .filter(e => e.isDirectory() && !e.name.startsWith(".") && e.name !== SHARED_DIRECTORY)
    .filter(e => fs.existsSync(path.join(directory, e.name, PROFILE_FILENAME)))
    .map(e => e.name)
    .sort();
}

export class AgentLibrary {
  readonly resolver: PromptResolver;
  private log: ILogger;

  constructor(resolver: PromptResolver, log: ILogger = createComponentLogger("agents")) {
    this.resolver = resolver;
    this.log = log;
  }

  get directory(): string {
    return agentsDir(this.resolver.layout);
  }

  listAgents(): string[] {
    return scanAgents(this.directory, this.log);
  }

  /**
   * Absolute profile path. The agent name must name a direct child of the
   * agents directory; anything else is a SecurityViolationError.
   */
  profilePath(agentName: string): string {
    const dir = this.directory;
    const agentDir = path.resolve(dir, agentName);
    if (
      agentName.length === 0
      || path.dirname(agentDir) !== dir
      || !isInsideRoot(this.resolver.layout.root, agentDir)
    ) {
      throw new SecurityViolationError(agentName);
    }
    return path.join(agentDir, PROFILE_FILENAME);
  }

  async loadAgentPrompt(agentName: string): Promise<string> {
    return (await this.loadAgentPromptWithReport(agentName)).text;
  }

  async loadAgentPromptWithReport(agentName: string): Promise<ResolutionResult> {
    const profile = this.profilePath(agentName);
    try {
      return await this.resolver.resolveFile(profile, agentName);
    } catch (error) {
      if (error instanceof PromptNotFoundError) {
        throw new AgentNotFoundError(agentName, profile);
      }
      throw error;
    }
  }

  /** Validated profile frontmatter; schema defaults when missing or invalid */
  async getAgentMetadata(agentName: string): Promise<AgentFrontMatter> {
    const defaults = AgentFrontMatterSchema.parse({});
    try {
      const content = await fs.promises.readFile(this.profilePath(agentName), "utf-8");
      return parseFrontMatter(content, AgentFrontMatterSchema).frontMatter;
    } catch (error) {
      this.log.warn("Agent metadata unavailable, using defaults", {
        agent: agentName,
        error: errorMessage(error),
      });
      return defaults;
    }
  }
}
