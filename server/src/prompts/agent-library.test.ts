import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as path from "path";
import { AgentLibrary, scanAgents } from "./agent-library.js";
import { createLayout } from "./layout.js";
import { PromptResolver } from "./resolver.js";
import { AgentNotFoundError, SecurityViolationError } from "../errors.js";
import { createTestLogger, makeTempDir, removeDir, writeTree } from "../testing/helpers.js";

let root: string;
let library: AgentLibrary;

describe("scanAgents", () => {
  beforeEach(() => {
    root = makeTempDir();
  });

  afterEach(() => {
    removeDir(root);
  });

  it("lists sorted profile directories, skipping hidden, common and incomplete ones", () => {
    writeTree(root, {
      "agents/zeta/system_prompt.mdc": "Z",
      "agents/alpha/system_prompt.mdc": "A",
      "agents/common/system_prompt.mdc": "shared",
      "agents/.draft/system_prompt.mdc": "hidden",
      "agents/empty/notes.md": "no profile",
      "agents/stray.mdc": "file, not a directory",
    });
    expect(scanAgents(path.join(root, "agents"))).toEqual(["alpha", "zeta"]);
  });

  it("returns [] for a missing directory", () => {
    expect(scanAgents(path.join(root, "nope"))).toEqual([]);
  });
});

describe("AgentLibrary", () => {
  beforeEach(() => {
    root = makeTempDir();
    const { log } = createTestLogger();
    library = new AgentLibrary(new PromptResolver(createLayout(root), log), log);
    writeTree(root, {
      ".cursor/agents/security_expert/system_prompt.mdc": [
        "---",
        "description: Security",
        "preferred_skills: [owasp]",
        "---",
        "You are a security expert. @agents/common/rules.mdc",
      ].join("\n"),
      ".cursor/agents/common/rules.mdc": "Be precise.",
      ".cursor/agents/broken/system_prompt.mdc": "---\npreferred_skills: 12\n---\nBody",
    });
  });

  afterEach(() => {
    removeDir(root);
  });

  it("lists the agents under the library", () => {
    expect(library.listAgents()).toEqual(["broken", "security_expert"]);
  });

  it("loads a resolved profile", async () => {
    expect(await library.loadAgentPrompt("security_expert")).toBe("You are a security expert. Be precise.");
  });

  it("raises AgentNotFoundError for an unknown agent", async () => {
    await expect(library.loadAgentPrompt("ghost")).rejects.toBeInstanceOf(AgentNotFoundError);
  });

  it("rejects agent names that leave the agents directory", async () => {
    expect(() => library.profilePath("../../../etc")).toThrow(SecurityViolationError);
    expect(() => library.profilePath("security_expert/../../skills")).toThrow(SecurityViolationError);
    await expect(library.loadAgentPrompt("..")).rejects.toBeInstanceOf(SecurityViolationError);
  });

  it("reads validated metadata", async () => {
    expect(await library.getAgentMetadata("security_expert")).toEqual({
      description: "Security",
      preferred_skills: ["owasp"],
      static_skills: [],
    });
  });

  it("falls back to defaults for invalid or missing metadata", async () => {
    const defaults = { preferred_skills: [], static_skills: [] };
    expect(await library.getAgentMetadata("broken")).toEqual(defaults);
    expect(await library.getAgentMetadata("ghost")).toEqual(defaults);
  });

  it("does not treat the profile file of another directory as an agent", () => {
    fs.mkdirSync(path.join(root, ".cursor", "agents", "wip"));
    expect(library.listAgents()).toEqual(["broken", "security_expert"]);
  });
});
