/**
 * Switchboard
 *
 * Composes the router, the agent library and the two retrievers into the
 * operations callers use: routing info for a query, the composed prompt for
 * a chosen agent, dynamic context on its own, and the full request pipeline
 * ending in a completion call.
 *
 * Composed prompt = resolved agent profile + "\n\n" + skills/implants
 * sections (omitted when nothing relevant was found).
 */

import { createHash } from "crypto";
import { nanoid } from "nanoid";
import type { ILogger } from "@switchboard/shared/logging";
import { createComponentLogger } from "../logging.js";
import { SwitchboardError, errorMessage } from "../errors.js";
import { buildContext, type LanguageDetector, type RequestContext } from "../context/context-builder.js";
import type { ILLMClient } from "../llm/types.js";
import type { AgentLibrary } from "../prompts/agent-library.js";
import { TASK_IMPLANT_MAP, composeImplantQuery } from "../retrieval/library.js";
import type { RelevanceRetriever } from "../retrieval/retriever.js";
import type { SemanticRouter } from "../routing/router.js";
import { DEFAULT_AGENT } from "../routing/types.js";
import { isMetaQuery } from "./meta-query.js";
import type { SessionCache } from "./session-cache.js";
import type { AgentContextResult, AgentResponse, RoutingInfo } from "./types.js";

export const FALLBACK_SYSTEM_PROMPT = "You are a helpful assistant.";
export const DEFAULT_AGENT_REASONING = "Selected by caller";
const META_QUERY_REASONING = "Auto-fallback: Meta-Query detected (greeting/capabilities/ambiguous)";
const CACHE_MISS_INSTRUCTION =
  "Select the best agent from the list. If the domain is unclear or ambiguous, use 'universal_agent' as the safe default.";

export interface SwitchboardOptions {
  router: SemanticRouter;
  library: AgentLibrary;
  skills: RelevanceRetriever;
  implants: RelevanceRetriever;
  sessionCache: SessionCache<string>;
  /** Needed only by processRequest() */
  completion?: ILLMClient;
  detectLanguage?: LanguageDetector;
  generateId?: () => string;
  log?: ILogger;
}

export class Switchboard {
  private router: SemanticRouter;
  private library: AgentLibrary;
  private skills: RelevanceRetriever;
  private implants: RelevanceRetriever;
  private sessionCache: SessionCache<string>;
  private completion?: ILLMClient;
  private detectLanguage?: LanguageDetector;
  private generateId: () => string;
  private log: ILogger;

  constructor(options: SwitchboardOptions) {
    this.router = options.router;
    this.library = options.library;
    this.skills = options.skills;
    this.implants = options.implants;
    this.sessionCache = options.sessionCache;
    this.completion = options.completion;
    this.detectLanguage = options.detectLanguage;
    this.generateId = options.generateId ?? (() => nanoid());
    this.log = options.log ?? createComponentLogger("switchboard");
  }

  get availableAgents(): readonly string[] {
    return this.router.availableAgents;
  }

  // ============================================
  // ROUTING INFO
  // ============================================

  /**
   * Cache hit -> composed prompt of the cached agent. Miss -> meta-queries go
   * to the universal agent, anything else gets the agent list back.
   */
  async getRoutingInfo(query: string, history: readonly string[] = []): Promise<RoutingInfo> {
    try {
      const context = this.context(query, history);
      const cached = await this.router.lookupCache(query, context);

      if (cached) {
        try {
          const systemPrompt = await this.compose(cached.targetAgent, query, context);
          return {
            status: "CACHE_HIT",
            agent: cached.targetAgent,
            reasoning: cached.reasoning,
            systemPrompt,
          };
        } catch (error) {
          return { status: "ERROR", message: `Cache hit but failed to load prompt: ${errorMessage(error)}` };
        }
      }

      if (isMetaQuery(query)) {
        this.log.info("Meta-query detected, routing to universal agent", { query: query.slice(0, 50) });
        return await this.getAgentContext(DEFAULT_AGENT, query, { reasoning: META_QUERY_REASONING, history });
      }

      return {
        status: "CACHE_MISS",
        availableAgents: this.router.availableAgents,
        defaultFallback: DEFAULT_AGENT,
        instruction: CACHE_MISS_INSTRUCTION,
      };
    } catch (error) {
      this.log.error("getRoutingInfo failed", error);
      return { status: "ERROR", message: errorMessage(error) };
    }
  }

  // ============================================
  // AGENT CONTEXT
  // ============================================

  /**
   * Composed prompt for an agent the caller chose. Served from the session
   * cache when the same agent and query were composed recently; a fresh
   * composition also records the choice in the router cache.
   */
  async getAgentContext(
    agent: string,
    query: string,
    options: { reasoning?: string; history?: readonly string[] } = {},
  ): Promise<AgentContextResult> {
    const cacheKey = sessionKey(agent, query);
    const cachedPrompt = this.sessionCache.get(cacheKey);
    if (cachedPrompt !== undefined) {
      this.log.debug("Session cache hit", { agent });
      return {
        status: "SUCCESS",
        agent,
        requestId: this.generateId(),
        systemPrompt: cachedPrompt,
        source: "SESSION_CACHE",
      };
    }

    try {
      const context = this.context(query, options.history ?? []);
      const systemPrompt = await this.compose(agent, query, context);
      this.sessionCache.set(cacheKey, systemPrompt);

      const requestId = this.generateId();
      await this.router.recordDecision(query, agent, options.reasoning ?? DEFAULT_AGENT_REASONING, requestId);

      return { status: "SUCCESS", agent, requestId, systemPrompt, source: "COMPOSED" };
    } catch (error) {
      this.log.error("getAgentContext failed", error, { agent });
      return { status: "ERROR", message: errorMessage(error) };
    }
  }

  clearSessionCache(): string {
    this.sessionCache.clear();
    return "Session cache cleared";
  }

  // ============================================
  // DYNAMIC CONTEXT
  // ============================================

  /** Formatted skills and implants sections, joined by a blank line; "" when none apply */
  async getDynamicContext(
    agent: string,
    query: string,
    options: { history?: readonly string[]; preferredSkills?: readonly string[] } = {},
  ): Promise<string> {
    return this.dynamicContext(agent, query, this.context(query, options.history ?? []), options.preferredSkills);
  }

  async getRelevantImplants(query: string, options: { role?: string; limit?: number } = {}): Promise<string> {
    const implants = await this.implants.retrieve(composeImplantQuery(query, options.role), {
      limit: options.limit ?? 5,
    });
    return this.implants.formatForPrompt(implants);
  }

  /** Implants mapped from a task type: debugging, analysis, creative or planning */
  async getReasoningStrategy(taskType: string): Promise<string> {
    const implantIds = TASK_IMPLANT_MAP[taskType];
    if (!implantIds) {
      return `Unknown task type: ${taskType}`;
    }

    try {
      await this.implants.ensureIndexed();
    } catch (error) {
      this.log.error("Failed to load reasoning strategy", error, { taskType });
      return `Error loading strategy: ${errorMessage(error)}`;
    }
    return this.implants.formatForPrompt(await this.implants.getByIds(implantIds));
  }

  // ============================================
  // FULL PIPELINE
  // ============================================

  /** Context -> route -> agent prompt + implants -> completion */
  async processRequest(
    query: string,
    options: { userId?: string; history?: readonly string[] } = {},
  ): Promise<AgentResponse> {
    if (!this.completion) {
      throw new SwitchboardError("No completion client configured");
    }

    const requestId = this.generateId();
    const context = this.context(query, options.history ?? []);
    const decision = await this.router.route(query, context);

    let systemPrompt: string;
    try {
      systemPrompt = await this.library.loadAgentPrompt(decision.targetAgent);
    } catch (error) {
      this.log.warn("Agent prompt unavailable, using fallback", {
        agent: decision.targetAgent,
        error: errorMessage(error),
      });
      systemPrompt = FALLBACK_SYSTEM_PROMPT;
    }

    const implants = await this.implants.retrieve(
      composeImplantQuery(query, decision.targetAgent, context),
      { limit: 3 },
    );
    const formattedImplants = this.implants.formatForPrompt(implants);
    if (formattedImplants) {
      systemPrompt += `\n\n${formattedImplants}`;
    }

    const response = await this.completion.chat([
      { role: "system", content: systemPrompt },
      { role: "user", content: query },
    ]);

    this.log.info("Request processed", {
      requestId,
      agent: decision.targetAgent,
      cached: decision.isCached,
      implants: implants.length,
    });

    return {
      content: response.content,
      agentName: decision.targetAgent,
      toolCalls: [],
      metadata: {
        routerDecision: decision,
        requestId,
        userId: options.userId ?? "default_user",
        implantsLoaded: implants.map(i => i.id),
        contextRetrieved: true,
        ...(context.language !== undefined ? { language: context.language } : {}),
      },
    };
  }

  // ============================================
  // COMPOSITION
  // ============================================

  private context(query: string, history: readonly string[]): RequestContext {
    return buildContext({ text: query, history }, { detectLanguage: this.detectLanguage, log: this.log });
  }

  /** Agent profile plus dynamic context; AgentNotFoundError propagates */
  private async compose(agent: string, query: string, context: RequestContext): Promise<string> {
    const basePrompt = await this.library.loadAgentPrompt(agent);
    const metadata = await this.library.getAgentMetadata(agent);
    const dynamic = await this.dynamicContext(agent, query, context, metadata.preferred_skills);
    return dynamic ? `${basePrompt}\n\n${dynamic}` : basePrompt;
  }

  private async dynamicContext(
    agent: string,
    query: string,
    context: RequestContext,
    preferredSkills?: readonly string[],
  ): Promise<string> {
    const parts: string[] = [];

    const skills = await this.skills.retrieve(query, { preferredIds: preferredSkills });
    if (skills.length > 0) {
      parts.push(this.skills.formatForPrompt(skills));
    }

    const implants = await this.implants.retrieve(composeImplantQuery(query, agent, context), { limit: 3 });
    if (implants.length > 0) {
      parts.push(this.implants.formatForPrompt(implants));
    }

    return parts.join("\n\n");
  }
}

/** agent × SHA-256 of the query */
export function sessionKey(agent: string, query: string): string {
  return `${agent}:${createHash("sha256").update(query).digest("hex")}`;
}
