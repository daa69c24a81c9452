/**
 * Semantic Router
 *
 * Cache -> classifier -> cache write-back.
 *
 * The router cache is a vector collection of past queries with the agent each
 * was routed to. A query close enough to a cached one reuses that agent;
 * otherwise the classifier picks one, and confident picks are cached.
 */

import { nanoid } from "nanoid";
import type { ILogger } from "@switchboard/shared/logging";
import { createComponentLogger } from "../logging.js";
import { ClassifierResponseError, ClassifierTimeoutError, errorMessage } from "../errors.js";
import { EMPTY_CONTEXT, historyTail, type RequestContext } from "../context/context-builder.js";
import { scanAgents } from "../prompts/agent-library.js";
import { loadPrompt } from "../prompt-template.js";
import type { LLMMessage } from "../llm/types.js";
import type { Collection } from "../vector/collection.js";
import type { QueryResult } from "../vector/types.js";
import {
  ClassifierDecisionSchema,
  DEFAULT_AGENT,
  DEFAULT_ROUTER_THRESHOLDS,
  createDecision,
  type Classifier,
  type RouterThresholds,
  type RoutingDecision,
} from "./types.js";

/** History characters prepended to the query for cache lookups */
const CACHE_HISTORY_CHARS = 200;

export interface SemanticRouterOptions {
  collection: Collection;
  classifier: Classifier;
  /** Scanned once for agent profiles */
  agentsDirectory: string;
  thresholds?: Partial<RouterThresholds>;
  /** Ceiling for one classification, retries included (default: 30s) */
  classifierTimeoutMs?: number;
  /** Cache entry ids (default: nanoid) */
  generateId?: () => string;
  now?: () => Date;
  log?: ILogger;
}

export class SemanticRouter {
  private collection: Collection;
  private classifier: Classifier;
  private thresholds: RouterThresholds;
  private classifierTimeoutMs: number;
  private generateId: () => string;
  private now: () => Date;
  private log: ILogger;
  private agents: readonly string[];
  private systemPrompt: Promise<string> | null = null;

  constructor(options: SemanticRouterOptions) {
    this.collection = options.collection;
    this.classifier = options.classifier;
    this.thresholds = { ...DEFAULT_ROUTER_THRESHOLDS, ...options.thresholds };
    this.classifierTimeoutMs = options.classifierTimeoutMs ?? 30_000;
    this.generateId = options.generateId ?? (() => nanoid());
    this.now = options.now ?? (() => new Date());
    this.log = options.log ?? createComponentLogger("router");

    const scanned = scanAgents(options.agentsDirectory, this.log);
    if (scanned.length === 0) {
      this.log.warn("No agent profiles found, falling back to universal agent only", {
        directory: options.agentsDirectory,
      });
    }
    this.agents = Object.freeze(scanned.length > 0 ? scanned : [DEFAULT_AGENT]);
  }

  get availableAgents(): readonly string[] {
    return this.agents;
  }

  // ============================================
  // ROUTING
  // ============================================

  async route(query: string, context: RequestContext = EMPTY_CONTEXT): Promise<RoutingDecision> {
    const cached = await this.lookupCache(query, context);
    if (cached) {
      this.log.info("Router cache hit", { agent: cached.targetAgent, reasoning: cached.reasoning });
      return cached;
    }

    const decision = await this.classify(query, context);
    if (decision.confidence > this.thresholds.cacheMinConfidence) {
      await this.recordDecision(query, decision.targetAgent, decision.reasoning);
    }
    return decision;
  }

  /** Cache only; null on a miss or a collection failure */
  async lookupCache(query: string, context: RequestContext = EMPTY_CONTEXT): Promise<RoutingDecision | null> {
    const history = historyTail(context, CACHE_HISTORY_CHARS);
    const searchText = history ? `${history}\n${query}` : query;

    let result: QueryResult;
    try {
      result = await this.collection.query(searchText, 1);
    } catch (error) {
      this.log.error("Router cache lookup failed", error);
      return null;
    }

    if (result.ids.length === 0) return null;
    const distance = result.distances[0];
    if (!(distance < 1 - this.thresholds.similarityThreshold)) return null;

    const target = result.metadatas[0].target_agent;
    if (typeof target !== "string") {
      this.log.warn("Cache entry without target_agent", { id: result.ids[0] });
      return null;
    }

    return createDecision({
      targetAgent: target,
      confidence: 1.0,
      reasoning: `Cached result (distance: ${distance.toFixed(4)})`,
      isCached: true,
    });
  }

  /**
   * Cache a routing choice. Unknown agents are refused; collection failures
   * are logged. Returns whether the entry was written.
   */
  async recordDecision(queryText: string, agent: string, reasoning: string, id?: string): Promise<boolean> {
    if (!this.agents.includes(agent)) {
      this.log.warn("Refusing to cache decision for unknown agent", { agent });
      return false;
    }

    try {
      await this.collection.upsert(
        [id ?? this.generateId()],
        [queryText],
        [{ target_agent: agent, reasoning, timestamp: this.now().toISOString() }],
      );
      return true;
    } catch (error) {
      this.log.error("Failed to update router cache", error, { agent });
      return false;
    }
  }

  // ============================================
  // CLASSIFIER FALLBACK
  // ============================================

  private async classify(query: string, context: RequestContext): Promise<RoutingDecision> {
    try {
      const decision = await this.callClassifier(query, context);
      this.log.info("Classifier decision", {
        agent: decision.targetAgent,
        confidence: decision.confidence,
      });
      return decision;
    } catch (error) {
      this.log.error("Routing error", error);
      return createDecision({
        targetAgent: DEFAULT_AGENT,
        confidence: 0.0,
        reasoning: `Error in routing: ${errorMessage(error)}`,
        isCached: false,
      });
    }
  }

  private async callClassifier(query: string, context: RequestContext): Promise<RoutingDecision> {
    const messages: LLMMessage[] = [];
    if (context.historyText) {
      messages.push({ role: "user", content: `Context/History:\n${context.historyText}` });
    }
    messages.push({ role: "user", content: query });

    const systemPrompt = await this.loadSystemPrompt();

    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new ClassifierTimeoutError(this.classifierTimeoutMs));
      }, this.classifierTimeoutMs);
    });

    let raw: unknown;
    try {
      raw = await Promise.race([
        this.classifier.classify({ systemPrompt, messages }, { signal: controller.signal }),
        timeout,
      ]);
    } finally {
      clearTimeout(timer);
    }

    const parsed = ClassifierDecisionSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(i => `${i.path.join(".") || "(root)"}: ${i.message}`);
      throw new ClassifierResponseError(`Invalid decision: ${issues.join("; ")}`);
    }
    if (!this.agents.includes(parsed.data.target_agent)) {
      throw new ClassifierResponseError(`Unknown agent '${parsed.data.target_agent}'`);
    }

    return createDecision({
      targetAgent: parsed.data.target_agent,
      confidence: parsed.data.confidence,
      reasoning: parsed.data.reasoning,
      isCached: false,
    });
  }

  private loadSystemPrompt(): Promise<string> {
    if (!this.systemPrompt) {
      this.systemPrompt = loadPrompt(
        "routing/router.md",
        { "Available Agents": JSON.stringify(this.agents) },
        this.log,
      ).catch((error: unknown) => {
        this.systemPrompt = null;
        throw error;
      });
    }
    return this.systemPrompt;
  }
}
