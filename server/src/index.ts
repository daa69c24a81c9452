/**
 * Switchboard - Library Entry Point
 *
 * createSwitchboard() wires every component from configuration: one SQLite
 * vector database with the router cache, skills and implants collections,
 * the classifier and completion client, and the orchestrator on top.
 */

import type Database from "better-sqlite3";
import type { ILogger } from "@switchboard/shared/logging";
import { createComponentLogger } from "./logging.js";
import type { SwitchboardConfig } from "./config.js";
import type { LanguageDetector } from "./context/context-builder.js";
import { LanguageIdentifier } from "./context/language.js";
import { openVectorDatabase } from "./db/index.js";
import { OpenAICompatibleClient } from "./llm/client.js";
import type { ILLMClient } from "./llm/types.js";
import { AgentLibrary } from "./prompts/agent-library.js";
import { agentsDir, createLayout } from "./prompts/layout.js";
import { PromptResolver } from "./prompts/resolver.js";
import {
  IMPLANTS_COLLECTION,
  SKILLS_COLLECTION,
  createImplantRetriever,
  createSkillRetriever,
} from "./retrieval/library.js";
import { LLMClassifier } from "./routing/classifier.js";
import { SemanticRouter } from "./routing/router.js";
import type { Classifier } from "./routing/types.js";
import { SessionCache } from "./switchboard/session-cache.js";
import { Switchboard } from "./switchboard/switchboard.js";
import { Collection } from "./vector/collection.js";
import { HashingEmbedder, OpenAIEmbedder } from "./vector/embeddings.js";
import { BlockingPool } from "./vector/pool.js";
import { SqliteVectorIndex } from "./vector/sqlite-index.js";
import type { EmbeddingFunction } from "./vector/types.js";

export const ROUTER_COLLECTION = "router_cache";

export interface SwitchboardOverrides {
  embedder?: EmbeddingFunction;
  classifier?: Classifier;
  completion?: ILLMClient;
  detectLanguage?: LanguageDetector;
  log?: ILogger;
}

export interface SwitchboardRuntime {
  switchboard: Switchboard;
  router: SemanticRouter;
  library: AgentLibrary;
  close(): void;
}

export function createEmbedder(config: SwitchboardConfig): EmbeddingFunction {
  if (config.embeddings.provider === "openai") {
    return new OpenAIEmbedder({
      apiKey: config.classifier.apiKey,
      baseUrl: config.classifier.baseUrl,
      model: config.embeddings.model,
      dimensions: config.embeddings.dimensions,
    });
  }
  return new HashingEmbedder(config.embeddings.dimensions);
}

function defaultLanguageDetector(log?: ILogger): LanguageDetector {
  const identifier = new LanguageIdentifier({ log });
  return text => identifier.detect(text);
}

export function createSwitchboard(config: SwitchboardConfig, overrides: SwitchboardOverrides = {}): SwitchboardRuntime {
  const log = overrides.log ?? createComponentLogger("switchboard");
  const db: Database.Database = openVectorDatabase(config.dbPath, log);

  const embedder = overrides.embedder ?? createEmbedder(config);
  const pool = new BlockingPool(config.vectorPoolSize);
  const collection = (name: string): Collection =>
    new Collection({ index: new SqliteVectorIndex(db, name), embedder, pool });

  const layout = createLayout(config.root, { libraryDir: config.libraryDir });
  const resolver = new PromptResolver(layout, overrides.log);
  const library = new AgentLibrary(resolver, overrides.log);

  const completion = overrides.completion ?? new OpenAICompatibleClient({
    apiKey: config.classifier.apiKey,
    baseUrl: config.classifier.baseUrl,
    defaultModel: config.classifier.model,
  });

  const router = new SemanticRouter({
    collection: collection(ROUTER_COLLECTION),
    classifier: overrides.classifier ?? new LLMClassifier({
      client: completion,
      model: config.classifier.model,
      maxRetries: config.classifier.maxRetries,
      log: overrides.log,
    }),
    agentsDirectory: agentsDir(layout),
    thresholds: config.router,
    classifierTimeoutMs: config.classifier.timeoutMs,
    log: overrides.log,
  });

  const switchboard = new Switchboard({
    router,
    library,
    skills: createSkillRetriever({
      layout,
      collection: collection(SKILLS_COLLECTION),
      threshold: config.retrieval.skillsThreshold,
      log: overrides.log,
    }),
    implants: createImplantRetriever({
      layout,
      collection: collection(IMPLANTS_COLLECTION),
      threshold: config.retrieval.implantsThreshold,
      log: overrides.log,
    }),
    sessionCache: new SessionCache<string>(config.sessionCache),
    completion,
    detectLanguage: overrides.detectLanguage ?? defaultLanguageDetector(overrides.log),
    log: overrides.log,
  });

  log.info("Switchboard ready", { root: layout.root, agents: router.availableAgents.length });

  return {
    switchboard,
    router,
    library,
    close: () => db.close(),
  };
}

// ============================================
// PUBLIC API
// ============================================

export { loadConfig, loadEnvFile, type SwitchboardConfig } from "./config.js";
export * from "./errors.js";
export { initServerLogging, createComponentLogger } from "./logging.js";
export { DEFAULT_LANGUAGE, LANGUAGE_NAMES, LanguageIdentifier } from "./context/language.js";
export { buildContext, type Query, type RequestContext, type LanguageDetector } from "./context/context-builder.js";
export { OpenAICompatibleClient } from "./llm/client.js";
export type { ILLMClient, LLMMessage, LLMRequestOptions, LLMResponse } from "./llm/types.js";
export { AgentLibrary, scanAgents } from "./prompts/agent-library.js";
export { createLayout, resolveReference, type PromptLayout } from "./prompts/layout.js";
export { PromptResolver, type ResolutionResult, type ResolutionIssue } from "./prompts/resolver.js";
export { validateAgentLibrary, type LibraryValidationReport } from "./prompts/validate.js";
export { RelevanceRetriever, type RetrievedFragment } from "./retrieval/retriever.js";
export { TASK_IMPLANT_MAP, composeImplantQuery } from "./retrieval/library.js";
export { SemanticRouter } from "./routing/router.js";
export { LLMClassifier } from "./routing/classifier.js";
export { DEFAULT_AGENT, type Classifier, type RoutingDecision } from "./routing/types.js";
export { SessionCache } from "./switchboard/session-cache.js";
export { Switchboard } from "./switchboard/switchboard.js";
export type { AgentContextResult, AgentResponse, RoutingInfo } from "./switchboard/types.js";
export { Collection } from "./vector/collection.js";
export { HashingEmbedder, OpenAIEmbedder } from "./vector/embeddings.js";
export { MemoryVectorIndex } from "./vector/memory-index.js";
export { SqliteVectorIndex } from "./vector/sqlite-index.js";
export { BlockingPool } from "./vector/pool.js";
export type { EmbeddingFunction, VectorIndex, Metadata } from "./vector/types.js";
