/**
 * Switchboard Result Types
 */

import type { RoutingDecision } from "../routing/types.js";

export interface AgentContextSuccess {
  status: "SUCCESS";
  agent: string;
  requestId: string;
  systemPrompt: string;
  source: "COMPOSED" | "SESSION_CACHE";
}

export interface ErrorResult {
  status: "ERROR";
  message: string;
}

export type AgentContextResult = AgentContextSuccess | ErrorResult;

export interface CacheHitResult {
  status: "CACHE_HIT";
  agent: string;
  reasoning: string;
  systemPrompt: string;
}

export interface CacheMissResult {
  status: "CACHE_MISS";
  availableAgents: readonly string[];
  defaultFallback: string;
  instruction: string;
}

/** A meta-query on a cache miss is answered with the universal agent's context */
export type RoutingInfo = CacheHitResult | CacheMissResult | AgentContextResult;

export interface AgentResponse {
  content: string;
  agentName: string;
  toolCalls: unknown[];
  metadata: {
    routerDecision: RoutingDecision;
    requestId: string;
    userId: string;
    implantsLoaded: string[];
    contextRetrieved: boolean;
    language?: string;
  };
}
