/**
 * Routing Types
 */

import { z } from "zod";
import type { LLMMessage } from "../llm/types.js";

export const DEFAULT_AGENT = "universal_agent";

/** What the classifier must return */
export const ClassifierDecisionSchema = z.object({
  target_agent: z.string().min(1),
  confidence: z.number().min(0).max(1),
  reasoning: z.string(),
});

export type ClassifierDecision = z.infer<typeof ClassifierDecisionSchema>;

export interface RoutingDecision {
  readonly targetAgent: string;
  /** 0..1 */
  readonly confidence: number;
  readonly reasoning: string;
  readonly isCached: boolean;
}

export function createDecision(decision: RoutingDecision): RoutingDecision {
  return Object.freeze({ ...decision });
}

export interface ClassificationRequest {
  systemPrompt: string;
  messages: LLMMessage[];
}

/** External classifier: returns an unvalidated JSON value */
export interface Classifier {
  classify(request: ClassificationRequest, options?: { signal?: AbortSignal }): Promise<unknown>;
}

export interface RouterThresholds {
  /** Cache hit when distance < 1 - similarityThreshold (default 0.95) */
  similarityThreshold: number;
  /** Decisions are cached only above this confidence (default 0.8) */
  cacheMinConfidence: number;
}

export const DEFAULT_ROUTER_THRESHOLDS: RouterThresholds = {
  similarityThreshold: 0.95,
  cacheMinConfidence: 0.8,
};
