/**
 * LLM Classifier
 *
 * Sends the routing conversation to a chat completion client in JSON mode,
 * retrying transient failures, and returns the parsed JSON object.
 */

import type { ILogger } from "@switchboard/shared/logging";
import { createComponentLogger } from "../logging.js";
import { ClassifierResponseError, errorMessage } from "../errors.js";
import { retryWithBackoff, type RetryOptions } from "../llm/retry.js";
import type { ILLMClient } from "../llm/types.js";
import type { ClassificationRequest, Classifier } from "./types.js";

export interface LLMClassifierOptions {
  client: ILLMClient;
  model?: string;
  /** Retries after the first attempt (default: 2) */
  maxRetries?: number;
  retry?: Omit<RetryOptions, "retries" | "signal" | "onRetry">;
  log?: ILogger;
}

/** First {...} object in a completion, parsed */
export function extractJsonObject(content: string): unknown {
  const match = content.match(/\{[\s\S]*\}/);
  if (!match) throw new ClassifierResponseError("No JSON object in response");
  try {
    return JSON.parse(match[0]);
  } catch (error) {
    throw new ClassifierResponseError(`Malformed JSON: ${errorMessage(error)}`, { cause: error });
  }
}

export class LLMClassifier implements Classifier {
  private client: ILLMClient;
  private model?: string;
  private maxRetries: number;
  private retry: LLMClassifierOptions["retry"];
  private log: ILogger;

  constructor(options: LLMClassifierOptions) {
    this.client = options.client;
    this.model = options.model;
    this.maxRetries = options.maxRetries ?? 2;
    this.retry = options.retry;
    this.log = options.log ?? createComponentLogger("classifier");
  }

  async classify(request: ClassificationRequest, options: { signal?: AbortSignal } = {}): Promise<unknown> {
    const messages = [{ role: "system" as const, content: request.systemPrompt }, ...request.messages];

    const response = await retryWithBackoff(
      () => this.client.chat(messages, {
        model: this.model,
        temperature: 0,
        responseFormat: "json_object",
        signal: options.signal,
      }),
      {
        ...this.retry,
        retries: this.maxRetries,
        signal: options.signal,
        onRetry: (error, attempt, delayMs) => {
          this.log.warn("Classifier call failed, retrying", {
            attempt,
            delayMs,
            error: errorMessage(error),
          });
        },
      },
    );

    this.log.debug("Classifier responded", {
      provider: this.client.provider,
      model: response.model,
      inputTokens: response.usage?.inputTokens,
      outputTokens: response.usage?.outputTokens,
    });

    return extractJsonObject(response.content);
  }
}
