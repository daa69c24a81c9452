/**
 * Context Builder
 *
 * First step of every request: flattens the conversation history and, when a
 * detector is supplied, records the query's language. No I/O.
 */

import type { ILogger } from "@switchboard/shared/logging";
import { createComponentLogger } from "../logging.js";
import { errorMessage } from "../errors.js";

/** A user query with the prior turns of its conversation, most recent last */
export interface Query {
  readonly text: string;
  readonly history: readonly string[];
}

export interface RequestContext {
  /** History joined by newlines ("" when there is none) */
  readonly historyText: string;
  readonly history: readonly string[];
  readonly language?: string;
}

export type LanguageDetector = (text: string) => string | undefined;

export interface BuildContextOptions {
  detectLanguage?: LanguageDetector;
  log?: ILogger;
}

export const EMPTY_CONTEXT: RequestContext = Object.freeze({ historyText: "", history: [] });

export function buildContext(query: Query, options: BuildContextOptions = {}): RequestContext {
  const log = options.log ?? createComponentLogger("context");
  const history = [...query.history];

  let language: string | undefined;
  if (options.detectLanguage) {
    try {
      language = options.detectLanguage(query.text);
    } catch (error) {
      log.warn("Language detection failed", { error: errorMessage(error) });
    }
  }

  log.debug("Context built", { historyLength: history.length, language });

  return Object.freeze({
    historyText: history.join("\n"),
    history: Object.freeze(history),
    ...(language !== undefined ? { language } : {}),
  });
}

/** Last `maxChars` characters of the history text */
export function historyTail(context: RequestContext, maxChars: number): string {
  return maxChars > 0 ? context.historyText.slice(-maxChars) : "";
}
