/**
 * Language Detection
 *
 * Names the language of a query ("English", "Russian", ...) using tinyld.
 * Empty or very short text, unmapped codes and detector failures all give
 * DEFAULT_LANGUAGE. Results are memoized per text.
 */

import { detect, detectAll } from "tinyld";
import type { ILogger } from "@switchboard/shared/logging";
import { createComponentLogger } from "../logging.js";
import { errorMessage } from "../errors.js";
import { SessionCache } from "../switchboard/session-cache.js";

export const DEFAULT_LANGUAGE = "English";

/** Shortest trimmed text worth running the detector on */
const MIN_DETECTABLE_LENGTH = 3;

/** ISO 639-1 code -> language name */
export const LANGUAGE_NAMES: Readonly<Record<string, string>> = {
  en: "English",
  ru: "Russian",
  de: "German",
  es: "Spanish",
  fr: "French",
  it: "Italian",
  pt: "Portuguese",
  nl: "Dutch",
  pl: "Polish",
  tr: "Turkish",
  ja: "Japanese",
  ko: "Korean",
  zh: "Chinese",
  ar: "Arabic",
  hi: "Hindi",
  uk: "Ukrainian",
  cs: "Czech",
  sv: "Swedish",
  da: "Danish",
  fi: "Finnish",
  no: "Norwegian",
  el: "Greek",
  he: "Hebrew",
};

export interface LanguageGuess {
  lang: string;
  accuracy: number;
}

export interface LanguageIdentifierOptions {
  /** Text -> ISO 639-1 code, "" when unknown (default: tinyld detect) */
  identify?: (text: string) => string;
  /** Text -> ranked guesses (default: tinyld detectAll) */
  rank?: (text: string) => LanguageGuess[];
  cacheSize?: number;
  log?: ILogger;
}

export class LanguageIdentifier {
  private identify: (text: string) => string;
  private rank: (text: string) => LanguageGuess[];
  private cache: SessionCache<string>;
  private log: ILogger;

  constructor(options: LanguageIdentifierOptions = {}) {
    this.identify = options.identify ?? (text => detect(text));
    this.rank = options.rank ?? (text => detectAll(text));
    this.cache = new SessionCache<string>({
      capacity: options.cacheSize ?? 1024,
      ttlMs: Number.POSITIVE_INFINITY,
    });
    this.log = options.log ?? createComponentLogger("language");
  }

  detect(text: string): string {
    const cleaned = text.trim();
    if (cleaned.length < MIN_DETECTABLE_LENGTH) {
      return DEFAULT_LANGUAGE;
    }

    const cached = this.cache.get(cleaned);
    if (cached !== undefined) return cached;

    const language = this.lookup(cleaned);
    this.cache.set(cleaned, language);
    return language;
  }

  /** Top guess with its accuracy; 0 when nothing was detected */
  detectWithConfidence(text: string): { language: string; confidence: number } {
    const cleaned = text.trim();
    if (cleaned.length === 0) {
      return { language: DEFAULT_LANGUAGE, confidence: 0 };
    }

    try {
      const [top] = this.rank(cleaned);
      if (!top) return { language: DEFAULT_LANGUAGE, confidence: 0 };
      return { language: LANGUAGE_NAMES[top.lang] ?? DEFAULT_LANGUAGE, confidence: top.accuracy };
    } catch (error) {
      this.log.warn("Language ranking failed", { error: errorMessage(error) });
      return { language: DEFAULT_LANGUAGE, confidence: 0 };
    }
  }

  private lookup(text: string): string {
    let code: string;
    try {
      code = this.identify(text);
    } catch (error) {
      this.log.warn("Language detection failed", { text: text.slice(0, 50), error: errorMessage(error) });
      return DEFAULT_LANGUAGE;
    }

    const name = LANGUAGE_NAMES[code];
    if (!name) {
      if (code) this.log.debug("Unmapped language code", { code });
      return DEFAULT_LANGUAGE;
    }
    this.log.debug("Detected language", { language: name, code });
    return name;
  }
}
