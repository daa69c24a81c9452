/**
 * LLM Type Definitions
 *
 * Provider-agnostic chat completion contract used by the classifier and the
 * orchestrator. No runtime values.
 */

export interface LLMMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface LLMRequestOptions {
  model?: string;
  temperature?: number;
  maxTokens?: number;
  /** Ask for a JSON object reply (OpenAI-compatible response_format) */
  responseFormat?: "json_object" | "text";
  /** Cancels the request; the client's own timeout still applies */
  signal?: AbortSignal;
}

export interface LLMResponse {
  content: string;
  model: string;
  usage?: {
    inputTokens: number;
    outputTokens: number;
  };
}

export interface ILLMClient {
  /** Short provider label used in logs and errors */
  readonly provider: string;
  chat(messages: LLMMessage[], options?: LLMRequestOptions): Promise<LLMResponse>;
}
