/**
 * OpenAI-Compatible Chat Client
 *
 * Works with any provider that implements the chat completions API
 * (OpenAI, DeepSeek, xAI, LM Studio, vLLM, ...).
 */

import { z } from "zod";
import { UpstreamError, errorMessage } from "../errors.js";
import type { ILLMClient, LLMMessage, LLMRequestOptions, LLMResponse } from "./types.js";

const ChatCompletionSchema = z.object({
  model: z.string().optional(),
  choices: z.array(z.object({
    message: z.object({
      content: z.string().nullable().optional(),
    }),
  })).min(1),
  usage: z.object({
    prompt_tokens: z.number().optional(),
    completion_tokens: z.number().optional(),
  }).optional(),
});

export interface OpenAICompatibleClientOptions {
  provider?: string;
  apiKey: string;
  baseUrl: string;
  defaultModel: string;
  /** Per-request ceiling (default: 120s) */
  timeoutMs?: number;
}

export class OpenAICompatibleClient implements ILLMClient {
  readonly provider: string;
  private apiKey: string;
  private baseUrl: string;
  private defaultModel: string;
  private timeoutMs: number;

  constructor(options: OpenAICompatibleClientOptions) {
    this.provider = options.provider ?? "openai";
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.defaultModel = options.defaultModel;
    this.timeoutMs = options.timeoutMs ?? 120_000;
  }

  async chat(messages: LLMMessage[], options?: LLMRequestOptions): Promise<LLMResponse> {
    const model = options?.model || this.defaultModel;

    const headers: Record<string, string> = {
      "Content-Type": "application/json"
    };
    if (this.apiKey) {
      headers["Authorization"] = `Bearer ${this.apiKey}`;
    }

    const body: Record<string, unknown> = {
      model,
      messages,
      stream: false,
    };
    if (options?.temperature !== undefined) body.temperature = options.temperature;
    if (options?.maxTokens !== undefined) body.max_tokens = options.maxTokens;
    if (options?.responseFormat === "json_object") {
      body.response_format = { type: "json_object" };
    }

    const timeout = AbortSignal.timeout(this.timeoutMs);
    const signal = options?.signal ? AbortSignal.any([options.signal, timeout]) : timeout;

    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/chat/completions`, {
        method: "POST",
        headers,
        body: JSON.stringify(body),
        signal,
      });
    } catch (error) {
      throw new UpstreamError(this.provider, errorMessage(error), { cause: error });
    }

    if (!response.ok) {
      throw new UpstreamError(this.provider, `API error: ${response.status} ${await response.text()}`);
    }

    const parsed = ChatCompletionSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new UpstreamError(this.provider, `unexpected response shape: ${parsed.error.message}`);
    }

    const data = parsed.data;
    return {
      content: data.choices[0].message.content ?? "",
      model: data.model ?? model,
      usage: {
        inputTokens: data.usage?.prompt_tokens ?? 0,
        outputTokens: data.usage?.completion_tokens ?? 0,
      },
    };
  }
}
