import { describe, it, expect, vi, afterEach } from "vitest";
import { OpenAICompatibleClient } from "./client.js";
import { UpstreamError } from "../errors.js";

function jsonResponse(body: unknown, status: number = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

describe("OpenAICompatibleClient", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  const client = new OpenAICompatibleClient({
    apiKey: "test-key",
    baseUrl: "http://localhost:9999/v1",
    defaultModel: "small-model",
  });

  it("sends a chat completion request in JSON mode", async () => {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => jsonResponse({
      model: "small-model-2024",
      choices: [{ message: { content: "{\"ok\":true}" } }],
      usage: { prompt_tokens: 12, completion_tokens: 3 },
    }));
    vi.stubGlobal("fetch", fetchMock);

    const response = await client.chat(
      [{ role: "user", content: "hi" }],
      { responseFormat: "json_object", temperature: 0 },
    );

    expect(response).toEqual({
      content: "{\"ok\":true}",
      model: "small-model-2024",
      usage: { inputTokens: 12, outputTokens: 3 },
    });

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("http://localhost:9999/v1/chat/completions");
    expect(JSON.parse(String(init?.body))).toEqual({
      model: "small-model",
      messages: [{ role: "user", content: "hi" }],
      stream: false,
      temperature: 0,
      response_format: { type: "json_object" },
    });
    expect(new Headers(init?.headers).get("Authorization")).toBe("Bearer test-key");
  });

  it("treats a null content as empty text", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => jsonResponse({ choices: [{ message: { content: null } }] })));
    const response = await client.chat([{ role: "user", content: "hi" }]);
    expect(response.content).toBe("");
    expect(response.model).toBe("small-model");
  });

  it("raises UpstreamError with the status on failure", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response("slow down", { status: 429 })));
    await expect(client.chat([{ role: "user", content: "hi" }])).rejects.toThrow("openai: API error: 429 slow down");
  });

  it("raises UpstreamError on an unexpected body", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => jsonResponse({ choices: [] })));
    await expect(client.chat([{ role: "user", content: "hi" }])).rejects.toBeInstanceOf(UpstreamError);
  });

  it("wraps transport failures", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => { throw new TypeError("fetch failed"); }));
    await expect(client.chat([{ role: "user", content: "hi" }])).rejects.toThrow("openai: fetch failed");
  });
});
