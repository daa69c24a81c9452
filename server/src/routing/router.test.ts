import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from "vitest";
import * as path from "path";
import { SemanticRouter, type SemanticRouterOptions } from "./router.js";
import type { Classifier, ClassificationRequest } from "./types.js";
import { Collection } from "../vector/collection.js";
import { MemoryVectorIndex } from "../vector/memory-index.js";
import { BlockingPool } from "../vector/pool.js";
import { buildContext } from "../context/context-builder.js";
import {
  FixedEmbedder,
  createMemoryCollection,
  createTestLogger,
  makeTempDir,
  removeDir,
  writeTree,
} from "../testing/helpers.js";

const SQL_QUERY = "How do I prevent SQL injection?";
const SQL_PARAPHRASE = "How can I prevent SQL injection?";
const POEM_QUERY = "Write a poem about autumn leaves";

const embedder = new FixedEmbedder({
  [SQL_QUERY]: [1, 0, 0],
  [SQL_PARAPHRASE]: [0.999, 0.04, 0],
  [POEM_QUERY]: [0, 1, 0],
}, 3);

type ClassifyFn = (request: ClassificationRequest, options?: { signal?: AbortSignal }) => Promise<unknown>;

function stubClassifier(result: unknown): { classify: Mock<ClassifyFn> } {
  return { classify: vi.fn<ClassifyFn>(async () => result) };
}

let root: string;
let agentsDirectory: string;

describe("SemanticRouter", () => {
  beforeEach(() => {
    root = makeTempDir();
    agentsDirectory = path.join(root, ".cursor", "agents");
    writeTree(root, {
      ".cursor/agents/security_expert/system_prompt.mdc": "Security",
      ".cursor/agents/universal_agent/system_prompt.mdc": "Universal",
      ".cursor/agents/common/rules.mdc": "Shared",
    });
  });

  afterEach(() => {
    removeDir(root);
  });

  function createRouter(overrides: Partial<SemanticRouterOptions> & Pick<SemanticRouterOptions, "classifier">) {
    const { collection, index } = createMemoryCollection("router_cache", embedder);
    const { log, memory } = createTestLogger();
    let n = 0;
    const router = new SemanticRouter({
      collection,
      agentsDirectory,
      generateId: () => `cache-${++n}`,
      now: () => new Date("2026-01-02T03:04:05.000Z"),
      log,
      ...overrides,
    });
    return { router, index, memory };
  }

  it("scans the agents directory once, sorted and without common", () => {
    const { router } = createRouter({ classifier: stubClassifier(null) });
    expect(router.availableAgents).toEqual(["security_expert", "universal_agent"]);
  });

  it("falls back to the universal agent when no profiles exist", () => {
    const { router } = createRouter({
      classifier: stubClassifier(null),
      agentsDirectory: path.join(root, "missing"),
    });
    expect(router.availableAgents).toEqual(["universal_agent"]);
  });

  it("misses, classifies, caches and then hits for the same query", async () => {
    const classifier = stubClassifier({
      target_agent: "security_expert",
      confidence: 0.95,
      reasoning: "User is asking about SQL injection prevention.",
    });
    const { router, index } = createRouter({ classifier });

    const first = await router.route(SQL_QUERY);
    expect(first).toEqual({
      targetAgent: "security_expert",
      confidence: 0.95,
      reasoning: "User is asking about SQL injection prevention.",
      isCached: false,
    });
    expect(index.get(["cache-1"])).toEqual([{
      id: "cache-1",
      document: SQL_QUERY,
      metadata: {
        target_agent: "security_expert",
        reasoning: "User is asking about SQL injection prevention.",
        timestamp: "2026-01-02T03:04:05.000Z",
      },
    }]);

    const second = await router.route(SQL_QUERY);
    expect(second).toEqual({
      targetAgent: "security_expert",
      confidence: 1.0,
      reasoning: "Cached result (distance: 0.0000)",
      isCached: true,
    });
    expect(classifier.classify).toHaveBeenCalledTimes(1);
    expect(Object.isFrozen(second)).toBe(true);
  });

  it("serves near-duplicate queries from the cache", async () => {
    const classifier = stubClassifier({ target_agent: "security_expert", confidence: 0.9, reasoning: "security" });
    const { router } = createRouter({ classifier });
    await router.route(SQL_QUERY);

    const hit = await router.lookupCache(SQL_PARAPHRASE, buildContext({ text: SQL_PARAPHRASE, history: [] }));
    expect(hit?.targetAgent).toBe("security_expert");
    expect(hit?.isCached).toBe(true);
    expect(hit?.reasoning).toMatch(/^Cached result \(distance: 0\.0\d{3}\)$/);
  });

  it("misses for unrelated queries", async () => {
    const classifier = stubClassifier({ target_agent: "security_expert", confidence: 0.9, reasoning: "security" });
    const { router } = createRouter({ classifier });
    await router.route(SQL_QUERY);
    expect(await router.lookupCache(POEM_QUERY)).toBeNull();
  });

  it("never caches decisions at or below the confidence gate", async () => {
    const classifier = stubClassifier({ target_agent: "security_expert", confidence: 0.8, reasoning: "unsure" });
    const { router, index } = createRouter({ classifier });

    const decision = await router.route(SQL_QUERY);
    expect(decision.confidence).toBe(0.8);
    expect(index.count()).toBe(0);
  });

  it("prefixes the cache search with the tail of the history", async () => {
    const local = new FixedEmbedder({}, 3);
    const { collection } = createMemoryCollection("router_cache", local);
    const { router } = createRouter({ classifier: stubClassifier(null), collection });
    const longTurn = "x".repeat(250);

    await router.lookupCache("the query", buildContext({ text: "the query", history: [longTurn] }));
    await router.lookupCache("bare query");

    expect(local.calls).toEqual([[`${"x".repeat(200)}\nthe query`], ["bare query"]]);
  });

  it("sends the agent list, the history and the query to the classifier", async () => {
    const classifier = stubClassifier({ target_agent: "universal_agent", confidence: 0.5, reasoning: "general" });
    const { router } = createRouter({ classifier });

    await router.route(POEM_QUERY, buildContext({ text: POEM_QUERY, history: ["user: hi", "assistant: hello"] }));

    const [request] = classifier.classify.mock.calls[0];
    expect(request.systemPrompt).toContain("[\"security_expert\",\"universal_agent\"]");
    expect(request.messages).toEqual([
      { role: "user", content: "Context/History:\nuser: hi\nassistant: hello" },
      { role: "user", content: POEM_QUERY },
    ]);
  });

  it("degrades to the universal agent when the classifier fails", async () => {
    const classifier: Classifier = { classify: vi.fn(async () => { throw new Error("connection refused"); }) };
    const { router, index } = createRouter({ classifier });

    expect(await router.route(SQL_QUERY)).toEqual({
      targetAgent: "universal_agent",
      confidence: 0,
      reasoning: "Error in routing: connection refused",
      isCached: false,
    });
    expect(index.count()).toBe(0);
  });

  it("degrades when the classifier names an unknown agent", async () => {
    const { router } = createRouter({
      classifier: stubClassifier({ target_agent: "ghost", confidence: 0.99, reasoning: "?" }),
    });
    const decision = await router.route(SQL_QUERY);
    expect(decision.targetAgent).toBe("universal_agent");
    expect(decision.reasoning).toBe("Error in routing: classifier: Unknown agent 'ghost'");
  });

  it("degrades when the classifier reply does not fit the schema", async () => {
    const { router } = createRouter({
      classifier: stubClassifier({ target_agent: "security_expert", confidence: "high", reasoning: "x" }),
    });
    const decision = await router.route(SQL_QUERY);
    expect(decision.confidence).toBe(0);
    expect(decision.reasoning).toMatch(/^Error in routing: classifier: Invalid decision: confidence: /);
  });

  it("times out a slow classifier and aborts its signal", async () => {
    let seenSignal: AbortSignal | undefined;
    const classifier: Classifier = {
      classify: (_request, options) => {
        seenSignal = options?.signal;
        return new Promise(() => undefined);
      },
    };
    const { router } = createRouter({ classifier, classifierTimeoutMs: 20 });

    const decision = await router.route(SQL_QUERY);
    expect(decision.reasoning).toBe("Error in routing: classifier: no response within 20ms");
    expect(seenSignal?.aborted).toBe(true);
  });

  it("treats cache entries without a target agent as misses", async () => {
    const { router, index } = createRouter({ classifier: stubClassifier(null) });
    index.upsert([{ id: "odd", document: SQL_QUERY, metadata: { reasoning: "no agent" }, embedding: [1, 0, 0] }]);
    expect(await router.lookupCache(SQL_QUERY)).toBeNull();
  });

  it("refuses to record decisions for unknown agents", async () => {
    const { router, index, memory } = createRouter({ classifier: stubClassifier(null) });
    expect(await router.recordDecision(SQL_QUERY, "ghost", "manual")).toBe(false);
    expect(index.count()).toBe(0);
    expect(memory.messages("warn")).toContain("Refusing to cache decision for unknown agent");
  });

  it("records decisions under the given id", async () => {
    const { router, index } = createRouter({ classifier: stubClassifier(null) });
    expect(await router.recordDecision(SQL_QUERY, "security_expert", "manual", "req-7")).toBe(true);
    expect(index.get(["req-7"])[0].metadata.target_agent).toBe("security_expert");
  });

  it("treats collection failures as a miss on lookup and ignores them on write", async () => {
    const broken = new Collection({
      index: new MemoryVectorIndex("router_cache"),
      embedder: { dimensions: 3, embed: async () => { throw new Error("embedder down"); } },
      pool: new BlockingPool(1),
    });
    const classifier = stubClassifier({ target_agent: "security_expert", confidence: 0.95, reasoning: "security" });
    const { router, memory } = createRouter({ classifier, collection: broken });

    const decision = await router.route(SQL_QUERY);

    expect(decision.targetAgent).toBe("security_expert");
    expect(memory.messages("error")).toEqual(["Router cache lookup failed", "Failed to update router cache"]);
  });
});
