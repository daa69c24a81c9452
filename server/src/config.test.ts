import { describe, it, expect, afterEach } from "vitest";
import * as os from "os";
import * as path from "path";
import { loadConfig, loadEnvFile } from "./config.js";
import { ConfigError } from "./errors.js";
import { makeTempDir, removeDir, writeTree } from "./testing/helpers.js";

describe("loadConfig", () => {
  it("applies defaults to an empty environment", () => {
    const config = loadConfig({});

    expect(config.root).toBe(path.resolve(process.cwd()));
    expect(config.libraryDir).toBe(".cursor");
    expect(config.dbPath).toBe(path.join(os.homedir(), ".switchboard", "vectors.db"));
    expect(config.router).toEqual({ similarityThreshold: 0.95, cacheMinConfidence: 0.8 });
    expect(config.retrieval).toEqual({ skillsThreshold: 0.45, implantsThreshold: 0.73 });
    expect(config.classifier).toEqual({
      baseUrl: "https://api.openai.com/v1",
      apiKey: "",
      model: "gpt-4o-mini",
      timeoutMs: 30_000,
      maxRetries: 2,
    });
    expect(config.embeddings).toEqual({ provider: "hashing", model: "text-embedding-3-small", dimensions: 384 });
    expect(config.vectorPoolSize).toBe(4);
    expect(config.sessionCache).toEqual({ capacity: 256, ttlMs: 600_000 });
  });

  it("coerces overrides and treats empty strings as unset", () => {
    const config = loadConfig({
      SWITCHBOARD_ROOT: "/srv/prompts",
      SWITCHBOARD_DB_PATH: ":memory:",
      ROUTER_SIMILARITY_THRESHOLD: "0.9",
      CLASSIFIER_API_KEY: "",
      OPENAI_API_KEY: "test-key",
      CLASSIFIER_MAX_RETRIES: "0",
      EMBEDDING_PROVIDER: "openai",
      EMBEDDING_DIMENSIONS: "",
    });

    expect(config.root).toBe(path.resolve("/srv/prompts"));
    expect(config.dbPath).toBe(":memory:");
    expect(config.router.similarityThreshold).toBe(0.9);
    expect(config.classifier.apiKey).toBe("test-key");
    expect(config.classifier.maxRetries).toBe(0);
    expect(config.embeddings.provider).toBe("openai");
    expect(config.embeddings.dimensions).toBe(384);
  });

  it("prefers the classifier key over the OpenAI key", () => {
    const config = loadConfig({ CLASSIFIER_API_KEY: "test-classifier-key", OPENAI_API_KEY: "test-key" });
    expect(config.classifier.apiKey).toBe("test-classifier-key");
  });

  it("names every invalid variable", () => {
    let caught: unknown;
    try {
      loadConfig({ ROUTER_SIMILARITY_THRESHOLD: "1.5", EMBEDDING_PROVIDER: "bogus" });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    if (!(caught instanceof ConfigError)) return;
    expect(caught.issues).toHaveLength(2);
    expect(caught.issues[0]).toBe("ROUTER_SIMILARITY_THRESHOLD: Number must be less than or equal to 1");
    expect(caught.issues[1]).toMatch(/^EMBEDDING_PROVIDER: /);
    expect(caught.message).toMatch(/^Invalid configuration: ROUTER_SIMILARITY_THRESHOLD/);
  });
});

describe("loadEnvFile", () => {
  let dir: string | undefined;

  afterEach(() => {
    delete process.env.SWITCHBOARD_ENV_FILE_PROBE;
    if (dir) removeDir(dir);
  });

  it("loads variables from the given file into process.env", () => {
    dir = makeTempDir();
    writeTree(dir, { ".env": "SWITCHBOARD_ENV_FILE_PROBE=loaded\n" });

    const env = loadEnvFile(path.join(dir, ".env"));
    expect(env.SWITCHBOARD_ENV_FILE_PROBE).toBe("loaded");
  });
});
