/**
 * Configuration
 *
 * Environment variables (with .env from the project root) validated into a
 * typed SwitchboardConfig. Importable without constructing anything.
 */

import { config as loadDotenv } from "dotenv";
import * as os from "os";
import { resolve, dirname, join } from "path";
import { fileURLToPath } from "url";
import { z } from "zod";
import { ConfigError } from "./errors.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const ENV_FILE = resolve(__dirname, "../../.env");

// ============================================
// SCHEMA
// ============================================

const unitInterval = z.coerce.number().min(0).max(1);
const positiveInt = z.coerce.number().int().positive();

const EnvSchema = z.object({
  SWITCHBOARD_ROOT: z.string().min(1).optional(),
  SWITCHBOARD_LIBRARY_DIR: z.string().min(1).default(".cursor"),
  SWITCHBOARD_DB_PATH: z.string().min(1).optional(),

  ROUTER_SIMILARITY_THRESHOLD: unitInterval.default(0.95),
  ROUTER_CACHE_MIN_CONFIDENCE: unitInterval.default(0.8),
  SKILLS_DISTANCE_THRESHOLD: z.coerce.number().min(0).max(2).default(0.45),
  IMPLANTS_DISTANCE_THRESHOLD: z.coerce.number().min(0).max(2).default(0.73),

  CLASSIFIER_BASE_URL: z.string().url().default("https://api.openai.com/v1"),
  CLASSIFIER_API_KEY: z.string().optional(),
  OPENAI_API_KEY: z.string().optional(),
  CLASSIFIER_MODEL: z.string().min(1).default("gpt-4o-mini"),
  CLASSIFIER_TIMEOUT_MS: positiveInt.default(30_000),
  CLASSIFIER_MAX_RETRIES: z.coerce.number().int().min(0).default(2),

  EMBEDDING_PROVIDER: z.enum(["hashing", "openai"]).default("hashing"),
  EMBEDDING_MODEL: z.string().min(1).default("text-embedding-3-small"),
  EMBEDDING_DIMENSIONS: positiveInt.default(384),

  VECTOR_POOL_SIZE: positiveInt.default(4),
  SESSION_CACHE_CAPACITY: positiveInt.default(256),
  SESSION_CACHE_TTL_MS: positiveInt.default(600_000),
});

export interface SwitchboardConfig {
  root: string;
  libraryDir: string;
  dbPath: string;
  router: {
    similarityThreshold: number;
    cacheMinConfidence: number;
  };
  retrieval: {
    skillsThreshold: number;
    implantsThreshold: number;
  };
  classifier: {
    baseUrl: string;
    apiKey: string;
    model: string;
    timeoutMs: number;
    maxRetries: number;
  };
  embeddings: {
    provider: "hashing" | "openai";
    model: string;
    dimensions: number;
  };
  vectorPoolSize: number;
  sessionCache: {
    capacity: number;
    ttlMs: number;
  };
}

// ============================================
// LOADING
// ============================================

/** Load .env into process.env (existing variables win) */
export function loadEnvFile(path: string = ENV_FILE): NodeJS.ProcessEnv {
  loadDotenv({ path });
  return process.env;
}

/**
 * Build the configuration from an environment. Empty strings count as unset.
 * Throws ConfigError naming every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = loadEnvFile()): SwitchboardConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== "")
  );

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map(i => `${i.path.join(".")}: ${i.message}`));
  }
  const e = parsed.data;

  return {
    root: resolve(e.SWITCHBOARD_ROOT ?? process.cwd()),
    libraryDir: e.SWITCHBOARD_LIBRARY_DIR,
    dbPath: e.SWITCHBOARD_DB_PATH ?? join(os.homedir(), ".switchboard", "vectors.db"),
    router: {
      similarityThreshold: e.ROUTER_SIMILARITY_THRESHOLD,
      cacheMinConfidence: e.ROUTER_CACHE_MIN_CONFIDENCE,
    },
    retrieval: {
      skillsThreshold: e.SKILLS_DISTANCE_THRESHOLD,
      implantsThreshold: e.IMPLANTS_DISTANCE_THRESHOLD,
    },
    classifier: {
      baseUrl: e.CLASSIFIER_BASE_URL,
      apiKey: e.CLASSIFIER_API_KEY ?? e.OPENAI_API_KEY ?? "",
      model: e.CLASSIFIER_MODEL,
      timeoutMs: e.CLASSIFIER_TIMEOUT_MS,
      maxRetries: e.CLASSIFIER_MAX_RETRIES,
    },
    embeddings: {
      provider: e.EMBEDDING_PROVIDER,
      model: e.EMBEDDING_MODEL,
      dimensions: e.EMBEDDING_DIMENSIONS,
    },
    vectorPoolSize: e.VECTOR_POOL_SIZE,
    sessionCache: {
      capacity: e.SESSION_CACHE_CAPACITY,
      ttlMs: e.SESSION_CACHE_TTL_MS,
    },
  };
}
