/**
 * Centralized configuration for the grounded retrieval service.
 *
 * Provides type-safe access to environment variables and application settings:
 * - OpenAI API configuration (chat model, embedding model, timeouts)
 * - PostgreSQL connection parameters and vector collection provisioning
 * - Retrieval and completion parameters
 * - Logging
 *
 * The OpenAI key is only checked when an OpenAI-backed adapter is built, so the
 * in-memory store and the test suite run without one.
 */
import type {
  DistanceMetric,
  IndexKind,
} from "@domain/vectorstore/ports";
import dotenv from "dotenv";

dotenv.config();

const DISTANCE_METRICS: readonly DistanceMetric[] = [
  "cosine",
  "euclidean",
  "dot-product",
];
const INDEX_KINDS: readonly IndexKind[] = ["hnsw", "ivfflat", "none"];

function oneOf<T extends string>(
  name: string,
  allowed: readonly T[],
  fallback: T
): T {
  const raw = process.env[name];
  if (!raw) {
    return fallback;
  }

  const match = allowed.find((value) => value === raw);
  if (!match) {
    throw new Error(`${name} must be one of ${allowed.join(", ")} (got "${raw}")`);
  }
  return match;
}

export const config = {
  env: process.env.NODE_ENV || "development",

  openai: {
    key: process.env.OPENAI_API_KEY || "",
    model: process.env.OPENAI_MODEL || "gpt-4o-mini",
    embeddingModel:
      process.env.OPENAI_EMBEDDING_MODEL || "text-embedding-3-small",
    baseUrl: process.env.OPENAI_BASE_URL || undefined,
    timeoutMs: Number(process.env.OPENAI_TIMEOUT_MS || 30000),
  },

  db: {
    host: process.env.DB_HOST || "localhost",
    port: Number(process.env.DB_PORT || 5432),
    user: process.env.DB_USER,
    password: process.env.DB_PASSWORD,
    database: process.env.DB_NAME,
    max: Number(process.env.DB_POOL_MAX || 10),
    idleTimeoutMs: Number(process.env.DB_IDLE_TIMEOUT_MS || 30000),
    connectionTimeoutMs: Number(process.env.DB_CONN_TIMEOUT_MS || 10000),
  },

  port: Number(process.env.PORT || 3000),

  vectorStore: {
    driver: oneOf("VECTOR_STORE", ["postgres", "memory"] as const, "postgres"),
    collection: process.env.VECTOR_COLLECTION || "movies",
    tablePrefix: process.env.VECTOR_TABLE_PREFIX || "rag_",
    dimension: Number(process.env.EMBEDDING_DIMENSIONS || 1536),
    metric: oneOf("VECTOR_METRIC", DISTANCE_METRICS, "cosine"),
    indexKind: oneOf("VECTOR_INDEX_KIND", INDEX_KINDS, "hnsw"),
    hnsw: {
      m: Number(process.env.HNSW_M || 16),
      efConstruction: Number(process.env.HNSW_EF_CONSTRUCTION || 64),
    },
    ivfflat: {
      lists: Number(process.env.IVFFLAT_LISTS || 100),
    },
  },

  rag: {
    topK: Number(process.env.RAG_TOP_K || 1),
    minRelevance: Number(process.env.RAG_MIN_RELEVANCE || 0),
  },

  chat: {
    maxTokens: Number(process.env.CHAT_MAX_TOKENS || 1000),
    temperature: Number(process.env.CHAT_TEMPERATURE || 0.1),
    topP: Number(process.env.CHAT_TOP_P || 0.5),
  },

  ingest: {
    maxFileBytes: Number(process.env.INGEST_MAX_FILE_BYTES || 5 * 1024 * 1024),
  },

  observability: {
    logLevel: process.env.LOG_LEVEL || "info",
    logFile: process.env.LOG_FILE ?? "logs/app.log",
  },
} as const;

export type AppConfig = typeof config;

export function requireOpenAIKey(): string {
  if (!config.openai.key) {
    throw new Error(
      "OPENAI_API_KEY is missing. Please set it in your .env file."
    );
  }
  return config.openai.key;
}
