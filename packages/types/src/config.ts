import type { ChunkingConfig, DistanceMetric } from "./passage.js";

export type PromptFormat = "plain" | "xml" | "markdown";

export type EmbeddingProviderType = "cohere" | "tei";

export type VectorStoreType = "memory" | "qdrant";

export interface AppConfig {
  nodeEnv: "development" | "test" | "production";
  logLevel: "debug" | "info" | "warn" | "error" | "silent";
  database: DatabaseConfig;
  redis: RedisConfig;
  search: SearchConfig;
  embedding: EmbeddingConfig;
  generation: GenerationConfig;
  vectorStore: VectorStoreConfig;
  chunking: ChunkingConfig;
  context: ContextConfig;
  retry: RetryConfig;
}

export interface DatabaseConfig {
  url: string;
  poolMax: number;
}

export interface RedisConfig {
  url: string;
}

export interface SearchConfig {
  apiUrl: string;
  apiKey?: string;
  maxResults: number;
  timeoutMs: number;
  dedupeByTitle: boolean;
}

export interface EmbeddingConfig {
  provider: EmbeddingProviderType;
  dimensions: number;
  concurrency: number;
  timeoutMs: number;
  cohere?: { apiKey: string; model: string };
  tei?: { baseUrl: string };
}

export interface GenerationConfig {
  apiKey: string;
  model: string;
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
  promptFormat: PromptFormat;
}

export interface VectorStoreConfig {
  type: VectorStoreType;
  metric: DistanceMetric;
  qdrant?: { url: string; apiKey?: string; collection: string };
}

export interface ContextConfig {
  /** k for the nearest-neighbour query. */
  neighbors: number;
  maxTokens: number;
  maxPassagesPerPaper: number;
}

export interface RetryConfig {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitter: number;
}
