import { z } from "zod";
import type { AppConfig } from "@papertrail/types";

const int = (fallback: string) =>
  z.string().default(fallback).transform(Number).pipe(z.number().int().positive());

const number = (fallback: string) =>
  z.string().default(fallback).transform(Number).pipe(z.number().finite());

const flag = (fallback: "true" | "false") =>
  z
    .enum(["true", "false", "1", "0"])
    .default(fallback)
    .transform((val) => val === "true" || val === "1");

/**
 * Zod schema for every environment variable the services read.
 * Validates, transforms, and provides defaults so that the resulting
 * object is a strongly-typed AppConfig.
 */
export const envSchema = z
  .object({
    // ---------- Core ----------
    NODE_ENV: z.enum(["development", "test", "production"]),
    LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),

    // ---------- Database ----------
    DATABASE_URL: z
      .string()
      .min(1, "DATABASE_URL is required")
      .refine((url) => url.startsWith("postgresql://") || url.startsWith("postgres://"), {
        message: "DATABASE_URL must start with postgresql:// or postgres://",
      }),
    DATABASE_POOL_MAX: int("10"),

    // ---------- Redis ----------
    REDIS_URL: z.string().min(1).default("redis://localhost:6379"),

    // ---------- Paper search ----------
    SEMANTIC_SCHOLAR_API_URL: z.string().url().default("https://api.semanticscholar.org/graph/v1"),
    SEMANTIC_SCHOLAR_API_KEY: z.string().optional(),
    SEARCH_MAX_RESULTS: int("5").pipe(z.number().max(100)),
    SEARCH_TIMEOUT_MS: int("10000"),
    SEARCH_DEDUPE_BY_TITLE: flag("false"),

    // ---------- Embeddings ----------
    EMBEDDING_PROVIDER: z.enum(["cohere", "tei"]).default("cohere"),
    COHERE_API_KEY: z.string().optional(),
    COHERE_EMBED_MODEL: z.string().default("embed-english-v3.0"),
    TEI_URL: z.string().url().optional(),
    EMBEDDING_DIMENSIONS: int("1024"),
    EMBEDDING_CONCURRENCY: int("4"),
    EMBEDDING_TIMEOUT_MS: int("15000"),

    // ---------- Generation ----------
    OPENAI_API_KEY: z.string().min(1, "OPENAI_API_KEY is required"),
    GENERATION_MODEL: z.string().default("gpt-4o-mini"),
    GENERATION_TEMPERATURE: number("0.25").pipe(z.number().min(0).max(2)),
    GENERATION_MAX_TOKENS: int("1024"),
    GENERATION_TIMEOUT_MS: int("30000"),
    PROMPT_FORMAT: z.enum(["plain", "xml", "markdown"]).default("plain"),

    // ---------- Vector store ----------
    VECTOR_STORE: z.enum(["memory", "qdrant"]).default("memory"),
    VECTOR_METRIC: z.enum(["cosine", "l2"]).default("cosine"),
    QDRANT_URL: z.string().url().optional(),
    QDRANT_API_KEY: z.string().optional(),
    QDRANT_COLLECTION: z.string().min(1).default("passages"),

    // ---------- Chunking & context ----------
    CHUNK_STRATEGY: z.enum(["recursive", "fixed"]).default("recursive"),
    CHUNK_SIZE: int("1000"),
    CHUNK_OVERLAP: z.string().default("200").transform(Number).pipe(z.number().int().nonnegative()),
    SEARCH_NEIGHBORS: int("8"),
    CONTEXT_MAX_TOKENS: int("1500"),
    MAX_PASSAGES_PER_PAPER: int("2"),

    // ---------- Retry ----------
    RETRY_MAX_ATTEMPTS: int("3"),
    RETRY_BASE_DELAY_MS: int("1000"),
    RETRY_MAX_DELAY_MS: int("10000"),
    RETRY_JITTER: number("0.5").pipe(z.number().min(0).max(1)),
  })
  .superRefine((env, ctx) => {
    if (env.CHUNK_OVERLAP >= env.CHUNK_SIZE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["CHUNK_OVERLAP"],
        message: "CHUNK_OVERLAP must be smaller than CHUNK_SIZE",
      });
    }
    // Passages are budgeted at ceil(chars / 4) tokens each.
    if (Math.ceil(env.CHUNK_SIZE / 4) > env.CONTEXT_MAX_TOKENS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["CONTEXT_MAX_TOKENS"],
        message: "CONTEXT_MAX_TOKENS must fit at least one full passage (CHUNK_SIZE / 4 tokens)",
      });
    }
    if (env.EMBEDDING_PROVIDER === "cohere" && !env.COHERE_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["COHERE_API_KEY"],
        message: "COHERE_API_KEY is required when EMBEDDING_PROVIDER is cohere",
      });
    }
    if (env.EMBEDDING_PROVIDER === "tei" && !env.TEI_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["TEI_URL"],
        message: "TEI_URL is required when EMBEDDING_PROVIDER is tei",
      });
    }
    if (env.VECTOR_STORE === "qdrant" && !env.QDRANT_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["QDRANT_URL"],
        message: "QDRANT_URL is required when VECTOR_STORE is qdrant",
      });
    }
  });

/**
 * Parse and validate process.env (or any compatible record) against
 * the envSchema and return a strongly-typed {@link AppConfig}.
 *
 * Throws a ZodError with detailed messages when validation fails.
 */
export function parseEnv(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = envSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,

    database: {
      url: parsed.DATABASE_URL,
      poolMax: parsed.DATABASE_POOL_MAX,
    },

    redis: {
      url: parsed.REDIS_URL,
    },

    search: {
      apiUrl: parsed.SEMANTIC_SCHOLAR_API_URL,
      apiKey: parsed.SEMANTIC_SCHOLAR_API_KEY,
      maxResults: parsed.SEARCH_MAX_RESULTS,
      timeoutMs: parsed.SEARCH_TIMEOUT_MS,
      dedupeByTitle: parsed.SEARCH_DEDUPE_BY_TITLE,
    },

    embedding: {
      provider: parsed.EMBEDDING_PROVIDER,
      dimensions: parsed.EMBEDDING_DIMENSIONS,
      concurrency: parsed.EMBEDDING_CONCURRENCY,
      timeoutMs: parsed.EMBEDDING_TIMEOUT_MS,
      cohere: parsed.COHERE_API_KEY
        ? { apiKey: parsed.COHERE_API_KEY, model: parsed.COHERE_EMBED_MODEL }
        : undefined,
      tei: parsed.TEI_URL ? { baseUrl: parsed.TEI_URL } : undefined,
    },

    generation: {
      apiKey: parsed.OPENAI_API_KEY,
      model: parsed.GENERATION_MODEL,
      temperature: parsed.GENERATION_TEMPERATURE,
      maxTokens: parsed.GENERATION_MAX_TOKENS,
      timeoutMs: parsed.GENERATION_TIMEOUT_MS,
      promptFormat: parsed.PROMPT_FORMAT,
    },

    vectorStore: {
      type: parsed.VECTOR_STORE,
      metric: parsed.VECTOR_METRIC,
      qdrant: parsed.QDRANT_URL
        ? {
            url: parsed.QDRANT_URL,
            apiKey: parsed.QDRANT_API_KEY,
            collection: parsed.QDRANT_COLLECTION,
          }
        : undefined,
    },

    chunking: {
      strategy: parsed.CHUNK_STRATEGY,
      chunkSize: parsed.CHUNK_SIZE,
      overlap: parsed.CHUNK_OVERLAP,
    },

    context: {
      neighbors: parsed.SEARCH_NEIGHBORS,
      maxTokens: parsed.CONTEXT_MAX_TOKENS,
      maxPassagesPerPaper: parsed.MAX_PASSAGES_PER_PAPER,
    },

    retry: {
      maxAttempts: parsed.RETRY_MAX_ATTEMPTS,
      baseDelayMs: parsed.RETRY_BASE_DELAY_MS,
      maxDelayMs: parsed.RETRY_MAX_DELAY_MS,
      jitter: parsed.RETRY_JITTER,
    },
  };
}
