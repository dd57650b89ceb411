import type { AppConfig, PipelineObserver } from "@papertrail/types";
import { RetryPolicy } from "@papertrail/errors";
import type { Logger } from "@papertrail/logger";
import { createChunker } from "@papertrail/chunker";
import { createEmbeddingProvider } from "@papertrail/embeddings";
import { createVectorStore } from "@papertrail/vector-store";
import { SemanticScholarRetriever } from "@papertrail/sources";
import { OpenAiGenerationProvider } from "@papertrail/generation";
import { createDatabase } from "@papertrail/db";
import type { Database } from "@papertrail/db";
import {
  FeedbackRecorder,
  MetricsLogger,
  MetricsObserver,
  PostgresInteractionStore,
} from "@papertrail/metrics";
import type { IInteractionStore } from "@papertrail/metrics";
import {
  AnswerGenerator,
  PaperSearch,
  PassageEmbedder,
  QueryRefiner,
  ResearchPipeline,
} from "@papertrail/core";

export interface Container {
  pipeline: ResearchPipeline;
  feedbackRecorder: FeedbackRecorder;
  close(): Promise<void>;
}

export interface ContainerOverrides {
  /** Replaces the Postgres-backed store; no database connection is opened. */
  interactionStore?: IInteractionStore;
}

/**
 * Builds the component graph for one worker process from validated config.
 */
export function createContainer(
  config: AppConfig,
  logger: Logger,
  overrides: ContainerOverrides = {},
): Container {
  const retry = new RetryPolicy(config.retry, logger);

  const { embedding } = config;
  const embeddings = createEmbeddingProvider({
    provider: embedding.provider,
    cohere: embedding.cohere && {
      ...embedding.cohere,
      dimensions: embedding.dimensions,
      timeoutMs: embedding.timeoutMs,
    },
    tei: embedding.tei && {
      ...embedding.tei,
      dimensions: embedding.dimensions,
      timeoutMs: embedding.timeoutMs,
    },
  });

  const vectorStore = createVectorStore({
    type: config.vectorStore.type,
    metric: config.vectorStore.metric,
    dimensions: embedding.dimensions,
    qdrant: config.vectorStore.qdrant,
  });

  const paperSearch = new PaperSearch(
    new SemanticScholarRetriever({
      apiUrl: config.search.apiUrl,
      apiKey: config.search.apiKey,
      timeoutMs: config.search.timeoutMs,
    }),
    retry,
    logger,
    { maxResults: config.search.maxResults, dedupeByTitle: config.search.dedupeByTitle },
  );

  const passageEmbedder = new PassageEmbedder(
    { chunker: createChunker(config.chunking.strategy), embeddings, retry, logger },
    {
      chunking: { chunkSize: config.chunking.chunkSize, overlap: config.chunking.overlap },
      concurrency: embedding.concurrency,
    },
  );

  const { promptFormat, ...generation } = config.generation;
  const answerGenerator = new AnswerGenerator(
    { provider: new OpenAiGenerationProvider(generation, logger), retry, logger },
    { promptFormat },
  );

  let database: Database | null = null;
  let store: IInteractionStore;
  if (overrides.interactionStore) {
    store = overrides.interactionStore;
  } else {
    database = createDatabase({
      url: config.database.url,
      maxConnections: config.database.poolMax,
    });
    store = new PostgresInteractionStore(database.db);
  }

  const observers: PipelineObserver[] = [
    new MetricsObserver(new MetricsLogger(store, logger), logger),
  ];

  const pipeline = new ResearchPipeline(
    {
      refiner: new QueryRefiner(),
      paperSearch,
      passageEmbedder,
      embeddings,
      vectorStore,
      answerGenerator,
      retry,
      observers,
      logger,
    },
    config.context,
  );

  return {
    pipeline,
    feedbackRecorder: new FeedbackRecorder(store, logger),
    close: async () => {
      await database?.close();
    },
  };
}

