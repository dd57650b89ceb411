export type { Paper, PaperAuthor, PaperSource } from "./paper.js";
export type {
  DistanceMetric,
  ChunkStrategy,
  ChunkingConfig,
  ChunkResult,
  EmbeddingResult,
  Passage,
  ScoredPassage,
  RetrievalResult,
} from "./passage.js";
export { passageId } from "./passage.js";
export type { Citation, PassageReference } from "./citation.js";
export { FEEDBACK_RATINGS } from "./interaction.js";
export type {
  FeedbackRating,
  FeedbackOutcome,
  OutcomeStatus,
  StageLatencies,
  InteractionCounts,
  Interaction,
} from "./interaction.js";
export type {
  RefinementStep,
  RefinedQuery,
  PipelineStage,
  PipelineErrorInfo,
  PipelineEvent,
  PipelineObserver,
  ResearchResponse,
} from "./pipeline.js";
export type {
  AppConfig,
  PromptFormat,
  EmbeddingProviderType,
  VectorStoreType,
  DatabaseConfig,
  RedisConfig,
  SearchConfig,
  EmbeddingConfig,
  GenerationConfig,
  VectorStoreConfig,
  ContextConfig,
  RetryConfig,
} from "./config.js";
export type { JobType, JobData, ResearchJobData, FeedbackJobData, AnyJobData } from "./job.js";
