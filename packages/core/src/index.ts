export {
  QueryRefiner,
  MAX_KEYWORDS,
  normalizeText,
  loadStopwords,
  loadDomainLexicon,
} from "./query-refiner.js";
export type { DomainLexicon, QueryRefinerOptions } from "./query-refiner.js";

export { PaperSearch, dedupePapers, normalizeTitle } from "./paper-search.js";
export type { PaperSearchOptions, PaperSearchResult } from "./paper-search.js";

export { PassageEmbedder } from "./passage-embedder.js";
export type {
  PassageEmbedderDependencies,
  PassageEmbedderOptions,
  EmbedBatch,
} from "./passage-embedder.js";

export { assembleContext } from "./context-assembler.js";
export type { ContextOptions, AssembledContext } from "./context-assembler.js";

export { buildPrompt, renderSources } from "./prompt-builder.js";
export type { BuiltPrompt } from "./prompt-builder.js";

export { bindCitations, parseMarker, parseMarkerNumbers, claimBefore } from "./citations.js";
export type { BoundCitations, ParsedMarker } from "./citations.js";

export { AnswerGenerator } from "./answer-generator.js";
export type {
  AnswerGeneratorDependencies,
  AnswerGeneratorOptions,
  GenerationInput,
  GeneratedAnswer,
} from "./answer-generator.js";

export { ResearchPipeline, OUTCOME_MESSAGES } from "./research-pipeline.js";
export type { ResearchPipelineDependencies } from "./research-pipeline.js";

export { estimateTokens } from "./tokens.js";
