import { randomUUID } from "node:crypto";
import type {
  Citation,
  ContextConfig,
  Interaction,
  InteractionCounts,
  OutcomeStatus,
  Paper,
  PaperSource,
  PipelineEvent,
  PipelineObserver,
  PipelineStage,
  ResearchResponse,
  RetrievalResult,
  StageLatencies,
} from "@papertrail/types";
import { AppError, CollaboratorPermanentError } from "@papertrail/errors";
import type { RetryPolicy } from "@papertrail/errors";
import type { IEmbeddingProvider } from "@papertrail/embeddings";
import type { IVectorStore } from "@papertrail/vector-store";
import type { Logger } from "@papertrail/logger";
import type { QueryRefiner } from "./query-refiner.js";
import type { PaperSearch } from "./paper-search.js";
import type { PassageEmbedder } from "./passage-embedder.js";
import type { AnswerGenerator } from "./answer-generator.js";
import { assembleContext } from "./context-assembler.js";

export interface ResearchPipelineDependencies {
  refiner: QueryRefiner;
  paperSearch: PaperSearch;
  passageEmbedder: PassageEmbedder;
  /** Embeds the question for the nearest-neighbour query. */
  embeddings: IEmbeddingProvider;
  vectorStore: IVectorStore;
  answerGenerator: AnswerGenerator;
  retry: RetryPolicy;
  observers: PipelineObserver[];
  logger: Logger;
  idGenerator?: () => string;
}

export const OUTCOME_MESSAGES: Record<OutcomeStatus, string> = {
  no_query: "No query provided. Please enter a research question.",
  no_papers: "I could not find any relevant academic papers for this query.",
  no_passages: "Could not find a specific answer in the retrieved papers.",
  generation_unavailable: "Answer generation is currently unavailable. Please try again later.",
  answered: "Answer generated from the retrieved papers.",
};

const SEARCH_UNAVAILABLE_MESSAGE = "Paper search is currently unavailable. Please try again later.";

/** Mutable per-request record, frozen into an Interaction on completion. */
interface RunState {
  id: string;
  query: string;
  refinedQuery: string;
  startedAt: number;
  createdAt: Date;
  papers: Paper[];
  latencies: StageLatencies;
  counts: InteractionCounts;
  error: AppError | null;
}

function elapsed(since: number): number {
  return Math.round(performance.now() - since);
}

function emptyLatencies(): StageLatencies {
  return {
    refineMs: 0,
    searchMs: 0,
    embedMs: 0,
    retrieveMs: 0,
    assembleMs: 0,
    generateMs: 0,
    totalMs: 0,
  };
}

function emptyCounts(): InteractionCounts {
  return {
    papersFound: 0,
    papersIndexed: 0,
    papersReused: 0,
    papersDropped: 0,
    passagesRetrieved: 0,
    contextPassages: 0,
    citations: 0,
  };
}

function toAppError(err: unknown): AppError {
  if (AppError.isAppError(err)) return err;
  const { message } = AppError.describe(err);
  return new AppError({ message, statusCode: 500, code: "INTERNAL", isOperational: false });
}

/**
 * Question → refine → search → index → retrieve → assemble → generate.
 *
 * Stages run sequentially. Collaborator failures degrade to an outcome rather
 * than an exception, and every request that reaches the search stage is
 * reported to the observers with a `complete` event.
 */
export class ResearchPipeline {
  private deps: ResearchPipelineDependencies;
  private context: ContextConfig;
  private nextId: () => string;

  constructor(deps: ResearchPipelineDependencies, context: ContextConfig) {
    this.deps = deps;
    this.context = context;
    this.nextId = deps.idGenerator ?? randomUUID;
  }

  async run(rawQuery: string): Promise<ResearchResponse> {
    const startedAt = performance.now();
    const refined = this.deps.refiner.refine(rawQuery);

    if (refined.kind === "empty") {
      return {
        status: "no_query",
        interactionId: null,
        answer: "",
        citations: [],
        sources: [],
        message: OUTCOME_MESSAGES.no_query,
      };
    }

    const state: RunState = {
      id: this.nextId(),
      query: rawQuery,
      refinedQuery: refined.text,
      startedAt,
      createdAt: new Date(),
      papers: [],
      latencies: { ...emptyLatencies(), refineMs: elapsed(startedAt) },
      counts: emptyCounts(),
      error: null,
    };

    await this.emit({
      type: "start",
      interactionId: state.id,
      query: state.query,
      refinedQuery: state.refinedQuery,
      at: state.createdAt,
    });

    // Search
    let mark = performance.now();
    const search = await this.deps.paperSearch.search(refined.text);
    state.latencies.searchMs = elapsed(mark);
    state.papers = search.papers;
    state.counts.papersFound = search.papers.length;

    if (search.error) {
      await this.fail(state, "search", search.error);
    }
    if (state.papers.length === 0) {
      return this.finish(state, "no_papers", {
        message: search.error ? SEARCH_UNAVAILABLE_MESSAGE : undefined,
      });
    }

    // Index: reuse passages from earlier requests, embed the rest
    mark = performance.now();
    let indexedPaperIds: string[];
    try {
      indexedPaperIds = await this.index(state);
    } catch (err: unknown) {
      state.latencies.embedMs = elapsed(mark);
      await this.fail(state, "embed", toAppError(err));
      return this.finish(state, "no_passages");
    }
    state.latencies.embedMs = elapsed(mark);

    if (indexedPaperIds.length === 0) {
      await this.emitRetrievalDone(state);
      return this.finish(state, "no_passages");
    }

    // Retrieve
    mark = performance.now();
    let retrieval: RetrievalResult;
    try {
      retrieval = await this.retrieve(rawQuery, indexedPaperIds);
    } catch (err: unknown) {
      state.latencies.retrieveMs = elapsed(mark);
      await this.fail(state, "retrieve", toAppError(err));
      return this.finish(state, "no_passages");
    }
    state.latencies.retrieveMs = elapsed(mark);
    state.counts.passagesRetrieved = retrieval.length;
    await this.emitRetrievalDone(state);

    // Assemble
    mark = performance.now();
    const context = assembleContext(retrieval, this.context);
    state.latencies.assembleMs = elapsed(mark);
    state.counts.contextPassages = context.passages.length;

    if (context.passages.length === 0) {
      return this.finish(state, "no_passages");
    }

    // Generate
    mark = performance.now();
    try {
      const generated = await this.deps.answerGenerator.generate({
        question: rawQuery,
        refinedQuery: refined.text,
        context: context.passages,
        papers: state.papers,
      });
      state.latencies.generateMs = elapsed(mark);
      state.counts.citations = generated.citations.length;

      await this.emit({
        type: "generation-done",
        interactionId: state.id,
        citations: generated.citations.length,
        generateMs: state.latencies.generateMs,
      });

      return this.finish(state, "answered", {
        answer: generated.answer,
        citations: generated.citations,
        sources: generated.sources,
      });
    } catch (err: unknown) {
      state.latencies.generateMs = elapsed(mark);
      await this.fail(state, "generate", toAppError(err));
      return this.finish(state, "generation_unavailable");
    }
  }

  private async index(state: RunState): Promise<string[]> {
    const { passageEmbedder, vectorStore, logger } = this.deps;

    const reused: string[] = [];
    const toEmbed: Paper[] = [];
    for (const paper of state.papers) {
      if (await vectorStore.hasPaper(paper.id)) {
        reused.push(paper.id);
      } else {
        toEmbed.push(paper);
      }
    }

    const batch = await passageEmbedder.embed(toEmbed);
    if (batch.passages.length > 0) {
      await vectorStore.upsert(batch.passages);
    }

    const embedded = new Set(batch.passages.map((p) => p.paperId));
    state.counts.papersReused = reused.length;
    state.counts.papersIndexed = embedded.size;
    state.counts.papersDropped = batch.droppedPaperIds.length;

    if (batch.skippedPaperIds.length > 0) {
      logger.debug(
        { interactionId: state.id, paperIds: batch.skippedPaperIds },
        "Papers without text skipped",
      );
    }

    // Keep search order
    return state.papers.map((p) => p.id).filter((id) => embedded.has(id) || reused.includes(id));
  }

  private async retrieve(question: string, paperIds: string[]): Promise<RetrievalResult> {
    const { embeddings, vectorStore, retry } = this.deps;

    const result = await retry.execute(
      () => embeddings.embedQuery(question),
      `${embeddings.name}.embedQuery`,
    );
    const vector = result.embeddings[0];
    if (!vector) {
      throw new CollaboratorPermanentError(
        `${embeddings.name}: no vector returned for the query`,
        embeddings.name,
      );
    }

    return vectorStore.query(vector, this.context.neighbors, { paperIds });
  }

  private async emitRetrievalDone(state: RunState): Promise<void> {
    await this.emit({
      type: "retrieval-done",
      interactionId: state.id,
      paperIds: state.papers.map((p) => p.id),
      passagesRetrieved: state.counts.passagesRetrieved,
      latencies: {
        searchMs: state.latencies.searchMs,
        embedMs: state.latencies.embedMs,
        retrieveMs: state.latencies.retrieveMs,
      },
    });
  }

  private async fail(state: RunState, stage: PipelineStage, error: AppError): Promise<void> {
    state.error = error;
    await this.emit({
      type: "error",
      interactionId: state.id,
      stage,
      error: { code: error.code, message: error.message },
    });
  }

  private async finish(
    state: RunState,
    status: Exclude<OutcomeStatus, "no_query">,
    result: {
      answer?: string;
      citations?: Citation[];
      sources?: PaperSource[];
      message?: string;
    } = {},
  ): Promise<ResearchResponse> {
    state.latencies.totalMs = elapsed(state.startedAt);

    const answer = result.answer ?? "";
    const citations = result.citations ?? [];
    const interaction: Interaction = {
      id: state.id,
      query: state.query,
      refinedQuery: state.refinedQuery,
      paperIds: state.papers.map((p) => p.id),
      answer,
      citations,
      latencies: state.latencies,
      counts: state.counts,
      outcome: status,
      isError: state.error !== null,
      errorCode: state.error?.code ?? null,
      feedback: null,
      feedbackAt: null,
      createdAt: state.createdAt,
    };

    await this.emit({ type: "complete", interaction });

    return {
      status,
      interactionId: state.id,
      answer,
      citations,
      sources: result.sources ?? [],
      message: result.message ?? OUTCOME_MESSAGES[status],
    };
  }

  /** Observer failures are logged and never change the response. */
  private async emit(event: PipelineEvent): Promise<void> {
    for (const observer of this.deps.observers) {
      try {
        await observer.notify(event);
      } catch (err: unknown) {
        this.deps.logger.error({ err, event: event.type }, "Pipeline observer failed");
      }
    }
  }
}
