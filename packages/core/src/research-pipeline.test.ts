import { describe, it, expect, vi } from "vitest";
import type { Paper, PipelineEvent, PipelineObserver } from "@papertrail/types";
import { RecursiveChunker } from "@papertrail/chunker";
import { CollaboratorPermanentError, CollaboratorTransientError } from "@papertrail/errors";
import type { IPaperRetriever } from "@papertrail/sources";
import { InMemoryVectorStore } from "@papertrail/vector-store";
import {
  FeedbackRecorder,
  InMemoryInteractionStore,
  MetricsLogger,
  MetricsObserver,
} from "@papertrail/metrics";
import { QueryRefiner } from "./query-refiner.js";
import { PaperSearch } from "./paper-search.js";
import { PassageEmbedder } from "./passage-embedder.js";
import { AnswerGenerator } from "./answer-generator.js";
import { ResearchPipeline } from "./research-pipeline.js";
import {
  FakeEmbeddingProvider,
  FakeGenerationProvider,
  FakeRetriever,
  fastRetry,
  paper,
  silentLogger,
} from "./test-helpers.js";

const DIMENSIONS = 8;

const PAPERS: Paper[] = [
  paper(
    "p1",
    "Transformer attention lets every token attend to every other token. Long-context reasoning depends on how attention cost grows with sequence length.",
    "Attention in Long-Context Transformers",
  ),
  paper(
    "p2",
    "Sparse attention patterns reduce the quadratic cost of attention and extend the usable context window.",
    "A Survey of Sparse Attention",
  ),
  paper("p3", null, "Workshop Note Without Abstract"),
];

class RecordingObserver implements PipelineObserver {
  events: PipelineEvent[] = [];

  notify(event: PipelineEvent): void {
    this.events.push(event);
  }

  types(): string[] {
    return this.events.map((e) => e.type);
  }
}

interface HarnessOptions {
  retriever?: IPaperRetriever;
  reply?: (prompt: string) => string;
  observers?: PipelineObserver[];
}

function harness(options: HarnessOptions = {}) {
  const retry = fastRetry(2);
  const embeddings = new FakeEmbeddingProvider(DIMENSIONS);
  const vectorStore = new InMemoryVectorStore({ metric: "cosine", dimensions: DIMENSIONS });
  const retriever = options.retriever ?? new FakeRetriever(PAPERS);
  const provider = new FakeGenerationProvider(
    options.reply ?? (() => "Attention cost grows quadratically with length [1]. Sparse patterns reduce it [2]."),
  );
  const store = new InMemoryInteractionStore();
  const recorder = new RecordingObserver();
  const metricsObserver = new MetricsObserver(new MetricsLogger(store, silentLogger), silentLogger);

  let counter = 0;
  const pipeline = new ResearchPipeline(
    {
      refiner: new QueryRefiner(),
      paperSearch: new PaperSearch(retriever, retry, silentLogger, { maxResults: 5 }),
      passageEmbedder: new PassageEmbedder(
        { chunker: new RecursiveChunker(), embeddings, retry, logger: silentLogger },
        { chunking: { chunkSize: 120, overlap: 20 }, concurrency: 2 },
      ),
      embeddings,
      vectorStore,
      answerGenerator: new AnswerGenerator(
        { provider, retry, logger: silentLogger },
        { promptFormat: "plain" },
      ),
      retry,
      observers: [recorder, metricsObserver, ...(options.observers ?? [])],
      logger: silentLogger,
      idGenerator: () => `int-${String(++counter)}`,
    },
    { neighbors: 8, maxTokens: 200, maxPassagesPerPaper: 2 },
  );

  return { pipeline, embeddings, vectorStore, provider, store, recorder, retriever };
}

describe("ResearchPipeline", () => {
  it("answers a research question end to end and records feedback", async () => {
    const { pipeline, embeddings, vectorStore, store, recorder } = harness();
    const upsert = vi.spyOn(vectorStore, "upsert");
    const query = "impact of transformer attention on long-context reasoning";

    const response = await pipeline.run(query);

    // Refined query keeps the domain terms and drops stopwords
    const interaction = await store.findById("int-1");
    expect(interaction?.refinedQuery).toBe("transformer attention long-context reasoning impact");

    // Every embedded passage has the fixed dimension
    const indexed = upsert.mock.calls.flatMap(([passages]) => passages);
    expect(indexed.length).toBeGreaterThan(0);
    for (const p of indexed) expect(p.vector).toHaveLength(DIMENSIONS);
    expect(embeddings.queryCalls).toEqual([query]);

    expect(response.status).toBe("answered");
    expect(response.interactionId).toBe("int-1");
    expect(response.citations.length).toBeGreaterThanOrEqual(1);
    for (const citation of response.citations) {
      for (const id of citation.paperIds) expect(["p1", "p2"]).toContain(id);
    }

    expect(interaction).toMatchObject({
      outcome: "answered",
      answer: response.answer,
      paperIds: ["p1", "p2", "p3"],
      isError: false,
      errorCode: null,
      feedback: null,
    });
    expect(interaction?.counts).toMatchObject({
      papersFound: 3,
      papersIndexed: 2,
      papersReused: 0,
      papersDropped: 0,
      citations: 2,
    });
    expect(recorder.types()).toEqual(["start", "retrieval-done", "generation-done", "complete"]);

    const feedback = new FeedbackRecorder(store, silentLogger);
    expect(await feedback.record("int-1", "positive")).toBe("recorded");
    expect((await store.findById("int-1"))?.feedback).toBe("positive");
    expect(await feedback.record("int-1", "negative")).toBe("recorded");
    expect((await store.findById("int-1"))?.feedback).toBe("negative");
  });

  it("searches with the refined query", async () => {
    const retriever = new FakeRetriever(PAPERS);
    const { pipeline } = harness({ retriever });

    await pipeline.run("What are LLMs?");
    expect(retriever.queries).toEqual(["large language models"]);
  });

  it("short-circuits an empty query without logging", async () => {
    const retriever = new FakeRetriever(PAPERS);
    const { pipeline, store, recorder } = harness({ retriever });

    const response = await pipeline.run("  ?? ");

    expect(response).toEqual({
      status: "no_query",
      interactionId: null,
      answer: "",
      citations: [],
      sources: [],
      message: "No query provided. Please enter a research question.",
    });
    expect(store.size).toBe(0);
    expect(recorder.events).toEqual([]);
    expect(retriever.queries).toEqual([]);
  });

  it("logs a no_papers outcome when the search finds nothing", async () => {
    const { pipeline, store } = harness({ retriever: new FakeRetriever([]) });

    const response = await pipeline.run("obscure topic");

    expect(response.status).toBe("no_papers");
    expect(response.message).toBe("I could not find any relevant academic papers for this query.");
    expect(await store.findById("int-1")).toMatchObject({ outcome: "no_papers", isError: false });
  });

  it("flags the interaction when the search keeps failing", async () => {
    const retriever: IPaperRetriever = {
      name: "down",
      search: () => Promise.reject(new CollaboratorTransientError("down: timeout", "down")),
    };
    const { pipeline, store, recorder } = harness({ retriever });

    const response = await pipeline.run("attention");

    expect(response.status).toBe("no_papers");
    expect(response.message).toBe("Paper search is currently unavailable. Please try again later.");
    expect(await store.findById("int-1")).toMatchObject({
      outcome: "no_papers",
      isError: true,
      errorCode: "COLLABORATOR_TRANSIENT",
    });
    expect(recorder.types()).toEqual(["start", "error", "complete"]);
  });

  it("reports no_passages when no paper has text", async () => {
    const { pipeline, store } = harness({ retriever: new FakeRetriever([paper("p3", null)]) });

    const response = await pipeline.run("attention");

    expect(response.status).toBe("no_passages");
    expect(await store.findById("int-1")).toMatchObject({ outcome: "no_passages", isError: false });
  });

  it("logs generation_unavailable with an empty answer when generation fails", async () => {
    const { pipeline, store, recorder } = harness({
      reply: () => {
        throw new CollaboratorPermanentError("fake-llm: unauthorized", "fake-llm");
      },
    });

    const response = await pipeline.run("attention");

    expect(response.status).toBe("generation_unavailable");
    expect(response.answer).toBe("");
    expect(response.interactionId).toBe("int-1");
    expect(await store.findById("int-1")).toMatchObject({
      outcome: "generation_unavailable",
      answer: "",
      isError: true,
      errorCode: "COLLABORATOR_PERMANENT",
    });
    expect(recorder.types()).toEqual(["start", "retrieval-done", "error", "complete"]);
  });

  it("logs no_passages with the error when the query cannot be embedded", async () => {
    const { pipeline, embeddings, store, recorder } = harness();
    const embedQuery = vi
      .spyOn(embeddings, "embedQuery")
      .mockRejectedValue(new CollaboratorTransientError("fake-embeddings: timeout", "fake"));

    const response = await pipeline.run("attention");

    expect(response.status).toBe("no_passages");
    expect(response.answer).toBe("");
    expect(embedQuery).toHaveBeenCalledTimes(2);
    expect(await store.findById("int-1")).toMatchObject({
      outcome: "no_passages",
      isError: true,
      errorCode: "COLLABORATOR_TRANSIENT",
    });
    expect(recorder.types()).toEqual(["start", "error", "complete"]);
    expect(recorder.events[1]).toEqual({
      type: "error",
      interactionId: "int-1",
      stage: "retrieve",
      error: { code: "COLLABORATOR_TRANSIENT", message: "fake-embeddings: timeout" },
    });
  });

  it("treats an empty query embedding as a permanent failure", async () => {
    const { pipeline, embeddings, store, recorder } = harness();
    vi.spyOn(embeddings, "embedQuery").mockResolvedValue({
      embeddings: [],
      model: "fake",
      tokensUsed: 0,
      dimensions: DIMENSIONS,
    });

    const response = await pipeline.run("attention");

    expect(response.status).toBe("no_passages");
    expect(await store.findById("int-1")).toMatchObject({
      outcome: "no_passages",
      isError: true,
      errorCode: "COLLABORATOR_PERMANENT",
    });
    expect(recorder.types()).toEqual(["start", "error", "complete"]);
    expect(recorder.events[1]).toMatchObject({ type: "error", stage: "retrieve" });
  });

  it("logs no_passages with the error when the vector store rejects the upsert", async () => {
    const { pipeline, embeddings, vectorStore, store, recorder } = harness();
    vi.spyOn(vectorStore, "upsert").mockRejectedValue(new Error("disk full"));

    const response = await pipeline.run("attention");

    expect(response.status).toBe("no_passages");
    expect(embeddings.queryCalls).toEqual([]);
    expect(await store.findById("int-1")).toMatchObject({
      outcome: "no_passages",
      answer: "",
      isError: true,
      errorCode: "INTERNAL",
    });
    expect(recorder.types()).toEqual(["start", "error", "complete"]);
    expect(recorder.events[1]).toEqual({
      type: "error",
      interactionId: "int-1",
      stage: "embed",
      error: { code: "INTERNAL", message: "disk full" },
    });
  });

  it("logs no_passages with the error when the vector store lookup fails", async () => {
    const { pipeline, embeddings, vectorStore, store, recorder } = harness();
    vi.spyOn(vectorStore, "hasPaper").mockRejectedValue(
      new CollaboratorPermanentError("qdrant: forbidden", "qdrant"),
    );

    const response = await pipeline.run("attention");

    expect(response.status).toBe("no_passages");
    expect(embeddings.documentCalls).toEqual([]);
    expect(await store.findById("int-1")).toMatchObject({
      outcome: "no_passages",
      isError: true,
      errorCode: "COLLABORATOR_PERMANENT",
    });
    expect(recorder.types()).toEqual(["start", "error", "complete"]);
    expect(recorder.events[1]).toMatchObject({ type: "error", stage: "embed" });
  });

  it("reuses passages indexed by an earlier request", async () => {
    const { pipeline, embeddings, store } = harness();

    await pipeline.run("attention");
    const embeddedFirst = embeddings.documentCalls.length;
    await pipeline.run("sparse attention");

    expect(embeddings.documentCalls.length).toBe(embeddedFirst);
    expect((await store.findById("int-2"))?.counts).toMatchObject({ papersReused: 2, papersIndexed: 0 });
  });

  it("never lets an observer failure change the response", async () => {
    const broken: PipelineObserver = {
      notify: () => {
        throw new Error("observer exploded");
      },
    };
    const { pipeline } = harness({ observers: [broken] });

    const response = await pipeline.run("attention");
    expect(response.status).toBe("answered");
  });

  it("returns the interaction id even when the logging store is down", async () => {
    const { pipeline, store } = harness();
    vi.spyOn(store, "insert").mockRejectedValue(new Error("disk full"));

    const response = await pipeline.run("attention");

    expect(response.status).toBe("answered");
    expect(response.interactionId).toBe("int-1");
    expect(store.size).toBe(0);
  });
});
