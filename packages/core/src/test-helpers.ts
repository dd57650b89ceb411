import type { EmbeddingResult, Paper } from "@papertrail/types";
import type { IEmbeddingProvider } from "@papertrail/embeddings";
import type { CompletionResult, IGenerationProvider } from "@papertrail/generation";
import type { IPaperRetriever } from "@papertrail/sources";
import { RetryPolicy } from "@papertrail/errors";
import { createLogger } from "@papertrail/logger";

export const silentLogger = createLogger({ level: "silent" });

export function fastRetry(maxAttempts = 3): RetryPolicy {
  return new RetryPolicy({ maxAttempts, baseDelayMs: 1, maxDelayMs: 1, jitter: 0 });
}

/** Bag-of-words vectors: each word adds 1 to a slot picked by its character codes. */
export function wordVector(text: string, dimensions: number): number[] {
  const vector = new Array<number>(dimensions).fill(0);
  for (const word of text.toLowerCase().match(/[a-z]+/g) ?? []) {
    let slot = 0;
    for (const char of word) slot += char.charCodeAt(0);
    const index = slot % dimensions;
    vector[index] = (vector[index] ?? 0) + 1;
  }
  if (vector.every((v): boolean => v === 0)) vector[0] = 1;
  return vector;
}

export class FakeEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "fake-embeddings";
  readonly dimensions: number;
  documentCalls: string[][] = [];
  queryCalls: string[] = [];

  constructor(dimensions = 8) {
    this.dimensions = dimensions;
  }

  async embedDocuments(texts: string[]): Promise<EmbeddingResult> {
    this.documentCalls.push(texts);
    return this.result(texts);
  }

  async embedQuery(text: string): Promise<EmbeddingResult> {
    this.queryCalls.push(text);
    return this.result([text]);
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }

  private result(texts: string[]): EmbeddingResult {
    return {
      embeddings: texts.map((t) => wordVector(t, this.dimensions)),
      model: "fake",
      tokensUsed: 0,
      dimensions: this.dimensions,
    };
  }
}

export class FakeRetriever implements IPaperRetriever {
  readonly name = "fake-source";
  queries: string[] = [];
  private papers: Paper[];

  constructor(papers: Paper[]) {
    this.papers = papers;
  }

  async search(query: string, limit: number): Promise<Paper[]> {
    this.queries.push(query);
    return this.papers.slice(0, limit);
  }
}

export class FakeGenerationProvider implements IGenerationProvider {
  readonly name = "fake-llm";
  readonly model = "fake-model";
  prompts: string[] = [];
  private reply: (prompt: string) => string | Promise<string>;

  constructor(reply: (prompt: string) => string | Promise<string>) {
    this.reply = reply;
  }

  async complete(prompt: string): Promise<CompletionResult> {
    this.prompts.push(prompt);
    return { text: await this.reply(prompt), model: this.model };
  }
}

export function paper(id: string, abstract: string | null, title = `Paper ${id}`): Paper {
  return { id, title, abstract, url: `https://papers.example/${id}` };
}
