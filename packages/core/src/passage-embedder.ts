import pLimit from "p-limit";
import { passageId } from "@papertrail/types";
import type { Paper, Passage } from "@papertrail/types";
import type { ChunkOptions, IChunker } from "@papertrail/chunker";
import type { IEmbeddingProvider } from "@papertrail/embeddings";
import { AppError, CollaboratorPermanentError } from "@papertrail/errors";
import type { RetryPolicy } from "@papertrail/errors";
import type { Logger } from "@papertrail/logger";

export interface PassageEmbedderDependencies {
  chunker: IChunker;
  embeddings: IEmbeddingProvider;
  retry: RetryPolicy;
  logger: Logger;
}

export interface PassageEmbedderOptions {
  chunking: ChunkOptions;
  /** Papers embedded at the same time. */
  concurrency: number;
}

export interface EmbedBatch {
  passages: Passage[];
  /** Papers whose embedding failed after retries or came back malformed. */
  droppedPaperIds: string[];
  /** Papers with no text to embed. */
  skippedPaperIds: string[];
}

type PaperOutcome =
  | { kind: "embedded"; passages: Passage[] }
  | { kind: "dropped"; paperId: string }
  | { kind: "skipped"; paperId: string };

/**
 * Chunks each paper's abstract and embeds the chunks. One paper failing does
 * not fail the batch; it is dropped with a warning.
 */
export class PassageEmbedder {
  private deps: PassageEmbedderDependencies;
  private options: PassageEmbedderOptions;

  constructor(deps: PassageEmbedderDependencies, options: PassageEmbedderOptions) {
    this.deps = deps;
    this.options = options;
  }

  async embed(papers: readonly Paper[]): Promise<EmbedBatch> {
    const limit = pLimit(Math.max(1, this.options.concurrency));
    const outcomes = await Promise.all(papers.map((paper) => limit(() => this.embedPaper(paper))));

    const batch: EmbedBatch = { passages: [], droppedPaperIds: [], skippedPaperIds: [] };
    for (const outcome of outcomes) {
      switch (outcome.kind) {
        case "embedded":
          batch.passages.push(...outcome.passages);
          break;
        case "dropped":
          batch.droppedPaperIds.push(outcome.paperId);
          break;
        case "skipped":
          batch.skippedPaperIds.push(outcome.paperId);
          break;
      }
    }
    return batch;
  }

  private async embedPaper(paper: Paper): Promise<PaperOutcome> {
    const text = paper.abstract?.trim() ?? "";
    const chunks = text.length > 0 ? this.deps.chunker.chunk(text, this.options.chunking) : [];
    if (chunks.length === 0) {
      return { kind: "skipped", paperId: paper.id };
    }

    const { embeddings, retry, logger } = this.deps;

    try {
      const result = await retry.execute(
        () => embeddings.embedDocuments(chunks.map((c) => c.content)),
        `${embeddings.name}.embedDocuments`,
      );

      if (result.embeddings.length !== chunks.length) {
        throw new CollaboratorPermanentError(
          `${embeddings.name}: expected ${String(chunks.length)} vectors, ` +
            `got ${String(result.embeddings.length)}`,
          embeddings.name,
        );
      }

      const passages: Passage[] = [];
      for (const [i, chunk] of chunks.entries()) {
        const vector = result.embeddings[i];
        if (!vector || vector.length !== embeddings.dimensions) {
          throw new CollaboratorPermanentError(
            `${embeddings.name}: vector for chunk ${String(chunk.index)} has ` +
              `${String(vector?.length ?? 0)} dimensions, ` +
              `expected ${String(embeddings.dimensions)}`,
            embeddings.name,
          );
        }
        passages.push({
          id: passageId(paper.id, chunk.index),
          paperId: paper.id,
          paperTitle: paper.title,
          chunkIndex: chunk.index,
          text: chunk.content,
          vector,
        });
      }

      return { kind: "embedded", passages };
    } catch (err: unknown) {
      logger.warn(
        { paperId: paper.id, err: AppError.describe(err) },
        "Dropping paper: embedding failed",
      );
      return { kind: "dropped", paperId: paper.id };
    }
  }
}
