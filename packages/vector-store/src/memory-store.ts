import type { DistanceMetric, Passage, RetrievalResult, ScoredPassage } from "@papertrail/types";
import { AppError } from "@papertrail/errors";
import type { IVectorStore, VectorQueryFilter } from "./vector-store.interface.js";
import { similarityScore } from "./similarity.js";

export interface InMemoryVectorStoreOptions {
  metric?: DistanceMetric;
  /** Fixed vector dimension. When omitted, the first upsert sets it. */
  dimensions?: number;
}

export class DimensionMismatchError extends AppError {
  constructor(expected: number, actual: number) {
    super({
      message: `Vector dimension ${String(actual)} does not match store dimension ${String(
        expected,
      )}`,
      statusCode: 422,
      code: "DIMENSION_MISMATCH",
      details: { expected, actual },
    });
  }
}

/**
 * In-process passage index with exact nearest-neighbour search.
 *
 * Entries live in insertion order; overwriting a passage keeps its original
 * position, so equal scores always rank the first-seen passage first.
 */
export class InMemoryVectorStore implements IVectorStore {
  readonly metric: DistanceMetric;
  private dimensions: number | undefined;
  private passages = new Map<string, Passage>();
  private passageCountByPaper = new Map<string, number>();

  constructor(options?: InMemoryVectorStoreOptions) {
    this.metric = options?.metric ?? "cosine";
    this.dimensions = options?.dimensions;
  }

  get size(): number {
    return this.passages.size;
  }

  async upsert(passages: Passage[]): Promise<void> {
    // Validate the whole batch before writing any of it
    let dimensions = this.dimensions;
    for (const passage of passages) {
      dimensions ??= passage.vector.length;
      if (passage.vector.length !== dimensions) {
        throw new DimensionMismatchError(dimensions, passage.vector.length);
      }
    }
    this.dimensions = dimensions;

    for (const passage of passages) {
      if (!this.passages.has(passage.id)) {
        this.passageCountByPaper.set(
          passage.paperId,
          (this.passageCountByPaper.get(passage.paperId) ?? 0) + 1,
        );
      }
      this.passages.set(passage.id, passage);
    }
  }

  async query(vector: number[], k: number, filter?: VectorQueryFilter): Promise<RetrievalResult> {
    if (!Number.isInteger(k) || k < 0) {
      throw new RangeError(`k must be a non-negative integer, got ${String(k)}`);
    }
    if (this.dimensions !== undefined && vector.length !== this.dimensions) {
      throw new DimensionMismatchError(this.dimensions, vector.length);
    }
    if (k === 0) return [];

    const allowed = filter?.paperIds ? new Set(filter.paperIds) : undefined;
    const scored: ScoredPassage[] = [];

    for (const passage of this.passages.values()) {
      if (allowed && !allowed.has(passage.paperId)) continue;
      scored.push({ passage, score: similarityScore(this.metric, vector, passage.vector) });
    }

    // Array.prototype.sort is stable, so ties keep insertion order
    scored.sort((a, b) => b.score - a.score);
    return scored.slice(0, k);
  }

  async hasPaper(paperId: string): Promise<boolean> {
    return (this.passageCountByPaper.get(paperId) ?? 0) > 0;
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }
}
