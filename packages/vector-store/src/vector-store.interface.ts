import type { DistanceMetric, Passage, RetrievalResult } from "@papertrail/types";

export interface VectorQueryFilter {
  /** Restrict matches to passages of these papers. */
  paperIds?: string[];
}

/**
 * Passage index. Upserts are idempotent per passage identity
 * (`paperId:chunkIndex`); a caller always sees its own completed writes.
 */
export interface IVectorStore {
  readonly metric: DistanceMetric;

  upsert(passages: Passage[]): Promise<void>;
  query(vector: number[], k: number, filter?: VectorQueryFilter): Promise<RetrievalResult>;
  hasPaper(paperId: string): Promise<boolean>;
  healthCheck(): Promise<boolean>;
}
