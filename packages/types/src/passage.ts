export type DistanceMetric = "cosine" | "l2";

export type ChunkStrategy = "recursive" | "fixed";

export interface ChunkingConfig {
  strategy: ChunkStrategy;
  /** Maximum characters per passage. */
  chunkSize: number;
  /** Characters shared between consecutive passages. Must be smaller than chunkSize. */
  overlap: number;
}

export interface ChunkResult {
  content: string;
  index: number;
  metadata: {
    startChar: number;
    endChar: number;
  };
}

export interface EmbeddingResult {
  embeddings: number[][];
  model: string;
  tokensUsed: number;
  dimensions: number;
}

/**
 * A bounded chunk of one paper's text plus its embedding.
 * Identity is `${paperId}:${chunkIndex}`.
 */
export interface Passage {
  id: string;
  paperId: string;
  paperTitle: string;
  chunkIndex: number;
  text: string;
  vector: number[];
}

export interface ScoredPassage {
  passage: Passage;
  score: number;
}

/** Descending by score; equal scores keep store insertion order. */
export type RetrievalResult = readonly ScoredPassage[];

export function passageId(paperId: string, chunkIndex: number): string {
  return `${paperId}:${String(chunkIndex)}`;
}
