import type { EmbeddingResult } from "@papertrail/types";

/**
 * Embedding collaborator. Returns one vector per input text, in input order,
 * all of length `dimensions`.
 */
export interface IEmbeddingProvider {
  readonly name: string;
  readonly dimensions: number;

  embedDocuments(texts: string[]): Promise<EmbeddingResult>;
  embedQuery(text: string): Promise<EmbeddingResult>;
  healthCheck(): Promise<boolean>;
}
