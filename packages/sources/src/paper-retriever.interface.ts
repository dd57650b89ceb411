import type { Paper } from "@papertrail/types";

/**
 * Retrieval collaborator. Returns papers in the source's relevance order;
 * an empty list means the source found nothing.
 */
export interface IPaperRetriever {
  readonly name: string;

  search(query: string, limit: number): Promise<Paper[]>;
}
