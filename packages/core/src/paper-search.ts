import type { Paper } from "@papertrail/types";
import { AppError, NotFoundError, toCollaboratorError } from "@papertrail/errors";
import type { RetryPolicy } from "@papertrail/errors";
import type { Logger } from "@papertrail/logger";
import type { IPaperRetriever } from "@papertrail/sources";

export interface PaperSearchOptions {
  maxResults: number;
  /** Also merge papers whose normalized titles match. */
  dedupeByTitle?: boolean;
}

export interface PaperSearchResult {
  papers: Paper[];
  /** Set when the search failed after retries; `papers` is then empty. */
  error: AppError | null;
}

export function normalizeTitle(title: string): string {
  return title
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, " ")
    .trim();
}

/** First occurrence wins, by external id and optionally by title. */
export function dedupePapers(papers: readonly Paper[], byTitle = false): Paper[] {
  const seenIds = new Set<string>();
  const seenTitles = new Set<string>();
  const unique: Paper[] = [];

  for (const paper of papers) {
    if (seenIds.has(paper.id)) continue;
    const title = normalizeTitle(paper.title);
    if (byTitle && title.length > 0 && seenTitles.has(title)) continue;

    seenIds.add(paper.id);
    seenTitles.add(title);
    unique.push(paper);
  }

  return unique;
}

/**
 * Retrieval stage. Never throws: a source that keeps failing degrades to an
 * empty result with the error attached.
 */
export class PaperSearch {
  private retriever: IPaperRetriever;
  private retry: RetryPolicy;
  private logger: Logger;
  private options: PaperSearchOptions;

  constructor(
    retriever: IPaperRetriever,
    retry: RetryPolicy,
    logger: Logger,
    options: PaperSearchOptions,
  ) {
    this.retriever = retriever;
    this.retry = retry;
    this.logger = logger;
    this.options = options;
  }

  async search(query: string): Promise<PaperSearchResult> {
    try {
      const papers = await this.retry.execute(
        () => this.retriever.search(query, this.options.maxResults),
        `${this.retriever.name}.search`,
      );
      return { papers: dedupePapers(papers, this.options.dedupeByTitle), error: null };
    } catch (err: unknown) {
      if (err instanceof NotFoundError) {
        this.logger.info({ source: this.retriever.name }, "No papers found");
        return { papers: [], error: null };
      }

      const error = toCollaboratorError(this.retriever.name, err);
      this.logger.warn({ source: this.retriever.name, err: error }, "Paper search failed");
      return { papers: [], error };
    }
  }
}
