export interface PaperAuthor {
  name: string;
  id?: string;
}

/**
 * A paper as returned by the retrieval collaborator. Immutable once fetched;
 * `id` is the source's external identifier and the deduplication key.
 */
export interface Paper {
  id: string;
  title: string;
  abstract: string | null;
  url: string | null;
  year?: number;
  venue?: string;
  authors?: PaperAuthor[];
}

/** The subset of a paper returned to callers alongside an answer. */
export interface PaperSource {
  id: string;
  title: string;
  url: string | null;
  year?: number;
}
