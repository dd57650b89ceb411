import { z } from "zod";
import type { Paper } from "@papertrail/types";
import {
  CollaboratorPermanentError,
  collaboratorErrorFromStatus,
  parseRetryAfter,
  toCollaboratorError,
} from "@papertrail/errors";
import type { IPaperRetriever } from "./paper-retriever.interface.js";

const SERVICE = "semantic-scholar";
const DEFAULT_API_URL = "https://api.semanticscholar.org/graph/v1";
const DEFAULT_TIMEOUT_MS = 10_000;
const FIELDS = "paperId,title,abstract,url,year,venue,authors";

export interface SemanticScholarConfig {
  apiUrl?: string;
  apiKey?: string;
  timeoutMs?: number;
}

const paperSchema = z.object({
  paperId: z.string().nullable(),
  title: z.string().nullable().optional(),
  abstract: z.string().nullable().optional(),
  url: z.string().nullable().optional(),
  year: z.number().int().nullable().optional(),
  venue: z.string().nullable().optional(),
  authors: z
    .array(z.object({ authorId: z.string().nullable().optional(), name: z.string() }))
    .optional(),
});

// `data` is absent when the search matches nothing
const searchResponseSchema = z.object({
  total: z.number().optional(),
  data: z.array(paperSchema).optional().default([]),
});

type RawPaper = z.infer<typeof paperSchema>;

function toPaper(raw: RawPaper): Paper | null {
  const title = raw.title?.trim();
  if (!raw.paperId || !title) return null;

  const paper: Paper = {
    id: raw.paperId,
    title,
    abstract: raw.abstract?.trim() ? raw.abstract : null,
    url: raw.url ?? null,
  };
  if (raw.year != null) paper.year = raw.year;
  if (raw.venue) paper.venue = raw.venue;
  if (raw.authors && raw.authors.length > 0) {
    paper.authors = raw.authors.map((a) =>
      a.authorId ? { name: a.name, id: a.authorId } : { name: a.name },
    );
  }
  return paper;
}

/** Semantic Scholar Graph API paper search. */
export class SemanticScholarRetriever implements IPaperRetriever {
  readonly name = SERVICE;
  private apiUrl: string;
  private apiKey?: string;
  private timeoutMs: number;

  constructor(config: SemanticScholarConfig = {}) {
    this.apiUrl = (config.apiUrl ?? DEFAULT_API_URL).replace(/\/$/, "");
    this.apiKey = config.apiKey;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async search(query: string, limit: number): Promise<Paper[]> {
    const params = new URLSearchParams({
      query,
      limit: String(limit),
      fields: FIELDS,
    });
    const headers: Record<string, string> = { Accept: "application/json" };
    if (this.apiKey) headers["x-api-key"] = this.apiKey;

    let response: Response;
    try {
      response = await fetch(`${this.apiUrl}/paper/search?${params.toString()}`, {
        headers,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error: unknown) {
      throw toCollaboratorError(SERVICE, error);
    }

    if (!response.ok) {
      throw collaboratorErrorFromStatus(
        SERVICE,
        response.status,
        `search failed: ${String(response.status)} ${response.statusText}`,
        parseRetryAfter(response.headers.get("retry-after")),
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error: unknown) {
      throw new CollaboratorPermanentError(`${SERVICE}: response is not JSON`, SERVICE, {
        cause: error,
      });
    }

    const parsed = searchResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new CollaboratorPermanentError(`${SERVICE}: malformed search response`, SERVICE, {
        details: { issues: parsed.error.issues.length },
      });
    }

    const papers: Paper[] = [];
    for (const raw of parsed.data.data) {
      const paper = toPaper(raw);
      if (paper) papers.push(paper);
    }
    return papers.slice(0, limit);
  }
}
