import type { Citation } from "./citation.js";

export const FEEDBACK_RATINGS = ["positive", "negative"] as const;

export type FeedbackRating = (typeof FEEDBACK_RATINGS)[number];

export type OutcomeStatus =
  | "no_query"
  | "no_papers"
  | "no_passages"
  | "generation_unavailable"
  | "answered";

export interface StageLatencies {
  refineMs: number;
  searchMs: number;
  embedMs: number;
  retrieveMs: number;
  assembleMs: number;
  generateMs: number;
  totalMs: number;
}

export interface InteractionCounts {
  papersFound: number;
  papersIndexed: number;
  papersReused: number;
  papersDropped: number;
  passagesRetrieved: number;
  contextPassages: number;
  citations: number;
}

/**
 * One logged request. Written once when the request completes; only
 * `feedback` / `feedbackAt` change afterwards.
 */
export interface Interaction {
  id: string;
  query: string;
  refinedQuery: string;
  paperIds: string[];
  answer: string;
  citations: Citation[];
  latencies: StageLatencies;
  counts: InteractionCounts;
  outcome: OutcomeStatus;
  isError: boolean;
  errorCode: string | null;
  feedback: FeedbackRating | null;
  feedbackAt: Date | null;
  createdAt: Date;
}

export type FeedbackOutcome = "recorded" | "unchanged" | "not_found" | "failed";
