import type { Citation } from "./citation.js";
import type { Interaction, OutcomeStatus, StageLatencies } from "./interaction.js";
import type { PaperSource } from "./paper.js";

export type RefinementStep =
  | "normalize"
  | "normalize-domain-terms"
  | "trim-stopwords"
  | "dedupe"
  | "boost-domain-terms"
  | "cap-keywords";

export type RefinedQuery =
  | { kind: "refined"; text: string; keywords: string[]; steps: RefinementStep[] }
  | { kind: "empty" };

export type PipelineStage = "search" | "embed" | "retrieve" | "generate";

export interface PipelineErrorInfo {
  code: string;
  message: string;
}

export type PipelineEvent =
  | { type: "start"; interactionId: string; query: string; refinedQuery: string; at: Date }
  | {
      type: "retrieval-done";
      interactionId: string;
      paperIds: string[];
      passagesRetrieved: number;
      latencies: Pick<StageLatencies, "searchMs" | "embedMs" | "retrieveMs">;
    }
  | {
      type: "generation-done";
      interactionId: string;
      citations: number;
      generateMs: number;
    }
  | { type: "error"; interactionId: string; stage: PipelineStage; error: PipelineErrorInfo }
  | { type: "complete"; interaction: Interaction };

/**
 * Receives stage-boundary events from the research pipeline. Implementations
 * must not rely on being able to fail the request: errors thrown here are
 * logged and discarded.
 */
export interface PipelineObserver {
  notify(event: PipelineEvent): void | Promise<void>;
}

/** What the presentation layer receives for one question. */
export interface ResearchResponse {
  status: OutcomeStatus;
  interactionId: string | null;
  answer: string;
  citations: Citation[];
  sources: PaperSource[];
  message: string;
}
