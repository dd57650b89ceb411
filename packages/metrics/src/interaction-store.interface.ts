import type { FeedbackRating, Interaction } from "@papertrail/types";

export type FeedbackUpdateResult = "recorded" | "unchanged" | "not_found";

/**
 * Durable log of interactions. Rows are append-only apart from the feedback
 * columns, which `updateFeedback` sets by primary key.
 */
export interface IInteractionStore {
  insert(interaction: Interaction): Promise<void>;
  /** Sets feedback only when it differs from the stored value. */
  updateFeedback(id: string, rating: FeedbackRating, at: Date): Promise<FeedbackUpdateResult>;
  findById(id: string): Promise<Interaction | null>;
}
