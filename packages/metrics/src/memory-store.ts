import type { FeedbackRating, Interaction } from "@papertrail/types";
import type { FeedbackUpdateResult, IInteractionStore } from "./interaction-store.interface.js";

/** Process-local store for tests and single-process runs. */
export class InMemoryInteractionStore implements IInteractionStore {
  private rows = new Map<string, Interaction>();

  get size(): number {
    return this.rows.size;
  }

  async insert(interaction: Interaction): Promise<void> {
    if (this.rows.has(interaction.id)) {
      throw new Error(`Interaction ${interaction.id} already exists`);
    }
    this.rows.set(interaction.id, structuredClone(interaction));
  }

  async updateFeedback(
    id: string,
    rating: FeedbackRating,
    at: Date,
  ): Promise<FeedbackUpdateResult> {
    const row = this.rows.get(id);
    if (!row) return "not_found";
    if (row.feedback === rating) return "unchanged";

    this.rows.set(id, { ...row, feedback: rating, feedbackAt: at });
    return "recorded";
  }

  async findById(id: string): Promise<Interaction | null> {
    const row = this.rows.get(id);
    return row ? structuredClone(row) : null;
  }
}
