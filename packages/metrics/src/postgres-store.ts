import { and, eq, isNull, ne, or } from "drizzle-orm";
import { ensureSchema, interactions } from "@papertrail/db";
import type { DbClient, InteractionRow } from "@papertrail/db";
import type { FeedbackRating, Interaction } from "@papertrail/types";
import type { FeedbackUpdateResult, IInteractionStore } from "./interaction-store.interface.js";

function toInteraction(row: InteractionRow): Interaction {
  return {
    id: row.id,
    query: row.query,
    refinedQuery: row.refinedQuery,
    paperIds: row.paperIds,
    answer: row.answer,
    citations: row.citations,
    latencies: row.latencies,
    counts: row.counts,
    outcome: row.outcome,
    isError: row.isError,
    errorCode: row.errorCode,
    feedback: row.feedback,
    feedbackAt: row.feedbackAt,
    createdAt: row.createdAt,
  };
}

/**
 * Interaction log in Postgres. The table is created on first use; a failed
 * attempt is retried on the next call.
 */
export class PostgresInteractionStore implements IInteractionStore {
  private db: DbClient;
  private ready: Promise<void> | null = null;

  constructor(db: DbClient) {
    this.db = db;
  }

  async insert(interaction: Interaction): Promise<void> {
    await this.ensureReady();
    await this.db.insert(interactions).values({
      id: interaction.id,
      query: interaction.query,
      refinedQuery: interaction.refinedQuery,
      paperIds: interaction.paperIds,
      answer: interaction.answer,
      citations: interaction.citations,
      latencies: interaction.latencies,
      counts: interaction.counts,
      outcome: interaction.outcome,
      isError: interaction.isError,
      errorCode: interaction.errorCode,
      feedback: interaction.feedback,
      feedbackAt: interaction.feedbackAt,
      createdAt: interaction.createdAt,
    });
  }

  async updateFeedback(
    id: string,
    rating: FeedbackRating,
    at: Date,
  ): Promise<FeedbackUpdateResult> {
    await this.ensureReady();

    // Single conditional UPDATE: a repeated rating matches no row
    const updated = await this.db
      .update(interactions)
      .set({ feedback: rating, feedbackAt: at })
      .where(
        and(
          eq(interactions.id, id),
          or(isNull(interactions.feedback), ne(interactions.feedback, rating)),
        ),
      )
      .returning({ id: interactions.id });

    if (updated.length > 0) return "recorded";

    const existing = await this.db
      .select({ id: interactions.id })
      .from(interactions)
      .where(eq(interactions.id, id))
      .limit(1);

    return existing.length > 0 ? "unchanged" : "not_found";
  }

  async findById(id: string): Promise<Interaction | null> {
    await this.ensureReady();
    const rows = await this.db.select().from(interactions).where(eq(interactions.id, id)).limit(1);
    const row = rows[0];
    return row ? toInteraction(row) : null;
  }

  private ensureReady(): Promise<void> {
    this.ready ??= ensureSchema(this.db).catch((err: unknown) => {
      this.ready = null;
      throw err;
    });
    return this.ready;
  }
}
