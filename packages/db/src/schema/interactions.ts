import { pgTable, text, timestamp, boolean, jsonb, index } from "drizzle-orm/pg-core";
import type {
  Citation,
  FeedbackRating,
  InteractionCounts,
  OutcomeStatus,
  StageLatencies,
} from "@papertrail/types";

export const interactions = pgTable(
  "interactions",
  {
    id: text("id").primaryKey(),
    query: text("query").notNull(),
    refinedQuery: text("refined_query").notNull(),
    paperIds: jsonb("paper_ids").$type<string[]>().notNull().default([]),
    answer: text("answer").notNull().default(""),
    citations: jsonb("citations").$type<Citation[]>().notNull().default([]),
    latencies: jsonb("latencies").$type<StageLatencies>().notNull(),
    counts: jsonb("counts").$type<InteractionCounts>().notNull(),
    outcome: text("outcome").$type<OutcomeStatus>().notNull(),
    isError: boolean("is_error").notNull().default(false),
    errorCode: text("error_code"),
    feedback: text("feedback").$type<FeedbackRating>(),
    feedbackAt: timestamp("feedback_at", { withTimezone: true }),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    createdAtIdx: index("interactions_created_at_idx").on(table.createdAt),
  }),
);

export type InteractionRow = typeof interactions.$inferSelect;
export type NewInteractionRow = typeof interactions.$inferInsert;
