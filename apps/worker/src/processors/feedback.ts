import { UnrecoverableError } from "bullmq";
import { z } from "zod";
import type { FeedbackOutcome } from "@papertrail/types";
import { InputError } from "@papertrail/errors";
import type { FeedbackRecorder } from "@papertrail/metrics";

const feedbackJobSchema = z.object({
  type: z.literal("feedback"),
  interactionId: z.string(),
  rating: z.string(),
});

export interface FeedbackProcessorDependencies {
  recorder: Pick<FeedbackRecorder, "record">;
}

/**
 * Applies one queued rating. A store failure is thrown so BullMQ retries the
 * job; a malformed rating never succeeds and is not retried.
 */
export async function processFeedback(
  data: unknown,
  deps: FeedbackProcessorDependencies,
): Promise<FeedbackOutcome> {
  const parsed = feedbackJobSchema.safeParse(data);
  if (!parsed.success) {
    throw new UnrecoverableError(
      `Invalid feedback job: ${parsed.error.issues.map((i) => i.message).join("; ")}`,
    );
  }

  const { interactionId, rating } = parsed.data;

  let outcome: FeedbackOutcome;
  try {
    outcome = await deps.recorder.record(interactionId, rating);
  } catch (err: unknown) {
    if (err instanceof InputError) {
      throw new UnrecoverableError(err.message);
    }
    throw err;
  }

  if (outcome === "failed") {
    throw new Error(`Feedback for interaction ${interactionId} was not persisted`);
  }
  return outcome;
}
