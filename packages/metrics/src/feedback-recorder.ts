import { z } from "zod";
import { FEEDBACK_RATINGS } from "@papertrail/types";
import type { FeedbackOutcome } from "@papertrail/types";
import { AppError, InputError, LoggingFailure } from "@papertrail/errors";
import type { Logger } from "@papertrail/logger";
import type { IInteractionStore } from "./interaction-store.interface.js";

const feedbackSchema = z.object({
  interactionId: z.string().trim().min(1, "interactionId is required"),
  rating: z.enum(FEEDBACK_RATINGS, {
    errorMap: () => ({ message: `rating must be one of: ${FEEDBACK_RATINGS.join(", ")}` }),
  }),
});

export interface FeedbackRecorderOptions {
  now?: () => Date;
}

/**
 * Attaches a rating to a logged interaction. Re-sending the same rating is a
 * no-op; a different rating overwrites the previous one.
 */
export class FeedbackRecorder {
  private store: IInteractionStore;
  private logger: Logger;
  private now: () => Date;

  constructor(store: IInteractionStore, logger: Logger, options?: FeedbackRecorderOptions) {
    this.store = store;
    this.logger = logger;
    this.now = options?.now ?? (() => new Date());
  }

  /** @throws InputError when the id is blank or the rating is not recognised. */
  async record(interactionId: string, rating: string): Promise<FeedbackOutcome> {
    const parsed = feedbackSchema.safeParse({ interactionId, rating });
    if (!parsed.success) {
      throw new InputError(parsed.error.issues.map((i) => i.message).join("; "), {
        details: { interactionId, rating },
      });
    }

    const { interactionId: id, rating: value } = parsed.data;

    try {
      const result = await this.store.updateFeedback(id, value, this.now());
      if (result === "not_found") {
        this.logger.warn({ interactionId: id }, "Feedback for unknown interaction");
      } else {
        this.logger.info({ interactionId: id, rating: value, result }, "Feedback processed");
      }
      return result;
    } catch (err: unknown) {
      const failure = new LoggingFailure(`Failed to record feedback for ${id}`, {
        details: { interactionId: id, cause: AppError.describe(err).message },
        cause: err,
      });
      this.logger.error({ err: failure }, "Feedback was not persisted");
      return "failed";
    }
  }
}
