import type { Interaction } from "@papertrail/types";
import { AppError, LoggingFailure } from "@papertrail/errors";
import { redactText } from "@papertrail/logger";
import type { Logger } from "@papertrail/logger";
import type { IInteractionStore } from "./interaction-store.interface.js";

/**
 * Appends one row per completed request. A store failure never reaches the
 * caller: it is logged as a LoggingFailure and the interaction id is still
 * returned.
 */
export class MetricsLogger {
  private store: IInteractionStore;
  private logger: Logger;

  constructor(store: IInteractionStore, logger: Logger) {
    this.store = store;
    this.logger = logger;
  }

  async logInteraction(interaction: Interaction): Promise<string> {
    const row: Interaction = {
      ...interaction,
      query: redactText(interaction.query),
      refinedQuery: redactText(interaction.refinedQuery),
    };

    try {
      await this.store.insert(row);
      this.logger.debug(
        { interactionId: interaction.id, outcome: interaction.outcome },
        "Interaction logged",
      );
    } catch (err: unknown) {
      const failure = new LoggingFailure(`Failed to log interaction ${interaction.id}`, {
        details: { interactionId: interaction.id, cause: AppError.describe(err).message },
        cause: err,
      });
      this.logger.error({ err: failure }, "Interaction was not persisted");
    }

    return interaction.id;
  }
}
