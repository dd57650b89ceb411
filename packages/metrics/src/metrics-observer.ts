import type { PipelineEvent, PipelineObserver } from "@papertrail/types";
import type { Logger } from "@papertrail/logger";
import type { MetricsLogger } from "./metrics-logger.js";

/** Logs stage events and persists the interaction when a request completes. */
export class MetricsObserver implements PipelineObserver {
  private metrics: MetricsLogger;
  private logger: Logger;

  constructor(metrics: MetricsLogger, logger: Logger) {
    this.metrics = metrics;
    this.logger = logger;
  }

  async notify(event: PipelineEvent): Promise<void> {
    switch (event.type) {
      case "start":
        this.logger.info(
          { interactionId: event.interactionId, refinedQuery: event.refinedQuery },
          "Research request started",
        );
        return;
      case "retrieval-done":
        this.logger.info(
          {
            interactionId: event.interactionId,
            papers: event.paperIds.length,
            passagesRetrieved: event.passagesRetrieved,
            ...event.latencies,
          },
          "Retrieval finished",
        );
        return;
      case "generation-done":
        this.logger.info(
          {
            interactionId: event.interactionId,
            citations: event.citations,
            generateMs: event.generateMs,
          },
          "Generation finished",
        );
        return;
      case "error":
        this.logger.warn(
          { interactionId: event.interactionId, stage: event.stage, error: event.error },
          "Pipeline stage failed",
        );
        return;
      case "complete":
        await this.metrics.logInteraction(event.interaction);
        this.logger.info(
          {
            interactionId: event.interaction.id,
            outcome: event.interaction.outcome,
            totalMs: event.interaction.latencies.totalMs,
          },
          "Research request completed",
        );
        return;
    }
  }
}
