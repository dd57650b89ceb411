import { Worker } from "bullmq";
import type { ConnectionOptions } from "bullmq";
import {
  QUEUE_NAMES,
  createDeadLetterQueue,
  forwardToDeadLetter,
  parseRedisConnection,
} from "@papertrail/queue";
import type { DeadLetterQueue } from "@papertrail/queue";
import type {
  FeedbackJobData,
  FeedbackOutcome,
  ResearchJobData,
  ResearchResponse,
} from "@papertrail/types";
import { parseEnv } from "@papertrail/config";
import { createLogger } from "@papertrail/logger";
import type { Logger } from "@papertrail/logger";
import { createContainer } from "./container.js";
import type { Container } from "./container.js";
import { processResearch } from "./processors/research.js";
import { processFeedback } from "./processors/feedback.js";

function createWorkers(
  connection: ConnectionOptions,
  container: Container,
  logger: Logger,
): Worker[] {
  const researchWorker = new Worker<ResearchJobData, ResearchResponse>(
    QUEUE_NAMES.RESEARCH,
    async (job) => processResearch(job.data, { pipeline: container.pipeline, logger }),
    { connection, concurrency: 4 },
  );

  const feedbackWorker = new Worker<FeedbackJobData, FeedbackOutcome>(
    QUEUE_NAMES.FEEDBACK,
    async (job) => processFeedback(job.data, { recorder: container.feedbackRecorder }),
    { connection, concurrency: 8 },
  );

  return [researchWorker, feedbackWorker];
}

function watchFailures(worker: Worker, deadLetter: DeadLetterQueue, logger: Logger): void {
  worker.on("failed", (job, error) => {
    if (!job) return;
    logger.warn(
      { queue: worker.name, jobId: job.id, attemptsMade: job.attemptsMade, err: error },
      "Job failed",
    );
    forwardToDeadLetter(deadLetter, worker.name, job, error)
      .then((forwarded) => {
        if (forwarded) {
          logger.error({ queue: worker.name, jobId: job.id }, "Job moved to dead-letter queue");
        }
      })
      .catch((dlqError: unknown) => {
        logger.error({ err: dlqError, jobId: job.id }, "Failed to write dead-letter job");
      });
  });

  worker.on("error", (error) => {
    logger.error({ err: error, queue: worker.name }, "Worker error");
  });
}

async function main(): Promise<void> {
  const config = parseEnv();
  const logger = createLogger({
    level: config.logLevel,
    service: "papertrail-worker",
    pretty: config.nodeEnv === "development",
  });
  const container = createContainer(config, logger);

  const connection = parseRedisConnection(config.redis.url);
  const deadLetter = createDeadLetterQueue(connection);
  const workers = createWorkers(connection, container, logger);
  for (const worker of workers) {
    watchFailures(worker, deadLetter, logger);
  }

  logger.info(
    { workers: workers.length, queues: Object.values(QUEUE_NAMES) },
    "Worker started",
  );

  const shutdown = async (): Promise<void> => {
    logger.info("Shutting down");
    await Promise.all(workers.map((w) => w.close()));
    await deadLetter.close();
    await container.close();
    logger.info("All workers closed");
    process.exit(0);
  };

  const onSignal = (): void => {
    shutdown().catch((err: unknown) => {
      logger.error({ err }, "Shutdown failed");
      process.exit(1);
    });
  };

  process.on("SIGTERM", onSignal);
  process.on("SIGINT", onSignal);
}

main().catch((err: unknown) => {
  createLogger({ service: "papertrail-worker" }).fatal({ err }, "Worker failed to start");
  process.exit(1);
});
