import { Queue } from "bullmq";
import type { ConnectionOptions } from "bullmq";
import type { FeedbackJobData, ResearchJobData, ResearchResponse } from "@papertrail/types";

export const QUEUE_NAMES = {
  RESEARCH: "papertrail:research",
  FEEDBACK: "papertrail:feedback",
} as const;

export type QueueName = (typeof QUEUE_NAMES)[keyof typeof QUEUE_NAMES];

export interface QueueConfig {
  connection: ConnectionOptions;
}

/** Host/port/password from a `redis://` URL. */
export function parseRedisConnection(url: string): ConnectionOptions {
  const parsed = new URL(url);
  return {
    host: parsed.hostname,
    port: Number(parsed.port) || 6379,
    password: parsed.password || undefined,
  };
}

export function createQueues(config: QueueConfig) {
  const defaultOpts = {
    connection: config.connection,
    defaultJobOptions: {
      attempts: 3,
      backoff: {
        type: "exponential" as const,
        delay: 1000,
      },
      removeOnComplete: { count: 1000 },
      removeOnFail: { count: 5000 },
    },
  };

  // The pipeline retries its own collaborators; a second round here would
  // repeat a whole search + generation for one question.
  const researchQueue = new Queue<ResearchJobData, ResearchResponse>(QUEUE_NAMES.RESEARCH, {
    ...defaultOpts,
    defaultJobOptions: {
      ...defaultOpts.defaultJobOptions,
      attempts: 1,
    },
  });

  const feedbackQueue = new Queue<FeedbackJobData>(QUEUE_NAMES.FEEDBACK, {
    ...defaultOpts,
    defaultJobOptions: {
      ...defaultOpts.defaultJobOptions,
      attempts: 5,
    },
  });

  return { researchQueue, feedbackQueue };
}

export type Queues = ReturnType<typeof createQueues>;
