import { Queue } from "bullmq";
import type { ConnectionOptions } from "bullmq";
import type { AnyJobData } from "@papertrail/types";

export const DLQ_NAME = "papertrail:dead-letter";

export type DeadLetterJobData = AnyJobData & {
  originalQueue: string;
  originalJobId: string | null;
  failureReason: string;
  attemptsMade: number;
};

export function createDeadLetterQueue(connection: ConnectionOptions) {
  return new Queue<DeadLetterJobData>(DLQ_NAME, {
    connection,
    defaultJobOptions: {
      removeOnComplete: false,
      removeOnFail: false,
    },
  });
}

export type DeadLetterQueue = ReturnType<typeof createDeadLetterQueue>;

/** The part of a BullMQ queue the forwarder writes to. */
export interface DeadLetterSink {
  add(name: string, data: DeadLetterJobData): Promise<unknown>;
}

/** The fields of a failed BullMQ job the forwarder reads. */
export interface FailedJob {
  id?: string;
  name: string;
  data: AnyJobData;
  attemptsMade: number;
  opts: { attempts?: number };
}

export function isFinalAttempt(job: FailedJob): boolean {
  return job.attemptsMade >= (job.opts.attempts ?? 1);
}

/**
 * Copies a job that has used up its attempts to the dead-letter queue.
 * Returns false when BullMQ will still retry the job.
 */
export async function forwardToDeadLetter(
  sink: DeadLetterSink,
  originalQueue: string,
  job: FailedJob,
  error: Error,
): Promise<boolean> {
  if (!isFinalAttempt(job)) {
    return false;
  }

  await sink.add(job.name, {
    ...job.data,
    originalQueue,
    originalJobId: job.id ?? null,
    failureReason: error.message,
    attemptsMade: job.attemptsMade,
  });
  return true;
}
