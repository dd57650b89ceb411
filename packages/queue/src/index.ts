export { QUEUE_NAMES, createQueues, parseRedisConnection } from "./queues.js";
export type { QueueName, QueueConfig, Queues } from "./queues.js";
export { DLQ_NAME, createDeadLetterQueue, forwardToDeadLetter, isFinalAttempt } from "./dlq.js";
export type { DeadLetterJobData, DeadLetterQueue, DeadLetterSink, FailedJob } from "./dlq.js";
