export type { IInteractionStore, FeedbackUpdateResult } from "./interaction-store.interface.js";
export { InMemoryInteractionStore } from "./memory-store.js";
export { PostgresInteractionStore } from "./postgres-store.js";
export { MetricsLogger } from "./metrics-logger.js";
export { FeedbackRecorder } from "./feedback-recorder.js";
export type { FeedbackRecorderOptions } from "./feedback-recorder.js";
export { MetricsObserver } from "./metrics-observer.js";
