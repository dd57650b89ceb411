import type { FeedbackRating } from "./interaction.js";

export type JobType = "research" | "feedback";

export interface JobData {
  type: JobType;
}

export interface ResearchJobData extends JobData {
  type: "research";
  query: string;
}

export interface FeedbackJobData extends JobData {
  type: "feedback";
  interactionId: string;
  rating: FeedbackRating;
}

export type AnyJobData = ResearchJobData | FeedbackJobData;
