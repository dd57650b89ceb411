import { UnrecoverableError } from "bullmq";
import { z } from "zod";
import type { ResearchResponse } from "@papertrail/types";
import type { ResearchPipeline } from "@papertrail/core";
import type { Logger } from "@papertrail/logger";

const researchJobSchema = z.object({
  type: z.literal("research"),
  query: z.string(),
});

export interface ResearchProcessorDependencies {
  pipeline: Pick<ResearchPipeline, "run">;
  logger: Logger;
}

/**
 * Answers one queued question. The response is the job's return value; a
 * blank query is a normal `no_query` outcome, not a failure.
 */
export async function processResearch(
  data: unknown,
  deps: ResearchProcessorDependencies,
): Promise<ResearchResponse> {
  const parsed = researchJobSchema.safeParse(data);
  if (!parsed.success) {
    throw new UnrecoverableError(
      `Invalid research job: ${parsed.error.issues.map((i) => i.message).join("; ")}`,
    );
  }

  const response = await deps.pipeline.run(parsed.data.query);
  deps.logger.info(
    { interactionId: response.interactionId, status: response.status },
    "Research job processed",
  );
  return response;
}
