import { describe, it, expect } from "vitest";
import { parseEnv } from "@papertrail/config";
import { createLogger } from "@papertrail/logger";
import { InMemoryInteractionStore } from "@papertrail/metrics";
import { ResearchPipeline } from "@papertrail/core";
import { createContainer } from "./container.js";

const config = parseEnv({
  NODE_ENV: "test",
  DATABASE_URL: "postgresql://localhost:5432/test",
  COHERE_API_KEY: "test-cohere-key",
  OPENAI_API_KEY: "test-openai-key",
});

describe("createContainer", () => {
  it("wires the pipeline and feedback recorder to the given store", async () => {
    const store = new InMemoryInteractionStore();
    const container = createContainer(config, createLogger({ level: "silent" }), {
      interactionStore: store,
    });

    expect(container.pipeline).toBeInstanceOf(ResearchPipeline);
    expect(await container.feedbackRecorder.record("missing", "positive")).toBe("not_found");

    await container.close();
  });

  it("answers a blank question without calling any collaborator", async () => {
    const store = new InMemoryInteractionStore();
    const container = createContainer(config, createLogger({ level: "silent" }), {
      interactionStore: store,
    });

    const response = await container.pipeline.run("   ");

    expect(response.status).toBe("no_query");
    expect(response.interactionId).toBeNull();
    expect(store.size).toBe(0);
    await container.close();
  });
});
