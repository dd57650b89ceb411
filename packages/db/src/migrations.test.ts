import { describe, it, expect } from "vitest";
import { getTableConfig } from "drizzle-orm/pg-core";
import { getInteractionsDdl } from "./migrations.js";
import { interactions } from "./schema/index.js";

describe("interactions schema", () => {
  it("declares every column the DDL creates", () => {
    const ddl = getInteractionsDdl();
    const { name, columns } = getTableConfig(interactions);

    expect(name).toBe("interactions");
    for (const column of columns) {
      expect(ddl).toContain(`\n      ${column.name} `);
    }
    expect(columns.map((c) => c.name)).toEqual([
      "id",
      "query",
      "refined_query",
      "paper_ids",
      "answer",
      "citations",
      "latencies",
      "counts",
      "outcome",
      "is_error",
      "error_code",
      "feedback",
      "feedback_at",
      "created_at",
    ]);
  });

  it("creates the table idempotently", () => {
    expect(getInteractionsDdl()).toContain("CREATE TABLE IF NOT EXISTS interactions");
  });
});
