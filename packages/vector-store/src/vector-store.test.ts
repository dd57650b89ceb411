import { describe, it, expect } from "vitest";
import type { Passage } from "@papertrail/types";
import {
  createVectorStore,
  DimensionMismatchError,
  InMemoryVectorStore,
  QdrantVectorStore,
  pointId,
  similarityScore,
} from "./index.js";

function passage(paperId: string, chunkIndex: number, vector: number[]): Passage {
  return {
    id: `${paperId}:${String(chunkIndex)}`,
    paperId,
    paperTitle: `Title of ${paperId}`,
    chunkIndex,
    text: `text ${paperId} ${String(chunkIndex)}`,
    vector,
  };
}

describe("Vector Store", () => {
  describe("createVectorStore factory", () => {
    it("creates InMemoryVectorStore for type 'memory'", () => {
      const store = createVectorStore({ type: "memory", metric: "l2" });
      expect(store).toBeInstanceOf(InMemoryVectorStore);
      expect(store.metric).toBe("l2");
    });

    it("creates QdrantVectorStore for type 'qdrant'", () => {
      const store = createVectorStore({
        type: "qdrant",
        metric: "cosine",
        dimensions: 4,
        qdrant: { url: "http://localhost:6333", collection: "passages" },
      });
      expect(store).toBeInstanceOf(QdrantVectorStore);
    });

    it("throws for missing qdrant settings", () => {
      expect(() => createVectorStore({ type: "qdrant", metric: "cosine", dimensions: 4 })).toThrow(
        "qdrant settings are required",
      );
    });

    it("throws for unknown type", () => {
      expect(() => createVectorStore({ type: "unknown" as "memory", metric: "cosine" })).toThrow(
        "Unknown vector store type",
      );
    });
  });

  describe("similarityScore", () => {
    it("maps cosine similarity into [0, 1]", () => {
      expect(similarityScore("cosine", [1, 0], [1, 0])).toBe(1);
      expect(similarityScore("cosine", [1, 0], [0, 1])).toBe(0.5);
      expect(similarityScore("cosine", [1, 0], [-1, 0])).toBe(0);
    });

    it("maps l2 distance to 1 / (1 + d)", () => {
      expect(similarityScore("l2", [0, 0], [3, 4])).toBeCloseTo(1 / 6);
      expect(similarityScore("l2", [2, 2], [2, 2])).toBe(1);
    });

    it("scores zero vectors as orthogonal under cosine", () => {
      expect(similarityScore("cosine", [0, 0], [1, 0])).toBe(0.5);
    });
  });

  describe("InMemoryVectorStore", () => {
    it("returns the k nearest passages by descending score", async () => {
      const store = new InMemoryVectorStore();
      await store.upsert([passage("a", 0, [1, 0]), passage("b", 0, [0, 1]), passage("c", 0, [1, 1])]);

      const results = await store.query([1, 0], 2);

      expect(results.map((r) => r.passage.id)).toEqual(["a:0", "c:0"]);
      expect(results[0]?.score).toBe(1);
      expect(results[1]?.score).toBeCloseTo((1 / Math.SQRT2 + 1) / 2);
    });

    it("breaks ties by insertion order", async () => {
      const store = new InMemoryVectorStore();
      await store.upsert([passage("x", 0, [0, 1]), passage("y", 0, [0, 1]), passage("z", 0, [0, 1])]);

      const results = await store.query([0, 1], 3);
      expect(results.map((r) => r.passage.id)).toEqual(["x:0", "y:0", "z:0"]);
    });

    it("overwrites a passage in place on re-upsert", async () => {
      const store = new InMemoryVectorStore();
      await store.upsert([passage("a", 0, [1, 0]), passage("b", 0, [1, 0])]);
      await store.upsert([{ ...passage("a", 0, [1, 0]), text: "replaced" }]);

      const results = await store.query([1, 0], 5);
      expect(store.size).toBe(2);
      expect(results.map((r) => r.passage.id)).toEqual(["a:0", "b:0"]);
      expect(results[0]?.passage.text).toBe("replaced");
    });

    it("restricts matches to the filtered papers", async () => {
      const store = new InMemoryVectorStore({ metric: "l2" });
      await store.upsert([passage("a", 0, [0, 0]), passage("b", 0, [1, 1]), passage("b", 1, [5, 5])]);

      const results = await store.query([0, 0], 10, { paperIds: ["b"] });
      expect(results.map((r) => r.passage.id)).toEqual(["b:0", "b:1"]);
    });

    it("returns fewer than k results when the store is small", async () => {
      const store = new InMemoryVectorStore();
      await store.upsert([passage("a", 0, [1, 0])]);

      expect(await store.query([1, 0], 10)).toHaveLength(1);
      expect(await store.query([1, 0], 0)).toEqual([]);
    });

    it("returns nothing from an empty store", async () => {
      const store = new InMemoryVectorStore();
      expect(await store.query([1, 0, 0], 3)).toEqual([]);
    });

    it("rejects a negative k", async () => {
      const store = new InMemoryVectorStore();
      await expect(store.query([1, 0], -1)).rejects.toThrow(RangeError);
    });

    it("fixes the dimension from the first upsert", async () => {
      const store = new InMemoryVectorStore();
      await store.upsert([passage("a", 0, [1, 0])]);

      await expect(store.upsert([passage("b", 0, [1, 0, 0])])).rejects.toBeInstanceOf(
        DimensionMismatchError,
      );
      await expect(store.query([1, 0, 0], 1)).rejects.toMatchObject({
        code: "DIMENSION_MISMATCH",
        details: { expected: 2, actual: 3 },
      });
    });

    it("writes nothing from a batch with a mismatched vector", async () => {
      const store = new InMemoryVectorStore({ dimensions: 2 });
      await expect(
        store.upsert([passage("a", 0, [1, 0]), passage("b", 0, [1])]),
      ).rejects.toBeInstanceOf(DimensionMismatchError);
      expect(store.size).toBe(0);
      expect(await store.hasPaper("a")).toBe(false);
    });

    it("reports which papers have indexed passages", async () => {
      const store = new InMemoryVectorStore();
      await store.upsert([passage("a", 0, [1, 0]), passage("a", 1, [0, 1])]);

      expect(await store.hasPaper("a")).toBe(true);
      expect(await store.hasPaper("b")).toBe(false);
    });
  });

  describe("pointId", () => {
    it("derives a stable UUID-shaped id from the passage id", () => {
      const id = pointId("paper-1:0");
      expect(id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/);
      expect(pointId("paper-1:0")).toBe(id);
      expect(pointId("paper-1:1")).not.toBe(id);
    });
  });
});
