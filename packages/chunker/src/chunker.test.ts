import { describe, it, expect } from "vitest";
import { RecursiveChunker } from "./recursive-chunker.js";
import { FixedChunker } from "./fixed-chunker.js";
import { createChunker } from "./factory.js";

const ABSTRACT = `Transformer models rely on self-attention to relate every token to every other token. This quadratic cost limits the length of the context they can process.

Recent work proposes sparse and linear attention variants, retrieval over external memory, and recurrence across segments. Each trades accuracy on long-range dependencies for lower memory use.

We compare these approaches on long-context reasoning benchmarks and find that retrieval-based methods degrade least as documents grow.`;

describe("RecursiveChunker", () => {
  const chunker = new RecursiveChunker();

  it("has strategy 'recursive'", () => {
    expect(chunker.strategy).toBe("recursive");
  });

  it("keeps short text in a single chunk", () => {
    const results = chunker.chunk("Short text", { chunkSize: 100, overlap: 10 });
    expect(results).toEqual([
      { content: "Short text", index: 0, metadata: { startChar: 0, endChar: 10 } },
    ]);
  });

  it("splits on sentence boundaries and keeps the punctuation", () => {
    const text = "Alpha beta gamma. Delta epsilon zeta. Eta theta iota.";
    const results = chunker.chunk(text, { chunkSize: 20, overlap: 0 });
    expect(results.map((r) => r.content)).toEqual([
      "Alpha beta gamma.",
      "Delta epsilon zeta.",
      "Eta theta iota.",
    ]);
    expect(results.map((r) => r.index)).toEqual([0, 1, 2]);
    expect(results[1]?.metadata).toEqual({ startChar: 18, endChar: 37 });
  });

  it("carries trailing pieces into the next chunk as overlap", () => {
    const text = "Alpha beta gamma. Delta epsilon zeta. Eta theta iota.";
    const results = chunker.chunk(text, { chunkSize: 40, overlap: 20 });
    expect(results.map((r) => r.content)).toEqual([
      "Alpha beta gamma. Delta epsilon zeta.",
      "Delta epsilon zeta. Eta theta iota.",
    ]);
  });

  it("cuts text without separators into overlapping windows", () => {
    const results = chunker.chunk("x".repeat(25), { chunkSize: 10, overlap: 2 });
    expect(results.map((r) => r.content.length)).toEqual([10, 10, 9]);
  });

  it("never exceeds chunkSize", () => {
    for (const chunkSize of [40, 80, 150]) {
      const results = chunker.chunk(ABSTRACT, { chunkSize, overlap: 15 });
      expect(results.length).toBeGreaterThan(1);
      for (const chunk of results) {
        expect(chunk.content.length).toBeLessThanOrEqual(chunkSize);
      }
    }
  });

  it("prefers paragraph boundaries when paragraphs fit", () => {
    const results = chunker.chunk(ABSTRACT, { chunkSize: 250, overlap: 0 });
    expect(results).toHaveLength(3);
    expect(results[2]?.content).toBe(
      "We compare these approaches on long-context reasoning benchmarks and find that retrieval-based methods degrade least as documents grow.",
    );
  });

  it("returns nothing for empty or blank content", () => {
    expect(chunker.chunk("", { chunkSize: 50, overlap: 0 })).toEqual([]);
    expect(chunker.chunk("   \n\n  ", { chunkSize: 50, overlap: 0 })).toEqual([]);
  });

  it("accepts custom separators", () => {
    const custom = new RecursiveChunker(["---"]);
    const results = custom.chunk("Part one---Part two---Part three", {
      chunkSize: 14,
      overlap: 0,
    });
    expect(results.map((r) => r.content)).toEqual(["Part one---", "Part two---", "Part three"]);
  });

  it("rejects overlap that is not smaller than chunkSize", () => {
    expect(() => chunker.chunk(ABSTRACT, { chunkSize: 10, overlap: 10 })).toThrow(RangeError);
  });
});

describe("FixedChunker", () => {
  const chunker = new FixedChunker();

  it("has strategy 'fixed'", () => {
    expect(chunker.strategy).toBe("fixed");
  });

  it("slides a window with the configured overlap", () => {
    const results = chunker.chunk("abcdefghij", { chunkSize: 4, overlap: 1 });
    expect(results.map((r) => r.content)).toEqual(["abcd", "defg", "ghij"]);
    expect(results.map((r) => r.metadata.startChar)).toEqual([0, 3, 6]);
  });

  it("handles text shorter than chunk size", () => {
    expect(chunker.chunk("Short", { chunkSize: 100, overlap: 0 })).toHaveLength(1);
  });

  it("reports offsets of the trimmed text", () => {
    const [first, second] = chunker.chunk("  ab  cd", { chunkSize: 4, overlap: 0 });
    expect(first).toEqual({ content: "ab", index: 0, metadata: { startChar: 2, endChar: 4 } });
    expect(second).toEqual({ content: "cd", index: 1, metadata: { startChar: 6, endChar: 8 } });
  });

  it("never exceeds chunkSize", () => {
    for (const chunk of chunker.chunk(ABSTRACT, { chunkSize: 64, overlap: 16 })) {
      expect(chunk.content.length).toBeLessThanOrEqual(64);
    }
  });
});

describe("createChunker factory", () => {
  it("creates RecursiveChunker for 'recursive'", () => {
    expect(createChunker("recursive").strategy).toBe("recursive");
  });

  it("creates FixedChunker for 'fixed'", () => {
    expect(createChunker("fixed").strategy).toBe("fixed");
  });

  it("throws for unknown strategy", () => {
    expect(() => createChunker("semantic" as "fixed")).toThrow("Unknown chunking strategy");
  });
});
