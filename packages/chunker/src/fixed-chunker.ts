import type { ChunkResult } from "@papertrail/types";
import { assertChunkOptions, type ChunkOptions, type IChunker } from "./chunker.interface.js";

/**
 * Fixed-size character windows stepping by `chunkSize - overlap`. Offsets in
 * the metadata point at the trimmed text, not the raw window.
 */
export class FixedChunker implements IChunker {
  readonly strategy = "fixed";

  chunk(content: string, options: ChunkOptions): ChunkResult[] {
    assertChunkOptions(options);
    const { chunkSize, overlap } = options;
    const step = chunkSize - overlap;
    const results: ChunkResult[] = [];

    for (let start = 0; start < content.length; start += step) {
      const window = content.slice(start, start + chunkSize);
      const text = window.trim();

      if (text.length > 0) {
        const startChar = start + window.length - window.trimStart().length;
        results.push({
          content: text,
          index: results.length,
          metadata: { startChar, endChar: startChar + text.length },
        });
      }

      if (start + chunkSize >= content.length) break;
    }

    return results;
  }
}
