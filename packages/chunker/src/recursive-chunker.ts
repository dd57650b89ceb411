import type { ChunkResult } from "@papertrail/types";
import { assertChunkOptions, type ChunkOptions, type IChunker } from "./chunker.interface.js";

const DEFAULT_SEPARATORS = ["\n\n", "\n", ". ", ", ", " "];

/**
 * Recursive splitting with a separator hierarchy.
 *
 * Text is split on the coarsest separator present; pieces that still exceed
 * `chunkSize` are split again with the next separator, and pieces with no
 * separator left are cut into windows. Adjacent pieces are then merged back
 * into chunks of at most `chunkSize` characters, each chunk starting with up
 * to `overlap` characters carried over from the previous one.
 */
export class RecursiveChunker implements IChunker {
  readonly strategy = "recursive";
  private separators: string[];

  constructor(separators?: string[]) {
    this.separators = (separators ?? DEFAULT_SEPARATORS).filter((s) => s.length > 0);
  }

  chunk(content: string, options: ChunkOptions): ChunkResult[] {
    assertChunkOptions(options);
    const chunks = this.splitRecursive(content, this.separators, options);
    const results: ChunkResult[] = [];

    let searchFrom = 0;
    for (const chunk of chunks) {
      const found = content.indexOf(chunk, searchFrom);
      const startChar = found >= 0 ? found : searchFrom;
      const endChar = startChar + chunk.length;

      results.push({
        content: chunk,
        index: results.length,
        metadata: { startChar, endChar },
      });

      if (found >= 0) searchFrom = startChar + 1;
    }

    return results;
  }

  private splitRecursive(text: string, separators: string[], options: ChunkOptions): string[] {
    const { chunkSize } = options;
    const sepIndex = separators.findIndex((s) => text.includes(s));

    if (sepIndex === -1) {
      return this.window(text, options);
    }

    const separator = separators[sepIndex] ?? "";
    const remaining = separators.slice(sepIndex + 1);
    const results: string[] = [];
    let pending: string[] = [];

    for (const piece of splitKeepingSeparator(text, separator)) {
      if (piece.length <= chunkSize) {
        pending.push(piece);
        continue;
      }
      if (pending.length > 0) {
        results.push(...this.merge(pending, options));
        pending = [];
      }
      results.push(...this.splitRecursive(piece, remaining, options));
    }

    if (pending.length > 0) {
      results.push(...this.merge(pending, options));
    }

    return results;
  }

  /** Greedily joins pieces (each ≤ chunkSize) into chunks with trailing overlap. */
  private merge(pieces: string[], { chunkSize, overlap }: ChunkOptions): string[] {
    const chunks: string[] = [];
    let current: string[] = [];
    let total = 0;

    for (const piece of pieces) {
      if (total + piece.length > chunkSize && current.length > 0) {
        pushTrimmed(chunks, current.join(""));

        while (total > overlap || (total > 0 && total + piece.length > chunkSize)) {
          const dropped = current.shift();
          if (dropped === undefined) break;
          total -= dropped.length;
        }
      }

      current.push(piece);
      total += piece.length;
    }

    pushTrimmed(chunks, current.join(""));
    return chunks;
  }

  private window(text: string, { chunkSize, overlap }: ChunkOptions): string[] {
    const results: string[] = [];
    const step = chunkSize - overlap;
    for (let start = 0; start < text.length; start += step) {
      pushTrimmed(results, text.slice(start, start + chunkSize));
      if (start + chunkSize >= text.length) break;
    }
    return results;
  }
}

function splitKeepingSeparator(text: string, separator: string): string[] {
  const parts = text.split(separator);
  return parts
    .map((part, i) => (i < parts.length - 1 ? part + separator : part))
    .filter((part) => part.length > 0);
}

function pushTrimmed(target: string[], chunk: string): void {
  const trimmed = chunk.trim();
  if (trimmed.length > 0) target.push(trimmed);
}
