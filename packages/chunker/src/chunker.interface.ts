import type { ChunkResult, ChunkingConfig } from "@papertrail/types";

export type ChunkOptions = Pick<ChunkingConfig, "chunkSize" | "overlap">;

/**
 * Splits text into ordered chunks of at most `chunkSize` characters.
 */
export interface IChunker {
  readonly strategy: string;
  chunk(content: string, options: ChunkOptions): ChunkResult[];
}

export function assertChunkOptions({ chunkSize, overlap }: ChunkOptions): void {
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new RangeError(`chunkSize must be a positive integer, got ${String(chunkSize)}`);
  }
  if (!Number.isInteger(overlap) || overlap < 0 || overlap >= chunkSize) {
    throw new RangeError(
      `overlap must be a non-negative integer smaller than chunkSize, got ${String(overlap)}`,
    );
  }
}
