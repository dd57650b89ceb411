import type { ChunkStrategy } from "@papertrail/types";
import type { IChunker } from "./chunker.interface.js";
import { RecursiveChunker } from "./recursive-chunker.js";
import { FixedChunker } from "./fixed-chunker.js";

const CHUNKERS: Record<ChunkStrategy, () => IChunker> = {
  recursive: () => new RecursiveChunker(),
  fixed: () => new FixedChunker(),
};

export function createChunker(strategy: ChunkStrategy): IChunker {
  if (!Object.hasOwn(CHUNKERS, strategy)) {
    throw new Error(`Unknown chunking strategy: ${String(strategy)}`);
  }
  return CHUNKERS[strategy]();
}
