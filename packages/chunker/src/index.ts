export type { IChunker, ChunkOptions } from "./chunker.interface.js";
export { assertChunkOptions } from "./chunker.interface.js";
export { RecursiveChunker } from "./recursive-chunker.js";
export { FixedChunker } from "./fixed-chunker.js";
export { createChunker } from "./factory.js";
