import type { DistanceMetric, VectorStoreType } from "@papertrail/types";
import type { IVectorStore } from "./vector-store.interface.js";
import { InMemoryVectorStore } from "./memory-store.js";
import { QdrantVectorStore } from "./qdrant-adapter.js";

export type { IVectorStore, VectorQueryFilter } from "./vector-store.interface.js";
export { InMemoryVectorStore, DimensionMismatchError } from "./memory-store.js";
export type { InMemoryVectorStoreOptions } from "./memory-store.js";
export { QdrantVectorStore, pointId } from "./qdrant-adapter.js";
export type { QdrantVectorStoreOptions } from "./qdrant-adapter.js";
export { cosineSimilarity, euclideanDistance, similarityScore, toScore } from "./similarity.js";

export interface CreateVectorStoreOptions {
  type: VectorStoreType;
  metric: DistanceMetric;
  dimensions?: number;
  qdrant?: { url: string; apiKey?: string; collection: string };
}

export function createVectorStore(config: CreateVectorStoreOptions): IVectorStore {
  switch (config.type) {
    case "memory":
      return new InMemoryVectorStore({ metric: config.metric, dimensions: config.dimensions });
    case "qdrant":
      if (!config.qdrant) {
        throw new Error("qdrant settings are required for the Qdrant vector store");
      }
      if (config.dimensions === undefined) {
        throw new Error("dimensions are required for the Qdrant vector store");
      }
      return new QdrantVectorStore({
        ...config.qdrant,
        metric: config.metric,
        dimensions: config.dimensions,
      });
    default:
      throw new Error(`Unknown vector store type: ${String(config.type)}`);
  }
}
