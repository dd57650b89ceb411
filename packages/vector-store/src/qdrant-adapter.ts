import { createHash } from "node:crypto";
import { QdrantClient } from "@qdrant/js-client-rest";
import { z } from "zod";
import type { DistanceMetric, Passage, RetrievalResult, ScoredPassage } from "@papertrail/types";
import { toCollaboratorError } from "@papertrail/errors";
import type { IVectorStore, VectorQueryFilter } from "./vector-store.interface.js";
import { toScore } from "./similarity.js";

const BATCH_SIZE = 100;
const SERVICE = "qdrant";

const payloadSchema = z.object({
  passageId: z.string(),
  paperId: z.string(),
  paperTitle: z.string(),
  chunkIndex: z.number().int().nonnegative(),
  text: z.string(),
});

const vectorSchema = z.array(z.number());

export interface QdrantVectorStoreOptions {
  url: string;
  apiKey?: string;
  collection: string;
  metric?: DistanceMetric;
  dimensions: number;
}

/** Qdrant point ids must be UUIDs or integers; derive a stable UUID from the passage id. */
export function pointId(passageId: string): string {
  const hex = createHash("sha1").update(passageId).digest("hex");
  return [
    hex.slice(0, 8),
    hex.slice(8, 12),
    hex.slice(12, 16),
    hex.slice(16, 20),
    hex.slice(20, 32),
  ].join("-");
}

export class QdrantVectorStore implements IVectorStore {
  readonly metric: DistanceMetric;
  private client: QdrantClient;
  private collection: string;
  private dimensions: number;
  private ready: Promise<void> | null = null;

  constructor(options: QdrantVectorStoreOptions) {
    this.client = new QdrantClient({ url: options.url, apiKey: options.apiKey });
    this.collection = options.collection;
    this.metric = options.metric ?? "cosine";
    this.dimensions = options.dimensions;
  }

  async upsert(passages: Passage[]): Promise<void> {
    await this.ensureCollection();

    for (let i = 0; i < passages.length; i += BATCH_SIZE) {
      const batch = passages.slice(i, i + BATCH_SIZE);

      try {
        await this.client.upsert(this.collection, {
          wait: true,
          points: batch.map((p) => ({
            id: pointId(p.id),
            vector: p.vector,
            payload: {
              passageId: p.id,
              paperId: p.paperId,
              paperTitle: p.paperTitle,
              chunkIndex: p.chunkIndex,
              text: p.text,
            },
          })),
        });
      } catch (err) {
        throw toCollaboratorError(SERVICE, err);
      }
    }
  }

  async query(vector: number[], k: number, filter?: VectorQueryFilter): Promise<RetrievalResult> {
    if (!Number.isInteger(k) || k < 0) {
      throw new RangeError(`k must be a non-negative integer, got ${String(k)}`);
    }
    if (k === 0) return [];
    await this.ensureCollection();

    const paperIds = filter?.paperIds;
    if (paperIds && paperIds.length === 0) return [];

    try {
      const results = await this.client.search(this.collection, {
        vector,
        limit: k,
        filter: paperIds ? { must: [{ key: "paperId", match: { any: paperIds } }] } : undefined,
        with_payload: true,
        with_vector: true,
      });

      const scored: ScoredPassage[] = [];
      for (const r of results) {
        const payload = payloadSchema.safeParse(r.payload);
        const stored = vectorSchema.safeParse(r.vector);
        if (!payload.success || !stored.success) continue;

        scored.push({
          passage: {
            id: payload.data.passageId,
            paperId: payload.data.paperId,
            paperTitle: payload.data.paperTitle,
            chunkIndex: payload.data.chunkIndex,
            text: payload.data.text,
            vector: stored.data,
          },
          // Qdrant reports cosine similarity, or raw distance for Euclid
          score: toScore(this.metric, r.score),
        });
      }
      return scored;
    } catch (err) {
      throw toCollaboratorError(SERVICE, err);
    }
  }

  async hasPaper(paperId: string): Promise<boolean> {
    await this.ensureCollection();
    try {
      const { count } = await this.client.count(this.collection, {
        filter: { must: [{ key: "paperId", match: { value: paperId } }] },
        exact: true,
      });
      return count > 0;
    } catch (err) {
      throw toCollaboratorError(SERVICE, err);
    }
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.client.getCollections();
      return true;
    } catch {
      return false;
    }
  }

  private ensureCollection(): Promise<void> {
    this.ready ??= this.createCollectionIfMissing().catch((err: unknown) => {
      this.ready = null;
      throw toCollaboratorError(SERVICE, err);
    });
    return this.ready;
  }

  private async createCollectionIfMissing(): Promise<void> {
    const collections = await this.client.getCollections();
    const exists = collections.collections.some((c) => c.name === this.collection);
    if (exists) return;

    await this.client.createCollection(this.collection, {
      vectors: {
        size: this.dimensions,
        distance: this.metric === "cosine" ? "Cosine" : "Euclid",
      },
    });
    await this.client.createPayloadIndex(this.collection, {
      field_name: "paperId",
      field_schema: "keyword",
    });
  }
}
