import { z } from "zod";
import type { EmbeddingResult } from "@papertrail/types";
import {
  CollaboratorPermanentError,
  collaboratorErrorFromStatus,
  parseRetryAfter,
  toCollaboratorError,
} from "@papertrail/errors";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";

const SERVICE = "tei";
const DEFAULT_DIMENSIONS = 384; // all-MiniLM-L6-v2
const DEFAULT_TIMEOUT_MS = 15_000;

export interface TeiProviderConfig {
  baseUrl: string;
  dimensions?: number;
  timeoutMs?: number;
}

const embedResponseSchema = z.array(z.array(z.number()));

/**
 * Self-hosted sentence-transformers model served by Hugging Face
 * text-embeddings-inference (`POST /embed`).
 * Cheaper than a hosted API for high ingest volume.
 */
export class TeiEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "tei";
  readonly dimensions: number;
  private baseUrl: string;
  private timeoutMs: number;

  constructor(config: TeiProviderConfig) {
    this.baseUrl = config.baseUrl.replace(/\/$/, "");
    this.dimensions = config.dimensions ?? DEFAULT_DIMENSIONS;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async embedDocuments(texts: string[]): Promise<EmbeddingResult> {
    return this.embed(texts);
  }

  async embedQuery(text: string): Promise<EmbeddingResult> {
    return this.embed([text]);
  }

  private async embed(texts: string[]): Promise<EmbeddingResult> {
    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/embed`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ inputs: texts, normalize: true, truncate: true }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error: unknown) {
      throw toCollaboratorError(SERVICE, error);
    }

    if (!response.ok) {
      throw collaboratorErrorFromStatus(
        SERVICE,
        response.status,
        `embedding failed: ${String(response.status)} ${response.statusText}`,
        parseRetryAfter(response.headers.get("retry-after")),
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error: unknown) {
      throw new CollaboratorPermanentError(`${SERVICE}: response is not JSON`, SERVICE, {
        cause: error,
      });
    }

    const parsed = embedResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new CollaboratorPermanentError("tei: malformed embedding response", SERVICE);
    }

    return {
      embeddings: parsed.data,
      model: "tei",
      tokensUsed: 0,
      dimensions: this.dimensions,
    };
  }

  async healthCheck(): Promise<boolean> {
    try {
      const response = await fetch(`${this.baseUrl}/health`, {
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      return response.ok;
    } catch {
      return false;
    }
  }
}
