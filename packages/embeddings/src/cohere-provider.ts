import { CohereClient, CohereError, CohereTimeoutError } from "cohere-ai";
import type { EmbeddingResult } from "@papertrail/types";
import {
  CollaboratorPermanentError,
  CollaboratorTransientError,
  collaboratorErrorFromStatus,
  toCollaboratorError,
  type AppError,
} from "@papertrail/errors";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";

const SERVICE = "cohere";
const DEFAULT_MODEL = "embed-english-v3.0";
const DEFAULT_DIMENSIONS = 1024;
const DEFAULT_TIMEOUT_MS = 15_000;
const BATCH_SIZE = 96; // Cohere limit

type CohereInputType = "search_document" | "search_query";

export interface CohereProviderConfig {
  apiKey: string;
  model?: string;
  dimensions?: number;
  timeoutMs?: number;
}

export class CohereEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "cohere";
  readonly dimensions: number;
  private client: CohereClient;
  private model: string;
  private timeoutMs: number;

  constructor(config: CohereProviderConfig) {
    this.client = new CohereClient({ token: config.apiKey });
    this.model = config.model ?? DEFAULT_MODEL;
    this.dimensions = config.dimensions ?? DEFAULT_DIMENSIONS;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async embedDocuments(texts: string[]): Promise<EmbeddingResult> {
    return this.embed(texts, "search_document");
  }

  async embedQuery(text: string): Promise<EmbeddingResult> {
    return this.embed([text], "search_query");
  }

  private async embed(texts: string[], inputType: CohereInputType): Promise<EmbeddingResult> {
    const allEmbeddings: number[][] = [];
    let totalTokens = 0;

    for (let i = 0; i < texts.length; i += BATCH_SIZE) {
      const batch = texts.slice(i, i + BATCH_SIZE);

      try {
        // Retries belong to the caller's RetryPolicy, not the SDK
        const response = await this.client.v2.embed(
          {
            texts: batch,
            model: this.model,
            inputType,
            embeddingTypes: ["float"],
          },
          { timeoutInSeconds: Math.ceil(this.timeoutMs / 1000), maxRetries: 0 },
        );

        if (!response.embeddings.float) {
          throw new CollaboratorPermanentError("cohere: response has no float embeddings", SERVICE);
        }
        allEmbeddings.push(...response.embeddings.float);

        if (response.meta?.billedUnits?.inputTokens) {
          totalTokens += response.meta.billedUnits.inputTokens;
        }
      } catch (error: unknown) {
        throw mapCohereError(error);
      }
    }

    return {
      embeddings: allEmbeddings,
      model: this.model,
      tokensUsed: totalTokens,
      dimensions: this.dimensions,
    };
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.embedQuery("health check");
      return true;
    } catch {
      return false;
    }
  }
}

function mapCohereError(error: unknown): AppError {
  if (error instanceof CohereTimeoutError) {
    return new CollaboratorTransientError("cohere: request timed out", SERVICE);
  }
  if (error instanceof CohereError) {
    return error.statusCode === undefined
      ? new CollaboratorTransientError(`cohere: ${error.message}`, SERVICE)
      : collaboratorErrorFromStatus(SERVICE, error.statusCode, error.message);
  }
  return toCollaboratorError(SERVICE, error);
}
