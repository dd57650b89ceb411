import type { EmbeddingProviderType } from "@papertrail/types";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";
import { CohereEmbeddingProvider } from "./cohere-provider.js";
import type { CohereProviderConfig } from "./cohere-provider.js";
import { TeiEmbeddingProvider } from "./tei-provider.js";
import type { TeiProviderConfig } from "./tei-provider.js";

export interface EmbeddingFactoryConfig {
  provider: EmbeddingProviderType;
  cohere?: CohereProviderConfig;
  tei?: TeiProviderConfig;
}

export function createEmbeddingProvider(config: EmbeddingFactoryConfig): IEmbeddingProvider {
  switch (config.provider) {
    case "cohere":
      if (!config.cohere) {
        throw new Error("Cohere config is required when provider is 'cohere'");
      }
      return new CohereEmbeddingProvider(config.cohere);
    case "tei":
      if (!config.tei) {
        throw new Error("TEI config is required when provider is 'tei'");
      }
      return new TeiEmbeddingProvider(config.tei);
    default:
      throw new Error(`Unknown embedding provider: ${String(config.provider)}`);
  }
}
