export type { IEmbeddingProvider } from "./embedding-provider.interface.js";
export { CohereEmbeddingProvider } from "./cohere-provider.js";
export type { CohereProviderConfig } from "./cohere-provider.js";
export { TeiEmbeddingProvider } from "./tei-provider.js";
export type { TeiProviderConfig } from "./tei-provider.js";
export { createEmbeddingProvider } from "./factory.js";
export type { EmbeddingFactoryConfig } from "./factory.js";
