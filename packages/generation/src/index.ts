export type { IGenerationProvider, CompletionResult } from "./generation-provider.interface.js";
export { OpenAiGenerationProvider } from "./openai-provider.js";
export type { OpenAiProviderConfig } from "./openai-provider.js";
