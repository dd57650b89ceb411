export interface CompletionResult {
  text: string;
  model: string;
  promptTokens?: number;
  completionTokens?: number;
}

/**
 * Generation collaborator. One call per prompt; retries are the caller's
 * concern, so implementations must not retry internally.
 */
export interface IGenerationProvider {
  readonly name: string;
  readonly model: string;

  complete(prompt: string): Promise<CompletionResult>;
}
