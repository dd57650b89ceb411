import { createOpenAI } from "@ai-sdk/openai";
import { APICallError, generateText } from "ai";
import type { LanguageModel } from "ai";
import {
  AppError,
  CollaboratorPermanentError,
  collaboratorErrorFromStatus,
  createCircuitBreaker,
  isOpenCircuitError,
  parseRetryAfter,
  toCollaboratorError,
} from "@papertrail/errors";
import type { CircuitBreakerOptions } from "@papertrail/errors";
import type { Logger } from "@papertrail/logger";
import type { CompletionResult, IGenerationProvider } from "./generation-provider.interface.js";

const SERVICE = "openai";

export interface OpenAiProviderConfig {
  apiKey: string;
  model: string;
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
  baseUrl?: string;
  breaker?: CircuitBreakerOptions;
  /** Overrides the model built from `apiKey`/`model`. */
  languageModel?: LanguageModel;
}

function mapGenerationError(error: unknown): AppError {
  if (APICallError.isInstance(error) && error.statusCode !== undefined) {
    return collaboratorErrorFromStatus(
      SERVICE,
      error.statusCode,
      error.message,
      parseRetryAfter(error.responseHeaders?.["retry-after"] ?? null),
    );
  }
  return toCollaboratorError(SERVICE, error);
}

/**
 * Chat-completion model through the `ai` SDK. Calls go through a circuit
 * breaker; an open circuit surfaces as a permanent failure so the retry
 * policy does not hammer a failing endpoint.
 */
export class OpenAiGenerationProvider implements IGenerationProvider {
  readonly name = SERVICE;
  readonly model: string;
  private languageModel: LanguageModel;
  private temperature: number;
  private maxTokens: number;
  private timeoutMs: number;
  private breaker;

  constructor(config: OpenAiProviderConfig, logger?: Logger) {
    this.model = config.model;
    this.temperature = config.temperature;
    this.maxTokens = config.maxTokens;
    this.timeoutMs = config.timeoutMs;
    this.languageModel =
      config.languageModel ??
      createOpenAI({ apiKey: config.apiKey, baseURL: config.baseUrl })(config.model);

    this.breaker = createCircuitBreaker(
      `${SERVICE}-generation`,
      (prompt: string) => this.generate(prompt),
      config.breaker,
      logger,
    );
  }

  async complete(prompt: string): Promise<CompletionResult> {
    try {
      return await this.breaker.fire(prompt);
    } catch (error: unknown) {
      if (isOpenCircuitError(error)) {
        throw new CollaboratorPermanentError(`${SERVICE}: circuit open`, SERVICE);
      }
      throw mapGenerationError(error);
    }
  }

  private async generate(prompt: string): Promise<CompletionResult> {
    try {
      const result = await generateText({
        model: this.languageModel,
        prompt,
        temperature: this.temperature,
        maxTokens: this.maxTokens,
        maxRetries: 0,
        abortSignal: AbortSignal.timeout(this.timeoutMs),
      });

      return {
        text: result.text,
        model: result.response.modelId,
        promptTokens: result.usage.promptTokens,
        completionTokens: result.usage.completionTokens,
      };
    } catch (error: unknown) {
      throw mapGenerationError(error);
    }
  }
}
