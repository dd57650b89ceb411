import { AppError } from "./app-error.js";

export interface ErrorContext {
  requestId?: string;
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class InputError extends AppError {
  constructor(message = "Invalid input", options?: ErrorContext) {
    super({
      message,
      statusCode: 400,
      code: "INPUT_ERROR",
      requestId: options?.requestId,
      details: options?.details,
      cause: options?.cause,
    });
  }
}

export class NotFoundError extends AppError {
  constructor(message = "Resource not found", options?: ErrorContext) {
    super({
      message,
      statusCode: 404,
      code: "NOT_FOUND",
      requestId: options?.requestId,
      details: options?.details,
      cause: options?.cause,
    });
  }
}

export class RateLimitedError extends AppError {
  public readonly retryAfter: number;

  constructor(message = "Rate limited", retryAfter: number, options?: ErrorContext) {
    super({
      message,
      statusCode: 429,
      code: "RATE_LIMITED",
      requestId: options?.requestId,
      details: options?.details,
      cause: options?.cause,
    });
    this.retryAfter = retryAfter;
  }
}

export class CitationResolutionError extends AppError {
  /** The reference number, or the marker text when it could not be read as one. */
  public readonly reference: number | string;

  constructor(reference: number | string, options?: ErrorContext) {
    super({
      message: `Citation [${String(reference)}] does not match any passage in the context`,
      statusCode: 422,
      code: "CITATION_UNRESOLVED",
      requestId: options?.requestId,
      details: options?.details,
      cause: options?.cause,
    });
    this.reference = reference;
  }
}

/** Network failure, timeout or 5xx from an external collaborator. Retryable. */
export class CollaboratorTransientError extends AppError {
  public readonly service: string;

  constructor(message: string, service: string, options?: ErrorContext) {
    super({
      message,
      statusCode: 503,
      code: "COLLABORATOR_TRANSIENT",
      requestId: options?.requestId,
      details: options?.details,
      cause: options?.cause,
    });
    this.service = service;
  }
}

/** Auth failure, malformed response or open circuit. Never retried. */
export class CollaboratorPermanentError extends AppError {
  public readonly service: string;

  constructor(message: string, service: string, options?: ErrorContext) {
    super({
      message,
      statusCode: 502,
      code: "COLLABORATOR_PERMANENT",
      requestId: options?.requestId,
      details: options?.details,
      cause: options?.cause,
    });
    this.service = service;
  }
}

export class LoggingFailure extends AppError {
  constructor(message = "Failed to write to the logging store", options?: ErrorContext) {
    super({
      message,
      statusCode: 500,
      code: "LOGGING_FAILURE",
      requestId: options?.requestId,
      details: options?.details,
      cause: options?.cause,
    });
  }
}
