export interface AppErrorOptions {
  message: string;
  statusCode: number;
  code: string;
  isOperational?: boolean;
  requestId?: string;
  details?: Record<string, unknown>;
  /** Underlying error, exposed as the standard `Error.cause`. */
  cause?: unknown;
}

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly isOperational: boolean;
  public readonly requestId?: string;
  public readonly details?: Record<string, unknown>;

  constructor({
    message,
    statusCode,
    code,
    isOperational = true,
    requestId,
    details,
    cause,
  }: AppErrorOptions) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = this.constructor.name;
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;
    this.requestId = requestId;
    this.details = details;

    // Restore prototype chain (necessary when extending built-ins in TS)
    Object.setPrototypeOf(this, new.target.prototype);

    Error.captureStackTrace(this, this.constructor);
  }

  static isAppError(err: unknown): err is AppError {
    return err instanceof AppError;
  }

  /** Code and message of any thrown value, for events and persisted rows. */
  static describe(err: unknown): { code: string; message: string } {
    if (err instanceof AppError) {
      return { code: err.code, message: err.message };
    }
    if (err instanceof Error) {
      return { code: "INTERNAL", message: err.message };
    }
    return { code: "INTERNAL", message: String(err) };
  }
}
