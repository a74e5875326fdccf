/**
 * Error types raised by repositories, services and tool handlers.
 * Tool dispatch turns any of these into an `isError` MCP result.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string = "APP_ERROR"
  ) {
    super(message);
    this.name = "AppError";
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, "VALIDATION");
    this.name = "ValidationError";
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, "NOT_FOUND");
    this.name = "NotFoundError";
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, "CONFLICT");
    this.name = "ConflictError";
  }
}

export class AuthError extends AppError {
  constructor(message: string) {
    super(message, "AUTH");
    this.name = "AuthError";
  }
}

// Open Food Facts transport errors
export class OffApiError extends AppError {
  constructor(
    message: string,
    public readonly statusCode?: number
  ) {
    super(message, "OFF_API");
    this.name = "OffApiError";
  }
}

export class RateLimitError extends OffApiError {
  constructor(
    message: string,
    public readonly retryAfterSeconds: number | null
  ) {
    super(message, 429);
    this.name = "RateLimitError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
