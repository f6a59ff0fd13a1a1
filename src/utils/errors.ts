import { ZodError } from "zod";

export const HTTP_STATUS = {
  BAD_REQUEST: 400,
  UNAUTHORIZED: 401,
  NOT_FOUND: 404,
  CONFLICT: 409,
  UNPROCESSABLE_ENTITY: 422,
  TOO_MANY_REQUESTS: 429,
  INTERNAL_SERVER_ERROR: 500,
  SERVICE_UNAVAILABLE: 503,
} as const;

export type TelegramErrorCode =
  | "INVALID_PHONE_NUMBER"
  | "PHONE_MIGRATE"
  | "SESSION_PASSWORD_NEEDED"
  | "PASSWORD_INVALID"
  | "CODE_INVALID"
  | "CODE_EXPIRED"
  | "SESSION_UNAUTHORIZED";

export type ErrorCode =
  | "CONFIGURATION_ERROR"
  | "RATE_LIMIT_EXCEEDED"
  | "VALIDATION_ERROR"
  | "NOT_FOUND"
  | "INVALID_TRANSITION"
  | "SERVICE_UNAVAILABLE"
  | "INTERNAL_SERVER_ERROR"
  | TelegramErrorCode;

interface AppErrorOptions {
  statusCode?: number;
  code?: ErrorCode;
  details?: unknown;
}

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: ErrorCode;
  public readonly details?: unknown;

  constructor(message: string, options?: AppErrorOptions) {
    super(message);
    this.name = this.constructor.name;
    this.statusCode = options?.statusCode ?? HTTP_STATUS.INTERNAL_SERVER_ERROR;
    this.code = options?.code ?? "INTERNAL_SERVER_ERROR";
    this.details = options?.details;
  }
}

/** Missing staging destination, delivery credential or required environment. */
export class ConfigurationError extends AppError {
  constructor(message = "Relay is not configured", details?: unknown) {
    super(message, { statusCode: HTTP_STATUS.SERVICE_UNAVAILABLE, code: "CONFIGURATION_ERROR", details });
  }
}

/**
 * The protocol asked us to wait before retrying. Loops sleep for
 * `retryAfterSeconds` instead of failing the job.
 */
export class RateLimitError extends AppError {
  public readonly retryAfterSeconds: number;

  constructor(retryAfterSeconds: number, message = "Rate limit exceeded", details?: unknown) {
    super(message, { statusCode: HTTP_STATUS.TOO_MANY_REQUESTS, code: "RATE_LIMIT_EXCEEDED", details });
    this.retryAfterSeconds = retryAfterSeconds;
  }
}

export class ValidationError extends AppError {
  constructor(message = "Validation error", details?: unknown) {
    super(message, { statusCode: HTTP_STATUS.UNPROCESSABLE_ENTITY, code: "VALIDATION_ERROR", details });
  }
}

export class NotFoundError extends AppError {
  constructor(message = "Resource not found", details?: unknown) {
    super(message, { statusCode: HTTP_STATUS.NOT_FOUND, code: "NOT_FOUND", details });
  }
}

export class InvalidTransitionError extends AppError {
  constructor(from: string, to: string) {
    super(`Job cannot move from ${from} to ${to}`, {
      statusCode: HTTP_STATUS.CONFLICT,
      code: "INVALID_TRANSITION",
      details: { from, to },
    });
  }
}

export class TelegramAuthError extends AppError {
  constructor(code: TelegramErrorCode, message: string, details?: unknown) {
    super(message, { statusCode: HTTP_STATUS.BAD_REQUEST, code, details });
  }
}

export class ServiceUnavailableError extends AppError {
  constructor(message = "Service unavailable", details?: unknown) {
    super(message, { statusCode: HTTP_STATUS.SERVICE_UNAVAILABLE, code: "SERVICE_UNAVAILABLE", details });
  }
}

export interface ApiErrorResponse {
  error: {
    message: string;
    code: ErrorCode;
    statusCode: number;
    details?: unknown;
    requestId?: string;
  };
}

export function formatError(error: unknown, requestId?: string): ApiErrorResponse {
  if (error instanceof AppError) {
    return {
      error: {
        message: error.message,
        code: error.code,
        statusCode: error.statusCode,
        details: error.details,
        requestId,
      },
    };
  }

  if (error instanceof ZodError) {
    return {
      error: {
        message: "Validation error",
        code: "VALIDATION_ERROR",
        statusCode: HTTP_STATUS.UNPROCESSABLE_ENTITY,
        details: error.flatten(),
        requestId,
      },
    };
  }

  const fallbackMessage = error instanceof Error ? error.message : "Internal Server Error";

  return {
    error: {
      message: fallbackMessage || "Internal Server Error",
      code: "INTERNAL_SERVER_ERROR",
      statusCode: HTTP_STATUS.INTERNAL_SERVER_ERROR,
      requestId,
    },
  };
}

// Text stored in `relay_jobs.error` and shown to the operator.
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }

  if (typeof error === "string" && error.length > 0) {
    return error;
  }

  return "Unknown error";
}
