import type { DetectionVerdict } from "../detection/types";

export type AppErrorCode =
  | "VALIDATION_ERROR"
  | "NOT_FOUND"
  | "SOURCE_BLOCKED"
  | "IDENTITY_BANNED"
  | "NAVIGATION_ERROR"
  | "FETCH_ERROR"
  | "TARGET_TIMEOUT"
  | "SESSION_ERROR"
  | "ABORTED"
  | "INTERNAL_ERROR";

export class AppError extends Error {
  public readonly code: AppErrorCode;
  public readonly statusCode: number;
  public readonly retryable: boolean;
  public readonly details: Record<string, unknown> | null;

  public constructor(params: {
    code: AppErrorCode;
    message: string;
    statusCode: number;
    retryable?: boolean;
    details?: Record<string, unknown> | null;
  }) {
    super(params.message);
    this.name = "AppError";
    this.code = params.code;
    this.statusCode = params.statusCode;
    this.retryable = params.retryable ?? false;
    this.details = params.details ?? null;
  }
}

export class ValidationError extends AppError {
  public constructor(message: string, details?: Record<string, unknown>) {
    super({
      code: "VALIDATION_ERROR",
      message,
      statusCode: 400,
      retryable: false,
      details: details ?? null,
    });
    this.name = "ValidationError";
  }
}

export class NotFoundError extends AppError {
  public constructor(message: string, details?: Record<string, unknown>) {
    super({
      code: "NOT_FOUND",
      message,
      statusCode: 404,
      retryable: false,
      details: details ?? null,
    });
    this.name = "NotFoundError";
  }
}

export class SourceBlockedError extends AppError {
  public readonly verdict: DetectionVerdict;

  public constructor(verdict: DetectionVerdict, details?: Record<string, unknown>) {
    super({
      code: "SOURCE_BLOCKED",
      message: `Source responded with a hostile verdict: ${verdict}.`,
      statusCode: 503,
      retryable: true,
      details: { verdict, ...(details ?? {}) },
    });
    this.name = "SourceBlockedError";
    this.verdict = verdict;
  }
}

export class IdentityBannedError extends AppError {
  public constructor(strategy: string, details?: Record<string, unknown>) {
    super({
      code: "IDENTITY_BANNED",
      message: `Strategy '${strategy}' gave up after a ban signal.`,
      statusCode: 403,
      retryable: false,
      details: { strategy, ...(details ?? {}) },
    });
    this.name = "IdentityBannedError";
  }
}

export class NavigationError extends AppError {
  public constructor(message: string, details?: Record<string, unknown>) {
    super({
      code: "NAVIGATION_ERROR",
      message,
      statusCode: 502,
      retryable: true,
      details: details ?? null,
    });
    this.name = "NavigationError";
  }
}

export class FetchError extends AppError {
  public constructor(message: string, details?: Record<string, unknown>) {
    super({
      code: "FETCH_ERROR",
      message,
      statusCode: 502,
      retryable: true,
      details: details ?? null,
    });
    this.name = "FetchError";
  }
}

export class TargetTimeoutError extends AppError {
  public constructor(targetName: string, timeoutMs: number) {
    super({
      code: "TARGET_TIMEOUT",
      message: `Acquisition of '${targetName}' exceeded ${timeoutMs}ms.`,
      statusCode: 504,
      retryable: false,
      details: { targetName, timeoutMs },
    });
    this.name = "TargetTimeoutError";
  }
}

export class SessionError extends AppError {
  public constructor(message: string, details?: Record<string, unknown>) {
    super({
      code: "SESSION_ERROR",
      message,
      statusCode: 503,
      retryable: true,
      details: details ?? null,
    });
    this.name = "SessionError";
  }
}

export class AbortedError extends AppError {
  public constructor(details?: Record<string, unknown>) {
    super({
      code: "ABORTED",
      message: "Operation was aborted.",
      statusCode: 499,
      retryable: false,
      details: details ?? null,
    });
    this.name = "AbortedError";
  }
}

export const normalizeError = (error: unknown): AppError => {
  if (error instanceof AppError) return error;
  if (error instanceof Error) {
    return new AppError({
      code: "INTERNAL_ERROR",
      message: error.message,
      statusCode: 500,
      retryable: false,
      details: null,
    });
  }

  return new AppError({
    code: "INTERNAL_ERROR",
    message: "Unknown error.",
    statusCode: 500,
    retryable: false,
    details: null,
  });
};

export const describeError = (error: unknown): { code: AppErrorCode; message: string } => {
  const appError = normalizeError(error);
  return { code: appError.code, message: appError.message };
};
