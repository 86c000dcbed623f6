/**
 * Error types and the global Express error handler.
 *
 * - AppError family carries a type, an HTTP status and optional metadata
 * - Unknown errors are wrapped as InfrastructureError (500 unless the error
 *   carries its own numeric statusCode)
 * - Every handled error is logged and answered with the same JSON shape:
 *   { error: { message, code, details } }
 */
import { logger } from "@infrastructure/logging/Logger";
import type { Request, Response, NextFunction } from "express";

export type AppErrorType =
  | "DomainError"
  | "InfrastructureError"
  | "AppError"
  | "ValidationError";

export interface AppErrorMetadata {
  [key: string]: unknown;
}

export class AppError extends Error {
  public readonly type: AppErrorType;
  public readonly statusCode: number | undefined;
  public readonly metadata: AppErrorMetadata | undefined;

  constructor(
    message: string,
    type: AppErrorType = "AppError",
    statusCode?: number,
    metadata?: AppErrorMetadata
  ) {
    super(message);
    this.name = new.target.name;
    this.type = type;
    this.statusCode = statusCode;
    this.metadata = metadata;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

export class DomainError extends AppError {
  constructor(
    message: string,
    statusCode?: number,
    metadata?: AppErrorMetadata
  ) {
    super(message, "DomainError", statusCode, metadata);
  }
}

export class InfrastructureError extends AppError {
  constructor(
    message: string,
    statusCode?: number,
    metadata?: AppErrorMetadata
  ) {
    super(message, "InfrastructureError", statusCode, metadata);
  }
}

export class ValidationError extends AppError {
  constructor(
    message: string,
    statusOrMeta: number | AppErrorMetadata = 400,
    metadata?: AppErrorMetadata
  ) {
    if (typeof statusOrMeta === "number") {
      super(message, "ValidationError", statusOrMeta, metadata);
    } else {
      super(message, "ValidationError", 400, statusOrMeta);
    }
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

function describeUnknown(err: unknown): { message: string; statusCode: number } {
  if (!err || typeof err !== "object") {
    return { message: "Internal Server Error", statusCode: 500 };
  }

  const message =
    "message" in err && typeof err.message === "string"
      ? err.message
      : "Internal Server Error";

  // body-parser errors carry `status`; older middleware uses `statusCode`.
  const statusCode =
    "statusCode" in err && typeof err.statusCode === "number"
      ? err.statusCode
      : "status" in err && typeof err.status === "number"
        ? err.status
        : 500;

  return { message, statusCode };
}

export function errorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction
): void {
  let appError: AppError;

  if (isAppError(err)) {
    appError = err;
  } else {
    const { message, statusCode } = describeUnknown(err);
    appError = new InfrastructureError(message, statusCode);
  }

  const status = appError.statusCode ?? 500;

  logger.log(status >= 500 ? "error" : "warn", "Request failed", {
    type: appError.type,
    name: appError.name,
    statusCode: status,
    message: appError.message,
    metadata: appError.metadata ? JSON.stringify(appError.metadata) : undefined,
    originalError: appError === err ? undefined : String(err),
  });

  res.status(status).json({
    error: {
      message: status >= 500 ? "Internal Server Error" : appError.message,
      code: appError.type,
      details: status >= 500 ? {} : appError.metadata ?? {},
    },
  });
}
