/**
 * Error taxonomy and the global Express error handler.
 *
 * - ValidationError: malformed inbound request (400), never retried
 * - UpstreamError: an embedding, retrieval, generation or upsert call failed
 *   (502) or timed out (504); tagged with the failing stage
 * - ConfigurationError: required settings missing at startup
 *
 * Only the public message of an error reaches the caller. Stage, cause and
 * metadata are written to the log.
 */
import { logger } from "@infrastructure/logging/Logger";
import type { NextFunction, Request, Response } from "express";

export type AppErrorType =
  | "AppError"
  | "ValidationError"
  | "UpstreamError"
  | "ConfigurationError"
  | "NotFoundError";

export interface AppErrorMetadata {
  [key: string]: unknown;
}

export type UpstreamStage = "embed" | "retrieve" | "generate" | "upsert";

export class AppError extends Error {
  public readonly type: AppErrorType;
  public readonly statusCode: number;
  public readonly metadata: AppErrorMetadata | undefined;

  constructor(
    message: string,
    type: AppErrorType = "AppError",
    statusCode = 500,
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

  /** Message safe to return to an HTTP client. */
  get publicMessage(): string {
    return "Internal server error";
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

  override get publicMessage(): string {
    return this.message;
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, "NotFoundError", 404);
  }

  override get publicMessage(): string {
    return this.message;
  }
}

export class TimeoutError extends Error {
  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
  }
}

export class UpstreamError extends AppError {
  public readonly stage: UpstreamStage;
  public readonly timedOut: boolean;

  constructor(stage: UpstreamStage, cause: unknown) {
    const timedOut = cause instanceof TimeoutError;
    super(
      `Upstream ${stage} call failed: ${describeCause(cause)}`,
      "UpstreamError",
      timedOut ? 504 : 502,
      { stage }
    );
    this.stage = stage;
    this.timedOut = timedOut;
    this.cause = cause;
  }

  override get publicMessage(): string {
    return this.timedOut
      ? "The assistant took too long to respond. Please try again."
      : "The assistant is temporarily unavailable. Please try again.";
  }
}

export class ConfigurationError extends AppError {
  constructor(public readonly variables: string[], details: string[] = []) {
    super(
      `Invalid configuration: ${details.length ? details.join("; ") : variables.join(", ")}`,
      "ConfigurationError",
      500,
      { variables }
    );
  }
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }
  return String(cause);
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

// body-parser tags its errors with a `type`, e.g. "entity.parse.failed"
function isBodyParserError(err: unknown, type: string): boolean {
  if (!err || typeof err !== "object") {
    return false;
  }
  return "type" in err && err.type === type;
}

/**
 * Client-error status carried by errors from Express middleware
 * (http-errors sets both `status` and `statusCode`).
 */
function readClientStatus(err: unknown): number | undefined {
  if (!err || typeof err !== "object") {
    return undefined;
  }

  const status =
    "statusCode" in err && typeof err.statusCode === "number"
      ? err.statusCode
      : "status" in err && typeof err.status === "number"
        ? err.status
        : undefined;

  return status !== undefined && status >= 400 && status < 500
    ? status
    : undefined;
}

// http-errors marks messages that are safe to show with `expose: true`
function clientMessage(err: unknown): string {
  if (
    err instanceof Error &&
    "expose" in err &&
    err.expose === true &&
    err.message
  ) {
    return err.message;
  }
  return "Bad request";
}

export function notFoundHandler(req: Request, _res: Response, next: NextFunction) {
  next(new NotFoundError(`Route ${req.method} ${req.path} not found`));
}

export function errorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction
) {
  let appError: AppError;
  const clientStatus = readClientStatus(err);

  if (isAppError(err)) {
    appError = err;
  } else if (isBodyParserError(err, "entity.parse.failed")) {
    appError = new ValidationError("Request body must be valid JSON");
  } else if (isBodyParserError(err, "entity.too.large")) {
    appError = new ValidationError("Request body is too large", 413);
  } else if (clientStatus !== undefined) {
    appError = new ValidationError(clientMessage(err), clientStatus);
  } else {
    appError = new AppError(describeCause(err));
  }

  const status = appError.statusCode;

  logger.log(status >= 500 ? "error" : "warn", "Request failed", {
    type: appError.type,
    statusCode: status,
    message: appError.message,
    stage: appError instanceof UpstreamError ? appError.stage : undefined,
    metadata: appError.metadata ? JSON.stringify(appError.metadata) : undefined,
    originalError: appError === err ? undefined : String(err),
  });

  res.status(status).json({ error: appError.publicMessage });
}
