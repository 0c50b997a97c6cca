/**
 * Global error handling middleware.
 *
 * AppErrors keep their status, class name, stage and metadata. Request-body
 * errors raised by express.json() keep their 4xx status. Anything else is
 * logged in full and answered with a generic 500 so internals never reach
 * the client.
 */
import { logger } from "@infra/logging/Logger";
import { InfrastructureError, ValidationError, isAppError, type AppError } from "@typesLocal/AppError";
import type { NextFunction, Request, Response } from "express";

function clientErrorStatus(err: unknown): number | undefined {
  if (err === null || typeof err !== "object") {
    return undefined;
  }
  const status =
    "statusCode" in err && typeof err.statusCode === "number"
      ? err.statusCode
      : "status" in err && typeof err.status === "number"
        ? err.status
        : undefined;
  return status !== undefined && status >= 400 && status < 500 ? status : undefined;
}

function toAppError(err: unknown): AppError {
  if (isAppError(err)) {
    return err;
  }

  const status = clientErrorStatus(err);
  if (status !== undefined) {
    return new ValidationError(
      err instanceof Error ? err.message : "Malformed request",
      status
    );
  }

  return new InfrastructureError("Internal Server Error", 500);
}

export function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const appError = toAppError(err);
  const status = appError.statusCode ?? 500;

  logger.log(status >= 500 ? "error" : "warn", "Request failed", {
    method: req.method,
    path: req.originalUrl,
    statusCode: status,
    code: appError.name,
    stage: appError.stage,
    message: err instanceof Error ? err.message : String(err),
    metadata: appError.metadata ? JSON.stringify(appError.metadata) : undefined,
    stack: appError === err ? undefined : err instanceof Error ? err.stack : undefined,
  });

  res.status(status).json({
    error: {
      message: appError.message,
      code: appError.name,
      stage: appError.stage ?? null,
      details: appError.metadata ?? {},
    },
  });
}
