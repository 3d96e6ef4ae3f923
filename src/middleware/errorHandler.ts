/**
 * Global error handling middleware.
 *
 * Renders every failure as `{ error: { message, code, details } }`:
 * - AppError subclasses keep their type and status code
 * - zod failures become ValidationError (400) with the issues as details
 * - anything else is wrapped in an InfrastructureError (500)
 */
import {
  AppError,
  InfrastructureError,
  isAppError,
  ValidationError,
} from "@domain/errors";
import { logger } from "@infra/logging/Logger";
import type { NextHandler, StatusResponse } from "@interfaces/http/http";
import { ZodError } from "zod";

export function toAppError(err: unknown): AppError {
  if (isAppError(err)) {
    return err;
  }

  if (err instanceof ZodError) {
    return new ValidationError("Invalid request", { issues: err.issues });
  }

  const message =
    err instanceof Error && err.message ? err.message : "Internal Server Error";

  return new InfrastructureError(message, {
    statusCode: 500,
    cause: err,
  });
}

export function errorHandler(
  err: unknown,
  _req: unknown,
  res: StatusResponse,
  _next: NextHandler
): void {
  const appError = toAppError(err);
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
      message: appError.message,
      code: appError.type,
      details: appError.metadata ?? {},
    },
  });
}
