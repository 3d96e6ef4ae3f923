/**
 * Error taxonomy shared by the pipeline, the adapters and the HTTP layer.
 *
 * Every error carries a `type` (rendered as the API error code), an optional
 * HTTP status and free-form metadata. Pipeline errors are subclasses so that
 * callers can tell "no grounding" apart from an outage with `instanceof`.
 */
export type AppErrorType =
  | "DomainError"
  | "InfrastructureError"
  | "AppError"
  | "ValidationError";

export interface AppErrorMetadata {
  [key: string]: unknown;
}

export interface AppErrorOptions {
  statusCode?: number;
  metadata?: AppErrorMetadata;
  cause?: unknown;
}

export class AppError extends Error {
  public readonly type: AppErrorType;
  public readonly statusCode: number | undefined;
  public readonly metadata: AppErrorMetadata | undefined;

  constructor(
    message: string,
    type: AppErrorType = "AppError",
    options: AppErrorOptions = {}
  ) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.type = type;
    this.statusCode = options.statusCode;
    this.metadata = options.metadata;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

export class DomainError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super(message, "DomainError", options);
  }
}

export class InfrastructureError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super(message, "InfrastructureError", options);
  }
}

export class ValidationError extends AppError {
  constructor(message: string, metadata?: AppErrorMetadata) {
    super(message, "ValidationError", { statusCode: 400, metadata });
  }
}

export class EmbeddingServiceError extends InfrastructureError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super(message, { statusCode: 502, ...options });
  }
}

export class ChatServiceError extends InfrastructureError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super(message, { statusCode: 502, ...options });
  }
}

export class StoreWriteError extends InfrastructureError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super(message, { statusCode: 503, ...options });
  }
}

/** A point lookup failed for a reason other than "not found". */
export class LookupAmbiguousError extends InfrastructureError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super(message, { statusCode: 503, ...options });
  }
}

export class CollectionConflictError extends DomainError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super(message, { statusCode: 409, ...options });
  }
}

export class NoGroundingFoundError extends DomainError {
  constructor(query: string, collection: string) {
    super(`No stored record matches the query in "${collection}"`, {
      statusCode: 404,
      metadata: { query, collection },
    });
  }
}

export class MissingTemplateVariableError extends DomainError {
  public readonly missing: readonly string[];

  constructor(missing: readonly string[]) {
    super(`Missing template variable(s): ${missing.join(", ")}`, {
      statusCode: 500,
      metadata: { missing },
    });
    this.missing = missing;
  }
}

export class SessionBusyError extends DomainError {
  constructor() {
    super("A query is already in progress for this session", {
      statusCode: 409,
    });
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
