/**
 * Retry with backoff for transient transport and rate-limit failures
 * (ECONNRESET, ETIMEDOUT, HTTP 429/500/502/503).
 */
import { errorMessage } from "@domain/errors";
import { logger } from "@infra/logging/Logger";

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function readProperty(source: unknown, key: string): unknown {
  if (typeof source !== "object" || source === null || !(key in source)) {
    return undefined;
  }
  return Reflect.get(source, key);
}

export function isRetryableError(error: unknown): boolean {
  const retryableCodes = new Set(["ECONNRESET", "ETIMEDOUT"]);
  const retryableStatuses = new Set([429, 500, 502, 503]);

  const code =
    readProperty(error, "code") ?? readProperty(readProperty(error, "cause"), "code");
  if (typeof code === "string" && retryableCodes.has(code)) {
    return true;
  }

  const status =
    readProperty(error, "statusCode") ??
    readProperty(error, "status") ??
    readProperty(readProperty(error, "response"), "status");

  return typeof status === "number" && retryableStatuses.has(status);
}

export async function withRetry<T>(
  fn: () => Promise<T>,
  operation: string,
  backoffDelays: readonly number[] = [0, 200, 500]
): Promise<T> {
  let lastError: unknown;

  for (let attempt = 1; attempt <= backoffDelays.length; attempt += 1) {
    if (attempt > 1) {
      await delay(backoffDelays[attempt - 1] ?? 0);
    }

    try {
      return await fn();
    } catch (e: unknown) {
      lastError = e;

      if (!isRetryableError(e) || attempt === backoffDelays.length) {
        throw e;
      }

      logger.log("warn", "LLM_RETRY", {
        attempt,
        error: errorMessage(e),
        operation,
      });
    }
  }

  throw lastError instanceof Error
    ? lastError
    : new Error(`${operation} failed after retries.`);
}
