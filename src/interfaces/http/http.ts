/**
 * The slices of Express' request/response the controllers rely on.
 *
 * Express' own Request/Response satisfy these, and tests can hand in plain
 * objects.
 */
import { InfrastructureError } from "@domain/errors";
import { isValidCollectionName } from "@domain/vectorstore/collections";
import { z } from "zod";

export interface BodyRequest {
  body: unknown;
}

export interface JsonResponse {
  json(body: unknown): unknown;
}

export interface StatusResponse {
  status(code: number): JsonResponse;
}

export type NextHandler = (err?: unknown) => void;

export const CollectionNameSchema = z
  .string()
  .refine(isValidCollectionName, { message: "invalid collection name" });

/** Checks a use-case result against its response DTO. */
export function validateResponse<T extends z.ZodTypeAny>(
  schema: T,
  value: unknown
): z.infer<T> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new InfrastructureError("Invalid response", {
      statusCode: 500,
      metadata: { issues: parsed.error.issues },
    });
  }
  return parsed.data;
}
