import { CollectionNameSchema } from "@interfaces/http/http";
import { z } from "zod";

/**
 * Zod DTOs for semantic search.
 */
export const SearchRequestSchema = z.object({
  query: z.string().trim().min(1),
  collection: CollectionNameSchema.optional(),
  limit: z.number().int().min(1).max(50).optional(),
});

export const SearchResponseSchema = z.object({
  query: z.string(),
  collection: z.string(),
  results: z.array(
    z.object({
      id: z.string(),
      text: z.string(),
      relevance: z.number().min(0).max(1),
      additionalMetadata: z.string().nullable(),
    })
  ),
});
