import { IngestBatchSchema } from "@app/ingest/IngestUseCase";
import { CollectionNameSchema } from "@interfaces/http/http";
import { z } from "zod";

/**
 * Zod DTOs for batch ingestion.
 *
 * A request carries either the records inline or a server-side path to a
 * JSON batch file.
 */
export const IngestRequestSchema = z.union([
  z.object({
    collection: CollectionNameSchema.optional(),
    records: IngestBatchSchema,
  }),
  z.object({
    collection: CollectionNameSchema.optional(),
    filepath: z.string().min(1),
  }),
]);

export const IngestResponseSchema = z.object({
  collection: z.string(),
  total: z.number().int(),
  created: z.number().int(),
  skipped: z.number().int(),
  failed: z.number().int(),
  outcomes: z.array(
    z.object({
      id: z.string(),
      outcome: z.enum(["created", "skipped", "failed"]),
      error: z.string().optional(),
    })
  ),
});
