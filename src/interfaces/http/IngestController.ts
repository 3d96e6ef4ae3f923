/**
 * Batch ingestion HTTP controller.
 *
 * POST /api/ingest with `{ collection?, records }` or `{ collection?, filepath }`;
 * responds with the per-record ingest report.
 */
import path from "path";

import { ingestBatch } from "@app/ingest/IngestUseCase";
import type { IngestRequest, IngestUseCaseDeps } from "@app/ingest/IngestUseCase";
import { validateResponse } from "@interfaces/http/http";
import type {
  BodyRequest,
  JsonResponse,
  NextHandler,
} from "@interfaces/http/http";
import {
  IngestRequestSchema,
  IngestResponseSchema,
} from "@interfaces/http/ingest/schema";

export function createIngestController(deps: IngestUseCaseDeps) {
  return async function ingestController(
    req: BodyRequest,
    res: JsonResponse,
    next: NextHandler
  ): Promise<void> {
    try {
      const parsed = IngestRequestSchema.parse(req.body);
      const request: IngestRequest =
        "records" in parsed
          ? { collection: parsed.collection, records: parsed.records }
          : {
              collection: parsed.collection,
              filepath: path.resolve(parsed.filepath),
            };

      const report = await ingestBatch(deps, request);

      res.json(validateResponse(IngestResponseSchema, report));
    } catch (err: unknown) {
      next(err);
    }
  };
}
