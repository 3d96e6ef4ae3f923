import type { IngestUseCaseDeps } from "@app/ingest/IngestUseCase";
import { createIngestController } from "@interfaces/http/IngestController";
import { Router } from "express";

// Delegate HTTP handling to the IngestController, which in turn calls IngestUseCase
export function createIngestRouter(deps: IngestUseCaseDeps): Router {
  const router = Router();

  router.post("/", createIngestController(deps));

  return router;
}
