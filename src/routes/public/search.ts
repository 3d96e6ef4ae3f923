import type { RetrievalResponder } from "@domain/rag/RetrievalResponder";
import { createSearchController } from "@interfaces/http/SearchController";
import { Router } from "express";

/**
 * Semantic search over a collection.
 *
 *   POST /api/search { query, collection?, limit? } -> { query, collection, results }
 */
export function createSearchRouter(responder: RetrievalResponder): Router {
  const router = Router();

  router.post("/", createSearchController(responder));

  return router;
}
