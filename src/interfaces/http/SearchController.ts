/**
 * Semantic search HTTP controller.
 *
 * POST /api/search exposes raw retrieval (relevance scores included) for
 * checking what a question would be grounded in.
 */
import { searchRecordsByText } from "@app/search/SearchUseCase";
import type { RetrievalResponder } from "@domain/rag/RetrievalResponder";
import { validateResponse } from "@interfaces/http/http";
import type {
  BodyRequest,
  JsonResponse,
  NextHandler,
} from "@interfaces/http/http";
import {
  SearchRequestSchema,
  SearchResponseSchema,
} from "@interfaces/http/search/schema";

export function createSearchController(responder: RetrievalResponder) {
  return async function searchController(
    req: BodyRequest,
    res: JsonResponse,
    next: NextHandler
  ): Promise<void> {
    try {
      const request = SearchRequestSchema.parse(req.body);
      const result = await searchRecordsByText(responder, request);

      res.json(validateResponse(SearchResponseSchema, result));
    } catch (err: unknown) {
      next(err);
    }
  };
}
