/**
 * Semantic search over a collection.
 *
 * Embeds the query and returns the top matches with their relevance. Backs
 * POST /api/search, which exposes raw retrieval for checking grounding quality.
 */
import { config } from "@config/index";
import { ValidationError } from "@domain/errors";
import type { RetrievalResponder } from "@domain/rag/RetrievalResponder";
import { isValidCollectionName } from "@domain/vectorstore/collections";
import type { SearchResult } from "@domain/vectorstore/ports";

export interface SemanticSearchRequest {
  query: string;
  collection?: string;
  limit?: number;
}

export interface SemanticSearchResponse {
  query: string;
  collection: string;
  results: SearchResult[];
}

export async function searchRecordsByText(
  responder: RetrievalResponder,
  input: SemanticSearchRequest
): Promise<SemanticSearchResponse> {
  const { limit = config.rag.topK } = input;
  const collection = input.collection ?? responder.defaultCollection;
  const normalized = input.query.trim();

  if (!normalized) {
    throw new ValidationError("query is required");
  }
  if (!isValidCollectionName(collection)) {
    throw new ValidationError("invalid collection name", { collection });
  }

  const results = await responder.searchTop(normalized, { collection, limit });

  return {
    query: normalized,
    collection,
    results,
  };
}
