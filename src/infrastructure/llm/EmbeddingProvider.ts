/**
 * OpenAI embeddings behind the EmbeddingGateway port.
 *
 * `text-embedding-3-*` models are asked for the configured dimension so the
 * vectors fit the provisioned collection; older models return their native
 * size.
 */
import type { EmbeddingGateway } from "@domain/embedding/ports";
import { EmbeddingServiceError, errorMessage, ValidationError } from "@domain/errors";
import { withRetry } from "@infra/llm/retry";
import { logEvent } from "@infra/logging/Logger";
import type OpenAI from "openai";

export class OpenAIEmbeddingGateway implements EmbeddingGateway {
  constructor(
    private readonly client: OpenAI,
    readonly model: string,
    private readonly dimensions?: number
  ) {}

  async embed(text: string): Promise<number[]> {
    const normalized = text.trim();

    if (!normalized) {
      throw new ValidationError("Cannot embed empty text");
    }

    const startedAt = Date.now();
    const dimensions = this.model.startsWith("text-embedding-3")
      ? this.dimensions
      : undefined;

    try {
      const response = await withRetry(
        () =>
          this.client.embeddings.create({
            model: this.model,
            input: normalized,
            ...(dimensions ? { dimensions } : {}),
          }),
        "embeddings.create"
      );

      const first = response.data[0];

      if (!first || first.embedding.length === 0) {
        throw new EmbeddingServiceError("Embedding API returned invalid data");
      }

      logEvent("EMBEDDING_SUCCESS", {
        model: this.model,
        durationMs: Date.now() - startedAt,
        inputLength: normalized.length,
        vectorLength: first.embedding.length,
      });

      return first.embedding;
    } catch (error: unknown) {
      logEvent("EMBEDDING_FAILURE", {
        model: this.model,
        durationMs: Date.now() - startedAt,
        message: errorMessage(error),
      });

      if (error instanceof EmbeddingServiceError) {
        throw error;
      }
      throw new EmbeddingServiceError("Embedding request failed", {
        cause: error,
      });
    }
  }
}
