/**
 * Domain port for text embeddings.
 *
 * Implementations return a fixed-dimension vector for the given text and fail
 * with EmbeddingServiceError on transport or model errors.
 */
export interface EmbeddingGateway {
  readonly model: string;

  embed(text: string): Promise<number[]>;
}
