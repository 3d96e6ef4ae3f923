/**
 * Domain port for the vector store.
 *
 * The store persists StoredItems per named collection and executes the
 * similarity search itself; index construction and search internals belong to
 * the adapter (pgvector, or the in-memory store used by tests and demos).
 */
export type DistanceMetric = "cosine" | "euclidean" | "dot-product";

export type IndexKind = "hnsw" | "ivfflat" | "none";

export interface IndexParams {
  /** HNSW: max connections per layer. */
  m?: number;
  /** HNSW: candidate list size while building. */
  efConstruction?: number;
  /** IVFFlat: number of inverted lists. */
  lists?: number;
}

export interface CollectionSpec {
  name: string;
  dimension: number;
  metric: DistanceMetric;
  indexKind: IndexKind;
  indexParams: IndexParams;
}

export interface StoredItem {
  id: string;
  text: string;
  embedding: number[];
  description: string;
  additionalMetadata: string | null;
}

export interface SearchResult {
  id: string;
  text: string;
  /** Similarity in [0, 1], higher is closer. */
  relevance: number;
  additionalMetadata: string | null;
}

export interface GetOptions {
  /** When false the adapter may return the item with an empty embedding. */
  withEmbedding: boolean;
}

export interface VectorStore {
  ensureCollection(spec: CollectionSpec): Promise<void>;

  get(
    collection: string,
    id: string,
    options: GetOptions
  ): Promise<StoredItem | null>;

  upsert(collection: string, item: StoredItem): Promise<void>;

  /**
   * Top-k similarity search, sorted by descending relevance. Unknown or empty
   * collections yield an empty array.
   */
  search(
    collection: string,
    queryVector: number[],
    topK: number,
    minRelevance?: number
  ): Promise<SearchResult[]>;
}
