/**
 * Process-local VectorStore.
 *
 * Exact (brute-force) search over every item of a collection; the configured
 * index kind is recorded but not built. Used by the test suite and when
 * VECTOR_STORE=memory. Items are copied on the way in and out, so callers can
 * never mutate stored state.
 */
import {
  CollectionConflictError,
  StoreWriteError,
} from "@domain/errors";
import { sameCollectionSpec } from "@domain/vectorstore/collections";
import type {
  CollectionSpec,
  GetOptions,
  SearchResult,
  StoredItem,
  VectorStore,
} from "@domain/vectorstore/ports";
import { distanceBetween, relevanceBetween } from "@domain/vectorstore/relevance";

interface Collection {
  spec: CollectionSpec;
  items: Map<string, StoredItem>;
}

function copyItem(item: StoredItem, withEmbedding = true): StoredItem {
  return {
    ...item,
    embedding: withEmbedding ? [...item.embedding] : [],
  };
}

export class InMemoryVectorStore implements VectorStore {
  private readonly collections = new Map<string, Collection>();

  async ensureCollection(spec: CollectionSpec): Promise<void> {
    const existing = this.collections.get(spec.name);

    if (!existing) {
      this.collections.set(spec.name, {
        spec: { ...spec, indexParams: { ...spec.indexParams } },
        items: new Map(),
      });
      return;
    }

    if (!sameCollectionSpec(existing.spec, spec)) {
      throw new CollectionConflictError(
        `Collection "${spec.name}" is already provisioned with a different spec`,
        { metadata: { existing: existing.spec, requested: spec } }
      );
    }
  }

  async get(
    collection: string,
    id: string,
    options: GetOptions
  ): Promise<StoredItem | null> {
    const item = this.collections.get(collection)?.items.get(id);
    return item ? copyItem(item, options.withEmbedding) : null;
  }

  async upsert(collection: string, item: StoredItem): Promise<void> {
    const target = this.collections.get(collection);

    if (!target) {
      throw new StoreWriteError(
        `Collection "${collection}" has not been provisioned`,
        { metadata: { collection, id: item.id } }
      );
    }

    if (item.embedding.length !== target.spec.dimension) {
      throw new StoreWriteError(
        `Expected a ${target.spec.dimension}-dimension embedding, got ${item.embedding.length}`,
        { metadata: { collection, id: item.id } }
      );
    }

    target.items.set(item.id, copyItem(item));
  }

  async search(
    collection: string,
    queryVector: number[],
    topK: number,
    minRelevance = 0
  ): Promise<SearchResult[]> {
    const target = this.collections.get(collection);
    if (!target || topK <= 0) {
      return [];
    }

    const scored: (SearchResult & { distance: number })[] = [];

    for (const item of target.items.values()) {
      const { metric } = target.spec;
      const relevance = relevanceBetween(metric, queryVector, item.embedding);

      if (relevance >= minRelevance) {
        scored.push({
          id: item.id,
          text: item.text,
          relevance,
          additionalMetadata: item.additionalMetadata,
          distance: distanceBetween(metric, queryVector, item.embedding),
        });
      }
    }

    return scored
      .sort((a, b) => a.distance - b.distance)
      .slice(0, topK)
      .map(({ distance: _distance, ...result }) => result);
  }

  /** Deep copy of a collection's items in insertion order. */
  snapshot(collection: string): StoredItem[] {
    const target = this.collections.get(collection);
    return target ? [...target.items.values()].map((item) => copyItem(item)) : [];
  }
}
