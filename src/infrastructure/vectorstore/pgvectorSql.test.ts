import type { CollectionSpec } from "@domain/vectorstore/ports";

import {
  createIndexSql,
  createItemsTableSql,
  itemsTableName,
  quoteIdent,
  registryTableName,
  searchSql,
} from "./pgvectorSql";

const HNSW: CollectionSpec = {
  name: "movies",
  dimension: 3,
  metric: "cosine",
  indexKind: "hnsw",
  indexParams: { m: 16, efConstruction: 64 },
};

describe("pgvector SQL", () => {
  it("quotes identifiers", () => {
    expect(quoteIdent('odd"name')).toBe('"odd""name"');
  });

  it("names tables from the prefix", () => {
    expect(registryTableName("rag_")).toBe("rag_collections");
    expect(itemsTableName("rag_", "movies")).toBe("rag_movies");
  });

  it("refuses collection names that are not identifiers", () => {
    expect(() => itemsTableName("rag_", "Movies; DROP TABLE x")).toThrow(
      'Invalid collection name "Movies; DROP TABLE x"'
    );
  });

  it("declares the embedding column with the collection dimension", () => {
    expect(createItemsTableSql("rag_movies", 3)).toContain(
      "embedding vector(3) NOT NULL"
    );
    expect(() => createItemsTableSql("rag_movies", 0)).toThrow(
      "Invalid embedding dimension: 0"
    );
  });

  it("builds an HNSW index with its parameters", () => {
    expect(createIndexSql("rag_movies", HNSW)).toBe(
      'CREATE INDEX IF NOT EXISTS "rag_movies_embedding_idx" ON "rag_movies" USING hnsw (embedding vector_cosine_ops) WITH (m = 16, ef_construction = 64)'
    );
  });

  it("builds an IVFFlat index for the metric's operator class", () => {
    expect(
      createIndexSql("rag_movies", {
        ...HNSW,
        metric: "euclidean",
        indexKind: "ivfflat",
        indexParams: { lists: 100 },
      })
    ).toBe(
      'CREATE INDEX IF NOT EXISTS "rag_movies_embedding_idx" ON "rag_movies" USING ivfflat (embedding vector_l2_ops) WITH (lists = 100)'
    );
  });

  it("skips the index when none is wanted", () => {
    expect(createIndexSql("rag_movies", { ...HNSW, indexKind: "none" })).toBeNull();
  });

  it("requires HNSW parameters", () => {
    expect(() =>
      createIndexSql("rag_movies", { ...HNSW, indexParams: { efConstruction: 64 } })
    ).toThrow("Index parameter m must be a positive integer");
  });

  it("orders the search by the metric's distance operator", () => {
    expect(searchSql("rag_movies", "dot-product")).toBe(
      'SELECT id, text, additional_metadata, embedding <#> $1::vector AS distance\nFROM "rag_movies"\nORDER BY embedding <#> $1::vector\nLIMIT $2'
    );
  });
});
