/**
 * Postgres + pgvector implementation of the VectorStore port.
 *
 * - ensureCollection: creates the extension, the registry, the items table and
 *   the ANN index inside one transaction; re-running with the same spec is a
 *   no-op, a different spec raises CollectionConflictError.
 * - get / upsert: keyed on the `id` primary key; upsert is a single
 *   INSERT ... ON CONFLICT statement (last writer wins).
 * - search: orders by the metric's distance operator and maps distances to
 *   relevance in [0, 1].
 *
 * A missing table (SQLSTATE 42P01) reads as "not found" / "no results".
 */
import {
  CollectionConflictError,
  errorMessage,
  InfrastructureError,
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
import { distanceToRelevance } from "@domain/vectorstore/relevance";
import type { SqlPool } from "@infra/database/db";
import { logEvent } from "@infra/logging/Logger";
import { fromPgVectorLiteral, toPgVectorLiteral } from "@utils/vector";
import { z } from "zod";

import {
  createIndexSql,
  createItemsTableSql,
  createRegistryTableSql,
  itemsTableName,
  quoteIdent,
  registryTableName,
  searchSql,
} from "./pgvectorSql";

const UNDEFINED_TABLE = "42P01";

const RegistryRowSchema = z.object({
  name: z.string(),
  dimension: z.number().int(),
  metric: z.enum(["cosine", "euclidean", "dot-product"]),
  index_kind: z.enum(["hnsw", "ivfflat", "none"]),
  index_params: z.object({
    m: z.number().int().optional(),
    efConstruction: z.number().int().optional(),
    lists: z.number().int().optional(),
  }),
});

const ItemRowSchema = z.object({
  id: z.string(),
  text: z.string(),
  description: z.string(),
  additional_metadata: z.string().nullable(),
  embedding: z.string().nullish(),
});

const SearchRowSchema = z.object({
  id: z.string(),
  text: z.string(),
  additional_metadata: z.string().nullable(),
  distance: z.coerce.number(),
});

function isUndefinedTable(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === UNDEFINED_TABLE
  );
}

export class PgVectorStore implements VectorStore {
  private readonly specs = new Map<string, CollectionSpec>();

  constructor(
    private readonly pool: SqlPool,
    private readonly tablePrefix: string
  ) {}

  async ensureCollection(spec: CollectionSpec): Promise<void> {
    const table = itemsTableName(this.tablePrefix, spec.name);
    const registry = quoteIdent(registryTableName(this.tablePrefix));
    const client = await this.pool.connect();

    try {
      await client.query("BEGIN");
      await client.query("CREATE EXTENSION IF NOT EXISTS vector");
      await client.query(createRegistryTableSql(this.tablePrefix));

      await client.query(
        `INSERT INTO ${registry} (name, dimension, metric, index_kind, index_params)
         VALUES ($1, $2, $3, $4, $5)
         ON CONFLICT (name) DO NOTHING`,
        [
          spec.name,
          spec.dimension,
          spec.metric,
          spec.indexKind,
          JSON.stringify(spec.indexParams),
        ]
      );

      const stored = await client.query(
        `SELECT name, dimension, metric, index_kind, index_params FROM ${registry} WHERE name = $1`,
        [spec.name]
      );
      const existing = this.toSpec(stored.rows[0]);

      if (!sameCollectionSpec(existing, spec)) {
        throw new CollectionConflictError(
          `Collection "${spec.name}" is already provisioned with a different spec`,
          { metadata: { existing, requested: spec } }
        );
      }

      await client.query(createItemsTableSql(table, spec.dimension));

      const indexSql = createIndexSql(table, spec);
      if (indexSql) {
        await client.query(indexSql);
      }

      await client.query("COMMIT");
      this.specs.set(spec.name, spec);

      logEvent("VECTOR_STORE_PROVISIONED", {
        collection: spec.name,
        table,
        dimension: spec.dimension,
        metric: spec.metric,
        indexKind: spec.indexKind,
      });
    } catch (error: unknown) {
      try {
        await client.query("ROLLBACK");
      } catch (rollbackError: unknown) {
        logEvent("VECTOR_STORE_ROLLBACK_FAILURE", {
          collection: spec.name,
          message: errorMessage(rollbackError),
        });
      }

      logEvent("VECTOR_STORE_PROVISION_FAILURE", {
        collection: spec.name,
        message: errorMessage(error),
      });

      if (error instanceof CollectionConflictError) {
        throw error;
      }
      throw new InfrastructureError(
        `Failed to provision collection "${spec.name}"`,
        { statusCode: 503, cause: error }
      );
    } finally {
      client.release();
    }
  }

  async get(
    collection: string,
    id: string,
    options: GetOptions
  ): Promise<StoredItem | null> {
    const table = quoteIdent(itemsTableName(this.tablePrefix, collection));
    const embeddingColumn = options.withEmbedding
      ? ", embedding::text AS embedding"
      : "";

    try {
      const result = await this.pool.query(
        `SELECT id, text, description, additional_metadata${embeddingColumn}
         FROM ${table}
         WHERE id = $1`,
        [id]
      );

      if (result.rows.length === 0) {
        return null;
      }
      const row = ItemRowSchema.parse(result.rows[0]);

      return {
        id: row.id,
        text: row.text,
        description: row.description,
        additionalMetadata: row.additional_metadata,
        embedding: row.embedding ? fromPgVectorLiteral(row.embedding) : [],
      };
    } catch (error: unknown) {
      if (isUndefinedTable(error)) {
        return null;
      }
      throw error;
    }
  }

  async upsert(collection: string, item: StoredItem): Promise<void> {
    const table = quoteIdent(itemsTableName(this.tablePrefix, collection));

    try {
      await this.pool.query(
        `INSERT INTO ${table} (id, text, embedding, description, additional_metadata)
         VALUES ($1, $2, $3::vector, $4, $5)
         ON CONFLICT (id) DO UPDATE SET
           text = EXCLUDED.text,
           embedding = EXCLUDED.embedding,
           description = EXCLUDED.description,
           additional_metadata = EXCLUDED.additional_metadata`,
        [
          item.id,
          item.text,
          toPgVectorLiteral(item.embedding),
          item.description,
          item.additionalMetadata,
        ]
      );
    } catch (error: unknown) {
      throw new StoreWriteError(
        `Failed to write item "${item.id}" to "${collection}"`,
        { cause: error, metadata: { collection, id: item.id } }
      );
    }
  }

  async search(
    collection: string,
    queryVector: number[],
    topK: number,
    minRelevance = 0
  ): Promise<SearchResult[]> {
    if (topK <= 0) {
      return [];
    }

    const spec = await this.loadSpec(collection);
    if (!spec) {
      return [];
    }

    const table = itemsTableName(this.tablePrefix, collection);

    try {
      const result = await this.pool.query(
        searchSql(table, spec.metric),
        [toPgVectorLiteral(queryVector), topK]
      );

      return result.rows
        .map((raw) => SearchRowSchema.parse(raw))
        .map((row) => ({
          id: row.id,
          text: row.text,
          additionalMetadata: row.additional_metadata,
          relevance: distanceToRelevance(spec.metric, row.distance),
        }))
        .filter((hit) => hit.relevance >= minRelevance);
    } catch (error: unknown) {
      if (isUndefinedTable(error)) {
        return [];
      }
      throw error;
    }
  }

  private async loadSpec(collection: string): Promise<CollectionSpec | null> {
    const cached = this.specs.get(collection);
    if (cached) {
      return cached;
    }

    try {
      const result = await this.pool.query(
        `SELECT name, dimension, metric, index_kind, index_params
         FROM ${quoteIdent(registryTableName(this.tablePrefix))}
         WHERE name = $1`,
        [collection]
      );

      if (result.rows.length === 0) {
        return null;
      }

      const spec = this.toSpec(result.rows[0]);
      this.specs.set(collection, spec);
      return spec;
    } catch (error: unknown) {
      if (isUndefinedTable(error)) {
        return null;
      }
      throw error;
    }
  }

  private toSpec(row: unknown): CollectionSpec {
    const parsed = RegistryRowSchema.parse(row);
    return {
      name: parsed.name,
      dimension: parsed.dimension,
      metric: parsed.metric,
      indexKind: parsed.index_kind,
      indexParams: parsed.index_params,
    };
  }
}
