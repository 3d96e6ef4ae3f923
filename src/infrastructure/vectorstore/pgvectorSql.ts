/**
 * SQL text for the pgvector adapter.
 *
 * Each collection lives in its own table (`<prefix><collection>`) with a
 * fixed-dimension `vector` column; a registry table records the spec each
 * collection was provisioned with. Identifiers are validated before they get
 * here and quoted on the way out.
 */
import { isValidCollectionName } from "@domain/vectorstore/collections";
import type {
  CollectionSpec,
  DistanceMetric,
} from "@domain/vectorstore/ports";

const OPERATORS: Record<DistanceMetric, { op: string; opclass: string }> = {
  cosine: { op: "<=>", opclass: "vector_cosine_ops" },
  euclidean: { op: "<->", opclass: "vector_l2_ops" },
  "dot-product": { op: "<#>", opclass: "vector_ip_ops" },
};

export function quoteIdent(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

export function distanceOperator(metric: DistanceMetric): string {
  return OPERATORS[metric].op;
}

export function registryTableName(prefix: string): string {
  return `${prefix}collections`;
}

export function itemsTableName(prefix: string, collection: string): string {
  if (!isValidCollectionName(collection)) {
    throw new Error(
      `Invalid collection name "${collection}": use lowercase letters, digits and underscores`
    );
  }
  return `${prefix}${collection}`;
}

export function createRegistryTableSql(prefix: string): string {
  return `CREATE TABLE IF NOT EXISTS ${quoteIdent(registryTableName(prefix))} (
  name TEXT PRIMARY KEY,
  dimension INTEGER NOT NULL,
  metric TEXT NOT NULL,
  index_kind TEXT NOT NULL,
  index_params JSONB NOT NULL DEFAULT '{}'::jsonb
)`;
}

export function createItemsTableSql(table: string, dimension: number): string {
  if (!Number.isInteger(dimension) || dimension <= 0) {
    throw new Error(`Invalid embedding dimension: ${dimension}`);
  }

  return `CREATE TABLE IF NOT EXISTS ${quoteIdent(table)} (
  id TEXT PRIMARY KEY,
  text TEXT NOT NULL,
  embedding vector(${dimension}) NOT NULL,
  description TEXT NOT NULL DEFAULT '',
  additional_metadata TEXT
)`;
}

function positiveInt(name: string, value: number | undefined): number {
  if (value === undefined || !Number.isInteger(value) || value <= 0) {
    throw new Error(`Index parameter ${name} must be a positive integer`);
  }
  return value;
}

/** CREATE INDEX statement for the spec, or null when no index is wanted. */
export function createIndexSql(
  table: string,
  spec: CollectionSpec
): string | null {
  const { opclass } = OPERATORS[spec.metric];
  const indexName = quoteIdent(`${table}_embedding_idx`);

  switch (spec.indexKind) {
    case "none":
      return null;
    case "hnsw": {
      const m = positiveInt("m", spec.indexParams.m);
      const ef = positiveInt("efConstruction", spec.indexParams.efConstruction);
      return `CREATE INDEX IF NOT EXISTS ${indexName} ON ${quoteIdent(table)} USING hnsw (embedding ${opclass}) WITH (m = ${m}, ef_construction = ${ef})`;
    }
    case "ivfflat": {
      const lists = positiveInt("lists", spec.indexParams.lists);
      return `CREATE INDEX IF NOT EXISTS ${indexName} ON ${quoteIdent(table)} USING ivfflat (embedding ${opclass}) WITH (lists = ${lists})`;
    }
  }
}

export function searchSql(table: string, metric: DistanceMetric): string {
  const op = distanceOperator(metric);
  return `SELECT id, text, additional_metadata, embedding ${op} $1::vector AS distance
FROM ${quoteIdent(table)}
ORDER BY embedding ${op} $1::vector
LIMIT $2`;
}
