import { config } from "@config/index";

import type { CollectionSpec, IndexParams } from "./ports";

const COLLECTION_NAME = /^[a-z_][a-z0-9_]{0,47}$/;

export function isValidCollectionName(name: string): boolean {
  return COLLECTION_NAME.test(name);
}

function sameIndexParams(a: IndexParams, b: IndexParams): boolean {
  return (
    a.m === b.m && a.efConstruction === b.efConstruction && a.lists === b.lists
  );
}

export function sameCollectionSpec(
  a: CollectionSpec,
  b: CollectionSpec
): boolean {
  return (
    a.name === b.name &&
    a.dimension === b.dimension &&
    a.metric === b.metric &&
    a.indexKind === b.indexKind &&
    sameIndexParams(a.indexParams, b.indexParams)
  );
}

/** The collection spec described by configuration, for `name`. */
export function collectionSpecFromConfig(
  name: string = config.vectorStore.collection
): CollectionSpec {
  const { dimension, metric, indexKind, hnsw, ivfflat } = config.vectorStore;

  let indexParams: IndexParams = {};
  if (indexKind === "hnsw") {
    indexParams = { m: hnsw.m, efConstruction: hnsw.efConstruction };
  } else if (indexKind === "ivfflat") {
    indexParams = { lists: ivfflat.lists };
  }

  return { name, dimension, metric, indexKind, indexParams };
}
