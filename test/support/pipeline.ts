import { IngestionEngine } from "@domain/ingest/IngestionEngine";
import type { IngestRecord } from "@domain/ingest/IngestionEngine";
import { RetrievalResponder } from "@domain/rag/RetrievalResponder";
import type { RetrievalResponderDeps } from "@domain/rag/RetrievalResponder";
import { InMemoryVectorStore } from "@infra/vectorstore/InMemoryVectorStore";

import { COMPLETION, KeywordEmbeddingGateway, ScriptedChatGateway } from "./fakes";

export const VOCABULARY = ["godfather", "space", "shark", "wizard", "robot"];
export const COLLECTION = "movies";

// embeddings: [2,0,0,0,0]
export const GODFATHER: IngestRecord = {
  id: "1",
  title: "The Godfather",
  content: "The Godfather is a crime saga about the godfather of a mafia family",
};

export const MOVIES: IngestRecord[] = [
  GODFATHER,
  // [0,0,2,0,0]
  {
    id: "2",
    title: "Jaws",
    content: "A shark hunts swimmers off a beach town and the shark is huge",
  },
  // [0,1,0,0,1]
  {
    id: "3",
    title: "WALL-E",
    content: "A lonely robot drifts through space",
  },
  // [0,0,0,1,0]
  {
    id: "4",
    title: "The Sorcerer",
    content: "A wizard takes an apprentice",
  },
];

/** In-memory store seeded with MOVIES, and a responder over it. */
export async function seededPipeline(
  overrides: Partial<RetrievalResponderDeps> = {}
) {
  const store = new InMemoryVectorStore();
  const embeddings = new KeywordEmbeddingGateway(VOCABULARY);
  const chat = new ScriptedChatGateway();
  const engine = new IngestionEngine({ embeddings, store });

  await store.ensureCollection({
    name: COLLECTION,
    dimension: VOCABULARY.length,
    metric: "cosine",
    indexKind: "none",
    indexParams: {},
  });
  await engine.upsertBatch(MOVIES, COLLECTION);
  embeddings.calls.length = 0;

  const responder = new RetrievalResponder({
    embeddings,
    store,
    chat,
    collection: COLLECTION,
    completion: COMPLETION,
    ...overrides,
  });

  return { store, embeddings, chat, engine, responder };
}
