/**
 * Composition root: wires the configured adapters into the pipeline.
 *
 * VECTOR_STORE selects pgvector (default) or the process-local store.
 */
import { config } from "@config/index";
import type { EmbeddingGateway } from "@domain/embedding/ports";
import { IngestionEngine } from "@domain/ingest/IngestionEngine";
import type { ChatGateway } from "@domain/llm/ports";
import { RetrievalResponder } from "@domain/rag/RetrievalResponder";
import { collectionSpecFromConfig } from "@domain/vectorstore/collections";
import type { CollectionSpec, VectorStore } from "@domain/vectorstore/ports";
import { createPool, toSqlPool } from "@infra/database/db";
import { OpenAIEmbeddingGateway } from "@infra/llm/EmbeddingProvider";
import { MastraChatGateway } from "@infra/llm/MastraChatGateway";
import { createMastraAgent, createOpenAIClient } from "@infra/llm/OpenAIAdapter";
import { InMemoryVectorStore } from "@infra/vectorstore/InMemoryVectorStore";
import { PgVectorStore } from "@infra/vectorstore/PgVectorStore";

export interface AppContainer {
  store: VectorStore;
  embeddings: EmbeddingGateway;
  chat: ChatGateway;
  engine: IngestionEngine;
  responder: RetrievalResponder;
  collection: CollectionSpec;
  close(): Promise<void>;
}

export function createContainer(): AppContainer {
  let store: VectorStore;
  let close = async (): Promise<void> => undefined;

  if (config.vectorStore.driver === "postgres") {
    const pool = createPool();
    store = new PgVectorStore(toSqlPool(pool), config.vectorStore.tablePrefix);
    close = () => pool.end();
  } else {
    store = new InMemoryVectorStore();
  }

  const embeddings = new OpenAIEmbeddingGateway(
    createOpenAIClient(),
    config.openai.embeddingModel,
    config.vectorStore.dimension
  );
  const chat = new MastraChatGateway(
    createMastraAgent(config.openai.model),
    config.openai.model
  );
  const collection = collectionSpecFromConfig();

  const engine = new IngestionEngine({ embeddings, store });
  const responder = new RetrievalResponder({
    embeddings,
    store,
    chat,
    collection: collection.name,
    minRelevance: config.rag.minRelevance,
    completion: {
      maxTokens: config.chat.maxTokens,
      temperature: config.chat.temperature,
      topP: config.chat.topP,
    },
  });

  return { store, embeddings, chat, engine, responder, collection, close };
}
