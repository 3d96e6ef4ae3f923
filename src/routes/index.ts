/**
 * Express route registration.
 *
 * - GET  /api/health: chat gateway connectivity
 * - POST /api/ingest: batch ingestion into a collection
 * - POST /api/search: raw semantic search
 * - POST /api/chat, /api/chat/stream: grounded answers
 */
import type { AppContainer } from "@app/container";
import { createChatRouter } from "@routes/public/chat";
import { createHealthRouter } from "@routes/public/health";
import { createIngestRouter } from "@routes/public/ingest";
import { createSearchRouter } from "@routes/public/search";
import type { Express } from "express";

export function registerRoutes(app: Express, container: AppContainer): void {
  app.use("/api/health", createHealthRouter(container.chat));
  app.use(
    "/api/ingest",
    createIngestRouter({
      engine: container.engine,
      store: container.store,
      defaultCollection: container.collection.name,
    })
  );
  app.use("/api/search", createSearchRouter(container.responder));
  app.use("/api/chat", createChatRouter(container.responder));
}
