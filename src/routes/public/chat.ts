import type { RetrievalResponder } from "@domain/rag/RetrievalResponder";
import {
  createChatController,
  createChatStreamController,
} from "@interfaces/http/ChatController";
import { Router } from "express";

// Delegate HTTP handling to the ChatController, which in turn calls ChatUseCase
export function createChatRouter(responder: RetrievalResponder): Router {
  const router = Router();

  router.post("/", createChatController(responder));
  router.post("/stream", createChatStreamController(responder));

  return router;
}
