/**
 * Health check API route for system monitoring.
 *
 * - GET /api/health: pings the chat gateway and reports its status
 */
import { errorMessage } from "@domain/errors";
import type { ChatGateway } from "@domain/llm/ports";
import { Router } from "express";

const PING_PARAMS = { maxTokens: 5, temperature: 0, topP: 1 };

export function createHealthRouter(chat: ChatGateway): Router {
  const router = Router();

  router.get("/", async (_req, res) => {
    try {
      const test = await chat.complete("ping", PING_PARAMS);
      res.json({
        status: "ok",
        llm: "connected",
        response: test,
      });
    } catch (error: unknown) {
      res.status(500).json({
        status: "error",
        llm: "disconnected",
        detail: errorMessage(error),
      });
    }
  });

  return router;
}
