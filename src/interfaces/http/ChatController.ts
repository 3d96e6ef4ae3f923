/**
 * Chat HTTP controllers.
 *
 * - POST /api/chat: one grounded answer as JSON
 * - POST /api/chat/stream: the same answer as Server-Sent Events
 *   (`delta` frames, then `done` with the updated history, or `error`)
 *
 * Failures before the first frame (validation, no grounding, search outage)
 * go through the error handler as ordinary JSON errors.
 */
import { handleChat, handleChatStream } from "@app/chat/ChatUseCase";
import type { ChatStreamHandle } from "@app/chat/ChatUseCase";
import { errorMessage } from "@domain/errors";
import type { RetrievalResponder } from "@domain/rag/RetrievalResponder";
import { logger } from "@infra/logging/Logger";
import {
  ChatRequestSchema,
  ChatResponseSchema,
} from "@interfaces/http/chat/schema";
import { validateResponse } from "@interfaces/http/http";
import type {
  BodyRequest,
  JsonResponse,
  NextHandler,
} from "@interfaces/http/http";
import { abortOnDisconnect, openSse } from "@interfaces/http/sse";
import type { SseResponse } from "@interfaces/http/sse";
import { toAppError } from "@middleware/errorHandler";

export function createChatController(responder: RetrievalResponder) {
  return async function chatController(
    req: BodyRequest,
    res: JsonResponse,
    next: NextHandler
  ): Promise<void> {
    try {
      const request = ChatRequestSchema.parse(req.body);
      const result = await handleChat(responder, request);

      res.json(validateResponse(ChatResponseSchema, result));
    } catch (err: unknown) {
      next(err);
    }
  };
}

export function createChatStreamController(responder: RetrievalResponder) {
  return async function chatStreamController(
    req: BodyRequest,
    res: SseResponse,
    next: NextHandler
  ): Promise<void> {
    const signal = abortOnDisconnect(res);
    let handle: ChatStreamHandle;

    try {
      const request = ChatRequestSchema.parse(req.body);
      handle = await handleChatStream(responder, request, signal);
    } catch (err: unknown) {
      next(err);
      return;
    }

    const sse = openSse(res);

    try {
      for await (const text of handle.fragments) {
        sse.send("delta", { text });
      }
      sse.send("done", {
        history: handle.history(),
        grounding: handle.grounding,
      });
    } catch (err: unknown) {
      if (signal.aborted) {
        logger.log("info", "CHAT_STREAM_DISCONNECTED", {
          requestId: handle.requestId,
        });
      } else {
        const appError = toAppError(err);
        logger.log("error", "CHAT_STREAM_FAILED", {
          requestId: handle.requestId,
          message: errorMessage(err),
        });
        sse.send("error", { message: appError.message, code: appError.type });
      }
    } finally {
      sse.close();
    }
  };
}
