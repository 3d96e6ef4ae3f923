/**
 * Chat use-case for the HTTP surface.
 *
 * Requests carry the conversation so far; the server keeps no session state.
 * Each turn:
 * - Rebuilds a ConversationHistory from the request (system message first)
 * - Delegates to the RetrievalResponder for grounding and generation
 * - Returns the answer with the updated history and the grounding record
 */
import crypto from "crypto";

import { ConversationHistory } from "@domain/chat/ConversationHistory";
import type { ChatRole, HistoryEntry } from "@domain/chat/ConversationHistory";
import { errorMessage, ValidationError } from "@domain/errors";
import type { RetrievalResponder } from "@domain/rag/RetrievalResponder";
import type { SearchResult } from "@domain/vectorstore/ports";
import { logEvent } from "@infra/logging/Logger";

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface ChatRequest {
  question: string;
  collection?: string;
  systemMessage?: string;
  history?: ChatMessage[];
}

export interface GroundingRef {
  id: string;
  relevance: number;
}

export interface ChatResponsePayload {
  answer: string;
  history: ChatMessage[];
  grounding: GroundingRef | null;
}

export interface ChatStreamHandle {
  requestId: string;
  grounding: GroundingRef | null;
  fragments: AsyncGenerator<string, void, undefined>;
  /** Includes the assistant answer once `fragments` has been read to the end. */
  history(): ChatMessage[];
}

export function toChatMessages(history: ConversationHistory): ChatMessage[] {
  return history.entries.map((entry) => ({
    role: entry.role,
    content: entry.text,
  }));
}

export function buildHistory(request: ChatRequest): ConversationHistory {
  const entries: HistoryEntry[] = (request.history ?? []).map((message) => ({
    role: message.role,
    text: message.content,
  }));

  if (request.systemMessage && entries[0]?.role !== "system") {
    entries.unshift({ role: "system", text: request.systemMessage });
  }

  try {
    return ConversationHistory.fromEntries(entries);
  } catch (err: unknown) {
    throw new ValidationError("Invalid history", {
      reason: errorMessage(err),
    });
  }
}

function toGroundingRef(result: SearchResult): GroundingRef {
  return { id: result.id, relevance: result.relevance };
}

export async function handleChat(
  responder: RetrievalResponder,
  request: ChatRequest
): Promise<ChatResponsePayload> {
  const requestId = crypto.randomUUID();
  const startTime = Date.now();
  const history = buildHistory(request);
  let grounding: GroundingRef | null = null;

  logEvent("CHAT_REQUEST", {
    requestId,
    collection: request.collection ?? responder.defaultCollection,
    questionLength: request.question.length,
    historyLength: history.length,
  });

  const answer = await responder.answer(request.question, history, {
    collection: request.collection,
    onGrounded: (result) => {
      grounding = toGroundingRef(result);
    },
  });

  logEvent("CHAT_RESPONSE", {
    requestId,
    answerLength: answer.length,
    durationMs: Date.now() - startTime,
  });

  return {
    answer,
    history: toChatMessages(history),
    grounding,
  };
}

export async function handleChatStream(
  responder: RetrievalResponder,
  request: ChatRequest,
  signal?: AbortSignal
): Promise<ChatStreamHandle> {
  const requestId = crypto.randomUUID();
  const history = buildHistory(request);
  let grounding: GroundingRef | null = null;

  logEvent("CHAT_REQUEST", {
    requestId,
    collection: request.collection ?? responder.defaultCollection,
    questionLength: request.question.length,
    historyLength: history.length,
    streamed: true,
  });

  const fragments = await responder.answerStream(request.question, history, {
    collection: request.collection,
    signal,
    onGrounded: (result) => {
      grounding = toGroundingRef(result);
    },
  });

  return {
    requestId,
    grounding,
    fragments,
    history: () => toChatMessages(history),
  };
}
