/**
 * One interactive conversation: a history plus the turn state machine
 *
 *   idle -> awaiting_query -> searching -> generating -> awaiting_query ... -> idle
 *
 * A session runs one turn at a time; asking while a turn is in flight fails
 * with SessionBusyError.
 */
import { ConversationHistory } from "@domain/chat/ConversationHistory";
import { SessionBusyError } from "@domain/errors";
import type { RetrievalResponder } from "@domain/rag/RetrievalResponder";

export type SessionState = "idle" | "awaiting_query" | "searching" | "generating";

export const EXIT_COMMAND = "exit";

export function isExitCommand(input: string): boolean {
  return input.trim().toLowerCase() === EXIT_COMMAND;
}

export interface ChatSessionOptions {
  collection?: string;
  systemMessage?: string;
  onStateChange?: (state: SessionState) => void;
}

export interface AskOptions {
  onFragment?: (fragment: string) => void;
  signal?: AbortSignal;
}

export class ChatSession {
  readonly history: ConversationHistory;
  private current: SessionState = "idle";

  constructor(
    private readonly responder: RetrievalResponder,
    private readonly options: ChatSessionOptions = {}
  ) {
    this.history = new ConversationHistory(options.systemMessage);
  }

  get state(): SessionState {
    return this.current;
  }

  get busy(): boolean {
    return this.current === "searching" || this.current === "generating";
  }

  start(): void {
    if (this.current === "idle") {
      this.transition("awaiting_query");
    }
  }

  /** Streams one grounded answer and resolves with its full text. */
  async ask(query: string, options: AskOptions = {}): Promise<string> {
    if (this.busy) {
      throw new SessionBusyError();
    }

    this.transition("searching");

    try {
      const stream = await this.responder.answerStream(query, this.history, {
        collection: this.options.collection,
        signal: options.signal,
        onGrounded: () => this.transition("generating"),
      });

      let answer = "";
      for await (const fragment of stream) {
        answer += fragment;
        options.onFragment?.(fragment);
      }
      return answer;
    } finally {
      this.transition("awaiting_query");
    }
  }

  close(): void {
    if (this.busy) {
      throw new SessionBusyError();
    }
    this.transition("idle");
  }

  private transition(next: SessionState): void {
    if (next === this.current) {
      return;
    }
    this.current = next;
    this.options.onStateChange?.(next);
  }
}
