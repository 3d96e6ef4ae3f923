/**
 * Retrieval-augmented answers grounded in the single most relevant record.
 *
 * Orchestrates one turn:
 * - appends the user's query to the history (when one is given);
 * - embeds the query and searches the collection;
 * - renders the grounded prompt around `results[0]`;
 * - asks the chat gateway, as one string or as a stream of fragments;
 * - appends the assistant's full answer to the history.
 *
 * An empty search result raises NoGroundingFoundError before any chat call,
 * so callers can tell "I don't know" apart from an outage.
 */
import type { ConversationHistory } from "@domain/chat/ConversationHistory";
import {
  GROUNDED_ANSWER_TEMPLATE,
  renderPrompt,
} from "@domain/chat/promptTemplate";
import type { PromptTemplate } from "@domain/chat/promptTemplate";
import type { EmbeddingGateway } from "@domain/embedding/ports";
import {
  ChatServiceError,
  EmbeddingServiceError,
  errorMessage,
  NoGroundingFoundError,
  ValidationError,
} from "@domain/errors";
import type { ChatGateway, CompletionParams } from "@domain/llm/ports";
import type { SearchResult, VectorStore } from "@domain/vectorstore/ports";
import { byRelevanceDesc } from "@domain/vectorstore/relevance";
import { logEvent } from "@infra/logging/Logger";

export interface SearchTopOptions {
  collection?: string;
  /** Defaults to 1: grounding uses a single best record. */
  limit?: number;
  minRelevance?: number;
  signal?: AbortSignal;
}

export interface AnswerOptions {
  collection?: string;
  params?: Partial<CompletionParams>;
  signal?: AbortSignal;
  /** Called with the grounding record once the search has succeeded. */
  onGrounded?: (grounding: SearchResult) => void;
}

export interface RetrievalResponderDeps {
  embeddings: EmbeddingGateway;
  store: VectorStore;
  chat: ChatGateway;
  collection: string;
  completion: CompletionParams;
  minRelevance?: number;
  template?: PromptTemplate;
}

interface PreparedTurn {
  prompt: string;
  params: CompletionParams;
  collection: string;
}

export class RetrievalResponder {
  private readonly embeddings: EmbeddingGateway;
  private readonly store: VectorStore;
  private readonly chat: ChatGateway;
  private readonly collection: string;
  private readonly completion: CompletionParams;
  private readonly minRelevance: number;
  private readonly template: PromptTemplate;

  constructor(deps: RetrievalResponderDeps) {
    this.embeddings = deps.embeddings;
    this.store = deps.store;
    this.chat = deps.chat;
    this.collection = deps.collection;
    this.completion = deps.completion;
    this.minRelevance = deps.minRelevance ?? 0;
    this.template = deps.template ?? GROUNDED_ANSWER_TEMPLATE;
  }

  get defaultCollection(): string {
    return this.collection;
  }

  async searchTop(
    query: string,
    options: SearchTopOptions = {}
  ): Promise<SearchResult[]> {
    const collection = options.collection ?? this.collection;
    const limit = options.limit ?? 1;
    const minRelevance = options.minRelevance ?? this.minRelevance;
    const normalized = query.trim();

    if (!normalized) {
      throw new ValidationError("query is required");
    }

    options.signal?.throwIfAborted();
    const queryVector = await this.embedQuery(normalized);

    options.signal?.throwIfAborted();
    const results = await this.store.search(
      collection,
      queryVector,
      limit,
      minRelevance
    );
    const ordered = [...results].sort(byRelevanceDesc);

    logEvent("RAG_SEARCH", {
      collection,
      limit,
      minRelevance,
      returned: ordered.length,
      topRelevance: ordered[0]?.relevance ?? null,
    });

    return ordered;
  }

  async answer(
    query: string,
    history?: ConversationHistory | null,
    options: AnswerOptions = {}
  ): Promise<string> {
    const turn = await this.prepare(query, history ?? null, options);
    const startedAt = Date.now();

    let text: string;
    try {
      text = await this.chat.complete(turn.prompt, turn.params);
    } catch (error: unknown) {
      throw toChatError(error);
    }

    history?.addAssistantMessage(text);

    logEvent("CHAT_ANSWER", {
      collection: turn.collection,
      streamed: false,
      answerLength: text.length,
      historyLength: history?.length ?? 0,
      durationMs: Date.now() - startedAt,
    });

    return text;
  }

  /**
   * Searches and renders eagerly, then hands back a lazy single-consumer
   * stream. The history only gains the assistant entry once the stream has
   * been read to the end.
   */
  async answerStream(
    query: string,
    history?: ConversationHistory | null,
    options: AnswerOptions = {}
  ): Promise<AsyncGenerator<string, void, undefined>> {
    const turn = await this.prepare(query, history ?? null, options);
    return this.streamFragments(turn, history ?? null, options.signal);
  }

  private async *streamFragments(
    turn: PreparedTurn,
    history: ConversationHistory | null,
    signal: AbortSignal | undefined
  ): AsyncGenerator<string, void, undefined> {
    const fragments: string[] = [];
    const startedAt = Date.now();

    try {
      for await (const fragment of this.chat.stream(turn.prompt, turn.params, {
        signal,
      })) {
        signal?.throwIfAborted();
        fragments.push(fragment);
        yield fragment;
      }
    } catch (error: unknown) {
      if (signal?.aborted) {
        throw error;
      }
      throw toChatError(error);
    }

    const text = fragments.join("");
    history?.addAssistantMessage(text);

    logEvent("CHAT_ANSWER", {
      collection: turn.collection,
      streamed: true,
      fragments: fragments.length,
      answerLength: text.length,
      historyLength: history?.length ?? 0,
      durationMs: Date.now() - startedAt,
    });
  }

  private async prepare(
    query: string,
    history: ConversationHistory | null,
    options: AnswerOptions
  ): Promise<PreparedTurn> {
    const collection = options.collection ?? this.collection;

    if (!query.trim()) {
      throw new ValidationError("query is required");
    }

    history?.addUserMessage(query);

    const results = await this.searchTop(query, {
      collection,
      limit: 1,
      signal: options.signal,
    });
    const grounding = results[0];

    if (!grounding) {
      logEvent("RAG_NO_GROUNDING", { collection });
      throw new NoGroundingFoundError(query, collection);
    }

    options.onGrounded?.(grounding);

    const prompt = renderPrompt(this.template, {
      db_record: grounding.additionalMetadata ?? grounding.text,
      query_term: query,
      history: history ? history.toTranscript() : undefined,
    });

    return {
      prompt,
      params: { ...this.completion, ...options.params },
      collection,
    };
  }

  private async embedQuery(query: string): Promise<number[]> {
    try {
      return await this.embeddings.embed(query);
    } catch (error: unknown) {
      if (error instanceof EmbeddingServiceError) {
        throw error;
      }
      throw new EmbeddingServiceError("Query embedding failed", {
        cause: error,
      });
    }
  }
}

function toChatError(error: unknown): ChatServiceError {
  if (error instanceof ChatServiceError) {
    return error;
  }
  return new ChatServiceError(`Chat completion failed: ${errorMessage(error)}`, {
    cause: error,
  });
}
