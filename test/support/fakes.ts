import type { EmbeddingGateway } from "@domain/embedding/ports";
import type {
  ChatGateway,
  CompletionParams,
  StreamOptions,
} from "@domain/llm/ports";
import type {
  CollectionSpec,
  GetOptions,
  SearchResult,
  StoredItem,
  VectorStore,
} from "@domain/vectorstore/ports";

/**
 * Bag-of-keywords embeddings: one dimension per vocabulary word, holding how
 * often the word occurs in the text. Cosine similarities are therefore easy
 * to work out by hand.
 */
export class KeywordEmbeddingGateway implements EmbeddingGateway {
  readonly model = "keyword-fixture";
  readonly calls: string[] = [];
  failOn: ((text: string) => boolean) | null = null;

  constructor(private readonly vocabulary: readonly string[]) {}

  get dimension(): number {
    return this.vocabulary.length;
  }

  async embed(text: string): Promise<number[]> {
    this.calls.push(text);

    if (this.failOn?.(text)) {
      throw new Error("embedding backend unavailable");
    }

    const tokens = text.toLowerCase().match(/[a-z0-9]+/g) ?? [];
    return this.vocabulary.map(
      (word) => tokens.filter((token) => token === word).length
    );
  }
}

/**
 * Deterministic chat model: the reply depends only on the prompt, and the
 * stream cuts the same reply into fixed-size fragments.
 */
export class ScriptedChatGateway implements ChatGateway {
  readonly prompts: string[] = [];
  failStreamAfter: number | null = null;

  constructor(
    private readonly reply: (prompt: string) => string = (prompt) =>
      `Answer drawn from ${prompt.length} characters of context.`,
    private readonly fragmentSize = 7
  ) {}

  async complete(prompt: string, _params: CompletionParams): Promise<string> {
    this.prompts.push(prompt);
    return this.reply(prompt);
  }

  async *stream(
    prompt: string,
    _params: CompletionParams,
    options: StreamOptions = {}
  ): AsyncGenerator<string, void, undefined> {
    this.prompts.push(prompt);
    const text = this.reply(prompt);

    for (let start = 0, n = 0; start < text.length; start += this.fragmentSize, n += 1) {
      if (this.failStreamAfter !== null && n >= this.failStreamAfter) {
        throw new Error("stream interrupted");
      }
      options.signal?.throwIfAborted();
      yield text.slice(start, start + this.fragmentSize);
    }
  }
}

/** Wraps a store and lets a test make lookups or writes fail. */
export class FlakyVectorStore implements VectorStore {
  failGet: ((id: string) => boolean) | null = null;
  failUpsert: ((id: string) => boolean) | null = null;
  readonly getCalls: string[] = [];
  readonly upsertCalls: string[] = [];

  constructor(private readonly inner: VectorStore) {}

  ensureCollection(spec: CollectionSpec): Promise<void> {
    return this.inner.ensureCollection(spec);
  }

  async get(
    collection: string,
    id: string,
    options: GetOptions
  ): Promise<StoredItem | null> {
    this.getCalls.push(id);
    if (this.failGet?.(id)) {
      throw new Error("connection reset by peer");
    }
    return this.inner.get(collection, id, options);
  }

  async upsert(collection: string, item: StoredItem): Promise<void> {
    this.upsertCalls.push(item.id);
    if (this.failUpsert?.(item.id)) {
      throw new Error("disk full");
    }
    return this.inner.upsert(collection, item);
  }

  search(
    collection: string,
    queryVector: number[],
    topK: number,
    minRelevance?: number
  ): Promise<SearchResult[]> {
    return this.inner.search(collection, queryVector, topK, minRelevance);
  }
}

export const COMPLETION: CompletionParams = {
  maxTokens: 256,
  temperature: 0,
  topP: 1,
};

export async function collect(stream: AsyncIterable<string>): Promise<string[]> {
  const fragments: string[] = [];
  for await (const fragment of stream) {
    fragments.push(fragment);
  }
  return fragments;
}
