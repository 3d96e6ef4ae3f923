/**
 * ChatGateway over a Mastra agent: rendered prompt in, completion (or text
 * stream) out. Transient failures are retried; everything else surfaces as
 * ChatServiceError, except a stream stopped by its abort signal.
 */
import { config } from "@config/index";
import { ChatServiceError, errorMessage } from "@domain/errors";
import type {
  ChatGateway,
  CompletionParams,
  StreamOptions,
} from "@domain/llm/ports";
import { withRetry } from "@infra/llm/retry";
import { logEvent } from "@infra/logging/Logger";

export interface AgentCallOptions {
  maxTokens: number;
  temperature: number;
  topP: number;
  abortSignal?: AbortSignal;
}

/** The slice of a Mastra Agent the gateway calls. */
export interface CompletionAgent {
  generate(prompt: string, options: AgentCallOptions): Promise<{ text: string }>;
  stream(
    prompt: string,
    options: AgentCallOptions
  ): Promise<{ textStream: AsyncIterable<string> }>;
}

export class MastraChatGateway implements ChatGateway {
  constructor(
    private readonly agent: CompletionAgent,
    private readonly model: string = config.openai.model
  ) {}

  async complete(prompt: string, params: CompletionParams): Promise<string> {
    const startedAt = Date.now();

    try {
      const result = await withRetry(
        () =>
          this.agent.generate(prompt, {
            maxTokens: params.maxTokens,
            temperature: params.temperature,
            topP: params.topP,
          }),
        "llm.generate"
      );

      logEvent("LLM_SUCCESS", {
        model: this.model,
        durationMs: Date.now() - startedAt,
        promptLength: prompt.length,
        answerLength: result.text.length,
      });

      return result.text;
    } catch (error: unknown) {
      logEvent("LLM_FAILURE", {
        model: this.model,
        durationMs: Date.now() - startedAt,
        message: errorMessage(error),
      });

      throw new ChatServiceError("LLM request failed. Check API key or model.", {
        cause: error,
      });
    }
  }

  async *stream(
    prompt: string,
    params: CompletionParams,
    options: StreamOptions = {}
  ): AsyncGenerator<string, void, undefined> {
    const startedAt = Date.now();
    let fragments = 0;

    try {
      const result = await withRetry(
        () =>
          this.agent.stream(prompt, {
            maxTokens: params.maxTokens,
            temperature: params.temperature,
            topP: params.topP,
            abortSignal: options.signal,
          }),
        "llm.stream"
      );

      for await (const fragment of result.textStream) {
        fragments += 1;
        yield fragment;
      }
    } catch (error: unknown) {
      logEvent("LLM_STREAM_FAILURE", {
        model: this.model,
        durationMs: Date.now() - startedAt,
        fragments,
        message: errorMessage(error),
      });

      if (options.signal?.aborted) {
        throw error;
      }
      throw new ChatServiceError("LLM stream failed. Check API key or model.", {
        cause: error,
      });
    }

    logEvent("LLM_STREAM_SUCCESS", {
      model: this.model,
      durationMs: Date.now() - startedAt,
      promptLength: prompt.length,
      fragments,
    });
  }
}
