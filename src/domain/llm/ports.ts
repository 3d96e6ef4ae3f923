/**
 * Domain port for chat completions.
 *
 * The responder hands over a fully rendered prompt; instruction following
 * ("answer only from the record, otherwise say I don't know") is the model's
 * job. `stream` yields text fragments whose concatenation equals what
 * `complete` would return for the same prompt and parameters.
 */
export interface CompletionParams {
  maxTokens: number;
  temperature: number;
  topP: number;
}

export interface StreamOptions {
  signal?: AbortSignal;
}

export interface ChatGateway {
  complete(prompt: string, params: CompletionParams): Promise<string>;

  stream(
    prompt: string,
    params: CompletionParams,
    options?: StreamOptions
  ): AsyncIterable<string>;
}
