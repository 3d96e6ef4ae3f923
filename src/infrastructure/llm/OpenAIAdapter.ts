/**
 * OpenAI SDK client and Mastra agent factories.
 *
 * - createOpenAIClient: configured SDK client shared with the embedding adapter
 * - createMastraAgent: the grounded-answer agent over `@ai-sdk/openai`
 */
import { openai as mastraOpenAI } from "@ai-sdk/openai";
import { config, requireOpenAIKey } from "@config/index";
import type { CompletionAgent } from "@infra/llm/MastraChatGateway";
import { Agent } from "@mastra/core/agent";
import OpenAI from "openai";

export function createOpenAIClient(): OpenAI {
  return new OpenAI({
    apiKey: requireOpenAIKey(),
    baseURL: config.openai.baseUrl,
    timeout: config.openai.timeoutMs,
  });
}

const AGENT_INSTRUCTIONS = `
You answer questions using only the context supplied in each prompt.
Follow the instructions at the top of the prompt exactly.
Never invent facts that are not present in the supplied record.
Be concise and clear.
`;

export function createMastraAgent(
  model: string = config.openai.model
): CompletionAgent {
  requireOpenAIKey();

  const agent = new Agent({
    name: "grounded-answer-agent",
    instructions: AGENT_INSTRUCTIONS,
    model: mastraOpenAI(model),
  });

  return {
    generate: async (prompt, options) => {
      const result = await agent.generate(prompt, options);
      return { text: result.text };
    },
    stream: async (prompt, options) => {
      const result = await agent.stream(prompt, options);
      return { textStream: result.textStream };
    },
  };
}
