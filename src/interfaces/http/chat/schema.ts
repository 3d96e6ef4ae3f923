import { CollectionNameSchema } from "@interfaces/http/http";
import { z } from "zod";

/**
 * Zod DTOs for the chat endpoints (JSON and SSE).
 *
 * - ChatRequestSchema: question plus the conversation so far
 * - ChatResponseSchema: answer, updated history and the grounding record
 */
export const ChatMessageSchema = z.object({
  role: z.enum(["system", "user", "assistant"]),
  content: z.string(),
});

export const ChatRequestSchema = z.object({
  question: z.string().trim().min(1),
  collection: CollectionNameSchema.optional(),
  systemMessage: z.string().optional(),
  history: z.array(ChatMessageSchema).optional(),
});

export const GroundingSchema = z
  .object({
    id: z.string(),
    relevance: z.number().min(0).max(1),
  })
  .nullable();

export const ChatResponseSchema = z.object({
  answer: z.string(),
  history: z.array(ChatMessageSchema),
  grounding: GroundingSchema,
});

export type ChatRequestBody = z.infer<typeof ChatRequestSchema>;
