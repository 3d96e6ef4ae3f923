import { EmbeddingServiceError, ValidationError } from "@domain/errors";
import OpenAI from "openai";

import { OpenAIEmbeddingGateway } from "./EmbeddingProvider";

function embeddingResponse(vectors: number[][]) {
  return {
    object: "list" as const,
    model: "text-embedding-3-small",
    data: vectors.map((embedding, index) => ({
      object: "embedding" as const,
      index,
      embedding,
    })),
    usage: { prompt_tokens: 2, total_tokens: 2 },
  };
}

describe("OpenAIEmbeddingGateway", () => {
  let client: OpenAI;

  beforeEach(() => {
    client = new OpenAI({ apiKey: "test-key" });
  });

  it("asks text-embedding-3 models for the configured dimension", async () => {
    const create = jest
      .spyOn(client.embeddings, "create")
      .mockResolvedValue(embeddingResponse([[0.1, 0.2, 0.3]]));
    const gateway = new OpenAIEmbeddingGateway(client, "text-embedding-3-small", 3);

    await expect(gateway.embed("  hello world ")).resolves.toEqual([0.1, 0.2, 0.3]);
    expect(create).toHaveBeenCalledWith({
      model: "text-embedding-3-small",
      input: "hello world",
      dimensions: 3,
    });
  });

  it("leaves older models at their native size", async () => {
    const create = jest
      .spyOn(client.embeddings, "create")
      .mockResolvedValue(embeddingResponse([[1, 0]]));
    const gateway = new OpenAIEmbeddingGateway(client, "text-embedding-ada-002", 3);

    await gateway.embed("hi");

    expect(create).toHaveBeenCalledWith({
      model: "text-embedding-ada-002",
      input: "hi",
    });
  });

  it("refuses to embed blank text", async () => {
    const create = jest.spyOn(client.embeddings, "create");
    const gateway = new OpenAIEmbeddingGateway(client, "text-embedding-3-small", 3);

    await expect(gateway.embed("   ")).rejects.toBeInstanceOf(ValidationError);
    expect(create).not.toHaveBeenCalled();
  });

  it("rejects a response without a vector", async () => {
    jest
      .spyOn(client.embeddings, "create")
      .mockResolvedValue(embeddingResponse([]));
    const gateway = new OpenAIEmbeddingGateway(client, "text-embedding-3-small", 3);

    const failure = gateway.embed("hi");
    await expect(failure).rejects.toBeInstanceOf(EmbeddingServiceError);
    await expect(failure).rejects.toThrow("Embedding API returned invalid data");
  });

  it("wraps request failures", async () => {
    const create = jest
      .spyOn(client.embeddings, "create")
      .mockRejectedValue(Object.assign(new Error("bad request"), { status: 400 }));
    const gateway = new OpenAIEmbeddingGateway(client, "text-embedding-3-small", 3);

    const failure = gateway.embed("hi");
    await expect(failure).rejects.toBeInstanceOf(EmbeddingServiceError);
    await expect(failure).rejects.toThrow("Embedding request failed");
    expect(create).toHaveBeenCalledTimes(1);
  });
});
