import { NoGroundingFoundError, ValidationError } from "@domain/errors";
import { collect } from "@testing/fakes";
import { seededPipeline } from "@testing/pipeline";

import { buildHistory, handleChat, handleChatStream } from "./ChatUseCase";

describe("buildHistory", () => {
  it("puts the system message first", () => {
    const history = buildHistory({
      question: "hi",
      systemMessage: "Be brief.",
      history: [
        { role: "user", content: "hello" },
        { role: "assistant", content: "hi there" },
      ],
    });

    expect(history.toTranscript()).toBe(
      "system: Be brief.\nuser: hello\nassistant: hi there"
    );
  });

  it("keeps a system message already carried by the history", () => {
    const history = buildHistory({
      question: "hi",
      systemMessage: "ignored",
      history: [{ role: "system", content: "Be brief." }],
    });

    expect(history.entries).toEqual([{ role: "system", text: "Be brief." }]);
  });

  it("rejects a system message in the middle of the history", () => {
    expect(() =>
      buildHistory({
        question: "hi",
        history: [
          { role: "user", content: "hello" },
          { role: "system", content: "Be brief." },
        ],
      })
    ).toThrow(ValidationError);
  });

  it("rejects a blank system message", () => {
    expect(() =>
      buildHistory({
        question: "hi",
        history: [{ role: "system", content: " " }],
      })
    ).toThrow(ValidationError);
  });
});

describe("handleChat", () => {
  it("answers with the updated history and the grounding record", async () => {
    const { responder } = await seededPipeline();

    const result = await handleChat(responder, {
      question: "Tell me about The Godfather",
      history: [
        { role: "user", content: "Is there a shark in Jaws?" },
        { role: "assistant", content: "Yes." },
      ],
    });

    expect(result.grounding).toEqual({ id: "1", relevance: 1 });
    expect(result.history).toEqual([
      { role: "user", content: "Is there a shark in Jaws?" },
      { role: "assistant", content: "Yes." },
      { role: "user", content: "Tell me about The Godfather" },
      { role: "assistant", content: result.answer },
    ]);
  });

  it("propagates a missing grounding", async () => {
    const { responder } = await seededPipeline({ minRelevance: 0.5 });

    await expect(
      handleChat(responder, { question: "nothing here matches" })
    ).rejects.toBeInstanceOf(NoGroundingFoundError);
  });
});

describe("handleChatStream", () => {
  it("exposes the grounding before streaming and the history after", async () => {
    const { responder } = await seededPipeline();

    const handle = await handleChatStream(responder, {
      question: "robot in space",
      systemMessage: "Be brief.",
    });

    expect(handle.grounding).toEqual({ id: "3", relevance: expect.closeTo(1, 10) });
    expect(handle.history()).toHaveLength(2);

    const answer = (await collect(handle.fragments)).join("");

    expect(handle.history()).toEqual([
      { role: "system", content: "Be brief." },
      { role: "user", content: "robot in space" },
      { role: "assistant", content: answer },
    ]);
  });
});
