import { parseChatArgs, parseIngestArgs } from "./args";

describe("parseIngestArgs", () => {
  it("reads the file and an optional collection", () => {
    expect(parseIngestArgs(["node", "ingestBatch.ts", "data/movies.json"])).toEqual({
      file: "data/movies.json",
      collection: undefined,
    });
    expect(
      parseIngestArgs(["node", "ingestBatch.ts", "data/movies.json", "classics"])
    ).toEqual({ file: "data/movies.json", collection: "classics" });
  });

  it("prints usage without a file", () => {
    expect(() => parseIngestArgs(["node", "ingestBatch.ts"])).toThrow(
      "Usage: npm run ingest -- <file.json> [collection]"
    );
  });
});

describe("parseChatArgs", () => {
  it("takes the collection as the first argument", () => {
    expect(parseChatArgs(["node", "chatSession.ts", "classics"])).toEqual({
      collection: "classics",
    });
    expect(parseChatArgs(["node", "chatSession.ts"])).toEqual({
      collection: undefined,
    });
  });
});
