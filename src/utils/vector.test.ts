import {
  cosineSimilarity,
  dotProduct,
  euclideanDistance,
  fromPgVectorLiteral,
  toPgVectorLiteral,
} from "./vector";

describe("pgvector literals", () => {
  it("formats a vector", () => {
    expect(toPgVectorLiteral([1, 2.5, -3])).toBe("[1,2.5,-3]");
  });

  it("rejects empty and non-finite vectors", () => {
    expect(() => toPgVectorLiteral([])).toThrow("empty vector");
    expect(() => toPgVectorLiteral([1, Number.NaN])).toThrow("non-finite");
  });

  it("parses pgvector text output", () => {
    expect(fromPgVectorLiteral(" [1,2.5,-3] ")).toEqual([1, 2.5, -3]);
    expect(fromPgVectorLiteral("[]")).toEqual([]);
  });

  it("rejects malformed text", () => {
    expect(() => fromPgVectorLiteral("1,2")).toThrow("Not a pgvector literal");
    expect(() => fromPgVectorLiteral("[1,x]")).toThrow(
      "Invalid pgvector component: x"
    );
  });
});

describe("vector math", () => {
  it("computes dot products and distances", () => {
    expect(dotProduct([1, 2, 3], [4, 5, 6])).toBe(32);
    expect(euclideanDistance([0, 0], [3, 4])).toBe(5);
  });

  it("gives zero cosine similarity for a zero vector", () => {
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
  });

  it("rejects vectors of different dimensions", () => {
    expect(() => cosineSimilarity([1, 0], [1, 0, 0])).toThrow(
      "Embedding dimension mismatch: 2 vs 3"
    );
  });
});
