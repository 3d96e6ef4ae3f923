import {
  byRelevanceDesc,
  distanceBetween,
  distanceToRelevance,
  relevanceBetween,
} from "./relevance";

describe("distanceToRelevance", () => {
  it("maps cosine distance to 1 - d", () => {
    expect(distanceToRelevance("cosine", 0)).toBe(1);
    expect(distanceToRelevance("cosine", 0.25)).toBe(0.75);
    expect(distanceToRelevance("cosine", 1.5)).toBe(0);
  });

  it("maps euclidean distance to 1 / (1 + d)", () => {
    expect(distanceToRelevance("euclidean", 0)).toBe(1);
    expect(distanceToRelevance("euclidean", 1)).toBe(0.5);
    expect(distanceToRelevance("euclidean", 3)).toBe(0.25);
  });

  it("rescales the negated inner product into [0, 1]", () => {
    expect(distanceToRelevance("dot-product", -1)).toBe(1);
    expect(distanceToRelevance("dot-product", 0)).toBe(0.5);
    expect(distanceToRelevance("dot-product", 1)).toBe(0);
    expect(distanceToRelevance("dot-product", -5)).toBe(1);
  });

  it("maps NaN to zero", () => {
    expect(distanceToRelevance("cosine", Number.NaN)).toBe(0);
  });
});

describe("distanceBetween", () => {
  it("uses the store's operator semantics", () => {
    expect(distanceBetween("cosine", [1, 0], [0, 1])).toBe(1);
    expect(distanceBetween("euclidean", [0, 0], [3, 4])).toBe(5);
    expect(distanceBetween("dot-product", [1, 2], [3, 4])).toBe(-11);
  });

  it("keeps non-unit dot-product matches apart", () => {
    expect(distanceBetween("dot-product", [1, 0], [5, 0])).toBeLessThan(
      distanceBetween("dot-product", [1, 0], [2, 0])
    );
  });
});

describe("relevanceBetween", () => {
  it("agrees with the store distance for each metric", () => {
    expect(relevanceBetween("cosine", [1, 0], [0, 1])).toBe(0);
    expect(relevanceBetween("cosine", [1, 1], [2, 2])).toBeCloseTo(1);
    expect(relevanceBetween("euclidean", [0, 0], [3, 4])).toBeCloseTo(1 / 6);
    expect(relevanceBetween("dot-product", [1, 0], [1, 0])).toBe(1);
  });
});

describe("byRelevanceDesc", () => {
  it("sorts the most relevant first", () => {
    const sorted = [
      { id: "a", relevance: 0.2 },
      { id: "b", relevance: 0.9 },
      { id: "c", relevance: 0.5 },
    ].sort(byRelevanceDesc);

    expect(sorted.map((r) => r.id)).toEqual(["b", "c", "a"]);
  });
});
