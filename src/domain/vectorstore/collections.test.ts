import {
  collectionSpecFromConfig,
  isValidCollectionName,
  sameCollectionSpec,
} from "./collections";

describe("isValidCollectionName", () => {
  it.each(["movies", "_drafts", "movies_2024"])("accepts %s", (name) => {
    expect(isValidCollectionName(name)).toBe(true);
  });

  it.each(["", "Movies", "2024_movies", "movies-2024", 'x"; drop', "a".repeat(49)])(
    "rejects %j",
    (name) => {
      expect(isValidCollectionName(name)).toBe(false);
    }
  );
});

describe("collectionSpecFromConfig", () => {
  it("describes the default collection with its HNSW parameters", () => {
    expect(collectionSpecFromConfig()).toEqual({
      name: "movies",
      dimension: 1536,
      metric: "cosine",
      indexKind: "hnsw",
      indexParams: { m: 16, efConstruction: 64 },
    });
  });

  it("compares specs field by field", () => {
    const spec = collectionSpecFromConfig("series");

    expect(sameCollectionSpec(spec, collectionSpecFromConfig("series"))).toBe(true);
    expect(sameCollectionSpec(spec, { ...spec, dimension: 768 })).toBe(false);
    expect(
      sameCollectionSpec(spec, { ...spec, indexParams: { m: 32, efConstruction: 64 } })
    ).toBe(false);
  });
});
