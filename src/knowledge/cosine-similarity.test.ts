import { describe, expect, it } from "vitest";
import { cosineSimilarity, findTopK } from "./cosine-similarity.js";

describe("cosineSimilarity", () => {
  it("is 1 for parallel vectors and 0 for orthogonal ones", () => {
    expect(cosineSimilarity([1, 0], [1, 0])).toBe(1);
    expect(cosineSimilarity([1, 2, 3], [2, 4, 6])).toBeCloseTo(1, 10);
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
  });

  it("is -1 for opposite vectors", () => {
    expect(cosineSimilarity([1, 0], [-1, 0])).toBe(-1);
  });

  it("returns 0 when a vector is all zeros", () => {
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
  });

  it("throws on mismatched dimensions", () => {
    expect(() => cosineSimilarity([1, 0], [1, 0, 0])).toThrow(
      "Embedding dimensions must match: 2 vs 3"
    );
  });
});

describe("findTopK", () => {
  const candidates = [
    { id: "a", embedding: [1, 0] },
    { id: "b", embedding: [0, 1] },
    { id: "c", embedding: [1, 1] },
    { id: "d", embedding: [2, 0] },
  ];

  it("orders by similarity and keeps input order on ties", () => {
    const ranked = findTopK([1, 0], candidates, 3);

    expect(ranked.map((r) => r.item.id)).toEqual(["a", "d", "c"]);
    expect(ranked[2]?.similarity).toBeCloseTo(Math.SQRT1_2, 10);
  });

  it("returns everything when k exceeds the candidates", () => {
    expect(findTopK([1, 0], candidates, 10)).toHaveLength(4);
  });

  it("returns nothing for k <= 0", () => {
    expect(findTopK([1, 0], candidates, 0)).toEqual([]);
  });
});
