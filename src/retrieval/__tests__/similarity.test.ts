import { describe, expect, it } from "vitest";

import { DimensionMismatchError } from "../../errors.js";
import { cosineDistance, cosineSimilarity } from "../similarity.js";

describe("cosineSimilarity", () => {
  it("is 1 for parallel, 0 for orthogonal and -1 for opposite vectors", () => {
    expect(cosineSimilarity([1, 0], [2, 0])).toBeCloseTo(1);
    expect(cosineSimilarity([1, 0], [0, 3])).toBeCloseTo(0);
    expect(cosineSimilarity([1, 0], [-1, 0])).toBeCloseTo(-1);
  });

  it("treats a zero vector as dissimilar to everything", () => {
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
    expect(cosineDistance([0, 0], [1, 1])).toBe(1);
  });

  it("throws on a length mismatch", () => {
    expect(() => cosineSimilarity([1, 0], [1, 0, 0])).toThrow(DimensionMismatchError);
  });
});

describe("cosineDistance", () => {
  it("is 1 minus the similarity", () => {
    expect(cosineDistance([1, 0], [1, 0])).toBeCloseTo(0);
    expect(cosineDistance([1, 0], [0, 1])).toBeCloseTo(1);
    expect(cosineDistance([1, 0], [-1, 0])).toBeCloseTo(2);
    expect(cosineDistance([1, 0], [1, 1])).toBeCloseTo(1 - Math.SQRT1_2);
  });
});
