import { DimensionMismatchError } from "../errors.js";
import { cosineDistance } from "./similarity.js";
import type { EmbeddedPassage, RankedPassage } from "./types.js";

export function rankPassages(params: {
  queryEmbedding: readonly number[];
  passages: readonly EmbeddedPassage[];
}): RankedPassage[] {
  const expectedDim = params.passages[0]?.embedding.length;
  if (expectedDim !== undefined && params.queryEmbedding.length !== expectedDim) {
    throw new DimensionMismatchError({
      expected: expectedDim,
      actual: params.queryEmbedding.length,
      context: "query"
    });
  }

  return params.passages
    .map((passage, position) => ({
      passage,
      position,
      distance: cosineDistance(params.queryEmbedding, passage.embedding)
    }))
    .sort((a, b) => a.distance - b.distance);
}
