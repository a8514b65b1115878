import type { EmbeddingStore } from "../retrieval/embeddingStore.js";
import { rankPassages } from "../retrieval/search.js";
import type { RankedPassage } from "../retrieval/types.js";

export const DEFAULT_SEPARATOR = "\n\n###\n\n";
export const DEFAULT_OVERHEAD_PER_PASSAGE = 4;

export type OverflowPolicy = "skip" | "stop";

export type ContextRequest = {
  queryEmbedding: readonly number[];
  store: EmbeddingStore;
  maxLength: number;
  overheadPerPassage?: number;
  overflow?: OverflowPolicy;
};

export type ContextSelection = {
  passages: RankedPassage[];
  usedLength: number;
};

export function selectPassages(request: ContextRequest): ContextSelection {
  const overhead = request.overheadPerPassage ?? DEFAULT_OVERHEAD_PER_PASSAGE;
  const overflow = request.overflow ?? "skip";
  const records = request.store.all();

  if (records.length === 0 || request.maxLength <= 0) {
    return { passages: [], usedLength: 0 };
  }

  const ranked = rankPassages({ queryEmbedding: request.queryEmbedding, passages: records });
  const passages: RankedPassage[] = [];
  let usedLength = 0;

  for (const candidate of ranked) {
    const cost = candidate.passage.tokenCount + overhead;
    if (usedLength + cost > request.maxLength) {
      if (overflow === "stop") break;
      continue;
    }
    passages.push(candidate);
    usedLength += cost;
  }

  return { passages, usedLength };
}

export function buildContext(
  passages: readonly RankedPassage[],
  separator: string = DEFAULT_SEPARATOR
): string {
  return passages.map((p) => p.passage.text).join(separator);
}

export function assembleContext(request: ContextRequest & { separator?: string }): string {
  return buildContext(selectPassages(request).passages, request.separator);
}
