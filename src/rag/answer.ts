import type { Settings } from "../config/settings.js";
import { DimensionMismatchError, type ServiceError, toServiceError } from "../errors.js";
import { createGeminiCompletionService } from "../integrations/gemini/chat.js";
import { createGeminiEmbeddingService } from "../integrations/gemini/embeddings.js";
import { moduleLogger, type Logger } from "../logging/logger.js";
import type { EmbeddingStore } from "../retrieval/embeddingStore.js";
import { loadIndex } from "../retrieval/indexStore.js";
import { buildContext, selectPassages, type OverflowPolicy } from "./context.js";
import type { CompletionService, EmbeddingService } from "./services.js";

export const UNKNOWN_ANSWER = "I don't know";

export const ANSWER_INSTRUCTION =
  `Answer the question based only on the context below. ` +
  `If the question can't be answered based on the context, say "${UNKNOWN_ANSWER}".`;

export type AnswerResult =
  | { ok: true; answer: string; context: string }
  | { ok: false; answer: ""; context: string; error: ServiceError };

export function checkQueryEmbedding(
  queryEmbedding: readonly number[],
  store: EmbeddingStore
): ServiceError | undefined {
  const expected = store.dimension ?? queryEmbedding.length;
  if (queryEmbedding.length > 0 && queryEmbedding.length === expected) return undefined;
  return toServiceError(
    "embedding",
    "embed question",
    new DimensionMismatchError({ expected, actual: queryEmbedding.length, context: "query" })
  );
}

export async function answerQuestion(params: {
  question: string;
  store: EmbeddingStore;
  embeddings: EmbeddingService;
  completion: CompletionService;
  maxLength: number;
  overheadPerPassage?: number;
  overflow?: OverflowPolicy;
  logger?: Logger;
}): Promise<AnswerResult> {
  const log = moduleLogger(params.logger, "answer");

  let queryEmbedding: number[];
  try {
    queryEmbedding = await params.embeddings.embed(params.question);
  } catch (err: unknown) {
    const error = toServiceError("embedding", "embed question", err);
    log.warn({ err: error }, "question embedding failed");
    return { ok: false, answer: "", context: "", error };
  }

  const malformed = checkQueryEmbedding(queryEmbedding, params.store);
  if (malformed) {
    log.warn({ err: malformed }, "question embedding malformed");
    return { ok: false, answer: "", context: "", error: malformed };
  }

  const selection = selectPassages({
    queryEmbedding,
    store: params.store,
    maxLength: params.maxLength,
    overheadPerPassage: params.overheadPerPassage,
    overflow: params.overflow
  });
  const context = buildContext(selection.passages);

  if (selection.passages.length === 0) {
    log.warn({ storeSize: params.store.size, maxLength: params.maxLength }, "EmptyInputWarning: no context for question");
  } else {
    log.debug({ passages: selection.passages.length, usedLength: selection.usedLength }, "context assembled");
  }

  try {
    const answer = await params.completion.complete({
      instruction: ANSWER_INSTRUCTION,
      context,
      question: params.question
    });
    return { ok: true, answer, context };
  } catch (err: unknown) {
    const error = toServiceError("completion", "answer question", err);
    log.warn({ err: error }, "completion failed");
    return { ok: false, answer: "", context, error };
  }
}

export async function openStore(settings: Settings): Promise<EmbeddingStore> {
  const index = await loadIndex(settings.indexPath);
  if (index.embeddingModel !== settings.embeddingModel) {
    throw new Error(
      `Embedding model mismatch.\nIndex: ${index.embeddingModel}\nCurrent: ${settings.embeddingModel}\nRe-run: siteqa ingest <sourceDir>`
    );
  }
  return index.store;
}

export async function answerFromIndex(params: {
  question: string;
  settings: Settings;
  embeddings?: EmbeddingService;
  completion?: CompletionService;
  logger?: Logger;
}): Promise<AnswerResult> {
  const store = await openStore(params.settings);
  return answerQuestion({
    question: params.question,
    store,
    embeddings: params.embeddings ?? createGeminiEmbeddingService(params.settings),
    completion: params.completion ?? createGeminiCompletionService(params.settings),
    maxLength: params.settings.contextMaxTokens,
    logger: params.logger
  });
}
