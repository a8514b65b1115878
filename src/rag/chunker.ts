import type { Logger } from "../logging/logger.js";
import type { Passage } from "../retrieval/types.js";
import type { Tokenizer } from "../tokenizer/tokenizer.js";

export const SENTENCE_DELIMITER = ". ";

const TERMINAL_PUNCTUATION = /[.!?]$/;

function withPeriod(sentence: string): string {
  return TERMINAL_PUNCTUATION.test(sentence) ? sentence : `${sentence}.`;
}

function closeChunk(sentences: string[], tokenCount: number): Passage {
  return { text: withPeriod(sentences.join(SENTENCE_DELIMITER)), tokenCount };
}

export function* chunkText(
  text: string,
  maxTokens: number,
  tokenizer: Tokenizer,
  logger?: Logger
): Generator<Passage> {
  const sentences = text
    .split(SENTENCE_DELIMITER)
    .map((s) => s.trim())
    .filter((s) => s.length > 0);

  let current: string[] = [];
  let tokensSoFar = 0;

  for (const sentence of sentences) {
    const tokens = tokenizer.count(` ${withPeriod(sentence)}`);

    if (tokensSoFar + tokens > maxTokens && current.length > 0) {
      yield closeChunk(current, tokensSoFar);
      current = [];
      tokensSoFar = 0;
    }

    if (tokens > maxTokens) {
      logger?.debug({ tokens, maxTokens }, "dropping oversized sentence");
      continue;
    }

    current.push(sentence);
    tokensSoFar += tokens;
  }

  if (current.length > 0) {
    yield closeChunk(current, tokensSoFar);
  }
}
