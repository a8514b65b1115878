import type { Settings } from "../config/settings.js";
import type { CompletionRequest, CompletionService, EmbeddingService } from "../rag/services.js";
import type { Tokenizer } from "../tokenizer/tokenizer.js";

export const wordTokenizer: Tokenizer = {
  count(text: string): number {
    const trimmed = text.trim();
    return trimmed === "" ? 0 : trimmed.split(/\s+/).length;
  }
};

export function createFakeEmbeddings(
  embed: (text: string) => number[] | Promise<number[]>
): EmbeddingService & { calls: string[] } {
  const calls: string[] = [];
  return {
    calls,
    async embed(text: string): Promise<number[]> {
      calls.push(text);
      return embed(text);
    }
  };
}

export function createFakeCompletion(
  complete: (request: CompletionRequest) => string | Promise<string>
): CompletionService & { requests: CompletionRequest[] } {
  const requests: CompletionRequest[] = [];
  return {
    requests,
    async complete(request: CompletionRequest): Promise<string> {
      requests.push(request);
      return complete(request);
    }
  };
}

export function testSettings(overrides: Partial<Settings> = {}): Settings {
  return {
    googleApiKey: "test-key",
    chatModel: "test-chat-model",
    embeddingModel: "test-embedding-model",
    indexPath: ".siteqa-test/index.json",
    maxChunkTokens: 50,
    contextMaxTokens: 100,
    tokenizerEncoding: "cl100k_base",
    logLevel: "silent",
    ...overrides
  };
}
