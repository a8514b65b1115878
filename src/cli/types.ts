import type { Logger } from "../logging/logger.js";
import type { CompletionService, EmbeddingService } from "../rag/services.js";

export type OutputStream = {
  write(chunk: string): unknown;
};

export type CommandIO = {
  stdout: OutputStream;
  stderr: OutputStream;
};

export type CommandDeps = Partial<CommandIO> & {
  logger?: Logger;
  embeddings?: EmbeddingService;
  completion?: CompletionService;
};

export const EXIT_OK = 0;
export const EXIT_RECOVERABLE = 2;
