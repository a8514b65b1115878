export type EmbeddingService = {
  embed(text: string): Promise<number[]>;
};

export type CompletionRequest = {
  instruction: string;
  context: string;
  question: string;
};

export type CompletionService = {
  complete(request: CompletionRequest): Promise<string>;
};
