export type Passage = {
  text: string;
  tokenCount: number;
  source?: string;
};

export type EmbeddedPassage = Passage & {
  embedding: readonly number[];
};

export type RankedPassage = {
  passage: EmbeddedPassage;
  distance: number;
  position: number;
};

export type StoredPassage = {
  source?: string;
  text: string;
  tokenCount: number;
  embedding: number[];
};

export type StoredIndex = {
  version: 1;
  embeddingModel: string;
  embeddingDimension: number;
  passages: StoredPassage[];
};
