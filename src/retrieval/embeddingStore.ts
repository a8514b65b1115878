import { DimensionMismatchError, InvalidPassageError } from "../errors.js";
import type { EmbeddedPassage, Passage } from "./types.js";

export class EmbeddingStore {
  private readonly records: EmbeddedPassage[] = [];
  private dim: number | undefined;

  static fromRecords(records: Iterable<EmbeddedPassage>): EmbeddingStore {
    const store = new EmbeddingStore();
    for (const { embedding, ...passage } of records) {
      store.insert(passage, embedding);
    }
    return store;
  }

  get size(): number {
    return this.records.length;
  }

  get dimension(): number | undefined {
    return this.dim;
  }

  insert(passage: Passage, embedding: readonly number[]): EmbeddedPassage {
    if (!Number.isInteger(passage.tokenCount) || passage.tokenCount < 0) {
      throw new InvalidPassageError(
        `Passage tokenCount must be a non-negative integer, got ${passage.tokenCount}`
      );
    }
    const expected = this.dim ?? embedding.length;
    if (embedding.length === 0 || embedding.length !== expected) {
      throw new DimensionMismatchError({
        expected,
        actual: embedding.length,
        context: embedding.length === 0 ? "empty embedding" : "insert"
      });
    }

    const record: EmbeddedPassage = Object.freeze({
      ...passage,
      embedding: Object.freeze([...embedding])
    });
    this.records.push(record);
    this.dim = expected;
    return record;
  }

  all(): readonly EmbeddedPassage[] {
    return this.records;
  }
}
