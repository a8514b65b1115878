import { describe, expect, it } from "vitest";

import { DimensionMismatchError, InvalidPassageError } from "../../errors.js";
import { EmbeddingStore } from "../embeddingStore.js";

describe("EmbeddingStore", () => {
  it("keeps records in insertion order and fixes the dimension on first insert", () => {
    const store = new EmbeddingStore();
    expect(store.dimension).toBeUndefined();

    store.insert({ text: "first", tokenCount: 1 }, [1, 0, 0]);
    store.insert({ text: "second", tokenCount: 1, source: "b.txt" }, [0, 1, 0]);

    expect(store.size).toBe(2);
    expect(store.dimension).toBe(3);
    expect(store.all().map((r) => r.text)).toEqual(["first", "second"]);
    expect(store.all()[1]).toEqual({ text: "second", tokenCount: 1, source: "b.txt", embedding: [0, 1, 0] });
  });

  it("rejects a mismatched dimension and leaves the store unchanged", () => {
    const store = new EmbeddingStore();
    store.insert({ text: "first", tokenCount: 1 }, [1, 0]);

    let thrown: unknown;
    try {
      store.insert({ text: "wide", tokenCount: 1 }, [1, 0, 0]);
    } catch (err: unknown) {
      thrown = err;
    }

    expect(thrown).toBeInstanceOf(DimensionMismatchError);
    expect(thrown).toMatchObject({ expected: 2, actual: 3 });
    expect(store.size).toBe(1);
    expect(store.all().map((r) => r.text)).toEqual(["first"]);
  });

  it("rejects an empty embedding", () => {
    const store = new EmbeddingStore();
    expect(() => store.insert({ text: "nothing", tokenCount: 1 }, [])).toThrow(DimensionMismatchError);
    expect(store.size).toBe(0);
    expect(store.dimension).toBeUndefined();
  });

  it("rejects a negative or fractional token count", () => {
    const store = new EmbeddingStore();
    store.insert({ text: "ok", tokenCount: 0 }, [1, 0]);

    expect(() => store.insert({ text: "negative", tokenCount: -3 }, [1, 0])).toThrow(InvalidPassageError);
    expect(() => store.insert({ text: "fraction", tokenCount: 1.5 }, [1, 0])).toThrow(
      "Passage tokenCount must be a non-negative integer, got 1.5"
    );
    expect(store.all().map((r) => r.text)).toEqual(["ok"]);
  });

  it("copies and freezes inserted records", () => {
    const store = new EmbeddingStore();
    const embedding = [0.5, 0.5];
    const record = store.insert({ text: "frozen", tokenCount: 1 }, embedding);
    embedding[0] = 9;

    expect(record.embedding).toEqual([0.5, 0.5]);
    expect(Object.isFrozen(record)).toBe(true);
    expect(Object.isFrozen(record.embedding)).toBe(true);
  });

  it("rebuilds from records with the same checks", () => {
    const store = EmbeddingStore.fromRecords([
      { text: "a", tokenCount: 1, embedding: [1, 2] },
      { text: "b", tokenCount: 2, embedding: [3, 4] }
    ]);
    expect(store.size).toBe(2);
    expect(store.dimension).toBe(2);

    expect(() =>
      EmbeddingStore.fromRecords([
        { text: "a", tokenCount: 1, embedding: [1, 2] },
        { text: "b", tokenCount: 1, embedding: [1] }
      ])
    ).toThrow(DimensionMismatchError);
  });
});
