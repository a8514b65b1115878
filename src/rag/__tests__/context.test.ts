import { describe, expect, it } from "vitest";

import { DimensionMismatchError } from "../../errors.js";
import { EmbeddingStore } from "../../retrieval/embeddingStore.js";
import { assembleContext, DEFAULT_SEPARATOR, selectPassages } from "../context.js";

const QUERY = [1, 0];

// Closest first: P3 (distance 0), P1 (1 - 1/sqrt(2)), P2 (distance 1).
function exampleStore(): EmbeddingStore {
  const store = new EmbeddingStore();
  store.insert({ text: "P1 text", tokenCount: 10 }, [1, 1]);
  store.insert({ text: "P2 text", tokenCount: 10 }, [0, 1]);
  store.insert({ text: "P3 text", tokenCount: 500 }, [1, 0]);
  return store;
}

describe("selectPassages", () => {
  it("skips a closer passage that cannot fit and packs the following ones", () => {
    const selection = selectPassages({
      queryEmbedding: QUERY,
      store: exampleStore(),
      maxLength: 30,
      overheadPerPassage: 4
    });

    expect(selection.passages.map((p) => p.passage.text)).toEqual(["P1 text", "P2 text"]);
    expect(selection.usedLength).toBe(28);
  });

  it("includes a passage that lands exactly on the budget", () => {
    const selection = selectPassages({ queryEmbedding: QUERY, store: exampleStore(), maxLength: 28 });
    expect(selection.passages.map((p) => p.passage.text)).toEqual(["P1 text", "P2 text"]);

    const tighter = selectPassages({ queryEmbedding: QUERY, store: exampleStore(), maxLength: 27 });
    expect(tighter.passages.map((p) => p.passage.text)).toEqual(["P1 text"]);
    expect(tighter.usedLength).toBe(14);
  });

  it("stops at the first passage that does not fit under the stop policy", () => {
    const selection = selectPassages({
      queryEmbedding: QUERY,
      store: exampleStore(),
      maxLength: 30,
      overflow: "stop"
    });

    expect(selection).toEqual({ passages: [], usedLength: 0 });
  });

  it("never exceeds the budget", () => {
    const store = exampleStore();
    for (const maxLength of [1, 13, 14, 27, 28, 100, 503, 504, 517, 600]) {
      const selection = selectPassages({ queryEmbedding: QUERY, store, maxLength });
      const accounted = selection.passages.reduce((sum, p) => sum + p.passage.tokenCount + 4, 0);
      expect(selection.usedLength).toBe(accounted);
      expect(accounted).toBeLessThanOrEqual(maxLength);
    }
  });
});

describe("assembleContext", () => {
  it("joins the selected passages closest first", () => {
    const context = assembleContext({
      queryEmbedding: QUERY,
      store: exampleStore(),
      maxLength: 30,
      overheadPerPassage: 4
    });

    expect(context).toBe(`P1 text${DEFAULT_SEPARATOR}P2 text`);
  });

  it("puts the closest passage first when everything fits", () => {
    const context = assembleContext({
      queryEmbedding: QUERY,
      store: exampleStore(),
      maxLength: 600,
      separator: " | "
    });

    expect(context).toBe("P3 text | P1 text | P2 text");
  });

  it("returns an empty string for an empty store", () => {
    expect(
      assembleContext({ queryEmbedding: [0.3, 0.7], store: new EmbeddingStore(), maxLength: 100, overheadPerPassage: 4 })
    ).toBe("");
  });

  it("returns an empty string for a non-positive budget", () => {
    expect(assembleContext({ queryEmbedding: QUERY, store: exampleStore(), maxLength: 0 })).toBe("");
    expect(assembleContext({ queryEmbedding: QUERY, store: exampleStore(), maxLength: -10 })).toBe("");
  });

  it("gives the same result on repeated calls and leaves the store untouched", () => {
    const store = exampleStore();
    const before = store.all().map((r) => r.text);
    const request = { queryEmbedding: QUERY, store, maxLength: 30 };

    const first = assembleContext(request);
    const second = assembleContext(request);

    expect(second).toBe(first);
    expect(store.all().map((r) => r.text)).toEqual(before);
  });

  it("keeps insertion order for passages with equal embeddings", () => {
    const store = new EmbeddingStore();
    store.insert({ text: "earlier", tokenCount: 5 }, [0.6, 0.8]);
    store.insert({ text: "later", tokenCount: 5 }, [0.6, 0.8]);

    expect(assembleContext({ queryEmbedding: QUERY, store, maxLength: 100, separator: "/" })).toBe("earlier/later");
  });

  it("rejects a query embedding of the wrong dimension", () => {
    expect(() => assembleContext({ queryEmbedding: [1, 0, 0], store: exampleStore(), maxLength: 30 })).toThrow(
      DimensionMismatchError
    );
  });
});
