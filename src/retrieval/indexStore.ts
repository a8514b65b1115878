import { promises as fs } from "node:fs";
import path from "node:path";

import { z } from "zod";

import { IndexFormatError } from "../errors.js";
import { EmbeddingStore } from "./embeddingStore.js";
import type { StoredIndex } from "./types.js";

const StoredPassageSchema = z.object({
  source: z.string().optional(),
  text: z.string(),
  tokenCount: z.number().int().nonnegative(),
  embedding: z.array(z.number()).min(1)
});

const StoredIndexSchema = z.object({
  version: z.literal(1),
  embeddingModel: z.string().min(1),
  embeddingDimension: z.number().int().positive(),
  passages: z.array(StoredPassageSchema)
});

export type LoadedIndex = {
  embeddingModel: string;
  store: EmbeddingStore;
};

export function toStoredIndex(params: { embeddingModel: string; store: EmbeddingStore }): StoredIndex {
  return {
    version: 1,
    embeddingModel: params.embeddingModel,
    embeddingDimension: params.store.dimension ?? 0,
    passages: params.store.all().map((p) => ({
      ...(p.source === undefined ? {} : { source: p.source }),
      text: p.text,
      tokenCount: p.tokenCount,
      embedding: [...p.embedding]
    }))
  };
}

export async function saveIndex(
  filePath: string,
  params: { embeddingModel: string; store: EmbeddingStore }
): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, JSON.stringify(toStoredIndex(params)), "utf-8");
}

export async function loadIndex(filePath: string): Promise<LoadedIndex> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf-8");
  } catch (err: unknown) {
    if (err && typeof err === "object" && "code" in err && err.code === "ENOENT") {
      throw new Error(`Index not found: ${filePath}\nRun: siteqa ingest <sourceDir>`);
    }
    throw err;
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err: unknown) {
    throw new IndexFormatError(`Index is not valid JSON: ${filePath}`, { cause: err });
  }

  const parsed = StoredIndexSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`);
    throw new IndexFormatError(`Unsupported index format: ${filePath}\n  ${issues.join("\n  ")}`);
  }

  const index = parsed.data;
  const mismatched = index.passages.findIndex((p) => p.embedding.length !== index.embeddingDimension);
  if (mismatched !== -1) {
    throw new IndexFormatError(
      `Index passage ${mismatched} has embedding dimension ${index.passages[mismatched]?.embedding.length}, expected ${index.embeddingDimension}`
    );
  }

  return {
    embeddingModel: index.embeddingModel,
    store: EmbeddingStore.fromRecords(index.passages)
  };
}
