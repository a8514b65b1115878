import type { Settings } from "../config/settings.js";
import { DimensionMismatchError, type ServiceError, toServiceError } from "../errors.js";
import { createGeminiEmbeddingService } from "../integrations/gemini/embeddings.js";
import { loadSourceDirectory, type SourceDocument } from "../loaders/sourceDirectory.js";
import { moduleLogger, type Logger } from "../logging/logger.js";
import { EmbeddingStore } from "../retrieval/embeddingStore.js";
import { saveIndex } from "../retrieval/indexStore.js";
import { normalizeText } from "../text/normalize.js";
import { createTiktokenTokenizer, type Tokenizer } from "../tokenizer/tokenizer.js";
import { chunkText } from "./chunker.js";
import type { EmbeddingService } from "./services.js";

export type IngestFailure = {
  source: string;
  passageIndex: number;
  error: ServiceError | DimensionMismatchError;
};

export type IngestReport = {
  documents: number;
  passages: number;
  inserted: number;
  emptyDocuments: number;
  failures: IngestFailure[];
};

export async function buildStore(params: {
  documents: readonly SourceDocument[];
  tokenizer: Tokenizer;
  embeddings: EmbeddingService;
  maxTokens: number;
  store?: EmbeddingStore;
  logger?: Logger;
}): Promise<{ store: EmbeddingStore; report: IngestReport }> {
  const log = moduleLogger(params.logger, "ingest");
  const store = params.store ?? new EmbeddingStore();
  const report: IngestReport = {
    documents: params.documents.length,
    passages: 0,
    inserted: 0,
    emptyDocuments: 0,
    failures: []
  };

  for (const doc of params.documents) {
    let passageIndex = 0;

    for (const passage of chunkText(normalizeText(doc.text), params.maxTokens, params.tokenizer, log)) {
      const index = passageIndex;
      passageIndex += 1;
      report.passages += 1;

      let embedding: number[];
      try {
        embedding = await params.embeddings.embed(passage.text);
      } catch (err: unknown) {
        const error = toServiceError("embedding", "embed passage", err);
        log.warn({ source: doc.source, passageIndex: index, err: error }, "skipping passage");
        report.failures.push({ source: doc.source, passageIndex: index, error });
        continue;
      }

      try {
        store.insert({ ...passage, source: doc.source }, embedding);
        report.inserted += 1;
      } catch (err: unknown) {
        if (!(err instanceof DimensionMismatchError)) throw err;
        log.warn({ source: doc.source, passageIndex: index, err }, "skipping passage");
        report.failures.push({ source: doc.source, passageIndex: index, error: err });
      }
    }

    if (passageIndex === 0) {
      report.emptyDocuments += 1;
      log.warn({ source: doc.source }, "EmptyInputWarning: document produced no passages");
    }
  }

  log.info(
    {
      documents: report.documents,
      passages: report.passages,
      inserted: report.inserted,
      failed: report.failures.length
    },
    "ingestion finished"
  );
  return { store, report };
}

export async function ingestDirectory(params: {
  sourceDir: string;
  settings: Settings;
  embeddings?: EmbeddingService;
  tokenizer?: Tokenizer;
  logger?: Logger;
}): Promise<IngestReport> {
  const documents = await loadSourceDirectory(params.sourceDir);

  const { store, report } = await buildStore({
    documents,
    tokenizer: params.tokenizer ?? createTiktokenTokenizer(params.settings.tokenizerEncoding),
    embeddings: params.embeddings ?? createGeminiEmbeddingService(params.settings),
    maxTokens: params.settings.maxChunkTokens,
    logger: params.logger
  });

  if (store.size === 0) {
    throw new Error(
      `No passages were indexed from ${params.sourceDir} (documents=${report.documents} failures=${report.failures.length})`
    );
  }

  await saveIndex(params.settings.indexPath, {
    embeddingModel: params.settings.embeddingModel,
    store
  });
  return report;
}
