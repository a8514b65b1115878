import { GoogleGenerativeAIEmbeddings } from "@langchain/google-genai";

import type { Settings } from "../../config/settings.js";
import { toServiceError } from "../../errors.js";
import type { EmbeddingService } from "../../rag/services.js";

export function createEmbeddings(settings: Settings): GoogleGenerativeAIEmbeddings {
  return new GoogleGenerativeAIEmbeddings({
    apiKey: settings.googleApiKey,
    model: settings.embeddingModel
  });
}

export function createGeminiEmbeddingService(settings: Settings): EmbeddingService {
  const embeddings = createEmbeddings(settings);
  return {
    async embed(text: string): Promise<number[]> {
      try {
        return await embeddings.embedQuery(text);
      } catch (err: unknown) {
        throw toServiceError("embedding", "embedQuery", err);
      }
    }
  };
}
