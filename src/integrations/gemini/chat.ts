import { HumanMessage, SystemMessage } from "@langchain/core/messages";
import { ChatGoogleGenerativeAI } from "@langchain/google-genai";

import type { Settings } from "../../config/settings.js";
import { toServiceError } from "../../errors.js";
import type { CompletionRequest, CompletionService } from "../../rag/services.js";

export function createChatModel(settings: Settings): ChatGoogleGenerativeAI {
  return new ChatGoogleGenerativeAI({
    apiKey: settings.googleApiKey,
    model: settings.chatModel,
    temperature: 0
  });
}

export function formatCompletionMessages(request: CompletionRequest): [SystemMessage, HumanMessage] {
  return [
    new SystemMessage(request.instruction),
    new HumanMessage(`Context: ${request.context}\n\n---\n\nQuestion: ${request.question}\nAnswer:`)
  ];
}

export function createGeminiCompletionService(settings: Settings): CompletionService {
  const llm = createChatModel(settings);
  return {
    async complete(request: CompletionRequest): Promise<string> {
      try {
        const result = await llm.invoke(formatCompletionMessages(request));
        return String(result.content).trim();
      } catch (err: unknown) {
        throw toServiceError("completion", "invoke", err);
      }
    }
  };
}
