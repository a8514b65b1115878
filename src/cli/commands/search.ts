import type { Settings } from "../../config/settings.js";
import { toServiceError } from "../../errors.js";
import { createGeminiEmbeddingService } from "../../integrations/gemini/embeddings.js";
import { checkQueryEmbedding, openStore } from "../../rag/answer.js";
import { selectPassages } from "../../rag/context.js";
import type { RankedPassage } from "../../retrieval/types.js";
import { EXIT_OK, EXIT_RECOVERABLE, type CommandDeps } from "../types.js";

export function formatRankedPassage(ranked: RankedPassage): string {
  return `${ranked.distance.toFixed(4)}\t${ranked.passage.tokenCount}\t${ranked.passage.source ?? ""}`;
}

export async function runSearchCommand(
  args: string[],
  settings: Settings,
  deps: CommandDeps = {}
): Promise<number> {
  const question = args.join(" ").trim();
  if (!question) {
    throw new Error("Usage: siteqa search <question>");
  }

  const store = await openStore(settings);
  const embeddings = deps.embeddings ?? createGeminiEmbeddingService(settings);

  let queryEmbedding: number[];
  try {
    queryEmbedding = await embeddings.embed(question);
  } catch (err: unknown) {
    const error = toServiceError("embedding", "embed question", err);
    (deps.stderr ?? process.stderr).write(`${error.message}\n`);
    return EXIT_RECOVERABLE;
  }

  const malformed = checkQueryEmbedding(queryEmbedding, store);
  if (malformed) {
    (deps.stderr ?? process.stderr).write(`${malformed.message}\n`);
    return EXIT_RECOVERABLE;
  }

  const { passages } = selectPassages({
    queryEmbedding,
    store,
    maxLength: settings.contextMaxTokens
  });

  const out = deps.stdout ?? process.stdout;
  for (const ranked of passages) {
    out.write(`${formatRankedPassage(ranked)}\n`);
  }
  return EXIT_OK;
}
