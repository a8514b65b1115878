import type { Settings } from "../../config/settings.js";
import { answerFromIndex } from "../../rag/answer.js";
import { EXIT_OK, EXIT_RECOVERABLE, type CommandDeps } from "../types.js";

export async function runAskCommand(
  args: string[],
  settings: Settings,
  deps: CommandDeps = {}
): Promise<number> {
  const question = args.join(" ").trim();
  if (!question) {
    throw new Error("Usage: siteqa ask <question>");
  }

  const result = await answerFromIndex({
    question,
    settings,
    embeddings: deps.embeddings,
    completion: deps.completion,
    logger: deps.logger
  });

  if (!result.ok) {
    (deps.stderr ?? process.stderr).write(`${result.error.message}\n`);
    return EXIT_RECOVERABLE;
  }

  (deps.stdout ?? process.stdout).write(`${result.answer}\n`);
  return EXIT_OK;
}
