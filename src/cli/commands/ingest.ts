import type { Settings } from "../../config/settings.js";
import { ingestDirectory } from "../../rag/ingest.js";
import { EXIT_OK, type CommandDeps } from "../types.js";

export async function runIngestCommand(
  args: string[],
  settings: Settings,
  deps: CommandDeps = {}
): Promise<number> {
  const sourceDir = args[0];
  if (!sourceDir) {
    throw new Error("Usage: siteqa ingest <sourceDir>");
  }

  const report = await ingestDirectory({
    sourceDir,
    settings,
    embeddings: deps.embeddings,
    logger: deps.logger
  });
  (deps.stdout ?? process.stdout).write(`${report.inserted}\n`);
  return EXIT_OK;
}
