#!/usr/bin/env node
import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";

function loadEnv(): void {
  const explicitPath = process.env.DOTENV_CONFIG_PATH;
  if (explicitPath) {
    dotenv.config({ path: explicitPath });
    return;
  }

  const cwd = process.cwd();
  const candidates = [path.join(cwd, ".env"), path.join(cwd, "..", ".env")];

  for (const candidate of candidates) {
    if (fs.existsSync(candidate)) {
      dotenv.config({ path: candidate });
      return;
    }
  }

  dotenv.config();
}

loadEnv();

import { loadSettings } from "../config/settings.js";
import { createLogger } from "../logging/logger.js";
import { runAskCommand } from "./commands/ask.js";
import { runIngestCommand } from "./commands/ingest.js";
import { runSearchCommand } from "./commands/search.js";
import { parseCli } from "./parse.js";

export async function main(argv: string[]): Promise<number> {
  const parsed = parseCli(argv);
  const settings = loadSettings();
  const logger = createLogger(settings.logLevel);

  switch (parsed.command) {
    case "ingest":
      return runIngestCommand(parsed.args, settings, { logger });
    case "ask":
      return runAskCommand(parsed.args, settings, { logger });
    case "search":
      return runSearchCommand(parsed.args, settings, { logger });
  }
}

try {
  process.exitCode = await main(process.argv);
} catch (err: unknown) {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(`${message}\n`);
  process.exitCode = 1;
}
