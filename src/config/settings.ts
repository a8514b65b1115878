import { z } from "zod";

import { ConfigError } from "../errors.js";
import { LOG_LEVELS, type LogLevel } from "../logging/logger.js";

const TOKENIZER_ENCODINGS = ["cl100k_base", "o200k_base", "p50k_base", "r50k_base"] as const;

export type Settings = {
  googleApiKey: string;
  chatModel: string;
  embeddingModel: string;
  indexPath: string;
  maxChunkTokens: number;
  contextMaxTokens: number;
  tokenizerEncoding: (typeof TOKENIZER_ENCODINGS)[number];
  logLevel: LogLevel;
};

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const EnvSchema = z.object({
  GOOGLE_API_KEY: z.string().min(1, "GOOGLE_API_KEY is required"),
  SITEQA_GEMINI_MODEL: z.string().min(1).default("gemini-2.0-flash"),
  SITEQA_GEMINI_EMBEDDING_MODEL: z.string().min(1).default("gemini-embedding-001"),
  SITEQA_INDEX_PATH: z.string().min(1).default(".siteqa/index.json"),
  SITEQA_MAX_CHUNK_TOKENS: positiveInt(500),
  SITEQA_CONTEXT_MAX_TOKENS: positiveInt(1800),
  SITEQA_TOKENIZER_ENCODING: z.enum(TOKENIZER_ENCODINGS).default("cl100k_base"),
  SITEQA_LOG_LEVEL: z.enum(LOG_LEVELS).default("info")
});

function blankToUndefined(value: string | undefined): string | undefined {
  return value == null || value.trim() === "" ? undefined : value;
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const parsed = EnvSchema.safeParse({
    GOOGLE_API_KEY: blankToUndefined(env.GOOGLE_API_KEY) ?? blankToUndefined(env.GEMINI_API_KEY) ?? "",
    SITEQA_GEMINI_MODEL: blankToUndefined(env.SITEQA_GEMINI_MODEL),
    SITEQA_GEMINI_EMBEDDING_MODEL: blankToUndefined(env.SITEQA_GEMINI_EMBEDDING_MODEL),
    SITEQA_INDEX_PATH: blankToUndefined(env.SITEQA_INDEX_PATH),
    SITEQA_MAX_CHUNK_TOKENS: blankToUndefined(env.SITEQA_MAX_CHUNK_TOKENS),
    SITEQA_CONTEXT_MAX_TOKENS: blankToUndefined(env.SITEQA_CONTEXT_MAX_TOKENS),
    SITEQA_TOKENIZER_ENCODING: blankToUndefined(env.SITEQA_TOKENIZER_ENCODING),
    SITEQA_LOG_LEVEL: blankToUndefined(env.SITEQA_LOG_LEVEL)
  });

  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new ConfigError("Invalid configuration", issues);
  }

  const e = parsed.data;
  return {
    googleApiKey: e.GOOGLE_API_KEY,
    chatModel: e.SITEQA_GEMINI_MODEL,
    embeddingModel: e.SITEQA_GEMINI_EMBEDDING_MODEL,
    indexPath: e.SITEQA_INDEX_PATH,
    maxChunkTokens: e.SITEQA_MAX_CHUNK_TOKENS,
    contextMaxTokens: e.SITEQA_CONTEXT_MAX_TOKENS,
    tokenizerEncoding: e.SITEQA_TOKENIZER_ENCODING,
    logLevel: e.SITEQA_LOG_LEVEL
  };
}
