import { join } from "path";

function readEnv(name: string): string | undefined {
  const value = process.env[name]?.trim();
  return value ? value : undefined;
}

function readNumberEnv(name: string, fallback: number): number {
  const raw = readEnv(name);
  if (!raw) return fallback;
  const parsed = Number(raw);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

export const LLM_API_KEY =
  readEnv("OPENROUTER_API_KEY") ?? readEnv("OPENAI_API_KEY");
export const LLM_BASE_URL =
  readEnv("LLM_BASE_URL") ?? "https://openrouter.ai/api/v1";
export const OPENAI_MODEL =
  readEnv("OPENAI_MODEL") ?? "tngtech/tng-r1t-chimera:free";

// Changing the embedding model changes every fingerprint.
export const EMBEDDING_MODEL =
  readEnv("EMBEDDING_MODEL") ?? "nomic-embed-text:v1.5";
export const EMBEDDING_BASE_URL =
  readEnv("EMBEDDING_BASE_URL") ?? "http://localhost:11434/v1";
export const EMBEDDING_API_KEY = readEnv("EMBEDDING_API_KEY") ?? "local";

export const TOKENIZER_ENCODING = "cl100k_base";

export const HTTP_TIMEOUT_MS = readNumberEnv("HTTP_TIMEOUT_MS", 20000);
export const PACING_ENABLED = !/^(0|false|no|off)$/i.test(
  readEnv("ALBUM_PACING") ?? "on",
);
export const LOGS_DIR = readEnv("ALBUM_LOGS_DIR") ?? join(process.cwd(), "logs");

/**
 * Names of required environment variables that are not set.
 */
export function getMissingConfig(): string[] {
  const missing: string[] = [];
  if (!LLM_API_KEY) missing.push("OPENROUTER_API_KEY");
  return missing;
}
