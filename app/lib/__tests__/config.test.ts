import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

async function loadConfig() {
  vi.resetModules();
  return import("../config");
}

describe("config", () => {
  beforeEach(() => {
    vi.stubEnv("EMBEDDING_MODEL", "");
    vi.stubEnv("EMBEDDING_BASE_URL", "");
    vi.stubEnv("OPENROUTER_API_KEY", "");
    vi.stubEnv("OPENAI_API_KEY", "");
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("defaults to the Ollama tag of the pinned embedding model", async () => {
    const config = await loadConfig();
    expect(config.EMBEDDING_MODEL).toBe("nomic-embed-text:v1.5");
    expect(config.EMBEDDING_BASE_URL).toBe("http://localhost:11434/v1");
  });

  it("lets the environment override the embedding model", async () => {
    vi.stubEnv("EMBEDDING_MODEL", "  custom-embed  ");
    const config = await loadConfig();
    expect(config.EMBEDDING_MODEL).toBe("custom-embed");
  });

  it("reports a missing LLM key", async () => {
    const config = await loadConfig();
    expect(config.getMissingConfig()).toEqual(["OPENROUTER_API_KEY"]);

    vi.stubEnv("OPENAI_API_KEY", "test-key");
    const withKey = await loadConfig();
    expect(withKey.getMissingConfig()).toEqual([]);
  });
});
