import { describe, expect, it } from "vitest";
import { loadConfig } from "../src/config/env.js";
import { ConfigurationError } from "../src/domain/errors.js";

describe("loadConfig", () => {
  it("applies defaults and selects the first configured provider", () => {
    const config = loadConfig({ GEMINI_API_KEY: "test-secret" });

    expect(config.embeddingProvider).toBe("gemini");
    expect(config.generationProvider).toBe("gemini");
    expect(config.retrieval).toMatchObject({
      chunkSize: 300,
      chunkOverlap: 50,
      topK: 5,
      contextK: 3,
      maxTokens: 800,
      temperature: 0.3,
      explainClauses: true,
    });
    expect(config.vectorMetric).toBe("cosine");
    expect(config.databaseUrl).toBeNull();
  });

  it("prefers OpenAI when several credentials are present", () => {
    const config = loadConfig({
      OPENAI_API_KEY: "test-secret",
      GEMINI_API_KEY: "test-secret",
    });

    expect(config.generationProvider).toBe("openai");
  });

  it("refuses to start without any generation credential", () => {
    expect(() => loadConfig({})).toThrow(ConfigurationError);
    expect(() => loadConfig({ OPENAI_API_KEY: "   " })).toThrow(
      "At least one generation credential",
    );
  });

  it("accepts an explicit Ollama endpoint as the only credential", () => {
    const config = loadConfig({ OLLAMA_BASE_URL: "http://localhost:11434" });

    expect(config.generationProvider).toBe("ollama");
    expect(config.ollamaConfigured).toBe(true);
  });

  it("rejects a selected provider that has no credentials", () => {
    expect(() =>
      loadConfig({ OPENAI_API_KEY: "test-secret", EMBEDDING_PROVIDER: "gemini" }),
    ).toThrow("EMBEDDING_PROVIDER=gemini");
  });

  it("rejects an overlap that is not smaller than the chunk size", () => {
    expect(() =>
      loadConfig({ OPENAI_API_KEY: "test-secret", CHUNK_SIZE: "100", CHUNK_OVERLAP: "100" }),
    ).toThrow("CHUNK_OVERLAP (100) must be smaller than CHUNK_SIZE (100).");
  });

  it("parses numeric and boolean settings", () => {
    const config = loadConfig({
      OPENAI_API_KEY: "test-secret",
      TOP_K: "8",
      CONTEXT_K: "2",
      EXPLAIN_CLAUSES: "false",
      VECTOR_DIMENSION: "768",
      VECTOR_METRIC: "dotproduct",
    });

    expect(config.retrieval.topK).toBe(8);
    expect(config.retrieval.contextK).toBe(2);
    expect(config.retrieval.explainClauses).toBe(false);
    expect(config.vectorDimension).toBe(768);
    expect(config.vectorMetric).toBe("dotproduct");
  });

  it("rejects an index name that is not lowercase and hyphenated", () => {
    expect(() =>
      loadConfig({ OPENAI_API_KEY: "test-secret", VECTOR_INDEX_NAME: "My_Index" }),
    ).toThrow(ConfigurationError);
  });
});
