import { z } from "zod";
import { ConfigurationError } from "../domain/errors.js";
import { VectorMetric } from "../domain/types.js";

export type ProviderName = "openai" | "gemini" | "ollama";

const providerSchema = z.enum(["openai", "gemini", "ollama"]);

const booleanFlag = z
  .enum(["true", "false"])
  .transform((value) => value === "true");

const envSchema = z.object({
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_EMBEDDING_MODEL: z.string().default("text-embedding-3-small"),
  OPENAI_CHAT_MODEL: z.string().default("gpt-4o-mini"),
  GEMINI_API_KEY: z.string().optional(),
  GEMINI_EMBEDDING_MODEL: z.string().default("text-embedding-004"),
  GEMINI_CHAT_MODEL: z.string().default("gemini-1.5-flash"),
  OLLAMA_BASE_URL: z.string().url().optional(),
  OLLAMA_EMBEDDING_MODEL: z.string().default("nomic-embed-text"),
  OLLAMA_CHAT_MODEL: z.string().default("qwen2.5:7b-instruct"),
  EMBEDDING_PROVIDER: providerSchema.optional(),
  GENERATION_PROVIDER: providerSchema.optional(),
  DATABASE_URL: z.string().optional(),
  VECTOR_INDEX_NAME: z
    .string()
    .regex(/^[a-z0-9][a-z0-9-]{0,44}$/, "lowercase letters, digits and hyphens (max 45)")
    .default("document-index"),
  VECTOR_DIMENSION: z.coerce.number().int().positive().default(1536),
  VECTOR_METRIC: z.enum(["cosine", "dotproduct"]).default("cosine"),
  LOCAL_INDEX_DIR: z.string().default(".data/vector-index"),
  CHUNK_SIZE: z.coerce.number().int().positive().default(300),
  CHUNK_OVERLAP: z.coerce.number().int().nonnegative().default(50),
  TOP_K: z.coerce.number().int().positive().max(100).default(5),
  CONTEXT_K: z.coerce.number().int().positive().default(3),
  MAX_TOKENS: z.coerce.number().int().positive().default(800),
  TEMPERATURE: z.coerce.number().min(0).max(2).default(0.3),
  EXPLANATION_MAX_TOKENS: z.coerce.number().int().positive().default(150),
  EXPLANATION_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.2),
  EXPLAIN_CLAUSES: booleanFlag.default("true"),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  MAX_DOCUMENT_BYTES: z.coerce.number().int().positive().default(25 * 1024 * 1024),
  EMBEDDING_CONCURRENCY: z.coerce.number().int().positive().default(4),
  QUESTION_CONCURRENCY: z.coerce.number().int().positive().default(4),
  MCP_TRANSPORT: z.enum(["stdio", "http"]).default("stdio"),
  MCP_HOST: z.string().default("0.0.0.0"),
  MCP_PORT: z.coerce.number().int().positive().default(3000),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
});

const DEFAULT_OLLAMA_BASE_URL = "http://127.0.0.1:11434";

export interface RetrievalSettings {
  chunkSize: number;
  chunkOverlap: number;
  topK: number;
  contextK: number;
  maxTokens: number;
  temperature: number;
  explanationMaxTokens: number;
  explanationTemperature: number;
  explainClauses: boolean;
  questionConcurrency: number;
}

export interface AppConfig {
  openaiApiKey: string | null;
  openaiEmbeddingModel: string;
  openaiChatModel: string;
  geminiApiKey: string | null;
  geminiEmbeddingModel: string;
  geminiChatModel: string;
  ollamaBaseUrl: string;
  ollamaConfigured: boolean;
  ollamaEmbeddingModel: string;
  ollamaChatModel: string;
  embeddingProvider: ProviderName;
  generationProvider: ProviderName;
  databaseUrl: string | null;
  indexName: string;
  vectorDimension: number;
  vectorMetric: VectorMetric;
  localIndexDir: string;
  retrieval: RetrievalSettings;
  requestTimeoutMs: number;
  maxDocumentBytes: number;
  embeddingConcurrency: number;
  transport: "stdio" | "http";
  host: string;
  port: number;
  logLevel: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(withoutBlankValues(env));
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid configuration: ${details}`);
  }
  const parsed = result.data;

  if (parsed.CHUNK_OVERLAP >= parsed.CHUNK_SIZE) {
    throw new ConfigurationError(
      `CHUNK_OVERLAP (${parsed.CHUNK_OVERLAP}) must be smaller than CHUNK_SIZE (${parsed.CHUNK_SIZE}).`,
    );
  }

  const configured: Record<ProviderName, boolean> = {
    openai: Boolean(parsed.OPENAI_API_KEY),
    gemini: Boolean(parsed.GEMINI_API_KEY),
    ollama: Boolean(parsed.OLLAMA_BASE_URL),
  };

  if (!configured.openai && !configured.gemini && !configured.ollama) {
    throw new ConfigurationError(
      "At least one generation credential must be set (OPENAI_API_KEY, GEMINI_API_KEY or OLLAMA_BASE_URL).",
    );
  }

  const fallbackProvider: ProviderName = configured.openai
    ? "openai"
    : configured.gemini
      ? "gemini"
      : "ollama";
  const embeddingProvider = parsed.EMBEDDING_PROVIDER ?? fallbackProvider;
  const generationProvider = parsed.GENERATION_PROVIDER ?? fallbackProvider;

  for (const [role, provider] of [
    ["EMBEDDING_PROVIDER", embeddingProvider],
    ["GENERATION_PROVIDER", generationProvider],
  ] as const) {
    if (!configured[provider]) {
      throw new ConfigurationError(
        `${role}=${provider} is selected but its credentials are not configured.`,
      );
    }
  }

  return {
    openaiApiKey: parsed.OPENAI_API_KEY ?? null,
    openaiEmbeddingModel: parsed.OPENAI_EMBEDDING_MODEL,
    openaiChatModel: parsed.OPENAI_CHAT_MODEL,
    geminiApiKey: parsed.GEMINI_API_KEY ?? null,
    geminiEmbeddingModel: parsed.GEMINI_EMBEDDING_MODEL,
    geminiChatModel: parsed.GEMINI_CHAT_MODEL,
    ollamaBaseUrl: parsed.OLLAMA_BASE_URL ?? DEFAULT_OLLAMA_BASE_URL,
    ollamaConfigured: configured.ollama,
    ollamaEmbeddingModel: parsed.OLLAMA_EMBEDDING_MODEL,
    ollamaChatModel: parsed.OLLAMA_CHAT_MODEL,
    embeddingProvider,
    generationProvider,
    databaseUrl: parsed.DATABASE_URL ?? null,
    indexName: parsed.VECTOR_INDEX_NAME,
    vectorDimension: parsed.VECTOR_DIMENSION,
    vectorMetric: parsed.VECTOR_METRIC,
    localIndexDir: parsed.LOCAL_INDEX_DIR,
    retrieval: {
      chunkSize: parsed.CHUNK_SIZE,
      chunkOverlap: parsed.CHUNK_OVERLAP,
      topK: parsed.TOP_K,
      contextK: parsed.CONTEXT_K,
      maxTokens: parsed.MAX_TOKENS,
      temperature: parsed.TEMPERATURE,
      explanationMaxTokens: parsed.EXPLANATION_MAX_TOKENS,
      explanationTemperature: parsed.EXPLANATION_TEMPERATURE,
      explainClauses: parsed.EXPLAIN_CLAUSES,
      questionConcurrency: parsed.QUESTION_CONCURRENCY,
    },
    requestTimeoutMs: parsed.REQUEST_TIMEOUT_MS,
    maxDocumentBytes: parsed.MAX_DOCUMENT_BYTES,
    embeddingConcurrency: parsed.EMBEDDING_CONCURRENCY,
    transport: parsed.MCP_TRANSPORT,
    host: parsed.MCP_HOST,
    port: parsed.MCP_PORT,
    logLevel: parsed.LOG_LEVEL,
  };
}

// `.env` files commonly carry `KEY=` placeholders; treat those as unset.
function withoutBlankValues(env: NodeJS.ProcessEnv): Record<string, string> {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") {
      cleaned[key] = value;
    }
  }
  return cleaned;
}
