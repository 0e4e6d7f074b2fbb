import { AppConfig, ProviderName } from "../../config/env.js";
import { ConfigurationError } from "../../domain/errors.js";
import { EmbeddingGateway } from "./embeddingGateway.js";
import { GeminiClient } from "./geminiClient.js";
import { OllamaClient } from "./ollamaClient.js";
import { OpenAiClient } from "./openAiClient.js";
import { TextGenerator } from "./types.js";

export interface AiProviders {
  embeddings: EmbeddingGateway;
  embeddingProvider: ProviderName;
  generator: TextGenerator;
}

export function createAiProviders(config: AppConfig): AiProviders {
  const clients = [
    new OpenAiClient({
      apiKey: config.openaiApiKey,
      embeddingModel: config.openaiEmbeddingModel,
      chatModel: config.openaiChatModel,
      timeoutMs: config.requestTimeoutMs,
    }),
    new GeminiClient({
      apiKey: config.geminiApiKey,
      embeddingModel: config.geminiEmbeddingModel,
      chatModel: config.geminiChatModel,
      timeoutMs: config.requestTimeoutMs,
    }),
    new OllamaClient({
      baseUrl: config.ollamaBaseUrl,
      chatModel: config.ollamaChatModel,
      embeddingModel: config.ollamaEmbeddingModel,
      timeoutMs: config.requestTimeoutMs,
      configured: config.ollamaConfigured,
    }),
  ];

  const generator = clients.find((client) => client.name === config.generationProvider);
  if (!generator || !generator.isConfigured()) {
    throw new ConfigurationError(
      `Generation provider "${config.generationProvider}" is not configured.`,
    );
  }

  const embeddings = new EmbeddingGateway(clients, {
    concurrency: config.embeddingConcurrency,
  });
  if (!embeddings.isConfigured(config.embeddingProvider)) {
    throw new ConfigurationError(
      `Embedding provider "${config.embeddingProvider}" is not configured.`,
    );
  }

  return {
    embeddings,
    embeddingProvider: config.embeddingProvider,
    generator,
  };
}
