import { z } from "zod";
import { ProviderCallError } from "../../domain/errors.js";
import { postJson } from "./http.js";
import { EmbeddingProvider, GenerationRequest, TextGenerator } from "./types.js";

interface OllamaClientOptions {
  baseUrl: string;
  chatModel: string;
  embeddingModel: string;
  timeoutMs: number;
  configured: boolean;
}

const embeddingsResponseSchema = z.object({
  embedding: z.array(z.number()).optional(),
});

const chatResponseSchema = z.object({
  message: z
    .object({
      content: z.string().optional(),
    })
    .optional(),
});

export class OllamaClient implements EmbeddingProvider, TextGenerator {
  readonly name = "ollama" as const;

  constructor(private readonly options: OllamaClientOptions) {}

  isConfigured(): boolean {
    return this.options.configured;
  }

  async embedQuery(query: string): Promise<number[]> {
    const data = await postJson({
      provider: this.name,
      operation: "embeddings",
      url: `${this.options.baseUrl}/api/embeddings`,
      timeoutMs: this.options.timeoutMs,
      schema: embeddingsResponseSchema,
      body: {
        model: this.options.embeddingModel,
        prompt: query,
      },
    });

    if (!data.embedding || data.embedding.length === 0) {
      throw new ProviderCallError(this.name, "embeddings returned empty vector.");
    }
    return data.embedding;
  }

  async generate(request: GenerationRequest): Promise<string> {
    const data = await postJson({
      provider: this.name,
      operation: "chat",
      url: `${this.options.baseUrl}/api/chat`,
      timeoutMs: this.options.timeoutMs,
      schema: chatResponseSchema,
      body: {
        model: this.options.chatModel,
        stream: false,
        keep_alive: "30m",
        options: {
          temperature: request.temperature,
          num_predict: request.maxTokens,
          top_p: 0.9,
        },
        messages: [{ role: "user", content: request.prompt }],
      },
    });

    const content = data.message?.content?.trim();
    if (!content) {
      throw new ProviderCallError(this.name, "chat returned no content");
    }
    return content;
  }
}
