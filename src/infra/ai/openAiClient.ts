import { z } from "zod";
import { ProviderCallError } from "../../domain/errors.js";
import { postJson } from "./http.js";
import { EmbeddingProvider, GenerationRequest, TextGenerator } from "./types.js";

interface OpenAiClientOptions {
  apiKey: string | null;
  embeddingModel: string;
  chatModel: string;
  timeoutMs: number;
  baseUrl?: string;
}

const embeddingResponseSchema = z.object({
  data: z.array(
    z.object({
      embedding: z.array(z.number()),
      index: z.number().int(),
    }),
  ),
});

const chatResponseSchema = z.object({
  choices: z.array(
    z.object({
      message: z.object({
        content: z.string().nullable(),
      }),
    }),
  ),
});

// The embeddings endpoint rejects requests above 2048 inputs.
const MAX_INPUTS_PER_REQUEST = 512;

export class OpenAiClient implements EmbeddingProvider, TextGenerator {
  readonly name = "openai" as const;

  private readonly baseUrl: string;

  constructor(private readonly options: OpenAiClientOptions) {
    this.baseUrl = options.baseUrl ?? "https://api.openai.com/v1";
  }

  isConfigured(): boolean {
    return Boolean(this.options.apiKey);
  }

  async embedTexts(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const embeddings: number[][] = [];
    for (let start = 0; start < texts.length; start += MAX_INPUTS_PER_REQUEST) {
      const batch = texts.slice(start, start + MAX_INPUTS_PER_REQUEST);
      embeddings.push(...(await this.embedBatch(batch)));
    }
    return embeddings;
  }

  async embedQuery(query: string): Promise<number[]> {
    const [embedding] = await this.embedBatch([query]);
    return embedding;
  }

  async generate(request: GenerationRequest): Promise<string> {
    const data = await postJson({
      provider: this.name,
      operation: "chat completion",
      url: `${this.baseUrl}/chat/completions`,
      headers: this.authHeaders(),
      timeoutMs: this.options.timeoutMs,
      schema: chatResponseSchema,
      body: {
        model: this.options.chatModel,
        max_tokens: request.maxTokens,
        temperature: request.temperature,
        messages: [{ role: "user", content: request.prompt }],
      },
    });

    const content = data.choices[0]?.message.content?.trim();
    if (!content) {
      throw new ProviderCallError(this.name, "chat completion returned no content");
    }
    return content;
  }

  private async embedBatch(texts: string[]): Promise<number[][]> {
    const data = await postJson({
      provider: this.name,
      operation: "embeddings",
      url: `${this.baseUrl}/embeddings`,
      headers: this.authHeaders(),
      timeoutMs: this.options.timeoutMs,
      schema: embeddingResponseSchema,
      body: {
        model: this.options.embeddingModel,
        input: texts,
      },
    });

    if (data.data.length !== texts.length) {
      throw new ProviderCallError(
        this.name,
        `embeddings returned ${data.data.length} vectors for ${texts.length} inputs`,
      );
    }

    return [...data.data]
      .sort((a, b) => a.index - b.index)
      .map((item) => item.embedding);
  }

  private authHeaders(): Record<string, string> {
    if (!this.options.apiKey) {
      throw new ProviderCallError(this.name, "OPENAI_API_KEY is required for OpenAI operations.");
    }
    return { Authorization: `Bearer ${this.options.apiKey}` };
  }
}
