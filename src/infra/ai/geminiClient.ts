import { z } from "zod";
import { ProviderCallError } from "../../domain/errors.js";
import { postJson } from "./http.js";
import { EmbeddingProvider, GenerationRequest, TextGenerator } from "./types.js";

interface GeminiClientOptions {
  apiKey: string | null;
  embeddingModel: string;
  chatModel: string;
  timeoutMs: number;
  baseUrl?: string;
}

const embedContentResponseSchema = z.object({
  embedding: z.object({
    values: z.array(z.number()),
  }),
});

const generateContentResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({
            parts: z.array(z.object({ text: z.string().optional() })).optional(),
          })
          .optional(),
      }),
    )
    .optional(),
});

export class GeminiClient implements EmbeddingProvider, TextGenerator {
  readonly name = "gemini" as const;

  private readonly baseUrl: string;

  constructor(private readonly options: GeminiClientOptions) {
    this.baseUrl = options.baseUrl ?? "https://generativelanguage.googleapis.com/v1beta";
  }

  isConfigured(): boolean {
    return Boolean(this.options.apiKey);
  }

  async embedQuery(query: string): Promise<number[]> {
    const model = this.options.embeddingModel;
    const data = await postJson({
      provider: this.name,
      operation: "embedContent",
      url: `${this.baseUrl}/models/${model}:embedContent`,
      headers: this.authHeaders(),
      timeoutMs: this.options.timeoutMs,
      schema: embedContentResponseSchema,
      body: {
        model: `models/${model}`,
        content: { parts: [{ text: query }] },
      },
    });

    if (data.embedding.values.length === 0) {
      throw new ProviderCallError(this.name, "embedContent returned empty vector.");
    }
    return data.embedding.values;
  }

  async generate(request: GenerationRequest): Promise<string> {
    const data = await postJson({
      provider: this.name,
      operation: "generateContent",
      url: `${this.baseUrl}/models/${this.options.chatModel}:generateContent`,
      headers: this.authHeaders(),
      timeoutMs: this.options.timeoutMs,
      schema: generateContentResponseSchema,
      body: {
        contents: [{ parts: [{ text: request.prompt }] }],
        generationConfig: {
          temperature: request.temperature,
          maxOutputTokens: request.maxTokens,
          candidateCount: 1,
        },
      },
    });

    const text = (data.candidates?.[0]?.content?.parts ?? [])
      .map((part) => part.text ?? "")
      .join("")
      .trim();
    if (!text) {
      throw new ProviderCallError(this.name, "generateContent returned no text");
    }
    return text;
  }

  private authHeaders(): Record<string, string> {
    if (!this.options.apiKey) {
      throw new ProviderCallError(this.name, "GEMINI_API_KEY is required for Gemini operations.");
    }
    return { "x-goog-api-key": this.options.apiKey };
  }
}
