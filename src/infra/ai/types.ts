import { ProviderName } from "../../config/env.js";

export interface EmbeddingProvider {
  readonly name: ProviderName;
  isConfigured(): boolean;
  embedQuery(text: string): Promise<number[]>;
  /** Present only when the remote API accepts many inputs per call. */
  embedTexts?(texts: string[]): Promise<number[][]>;
}

export interface GenerationRequest {
  prompt: string;
  maxTokens: number;
  temperature: number;
}

export interface TextGenerator {
  readonly name: ProviderName;
  isConfigured(): boolean;
  generate(request: GenerationRequest): Promise<string>;
}
