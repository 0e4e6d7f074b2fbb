import {
  ConfigurationError,
  ProviderCallError,
} from "../../domain/errors.js";
import { ProviderName } from "../../config/env.js";
import { mapWithConcurrency } from "../../utils/concurrency.js";
import { EmbeddingProvider } from "./types.js";

const DEFAULT_CONCURRENCY = 4;

export class EmbeddingGateway {
  private readonly providers = new Map<string, EmbeddingProvider>();

  private readonly concurrency: number;

  constructor(
    providers: EmbeddingProvider[],
    options?: { concurrency?: number },
  ) {
    for (const provider of providers) {
      this.providers.set(provider.name, provider);
    }
    this.concurrency = options?.concurrency ?? DEFAULT_CONCURRENCY;
  }

  isConfigured(provider: string): boolean {
    return this.providers.get(provider)?.isConfigured() ?? false;
  }

  async embedOne(text: string, provider: ProviderName | string): Promise<number[]> {
    return this.resolve(provider).embedQuery(text);
  }

  /**
   * Embeds `texts` in input order. Uses the provider's batch endpoint when it
   * has one; otherwise issues concurrent single calls and fails as a whole if
   * any of them fails.
   */
  async embedMany(texts: string[], provider: ProviderName | string): Promise<number[][]> {
    const resolved = this.resolve(provider);
    if (texts.length === 0) {
      return [];
    }

    if (resolved.embedTexts) {
      const embeddings = await resolved.embedTexts(texts);
      if (embeddings.length !== texts.length) {
        throw new ProviderCallError(
          resolved.name,
          `batch embedding returned ${embeddings.length} vectors for ${texts.length} inputs`,
        );
      }
      return embeddings;
    }

    return mapWithConcurrency(texts, this.concurrency, (text) =>
      resolved.embedQuery(text),
    );
  }

  private resolve(name: string): EmbeddingProvider {
    const provider = this.providers.get(name);
    if (!provider) {
      throw new ConfigurationError(
        `Unknown embedding provider "${name}". Available: ${[...this.providers.keys()].join(", ") || "none"}.`,
      );
    }
    if (!provider.isConfigured()) {
      throw new ConfigurationError(
        `Embedding provider "${name}" is not configured (missing credentials).`,
      );
    }
    return provider;
  }
}
