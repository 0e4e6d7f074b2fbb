import { createHash, randomUUID } from "node:crypto";
import { ProviderName, RetrievalSettings } from "../config/env.js";
import {
  ConfigurationError,
  describeError,
  DimensionMismatchError,
  EmbeddingError,
  ExtractionError,
  IndexUnavailableError,
  NoChunksError,
  NoContentError,
  PipelineStage,
  RequestFailedError,
  RetrievalError,
  UpsertBatchError,
} from "../domain/errors.js";
import {
  AnswerBundle,
  Chunk,
  ClauseEvidence,
  DocumentQueryRequest,
  DocumentQueryResponse,
  Match,
  VectorRecord,
} from "../domain/types.js";
import { VectorIndex } from "../domain/vectorIndex.js";
import { EmbeddingGateway } from "../infra/ai/embeddingGateway.js";
import { TextGenerator } from "../infra/ai/types.js";
import { Logger } from "../infra/logger.js";
import {
  DocumentExtractor,
  DocumentType,
  resolveDocumentType,
} from "../infra/parsers/documentLoader.js";
import {
  buildAnswerPrompt,
  buildDecisionRationale,
  buildExplanationPrompt,
  buildFailureRationale,
  formatExplanation,
  formatFallbackExplanation,
  INSUFFICIENT_INFORMATION,
} from "../pipelines/answering.js";
import { splitIntoChunks, toChunks } from "../pipelines/chunking.js";
import { createLimiter, Limiter, mapWithConcurrency } from "../utils/concurrency.js";

export interface DocumentQueryContext {
  index: VectorIndex;
  embeddings: EmbeddingGateway;
  embeddingProvider: ProviderName;
  generator: TextGenerator;
  extractor: DocumentExtractor;
  settings: RetrievalSettings;
  logger: Logger;
}

interface IndexedDocument {
  source: string;
  chunkCount: number;
}

/**
 * Runs one request through extraction, chunking, embedding and indexing,
 * then answers every question against the indexed document. Write-path
 * failures abort the request; each question fails on its own.
 */
export class DocumentQueryService {
  constructor(private readonly context: DocumentQueryContext) {}

  async answerQuestions(request: DocumentQueryRequest): Promise<DocumentQueryResponse> {
    const startedAt = Date.now();
    const logger = this.context.logger.child({ requestId: randomUUID() });
    let stage: PipelineStage = "validation";

    try {
      const documentType = resolveDocumentType(request.documents);

      stage = "extraction";
      logger.debug({ stage, documentType }, "Extracting document text");
      const text = await this.extract(request.documents, documentType);

      stage = "chunking";
      logger.debug({ stage, characters: text.length }, "Chunking document");
      const chunks = this.chunk(text);

      stage = "embedding";
      logger.debug({ stage, chunks: chunks.length }, "Embedding chunks");
      const embeddings = await this.embedChunks(chunks);

      stage = "indexing";
      logger.debug({ stage, backend: this.context.index.backend }, "Indexing chunks");
      const indexed = await this.indexChunks(request.documents, text, chunks, embeddings);

      stage = "answering";
      logger.debug({ stage, questions: request.questions.length }, "Answering questions");
      const { questionConcurrency } = this.context.settings;
      // Answer and explanation calls share one bound across all questions.
      const generation = createLimiter(questionConcurrency);
      const answers = await mapWithConcurrency(
        request.questions,
        questionConcurrency,
        (question, position) =>
          this.answerQuestion(question, position, indexed, generation, logger),
      );

      logger.info(
        {
          chunks: indexed.chunkCount,
          questions: request.questions.length,
          backend: this.context.index.backend,
          latency_ms: Date.now() - startedAt,
        },
        "Request completed",
      );
      return { answers };
    } catch (error) {
      const failure =
        error instanceof RetrievalError ? error : new RequestFailedError(stage, { cause: error });
      logger.error(
        { err: failure, stage, kind: failure.kind, latency_ms: Date.now() - startedAt },
        "Request failed",
      );
      throw failure;
    }
  }

  private async extract(url: string, documentType: DocumentType): Promise<string> {
    let text: string;
    try {
      text = await this.context.extractor.extractText(url, documentType);
    } catch (error) {
      if (error instanceof RetrievalError) {
        throw error;
      }
      throw new ExtractionError(`Text extraction failed: ${describeError(error)}`, {
        cause: error,
      });
    }

    if (!text.trim()) {
      throw new NoContentError("The document contains no extractable text.");
    }
    return text;
  }

  private chunk(text: string): Chunk[] {
    const { chunkSize, chunkOverlap } = this.context.settings;
    const chunks = toChunks(splitIntoChunks(text, chunkSize, chunkOverlap));
    if (chunks.length === 0) {
      throw new NoChunksError("The document text produced no chunks.");
    }
    return chunks;
  }

  private async embedChunks(chunks: Chunk[]): Promise<number[][]> {
    try {
      return await this.context.embeddings.embedMany(
        chunks.map((chunk) => chunk.text),
        this.context.embeddingProvider,
      );
    } catch (error) {
      if (error instanceof ConfigurationError) {
        throw error;
      }
      throw new EmbeddingError(`Embedding chunks failed: ${describeError(error)}`, {
        cause: error,
      });
    }
  }

  private async indexChunks(
    url: string,
    text: string,
    chunks: Chunk[],
    embeddings: number[][],
  ): Promise<IndexedDocument> {
    const source = createSourceId(url, text);
    const records: VectorRecord[] = chunks.map((chunk, position) => ({
      id: `${source}-${chunk.ordinal}`,
      embedding: embeddings[position],
      metadata: {
        source,
        document_url: url,
        ordinal: chunk.ordinal,
        text: chunk.text,
      },
    }));

    try {
      await this.context.index.upsert(records);
      await this.context.index.persist();
    } catch (error) {
      if (error instanceof DimensionMismatchError || error instanceof UpsertBatchError) {
        throw error;
      }
      throw new IndexUnavailableError(`Indexing chunks failed: ${describeError(error)}`, {
        cause: error,
      });
    }

    return { source, chunkCount: records.length };
  }

  private async answerQuestion(
    question: string,
    position: number,
    document: IndexedDocument,
    generation: Limiter,
    logger: Logger,
  ): Promise<AnswerBundle> {
    const { index, embeddings, embeddingProvider, generator, settings } = this.context;
    let step = "retrieval";

    try {
      const embedding = await embeddings.embedOne(question, embeddingProvider);
      const matches = withChunkText(
        await index.query(embedding, settings.topK, {
          includeMetadata: true,
          filter: { source: document.source },
        }),
      );

      if (matches.length === 0) {
        logger.warn({ question: position }, "No matching chunks for question");
        return {
          answer: INSUFFICIENT_INFORMATION,
          clauses: [],
          decision_rationale: buildDecisionRationale({
            generator: generator.name,
            contextCount: 0,
            matchCount: 0,
            backend: index.backend,
          }),
        };
      }

      step = "answer generation";
      const contextMatches = matches.slice(0, settings.contextK);
      const answer = await generation(() =>
        generator.generate({
          prompt: buildAnswerPrompt(
            question,
            contextMatches.map((match) => match.text),
          ),
          maxTokens: settings.maxTokens,
          temperature: settings.temperature,
        }),
      );

      const clauses = await this.explainMatches(question, matches, generation, logger);
      return {
        answer: answer.trim(),
        clauses,
        decision_rationale: buildDecisionRationale({
          generator: generator.name,
          contextCount: contextMatches.length,
          matchCount: matches.length,
          backend: index.backend,
        }),
      };
    } catch (error) {
      logger.error({ err: error, question: position, step }, "Question failed");
      return {
        answer: `Unable to answer this question: ${describeError(error)}`,
        clauses: [],
        decision_rationale: buildFailureRationale(step, describeError(error)),
      };
    }
  }

  private async explainMatches(
    question: string,
    matches: ChunkMatch[],
    generation: Limiter,
    logger: Logger,
  ): Promise<ClauseEvidence[]> {
    const { generator, settings } = this.context;
    if (!settings.explainClauses) {
      return matches.map((match) => ({ text: match.text }));
    }

    return Promise.all(
      matches.map(async (match) => {
        try {
          const explanation = await generation(() =>
            generator.generate({
              prompt: buildExplanationPrompt(question, match.text),
              maxTokens: settings.explanationMaxTokens,
              temperature: settings.explanationTemperature,
            }),
          );
          return { text: match.text, explanation: formatExplanation(match.score, explanation) };
        } catch (error) {
          logger.warn(
            { err: error, chunk: match.id },
            "Relevance explanation failed, using fallback",
          );
          return { text: match.text, explanation: formatFallbackExplanation(match.score) };
        }
      }),
    );
  }
}

interface ChunkMatch extends Match {
  text: string;
}

function withChunkText(matches: Match[]): ChunkMatch[] {
  const result: ChunkMatch[] = [];
  for (const match of matches) {
    const text = match.metadata?.text;
    if (typeof text === "string") {
      result.push({ ...match, text });
    }
  }
  return result;
}

/**
 * Identifies one revision of a document: the same URL with different text
 * gets a new id, so chunks left over from an earlier revision fall outside
 * the query filter.
 */
export function createSourceId(url: string, text: string): string {
  const digest = createHash("sha1").update(url).update("\0").update(text).digest("hex");
  return `src_${digest.slice(0, 16)}`;
}
