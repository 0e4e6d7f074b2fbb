export type RetrievalErrorKind =
  | "configuration"
  | "dimension_mismatch"
  | "unsupported_document"
  | "extraction_failed"
  | "no_content"
  | "no_chunks"
  | "embedding_failed"
  | "index_unavailable"
  | "index_corrupt"
  | "upsert_partial_failure"
  | "provider_call"
  | "request_failed";

export type PipelineStage =
  | "validation"
  | "extraction"
  | "chunking"
  | "embedding"
  | "indexing"
  | "answering";

/**
 * Base class for every failure the retrieval pipeline reports. `kind` is
 * stable and safe to expose to callers; `clientInput` marks failures caused
 * by the request rather than by the service.
 */
export abstract class RetrievalError extends Error {
  abstract readonly kind: RetrievalErrorKind;

  readonly clientInput: boolean = false;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigurationError extends RetrievalError {
  readonly kind = "configuration";
}

export class DimensionMismatchError extends RetrievalError {
  readonly kind = "dimension_mismatch";

  constructor(
    readonly expected: number,
    readonly actual: number,
    readonly recordId?: string,
  ) {
    super(
      recordId
        ? `Embedding for record "${recordId}" has dimension ${actual}, index expects ${expected}.`
        : `Embedding has dimension ${actual}, index expects ${expected}.`,
    );
  }
}

export class UnsupportedDocumentError extends RetrievalError {
  readonly kind = "unsupported_document";

  override readonly clientInput = true;
}

export class ExtractionError extends RetrievalError {
  readonly kind = "extraction_failed";
}

export class NoContentError extends RetrievalError {
  readonly kind = "no_content";

  override readonly clientInput = true;
}

export class NoChunksError extends RetrievalError {
  readonly kind = "no_chunks";

  override readonly clientInput = true;
}

export class EmbeddingError extends RetrievalError {
  readonly kind = "embedding_failed";
}

export class IndexUnavailableError extends RetrievalError {
  readonly kind = "index_unavailable";
}

export class CorruptIndexError extends RetrievalError {
  readonly kind = "index_corrupt";
}

export class UpsertBatchError extends RetrievalError {
  readonly kind = "upsert_partial_failure";

  constructor(
    readonly failedIds: string[],
    readonly upsertedCount: number,
    options?: { cause?: unknown },
  ) {
    super(
      `Upsert failed for ${failedIds.length} record(s); ${upsertedCount} record(s) were written.`,
      options,
    );
  }
}

export class ProviderCallError extends RetrievalError {
  readonly kind = "provider_call";

  constructor(
    readonly provider: string,
    message: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(`${provider}: ${message}`, options);
  }
}

export class RequestFailedError extends RetrievalError {
  readonly kind = "request_failed";

  constructor(
    readonly stage: PipelineStage,
    options?: { cause?: unknown },
  ) {
    super(`Request failed during ${stage}: ${describeError(options?.cause)}`, options);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : "unknown error";
}
