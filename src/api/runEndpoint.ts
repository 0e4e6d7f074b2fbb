import { RetrievalError, RetrievalErrorKind } from "../domain/errors.js";
import { DocumentQueryRequest, DocumentQueryResponse } from "../domain/types.js";
import { documentQueryRequestSchema } from "./schemas.js";

export interface DocumentQueryRunner {
  answerQuestions(request: DocumentQueryRequest): Promise<DocumentQueryResponse>;
}

export interface ErrorPayload {
  error: {
    kind: RetrievalErrorKind | "invalid_request";
    message: string;
  };
}

export interface RunEndpointResult {
  status: number;
  body: DocumentQueryResponse | ErrorPayload;
}

const STATUS_BY_KIND: Record<RetrievalErrorKind, number> = {
  configuration: 500,
  dimension_mismatch: 500,
  unsupported_document: 400,
  extraction_failed: 502,
  no_content: 422,
  no_chunks: 422,
  embedding_failed: 502,
  index_unavailable: 503,
  index_corrupt: 503,
  upsert_partial_failure: 503,
  provider_call: 502,
  request_failed: 500,
};

export function statusForError(error: RetrievalError): number {
  return STATUS_BY_KIND[error.kind];
}

/** Validates a `POST /api/v1/run` body and maps the outcome to a status code. */
export async function executeRunRequest(
  runner: DocumentQueryRunner,
  body: unknown,
): Promise<RunEndpointResult> {
  const parsed = documentQueryRequestSchema.safeParse(body);
  if (!parsed.success) {
    return {
      status: 400,
      body: {
        error: {
          kind: "invalid_request",
          message: parsed.error.issues
            .map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`)
            .join("; "),
        },
      },
    };
  }

  try {
    return { status: 200, body: await runner.answerQuestions(parsed.data) };
  } catch (error) {
    if (error instanceof RetrievalError) {
      return {
        status: statusForError(error),
        body: { error: { kind: error.kind, message: error.message } },
      };
    }
    throw error;
  }
}
