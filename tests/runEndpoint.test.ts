import { describe, expect, it, vi } from "vitest";
import { DocumentQueryRunner, executeRunRequest } from "../src/api/runEndpoint.js";
import {
  IndexUnavailableError,
  NoChunksError,
  NoContentError,
  RetrievalError,
  UnsupportedDocumentError,
  UpsertBatchError,
} from "../src/domain/errors.js";

const VALID_BODY = {
  documents: "https://files.example.com/policy.pdf",
  questions: ["What is covered?"],
};

function failingRunner(error: unknown): DocumentQueryRunner {
  return {
    answerQuestions: async () => {
      throw error;
    },
  };
}

describe("executeRunRequest", () => {
  it("returns the answers with status 200", async () => {
    const answerQuestions = vi.fn(async () => ({
      answers: [{ answer: "Everything.", clauses: [], decision_rationale: "test" }],
    }));

    const result = await executeRunRequest({ answerQuestions }, VALID_BODY);

    expect(result).toEqual({
      status: 200,
      body: { answers: [{ answer: "Everything.", clauses: [], decision_rationale: "test" }] },
    });
    expect(answerQuestions).toHaveBeenCalledWith(VALID_BODY);
  });

  it("rejects a malformed body without running the pipeline", async () => {
    const answerQuestions = vi.fn();

    const result = await executeRunRequest(
      { answerQuestions },
      { documents: "https://files.example.com/policy.pdf", questions: [] },
    );

    expect(result.status).toBe(400);
    expect(result.body).toHaveProperty("error.kind", "invalid_request");
    expect(answerQuestions).not.toHaveBeenCalled();
  });

  it.each<[RetrievalError, number]>([
    [new UnsupportedDocumentError("Unsupported extension: .txt"), 400],
    [new NoContentError("empty"), 422],
    [new NoChunksError("no chunks"), 422],
    [new UpsertBatchError(["a"], 0), 503],
    [new IndexUnavailableError("down"), 503],
  ])("maps %s to its status code", async (error, status) => {
    const result = await executeRunRequest(failingRunner(error), VALID_BODY);

    expect(result.status).toBe(status);
    expect(result.body).toEqual({ error: { kind: error.kind, message: error.message } });
  });

  it("rethrows errors outside the retrieval taxonomy", async () => {
    await expect(executeRunRequest(failingRunner(new TypeError("bug")), VALID_BODY)).rejects.toThrow(
      TypeError,
    );
  });
});
