import { afterEach, describe, expect, it, vi } from "vitest";
import { ProviderCallError } from "../src/domain/errors.js";
import { GeminiClient } from "../src/infra/ai/geminiClient.js";
import { OllamaClient } from "../src/infra/ai/ollamaClient.js";
import { OpenAiClient } from "../src/infra/ai/openAiClient.js";

function jsonResponse(payload: unknown, status = 200): Response {
  return new Response(JSON.stringify(payload), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

function stubFetch(handler: (url: string, init?: RequestInit) => Response | Promise<Response>) {
  const fetchMock = vi.fn(async (input: string | URL | Request, init?: RequestInit) =>
    handler(String(input), init),
  );
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

function openAi() {
  return new OpenAiClient({
    apiKey: "test-secret",
    embeddingModel: "text-embedding-3-small",
    chatModel: "gpt-4o-mini",
    timeoutMs: 1_000,
  });
}

describe("provider clients", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("orders OpenAI batch embeddings by their reported index", async () => {
    stubFetch(() =>
      jsonResponse({
        data: [
          { index: 1, embedding: [0.2] },
          { index: 0, embedding: [0.1] },
        ],
      }),
    );

    expect(await openAi().embedTexts(["first", "second"])).toEqual([[0.1], [0.2]]);
  });

  it("sends the bearer token and chat parameters to OpenAI", async () => {
    const fetchMock = stubFetch(() =>
      jsonResponse({ choices: [{ message: { content: " Covered. " } }] }),
    );

    const answer = await openAi().generate({ prompt: "Q?", maxTokens: 800, temperature: 0.3 });

    expect(answer).toBe("Covered.");
    const init = fetchMock.mock.calls[0][1];
    expect(init?.headers).toMatchObject({ Authorization: "Bearer test-secret" });
    expect(JSON.parse(String(init?.body))).toMatchObject({
      model: "gpt-4o-mini",
      max_tokens: 800,
      temperature: 0.3,
    });
  });

  it("reports non-2xx responses as provider call errors", async () => {
    stubFetch(() => new Response("rate limit", { status: 429 }));

    const error = await openAi()
      .embedQuery("hello")
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ProviderCallError);
    expect(error).toHaveProperty("status", 429);
    expect(error).toHaveProperty("message", "openai: embeddings failed (429): rate limit");
  });

  it("reports a timed-out call as a provider call error", async () => {
    stubFetch(() => {
      const timeout = new Error("The operation was aborted due to timeout");
      timeout.name = "TimeoutError";
      throw timeout;
    });
    const client = new OllamaClient({
      baseUrl: "http://127.0.0.1:11434",
      chatModel: "llama3",
      embeddingModel: "nomic-embed-text",
      timeoutMs: 250,
      configured: true,
    });

    await expect(client.embedQuery("hello")).rejects.toThrow(
      "ollama: embeddings timed out after 250ms",
    );
  });

  it("rejects payloads of the wrong shape", async () => {
    stubFetch(() => jsonResponse({ embedding: { values: "nope" } }));
    const client = new GeminiClient({
      apiKey: "test-secret",
      embeddingModel: "text-embedding-004",
      chatModel: "gemini-1.5-flash",
      timeoutMs: 1_000,
    });

    await expect(client.embedQuery("hello")).rejects.toThrow(ProviderCallError);
  });
});
