import { z } from "zod";
import { describeError, ProviderCallError } from "../../domain/errors.js";

export interface PostJsonOptions<T> {
  provider: string;
  operation: string;
  url: string;
  body: unknown;
  headers?: Record<string, string>;
  timeoutMs: number;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
}

/**
 * POSTs a JSON body and validates the JSON response. Network failures,
 * timeouts, non-2xx statuses and unexpected payloads all surface as
 * `ProviderCallError`.
 */
export async function postJson<T>(options: PostJsonOptions<T>): Promise<T> {
  const { provider, operation } = options;

  let response: Response;
  try {
    response = await fetch(options.url, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        ...options.headers,
      },
      body: JSON.stringify(options.body),
      signal: AbortSignal.timeout(options.timeoutMs),
    });
  } catch (error) {
    throw new ProviderCallError(
      provider,
      isTimeout(error)
        ? `${operation} timed out after ${options.timeoutMs}ms`
        : `${operation} request failed: ${describeError(error)}`,
      undefined,
      { cause: error },
    );
  }

  if (!response.ok) {
    throw new ProviderCallError(
      provider,
      `${operation} failed (${response.status}): ${await readErrorBody(response)}`,
      response.status,
    );
  }

  let payload: unknown;
  try {
    payload = await response.json();
  } catch (error) {
    throw new ProviderCallError(provider, `${operation} returned invalid JSON`, response.status, {
      cause: error,
    });
  }

  const parsed = options.schema.safeParse(payload);
  if (!parsed.success) {
    throw new ProviderCallError(
      provider,
      `${operation} returned an unexpected payload: ${parsed.error.issues[0]?.message ?? "invalid"}`,
      response.status,
    );
  }
  return parsed.data;
}

export function isTimeout(error: unknown): boolean {
  return (
    error instanceof Error &&
    (error.name === "TimeoutError" || error.name === "AbortError")
  );
}

async function readErrorBody(response: Response): Promise<string> {
  try {
    return (await response.text()).slice(0, 500);
  } catch {
    return "<unreadable body>";
  }
}
