/**
 * HTTP transport shared by the provider backends.
 *
 * Posts JSON and converts every failure into a typed BackendError so the
 * retry policy can tell transient from fatal.
 */

import { BackendError, TransientBackendError } from "@taskloop/agent-runtime-core";
import type { z } from "zod";

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface PostJsonOptions {
  provider: string;
  url: string;
  headers: Record<string, string>;
  body: Record<string, unknown>;
  timeoutMs: number;
  signal?: AbortSignal;
  fetch: FetchLike;
}

export function resolveTimeoutSignal(timeoutMs: number, signal?: AbortSignal): AbortSignal {
  const timeoutSignal = AbortSignal.timeout(timeoutMs);
  return signal ? AbortSignal.any([signal, timeoutSignal]) : timeoutSignal;
}

function classifyFetchFailure(provider: string, error: unknown, timeoutMs: number): BackendError {
  const cause = error instanceof Error ? error : new Error(String(error));
  if (cause.name === "TimeoutError" || cause.name === "AbortError") {
    return new TransientBackendError(
      `Request to ${provider} timed out after ${timeoutMs}ms`,
      "NETWORK_TIMEOUT",
      provider,
      { cause }
    );
  }
  return new TransientBackendError(
    `Connection to ${provider} failed: ${cause.message}`,
    "NETWORK_CONNECTION_FAILED",
    provider,
    { cause }
  );
}

/**
 * POST a JSON body and validate the JSON reply against a schema.
 *
 * An unreadable or unexpected body is transient: providers occasionally
 * return truncated or error-shaped payloads with a 200 status.
 */
export async function postJson<T>(
  options: PostJsonOptions,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): Promise<T> {
  const { provider, timeoutMs } = options;

  let response: Response;
  try {
    response = await options.fetch(options.url, {
      method: "POST",
      headers: { "Content-Type": "application/json", ...options.headers },
      body: JSON.stringify(options.body),
      signal: resolveTimeoutSignal(timeoutMs, options.signal),
    });
  } catch (error) {
    throw classifyFetchFailure(provider, error, timeoutMs);
  }

  let text: string;
  try {
    text = await response.text();
  } catch (error) {
    throw classifyFetchFailure(provider, error, timeoutMs);
  }

  if (!response.ok) {
    throw BackendError.fromResponse(provider, response.status, text);
  }

  let payload: unknown;
  try {
    payload = JSON.parse(text);
  } catch (error) {
    throw new TransientBackendError(
      `${provider} returned a body that is not JSON`,
      "MALFORMED_RESPONSE",
      provider,
      { statusCode: response.status, cause: error, context: { body: text.slice(0, 200) } }
    );
  }

  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    throw new TransientBackendError(
      `${provider} returned an unexpected response shape: ${parsed.error.issues
        .map((issue) => `${issue.path.join(".") || "(root)"} ${issue.message}`)
        .join("; ")}`,
      "MALFORMED_RESPONSE",
      provider,
      { statusCode: response.status, context: { body: text.slice(0, 200) } }
    );
  }
  return parsed.data;
}

/**
 * Merge decoding parameters into a request body. Null and undefined values
 * are dropped; request fields the backend sets itself take precedence.
 */
export function withDecoding(
  body: Record<string, unknown>,
  decoding: Readonly<Record<string, unknown>>
): Record<string, unknown> {
  const merged: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(decoding)) {
    if (value !== null && value !== undefined) {
      merged[key] = value;
    }
  }
  return { ...merged, ...body };
}
