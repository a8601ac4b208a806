/**
 * Backend construction options shared by the HTTP providers.
 */

import type { RuntimeLogger } from "@taskloop/agent-runtime-telemetry/logging";
import type { FetchLike } from "./http";
import type { BackendRetryPolicy } from "../resilience/retryPolicy";

export interface HttpBackendOptions {
  model: string;
  apiKey: string;
  baseUrl?: string;
  /** Per-request timeout */
  timeoutMs: number;
  /** Extract tool calls written inline in assistant text */
  textToolCalls: boolean;
  retry: BackendRetryPolicy;
  /** Defaults to the global fetch */
  fetch?: FetchLike;
  logger?: RuntimeLogger;
}
