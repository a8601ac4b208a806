/**
 * AI Core
 *
 * Model backends for the agent runtime: provider wire formats, retry with
 * exponential backoff and tool-call parsing.
 */

export {
  type BackendEnv,
  type CreateModelBackendOptions,
  createModelBackend,
  normalizeOpenRouterModel,
  readBackendEnv,
} from "./factory";
export {
  createToolCallId,
  extractTextToolCalls,
  isPlainObject,
  type ParsedToolCalls,
  parseStructuredToolCalls,
  type RawToolCall,
  resolveToolCalls,
} from "./parsing/toolCalls";
export {
  ANTHROPIC_BASE_URL,
  AnthropicBackend,
  type AnthropicBackendOptions,
} from "./providers/anthropicBackend";
export type { HttpBackendOptions } from "./providers/backendOptions";
export { EchoBackend } from "./providers/echoBackend";
export { type FetchLike, postJson, resolveTimeoutSignal, withDecoding } from "./providers/http";
export {
  OPENAI_BASE_URL,
  OPENROUTER_BASE_URL,
  OpenAICompatibleBackend,
  type OpenAICompatibleBackendOptions,
} from "./providers/openaiBackend";
export {
  BackendRetryPolicy,
  type BackendRetryPolicyOptions,
  computeBackoffDelay,
  DEFAULT_RETRY_CONFIG,
  type RetryNotice,
  type RetryOutcome,
} from "./resilience/retryPolicy";
