/**
 * Backend Factory
 *
 * Builds a ModelBackend from the backend section of an AgentSpec by tagged
 * dispatch on its type. Credentials fall back to environment variables.
 */

import {
  AgentSpecError,
  type BackendConfig,
  type ModelBackend,
  type RetryConfig,
} from "@taskloop/agent-runtime-core";
import type { RuntimeLogger } from "@taskloop/agent-runtime-telemetry/logging";
import { AnthropicBackend } from "./providers/anthropicBackend";
import { EchoBackend } from "./providers/echoBackend";
import type { FetchLike } from "./providers/http";
import { OpenAICompatibleBackend } from "./providers/openaiBackend";
import { BackendRetryPolicy } from "./resilience/retryPolicy";

export interface BackendEnv {
  openrouterApiKey?: string;
  openrouterModel?: string;
  openaiApiKey?: string;
  anthropicApiKey?: string;
}

export function readBackendEnv(env: NodeJS.ProcessEnv = process.env): BackendEnv {
  return {
    openrouterApiKey: env.OPENROUTER_API_KEY || undefined,
    openrouterModel: env.OPENROUTER_MODEL || undefined,
    openaiApiKey: env.OPENAI_API_KEY || undefined,
    anthropicApiKey: env.ANTHROPIC_API_KEY || undefined,
  };
}

export interface CreateModelBackendOptions {
  retry?: Partial<RetryConfig>;
  /** Defaults to readBackendEnv() */
  env?: BackendEnv;
  fetch?: FetchLike;
  logger?: RuntimeLogger;
}

/**
 * OpenRouter expects provider-prefixed model ids; bare qwen ids get the
 * `qwen/` prefix.
 */
export function normalizeOpenRouterModel(model: string): string {
  if (!model.includes("/") && model.startsWith("qwen")) {
    return `qwen/${model}`;
  }
  return model;
}

function required(value: string | undefined, field: string, hint: string): string {
  if (!value) {
    throw new AgentSpecError(`Missing ${field}: ${hint}`, [{ path: field, message: hint }]);
  }
  return value;
}

/**
 * @throws AgentSpecError when a model id or API key is missing
 */
export function createModelBackend(
  config: BackendConfig,
  options: CreateModelBackendOptions = {}
): ModelBackend {
  const env = options.env ?? readBackendEnv();
  const logger = options.logger?.child({ backend: config.type });

  if (config.type === "echo") {
    return new EchoBackend(config.model);
  }

  const retry = new BackendRetryPolicy(options.retry, { logger });
  const shared = {
    baseUrl: config.baseUrl,
    timeoutMs: config.timeoutMs,
    textToolCalls: config.textToolCalls,
    retry,
    fetch: options.fetch,
    logger,
  };

  switch (config.type) {
    case "openrouter":
      return new OpenAICompatibleBackend({
        ...shared,
        provider: "openrouter",
        model: normalizeOpenRouterModel(
          required(
            config.model ?? env.openrouterModel,
            "backend.model",
            "set backend.model or OPENROUTER_MODEL"
          )
        ),
        apiKey: required(
          config.apiKey ?? env.openrouterApiKey,
          "backend.apiKey",
          "set backend.apiKey or OPENROUTER_API_KEY"
        ),
      });
    case "openai":
      return new OpenAICompatibleBackend({
        ...shared,
        provider: "openai",
        organizationId: config.organizationId,
        model: required(config.model, "backend.model", "set backend.model"),
        apiKey: required(
          config.apiKey ?? env.openaiApiKey,
          "backend.apiKey",
          "set backend.apiKey or OPENAI_API_KEY"
        ),
      });
    case "anthropic":
      return new AnthropicBackend({
        ...shared,
        model: required(config.model, "backend.model", "set backend.model"),
        apiKey: required(
          config.apiKey ?? env.anthropicApiKey,
          "backend.apiKey",
          "set backend.apiKey or ANTHROPIC_API_KEY"
        ),
      });
  }
}
