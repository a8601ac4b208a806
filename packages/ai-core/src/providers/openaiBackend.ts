/**
 * OpenAI-compatible Backend
 *
 * Chat completions backend for OpenAI and for OpenRouter, which speaks the
 * same wire format.
 */

import type {
  FinishReason,
  GenerationRequest,
  GenerationResult,
  Message,
  ModelBackend,
  TokenUsage,
  ToolDefinition,
} from "@taskloop/agent-runtime-core";
import { z } from "zod";
import { resolveToolCalls } from "../parsing/toolCalls";
import type { HttpBackendOptions } from "./backendOptions";
import { type FetchLike, postJson, withDecoding } from "./http";

export interface OpenAICompatibleBackendOptions extends HttpBackendOptions {
  /** Provider label used in errors and logs */
  provider: "openai" | "openrouter";
  organizationId?: string;
  /** Extra request headers (OpenRouter attribution, for example) */
  headers?: Record<string, string>;
}

export const OPENAI_BASE_URL = "https://api.openai.com/v1";
export const OPENROUTER_BASE_URL = "https://openrouter.ai/api/v1";

const completionResponseSchema = z.object({
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullish(),
          tool_calls: z
            .array(
              z.object({
                id: z.string().nullish(),
                function: z
                  .object({ name: z.string().nullish(), arguments: z.unknown() })
                  .nullish(),
              })
            )
            .nullish(),
        }),
        finish_reason: z.string().nullish(),
      })
    )
    .min(1),
  usage: z
    .object({
      prompt_tokens: z.number(),
      completion_tokens: z.number().optional(),
      total_tokens: z.number().optional(),
    })
    .nullish(),
});

type CompletionResponse = z.infer<typeof completionResponseSchema>;

type OpenAIMessage =
  | { role: "system" | "user"; content: string }
  | {
      role: "assistant";
      content: string | null;
      tool_calls?: Array<{
        id: string;
        type: "function";
        function: { name: string; arguments: string };
      }>;
    }
  | { role: "tool"; tool_call_id: string; content: string };

export class OpenAICompatibleBackend implements ModelBackend {
  readonly name: string;
  readonly model: string;

  private readonly options: OpenAICompatibleBackendOptions;
  private readonly baseUrl: string;
  private readonly fetchImpl: FetchLike;

  constructor(options: OpenAICompatibleBackendOptions) {
    this.options = options;
    this.name = options.provider;
    this.model = options.model;
    const defaultBaseUrl =
      options.provider === "openrouter" ? OPENROUTER_BASE_URL : OPENAI_BASE_URL;
    this.baseUrl = options.baseUrl ?? defaultBaseUrl;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async generate(request: GenerationRequest): Promise<GenerationResult> {
    const body = withDecoding(
      {
        model: this.model,
        messages: formatMessages(request.messages),
        ...(request.tools.length > 0 ? { tools: formatTools(request.tools) } : {}),
      },
      request.decoding
    );

    const outcome = await this.options.retry.execute(
      ({ signal }) =>
        postJson(
          {
            provider: this.name,
            url: `${this.baseUrl}/chat/completions`,
            headers: this.getHeaders(),
            body,
            timeoutMs: this.options.timeoutMs,
            signal,
            fetch: this.fetchImpl,
          },
          completionResponseSchema
        ),
      request.signal
    );

    const result = this.parseResponse(outcome.value, request.tools.length > 0);
    this.options.logger?.debug("Generation complete", {
      provider: this.name,
      model: result.model,
      attempts: outcome.attempts,
      toolCalls: result.toolCalls.length,
      finishReason: result.finishReason,
    });
    return { ...result, attempts: outcome.attempts };
  }

  private parseResponse(response: CompletionResponse, toolsOffered: boolean): GenerationResult {
    const choice = response.choices[0];
    const content = choice?.message.content ?? "";
    const raw = (choice?.message.tool_calls ?? []).map((call) => ({
      id: call.id,
      name: call.function?.name,
      arguments: call.function?.arguments,
    }));
    const parsed = resolveToolCalls({
      raw,
      content,
      toolsOffered,
      textToolCalls: this.options.textToolCalls,
    });

    const result: GenerationResult = {
      content,
      toolCalls: parsed.toolCalls,
      finishReason: mapFinishReason(choice?.finish_reason, parsed.toolCalls.length > 0),
      model: response.model ?? this.model,
    };
    if (response.usage) {
      result.usage = parseUsage(response.usage);
    }
    if (parsed.warnings.length > 0) {
      result.parseWarnings = parsed.warnings;
    }
    return result;
  }

  private getHeaders(): Record<string, string> {
    const headers: Record<string, string> = {
      Authorization: `Bearer ${this.options.apiKey}`,
      ...this.options.headers,
    };
    if (this.options.organizationId) {
      headers["OpenAI-Organization"] = this.options.organizationId;
    }
    return headers;
  }
}

function formatMessages(messages: readonly Message[]): OpenAIMessage[] {
  return messages.map((message): OpenAIMessage => {
    switch (message.role) {
      case "system":
      case "user":
        return { role: message.role, content: message.content };
      case "assistant":
        if (!message.toolCalls?.length) {
          return { role: "assistant", content: message.content };
        }
        return {
          role: "assistant",
          content: message.content || null,
          tool_calls: message.toolCalls.map((call) => ({
            id: call.id,
            type: "function",
            function: { name: call.name, arguments: JSON.stringify(call.arguments) },
          })),
        };
      case "tool":
        return { role: "tool", tool_call_id: message.toolCallId, content: message.content };
    }
  });
}

function formatTools(tools: readonly ToolDefinition[]) {
  return tools.map((tool) => ({
    type: "function",
    function: {
      name: tool.name,
      description: tool.description,
      parameters: tool.inputSchema,
    },
  }));
}

function parseUsage(usage: NonNullable<CompletionResponse["usage"]>): TokenUsage {
  const outputTokens = usage.completion_tokens ?? 0;
  return {
    inputTokens: usage.prompt_tokens,
    outputTokens,
    totalTokens: usage.total_tokens ?? usage.prompt_tokens + outputTokens,
  };
}

function mapFinishReason(reason: string | null | undefined, hasToolCalls: boolean): FinishReason {
  switch (reason) {
    case "length":
      return "length";
    case "tool_calls":
    case "function_call":
      return hasToolCalls ? "tool_call" : "stop";
    case "content_filter":
    case "error":
      return "error";
    default:
      return hasToolCalls ? "tool_call" : "stop";
  }
}
