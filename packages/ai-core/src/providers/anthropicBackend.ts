/**
 * Anthropic Backend
 *
 * Messages API backend. System messages are hoisted into the `system`
 * field and tool results travel as `tool_result` blocks in user turns.
 */

import type {
  FinishReason,
  GenerationRequest,
  GenerationResult,
  Message,
  ModelBackend,
} from "@taskloop/agent-runtime-core";
import { z } from "zod";
import { resolveToolCalls } from "../parsing/toolCalls";
import type { HttpBackendOptions } from "./backendOptions";
import { type FetchLike, postJson, withDecoding } from "./http";

export const ANTHROPIC_BASE_URL = "https://api.anthropic.com/v1";
const DEFAULT_API_VERSION = "2023-06-01";
const DEFAULT_MAX_TOKENS = 4096;

export interface AnthropicBackendOptions extends HttpBackendOptions {
  apiVersion?: string;
}

const messagesResponseSchema = z.object({
  model: z.string().optional(),
  content: z.array(
    z.union([
      z.object({ type: z.literal("text"), text: z.string() }),
      z.object({
        type: z.literal("tool_use"),
        id: z.string(),
        name: z.string(),
        input: z.unknown(),
      }),
      z.object({ type: z.string() }),
    ])
  ),
  stop_reason: z.string().nullish(),
  usage: z.object({ input_tokens: z.number(), output_tokens: z.number() }).nullish(),
});

type MessagesResponse = z.infer<typeof messagesResponseSchema>;

type AnthropicBlock =
  | { type: "text"; text: string }
  | { type: "tool_use"; id: string; name: string; input: Record<string, unknown> }
  | { type: "tool_result"; tool_use_id: string; content: string; is_error?: boolean };

interface AnthropicMessage {
  role: "user" | "assistant";
  content: string | AnthropicBlock[];
}

export class AnthropicBackend implements ModelBackend {
  readonly name = "anthropic";
  readonly model: string;

  private readonly options: AnthropicBackendOptions;
  private readonly baseUrl: string;
  private readonly fetchImpl: FetchLike;

  constructor(options: AnthropicBackendOptions) {
    this.options = options;
    this.model = options.model;
    this.baseUrl = options.baseUrl ?? ANTHROPIC_BASE_URL;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async generate(request: GenerationRequest): Promise<GenerationResult> {
    const { systemPrompt, messages } = formatMessages(request.messages);
    const body = withDecoding(
      {
        model: this.model,
        messages,
        ...(systemPrompt ? { system: systemPrompt } : {}),
        ...(request.tools.length > 0
          ? {
              tools: request.tools.map((tool) => ({
                name: tool.name,
                description: tool.description,
                input_schema: tool.inputSchema,
              })),
            }
          : {}),
      },
      { max_tokens: DEFAULT_MAX_TOKENS, ...request.decoding }
    );

    const outcome = await this.options.retry.execute(
      ({ signal }) =>
        postJson(
          {
            provider: this.name,
            url: `${this.baseUrl}/messages`,
            headers: {
              "x-api-key": this.options.apiKey,
              "anthropic-version": this.options.apiVersion ?? DEFAULT_API_VERSION,
            },
            body,
            timeoutMs: this.options.timeoutMs,
            signal,
            fetch: this.fetchImpl,
          },
          messagesResponseSchema
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

  private parseResponse(response: MessagesResponse, toolsOffered: boolean): GenerationResult {
    let content = "";
    const raw: Array<{ id: string; name: string; arguments: unknown }> = [];
    for (const block of response.content) {
      if ("text" in block) {
        content += block.text;
      } else if ("input" in block) {
        raw.push({ id: block.id, name: block.name, arguments: block.input });
      }
    }
    const parsed = resolveToolCalls({
      raw,
      content,
      toolsOffered,
      textToolCalls: this.options.textToolCalls,
    });

    const result: GenerationResult = {
      content,
      toolCalls: parsed.toolCalls,
      finishReason: mapFinishReason(response.stop_reason, parsed.toolCalls.length > 0),
      model: response.model ?? this.model,
    };
    if (response.usage) {
      result.usage = {
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
        totalTokens: response.usage.input_tokens + response.usage.output_tokens,
      };
    }
    if (parsed.warnings.length > 0) {
      result.parseWarnings = parsed.warnings;
    }
    return result;
  }
}

/**
 * Convert the transcript to Anthropic's alternating user/assistant turns.
 * Consecutive tool and user messages merge into one user turn of blocks.
 */
function formatMessages(messages: readonly Message[]): {
  systemPrompt: string | null;
  messages: AnthropicMessage[];
} {
  let systemPrompt: string | null = null;
  const formatted: AnthropicMessage[] = [];

  for (const message of messages) {
    switch (message.role) {
      case "system":
        systemPrompt = systemPrompt ? `${systemPrompt}\n${message.content}` : message.content;
        break;
      case "user":
        appendUserBlock(formatted, { type: "text", text: message.content });
        break;
      case "assistant": {
        const blocks: AnthropicBlock[] = [];
        if (message.content.trim() !== "") {
          blocks.push({ type: "text", text: message.content });
        }
        for (const call of message.toolCalls ?? []) {
          blocks.push({ type: "tool_use", id: call.id, name: call.name, input: call.arguments });
        }
        // The API rejects empty assistant content; a silent reply is dropped
        if (blocks.length > 0) {
          formatted.push({ role: "assistant", content: blocks });
        }
        break;
      }
      case "tool":
        appendUserBlock(formatted, {
          type: "tool_result",
          tool_use_id: message.toolCallId,
          content: message.content,
          ...(message.result.success ? {} : { is_error: true }),
        });
        break;
    }
  }

  return { systemPrompt, messages: formatted };
}

/** Add a block to the trailing user turn, opening a new turn when needed */
function appendUserBlock(formatted: AnthropicMessage[], block: AnthropicBlock): void {
  const previous = formatted.at(-1);
  if (previous?.role !== "user") {
    formatted.push({ role: "user", content: block.type === "text" ? block.text : [block] });
    return;
  }
  const blocks: AnthropicBlock[] =
    typeof previous.content === "string"
      ? [{ type: "text", text: previous.content }]
      : previous.content;
  blocks.push(block);
  previous.content = blocks;
}

function mapFinishReason(reason: string | null | undefined, hasToolCalls: boolean): FinishReason {
  switch (reason) {
    case "max_tokens":
      return "length";
    case "tool_use":
      return hasToolCalls ? "tool_call" : "stop";
    case "refusal":
      return "error";
    default:
      return hasToolCalls ? "tool_call" : "stop";
  }
}
