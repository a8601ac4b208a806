/**
 * Tool Call Parsing
 *
 * Turns provider tool-call payloads into ToolCall values. A response whose
 * tool calls cannot all be parsed is treated as text-only; the reasons are
 * returned as warnings instead of being thrown.
 */

import { randomUUID } from "node:crypto";
import type { ToolCall } from "@taskloop/agent-runtime-core";

/** Tool call as it arrives from a provider, before validation */
export interface RawToolCall {
  id?: string | null;
  name?: string | null;
  /** JSON string (OpenAI) or object (Anthropic) */
  arguments?: unknown;
}

export interface ParsedToolCalls {
  toolCalls: ToolCall[];
  warnings: string[];
}

type ArgumentsParse = { ok: true; value: Record<string, unknown> } | { ok: false; error: string };

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseArguments(raw: unknown): ArgumentsParse {
  if (raw === undefined || raw === null) {
    return { ok: true, value: {} };
  }
  if (isPlainObject(raw)) {
    return { ok: true, value: raw };
  }
  if (typeof raw !== "string") {
    return { ok: false, error: `arguments must be a JSON object, got ${typeof raw}` };
  }
  if (raw.trim() === "") {
    return { ok: true, value: {} };
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return { ok: false, error: `arguments are not valid JSON (${reason})` };
  }
  if (!isPlainObject(parsed)) {
    return { ok: false, error: "arguments must be a JSON object" };
  }
  return { ok: true, value: parsed };
}

export function createToolCallId(): string {
  return `call_${randomUUID()}`;
}

/**
 * Parse structured tool calls. All or nothing: one unparseable call empties
 * the list so the response is handled as text.
 */
export function parseStructuredToolCalls(raw: readonly RawToolCall[]): ParsedToolCalls {
  const toolCalls: ToolCall[] = [];
  const warnings: string[] = [];

  raw.forEach((call, index) => {
    const name = call.name?.trim();
    if (!name) {
      warnings.push(`tool call ${index} has no name`);
      return;
    }
    const args = parseArguments(call.arguments);
    if (!args.ok) {
      warnings.push(`tool call ${index} (${name}): ${args.error}`);
      return;
    }
    toolCalls.push({ id: call.id || createToolCallId(), name, arguments: args.value });
  });

  if (warnings.length > 0) {
    return { toolCalls: [], warnings };
  }
  return { toolCalls, warnings };
}

// ============================================================================
// Inline (text) tool calls
// ============================================================================

const FENCED_JSON_PATTERN = /```json\s*(\{[\s\S]*?\})\s*```/gi;
const TAGGED_CALL_PATTERN = /<tool_call\s+name="([^"]+)"\s*>([\s\S]*?)<\/tool_call>/g;

function readFencedPayload(payload: Record<string, unknown>): RawToolCall | null {
  const fn = isPlainObject(payload.function) ? payload.function : undefined;
  const name = typeof payload.name === "string" ? payload.name : fn?.name;
  if (typeof name !== "string" || name === "") {
    return null;
  }
  return { name, arguments: payload.arguments ?? fn?.arguments };
}

/**
 * Extract tool calls a model wrote into its text: fenced ```json blocks
 * holding `{ name, arguments }` and `<tool_call name="...">{...}</tool_call>`
 * tags. Blocks that do not parse are skipped with a warning.
 */
export function extractTextToolCalls(text: string): ParsedToolCalls {
  const raw: RawToolCall[] = [];
  const warnings: string[] = [];

  for (const match of text.matchAll(FENCED_JSON_PATTERN)) {
    let payload: unknown;
    try {
      payload = JSON.parse(match[1] ?? "");
    } catch {
      warnings.push("skipped fenced json block that is not valid JSON");
      continue;
    }
    const call = isPlainObject(payload) ? readFencedPayload(payload) : null;
    if (call) {
      raw.push(call);
    }
  }

  for (const match of text.matchAll(TAGGED_CALL_PATTERN)) {
    raw.push({ name: match[1], arguments: (match[2] ?? "").trim() });
  }

  const toolCalls: ToolCall[] = [];
  for (const call of raw) {
    const parsed = parseStructuredToolCalls([call]);
    toolCalls.push(...parsed.toolCalls);
    warnings.push(...parsed.warnings);
  }
  return { toolCalls, warnings };
}

export interface ResolveToolCallsInput {
  /** Structured tool calls from the provider payload */
  raw: readonly RawToolCall[];
  content: string;
  /** Whether any tool schema was sent with the request */
  toolsOffered: boolean;
  /** Fall back to inline tool calls when the payload has none */
  textToolCalls: boolean;
}

/**
 * Pick the tool calls of a response: structured ones when present, inline
 * ones only when enabled and tools were offered.
 */
export function resolveToolCalls(input: ResolveToolCallsInput): ParsedToolCalls {
  if (input.raw.length > 0) {
    return parseStructuredToolCalls(input.raw);
  }
  if (input.textToolCalls && input.toolsOffered) {
    return extractTextToolCalls(input.content);
  }
  return { toolCalls: [], warnings: [] };
}
