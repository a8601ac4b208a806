import {
  FatalBackendError,
  type GenerationRequest,
  type Message,
} from "@taskloop/agent-runtime-core";
import { describe, expect, test, vi } from "vitest";
import { BackendRetryPolicy } from "../resilience/retryPolicy";
import { OpenAICompatibleBackend } from "./openaiBackend";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

function completion(message: Record<string, unknown>, finishReason = "stop") {
  return {
    model: "test-model",
    choices: [
      { index: 0, message: { role: "assistant", ...message }, finish_reason: finishReason },
    ],
    usage: { prompt_tokens: 10, completion_tokens: 5, total_tokens: 15 },
  };
}

function createBackend(
  responses: Array<() => Response>,
  overrides: { maxRetries?: number; textToolCalls?: boolean } = {}
) {
  let index = 0;
  const fetchMock = vi.fn(async (_url: string, _init: RequestInit) => {
    const next = responses[Math.min(index, responses.length - 1)];
    index += 1;
    if (!next) {
      throw new Error("no response configured");
    }
    return next();
  });
  const backend = new OpenAICompatibleBackend({
    provider: "openrouter",
    model: "qwen/qwen2.5-coder",
    apiKey: "test-secret",
    timeoutMs: 5000,
    textToolCalls: overrides.textToolCalls ?? false,
    retry: new BackendRetryPolicy({
      maxRetries: overrides.maxRetries ?? 3,
      initialDelayMs: 1,
      maxDelayMs: 2,
    }),
    fetch: fetchMock,
  });
  return { backend, fetchMock };
}

function sentBody(fetchMock: ReturnType<typeof createBackend>["fetchMock"]): unknown {
  const init = fetchMock.mock.calls[0]?.[1];
  return JSON.parse(String(init?.body));
}

const baseRequest: GenerationRequest = {
  messages: [
    { role: "system", content: "sys" },
    { role: "user", content: "Fix the bug" },
  ],
  tools: [],
  decoding: {},
};

describe("OpenAICompatibleBackend", () => {
  test("returns text and usage for a plain reply", async () => {
    const { backend, fetchMock } = createBackend([
      () => jsonResponse(completion({ content: "All done." })),
    ]);

    const result = await backend.generate(baseRequest);

    expect(result).toEqual({
      content: "All done.",
      toolCalls: [],
      finishReason: "stop",
      model: "test-model",
      usage: { inputTokens: 10, outputTokens: 5, totalTokens: 15 },
      attempts: 1,
    });
    expect(fetchMock.mock.calls[0]?.[0]).toBe("https://openrouter.ai/api/v1/chat/completions");
    expect(fetchMock.mock.calls[0]?.[1].headers).toMatchObject({
      Authorization: "Bearer test-secret",
    });
  });

  test("parses structured tool calls", async () => {
    const { backend } = createBackend([
      () =>
        jsonResponse(
          completion(
            {
              content: null,
              tool_calls: [
                {
                  id: "call_1",
                  type: "function",
                  function: { name: "workspace_read", arguments: '{"path":"README.md"}' },
                },
              ],
            },
            "tool_calls"
          )
        ),
    ]);

    const result = await backend.generate(baseRequest);

    expect(result.content).toBe("");
    expect(result.finishReason).toBe("tool_call");
    expect(result.toolCalls).toEqual([
      { id: "call_1", name: "workspace_read", arguments: { path: "README.md" } },
    ]);
  });

  test("falls back to text when tool call arguments do not parse", async () => {
    const { backend } = createBackend([
      () =>
        jsonResponse(
          completion(
            {
              content: "trying",
              tool_calls: [{ id: "call_1", function: { name: "bash", arguments: "{not json" } }],
            },
            "tool_calls"
          )
        ),
    ]);

    const result = await backend.generate(baseRequest);

    expect(result.toolCalls).toEqual([]);
    expect(result.finishReason).toBe("stop");
    expect(result.content).toBe("trying");
    expect(result.parseWarnings).toHaveLength(1);
  });

  test("passes decoding parameters through and skips null values", async () => {
    const { backend, fetchMock } = createBackend([
      () => jsonResponse(completion({ content: "ok" })),
    ]);

    await backend.generate({
      ...baseRequest,
      decoding: { temperature: 0, top_p: null, seed: 7, model: "ignored" },
    });

    expect(sentBody(fetchMock)).toEqual({
      temperature: 0,
      seed: 7,
      model: "qwen/qwen2.5-coder",
      messages: [
        { role: "system", content: "sys" },
        { role: "user", content: "Fix the bug" },
      ],
    });
  });

  test("serializes tool calls and tool results in the transcript", async () => {
    const { backend, fetchMock } = createBackend([
      () => jsonResponse(completion({ content: "ok" })),
    ]);
    const messages: Message[] = [
      ...baseRequest.messages,
      {
        role: "assistant",
        content: "",
        toolCalls: [{ id: "call_1", name: "workspace_list", arguments: { path: "." } }],
      },
      {
        role: "tool",
        content: '{"entries":[]}',
        toolCallId: "call_1",
        toolName: "workspace_list",
        result: {
          callId: "call_1",
          toolName: "workspace_list",
          success: true,
          content: { entries: [] },
        },
      },
    ];

    await backend.generate({
      messages,
      decoding: {},
      tools: [
        {
          name: "workspace_list",
          description: "List a directory",
          inputSchema: { type: "object", properties: { path: { type: "string" } } },
        },
      ],
    });

    expect(sentBody(fetchMock)).toMatchObject({
      messages: [
        { role: "system", content: "sys" },
        { role: "user", content: "Fix the bug" },
        {
          role: "assistant",
          content: null,
          tool_calls: [
            {
              id: "call_1",
              type: "function",
              function: { name: "workspace_list", arguments: '{"path":"."}' },
            },
          ],
        },
        { role: "tool", tool_call_id: "call_1", content: '{"entries":[]}' },
      ],
      tools: [
        {
          type: "function",
          function: {
            name: "workspace_list",
            description: "List a directory",
            parameters: { type: "object", properties: { path: { type: "string" } } },
          },
        },
      ],
    });
  });

  test("retries a 503 and reports the attempts", async () => {
    const { backend, fetchMock } = createBackend([
      () => jsonResponse({ error: "busy" }, 503),
      () => jsonResponse(completion({ content: "recovered" })),
    ]);

    const result = await backend.generate(baseRequest);

    expect(result.content).toBe("recovered");
    expect(result.attempts).toBe(2);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  test("retries a body that is not JSON", async () => {
    const { backend, fetchMock } = createBackend([
      () => new Response("<html>gateway</html>", { status: 200 }),
      () => jsonResponse(completion({ content: "fine" })),
    ]);

    const result = await backend.generate(baseRequest);

    expect(result.content).toBe("fine");
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  test("fails fast on authentication errors", async () => {
    const { backend, fetchMock } = createBackend([
      () => jsonResponse({ error: "invalid key" }, 401),
    ]);

    const failure = await backend.generate(baseRequest).catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(FatalBackendError);
    expect(failure).toMatchObject({ code: "PROVIDER_AUTH_FAILED", statusCode: 401 });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  test("gives up after the configured retries", async () => {
    const { backend, fetchMock } = createBackend([() => jsonResponse({ error: "down" }, 500)], {
      maxRetries: 2,
    });

    await expect(backend.generate(baseRequest)).rejects.toMatchObject({
      kind: "fatal",
      code: "RETRY_EXHAUSTED",
    });
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  test("treats connection failures as transient", async () => {
    let calls = 0;
    const fetchMock = vi.fn(async (_url: string, _init: RequestInit) => {
      calls += 1;
      if (calls === 1) {
        throw new TypeError("fetch failed");
      }
      return jsonResponse(completion({ content: "back" }));
    });
    const backend = new OpenAICompatibleBackend({
      provider: "openai",
      model: "gpt-test",
      apiKey: "test-secret",
      timeoutMs: 5000,
      textToolCalls: false,
      retry: new BackendRetryPolicy({ maxRetries: 1, initialDelayMs: 1, maxDelayMs: 1 }),
      fetch: fetchMock,
    });

    const result = await backend.generate(baseRequest);

    expect(result.content).toBe("back");
    expect(fetchMock.mock.calls[0]?.[0]).toBe("https://api.openai.com/v1/chat/completions");
  });

  test("extracts inline tool calls when enabled and tools were offered", async () => {
    const { backend } = createBackend(
      [
        () =>
          jsonResponse(
            completion({ content: '<tool_call name="workspace_list">{"path": "."}</tool_call>' })
          ),
      ],
      { textToolCalls: true }
    );

    const result = await backend.generate({
      ...baseRequest,
      tools: [
        {
          name: "workspace_list",
          description: "List a directory",
          inputSchema: { type: "object" },
        },
      ],
    });

    expect(result.finishReason).toBe("tool_call");
    expect(result.toolCalls).toMatchObject([{ name: "workspace_list", arguments: { path: "." } }]);
  });
});
