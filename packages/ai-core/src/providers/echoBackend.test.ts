import { describe, expect, test } from "vitest";
import { EchoBackend } from "./echoBackend";

describe("EchoBackend", () => {
  test("answers with the last user message and no tool calls", async () => {
    const backend = new EchoBackend();

    const result = await backend.generate({
      messages: [
        { role: "system", content: "sys" },
        { role: "user", content: "first" },
        { role: "assistant", content: "reply" },
        { role: "user", content: "second" },
      ],
      tools: [],
      decoding: {},
    });

    expect(result).toEqual({
      content: "second",
      toolCalls: [],
      finishReason: "stop",
      model: "echo",
      attempts: 1,
    });
  });
});
