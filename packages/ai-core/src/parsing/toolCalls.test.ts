import { describe, expect, test } from "vitest";
import { extractTextToolCalls, parseStructuredToolCalls, resolveToolCalls } from "./toolCalls";

describe("parseStructuredToolCalls", () => {
  test("parses JSON-string and object arguments", () => {
    const parsed = parseStructuredToolCalls([
      { id: "call_a", name: "workspace_read", arguments: '{"path":"src/app.ts"}' },
      { id: "call_b", name: "submit", arguments: { artifact: "done" } },
    ]);

    expect(parsed).toEqual({
      toolCalls: [
        { id: "call_a", name: "workspace_read", arguments: { path: "src/app.ts" } },
        { id: "call_b", name: "submit", arguments: { artifact: "done" } },
      ],
      warnings: [],
    });
  });

  test("treats missing or blank arguments as an empty object", () => {
    const parsed = parseStructuredToolCalls([
      { id: "call_a", name: "workspace_list" },
      { id: "call_b", name: "workspace_list", arguments: "  " },
    ]);

    expect(parsed.toolCalls.map((call) => call.arguments)).toEqual([{}, {}]);
  });

  test("assigns an id when the provider omits one", () => {
    const parsed = parseStructuredToolCalls([{ name: "workspace_list", arguments: "{}" }]);

    expect(parsed.toolCalls[0]?.id).toMatch(/^call_[0-9a-f-]{36}$/);
  });

  test("drops every call when one has invalid JSON arguments", () => {
    const parsed = parseStructuredToolCalls([
      { id: "call_a", name: "workspace_read", arguments: '{"path":"a"}' },
      { id: "call_b", name: "workspace_write", arguments: '{"path": "a", ' },
    ]);

    expect(parsed.toolCalls).toEqual([]);
    expect(parsed.warnings).toHaveLength(1);
    expect(parsed.warnings[0]).toMatch(
      /^tool call 1 \(workspace_write\): arguments are not valid JSON/
    );
  });

  test("rejects non-object arguments and nameless calls", () => {
    const parsed = parseStructuredToolCalls([
      { id: "call_a", name: "bash", arguments: "[1, 2]" },
      { id: "call_b", name: "" },
    ]);

    expect(parsed.toolCalls).toEqual([]);
    expect(parsed.warnings).toEqual([
      "tool call 0 (bash): arguments must be a JSON object",
      "tool call 1 has no name",
    ]);
  });
});

describe("extractTextToolCalls", () => {
  test("reads a fenced json block", () => {
    const text = [
      "Let me look around first.",
      "```json",
      '{"name": "workspace_list", "arguments": {"path": "."}}',
      "```",
    ].join("\n");

    const parsed = extractTextToolCalls(text);

    expect(parsed.toolCalls).toHaveLength(1);
    expect(parsed.toolCalls[0]).toMatchObject({
      name: "workspace_list",
      arguments: { path: "." },
    });
  });

  test("reads the nested function form with string arguments", () => {
    const text =
      '```json\n{"function": {"name": "bash", "arguments": "{\\"command\\": \\"ls\\"}"}}\n```';

    const parsed = extractTextToolCalls(text);

    expect(parsed.toolCalls[0]).toMatchObject({ name: "bash", arguments: { command: "ls" } });
  });

  test("reads tool_call tags", () => {
    const parsed = extractTextToolCalls(
      '<tool_call name="submit">{"artifact": "patch"}</tool_call>'
    );

    expect(parsed.toolCalls[0]).toMatchObject({ name: "submit", arguments: { artifact: "patch" } });
  });

  test("skips blocks that are not tool calls", () => {
    const parsed = extractTextToolCalls('```json\n{"config": true}\n```\n```json\n{oops}\n```');

    expect(parsed.toolCalls).toEqual([]);
    expect(parsed.warnings).toEqual(["skipped fenced json block that is not valid JSON"]);
  });
});

describe("resolveToolCalls", () => {
  const inline = '<tool_call name="workspace_list">{"path": "."}</tool_call>';

  test("ignores inline calls unless enabled", () => {
    const parsed = resolveToolCalls({
      raw: [],
      content: inline,
      toolsOffered: true,
      textToolCalls: false,
    });

    expect(parsed.toolCalls).toEqual([]);
  });

  test("ignores inline calls when no tools were offered", () => {
    const parsed = resolveToolCalls({
      raw: [],
      content: inline,
      toolsOffered: false,
      textToolCalls: true,
    });

    expect(parsed.toolCalls).toEqual([]);
  });

  test("prefers structured calls over inline ones", () => {
    const parsed = resolveToolCalls({
      raw: [{ id: "call_x", name: "submit", arguments: "{}" }],
      content: inline,
      toolsOffered: true,
      textToolCalls: true,
    });

    expect(parsed.toolCalls).toEqual([{ id: "call_x", name: "submit", arguments: {} }]);
  });
});
