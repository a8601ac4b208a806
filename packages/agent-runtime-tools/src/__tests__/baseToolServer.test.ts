/**
 * BaseToolServer argument validation tests
 */

import { DEFAULT_TOOL_LIMITS, type ToolContext } from "@taskloop/agent-runtime-core";
import { describe, expect, it, vi } from "vitest";
import { BaseToolServer, textResult, type ToolHandler } from "../tools/base/baseServer";

class SampleServer extends BaseToolServer {
  readonly name = "sample";
  readonly description = "Validation sample";
  readonly handler = vi.fn<ToolHandler>(async () => textResult("ran"));

  constructor() {
    super();
    this.registerTool(
      {
        name: "sample",
        description: "Sample tool",
        inputSchema: {
          type: "object",
          properties: {
            path: { type: "string" },
            count: { type: "integer", minimum: 1 },
            mode: { type: "string", enum: ["fast", "slow"] },
            payload: { oneOf: [{ type: "string" }, { type: "object" }] },
          },
          required: ["path"],
          additionalProperties: false,
        },
      },
      this.handler
    );
  }
}

const context: ToolContext = {
  taskId: "task-1",
  workspaceRoot: "/tmp/unused",
  limits: DEFAULT_TOOL_LIMITS,
};

describe("BaseToolServer", () => {
  it("runs the handler when arguments match the schema", async () => {
    const server = new SampleServer();

    const result = await server.callTool(
      { name: "sample", arguments: { path: "a.txt", count: 2, payload: { x: 1 } } },
      context
    );

    expect(result).toEqual({ success: true, content: "ran" });
    expect(server.handler).toHaveBeenCalledTimes(1);
  });

  it("reports a missing required argument with the provided keys", async () => {
    const server = new SampleServer();

    const result = await server.callTool({ name: "sample", arguments: { count: 1 } }, context);

    expect(result.success).toBe(false);
    expect(result.content).toBe("invalid arguments for sample: Missing required argument: path");
    expect(result.error).toEqual({
      code: "INVALID_ARGUMENTS",
      message: "Missing required argument: path",
      details: { providedKeys: ["count"] },
    });
    expect(server.handler).not.toHaveBeenCalled();
  });

  it("rejects undeclared keys when additional properties are disallowed", async () => {
    const server = new SampleServer();

    const result = await server.callTool(
      { name: "sample", arguments: { path: "a", extra: true } },
      context
    );

    expect(result.error?.message).toBe("Unexpected argument: extra");
  });

  it("checks declared types", async () => {
    const server = new SampleServer();

    const result = await server.callTool({ name: "sample", arguments: { path: 42 } }, context);

    expect(result.error?.message).toBe('Invalid type for argument "path": expected string');
  });

  it("distinguishes integers from other numbers", async () => {
    const server = new SampleServer();

    const result = await server.callTool(
      { name: "sample", arguments: { path: "a", count: 1.5 } },
      context
    );

    expect(result.error?.message).toBe('Invalid type for argument "count": expected integer');
  });

  it("describes oneOf alternatives", async () => {
    const server = new SampleServer();

    const result = await server.callTool(
      { name: "sample", arguments: { path: "a", payload: [1] } },
      context
    );

    expect(result.error?.message).toBe(
      'Invalid type for argument "payload": expected string or object'
    );
  });

  it("enforces enum and minimum constraints", async () => {
    const server = new SampleServer();

    const badEnum = await server.callTool(
      { name: "sample", arguments: { path: "a", mode: "medium" } },
      context
    );
    const belowMinimum = await server.callTool(
      { name: "sample", arguments: { path: "a", count: 0 } },
      context
    );

    expect(badEnum.error?.message).toBe(
      'Invalid value for argument "mode": expected one of fast, slow'
    );
    expect(belowMinimum.error?.message).toBe(
      'Invalid value for argument "count": must be at least 1'
    );
  });

  it("returns RESOURCE_NOT_FOUND for tools it does not provide", async () => {
    const server = new SampleServer();

    const result = await server.callTool({ name: "other", arguments: {} }, context);

    expect(result.error?.code).toBe("RESOURCE_NOT_FOUND");
    expect(result.content).toBe('Tool "other" not found in server "sample"');
  });
});
