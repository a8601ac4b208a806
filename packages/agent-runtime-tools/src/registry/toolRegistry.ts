/**
 * Tool Registry
 *
 * Aggregates a fixed set of tool servers behind one call surface. Every call
 * resolves to a ToolResult: unknown tools, invalid arguments and handler
 * exceptions all come back as failed results.
 */

import type {
  IBashExecutor,
  ToolCall,
  ToolContext,
  ToolDefinition,
  ToolError,
  ToolResult,
} from "@taskloop/agent-runtime-core";
import type { RuntimeLogger } from "@taskloop/agent-runtime-telemetry/logging";
import type { ToolServer } from "../tools/base/baseServer";
import { createBashToolServer } from "../tools/core/bash";
import { createSubmitToolServer } from "../tools/core/submit";
import { createWorkspaceToolServer } from "../tools/workspace/workspaceServer";

// ============================================================================
// Registry Interface (for dependency injection)
// ============================================================================

export interface IToolRegistry {
  /** Tool schemas, optionally restricted to the named tools */
  listTools(allowed?: readonly string[]): ToolDefinition[];
  /** Check if a tool exists */
  has(name: string): boolean;
  /** Execute one call; never rejects for tool-level failures */
  execute(call: ToolCall, context: ToolContext): Promise<ToolResult>;
}

export interface ToolRegistryOptions {
  logger?: RuntimeLogger;
}

// ============================================================================
// Tool Registry Implementation
// ============================================================================

export class ToolRegistry implements IToolRegistry {
  private readonly servers = new Map<string, ToolServer>();
  private readonly toolIndex = new Map<string, string>(); // toolName -> serverName
  private readonly logger?: RuntimeLogger;

  constructor(servers: readonly ToolServer[] = [], options: ToolRegistryOptions = {}) {
    this.logger = options.logger;
    for (const server of servers) {
      this.register(server);
    }
  }

  /**
   * Register a tool server. Tool names must be unique across servers.
   */
  register(server: ToolServer): void {
    if (this.servers.has(server.name)) {
      throw new Error(`Server "${server.name}" is already registered`);
    }
    for (const tool of server.listTools()) {
      const owner = this.toolIndex.get(tool.name);
      if (owner) {
        throw new Error(`Tool "${tool.name}" is already provided by server "${owner}"`);
      }
    }

    this.servers.set(server.name, server);
    for (const tool of server.listTools()) {
      this.toolIndex.set(tool.name, server.name);
    }
  }

  listTools(allowed?: readonly string[]): ToolDefinition[] {
    const tools: ToolDefinition[] = [];
    for (const server of this.servers.values()) {
      tools.push(...server.listTools());
    }
    if (!allowed) {
      return tools;
    }
    const permitted = new Set(allowed);
    return tools.filter((tool) => permitted.has(tool.name));
  }

  has(name: string): boolean {
    return this.toolIndex.has(name);
  }

  getServerNames(): string[] {
    return Array.from(this.servers.keys());
  }

  async execute(call: ToolCall, context: ToolContext): Promise<ToolResult> {
    const startTime = Date.now();
    const serverName = this.toolIndex.get(call.name);
    const server = serverName ? this.servers.get(serverName) : undefined;

    if (!server) {
      const error: ToolError = {
        code: "RESOURCE_NOT_FOUND",
        message: `Tool "${call.name}" not found`,
      };
      return {
        callId: call.id,
        toolName: call.name,
        success: false,
        content: error.message,
        error,
      };
    }

    try {
      const output = await server.callTool(
        { name: call.name, arguments: call.arguments },
        context
      );
      const durationMs = Date.now() - startTime;
      if (!output.success) {
        this.logger?.debug("Tool call failed", {
          taskId: context.taskId,
          toolName: call.name,
          code: output.error?.code,
        });
      }
      // Copy rather than mutate the server output
      return {
        ...output,
        callId: call.id,
        toolName: call.name,
        meta: { ...output.meta, durationMs: output.meta?.durationMs ?? durationMs },
      };
    } catch (err) {
      const durationMs = Date.now() - startTime;
      const message = err instanceof Error ? err.message : String(err);
      this.logger?.warn("Tool handler threw", {
        taskId: context.taskId,
        toolName: call.name,
        error: message,
      });
      const error: ToolError = {
        code: "EXECUTION_EXCEPTION",
        message,
        details: err instanceof Error ? { name: err.name } : undefined,
      };
      return {
        callId: call.id,
        toolName: call.name,
        success: false,
        content: `${call.name} raised an exception: ${message}`,
        error,
        meta: { durationMs },
      };
    }
  }
}

// ============================================================================
// Factory
// ============================================================================

export interface DefaultToolRegistryOptions {
  bashExecutor?: IBashExecutor;
  logger?: RuntimeLogger;
  /** Name of the termination tool, `submit` unless set */
  terminationTool?: string;
}

/**
 * Registry with the workspace, bash and termination servers.
 *
 * @throws Error when the termination tool name collides with another tool
 */
export function createDefaultToolRegistry(options: DefaultToolRegistryOptions = {}): ToolRegistry {
  const { bashExecutor, logger, terminationTool } = options;
  return new ToolRegistry(
    [
      createWorkspaceToolServer({ logger }),
      createBashToolServer({ executor: bashExecutor, logger }),
      createSubmitToolServer({ toolName: terminationTool }),
    ],
    { logger }
  );
}
