/**
 * Base Tool Server
 *
 * Abstract base class for tool servers. Provides registration, schema
 * listing and argument validation; subclasses register handlers.
 */

import type {
  JSONSchema,
  JSONSchemaProperty,
  ToolContent,
  ToolContext,
  ToolDefinition,
  ToolError,
  ToolOutput,
} from "@taskloop/agent-runtime-core";

/** Tool handler function type */
export type ToolHandler = (
  args: Record<string, unknown>,
  context: ToolContext
) => Promise<ToolOutput>;

/** Tool definition with handler */
export interface RegisteredTool {
  tool: ToolDefinition;
  handler: ToolHandler;
}

/** Request handed to a server: tool name plus parsed arguments */
export interface ToolInvocation {
  name: string;
  arguments: Record<string, unknown>;
}

/** Surface the registry aggregates */
export interface ToolServer {
  readonly name: string;
  readonly description: string;
  listTools(): ToolDefinition[];
  callTool(call: ToolInvocation, context: ToolContext): Promise<ToolOutput>;
}

/**
 * Abstract base class for tool servers.
 */
export abstract class BaseToolServer implements ToolServer {
  abstract readonly name: string;
  abstract readonly description: string;

  protected readonly tools = new Map<string, RegisteredTool>();

  /**
   * Register a tool with its handler.
   */
  protected registerTool(tool: ToolDefinition, handler: ToolHandler): void {
    this.tools.set(tool.name, { tool, handler });
  }

  /**
   * List all available tools.
   */
  listTools(): ToolDefinition[] {
    return Array.from(this.tools.values()).map((def) => def.tool);
  }

  /**
   * Call a tool by name.
   */
  async callTool(call: ToolInvocation, context: ToolContext): Promise<ToolOutput> {
    const definition = this.tools.get(call.name);
    if (!definition) {
      return errorResult(
        "RESOURCE_NOT_FOUND",
        `Tool "${call.name}" not found in server "${this.name}"`
      );
    }

    const validationError = this.validateArguments(call.arguments, definition.tool.inputSchema);
    if (validationError) {
      return {
        success: false,
        content: `invalid arguments for ${call.name}: ${validationError.message}`,
        error: validationError,
      };
    }

    return definition.handler(call.arguments, context);
  }

  /**
   * Validate arguments against the tool's JSON Schema.
   * Override for custom validation logic.
   */
  protected validateArguments(args: Record<string, unknown>, schema: JSONSchema): ToolError | null {
    const details = { providedKeys: Object.keys(args).sort() };

    const issue =
      this.validateRequiredFields(args, schema.required) ??
      this.validateUnknownFields(args, schema) ??
      this.validatePropertyValues(args, schema.properties);

    return issue ? { code: "INVALID_ARGUMENTS", message: issue, details } : null;
  }

  private validateRequiredFields(
    args: Record<string, unknown>,
    required: string[] | undefined
  ): string | null {
    for (const field of required ?? []) {
      if (!(field in args)) {
        return `Missing required argument: ${field}`;
      }
    }
    return null;
  }

  private validateUnknownFields(args: Record<string, unknown>, schema: JSONSchema): string | null {
    if (schema.additionalProperties !== false) {
      return null;
    }
    const known = schema.properties ?? {};
    const unknown = Object.keys(args).filter((key) => !Object.hasOwn(known, key));
    return unknown.length > 0 ? `Unexpected argument: ${unknown.join(", ")}` : null;
  }

  private validatePropertyValues(
    args: Record<string, unknown>,
    properties: JSONSchema["properties"]
  ): string | null {
    if (!properties) {
      return null;
    }

    for (const [key, value] of Object.entries(args)) {
      const propSchema = properties[key];
      if (!propSchema) {
        continue;
      }
      if (!matchesSchema(value, propSchema)) {
        return `Invalid type for argument "${key}": expected ${describeSchema(propSchema)}`;
      }
      if (propSchema.enum && !propSchema.enum.some((option) => option === value)) {
        return `Invalid value for argument "${key}": expected one of ${propSchema.enum.join(", ")}`;
      }
      if (
        propSchema.minimum !== undefined &&
        typeof value === "number" &&
        value < propSchema.minimum
      ) {
        return `Invalid value for argument "${key}": must be at least ${propSchema.minimum}`;
      }
    }

    return null;
  }
}

function matchesSchema(value: unknown, schema: JSONSchemaProperty): boolean {
  if (schema.oneOf) {
    return schema.oneOf.some((option) => matchesSchema(value, option));
  }
  return schema.type ? checkType(value, schema.type) : true;
}

function describeSchema(schema: JSONSchemaProperty): string {
  if (schema.oneOf) {
    return schema.oneOf.map(describeSchema).join(" or ");
  }
  return schema.type ?? "any";
}

function checkType(value: unknown, expectedType: string): boolean {
  switch (expectedType) {
    case "string":
      return typeof value === "string";
    case "number":
      return typeof value === "number" && Number.isFinite(value);
    case "integer":
      return typeof value === "number" && Number.isInteger(value);
    case "boolean":
      return typeof value === "boolean";
    case "array":
      return Array.isArray(value);
    case "object":
      return typeof value === "object" && value !== null && !Array.isArray(value);
    default:
      return true;
  }
}

/**
 * Helper to create a successful tool result.
 */
export function textResult(content: ToolContent, meta?: ToolOutput["meta"]): ToolOutput {
  return meta ? { success: true, content, meta } : { success: true, content };
}

/**
 * Helper to create a failed tool result.
 */
export function errorResult(
  code: ToolError["code"],
  message: string,
  details?: ToolError["details"]
): ToolOutput {
  return {
    success: false,
    content: message,
    error: details ? { code, message, details } : { code, message },
  };
}
