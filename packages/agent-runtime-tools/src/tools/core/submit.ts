/**
 * Submit Tool Server
 *
 * The termination tool. A successful call carries the final artifact on the
 * result's `submission`; the runtime ends the loop when it sees one.
 */

import type { Artifact, ToolContext, ToolDefinition } from "@taskloop/agent-runtime-core";
import { BaseToolServer, type ToolHandler } from "../base/baseServer";

export const SUBMIT_TOOL_NAME = "submit";

/** Definition of the termination tool under the given name */
export function createSubmitToolDefinition(name: string = SUBMIT_TOOL_NAME): ToolDefinition {
  return {
    name,
    description:
      "Submit the final answer and end the task. Pass the complete artifact: a unified diff for patch tasks, JSON for json tasks, plain text otherwise. Nothing runs after this call.",
    inputSchema: {
      type: "object",
      properties: {
        artifact: {
          oneOf: [{ type: "string" }, { type: "object" }],
          description: "The final artifact",
        },
      },
      additionalProperties: false,
    },
    annotations: { category: "control", readOnly: true, estimatedDuration: "instant" },
  };
}

export const SUBMIT_TOOL_DEFINITION: ToolDefinition = createSubmitToolDefinition();

export interface SubmitToolServerOptions {
  /** Name the termination tool is registered under */
  toolName?: string;
}

function summarize(artifact: Artifact): Record<string, unknown> {
  if (typeof artifact === "string") {
    return { submitted: true, kind: "text", chars: artifact.length };
  }
  return { submitted: true, kind: "object", keys: Object.keys(artifact).length };
}

export class SubmitToolServer extends BaseToolServer {
  readonly name = "submit";
  readonly description = "Signal task completion with the final artifact";

  constructor(options: SubmitToolServerOptions = {}) {
    super();
    this.registerTool(
      createSubmitToolDefinition(options.toolName),
      this.handleSubmit.bind(this)
    );
  }

  // A missing artifact submits "" and is left to the artifact checks
  private async handleSubmit(
    args: Record<string, unknown>,
    _context: ToolContext
  ): ReturnType<ToolHandler> {
    const raw = args.artifact;
    const artifact: Artifact =
      typeof raw === "string" || (typeof raw === "object" && raw !== null && !Array.isArray(raw))
        ? toArtifact(raw)
        : "";
    return {
      success: true,
      content: summarize(artifact),
      submission: { artifact },
    };
  }
}

function toArtifact(value: string | object): Artifact {
  if (typeof value === "string") {
    return value;
  }
  return Object.fromEntries(Object.entries(value));
}

export function createSubmitToolServer(options?: SubmitToolServerOptions): SubmitToolServer {
  return new SubmitToolServer(options);
}
