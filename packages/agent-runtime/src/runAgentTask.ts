/**
 * Task entry point: backend from the spec, default tools, one runtime run.
 */

import type {
  AgentResult,
  AgentSpec,
  IBashExecutor,
  ModelBackend,
  TaskDescription,
  ToolLimits,
} from "@taskloop/agent-runtime-core";
import { getLogger, type RuntimeLogger } from "@taskloop/agent-runtime-telemetry/logging";
import { createDefaultToolRegistry, type IToolRegistry } from "@taskloop/agent-runtime-tools";
import { type BackendEnv, createModelBackend, type FetchLike } from "@taskloop/ai-core";
import { AgentRuntime } from "./runtime/agentRuntime";

export interface RunAgentTaskOptions {
  /** Replaces the backend built from `spec.backend` */
  backend?: ModelBackend;
  /** Replaces the default tool registry */
  tools?: IToolRegistry;
  bashExecutor?: IBashExecutor;
  env?: BackendEnv;
  fetch?: FetchLike;
  logger?: RuntimeLogger;
  now?: () => number;
  toolLimits?: Partial<ToolLimits>;
}

/**
 * Run one task to completion.
 *
 * @throws AgentSpecError when the backend cannot be built from the spec
 */
export async function runAgentTask(
  spec: AgentSpec,
  task: TaskDescription,
  options: RunAgentTaskOptions = {}
): Promise<AgentResult> {
  const logger = options.logger ?? getLogger().child({ module: "agent-runtime" });
  const backend =
    options.backend ??
    createModelBackend(spec.backend, {
      retry: spec.retry,
      env: options.env,
      fetch: options.fetch,
      logger,
    });
  const tools =
    options.tools ??
    createDefaultToolRegistry({
      bashExecutor: options.bashExecutor,
      logger,
      terminationTool: spec.terminationTool,
    });

  const runtime = new AgentRuntime({
    spec,
    backend,
    tools,
    logger,
    now: options.now,
    toolLimits: options.toolLimits,
  });
  return runtime.run(task);
}
