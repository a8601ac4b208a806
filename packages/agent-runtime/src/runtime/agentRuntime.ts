/**
 * Agent Runtime
 *
 * Drives one task from the seeded conversation to exactly one AgentResult:
 * one backend request per iteration, tool calls dispatched in the order the
 * model asked for them, budgets checked before every request and before
 * every dispatch.
 */

import {
  type AgentResult,
  type AgentSpec,
  type Artifact,
  type AssistantMessage,
  type BackendError,
  type Diagnostic,
  DEFAULT_TOOL_LIMITS,
  deepFreeze,
  type GenerationResult,
  isBackendError,
  type LoopExitReason,
  type Message,
  type ModelBackend,
  type TaskDescription,
  type TerminationReason,
  type ToolCall,
  type ToolCallErrorCode,
  type ToolCallEvent,
  type ToolContext,
  type ToolDefinition,
  type ToolLimits,
  type ToolMessage,
  type ToolResult,
} from "@taskloop/agent-runtime-core";
import { getLogger, type RuntimeLogger } from "@taskloop/agent-runtime-telemetry/logging";
import type { IToolRegistry } from "@taskloop/agent-runtime-tools";
import { applyArtifactPolicy } from "../artifacts/artifactPolicy";
import { RuntimeStateMachine, type RuntimeStatus } from "./stateMachine";

// ============================================================================
// Types
// ============================================================================

export interface AgentRuntimeOptions {
  spec: AgentSpec;
  backend: ModelBackend;
  tools: IToolRegistry;
  logger?: RuntimeLogger;
  /** Clock in milliseconds; budgets and latencies are measured with it */
  now?: () => number;
  toolLimits?: Partial<ToolLimits>;
}

type BudgetExit = Extract<
  LoopExitReason,
  "tool_budget_exhausted" | "wall_time_exhausted" | "turn_budget_exhausted"
>;

/** Mutable bookkeeping for one run; never leaves `run` */
interface RunState {
  task: TaskDescription;
  logger: RuntimeLogger;
  machine: RuntimeStateMachine;
  messages: Message[];
  events: ToolCallEvent[];
  startedAt: number;
  turns: number;
  toolCallsMade: number;
}

interface Outcome {
  terminationReason: TerminationReason;
  loopExitReason: LoopExitReason;
  artifact: Artifact;
  diagnostics: Diagnostic[];
}

interface DispatchOutcome {
  result: ToolResult;
  event: ToolCallEvent;
}

// ============================================================================
// Helpers
// ============================================================================

function byteSize(value: unknown): number {
  const serialized = typeof value === "string" ? value : JSON.stringify(value);
  return Buffer.byteLength(serialized ?? "", "utf-8");
}

/** Tool result as the model sees it in the `tool` message */
export function formatToolMessage(result: ToolResult): string {
  const text =
    typeof result.content === "string" ? result.content : JSON.stringify(result.content);
  if (result.success || !result.error) {
    return text;
  }
  return `error (${result.error.code}): ${text}`;
}

function classifyResult(result: ToolResult): ToolCallErrorCode {
  if (result.success) {
    return "none";
  }
  if (result.error?.code === "EXECUTION_EXCEPTION") {
    return "execution_exception";
  }
  if (result.meta?.exitCode !== undefined && result.meta.exitCode !== 0) {
    return "nonzero_exit";
  }
  return "tool_error";
}

/** Text of the most recent assistant message that has any */
function lastAssistantText(messages: readonly Message[]): string {
  for (let index = messages.length - 1; index >= 0; index -= 1) {
    const message = messages[index];
    if (message?.role === "assistant" && message.content.trim() !== "") {
      return message.content;
    }
  }
  return "";
}

function reminderMessage(terminationTool: string): string {
  return (
    "You replied without calling a tool. Use the available tools to work on the task, " +
    `then call \`${terminationTool}\` with the final artifact.`
  );
}

// ============================================================================
// Agent Runtime
// ============================================================================

export class AgentRuntime {
  private readonly spec: AgentSpec;
  private readonly backend: ModelBackend;
  private readonly tools: IToolRegistry;
  private readonly logger: RuntimeLogger;
  private readonly now: () => number;
  private readonly limits: ToolLimits;
  private readonly allowedTools: ReadonlySet<string>;
  private machine = new RuntimeStateMachine();

  constructor(options: AgentRuntimeOptions) {
    this.spec = options.spec;
    this.backend = options.backend;
    this.tools = options.tools;
    this.logger = options.logger ?? getLogger().child({ module: "agent-runtime" });
    this.now = options.now ?? Date.now;
    this.limits = { ...DEFAULT_TOOL_LIMITS, ...options.toolLimits };
    this.allowedTools = new Set(options.spec.allowedTools);
  }

  /** Status of the most recent run */
  get state(): RuntimeStatus {
    return this.machine.getStatus();
  }

  async run(task: TaskDescription): Promise<AgentResult> {
    this.machine = new RuntimeStateMachine();
    const run: RunState = {
      task,
      logger: this.logger.child({ taskId: task.taskId }),
      machine: this.machine,
      messages: [
        { role: "system", content: this.spec.systemPrompt },
        { role: "user", content: task.instruction },
      ],
      events: [],
      startedAt: this.now(),
      turns: 0,
      toolCallsMade: 0,
    };

    run.logger.info("Task started", {
      agent: this.spec.name,
      backend: this.backend.name,
      model: this.backend.model,
      mode: this.spec.mode,
      expectedOutputType: task.expectedOutputType,
    });

    const outcome = await this.loop(run);
    return this.finish(run, outcome);
  }

  // ============================================================================
  // Loop
  // ============================================================================

  private async loop(run: RunState): Promise<Outcome> {
    const tools = this.offeredTools();
    const context: ToolContext = {
      taskId: run.task.taskId,
      workspaceRoot: run.task.workspaceRoot,
      limits: this.limits,
    };

    while (true) {
      const exhausted = this.checkBudget(run);
      if (exhausted) {
        run.machine.transition("exhaust");
        return this.budgetOutcome(run, exhausted);
      }

      run.machine.transition("request");
      let generation: GenerationResult;
      try {
        generation = await this.backend.generate({
          messages: [...run.messages],
          tools,
          decoding: this.spec.decoding,
        });
      } catch (error) {
        if (!isBackendError(error)) {
          throw error;
        }
        run.machine.transition("fail");
        return this.backendOutcome(run, error);
      }
      run.turns += 1;

      if (generation.parseWarnings && generation.parseWarnings.length > 0) {
        run.logger.warn("Discarded tool-call syntax", { warnings: generation.parseWarnings });
      }

      const assistant: AssistantMessage =
        generation.toolCalls.length > 0
          ? { role: "assistant", content: generation.content, toolCalls: generation.toolCalls }
          : { role: "assistant", content: generation.content };
      run.messages.push(assistant);

      if (generation.toolCalls.length === 0) {
        if (this.spec.mode === "patch_only") {
          run.machine.transition("submit");
          return {
            terminationReason: "submitted",
            loopExitReason: "no_tool_calls",
            artifact: generation.content,
            diagnostics: [],
          };
        }
        run.messages.push({ role: "user", content: reminderMessage(this.spec.terminationTool) });
        run.machine.transition("continue");
        continue;
      }

      run.machine.transition("execute");
      const turnIndex = run.turns - 1;
      for (const [callIndex, call] of generation.toolCalls.entries()) {
        if (run.toolCallsMade >= this.spec.budget.maxToolCalls) {
          run.machine.transition("exhaust");
          return this.budgetOutcome(run, "tool_budget_exhausted");
        }
        run.toolCallsMade += 1;

        const { result, event } = await this.dispatch(run, call, context, {
          turnIndex,
          callIndex,
        });
        const message: ToolMessage = {
          role: "tool",
          content: formatToolMessage(result),
          toolCallId: call.id,
          toolName: call.name,
          result,
        };
        run.messages.push(message);
        run.events.push(event);

        if (event.isTerminationTool && result.success && result.submission) {
          run.machine.transition("submit");
          return {
            terminationReason: "submitted",
            loopExitReason: "submitted",
            artifact: result.submission.artifact,
            diagnostics: [],
          };
        }
      }
      run.machine.transition("continue");
    }
  }

  private offeredTools(): ToolDefinition[] {
    if (this.spec.mode === "patch_only") {
      return [];
    }
    return this.tools.listTools(this.spec.allowedTools);
  }

  private checkBudget(run: RunState): BudgetExit | null {
    const { budget } = this.spec;
    if (this.now() - run.startedAt > budget.maxWallTimeMs) {
      return "wall_time_exhausted";
    }
    if (run.toolCallsMade >= budget.maxToolCalls) {
      return "tool_budget_exhausted";
    }
    if (run.turns >= budget.maxTurns) {
      return "turn_budget_exhausted";
    }
    return null;
  }

  private async dispatch(
    run: RunState,
    call: ToolCall,
    context: ToolContext,
    position: Pick<ToolCallEvent, "turnIndex" | "callIndex">
  ): Promise<DispatchOutcome> {
    const base = {
      ...position,
      toolName: call.name,
      isTerminationTool: call.name === this.spec.terminationTool,
      argsSizeBytes: byteSize(call.arguments),
    };

    if (!this.allowedTools.has(call.name)) {
      const message = `Tool ${call.name} is not allowed`;
      run.logger.debug("Rejected tool call", { toolName: call.name });
      return {
        result: {
          callId: call.id,
          toolName: call.name,
          success: false,
          content: message,
          error: { code: "NOT_ALLOWED", message },
        },
        event: {
          ...base,
          allowed: false,
          executed: false,
          success: false,
          errorCode: "not_allowed",
          resultSizeBytes: 0,
          latencyMs: 0,
        },
      };
    }

    const startedAt = this.now();
    const result = await this.tools.execute(call, context);
    run.logger.debug("Tool call finished", {
      toolName: call.name,
      success: result.success,
      code: result.error?.code,
    });
    const latencyMs = Math.max(0, this.now() - startedAt);
    const event: ToolCallEvent = {
      ...base,
      allowed: true,
      executed: true,
      success: result.success,
      errorCode: classifyResult(result),
      resultSizeBytes: byteSize(formatToolMessage(result)),
      latencyMs,
    };
    if (result.meta?.exitCode !== undefined) {
      event.exitCode = result.meta.exitCode;
    }
    return { result, event };
  }

  // ============================================================================
  // Termination
  // ============================================================================

  private budgetOutcome(run: RunState, exit: BudgetExit): Outcome {
    return {
      terminationReason: "budget_exceeded",
      loopExitReason: exit,
      artifact: lastAssistantText(run.messages),
      diagnostics: [this.budgetDiagnostic(run, exit)],
    };
  }

  private budgetDiagnostic(run: RunState, exit: BudgetExit): Diagnostic {
    const { budget } = this.spec;
    switch (exit) {
      case "tool_budget_exhausted":
        return {
          source: "budget",
          code: "tool_call_budget_exhausted",
          message: `tool-call budget of ${budget.maxToolCalls} exhausted`,
        };
      case "wall_time_exhausted":
        return {
          source: "budget",
          code: "wall_time_exhausted",
          message: `wall-time budget of ${budget.maxWallTimeMs}ms exhausted after ${
            this.now() - run.startedAt
          }ms`,
        };
      case "turn_budget_exhausted":
        return {
          source: "budget",
          code: "turn_budget_exhausted",
          message: `turn budget of ${budget.maxTurns} exhausted`,
        };
    }
  }

  private backendOutcome(run: RunState, error: BackendError): Outcome {
    run.logger.error("Backend failed", error.toJSON());
    return {
      terminationReason: "backend_error",
      loopExitReason: "backend_error",
      artifact: lastAssistantText(run.messages),
      diagnostics: [
        { source: "backend", code: "backend_fatal", message: `${error.code}: ${error.message}` },
      ],
    };
  }

  private finish(run: RunState, outcome: Outcome): AgentResult {
    const policy = applyArtifactPolicy(outcome.artifact, run.task.expectedOutputType);
    const elapsedMs = this.now() - run.startedAt;
    const result: AgentResult = {
      taskId: run.task.taskId,
      artifact: outcome.artifact,
      expectedOutputType: policy.outputType,
      terminationReason: outcome.terminationReason,
      diagnostics: [...outcome.diagnostics, ...policy.diagnostics],
      transcript: run.messages,
      telemetry: {
        loopExitReason: outcome.loopExitReason,
        turns: run.turns,
        toolCallsMade: run.toolCallsMade,
        elapsedMs,
        events: run.events,
      },
    };

    run.logger.info("Task finished", {
      terminationReason: result.terminationReason,
      loopExitReason: outcome.loopExitReason,
      turns: run.turns,
      toolCallsMade: run.toolCallsMade,
      elapsedMs,
      diagnostics: result.diagnostics.map((diagnostic) => diagnostic.code),
    });

    return deepFreeze(result);
  }
}
