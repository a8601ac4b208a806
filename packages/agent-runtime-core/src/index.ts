/**
 * Agent Runtime Core Types
 *
 * Data model shared by the model backends, the tool registry and the
 * execution loop.
 */

// ============================================================================
// Tool Protocol Types
// ============================================================================

/** Tool definition advertised to the model */
export interface ToolDefinition {
  name: string;
  description: string;
  inputSchema: JSONSchema;
  /** Optional annotations for registry and logging hints */
  annotations?: {
    /** Tool category for grouping */
    category?: "workspace" | "core" | "control";
    /** Whether tool can modify state */
    readOnly?: boolean;
    /** Estimated execution time hint */
    estimatedDuration?: "instant" | "fast" | "medium" | "slow";
  };
}

/** JSON Schema subset for tool parameters */
export interface JSONSchema {
  type: "object";
  properties?: Record<string, JSONSchemaProperty>;
  additionalProperties?: boolean;
  required?: string[];
  description?: string;
}

export interface JSONSchemaProperty {
  type?: "string" | "number" | "integer" | "boolean" | "array" | "object";
  description?: string;
  enum?: string[];
  items?: JSONSchemaProperty;
  oneOf?: JSONSchemaProperty[];
  default?: unknown;
  minimum?: number;
}

/** Tool invocation requested by the model */
export interface ToolCall {
  id: string;
  name: string;
  arguments: Record<string, unknown>;
}

/** Final output of a task */
export type Artifact = string | Record<string, unknown>;

/** Tool output payload: plain text or a structured record */
export type ToolContent = string | Record<string, unknown>;

export interface ToolError {
  code: ToolErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

export type ToolErrorCode =
  | "EXECUTION_FAILED"
  | "EXECUTION_EXCEPTION"
  | "TIMEOUT"
  | "PERMISSION_DENIED"
  | "NOT_ALLOWED"
  | "INVALID_ARGUMENTS"
  | "SANDBOX_VIOLATION"
  | "RESOURCE_NOT_FOUND";

/** What a tool handler produces, before the registry binds it to a call */
export interface ToolOutput {
  success: boolean;
  content: ToolContent;
  error?: ToolError;
  /** Set only by the termination tool */
  submission?: { artifact: Artifact };
  meta?: ToolResultMeta;
}

export interface ToolResultMeta {
  durationMs?: number;
  /** Process exit code for shell tools */
  exitCode?: number;
  truncated?: boolean;
}

/** Tool output bound to the call that produced it */
export interface ToolResult extends ToolOutput {
  /** Matches ToolCall.id */
  callId: string;
  toolName: string;
}

// ============================================================================
// Tool Execution Context
// ============================================================================

export interface ToolLimits {
  /** Bash timeout when the call does not request one */
  bashTimeoutMs: number;
  /** Upper bound for a requested bash timeout */
  maxBashTimeoutMs: number;
  /** Combined stdout/stderr characters kept from a bash call */
  maxOutputChars: number;
  /** Matches returned by workspace_search */
  maxSearchResults: number;
}

export const DEFAULT_TOOL_LIMITS: ToolLimits = {
  bashTimeoutMs: 60_000,
  maxBashTimeoutMs: 600_000,
  maxOutputChars: 4000,
  maxSearchResults: 50,
};

/** Per-call scope handed to every tool handler */
export interface ToolContext {
  taskId: string;
  /** Absolute directory every path argument is confined to */
  workspaceRoot: string;
  limits: ToolLimits;
  /** Abort signal for cancellation */
  signal?: AbortSignal;
}

// ============================================================================
// Bash Executor Interface
// ============================================================================

export interface BashExecuteOptions {
  cwd: string;
  timeoutMs: number;
  /** Characters kept from each of stdout and stderr */
  maxOutputChars?: number;
  env?: Record<string, string>;
  signal?: AbortSignal;
}

export interface BashExecuteResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  truncated: boolean;
  durationMs: number;
}

export interface IBashExecutor {
  execute(command: string, options: BashExecuteOptions): Promise<BashExecuteResult>;
}

// ============================================================================
// Conversation
// ============================================================================

export interface SystemMessage {
  role: "system";
  content: string;
}

export interface UserMessage {
  role: "user";
  content: string;
}

export interface AssistantMessage {
  role: "assistant";
  content: string;
  toolCalls?: ToolCall[];
}

export interface ToolMessage {
  role: "tool";
  /** Serialized result as shown to the model */
  content: string;
  toolCallId: string;
  toolName: string;
  result: ToolResult;
}

export type Message = SystemMessage | UserMessage | AssistantMessage | ToolMessage;

export type MessageRole = Message["role"];

// ============================================================================
// Model Backend
// ============================================================================

/** Provider-specific decoding parameters, passed through unmodified */
export type DecodingParams = Readonly<Record<string, unknown>>;

export type FinishReason = "stop" | "tool_call" | "length" | "error";

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

export interface GenerationRequest {
  messages: readonly Message[];
  tools: readonly ToolDefinition[];
  decoding: DecodingParams;
  signal?: AbortSignal;
}

export interface GenerationResult {
  content: string;
  toolCalls: ToolCall[];
  finishReason: FinishReason;
  model?: string;
  usage?: TokenUsage;
  /** Backend requests made for this generation, retries included */
  attempts?: number;
  /** Tool-call syntax the parser discarded */
  parseWarnings?: string[];
}

/**
 * Capability every model backend provides. Implementations reject only
 * with a BackendError.
 */
export interface ModelBackend {
  readonly name: string;
  readonly model: string;
  generate(request: GenerationRequest): Promise<GenerationResult>;
}

// ============================================================================
// Task & Result
// ============================================================================

export type OutputType = "text" | "patch" | "json";

export interface TaskDescription {
  taskId: string;
  instruction: string;
  workspaceRoot: string;
  expectedOutputType: OutputType;
  metadata?: Record<string, unknown>;
}

export type TerminationReason = "submitted" | "budget_exceeded" | "backend_error";

export type LoopExitReason =
  | "submitted"
  | "no_tool_calls"
  | "tool_budget_exhausted"
  | "wall_time_exhausted"
  | "turn_budget_exhausted"
  | "backend_error";

export type DiagnosticSource = "artifact" | "budget" | "backend";

export interface Diagnostic {
  source: DiagnosticSource;
  code: string;
  message: string;
}

export type ToolCallErrorCode =
  | "none"
  | "not_allowed"
  | "tool_error"
  | "nonzero_exit"
  | "execution_exception";

/** One record per dispatched tool call */
export interface ToolCallEvent {
  turnIndex: number;
  callIndex: number;
  toolName: string;
  isTerminationTool: boolean;
  allowed: boolean;
  executed: boolean;
  success: boolean;
  errorCode: ToolCallErrorCode;
  argsSizeBytes: number;
  resultSizeBytes: number;
  latencyMs: number;
  exitCode?: number;
}

export interface RunTelemetry {
  loopExitReason: LoopExitReason;
  turns: number;
  toolCallsMade: number;
  elapsedMs: number;
  events: readonly ToolCallEvent[];
}

export interface AgentResult {
  readonly taskId: string;
  readonly artifact: Artifact;
  readonly expectedOutputType: OutputType;
  readonly terminationReason: TerminationReason;
  readonly diagnostics: readonly Diagnostic[];
  readonly transcript: readonly Message[];
  readonly telemetry: RunTelemetry;
}

export * from "./agentSpec";
export * from "./errors";
export { deepFreeze } from "./freeze";
export { type Err, err, isErr, isOk, type Ok, ok, type Result } from "./result";
