/**
 * @taskloop/agent-runtime
 *
 * Budgeted agent loop for autonomous coding tasks.
 *
 * @example
 * ```typescript
 * import { createAgentSpec, runAgentTask } from '@taskloop/agent-runtime';
 *
 * const spec = createAgentSpec({
 *   name: 'coder',
 *   backend: { type: 'openrouter', model: 'qwen-2.5-coder-32b-instruct' },
 *   systemPrompt: 'You fix bugs. Submit a unified diff.',
 *   allowedTools: ['workspace_read', 'workspace_list', 'bash', 'submit'],
 *   budget: { maxToolCalls: 30 },
 * });
 *
 * const result = await runAgentTask(spec, {
 *   taskId: 'task-1',
 *   instruction: 'Make the failing test in tests/test_math.py pass.',
 *   workspaceRoot: '/work/task-1',
 *   expectedOutputType: 'patch',
 * });
 * ```
 */

export * from "@taskloop/agent-runtime-core";
export {
  type ArtifactDiagnosticCode,
  type ArtifactPolicyResult,
  applyArtifactPolicy,
  normalizeOutputType,
} from "./artifacts/artifactPolicy";
export { type RunAgentTaskOptions, runAgentTask } from "./runAgentTask";
export {
  AgentRuntime,
  type AgentRuntimeOptions,
  formatToolMessage,
} from "./runtime/agentRuntime";
export {
  type RuntimeStateEvent,
  RuntimeStateMachine,
  type RuntimeStateTransition,
  type RuntimeStatus,
} from "./runtime/stateMachine";
