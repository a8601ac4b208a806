/**
 * Agent Runtime Tools
 *
 * Tool registry, sandboxed workspace tools, bash, and the submit tool.
 */

export * from "./registry/toolRegistry";
export {
  BaseToolServer,
  errorResult,
  type RegisteredTool,
  type ToolHandler,
  type ToolInvocation,
  type ToolServer,
  textResult,
} from "./tools/base/baseServer";
export {
  BASH_TOOL_NAME,
  BashToolServer,
  type BashToolServerOptions,
  createBashToolServer,
  ProcessBashExecutor,
} from "./tools/core/bash";
export {
  createSubmitToolDefinition,
  createSubmitToolServer,
  SUBMIT_TOOL_DEFINITION,
  SUBMIT_TOOL_NAME,
  SubmitToolServer,
  type SubmitToolServerOptions,
} from "./tools/core/submit";
export {
  type ApplyWorkspacePatchResult,
  applyWorkspacePatch,
  type PatchedFile,
  type PatchFileAction,
} from "./tools/workspace/patch";
export {
  resolveWorkspacePath,
  resolveWorkspacePathSync,
  toWorkspaceRelative,
} from "./tools/workspace/sandbox";
export * from "./tools/workspace/workspaceServer";
