/**
 * Workspace Tool Server
 *
 * File access confined to the task's workspace root: read, write, list,
 * search and patch. Paths that leave the root fail with SANDBOX_VIOLATION
 * before the filesystem is touched.
 */

import type { Dirent } from "node:fs";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import {
  SandboxViolationError,
  type ToolContext,
  type ToolOutput,
} from "@taskloop/agent-runtime-core";
import type { RuntimeLogger } from "@taskloop/agent-runtime-telemetry/logging";
import { BaseToolServer, errorResult, type ToolHandler, textResult } from "../base/baseServer";
import { applyWorkspacePatch } from "./patch";
import { resolveWorkspacePath, toWorkspaceRelative } from "./sandbox";

export const WORKSPACE_READ_TOOL_NAME = "workspace_read";
export const WORKSPACE_WRITE_TOOL_NAME = "workspace_write";
export const WORKSPACE_LIST_TOOL_NAME = "workspace_list";
export const WORKSPACE_SEARCH_TOOL_NAME = "workspace_search";
export const WORKSPACE_APPLY_PATCH_TOOL_NAME = "workspace_apply_patch";

/** Directories workspace_search never descends into */
const SEARCH_SKIP_DIRS = new Set([".git", "node_modules", "__pycache__", ".venv"]);
/** Files larger than this are not searched */
const SEARCH_MAX_FILE_BYTES = 1024 * 1024;

export interface WorkspaceListEntry {
  name: string;
  type: "file" | "dir";
}

export interface WorkspaceSearchMatch {
  file: string;
  line: number;
  match: string;
}

export interface WorkspaceToolServerOptions {
  logger?: RuntimeLogger;
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

/**
 * Convert filesystem and sandbox failures into failed tool results.
 */
function failureFor(error: unknown, displayPath: string): ToolOutput {
  if (error instanceof SandboxViolationError) {
    return errorResult("SANDBOX_VIOLATION", error.message, { path: error.requestedPath });
  }
  switch (errorCode(error)) {
    case "ENOENT":
      return errorResult("RESOURCE_NOT_FOUND", `No such file or directory: ${displayPath}`);
    case "EISDIR":
      return errorResult("EXECUTION_FAILED", `Is a directory: ${displayPath}`);
    case "ENOTDIR":
      return errorResult("EXECUTION_FAILED", `Not a directory: ${displayPath}`);
    case "EACCES":
    case "EPERM":
      return errorResult("PERMISSION_DENIED", `Permission denied: ${displayPath}`);
    default:
      throw error;
  }
}

function optionalInteger(value: unknown): number | undefined {
  return typeof value === "number" ? value : undefined;
}

/**
 * Glob subset: `*` within a segment, `**` across segments, `?` for one
 * character. Matched against workspace-relative paths with forward slashes.
 */
/** Directories, and symlinks that resolve to one, list as "dir" */
async function isDirectoryEntry(dirPath: string, dirent: Dirent): Promise<boolean> {
  if (!dirent.isSymbolicLink()) {
    return dirent.isDirectory();
  }
  try {
    return (await fs.stat(path.join(dirPath, dirent.name))).isDirectory();
  } catch (error) {
    if (errorCode(error) === "ENOENT") {
      return false;
    }
    throw error;
  }
}

export function globToRegExp(glob: string): RegExp {
  let pattern = "";
  for (let index = 0; index < glob.length; index += 1) {
    const char = glob[index] ?? "";
    if (char === "*") {
      if (glob[index + 1] === "*") {
        const slash = glob[index + 2] === "/";
        pattern += slash ? "(?:.*/)?" : ".*";
        index += slash ? 2 : 1;
      } else {
        pattern += "[^/]*";
      }
    } else if (char === "?") {
      pattern += "[^/]";
    } else {
      pattern += char.replace(/[.+^${}()|[\]\\]/g, "\\$&");
    }
  }
  return new RegExp(`^${pattern}$`);
}

export class WorkspaceToolServer extends BaseToolServer {
  readonly name = "workspace";
  readonly description = "Read, write, list, search and patch files inside the task workspace";

  private readonly logger?: RuntimeLogger;

  constructor(options: WorkspaceToolServerOptions = {}) {
    super();
    this.logger = options.logger;
    this.registerTools();
  }

  private registerTools(): void {
    this.registerTool(
      {
        name: WORKSPACE_READ_TOOL_NAME,
        description:
          "Read a UTF-8 text file from the workspace. Optionally pass start_line and end_line (1-based, inclusive) to read a range.",
        inputSchema: {
          type: "object",
          properties: {
            path: { type: "string", description: "File path relative to the workspace root" },
            start_line: { type: "integer", minimum: 1, description: "First line to return" },
            end_line: { type: "integer", minimum: 1, description: "Last line to return" },
          },
          required: ["path"],
          additionalProperties: false,
        },
        annotations: { category: "workspace", readOnly: true, estimatedDuration: "instant" },
      },
      this.handleRead.bind(this)
    );

    this.registerTool(
      {
        name: WORKSPACE_WRITE_TOOL_NAME,
        description:
          "Write a UTF-8 text file in the workspace, replacing it if it exists and creating parent directories.",
        inputSchema: {
          type: "object",
          properties: {
            path: { type: "string", description: "File path relative to the workspace root" },
            content: { type: "string", description: "Full new file content" },
          },
          required: ["path", "content"],
          additionalProperties: false,
        },
        annotations: { category: "workspace", readOnly: false, estimatedDuration: "instant" },
      },
      this.handleWrite.bind(this)
    );

    this.registerTool(
      {
        name: WORKSPACE_LIST_TOOL_NAME,
        description: "List the entries of a workspace directory, sorted by name.",
        inputSchema: {
          type: "object",
          properties: {
            path: {
              type: "string",
              description: "Directory relative to the workspace root",
              default: ".",
            },
          },
          additionalProperties: false,
        },
        annotations: { category: "workspace", readOnly: true, estimatedDuration: "instant" },
      },
      this.handleList.bind(this)
    );

    this.registerTool(
      {
        name: WORKSPACE_SEARCH_TOOL_NAME,
        description:
          "Search workspace files for a regular expression. Returns file, line number and matching line.",
        inputSchema: {
          type: "object",
          properties: {
            query: { type: "string", description: "Regular expression to search for" },
            glob: {
              type: "string",
              description: "Restrict the search to paths matching this glob, e.g. src/**/*.py",
            },
          },
          required: ["query"],
          additionalProperties: false,
        },
        annotations: { category: "workspace", readOnly: true, estimatedDuration: "fast" },
      },
      this.handleSearch.bind(this)
    );

    this.registerTool(
      {
        name: WORKSPACE_APPLY_PATCH_TOOL_NAME,
        description:
          "Apply a unified diff with paths relative to the workspace root. All files change or none do.",
        inputSchema: {
          type: "object",
          properties: {
            unified_diff: { type: "string", description: "Unified diff text" },
          },
          required: ["unified_diff"],
          additionalProperties: false,
        },
        annotations: { category: "workspace", readOnly: false, estimatedDuration: "fast" },
      },
      this.handleApplyPatch.bind(this)
    );
  }

  private async handleRead(
    args: Record<string, unknown>,
    context: ToolContext
  ): ReturnType<ToolHandler> {
    const requested = String(args.path);
    const startLine = optionalInteger(args.start_line);
    const endLine = optionalInteger(args.end_line);
    if (startLine !== undefined && endLine !== undefined && endLine < startLine) {
      return errorResult("INVALID_ARGUMENTS", "end_line must not be before start_line");
    }

    try {
      const filePath = await resolveWorkspacePath(context.workspaceRoot, requested);
      const content = await fs.readFile(filePath, "utf-8");
      if (startLine === undefined && endLine === undefined) {
        return textResult(content);
      }
      const lines = content.split("\n");
      const first = startLine ?? 1;
      const last = Math.min(endLine ?? lines.length, lines.length);
      return textResult({
        path: toWorkspaceRelative(context.workspaceRoot, filePath),
        start_line: first,
        end_line: last,
        total_lines: lines.length,
        content: lines.slice(first - 1, last).join("\n"),
      });
    } catch (error) {
      return failureFor(error, requested);
    }
  }

  private async handleWrite(
    args: Record<string, unknown>,
    context: ToolContext
  ): ReturnType<ToolHandler> {
    const requested = String(args.path);
    const content = String(args.content);

    try {
      const filePath = await resolveWorkspacePath(context.workspaceRoot, requested);
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      await fs.writeFile(filePath, content, "utf-8");
      const relative = toWorkspaceRelative(context.workspaceRoot, filePath);
      this.logger?.debug("Workspace file written", { taskId: context.taskId, path: relative });
      return textResult({ path: relative, bytes: Buffer.byteLength(content, "utf-8") });
    } catch (error) {
      return failureFor(error, requested);
    }
  }

  private async handleList(
    args: Record<string, unknown>,
    context: ToolContext
  ): ReturnType<ToolHandler> {
    const requested = typeof args.path === "string" && args.path !== "" ? args.path : ".";

    try {
      const dirPath = await resolveWorkspacePath(context.workspaceRoot, requested);
      const dirents = await fs.readdir(dirPath, { withFileTypes: true });
      const listed = await Promise.all(
        dirents.map(
          async (dirent): Promise<WorkspaceListEntry> => ({
            name: dirent.name,
            type: (await isDirectoryEntry(dirPath, dirent)) ? "dir" : "file",
          })
        )
      );
      const entries = listed.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
      return textResult({ path: toWorkspaceRelative(context.workspaceRoot, dirPath), entries });
    } catch (error) {
      return failureFor(error, requested);
    }
  }

  private async handleSearch(
    args: Record<string, unknown>,
    context: ToolContext
  ): ReturnType<ToolHandler> {
    const query = String(args.query);
    const glob = typeof args.glob === "string" && args.glob !== "" ? args.glob : "**/*";

    let pattern: RegExp;
    try {
      pattern = new RegExp(query);
    } catch (error) {
      return errorResult(
        "INVALID_ARGUMENTS",
        `Invalid regular expression: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    const root = path.resolve(context.workspaceRoot);
    const fileFilter = globToRegExp(glob);
    const limit = context.limits.maxSearchResults;
    const matches: WorkspaceSearchMatch[] = [];
    let truncated = false;

    for await (const filePath of walkFiles(root)) {
      const relative = toWorkspaceRelative(root, filePath);
      if (!fileFilter.test(relative)) {
        continue;
      }
      const content = await readSearchable(filePath);
      if (content === null) {
        continue;
      }
      const lines = content.split("\n");
      for (let index = 0; index < lines.length; index += 1) {
        const line = lines[index] ?? "";
        if (!pattern.test(line)) {
          continue;
        }
        if (matches.length >= limit) {
          truncated = true;
          break;
        }
        matches.push({ file: relative, line: index + 1, match: line.trim() });
      }
      if (truncated) {
        break;
      }
    }

    return textResult({ query, matches, truncated });
  }

  private async handleApplyPatch(
    args: Record<string, unknown>,
    context: ToolContext
  ): ReturnType<ToolHandler> {
    try {
      const result = await applyWorkspacePatch(context.workspaceRoot, String(args.unified_diff));
      if (!result.ok) {
        return errorResult("EXECUTION_FAILED", result.error);
      }
      this.logger?.debug("Workspace patch applied", {
        taskId: context.taskId,
        files: result.files.length,
      });
      return textResult({ files: result.files });
    } catch (error) {
      return failureFor(error, "patch target");
    }
  }
}

async function* walkFiles(dir: string): AsyncGenerator<string> {
  const dirents = await fs.readdir(dir, { withFileTypes: true });
  dirents.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  for (const dirent of dirents) {
    const fullPath = path.join(dir, dirent.name);
    if (dirent.isDirectory()) {
      if (!SEARCH_SKIP_DIRS.has(dirent.name)) {
        yield* walkFiles(fullPath);
      }
    } else if (dirent.isFile()) {
      yield fullPath;
    }
  }
}

/** File text, or null for large or binary files */
async function readSearchable(filePath: string): Promise<string | null> {
  const stat = await fs.stat(filePath);
  if (stat.size > SEARCH_MAX_FILE_BYTES) {
    return null;
  }
  const buffer = await fs.readFile(filePath);
  if (buffer.includes(0)) {
    return null;
  }
  return buffer.toString("utf-8");
}

export function createWorkspaceToolServer(
  options?: WorkspaceToolServerOptions
): WorkspaceToolServer {
  return new WorkspaceToolServer(options);
}
