/**
 * Bash Tool Server
 *
 * Runs shell commands rooted at the task workspace with a per-call timeout
 * and output truncation. A non-zero exit or a timeout is a failed tool
 * result, never an exception.
 */

import { type ChildProcess, type SpawnOptions, spawn } from "node:child_process";
import type {
  BashExecuteOptions,
  BashExecuteResult,
  IBashExecutor,
  ToolContext,
} from "@taskloop/agent-runtime-core";
import type { RuntimeLogger } from "@taskloop/agent-runtime-telemetry/logging";
import { BaseToolServer, errorResult, type ToolHandler, textResult } from "../base/baseServer";

export const BASH_TOOL_NAME = "bash";

// ============================================================================
// Bash Executor Interface (for dependency injection)
// ============================================================================

export type { BashExecuteOptions, BashExecuteResult, IBashExecutor };

// ============================================================================
// Bash Executor Implementation
// ============================================================================

/** Grace period between SIGTERM and SIGKILL after a timeout */
const KILL_GRACE_MS = 5000;

/**
 * Default bash executor using child_process.
 */
export class ProcessBashExecutor implements IBashExecutor {
  private readonly defaultShell: string;

  constructor(shell = "/bin/bash") {
    this.defaultShell = shell;
  }

  async execute(command: string, options: BashExecuteOptions): Promise<BashExecuteResult> {
    const startTime = Date.now();
    const maxOutputChars = options.maxOutputChars ?? 1024 * 1024;

    return new Promise((resolve) => {
      let stdout = "";
      let stderr = "";
      let truncated = false;
      let timedOut = false;
      let settled = false;
      let killTimer: NodeJS.Timeout | undefined;

      const spawnOptions: SpawnOptions = {
        shell: this.defaultShell,
        cwd: options.cwd,
        env: { ...process.env, ...options.env },
        detached: process.platform !== "win32",
      };

      const child: ChildProcess = spawn(command, [], spawnOptions);

      // The shell runs in its own process group so its children die with it
      const kill = (signal: NodeJS.Signals) => {
        if (child.pid !== undefined && spawnOptions.detached && killGroup(child.pid, signal)) {
          return;
        }
        child.kill(signal);
      };

      const timeout = setTimeout(() => {
        timedOut = true;
        kill("SIGTERM");
        killTimer = setTimeout(() => {
          if (!settled) {
            kill("SIGKILL");
          }
        }, KILL_GRACE_MS);
      }, options.timeoutMs);

      const onAbort = () => kill("SIGTERM");
      options.signal?.addEventListener("abort", onAbort, { once: true });

      const append = (current: string, chunk: string): string => {
        if (current.length + chunk.length <= maxOutputChars) {
          return current + chunk;
        }
        truncated = true;
        const remaining = maxOutputChars - current.length;
        return remaining > 0 ? current + chunk.slice(0, remaining) : current;
      };

      // Decoding on the stream keeps multibyte characters split across chunks intact
      child.stdout?.setEncoding("utf8");
      child.stderr?.setEncoding("utf8");
      child.stdout?.on("data", (chunk: string) => {
        stdout = append(stdout, chunk);
      });
      child.stderr?.on("data", (chunk: string) => {
        stderr = append(stderr, chunk);
      });

      const finish = (result: BashExecuteResult) => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timeout);
        if (killTimer) {
          clearTimeout(killTimer);
        }
        options.signal?.removeEventListener("abort", onAbort);
        resolve(result);
      };

      child.on("close", (code, signal) => {
        finish({
          exitCode: code ?? (signal ? 128 : -1),
          stdout,
          stderr,
          timedOut,
          truncated,
          durationMs: Date.now() - startTime,
        });
      });

      child.on("error", (err) => {
        finish({
          exitCode: -1,
          stdout,
          stderr: err.message,
          timedOut: false,
          truncated: false,
          durationMs: Date.now() - startTime,
        });
      });
    });
  }
}

function killGroup(pid: number, signal: NodeJS.Signals): boolean {
  try {
    process.kill(-pid, signal);
    return true;
  } catch {
    return false;
  }
}

// ============================================================================
// Bash Tool Server
// ============================================================================

const DANGEROUS_PATTERNS = [
  /rm\s+-rf\s+[/~](\s|$)/i,
  /mkfs/i,
  /dd\s+if=/i,
  />\s*\/dev\/(sd|nvme|hd)/i,
  /:\(\)\s*\{\s*:\|:&\s*\};:/, // Fork bomb
];

export interface BashToolServerOptions {
  executor?: IBashExecutor;
  logger?: RuntimeLogger;
}

export class BashToolServer extends BaseToolServer {
  readonly name = "bash";
  readonly description = "Execute shell commands inside the task workspace";

  private readonly executor: IBashExecutor;
  private readonly logger?: RuntimeLogger;

  constructor(options: BashToolServerOptions = {}) {
    super();
    this.executor = options.executor ?? new ProcessBashExecutor();
    this.logger = options.logger;

    this.registerTool(
      {
        name: BASH_TOOL_NAME,
        description:
          "Run a shell command with the workspace root as working directory. Returns stdout, stderr and the exit code.",
        inputSchema: {
          type: "object",
          properties: {
            command: { type: "string", description: "The command to execute" },
            timeout_s: {
              type: "number",
              minimum: 1,
              description: "Timeout in seconds (default 60)",
            },
          },
          required: ["command"],
          additionalProperties: false,
        },
        annotations: { category: "core", readOnly: false, estimatedDuration: "medium" },
      },
      this.handleExecute.bind(this)
    );
  }

  private async handleExecute(
    args: Record<string, unknown>,
    context: ToolContext
  ): ReturnType<ToolHandler> {
    const command = String(args.command);
    const { limits } = context;
    const requestedMs = typeof args.timeout_s === "number" ? args.timeout_s * 1000 : undefined;
    const timeoutMs = Math.min(requestedMs ?? limits.bashTimeoutMs, limits.maxBashTimeoutMs);

    if (command.trim() === "") {
      return errorResult("INVALID_ARGUMENTS", "command must not be empty");
    }

    for (const pattern of DANGEROUS_PATTERNS) {
      if (pattern.test(command)) {
        return errorResult(
          "PERMISSION_DENIED",
          `Command contains potentially dangerous pattern: ${pattern.source}`
        );
      }
    }

    this.logger?.debug("Executing command", { taskId: context.taskId, command, timeoutMs });

    const result = await this.executor.execute(command, {
      cwd: context.workspaceRoot,
      timeoutMs,
      signal: context.signal,
    });

    const meta = { durationMs: result.durationMs, exitCode: result.exitCode };
    const output = truncateOutput(formatOutput(result), limits.maxOutputChars);

    if (result.timedOut) {
      return {
        success: false,
        content: output.text
          ? `Command timed out after ${timeoutMs}ms\n${output.text}`
          : `Command timed out after ${timeoutMs}ms`,
        error: { code: "TIMEOUT", message: `Command timed out after ${timeoutMs}ms` },
        meta: { ...meta, truncated: output.truncated || result.truncated },
      };
    }

    if (result.exitCode !== 0) {
      return {
        success: false,
        content: output.text,
        error: {
          code: "EXECUTION_FAILED",
          message: `Command exited with code ${result.exitCode}`,
        },
        meta: { ...meta, truncated: output.truncated || result.truncated },
      };
    }

    return textResult(output.text, { ...meta, truncated: output.truncated || result.truncated });
  }
}

function formatOutput(result: BashExecuteResult): string {
  const parts = [`exit_code: ${result.exitCode}`];
  if (result.stdout) {
    parts.push(`[stdout]\n${result.stdout}`);
  }
  if (result.stderr) {
    parts.push(`[stderr]\n${result.stderr}`);
  }
  return parts.join("\n");
}

function truncateOutput(text: string, maxChars: number): { text: string; truncated: boolean } {
  if (text.length <= maxChars) {
    return { text, truncated: false };
  }
  return { text: `${text.slice(0, maxChars)}\n[output truncated]`, truncated: true };
}

/**
 * Create a bash tool server with default configuration.
 */
export function createBashToolServer(options?: BashToolServerOptions): BashToolServer {
  return new BashToolServer(options);
}
