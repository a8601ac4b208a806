/**
 * Workspace path confinement.
 *
 * Every path a tool touches resolves inside the task's workspace root. A
 * relative path that climbs above its base is rejected lexically, whatever
 * the root; a path that stays inside lexically is then checked again after
 * symlinks resolve.
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { SandboxViolationError } from "@taskloop/agent-runtime-core";

function isParentSegment(relative: string): boolean {
  return relative === ".." || relative.startsWith(`..${path.sep}`);
}

function isInside(root: string, target: string): boolean {
  const relative = path.relative(root, target);
  return relative === "" || (!isParentSegment(relative) && !path.isAbsolute(relative));
}

function climbsAboveBase(input: string): boolean {
  return isParentSegment(path.normalize(input));
}

/**
 * Real path of the target, or of its nearest existing ancestor joined with
 * the remaining segments when the target does not exist yet.
 */
async function realpathAllowMissing(target: string): Promise<string> {
  const missing: string[] = [];
  let current = target;
  while (true) {
    try {
      const real = await fs.realpath(current);
      return missing.length > 0 ? path.join(real, ...missing.reverse()) : real;
    } catch (error) {
      const parent = path.dirname(current);
      if (!isMissing(error) || parent === current) {
        throw error;
      }
      missing.push(path.basename(current));
      current = parent;
    }
  }
}

function isMissing(error: unknown): boolean {
  if (!(error instanceof Error) || !("code" in error)) {
    return false;
  }
  return error.code === "ENOENT" || error.code === "ENOTDIR";
}

/**
 * Lexical check only; no filesystem access.
 *
 * @throws SandboxViolationError
 */
export function resolveWorkspacePathSync(workspaceRoot: string, input: string): string {
  const root = path.resolve(workspaceRoot);
  if (input.includes("\0")) {
    throw new SandboxViolationError(input, root);
  }
  if (!path.isAbsolute(input) && climbsAboveBase(input)) {
    throw new SandboxViolationError(input, root);
  }
  const resolved = path.resolve(root, input);
  if (!isInside(root, resolved)) {
    throw new SandboxViolationError(input, root);
  }
  return resolved;
}

/**
 * Resolve a tool path argument to an absolute path inside the workspace.
 *
 * @throws SandboxViolationError when the path or its symlink target leaves
 * the workspace
 */
export async function resolveWorkspacePath(workspaceRoot: string, input: string): Promise<string> {
  const resolved = resolveWorkspacePathSync(workspaceRoot, input);
  const realRoot = await fs.realpath(path.resolve(workspaceRoot));
  const realTarget = await realpathAllowMissing(resolved);
  if (!isInside(realRoot, realTarget)) {
    throw new SandboxViolationError(input, path.resolve(workspaceRoot));
  }
  return resolved;
}

/** Workspace-relative form of an absolute path, with forward slashes */
export function toWorkspaceRelative(workspaceRoot: string, absolutePath: string): string {
  const relative = path.relative(path.resolve(workspaceRoot), absolutePath);
  return relative === "" ? "." : relative.split(path.sep).join("/");
}
