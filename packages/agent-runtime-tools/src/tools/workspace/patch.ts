/**
 * Unified Diff Application
 *
 * Applies a multi-file unified diff inside a workspace. Every hunk is
 * checked before anything is written, so a patch lands whole or not at all.
 * Context lines match with trailing whitespace ignored.
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { applyPatch, parsePatch } from "diff";
import { resolveWorkspacePath, toWorkspaceRelative } from "./sandbox";

type ParsedDiff = ReturnType<typeof parsePatch>[number];

export type PatchFileAction = "created" | "modified" | "deleted";

export interface PatchedFile {
  path: string;
  action: PatchFileAction;
}

export type ApplyWorkspacePatchResult =
  | { ok: true; files: PatchedFile[] }
  | { ok: false; error: string };

interface PatchPlan {
  filePath: string;
  action: PatchFileAction;
  content: string;
}

const DEV_NULL = "/dev/null";

function normalizePatchPath(fileName: string | undefined): string | null {
  if (!fileName) {
    return null;
  }
  const trimmed = fileName.trim();
  if (trimmed === DEV_NULL) {
    return DEV_NULL;
  }
  return trimmed.replace(/^[ab]\//, "");
}

function compareIgnoringTrailingWhitespace(
  _lineNumber: number,
  line: string,
  _operation: string,
  patchContent: string
): boolean {
  return line.trimEnd() === patchContent.trimEnd();
}

async function readIfExists(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, "utf-8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return null;
    }
    throw error;
  }
}

/** Content a later entry patches: the earlier plan for the same file, else the disk */
async function baseContent(
  filePath: string,
  isNewFile: boolean,
  earlier: PatchPlan | undefined
): Promise<string | null> {
  if (!earlier) {
    return isNewFile ? "" : readIfExists(filePath);
  }
  if (earlier.action === "deleted") {
    return isNewFile ? "" : null;
  }
  return earlier.content;
}

async function planEntry(
  workspaceRoot: string,
  entry: ParsedDiff,
  pending: ReadonlyMap<string, PatchPlan>
): Promise<{ ok: true; plan: PatchPlan } | { ok: false; error: string }> {
  const oldName = normalizePatchPath(entry.oldFileName);
  const newName = normalizePatchPath(entry.newFileName);
  const isNewFile = oldName === DEV_NULL;
  const isDeleted = newName === DEV_NULL;
  const fileName = isDeleted ? oldName : (newName ?? oldName);

  if (!fileName || fileName === DEV_NULL) {
    return { ok: false, error: "Patch entry is missing a file path." };
  }
  if (entry.hunks.length === 0) {
    return { ok: false, error: `Patch entry for ${fileName} has no hunks.` };
  }

  // Throws SandboxViolationError for paths outside the workspace
  const filePath = await resolveWorkspacePath(workspaceRoot, fileName);
  const relative = toWorkspaceRelative(workspaceRoot, filePath);

  const earlier = pending.get(filePath);
  const original = await baseContent(filePath, isNewFile, earlier);
  if (original === null) {
    return { ok: false, error: `File not found: ${relative}` };
  }

  const patched = applyPatch(original, entry, { compareLine: compareIgnoringTrailingWhitespace });
  if (patched === false) {
    return { ok: false, error: `Hunks do not apply to ${relative}` };
  }

  const own: PatchFileAction = isDeleted ? "deleted" : isNewFile ? "created" : "modified";
  const action = earlier?.action === "created" && own === "modified" ? "created" : own;
  return { ok: true, plan: { filePath, action, content: patched } };
}

/**
 * Apply a unified diff whose paths are relative to the workspace root
 * (`a/` and `b/` prefixes are stripped).
 *
 * @throws SandboxViolationError when any target leaves the workspace
 */
export async function applyWorkspacePatch(
  workspaceRoot: string,
  diffText: string
): Promise<ApplyWorkspacePatchResult> {
  let entries: ParsedDiff[];
  try {
    entries = parsePatch(diffText);
  } catch (error) {
    return {
      ok: false,
      error: `Failed to parse patch: ${error instanceof Error ? error.message : String(error)}`,
    };
  }
  entries = entries.filter((entry) => entry.oldFileName || entry.newFileName || entry.hunks.length);
  if (entries.length === 0) {
    return { ok: false, error: "No patch entries found." };
  }

  // Entries for the same file apply in order, each on top of the last
  const pending = new Map<string, PatchPlan>();
  for (const entry of entries) {
    const planned = await planEntry(workspaceRoot, entry, pending);
    if (!planned.ok) {
      return planned;
    }
    pending.set(planned.plan.filePath, planned.plan);
  }
  const plans = Array.from(pending.values());

  for (const plan of plans) {
    if (plan.action === "deleted") {
      await fs.rm(plan.filePath, { force: true });
      continue;
    }
    await fs.mkdir(path.dirname(plan.filePath), { recursive: true });
    await fs.writeFile(plan.filePath, plan.content, "utf-8");
  }

  return {
    ok: true,
    files: plans.map((plan) => ({
      path: toWorkspaceRelative(workspaceRoot, plan.filePath),
      action: plan.action,
    })),
  };
}
