/**
 * Artifact Policy
 *
 * Classifies a raw artifact against the expected output type and flags what
 * looks wrong. The artifact is returned untouched; callers decide what the
 * flags mean.
 */

import type { Artifact, Diagnostic, OutputType } from "@taskloop/agent-runtime-core";

export type ArtifactDiagnosticCode =
  | "empty_patch"
  | "malformed_patch"
  | "empty_json"
  | "malformed_json"
  | "empty_text";

export interface ArtifactPolicyResult {
  artifact: Artifact;
  outputType: OutputType;
  diagnostics: Diagnostic[];
}

type ArtifactCheck = (artifact: Artifact) => Diagnostic[];

const DIFF_MARKERS = ["diff --git ", "diff -", "--- ", "Index: "] as const;

function flag(code: ArtifactDiagnosticCode, message: string): Diagnostic {
  return { source: "artifact", code, message };
}

function isBlank(value: string): boolean {
  return value.trim() === "";
}

// ============================================================================
// Checks
// ============================================================================

function checkPatch(artifact: Artifact): Diagnostic[] {
  if (typeof artifact !== "string") {
    return [flag("malformed_patch", "patch artifact must be a string, got an object")];
  }
  if (isBlank(artifact)) {
    return [flag("empty_patch", "patch artifact is empty")];
  }
  const body = artifact.trimStart();
  if (!DIFF_MARKERS.some((marker) => body.startsWith(marker))) {
    return [flag("malformed_patch", "patch artifact does not start with a diff header")];
  }
  return [];
}

function checkJson(artifact: Artifact): Diagnostic[] {
  if (typeof artifact !== "string") {
    return [];
  }
  if (isBlank(artifact)) {
    return [flag("empty_json", "json artifact is empty")];
  }
  try {
    JSON.parse(artifact);
    return [];
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return [flag("malformed_json", `json artifact does not parse: ${reason}`)];
  }
}

function checkText(artifact: Artifact): Diagnostic[] {
  if (typeof artifact === "string" && isBlank(artifact)) {
    return [flag("empty_text", "text artifact is empty")];
  }
  return [];
}

const CHECKS: Record<OutputType, ArtifactCheck> = {
  patch: checkPatch,
  json: checkJson,
  text: checkText,
};

// ============================================================================
// Public API
// ============================================================================

/**
 * Map a declared output type onto a known one; anything unrecognized is
 * treated as text.
 */
export function normalizeOutputType(outputType: string): OutputType {
  const normalized = outputType.trim().toLowerCase();
  return normalized === "patch" || normalized === "json" ? normalized : "text";
}

export function applyArtifactPolicy(artifact: Artifact, outputType: string): ArtifactPolicyResult {
  const type = normalizeOutputType(outputType);
  return { artifact, outputType: type, diagnostics: CHECKS[type](artifact) };
}
