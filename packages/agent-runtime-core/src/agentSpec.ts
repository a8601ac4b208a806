/**
 * Agent Spec
 *
 * Per-run agent configuration, validated once and frozen. A spec is shared
 * read-only by every task of a run.
 */

import { z } from "zod";
import { AgentSpecError } from "./errors";
import { deepFreeze } from "./freeze";
import { err, isErr, ok, type Result } from "./result";

// ============================================================================
// Schemas
// ============================================================================

const httpBackendFields = {
  model: z.string().min(1).optional(),
  apiKey: z.string().min(1).optional(),
  baseUrl: z.string().url().optional(),
  /** Per-request timeout */
  timeoutMs: z.number().int().positive().default(120_000),
  /** Extract tool calls written inline in assistant text */
  textToolCalls: z.boolean().default(false),
};

export const backendConfigSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("openrouter"), ...httpBackendFields }),
  z.object({
    type: z.literal("openai"),
    ...httpBackendFields,
    organizationId: z.string().optional(),
  }),
  z.object({ type: z.literal("anthropic"), ...httpBackendFields }),
  z.object({ type: z.literal("echo"), model: z.string().default("echo") }),
]);

export const retryConfigSchema = z.object({
  maxRetries: z.number().int().min(0).default(8),
  initialDelayMs: z.number().min(0).default(1000),
  maxDelayMs: z.number().min(0).default(10_000),
});

export const budgetSchema = z.object({
  maxToolCalls: z.number().int().min(0).default(20),
  maxWallTimeMs: z.number().int().min(0).default(600_000),
  maxTurns: z.number().int().min(1).default(50),
});

export const agentModeSchema = z.enum(["tools_enabled", "patch_only"]);

export const agentSpecSchema = z
  .object({
    name: z.string().min(1),
    backend: backendConfigSchema,
    systemPrompt: z.string(),
    allowedTools: z.array(z.string().min(1)).default([]),
    decoding: z.record(z.unknown()).default({}),
    retry: retryConfigSchema.default({}),
    budget: budgetSchema.default({}),
    terminationTool: z.string().min(1).default("submit"),
    mode: agentModeSchema.default("tools_enabled"),
  })
  .superRefine((spec, ctx) => {
    if (spec.retry.initialDelayMs > spec.retry.maxDelayMs) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["retry", "initialDelayMs"],
        message: "initialDelayMs must not exceed maxDelayMs",
      });
    }
    if (spec.mode === "tools_enabled" && !spec.allowedTools.includes(spec.terminationTool)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["allowedTools"],
        message: `allowedTools must include the termination tool "${spec.terminationTool}"`,
      });
    }
  });

// ============================================================================
// Types
// ============================================================================

export type BackendConfig = z.infer<typeof backendConfigSchema>;
export type BackendType = BackendConfig["type"];
export type RetryConfig = z.infer<typeof retryConfigSchema>;
export type Budget = z.infer<typeof budgetSchema>;
export type AgentMode = z.infer<typeof agentModeSchema>;
export type AgentSpec = Readonly<z.infer<typeof agentSpecSchema>>;
export type AgentSpecInput = z.input<typeof agentSpecSchema>;

// ============================================================================
// Factory
// ============================================================================

/**
 * Validate raw configuration and fill defaults, reporting every invalid
 * field as an AgentSpecError value.
 */
export function parseAgentSpec(input: unknown): Result<AgentSpec, AgentSpecError> {
  const parsed = agentSpecSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => ({
      path: issue.path.join("."),
      message: issue.message,
    }));
    const summary = issues.map((issue) => `${issue.path || "(root)"}: ${issue.message}`);
    return err(new AgentSpecError(`Invalid agent spec: ${summary.join("; ")}`, issues));
  }
  return ok(deepFreeze(parsed.data));
}

/**
 * Validate raw configuration, fill defaults and freeze the result.
 *
 * @throws AgentSpecError listing every invalid field
 */
export function createAgentSpec(input: unknown): AgentSpec {
  const result = parseAgentSpec(input);
  if (isErr(result)) {
    throw result.error;
  }
  return result.value;
}

/**
 * Substitute `{name}` placeholders in a system prompt template. Unknown
 * placeholders are left as written.
 */
export function renderSystemPrompt(template: string, vars: Record<string, string>): string {
  return template.replace(/\{([a-zA-Z_][a-zA-Z0-9_]*)\}/g, (match, key: string) =>
    Object.hasOwn(vars, key) ? (vars[key] ?? match) : match
  );
}
