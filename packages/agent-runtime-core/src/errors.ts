/**
 * Runtime Error Types
 *
 * Typed error hierarchy. Backend errors carry a kind that decides whether
 * the retry policy may try again; every other failure is reported as data
 * (tool results, diagnostics) rather than thrown.
 */

/** Backend error codes */
export type BackendErrorCode =
  | "PROVIDER_UNAVAILABLE"
  | "PROVIDER_RATE_LIMITED"
  | "PROVIDER_AUTH_FAILED"
  | "PROVIDER_INVALID_REQUEST"
  | "PROVIDER_CONTEXT_LENGTH_EXCEEDED"
  | "NETWORK_TIMEOUT"
  | "NETWORK_CONNECTION_FAILED"
  | "MALFORMED_RESPONSE"
  | "RETRY_EXHAUSTED"
  | "UNKNOWN_ERROR";

export type BackendErrorKind = "transient" | "fatal";

export interface BackendErrorOptions {
  statusCode?: number;
  attempts?: number;
  cause?: unknown;
  context?: Record<string, unknown>;
}

/**
 * Base class for failures of a model backend request.
 */
export abstract class BackendError extends Error {
  override readonly name: string = "BackendError";
  abstract readonly kind: BackendErrorKind;
  readonly code: BackendErrorCode;
  readonly provider: string;
  readonly statusCode?: number;
  readonly attempts?: number;
  readonly timestamp: number;
  readonly context: Record<string, unknown>;

  constructor(
    message: string,
    code: BackendErrorCode,
    provider: string,
    options: BackendErrorOptions = {}
  ) {
    super(message, { cause: options.cause });
    this.code = code;
    this.provider = provider;
    this.statusCode = options.statusCode;
    this.attempts = options.attempts;
    this.timestamp = Date.now();
    this.context = options.context ?? {};
  }

  /**
   * Create from a non-2xx HTTP response.
   *
   * 408, 429 and 5xx are transient; every other status is fatal.
   */
  static fromResponse(provider: string, status: number, body: string): BackendError {
    const excerpt = body.slice(0, 200);
    const options = { statusCode: status, context: { body: excerpt } };

    if (status === 401 || status === 403) {
      return new FatalBackendError(
        `Authentication failed for ${provider}`,
        "PROVIDER_AUTH_FAILED",
        provider,
        options
      );
    }
    if (status === 429) {
      return new TransientBackendError(
        `Rate limit exceeded for ${provider}`,
        "PROVIDER_RATE_LIMITED",
        provider,
        options
      );
    }
    if (status === 408) {
      return new TransientBackendError(
        `Request to ${provider} timed out (408)`,
        "NETWORK_TIMEOUT",
        provider,
        options
      );
    }
    if (status >= 500) {
      return new TransientBackendError(
        `${provider} is temporarily unavailable (${status})`,
        "PROVIDER_UNAVAILABLE",
        provider,
        options
      );
    }
    if (body.includes("context_length") || body.includes("maximum context")) {
      return new FatalBackendError(
        `Context length exceeded for ${provider}`,
        "PROVIDER_CONTEXT_LENGTH_EXCEEDED",
        provider,
        options
      );
    }
    return new FatalBackendError(
      `Invalid request to ${provider} (${status}): ${excerpt.slice(0, 100)}`,
      "PROVIDER_INVALID_REQUEST",
      provider,
      options
    );
  }

  /**
   * Create a structured representation.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      kind: this.kind,
      code: this.code,
      provider: this.provider,
      message: this.message,
      statusCode: this.statusCode,
      attempts: this.attempts,
      timestamp: this.timestamp,
      context: this.context,
    };
  }
}

/** Retryable: timeouts, connection failures, 408/429/5xx, unreadable bodies */
export class TransientBackendError extends BackendError {
  override readonly name: string = "TransientBackendError";
  readonly kind = "transient";
}

/** Never retried; ends the task */
export class FatalBackendError extends BackendError {
  override readonly name: string = "FatalBackendError";
  readonly kind = "fatal";
}

export function isBackendError(error: unknown): error is BackendError {
  return error instanceof BackendError;
}

/**
 * A workspace path resolved outside the task's workspace root.
 */
export class SandboxViolationError extends Error {
  override readonly name: string = "SandboxViolationError";
  readonly requestedPath: string;
  readonly workspaceRoot: string;

  constructor(requestedPath: string, workspaceRoot: string) {
    super(`Path escapes workspace: ${requestedPath}`);
    this.requestedPath = requestedPath;
    this.workspaceRoot = workspaceRoot;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      requestedPath: this.requestedPath,
      workspaceRoot: this.workspaceRoot,
    };
  }
}

export interface AgentSpecIssue {
  path: string;
  message: string;
}

/**
 * Malformed agent configuration or missing credentials. Raised before any
 * loop starts.
 */
export class AgentSpecError extends Error {
  override readonly name: string = "AgentSpecError";
  readonly issues: AgentSpecIssue[];

  constructor(message: string, issues: AgentSpecIssue[] = []) {
    super(message);
    this.issues = issues;
  }

  toJSON(): Record<string, unknown> {
    return { name: this.name, message: this.message, issues: this.issues };
  }
}
