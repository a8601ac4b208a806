/**
 * Backend Retry Policy
 *
 * Bounded exponential backoff around a single backend request, using
 * Cockatiel. Only TransientBackendError is retried; the delay before retry k
 * (0-based) is min(maxDelayMs, initialDelayMs * 2^k), without jitter.
 */

import {
  type RetryConfig,
  FatalBackendError,
  TransientBackendError,
} from "@taskloop/agent-runtime-core";
import type { RuntimeLogger } from "@taskloop/agent-runtime-telemetry/logging";
import { DelegateBackoff, handleType, retry } from "cockatiel";

// ============================================================================
// Types
// ============================================================================

export interface RetryOutcome<T> {
  value: T;
  /** Requests made, the successful one included */
  attempts: number;
  /** Delay applied before each retry, in order */
  delaysMs: number[];
  totalDelayMs: number;
}

export interface RetryNotice {
  /** 1-based number of the retry about to happen */
  retry: number;
  delayMs: number;
  error: TransientBackendError;
}

export interface BackendRetryPolicyOptions {
  logger?: RuntimeLogger;
  onRetry?: (notice: RetryNotice) => void;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 8,
  initialDelayMs: 1000,
  maxDelayMs: 10_000,
};

/**
 * Delay before the given 0-based retry.
 */
export function computeBackoffDelay(config: RetryConfig, retryIndex: number): number {
  return Math.min(config.maxDelayMs, config.initialDelayMs * 2 ** retryIndex);
}

// ============================================================================
// Retry Policy Class
// ============================================================================

export class BackendRetryPolicy {
  readonly config: RetryConfig;
  private readonly logger?: RuntimeLogger;
  private readonly onRetryHook?: (notice: RetryNotice) => void;

  constructor(config: Partial<RetryConfig> = {}, options: BackendRetryPolicyOptions = {}) {
    this.config = { ...DEFAULT_RETRY_CONFIG, ...config };
    this.logger = options.logger;
    this.onRetryHook = options.onRetry;
  }

  /**
   * Run the request, retrying transient failures. Fatal errors pass through
   * untouched; exhausting the retries raises FatalBackendError
   * RETRY_EXHAUSTED with the last transient error as cause.
   */
  async execute<T>(
    fn: (context: { attempt: number; signal: AbortSignal }) => Promise<T>,
    signal?: AbortSignal
  ): Promise<RetryOutcome<T>> {
    const delaysMs: number[] = [];
    let attempts = 0;

    const policy = retry(handleType(TransientBackendError), {
      maxAttempts: this.config.maxRetries,
      backoff: new DelegateBackoff((context: { attempt: number }) =>
        computeBackoffDelay(this.config, context.attempt - 1)
      ),
    });

    const subscription = policy.onRetry((reason) => {
      delaysMs.push(reason.delay);
      if ("error" in reason && reason.error instanceof TransientBackendError) {
        const notice = { retry: reason.attempt, delayMs: reason.delay, error: reason.error };
        this.logger?.warn("Retrying backend request", {
          retry: notice.retry,
          delayMs: notice.delayMs,
          code: notice.error.code,
          statusCode: notice.error.statusCode,
        });
        this.onRetryHook?.(notice);
      }
    });

    try {
      const value = await policy.execute(({ signal: attemptSignal }) => {
        attempts += 1;
        return fn({ attempt: attempts, signal: attemptSignal });
      }, signal);
      return { value, attempts, delaysMs, totalDelayMs: sum(delaysMs) };
    } catch (error) {
      if (error instanceof TransientBackendError) {
        throw new FatalBackendError(
          `Retries exhausted after ${attempts} attempts: ${error.message}`,
          "RETRY_EXHAUSTED",
          error.provider,
          { statusCode: error.statusCode, attempts, cause: error }
        );
      }
      throw error;
    } finally {
      subscription.dispose();
    }
  }
}

function sum(values: readonly number[]): number {
  return values.reduce((total, value) => total + value, 0);
}
