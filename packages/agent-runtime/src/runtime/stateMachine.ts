/**
 * Runtime State Machine
 *
 * Enforces valid state transitions for one task's loop. A machine lives for
 * one run; the three terminal states have no way out.
 */

// ============================================================================
// Types
// ============================================================================

export type RuntimeStatus =
  | "running"
  | "awaiting_model"
  | "executing_tools"
  | "submitted"
  | "budget_exceeded"
  | "backend_fatal";

export type RuntimeStateEvent =
  | "request"
  | "execute"
  | "continue"
  | "submit"
  | "exhaust"
  | "fail";

export interface RuntimeStateTransition {
  from: RuntimeStatus;
  to: RuntimeStatus;
  event: RuntimeStateEvent;
}

// ============================================================================
// State Machine Implementation
// ============================================================================

const VALID_TRANSITIONS: Record<
  RuntimeStatus,
  Partial<Record<RuntimeStateEvent, RuntimeStatus>>
> = {
  running: {
    request: "awaiting_model",
    exhaust: "budget_exceeded",
  },
  awaiting_model: {
    execute: "executing_tools",
    continue: "running",
    submit: "submitted",
    fail: "backend_fatal",
  },
  executing_tools: {
    continue: "running",
    submit: "submitted",
    exhaust: "budget_exceeded",
  },
  submitted: {},
  budget_exceeded: {},
  backend_fatal: {},
};

const TERMINAL: ReadonlySet<RuntimeStatus> = new Set<RuntimeStatus>([
  "submitted",
  "budget_exceeded",
  "backend_fatal",
]);

export class RuntimeStateMachine {
  private status: RuntimeStatus = "running";
  private readonly history: RuntimeStateTransition[] = [];

  getStatus(): RuntimeStatus {
    return this.status;
  }

  getHistory(): readonly RuntimeStateTransition[] {
    return this.history;
  }

  isTerminal(): boolean {
    return TERMINAL.has(this.status);
  }

  canTransition(event: RuntimeStateEvent): boolean {
    return event in VALID_TRANSITIONS[this.status];
  }

  transition(event: RuntimeStateEvent): RuntimeStatus {
    const nextStatus = VALID_TRANSITIONS[this.status][event];
    if (!nextStatus) {
      throw new Error(
        `Invalid state transition: cannot apply event "${event}" from status "${this.status}"`
      );
    }
    this.history.push({ from: this.status, to: nextStatus, event });
    this.status = nextStatus;
    return this.status;
  }
}
