export type CoordinationErrorCode =
  | "UNKNOWN_RECIPIENT"
  | "INBOX_FULL"
  | "CYCLIC_DEPENDENCY"
  | "INVALID_DEPENDENCY"
  | "AGENT_UNRESPONSIVE"
  | "CAPACITY_EXHAUSTED"
  | "CONFLICT"
  | "TASK_TERMINALLY_FAILED"
  | "INVALID_REQUEST"
  | "NOT_FOUND"
  | "SHUTTING_DOWN"
  | "SCHEDULER_FAULT";

export class CoordinationError extends Error {
  constructor(
    message: string,
    public readonly code: CoordinationErrorCode,
    public readonly statusCode: number
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class UnknownRecipientError extends CoordinationError {
  constructor(public readonly recipientId: string) {
    super(`Unknown recipient: ${recipientId}`, "UNKNOWN_RECIPIENT", 404);
  }
}

export class InboxFullError extends CoordinationError {
  constructor(
    public readonly recipientId: string,
    public readonly capacity: number
  ) {
    super(`Inbox full for ${recipientId} (capacity ${capacity})`, "INBOX_FULL", 429);
  }
}

export class CyclicDependencyError extends CoordinationError {
  constructor(public readonly cycle: string[]) {
    super(`Task dependencies create a cycle: ${cycle.join(" -> ")}`, "CYCLIC_DEPENDENCY", 400);
  }
}

export class InvalidDependencyError extends CoordinationError {
  constructor(public readonly dependencyId: string) {
    super(`Unknown dependency: ${dependencyId}`, "INVALID_DEPENDENCY", 400);
  }
}

export class AgentUnresponsiveError extends CoordinationError {
  constructor(
    public readonly agentId: string,
    public readonly taskId: string,
    timeoutMs: number
  ) {
    super(
      `Agent ${agentId} did not answer task ${taskId} within ${timeoutMs}ms`,
      "AGENT_UNRESPONSIVE",
      504
    );
  }
}

export class CapacityExhaustedError extends CoordinationError {
  constructor(
    public readonly taskId: string,
    public readonly capability: string,
    public readonly passes: number
  ) {
    super(
      `No idle agent with capability "${capability}" for task ${taskId} after ${passes} passes`,
      "CAPACITY_EXHAUSTED",
      503
    );
  }
}

export class ConflictError extends CoordinationError {
  constructor(
    public readonly key: string,
    public readonly expectedVersion: number,
    public readonly currentVersion: number
  ) {
    super(
      `Version conflict on ${key}: expected ${expectedVersion}, found ${currentVersion}`,
      "CONFLICT",
      409
    );
  }
}

export class TaskTerminallyFailedError extends CoordinationError {
  constructor(
    public readonly taskId: string,
    public readonly status: string,
    reason: string | null
  ) {
    super(
      `Task ${taskId} ended ${status}${reason ? `: ${reason}` : ""}`,
      "TASK_TERMINALLY_FAILED",
      422
    );
  }
}

export class InvalidRequestError extends CoordinationError {
  constructor(message: string) {
    super(message, "INVALID_REQUEST", 400);
  }
}

export class NotFoundError extends CoordinationError {
  constructor(message: string) {
    super(message, "NOT_FOUND", 404);
  }
}

export class ShuttingDownError extends CoordinationError {
  constructor() {
    super("Coordinator is shutting down; submissions are closed", "SHUTTING_DOWN", 503);
  }
}

export class SchedulerFaultError extends CoordinationError {
  constructor(message: string) {
    super(`Scheduler fault: ${message}`, "SCHEDULER_FAULT", 500);
  }
}
