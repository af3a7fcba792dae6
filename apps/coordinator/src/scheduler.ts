import { randomUUID } from "node:crypto";
import type { AgentRegistry } from "./agents.js";
import { NoopAuditSink, type AuditSink } from "./audit.js";
import { DEFAULT_CONFIG, type CoordinatorConfig } from "./config.js";
import {
  AgentUnresponsiveError,
  CapacityExhaustedError,
  CoordinationError,
  CyclicDependencyError,
  InboxFullError,
  InvalidDependencyError,
  InvalidRequestError,
  NotFoundError,
  SchedulerFaultError,
  ShuttingDownError,
  TaskTerminallyFailedError,
  UnknownRecipientError
} from "./errors.js";
import type { KnowledgeStore } from "./knowledge-store.js";
import { logger } from "./logger.js";
import type { MessageBus } from "./message-bus.js";
import { SCHEDULER_ID, type Message } from "./messages.js";
import {
  TaskQuerySchema,
  TaskReplySchema,
  type CancelPayload,
  type DelegationPayload
} from "./protocol.js";

export type TaskStatus = "pending" | "ready" | "dispatched" | "completed" | "failed" | "cancelled";

const TERMINAL_STATUSES = new Set<TaskStatus>(["completed", "failed", "cancelled"]);

export interface TaskFallback {
  result: unknown;
}

export interface TaskRecord {
  id: string;
  description: unknown;
  capability: string;
  priority: number;
  dependencies: string[];
  status: TaskStatus;
  assignedAgentId: string | null;
  agentHistory: string[];
  result: unknown;
  error: string | null;
  retryCount: number;
  attempts: number;
  sequence: number;
  submittedAt: string;
  updatedAt: string;
  dispatchedAt: string | null;
  completedAt: string | null;
  retryAt: string | null;
  cancelReason: string | null;
  fallback: TaskFallback | null;
  fallbackApplied: boolean;
  unplacedPasses: number;
}

export interface TaskRecordWithDependents extends TaskRecord {
  dependents: string[];
}

export interface SubmitTaskInput {
  id?: string;
  description?: unknown;
  capability: string;
  priority?: number;
  dependencies?: string[];
  fallback?: TaskFallback;
}

export type TaskEventType =
  | "submitted"
  | "ready"
  | "dispatched"
  | "progress"
  | "retrying"
  | "completed"
  | "failed"
  | "cancelled"
  | "capacity_exhausted";

export interface TaskEvent {
  type: TaskEventType;
  task: TaskRecord;
  error?: CoordinationError;
}

type TaskListener = (event: TaskEvent) => void;

export type SchedulerState = "running" | "draining" | "stopped" | "faulted";

export interface SchedulerHealth {
  state: SchedulerState;
  accepting: boolean;
  fault: string | null;
  lastPassAt: string | null;
  counts: Record<TaskStatus, number>;
}

export type SchedulerOptions = Partial<
  Pick<
    CoordinatorConfig,
    | "maxRetries"
    | "retryBackoffMs"
    | "retryBackoffMaxMs"
    | "dispatchTimeoutMs"
    | "receiveTimeoutMs"
    | "capacityWarningPasses"
    | "schedulerInboxCapacity"
    | "onDependencyFailure"
    | "fallbackResult"
  >
> & {
  now?: () => Date;
};

const SHUTDOWN_REASON = "shutdown";

/**
 * Owns the task table and dependency graph.
 *
 * Every mutation runs synchronously inside `mutate`, so a scheduling pass, a
 * reply handler and a timeout handler never interleave. Passes requested while
 * a mutation is in progress run once it finishes.
 */
export class TaskScheduler {
  private readonly tasks = new Map<string, TaskRecord>();
  private readonly dependents = new Map<string, Set<string>>();
  private readonly dispatchTimers = new Map<string, NodeJS.Timeout>();
  private readonly listeners = new Set<TaskListener>();
  private readonly options: Required<Omit<SchedulerOptions, "fallbackResult" | "now">>;
  private readonly fallbackResult: unknown;
  private readonly now: () => Date;
  private readonly detachIdleListener: () => void;
  private retryTimer: NodeJS.Timeout | null = null;
  private retryTimerAt = Number.POSITIVE_INFINITY;
  private sequence = 0;
  private holdDepth = 0;
  private passPending = false;
  private lastPassAt: Date | null = null;
  private accepting = true;
  private draining = false;
  private stopped = false;
  private fault: SchedulerFaultError | null = null;
  private loopAbort: AbortController | null = null;
  private loop: Promise<void> | null = null;

  constructor(
    private readonly registry: AgentRegistry,
    private readonly bus: MessageBus,
    private readonly knowledge: KnowledgeStore,
    private readonly audit: AuditSink = new NoopAuditSink(),
    options?: SchedulerOptions
  ) {
    this.options = {
      maxRetries: options?.maxRetries ?? DEFAULT_CONFIG.maxRetries,
      retryBackoffMs: options?.retryBackoffMs ?? DEFAULT_CONFIG.retryBackoffMs,
      retryBackoffMaxMs: options?.retryBackoffMaxMs ?? DEFAULT_CONFIG.retryBackoffMaxMs,
      dispatchTimeoutMs: options?.dispatchTimeoutMs ?? DEFAULT_CONFIG.dispatchTimeoutMs,
      receiveTimeoutMs: options?.receiveTimeoutMs ?? DEFAULT_CONFIG.receiveTimeoutMs,
      capacityWarningPasses: options?.capacityWarningPasses ?? DEFAULT_CONFIG.capacityWarningPasses,
      schedulerInboxCapacity: options?.schedulerInboxCapacity ?? DEFAULT_CONFIG.schedulerInboxCapacity,
      onDependencyFailure: options?.onDependencyFailure ?? DEFAULT_CONFIG.onDependencyFailure
    };
    this.fallbackResult = options?.fallbackResult ?? null;
    this.now = options?.now ?? (() => new Date());

    this.bus.openInbox(SCHEDULER_ID, this.options.schedulerInboxCapacity);
    this.detachIdleListener = this.registry.onIdle(() => {
      this.requestPass("agent_idle");
    });
  }

  // ---- lifecycle ----------------------------------------------------------

  /** Starts consuming replies from the scheduler inbox. */
  start(): void {
    if (this.loop || this.stopped) {
      return;
    }

    const abort = new AbortController();
    this.loopAbort = abort;
    this.loop = this.consume(abort.signal);
    logger.info({ dispatchTimeoutMs: this.options.dispatchTimeoutMs }, "scheduler started");
  }

  async stop(): Promise<void> {
    this.stopped = true;
    this.accepting = false;
    this.loopAbort?.abort();
    const loop = this.loop;
    this.loop = null;
    this.loopAbort = null;
    if (loop) {
      await loop;
    }

    for (const timer of this.dispatchTimers.values()) {
      clearTimeout(timer);
    }
    this.dispatchTimers.clear();
    this.clearRetryTimer();
    this.detachIdleListener();
    logger.info("scheduler stopped");
  }

  /** Refuses new submissions and cancels everything that is not already dispatched. */
  beginDrain(): number {
    this.accepting = false;
    this.draining = true;

    return this.mutate(() => {
      let cancelled = 0;
      for (const task of this.orderedTasks()) {
        if (task.status === "pending" || task.status === "ready") {
          this.cancelOne(task, SHUTDOWN_REASON);
          cancelled += 1;
        }
      }
      this.clearRetryTimer();
      return cancelled;
    });
  }

  /** Resolves true once no task is dispatched, or false when the grace period runs out first. */
  waitForSettled(graceMs: number): Promise<boolean> {
    if (this.countByStatus("dispatched") === 0) {
      return Promise.resolve(true);
    }

    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        unsubscribe();
        resolve(false);
      }, graceMs);
      const unsubscribe = this.subscribe(() => {
        if (this.countByStatus("dispatched") === 0) {
          clearTimeout(timer);
          unsubscribe();
          resolve(true);
        }
      });
    });
  }

  cancelDispatched(reason: string): number {
    return this.mutate(() => {
      let cancelled = 0;
      for (const task of this.orderedTasks()) {
        if (task.status === "dispatched") {
          this.cancelOne(task, reason);
          cancelled += 1;
        }
      }
      return cancelled;
    });
  }

  // ---- submission ---------------------------------------------------------

  submit(input: SubmitTaskInput): TaskRecord {
    const [record] = this.submitMany([input]);
    return record;
  }

  /**
   * Adds a batch atomically. Batch members may depend on each other by id;
   * any validation failure leaves the task table untouched.
   */
  submitMany(inputs: SubmitTaskInput[]): TaskRecord[] {
    this.ensureAccepting();
    if (inputs.length === 0) {
      throw new InvalidRequestError("At least one task is required");
    }

    const now = this.now().toISOString();
    const batch = new Map<string, TaskRecord>();
    for (const input of inputs) {
      const task = this.buildTask(input, now);
      if (this.tasks.has(task.id) || batch.has(task.id)) {
        throw new InvalidRequestError(`Task id already exists: ${task.id}`);
      }
      batch.set(task.id, task);
    }

    for (const task of batch.values()) {
      for (const dependencyId of task.dependencies) {
        if (dependencyId === task.id) {
          throw new CyclicDependencyError([task.id, task.id]);
        }
        if (!this.tasks.has(dependencyId) && !batch.has(dependencyId)) {
          throw new InvalidDependencyError(dependencyId);
        }
      }
    }

    const order = this.topologicalOrder(batch);

    return this.mutate(() => {
      for (const task of order) {
        this.sequence += 1;
        task.sequence = this.sequence;
        this.tasks.set(task.id, task);
        for (const dependencyId of task.dependencies) {
          this.dependentsOf(dependencyId).add(task.id);
        }
      }

      for (const task of order) {
        this.emit("submitted", task);
        logger.info(
          { taskId: task.id, capability: task.capability, priority: task.priority, dependencies: task.dependencies },
          "task submitted"
        );
        void this.audit.record({
          eventType: "task_submitted",
          actor: "task_scheduler",
          payload: {
            taskId: task.id,
            capability: task.capability,
            priority: task.priority,
            dependencyCount: task.dependencies.length
          }
        });
        this.evaluatePending(task);
      }

      this.requestPass("task_submitted");
      return [...batch.values()].map((task) => this.cloneTask(task));
    });
  }

  // ---- reads --------------------------------------------------------------

  list(): TaskRecord[] {
    return this.orderedTasks().map((task) => this.cloneTask(task));
  }

  listWithDependents(): TaskRecordWithDependents[] {
    return this.orderedTasks().map((task) => this.withDependents(task));
  }

  get(id: string): TaskRecord {
    const task = this.tasks.get(id);
    if (!task) {
      throw new NotFoundError(`Task not found: ${id}`);
    }
    return this.cloneTask(task);
  }

  getWithDependents(id: string): TaskRecordWithDependents {
    const task = this.tasks.get(id);
    if (!task) {
      throw new NotFoundError(`Task not found: ${id}`);
    }
    return this.withDependents(task);
  }

  status(id: string): TaskStatus | undefined {
    return this.tasks.get(id)?.status;
  }

  health(): SchedulerHealth {
    const counts: Record<TaskStatus, number> = {
      pending: 0,
      ready: 0,
      dispatched: 0,
      completed: 0,
      failed: 0,
      cancelled: 0
    };
    for (const task of this.tasks.values()) {
      counts[task.status] += 1;
    }

    return {
      state: this.fault ? "faulted" : this.stopped ? "stopped" : this.draining ? "draining" : "running",
      accepting: this.accepting && !this.fault,
      fault: this.fault?.message ?? null,
      lastPassAt: this.lastPassAt?.toISOString() ?? null,
      counts
    };
  }

  getLastPassAt(): Date | null {
    return this.lastPassAt;
  }

  subscribe(listener: TaskListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Resolves with the completed task; rejects with `TaskTerminallyFailedError` when it fails or is cancelled. */
  waitFor(id: string): Promise<TaskRecord> {
    const current = this.get(id);
    if (TERMINAL_STATUSES.has(current.status)) {
      return this.settle(current);
    }

    return new Promise((resolve, reject) => {
      const unsubscribe = this.subscribe((event) => {
        if (event.task.id !== id || !TERMINAL_STATUSES.has(event.task.status)) {
          return;
        }
        unsubscribe();
        this.settle(event.task).then(resolve, reject);
      });
    });
  }

  // ---- control ------------------------------------------------------------

  cancel(id: string, reason = "cancelled_by_request"): TaskRecord {
    const task = this.tasks.get(id);
    if (!task) {
      throw new NotFoundError(`Task not found: ${id}`);
    }
    if (TERMINAL_STATUSES.has(task.status)) {
      return this.cloneTask(task);
    }

    return this.mutate(() => {
      this.cancelOne(task, reason);
      this.cascadeCancel(task.id, `dependency_cancelled:${task.id}`);
      return this.cloneTask(task);
    });
  }

  /** Fails the in-flight attempts of a retired agent so they can be retried elsewhere. */
  handleAgentRetired(agentId: string): void {
    this.mutate(() => {
      for (const task of this.orderedTasks()) {
        if (task.status === "dispatched" && task.assignedAgentId === agentId) {
          this.failAttempt(task, `Agent ${agentId} was retired`);
        }
      }
    });
  }

  /** Triggers a scheduling pass; the watchdog calls this on every tick. */
  wake(reason: string): void {
    this.requestPass(reason);
  }

  /** Processes one message addressed to the scheduler. */
  handleMessage(message: Message): void {
    try {
      this.mutate(() => {
        if (message.kind === "query") {
          this.answerQuery(message);
          return;
        }
        if (message.kind !== "response" && message.kind !== "feedback") {
          logger.debug({ id: message.id, kind: message.kind }, "scheduler ignoring message");
          return;
        }
        this.handleReply(message);
      });
    } catch (error) {
      if (error instanceof SchedulerFaultError) {
        return;
      }
      throw error;
    }
  }

  // ---- dispatch -----------------------------------------------------------

  private requestPass(reason: string): void {
    this.passPending = true;
    if (this.holdDepth > 0) {
      return;
    }

    this.holdDepth += 1;
    try {
      while (this.passPending) {
        this.passPending = false;
        this.runPass(reason);
      }
    } catch (error) {
      if (!(error instanceof SchedulerFaultError)) {
        throw error;
      }
    } finally {
      this.holdDepth -= 1;
    }
  }

  private runPass(reason: string): void {
    if (this.fault || this.draining || this.stopped) {
      return;
    }

    this.verifyInvariants();
    const now = this.now();
    this.lastPassAt = now;

    const candidates = this.orderedTasks()
      .filter((task) => task.status === "ready" && (!task.retryAt || Date.parse(task.retryAt) <= now.getTime()))
      .sort((a, b) => b.priority - a.priority || a.sequence - b.sequence);

    let dispatched = 0;
    for (const task of candidates) {
      const agentId = this.registry.findIdleByCapability(task.capability, task.id);
      if (!agentId) {
        this.recordUnplaced(task);
        continue;
      }
      if (this.dispatch(task, agentId)) {
        dispatched += 1;
      }
    }

    if (candidates.length > 0) {
      logger.debug({ reason, candidates: candidates.length, dispatched }, "scheduling pass");
    }
    this.scheduleRetryWake();
  }

  private dispatch(task: TaskRecord, agentId: string): boolean {
    const attempt = task.attempts + 1;
    const payload: DelegationPayload = {
      taskId: task.id,
      description: task.description,
      capability: task.capability,
      priority: task.priority,
      attempt,
      inputs: this.collectInputs(task)
    };

    try {
      this.bus.send({
        kind: "delegation",
        senderId: SCHEDULER_ID,
        recipientId: agentId,
        correlationId: task.id,
        payload
      });
    } catch (error) {
      if (error instanceof InboxFullError) {
        // The agent stays usable; give the slot back without waking another pass.
        this.registry.compareAndSetStatus(agentId, "busy", "idle");
        this.recordUnplaced(task);
        return false;
      }
      if (error instanceof UnknownRecipientError) {
        this.registry.markFailed(agentId, "inbox_missing");
        this.recordUnplaced(task);
        return false;
      }
      throw error;
    }

    const now = this.now().toISOString();
    task.status = "dispatched";
    task.assignedAgentId = agentId;
    task.agentHistory.push(agentId);
    task.attempts = attempt;
    task.dispatchedAt = now;
    task.updatedAt = now;
    task.retryAt = null;
    task.unplacedPasses = 0;

    const timer = setTimeout(() => {
      this.handleDispatchTimeout(task.id, attempt);
    }, this.options.dispatchTimeoutMs);
    this.dispatchTimers.set(task.id, timer);

    logger.info({ taskId: task.id, agentId, attempt }, "task dispatched");
    void this.audit.record({
      eventType: "task_dispatched",
      actor: "task_scheduler",
      payload: { taskId: task.id, agentId, attempt, priority: task.priority }
    });
    this.emit("dispatched", task);
    return true;
  }

  private recordUnplaced(task: TaskRecord): void {
    task.unplacedPasses += 1;
    if (task.unplacedPasses !== this.options.capacityWarningPasses) {
      return;
    }

    const error = new CapacityExhaustedError(task.id, task.capability, task.unplacedPasses);
    logger.warn({ taskId: task.id, capability: task.capability, passes: task.unplacedPasses }, "capacity exhausted");
    void this.audit.record({
      eventType: "task_capacity_exhausted",
      actor: "task_scheduler",
      payload: { taskId: task.id, capability: task.capability, passes: task.unplacedPasses }
    });
    this.emit("capacity_exhausted", task, error);
  }

  private collectInputs(task: TaskRecord): Record<string, unknown> {
    const inputs: Record<string, unknown> = {};
    for (const dependencyId of task.dependencies) {
      inputs[dependencyId] = this.knowledge.getValue(resultKey(dependencyId));
    }
    return inputs;
  }

  // ---- replies ------------------------------------------------------------

  private handleReply(message: Message): void {
    const taskId = message.correlationId;
    const task = taskId ? this.tasks.get(taskId) : undefined;
    if (!task) {
      logger.warn({ id: message.id, correlationId: taskId }, "reply for unknown task discarded");
      return;
    }

    const parsed = TaskReplySchema.safeParse(message.payload);
    const attempt = parsed.success ? parsed.data.attempt : undefined;
    if (
      task.status !== "dispatched" ||
      task.assignedAgentId !== message.senderId ||
      (attempt === undefined ? task.attempts > 1 : attempt !== task.attempts)
    ) {
      logger.info(
        { taskId: task.id, status: task.status, senderId: message.senderId, attempt },
        "late reply discarded"
      );
      void this.audit.record({
        eventType: "task_reply_discarded",
        actor: "task_scheduler",
        payload: { taskId: task.id, senderId: message.senderId, status: task.status }
      });
      return;
    }

    if (!parsed.success) {
      this.failAttempt(task, "Malformed reply payload");
      return;
    }

    const reply = parsed.data;
    if (!("ok" in reply)) {
      this.knowledge.put(progressKey(task.id), reply.progress, message.senderId);
      task.updatedAt = this.now().toISOString();
      this.emit("progress", task);
      return;
    }

    if (reply.ok) {
      this.completeTask(task, message.senderId, reply.result);
    } else {
      this.failAttempt(task, reply.error);
    }
  }

  private answerQuery(message: Message): void {
    const parsed = TaskQuerySchema.safeParse(message.payload);
    const task = parsed.success ? this.tasks.get(parsed.data.taskId) : undefined;
    const payload = task
      ? { ok: true, result: { taskId: task.id, status: task.status } }
      : { ok: false, error: parsed.success ? `Task not found: ${parsed.data.taskId}` : "Malformed task query" };

    try {
      this.bus.send({
        kind: "response",
        senderId: SCHEDULER_ID,
        recipientId: message.senderId,
        correlationId: message.id,
        payload
      });
    } catch (error) {
      logger.warn({ error, recipientId: message.senderId }, "could not answer task query");
    }
  }

  private completeTask(task: TaskRecord, agentId: string, result: unknown): void {
    this.clearDispatchTimer(task.id);
    const now = this.now().toISOString();
    task.status = "completed";
    task.result = result ?? null;
    task.error = null;
    task.completedAt = now;
    task.updatedAt = now;

    this.knowledge.put(resultKey(task.id), task.result, agentId);
    logger.info({ taskId: task.id, agentId, attempts: task.attempts }, "task completed");
    void this.audit.record({
      eventType: "task_completed",
      actor: "task_scheduler",
      payload: { taskId: task.id, agentId, attempts: task.attempts }
    });
    this.emit("completed", task);

    this.promoteDependents(task.id);
    this.registry.release(agentId, "completed");
    this.requestPass("task_completed");
  }

  /** Records a failed attempt, then either schedules a retry or fails the task for good. */
  private failAttempt(task: TaskRecord, reason: string, agentUnresponsive = false): void {
    this.clearDispatchTimer(task.id);
    const agentId = task.assignedAgentId;
    const now = this.now();
    task.error = reason;
    task.assignedAgentId = null;
    task.updatedAt = now.toISOString();

    if (agentId && !agentUnresponsive) {
      this.registry.release(agentId, "failed");
    }

    if (this.draining || task.attempts > this.options.maxRetries) {
      this.failTerminally(task);
      return;
    }

    task.retryCount = task.attempts;
    task.status = "ready";
    const delayMs = this.backoffFor(task.retryCount);
    task.retryAt = new Date(now.getTime() + delayMs).toISOString();

    logger.warn({ taskId: task.id, attempt: task.attempts, retryInMs: delayMs, reason }, "task attempt failed");
    void this.audit.record({
      eventType: "task_retry_scheduled",
      actor: "task_scheduler",
      payload: { taskId: task.id, attempt: task.attempts, delayMs, reason }
    });
    this.emit("retrying", task);
    this.requestPass("task_retry");
  }

  private failTerminally(task: TaskRecord): void {
    const now = this.now().toISOString();
    task.status = "failed";
    task.completedAt = now;
    task.updatedAt = now;
    task.retryAt = null;

    const error = new TaskTerminallyFailedError(task.id, "failed", task.error);
    this.knowledge.put(errorKey(task.id), { error: task.error, attempts: task.attempts }, SCHEDULER_ID);
    logger.error({ taskId: task.id, attempts: task.attempts, error: task.error }, "task failed");
    void this.audit.record({
      eventType: "task_failed",
      actor: "task_scheduler",
      payload: { taskId: task.id, attempts: task.attempts, error: task.error }
    });
    this.emit("failed", task, error);

    const fallback =
      task.fallback ?? (this.options.onDependencyFailure === "fallback" ? { result: this.fallbackResult } : null);
    if (fallback) {
      task.fallbackApplied = true;
      this.knowledge.put(resultKey(task.id), fallback.result, SCHEDULER_ID);
      logger.info({ taskId: task.id }, "fallback result substituted for failed task");
      this.promoteDependents(task.id);
      return;
    }

    this.cascadeCancel(task.id, `dependency_failed:${task.id}`);
  }

  private handleDispatchTimeout(taskId: string, attempt: number): void {
    this.dispatchTimers.delete(taskId);
    this.mutate(() => {
      const task = this.tasks.get(taskId);
      if (!task || task.status !== "dispatched" || task.attempts !== attempt || !task.assignedAgentId) {
        return;
      }

      const agentId = task.assignedAgentId;
      const error = new AgentUnresponsiveError(agentId, taskId, this.options.dispatchTimeoutMs);
      this.registry.markFailed(agentId, "dispatch_timeout");
      this.failAttempt(task, error.message, true);
    });
  }

  // ---- dependency graph ---------------------------------------------------

  private evaluatePending(task: TaskRecord): void {
    if (task.status !== "pending") {
      return;
    }

    const dependencies = task.dependencies.map((id) => this.tasks.get(id));
    const doomed = dependencies.find((dependency) => dependency && isDoomed(dependency));
    if (doomed) {
      this.cancelOne(task, `dependency_${doomed.status}:${doomed.id}`);
      return;
    }

    if (dependencies.every((dependency) => dependency && isSatisfied(dependency))) {
      task.status = "ready";
      task.updatedAt = this.now().toISOString();
      this.emit("ready", task);
    }
  }

  private promoteDependents(taskId: string): void {
    for (const dependentId of this.dependents.get(taskId) ?? []) {
      const dependent = this.tasks.get(dependentId);
      if (dependent) {
        this.evaluatePending(dependent);
      }
    }
  }

  private cascadeCancel(rootId: string, reason: string): void {
    const queue = [...(this.dependents.get(rootId) ?? [])];
    const seen = new Set<string>();

    while (queue.length > 0) {
      const id = queue.shift();
      if (!id || seen.has(id)) {
        continue;
      }
      seen.add(id);

      const task = this.tasks.get(id);
      if (!task || TERMINAL_STATUSES.has(task.status)) {
        continue;
      }

      this.cancelOne(task, reason);
      queue.push(...(this.dependents.get(id) ?? []));
    }
  }

  private cancelOne(task: TaskRecord, reason: string): void {
    const agentId = task.status === "dispatched" ? task.assignedAgentId : null;
    this.clearDispatchTimer(task.id);

    const now = this.now().toISOString();
    task.status = "cancelled";
    task.cancelReason = reason;
    task.retryAt = null;
    task.completedAt = now;
    task.updatedAt = now;

    if (agentId) {
      const payload: CancelPayload = { action: "cancel", taskId: task.id, reason };
      try {
        this.bus.send({
          kind: "feedback",
          senderId: SCHEDULER_ID,
          recipientId: agentId,
          correlationId: task.id,
          payload
        });
      } catch (error) {
        logger.warn({ error, taskId: task.id, agentId }, "cancellation notice not delivered");
      }
      this.registry.release(agentId, "cancelled");
    }

    logger.info({ taskId: task.id, reason }, "task cancelled");
    void this.audit.record({
      eventType: "task_cancelled",
      actor: "task_scheduler",
      payload: { taskId: task.id, reason, agentId }
    });
    this.emit("cancelled", task);
  }

  private topologicalOrder(batch: Map<string, TaskRecord>): TaskRecord[] {
    const order: TaskRecord[] = [];
    const visited = new Set<string>();
    const stack: string[] = [];

    const visit = (taskId: string): void => {
      const task = batch.get(taskId);
      if (!task || visited.has(taskId)) {
        return;
      }

      const cycleStart = stack.indexOf(taskId);
      if (cycleStart >= 0) {
        throw new CyclicDependencyError([...stack.slice(cycleStart), taskId]);
      }

      stack.push(taskId);
      for (const dependencyId of task.dependencies) {
        visit(dependencyId);
      }
      stack.pop();

      visited.add(taskId);
      order.push(task);
    };

    for (const taskId of batch.keys()) {
      visit(taskId);
    }

    return order;
  }

  private verifyInvariants(): void {
    for (const task of this.tasks.values()) {
      if (task.status === "dispatched" && !task.assignedAgentId) {
        this.enterFault(`dispatched task ${task.id} has no assigned agent`);
      }
      if (task.status === "dispatched" && task.assignedAgentId && !this.registry.lookup(task.assignedAgentId)) {
        this.enterFault(`task ${task.id} is assigned to unregistered agent ${task.assignedAgentId}`);
      }
      for (const dependencyId of task.dependencies) {
        if (!this.tasks.has(dependencyId)) {
          this.enterFault(`task ${task.id} depends on missing task ${dependencyId}`);
        }
      }
    }
  }

  private enterFault(message: string): never {
    const fault = new SchedulerFaultError(message);
    if (!this.fault) {
      this.fault = fault;
      this.accepting = false;
      logger.fatal({ fault: message }, "scheduler invariant violated; dispatch halted");
      void this.audit.record({
        eventType: "scheduler_fault",
        actor: "task_scheduler",
        payload: { message }
      });
    }
    throw fault;
  }

  // ---- helpers ------------------------------------------------------------

  private mutate<T>(operation: () => T): T {
    this.holdDepth += 1;
    let completed = false;
    try {
      const result = operation();
      completed = true;
      return result;
    } finally {
      this.holdDepth -= 1;
      if (completed && this.holdDepth === 0 && this.passPending) {
        this.requestPass("deferred");
      }
    }
  }

  private async consume(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      let message: Message | null;
      try {
        message = await this.bus.receive(SCHEDULER_ID, {
          timeoutMs: this.options.receiveTimeoutMs,
          signal
        });
      } catch (error) {
        if (error instanceof UnknownRecipientError) {
          logger.info("scheduler inbox closed; reply loop exiting");
          return;
        }
        throw error;
      }

      if (!message) {
        continue;
      }

      try {
        this.handleMessage(message);
      } catch (error) {
        logger.error({ error, messageId: message.id }, "failed to handle scheduler message");
      }
    }
  }

  private scheduleRetryWake(): void {
    const nowMs = this.now().getTime();
    let earliest = Number.POSITIVE_INFINITY;
    for (const task of this.tasks.values()) {
      if (task.status === "ready" && task.retryAt) {
        const at = Date.parse(task.retryAt);
        if (at > nowMs && at < earliest) {
          earliest = at;
        }
      }
    }

    if (earliest === Number.POSITIVE_INFINITY || earliest >= this.retryTimerAt) {
      return;
    }

    this.clearRetryTimer();
    this.retryTimerAt = earliest;
    this.retryTimer = setTimeout(() => {
      this.retryTimer = null;
      this.retryTimerAt = Number.POSITIVE_INFINITY;
      this.requestPass("retry_backoff_elapsed");
    }, earliest - nowMs);
  }

  private clearRetryTimer(): void {
    if (this.retryTimer) {
      clearTimeout(this.retryTimer);
    }
    this.retryTimer = null;
    this.retryTimerAt = Number.POSITIVE_INFINITY;
  }

  private clearDispatchTimer(taskId: string): void {
    const timer = this.dispatchTimers.get(taskId);
    if (timer) {
      clearTimeout(timer);
      this.dispatchTimers.delete(taskId);
    }
  }

  private backoffFor(retry: number): number {
    const delay = this.options.retryBackoffMs * 2 ** Math.max(0, retry - 1);
    return Math.min(delay, this.options.retryBackoffMaxMs);
  }

  private ensureAccepting(): void {
    if (this.fault) {
      throw this.fault;
    }
    if (!this.accepting) {
      throw new ShuttingDownError();
    }
  }

  private buildTask(input: SubmitTaskInput, now: string): TaskRecord {
    return {
      id: this.normalizeId(input.id),
      description: input.description ?? null,
      capability: this.normalizeCapability(input.capability),
      priority: this.normalizePriority(input.priority),
      dependencies: [...new Set(input.dependencies ?? [])],
      status: "pending",
      assignedAgentId: null,
      agentHistory: [],
      result: null,
      error: null,
      retryCount: 0,
      attempts: 0,
      sequence: 0,
      submittedAt: now,
      updatedAt: now,
      dispatchedAt: null,
      completedAt: null,
      retryAt: null,
      cancelReason: null,
      fallback: input.fallback ? { result: input.fallback.result } : null,
      fallbackApplied: false,
      unplacedPasses: 0
    };
  }

  private normalizeId(id: string | undefined): string {
    if (id === undefined) {
      return randomUUID();
    }
    const normalized = id.trim();
    if (!normalized) {
      throw new InvalidRequestError("Task id must not be empty");
    }
    return normalized;
  }

  private normalizeCapability(capability: string): string {
    const normalized = capability.trim();
    if (!normalized) {
      throw new InvalidRequestError("Task capability is required");
    }
    return normalized;
  }

  private normalizePriority(priority?: number): number {
    const next = priority ?? 0;
    if (!Number.isInteger(next)) {
      throw new InvalidRequestError("Task priority must be an integer");
    }
    return next;
  }

  private dependentsOf(taskId: string): Set<string> {
    let dependents = this.dependents.get(taskId);
    if (!dependents) {
      dependents = new Set();
      this.dependents.set(taskId, dependents);
    }
    return dependents;
  }

  private orderedTasks(): TaskRecord[] {
    return [...this.tasks.values()].sort((a, b) => a.sequence - b.sequence);
  }

  private countByStatus(status: TaskStatus): number {
    let count = 0;
    for (const task of this.tasks.values()) {
      if (task.status === status) {
        count += 1;
      }
    }
    return count;
  }

  private settle(task: TaskRecord): Promise<TaskRecord> {
    if (task.status === "completed") {
      return Promise.resolve(task);
    }
    return Promise.reject(
      new TaskTerminallyFailedError(task.id, task.status, task.status === "cancelled" ? task.cancelReason : task.error)
    );
  }

  private emit(type: TaskEventType, task: TaskRecord, error?: CoordinationError): void {
    const event: TaskEvent = { type, task: this.cloneTask(task), error };
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (listenerError) {
        logger.error({ error: listenerError, type, taskId: task.id }, "task listener failed");
      }
    }
  }

  private withDependents(task: TaskRecord): TaskRecordWithDependents {
    return {
      ...this.cloneTask(task),
      dependents: [...(this.dependents.get(task.id) ?? [])]
    };
  }

  private cloneTask(task: TaskRecord): TaskRecord {
    return {
      ...task,
      dependencies: [...task.dependencies],
      agentHistory: [...task.agentHistory],
      fallback: task.fallback ? { ...task.fallback } : null
    };
  }
}

export function resultKey(taskId: string): string {
  return `task:${taskId}:result`;
}

export function progressKey(taskId: string): string {
  return `task:${taskId}:progress`;
}

export function errorKey(taskId: string): string {
  return `task:${taskId}:error`;
}

function isSatisfied(task: TaskRecord): boolean {
  return task.status === "completed" || (task.status === "failed" && task.fallbackApplied);
}

function isDoomed(task: TaskRecord): boolean {
  return task.status === "cancelled" || (task.status === "failed" && !task.fallbackApplied);
}
