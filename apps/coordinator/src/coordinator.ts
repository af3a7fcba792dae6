import { AgentWorker, type AgentExecutor } from "./agent-worker.js";
import {
  AgentRegistry,
  type AgentSnapshot,
  type AgentStatus,
  type RegisterAgentOptions
} from "./agents.js";
import { NoopAuditSink, type AuditSink } from "./audit.js";
import { resolveConfig, type CoordinatorConfig, type CoordinatorConfigInput } from "./config.js";
import { InvalidRequestError, ShuttingDownError } from "./errors.js";
import type { KnowledgePersistence } from "./knowledge-file-store.js";
import {
  KnowledgeStore,
  type CompareAndSetResult,
  type KnowledgeEntry,
  type KnowledgeSubscription,
  type KnowledgeUpdater
} from "./knowledge-store.js";
import { logger } from "./logger.js";
import { MessageBus } from "./message-bus.js";
import {
  SCHEDULER_ID,
  type BroadcastReport,
  type InboxClosePolicy,
  type Message,
  type MessageDraft,
  type ReceiveOptions
} from "./messages.js";
import {
  TaskScheduler,
  type SchedulerHealth,
  type SubmitTaskInput,
  type TaskEvent,
  type TaskRecord,
  type TaskRecordWithDependents,
  type TaskStatus
} from "./scheduler.js";
import { SchedulerWatchdog } from "./watchdog.js";

export interface CoordinatorDependencies {
  audit?: AuditSink;
  persistence?: KnowledgePersistence;
  now?: () => Date;
}

export interface RegisterAgentInput extends RegisterAgentOptions {
  executor?: AgentExecutor;
}

export type CoordinatorState = "created" | "running" | "stopping" | "stopped";

export interface CoordinatorHealth {
  status: "ok" | "degraded" | "stopping" | "stopped";
  state: CoordinatorState;
  scheduler: SchedulerHealth;
  agents: Record<AgentStatus, number>;
  workers: number;
  watchdogRunning: boolean;
}

const COORDINATOR_ID = "coordinator";

/** Wires the bus, knowledge store, registry and scheduler into one entry point. */
export class Coordinator {
  readonly config: CoordinatorConfig;
  readonly bus: MessageBus;
  readonly knowledge: KnowledgeStore;
  readonly registry: AgentRegistry;
  readonly scheduler: TaskScheduler;
  private readonly watchdog: SchedulerWatchdog;
  private readonly audit: AuditSink;
  private readonly workers = new Map<string, AgentWorker>();
  private state: CoordinatorState = "created";
  private restored = false;
  private shutdownPromise: Promise<void> | null = null;

  constructor(config: CoordinatorConfigInput = {}, dependencies?: CoordinatorDependencies) {
    this.config = resolveConfig(config);
    this.audit = dependencies?.audit ?? new NoopAuditSink();
    const now = dependencies?.now;

    this.bus = new MessageBus({ defaultCapacity: this.config.inboxCapacity, now, audit: this.audit });
    this.knowledge = new KnowledgeStore({ now, audit: this.audit, persistence: dependencies?.persistence });
    this.registry = new AgentRegistry(this.bus, this.knowledge, this.audit, { now });
    this.scheduler = new TaskScheduler(this.registry, this.bus, this.knowledge, this.audit, {
      ...this.config,
      now
    });
    this.watchdog = new SchedulerWatchdog(
      this.scheduler,
      { intervalMs: this.config.tickIntervalMs, now },
      this.audit
    );
  }

  async start(): Promise<void> {
    if (this.state !== "created") {
      return;
    }

    if (!this.restored) {
      this.restored = true;
      await this.knowledge.restore();
    }

    this.state = "running";
    this.scheduler.start();
    this.watchdog.start();
    for (const worker of this.workers.values()) {
      worker.start();
    }

    logger.info({ agents: this.registry.list().length, workers: this.workers.size }, "coordinator started");
    void this.audit.record({
      eventType: "coordinator_started",
      actor: COORDINATOR_ID,
      payload: { config: { ...this.config, fallbackResult: undefined } }
    });
  }

  /**
   * Refuses new work, lets dispatched tasks finish for up to `graceMs`, then
   * cancels the rest and tears everything down. Later calls share the first
   * call's promise.
   */
  shutdown(graceMs = this.config.shutdownGraceMs): Promise<void> {
    if (!this.shutdownPromise) {
      this.shutdownPromise = this.runShutdown(graceMs);
    }
    return this.shutdownPromise;
  }

  // ---- tasks --------------------------------------------------------------

  submitTask(input: SubmitTaskInput): string {
    return this.scheduler.submit(input).id;
  }

  submitTasks(inputs: SubmitTaskInput[]): string[] {
    return this.scheduler.submitMany(inputs).map((task) => task.id);
  }

  getTaskStatus(taskId: string): TaskStatus | undefined {
    return this.scheduler.status(taskId);
  }

  getTask(taskId: string): TaskRecordWithDependents {
    return this.scheduler.getWithDependents(taskId);
  }

  listTasks(status?: TaskStatus): TaskRecordWithDependents[] {
    const all = this.scheduler.listWithDependents();
    return status ? all.filter((task) => task.status === status) : all;
  }

  cancelTask(taskId: string, reason?: string): TaskRecord {
    return this.scheduler.cancel(taskId, reason);
  }

  waitForTask(taskId: string): Promise<TaskRecord> {
    return this.scheduler.waitFor(taskId);
  }

  onTaskEvent(listener: (event: TaskEvent) => void): () => void {
    return this.scheduler.subscribe(listener);
  }

  // ---- messaging ----------------------------------------------------------

  broadcast(payload: unknown, senderId = COORDINATOR_ID): BroadcastReport {
    this.ensureOpen();
    return this.bus.broadcast({ senderId, payload });
  }

  sendMessage(draft: MessageDraft): Message {
    this.ensureOpen();
    return this.bus.send(draft);
  }

  /** Reads the inbox of an agent served out of process. */
  receive(agentId: string, options?: ReceiveOptions): Promise<Message | null> {
    if (agentId === SCHEDULER_ID) {
      throw new InvalidRequestError(`Inbox is reserved: ${agentId}`);
    }
    if (this.workers.has(agentId)) {
      throw new InvalidRequestError(`Inbox of ${agentId} is read by its in-process worker`);
    }
    return this.bus.receive(agentId, options);
  }

  // ---- agents -------------------------------------------------------------

  /** Registers an agent; with an executor, a worker starts consuming its inbox. */
  registerAgent(role: string, capabilities: string[], input?: RegisterAgentInput): string {
    this.ensureOpen();
    const { executor, ...options }: RegisterAgentInput = input ?? {};
    const agentId = this.registry.register(role, capabilities, {
      ...options,
      inboxCapacity: options.inboxCapacity ?? this.config.inboxCapacity
    });

    if (executor) {
      const worker = new AgentWorker(
        agentId,
        this.bus,
        this.knowledge,
        this.registry.memoryFor(agentId),
        executor,
        { receiveTimeoutMs: this.config.receiveTimeoutMs, audit: this.audit }
      );
      this.workers.set(agentId, worker);
      if (this.state === "running") {
        worker.start();
      }
    }

    return agentId;
  }

  /** Stops the agent; its in-flight task, if any, goes back through the retry policy. */
  retireAgent(agentId: string, policy: InboxClosePolicy = "discard"): Message[] {
    const remaining = this.registry.retire(agentId, policy);
    this.scheduler.handleAgentRetired(agentId);

    const worker = this.workers.get(agentId);
    if (worker) {
      this.workers.delete(agentId);
      void worker.stop();
    }

    return remaining;
  }

  recoverAgent(agentId: string): boolean {
    return this.registry.recover(agentId);
  }

  lookupAgent(agentId: string): AgentSnapshot | undefined {
    return this.registry.lookup(agentId);
  }

  getAgent(agentId: string): AgentSnapshot {
    return this.registry.get(agentId);
  }

  listAgents(): AgentSnapshot[] {
    return this.registry.list();
  }

  // ---- knowledge ----------------------------------------------------------

  putKnowledge(key: string, value: unknown, writerId = COORDINATOR_ID): number {
    return this.knowledge.put(key, value, writerId);
  }

  getKnowledge(key: string): KnowledgeEntry | undefined {
    return this.knowledge.get(key);
  }

  compareAndSetKnowledge(
    key: string,
    expectedVersion: number,
    value: unknown,
    writerId = COORDINATOR_ID
  ): CompareAndSetResult {
    return this.knowledge.compareAndSet(key, expectedVersion, value, writerId);
  }

  updateKnowledge(key: string, updater: KnowledgeUpdater, writerId = COORDINATOR_ID): Promise<number> {
    return this.knowledge.update(key, updater, writerId);
  }

  subscribeKnowledge(pattern: string): KnowledgeSubscription {
    return this.knowledge.subscribe(pattern);
  }

  // ---- status -------------------------------------------------------------

  health(): CoordinatorHealth {
    const scheduler = this.scheduler.health();
    const agents: Record<AgentStatus, number> = { idle: 0, busy: 0, failed: 0, stopped: 0 };
    for (const agent of this.registry.list()) {
      agents[agent.status] += 1;
    }

    return {
      status:
        this.state === "stopped"
          ? "stopped"
          : this.state === "stopping"
            ? "stopping"
            : scheduler.state === "faulted"
              ? "degraded"
              : "ok",
      state: this.state,
      scheduler,
      agents,
      workers: this.workers.size,
      watchdogRunning: this.watchdog.isRunning
    };
  }

  private async runShutdown(graceMs: number): Promise<void> {
    this.state = "stopping";
    const cancelledQueued = this.scheduler.beginDrain();
    this.watchdog.stop();
    logger.info({ graceMs, cancelledQueued }, "coordinator draining");

    const settled = await this.scheduler.waitForSettled(graceMs);
    const cancelledInFlight = settled ? 0 : this.scheduler.cancelDispatched("shutdown_grace_expired");

    const workers = [...this.workers.values()];
    this.workers.clear();
    await Promise.all(workers.map((worker) => worker.stop()));

    for (const agent of this.registry.list()) {
      if (agent.status !== "stopped") {
        this.registry.retire(agent.id, "discard");
      }
    }

    await this.scheduler.stop();
    this.bus.close();
    await this.knowledge.close();

    this.state = "stopped";
    logger.info({ cancelledQueued, cancelledInFlight, settled }, "coordinator stopped");
    await this.audit.record({
      eventType: "coordinator_stopped",
      actor: COORDINATOR_ID,
      payload: { cancelledQueued, cancelledInFlight, settled }
    });
  }

  private ensureOpen(): void {
    if (this.state === "stopping" || this.state === "stopped") {
      throw new ShuttingDownError();
    }
  }
}
