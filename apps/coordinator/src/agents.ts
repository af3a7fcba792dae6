import { randomUUID } from "node:crypto";
import { NoopAuditSink, type AuditSink } from "./audit.js";
import { InvalidRequestError, NotFoundError } from "./errors.js";
import type { KnowledgeNamespace, KnowledgeStore } from "./knowledge-store.js";
import { logger } from "./logger.js";
import type { MessageBus } from "./message-bus.js";
import { BROADCAST_RECIPIENT, SCHEDULER_ID, type InboxClosePolicy, type Message } from "./messages.js";

export const AGENT_ROLES = ["researcher", "analyzer", "planner", "executor", "custom"] as const;

export type AgentRole = (typeof AGENT_ROLES)[number];
export type AgentStatus = "idle" | "busy" | "failed" | "stopped";
export type AgentReleaseOutcome = "completed" | "failed" | "cancelled";

export interface AgentRecord {
  id: string;
  role: AgentRole;
  capabilities: string[];
  status: AgentStatus;
  currentTaskId: string | null;
  completedTasks: number;
  failedTasks: number;
  registeredAt: string;
  updatedAt: string;
}

export interface AgentSnapshot extends AgentRecord {
  inboxDepth: number;
}

export interface RegisterAgentOptions {
  id?: string;
  inboxCapacity?: number;
  subscribeBroadcast?: boolean;
}

type IdleListener = (agentId: string) => void;

interface AgentRegistryOptions {
  now?: () => Date;
}

const RESERVED_IDS = new Set([SCHEDULER_ID, BROADCAST_RECIPIENT]);

export class AgentRegistry {
  private readonly agents = new Map<string, AgentRecord>();
  private readonly issuedIds = new Set<string>();
  private readonly idleListeners = new Set<IdleListener>();
  private readonly now: () => Date;

  constructor(
    private readonly bus: MessageBus,
    private readonly knowledge: KnowledgeStore,
    private readonly audit: AuditSink = new NoopAuditSink(),
    options?: AgentRegistryOptions
  ) {
    this.now = options?.now ?? (() => new Date());
  }

  register(role: string, capabilities: string[], options?: RegisterAgentOptions): string {
    const normalizedRole = this.normalizeRole(role);
    const normalizedCapabilities = this.normalizeCapabilities(capabilities);
    const id = options?.id === undefined ? this.generateId(normalizedRole) : this.claimExplicitId(options.id);

    this.bus.openInbox(id, options?.inboxCapacity);
    if (options?.subscribeBroadcast ?? true) {
      this.bus.subscribeBroadcast(id);
    }

    const now = this.now().toISOString();
    this.issuedIds.add(id);
    this.agents.set(id, {
      id,
      role: normalizedRole,
      capabilities: normalizedCapabilities,
      status: "idle",
      currentTaskId: null,
      completedTasks: 0,
      failedTasks: 0,
      registeredAt: now,
      updatedAt: now
    });

    logger.info({ agentId: id, role: normalizedRole, capabilities: normalizedCapabilities }, "agent registered");
    void this.audit.record({
      eventType: "agent_registered",
      actor: "agent_registry",
      payload: { agentId: id, role: normalizedRole, capabilities: normalizedCapabilities }
    });
    this.notifyIdle(id);

    return id;
  }

  lookup(agentId: string): AgentSnapshot | undefined {
    const agent = this.agents.get(agentId);
    return agent ? this.snapshot(agent) : undefined;
  }

  get(agentId: string): AgentSnapshot {
    const agent = this.lookup(agentId);
    if (!agent) {
      throw new NotFoundError(`Agent not found: ${agentId}`);
    }
    return agent;
  }

  list(): AgentSnapshot[] {
    return [...this.agents.values()].map((agent) => this.snapshot(agent));
  }

  memoryFor(agentId: string): KnowledgeNamespace {
    return this.knowledge.namespace(`memory:${agentId}`);
  }

  /**
   * Claims the first idle agent, in registration order, that advertises `tag`.
   * The agent is Busy before this returns, so no other pass can claim it.
   */
  findIdleByCapability(tag: string, taskId: string | null = null): string | null {
    for (const agent of this.agents.values()) {
      if (agent.status !== "idle" || !agent.capabilities.includes(tag)) {
        continue;
      }
      if (this.compareAndSetStatus(agent.id, "idle", "busy")) {
        agent.currentTaskId = taskId;
        return agent.id;
      }
    }

    return null;
  }

  compareAndSetStatus(agentId: string, expected: AgentStatus, next: AgentStatus): boolean {
    const agent = this.agents.get(agentId);
    if (!agent || agent.status !== expected) {
      return false;
    }

    agent.status = next;
    agent.updatedAt = this.now().toISOString();
    if (next !== "busy") {
      agent.currentTaskId = null;
    }
    return true;
  }

  /** Returns a busy agent to the idle pool after a task attempt settles. */
  release(agentId: string, outcome: AgentReleaseOutcome): boolean {
    const agent = this.agents.get(agentId);
    if (!agent) {
      return false;
    }

    if (outcome === "completed") {
      agent.completedTasks += 1;
    } else if (outcome === "failed") {
      agent.failedTasks += 1;
    }

    if (!this.compareAndSetStatus(agentId, "busy", "idle")) {
      return false;
    }

    this.notifyIdle(agentId);
    return true;
  }

  markFailed(agentId: string, reason: string): boolean {
    const agent = this.agents.get(agentId);
    if (!agent || agent.status === "stopped" || agent.status === "failed") {
      return false;
    }

    const previous = agent.status;
    agent.status = "failed";
    agent.failedTasks += 1;
    agent.currentTaskId = null;
    agent.updatedAt = this.now().toISOString();

    logger.warn({ agentId, previous, reason }, "agent marked failed");
    void this.audit.record({
      eventType: "agent_failed",
      actor: "agent_registry",
      payload: { agentId, reason }
    });
    return true;
  }

  recover(agentId: string): boolean {
    if (!this.agents.has(agentId)) {
      throw new NotFoundError(`Agent not found: ${agentId}`);
    }
    if (!this.compareAndSetStatus(agentId, "failed", "idle")) {
      return false;
    }

    logger.info({ agentId }, "agent recovered");
    void this.audit.record({
      eventType: "agent_recovered",
      actor: "agent_registry",
      payload: { agentId }
    });
    this.notifyIdle(agentId);
    return true;
  }

  /**
   * Stops the agent for good and closes its inbox. With "drain" the queued
   * messages are handed back to the caller; with "discard" they are dropped.
   */
  retire(agentId: string, policy: InboxClosePolicy = "discard"): Message[] {
    const agent = this.agents.get(agentId);
    if (!agent) {
      throw new NotFoundError(`Agent not found: ${agentId}`);
    }
    if (agent.status === "stopped") {
      return [];
    }

    agent.status = "stopped";
    agent.currentTaskId = null;
    agent.updatedAt = this.now().toISOString();
    const remaining = this.bus.hasInbox(agentId) ? this.bus.closeInbox(agentId, policy) : [];

    logger.info({ agentId, policy, drained: remaining.length }, "agent retired");
    void this.audit.record({
      eventType: "agent_retired",
      actor: "agent_registry",
      payload: { agentId, policy, drained: remaining.length }
    });

    return remaining;
  }

  onIdle(listener: IdleListener): () => void {
    this.idleListeners.add(listener);
    return () => {
      this.idleListeners.delete(listener);
    };
  }

  private notifyIdle(agentId: string): void {
    for (const listener of this.idleListeners) {
      try {
        listener(agentId);
      } catch (error) {
        logger.error({ error, agentId }, "idle listener failed");
      }
    }
  }

  private snapshot(agent: AgentRecord): AgentSnapshot {
    return {
      ...agent,
      capabilities: [...agent.capabilities],
      inboxDepth: this.bus.depth(agent.id)
    };
  }

  private normalizeRole(role: string): AgentRole {
    const normalized = role.trim().toLowerCase();
    const match = AGENT_ROLES.find((candidate) => candidate === normalized);
    if (!match) {
      throw new InvalidRequestError(`Unknown agent role: ${role}`);
    }
    return match;
  }

  private normalizeCapabilities(capabilities: string[]): string[] {
    const normalized = [...new Set(capabilities.map((tag) => tag.trim()).filter(Boolean))];
    if (normalized.length === 0) {
      throw new InvalidRequestError("Agent must advertise at least one capability");
    }
    return normalized;
  }

  private generateId(role: AgentRole): string {
    let id = `${role}_${randomUUID().slice(0, 8)}`;
    while (this.issuedIds.has(id)) {
      id = `${role}_${randomUUID().slice(0, 8)}`;
    }
    return id;
  }

  private claimExplicitId(id: string): string {
    const normalized = id.trim();
    if (!normalized) {
      throw new InvalidRequestError("Agent id must not be empty");
    }
    if (RESERVED_IDS.has(normalized)) {
      throw new InvalidRequestError(`Agent id is reserved: ${normalized}`);
    }
    if (this.issuedIds.has(normalized)) {
      throw new InvalidRequestError(`Agent id already issued: ${normalized}`);
    }
    return normalized;
  }
}
