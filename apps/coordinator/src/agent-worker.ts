import { setTimeout as delay } from "node:timers/promises";
import { NoopAuditSink, type AuditSink } from "./audit.js";
import { InboxFullError, UnknownRecipientError } from "./errors.js";
import type { KnowledgeNamespace, KnowledgeView } from "./knowledge-store.js";
import { logger } from "./logger.js";
import type { MessageBus } from "./message-bus.js";
import type { Message, MessageKind } from "./messages.js";
import {
  CancelPayloadSchema,
  DelegationPayloadSchema,
  type DelegationPayload
} from "./protocol.js";

export interface AgentContext {
  agentId: string;
  knowledge: KnowledgeView;
  memory: KnowledgeNamespace;
}

export interface DelegationContext extends AgentContext {
  signal: AbortSignal;
  reportProgress(progress: unknown): void;
}

/** Work an agent does. Only `handle` is required. */
export interface AgentExecutor {
  handle(delegation: DelegationPayload, context: DelegationContext): Promise<unknown>;
  answer?(query: Message, context: AgentContext): unknown;
  onBroadcast?(message: Message, context: AgentContext): void | Promise<void>;
}

export interface AgentWorkerOptions {
  receiveTimeoutMs?: number;
  replyRetryMs?: number;
  replyAttempts?: number;
  audit?: AuditSink;
}

const DEFAULT_RECEIVE_TIMEOUT_MS = 1_000;
const DEFAULT_REPLY_RETRY_MS = 50;
const DEFAULT_REPLY_ATTEMPTS = 20;

interface ActiveDelegation {
  controller: AbortController;
  done: Promise<void>;
}

export class AgentWorker {
  private readonly receiveTimeoutMs: number;
  private readonly replyRetryMs: number;
  private readonly replyAttempts: number;
  private readonly audit: AuditSink;
  private readonly active = new Map<string, ActiveDelegation>();
  private readonly context: AgentContext;
  private loopAbort: AbortController | null = null;
  private loop: Promise<void> | null = null;

  constructor(
    readonly agentId: string,
    private readonly bus: MessageBus,
    knowledge: KnowledgeView,
    memory: KnowledgeNamespace,
    private readonly executor: AgentExecutor,
    options?: AgentWorkerOptions
  ) {
    this.receiveTimeoutMs = options?.receiveTimeoutMs ?? DEFAULT_RECEIVE_TIMEOUT_MS;
    this.replyRetryMs = options?.replyRetryMs ?? DEFAULT_REPLY_RETRY_MS;
    this.replyAttempts = options?.replyAttempts ?? DEFAULT_REPLY_ATTEMPTS;
    this.audit = options?.audit ?? new NoopAuditSink();
    this.context = { agentId, knowledge, memory };
  }

  get isRunning(): boolean {
    return this.loop !== null;
  }

  get activeTaskIds(): string[] {
    return [...this.active.keys()];
  }

  start(): void {
    if (this.loop) {
      return;
    }

    const abort = new AbortController();
    this.loopAbort = abort;
    this.loop = this.run(abort.signal);
    logger.debug({ agentId: this.agentId }, "agent worker started");
  }

  /** Stops receiving and aborts any delegation still running. */
  async stop(): Promise<void> {
    const loop = this.loop;
    this.loopAbort?.abort();
    this.loop = null;
    this.loopAbort = null;

    const running = [...this.active.values()];
    for (const delegation of running) {
      delegation.controller.abort();
    }

    await Promise.allSettled([loop, ...running.map((delegation) => delegation.done)]);
    logger.debug({ agentId: this.agentId }, "agent worker stopped");
  }

  private async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      let message: Message | null;
      try {
        message = await this.bus.receive(this.agentId, { timeoutMs: this.receiveTimeoutMs, signal });
      } catch (error) {
        if (error instanceof UnknownRecipientError) {
          logger.info({ agentId: this.agentId }, "inbox closed; agent worker exiting");
          return;
        }
        throw error;
      }

      if (message) {
        await this.dispatch(message);
      }
    }
  }

  private async dispatch(message: Message): Promise<void> {
    try {
      switch (message.kind) {
        case "delegation":
          this.startDelegation(message);
          return;
        case "feedback":
          this.handleFeedback(message);
          return;
        case "query":
          await this.answerQuery(message);
          return;
        case "broadcast":
          await this.executor.onBroadcast?.(message, this.context);
          return;
        case "response":
          logger.debug({ agentId: this.agentId, correlationId: message.correlationId }, "response received");
          return;
      }
    } catch (error) {
      logger.error({ error, agentId: this.agentId, messageId: message.id, kind: message.kind }, "agent message failed");
    }
  }

  private startDelegation(message: Message): void {
    const parsed = DelegationPayloadSchema.safeParse(message.payload);
    if (!parsed.success) {
      logger.warn({ agentId: this.agentId, messageId: message.id }, "malformed delegation rejected");
      if (message.correlationId) {
        void this.reply(message.senderId, "response", message.correlationId, {
          ok: false,
          error: "Malformed delegation payload"
        });
      }
      return;
    }

    const delegation = parsed.data;
    const controller = new AbortController();
    const entry: ActiveDelegation = {
      controller,
      done: this.execute(message.senderId, delegation, controller.signal).finally(() => {
        if (this.active.get(delegation.taskId) === entry) {
          this.active.delete(delegation.taskId);
        }
      })
    };
    this.active.set(delegation.taskId, entry);
  }

  private async execute(schedulerId: string, delegation: DelegationPayload, signal: AbortSignal): Promise<void> {
    const { taskId, attempt } = delegation;
    const context: DelegationContext = {
      ...this.context,
      signal,
      reportProgress: (progress) => {
        if (!signal.aborted) {
          void this.reply(schedulerId, "feedback", taskId, { progress, attempt });
        }
      }
    };

    let payload: { ok: true; result: unknown; attempt: number } | { ok: false; error: string; attempt: number };
    try {
      const result = await this.executor.handle(delegation, context);
      payload = { ok: true, result: result ?? null, attempt };
    } catch (error) {
      payload = { ok: false, error: describeError(error), attempt };
    }

    if (signal.aborted) {
      logger.info({ agentId: this.agentId, taskId }, "delegation aborted; reply suppressed");
      return;
    }

    if (!payload.ok) {
      logger.warn({ agentId: this.agentId, taskId, attempt, error: payload.error }, "delegation failed");
    }
    await this.reply(schedulerId, "response", taskId, payload);
  }

  private handleFeedback(message: Message): void {
    const cancel = CancelPayloadSchema.safeParse(message.payload);
    if (!cancel.success) {
      logger.debug({ agentId: this.agentId, messageId: message.id }, "feedback received");
      return;
    }

    const delegation = this.active.get(cancel.data.taskId);
    if (!delegation) {
      return;
    }

    delegation.controller.abort();
    logger.info({ agentId: this.agentId, taskId: cancel.data.taskId, reason: cancel.data.reason }, "delegation cancelled");
    void this.audit.record({
      eventType: "delegation_cancelled",
      actor: this.agentId,
      payload: { taskId: cancel.data.taskId, reason: cancel.data.reason }
    });
  }

  private async answerQuery(message: Message): Promise<void> {
    if (!this.executor.answer) {
      await this.reply(message.senderId, "response", message.id, {
        ok: false,
        error: `Agent ${this.agentId} does not answer queries`
      });
      return;
    }

    try {
      const result: unknown = await this.executor.answer(message, this.context);
      await this.reply(message.senderId, "response", message.id, { ok: true, result: result ?? null });
    } catch (error) {
      await this.reply(message.senderId, "response", message.id, { ok: false, error: describeError(error) });
    }
  }

  /**
   * Sends a reply, waiting out a full recipient inbox a bounded number of
   * times. Undeliverable replies are logged; this never rejects.
   */
  private async reply(recipientId: string, kind: MessageKind, correlationId: string, payload: unknown): Promise<void> {
    for (let attempt = 1; attempt <= this.replyAttempts; attempt += 1) {
      try {
        this.bus.send({ kind, senderId: this.agentId, recipientId, correlationId, payload });
        return;
      } catch (error) {
        if (error instanceof InboxFullError && attempt < this.replyAttempts) {
          await delay(this.replyRetryMs);
          continue;
        }
        logger.warn({ agentId: this.agentId, recipientId, correlationId, error }, "reply not delivered");
        return;
      }
    }
  }
}

function describeError(error: unknown): string {
  if (error instanceof Error && error.message) {
    return error.message;
  }
  const text = String(error);
  return text || "Delegation failed";
}
