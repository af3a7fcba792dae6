import { randomUUID } from "node:crypto";
import { NoopAuditSink, type AuditSink } from "./audit.js";
import {
  InboxFullError,
  InvalidRequestError,
  UnknownRecipientError
} from "./errors.js";
import { Inbox } from "./inbox.js";
import { logger } from "./logger.js";
import {
  BROADCAST_RECIPIENT,
  type BroadcastReport,
  type InboxClosePolicy,
  type Message,
  type MessageDraft,
  type ReceiveOptions
} from "./messages.js";

interface MessageBusOptions {
  defaultCapacity?: number;
  now?: () => Date;
  audit?: AuditSink;
}

const DEFAULT_INBOX_CAPACITY = 256;

/**
 * In-process message bus with one bounded inbox per agent.
 *
 * Delivery into an inbox is synchronous, so two messages from the same sender
 * to the same recipient are always consumed in send order.
 */
export class MessageBus {
  private readonly inboxes = new Map<string, Inbox>();
  private readonly broadcastSubscribers = new Set<string>();
  private readonly defaultCapacity: number;
  private readonly now: () => Date;
  private readonly audit: AuditSink;
  private sequence = 0;
  private closed = false;

  constructor(options?: MessageBusOptions) {
    this.defaultCapacity = options?.defaultCapacity ?? DEFAULT_INBOX_CAPACITY;
    this.now = options?.now ?? (() => new Date());
    this.audit = options?.audit ?? new NoopAuditSink();
  }

  openInbox(agentId: string, capacity = this.defaultCapacity): void {
    if (this.closed) {
      throw new InvalidRequestError("Message bus is closed");
    }
    if (this.inboxes.has(agentId)) {
      throw new InvalidRequestError(`Inbox already open for ${agentId}`);
    }
    if (agentId === BROADCAST_RECIPIENT) {
      throw new InvalidRequestError(`${BROADCAST_RECIPIENT} is reserved for broadcasts`);
    }
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new InvalidRequestError("Inbox capacity must be a positive integer");
    }

    this.inboxes.set(agentId, new Inbox(agentId, capacity));
  }

  closeInbox(agentId: string, policy: InboxClosePolicy = "discard"): Message[] {
    const inbox = this.inboxes.get(agentId);
    if (!inbox) {
      throw new UnknownRecipientError(agentId);
    }

    this.inboxes.delete(agentId);
    this.broadcastSubscribers.delete(agentId);
    const remaining = inbox.close();

    if (remaining.length > 0) {
      logger.info({ agentId, policy, count: remaining.length }, "inbox closed with undelivered messages");
    }

    return policy === "drain" ? remaining : [];
  }

  hasInbox(agentId: string): boolean {
    return this.inboxes.has(agentId);
  }

  depth(agentId: string): number {
    return this.inboxes.get(agentId)?.size ?? 0;
  }

  subscribeBroadcast(agentId: string): void {
    if (!this.inboxes.has(agentId)) {
      throw new UnknownRecipientError(agentId);
    }
    this.broadcastSubscribers.add(agentId);
  }

  unsubscribeBroadcast(agentId: string): void {
    this.broadcastSubscribers.delete(agentId);
  }

  /** Sends an addressed message. Throws `UnknownRecipientError` or `InboxFullError`. */
  send(draft: MessageDraft): Message {
    if (draft.recipientId === BROADCAST_RECIPIENT) {
      return this.broadcast(draft).message;
    }

    const inbox = this.inboxes.get(draft.recipientId);
    if (!inbox) {
      logger.warn({ senderId: draft.senderId, recipientId: draft.recipientId }, "send to unknown recipient");
      throw new UnknownRecipientError(draft.recipientId);
    }
    if (!inbox.hasRoom()) {
      logger.warn(
        { senderId: draft.senderId, recipientId: draft.recipientId, capacity: inbox.capacity },
        "recipient inbox full"
      );
      throw new InboxFullError(draft.recipientId, inbox.capacity);
    }

    const message = this.createMessage(draft);
    inbox.offer(message);
    logger.debug(
      { id: message.id, kind: message.kind, senderId: message.senderId, recipientId: message.recipientId },
      "message delivered"
    );
    return message;
  }

  /**
   * Fans a broadcast out to every subscriber other than the sender. Subscribers
   * whose inbox is full are skipped and reported rather than failing the send.
   */
  broadcast(draft: Omit<MessageDraft, "recipientId" | "kind"> & { kind?: MessageDraft["kind"] }): BroadcastReport {
    const kind = draft.kind ?? "broadcast";
    if (kind !== "broadcast") {
      throw new InvalidRequestError(`Messages to ${BROADCAST_RECIPIENT} must be of kind broadcast`);
    }

    const message = this.createMessage({ ...draft, kind, recipientId: BROADCAST_RECIPIENT });
    const report: BroadcastReport = { message, delivered: [], skipped: [] };

    for (const agentId of this.broadcastSubscribers) {
      if (agentId === draft.senderId) {
        continue;
      }
      const inbox = this.inboxes.get(agentId);
      if (!inbox) {
        continue;
      }
      if (inbox.offer(message)) {
        report.delivered.push(agentId);
      } else {
        report.skipped.push({ agentId, reason: "inbox_full" });
      }
    }

    if (report.skipped.length > 0) {
      logger.warn({ id: message.id, skipped: report.skipped }, "broadcast skipped full inboxes");
    }
    void this.audit.record({
      eventType: "broadcast_sent",
      actor: "message_bus",
      payload: {
        messageId: message.id,
        senderId: message.senderId,
        delivered: report.delivered.length,
        skipped: report.skipped.length
      }
    });

    return report;
  }

  /**
   * Next message for `agentId` in FIFO order, or null once the timeout passes.
   * Non-blocking receives return immediately.
   */
  async receive(agentId: string, options?: ReceiveOptions): Promise<Message | null> {
    const inbox = this.inboxes.get(agentId);
    if (!inbox) {
      throw new UnknownRecipientError(agentId);
    }

    if (options?.blocking === false) {
      return inbox.poll();
    }

    return inbox.take(options?.timeoutMs, options?.signal);
  }

  /** Closes every inbox. Blocked receivers wake with null. */
  close(): void {
    this.closed = true;
    for (const inbox of this.inboxes.values()) {
      inbox.close();
    }
    this.inboxes.clear();
    this.broadcastSubscribers.clear();
  }

  private createMessage(draft: MessageDraft): Message {
    this.sequence += 1;
    return Object.freeze({
      id: randomUUID(),
      kind: draft.kind,
      senderId: draft.senderId,
      recipientId: draft.recipientId,
      payload: draft.payload ?? null,
      correlationId: draft.correlationId ?? null,
      timestamp: this.now().toISOString(),
      sequence: this.sequence
    });
  }
}
