export type MessageKind = "query" | "response" | "delegation" | "feedback" | "broadcast";

export const BROADCAST_RECIPIENT = "ALL";
export const SCHEDULER_ID = "scheduler";

export interface Message {
  readonly id: string;
  readonly kind: MessageKind;
  readonly senderId: string;
  readonly recipientId: string;
  readonly payload: unknown;
  readonly correlationId: string | null;
  readonly timestamp: string;
  readonly sequence: number;
}

export interface MessageDraft {
  kind: MessageKind;
  senderId: string;
  recipientId: string;
  payload?: unknown;
  correlationId?: string | null;
}

export interface BroadcastReport {
  message: Message;
  delivered: string[];
  skipped: Array<{ agentId: string; reason: "inbox_full" }>;
}

export interface ReceiveOptions {
  blocking?: boolean;
  timeoutMs?: number;
  signal?: AbortSignal;
}

export type InboxClosePolicy = "drain" | "discard";
