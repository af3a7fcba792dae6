export { AgentWorker } from "./agent-worker.js";
export type { AgentContext, AgentExecutor, AgentWorkerOptions, DelegationContext } from "./agent-worker.js";
export { AGENT_ROLES, AgentRegistry } from "./agents.js";
export type {
  AgentRecord,
  AgentReleaseOutcome,
  AgentRole,
  AgentSnapshot,
  AgentStatus,
  RegisterAgentOptions
} from "./agents.js";
export { FileAuditSink, NoopAuditSink } from "./audit.js";
export type { AuditEventInput, AuditEventRecord, AuditSink } from "./audit.js";
export { CoordinatorConfigSchema, DEFAULT_CONFIG, MAX_TIMER_DELAY_MS, loadConfigFromEnv, resolveConfig } from "./config.js";
export type { CoordinatorConfig, CoordinatorConfigInput } from "./config.js";
export { Coordinator } from "./coordinator.js";
export type { CoordinatorDependencies, CoordinatorHealth, CoordinatorState, RegisterAgentInput } from "./coordinator.js";
export * from "./errors.js";
export { createCoordinatorApp } from "./http.js";
export { KnowledgeFileStore } from "./knowledge-file-store.js";
export type { KnowledgePersistence } from "./knowledge-file-store.js";
export { KnowledgeNamespace, KnowledgeStore, KnowledgeSubscription } from "./knowledge-store.js";
export type {
  CompareAndSetResult,
  KnowledgeChange,
  KnowledgeEntry,
  KnowledgeUpdater,
  KnowledgeView
} from "./knowledge-store.js";
export { MessageBus } from "./message-bus.js";
export { BROADCAST_RECIPIENT, SCHEDULER_ID } from "./messages.js";
export type {
  BroadcastReport,
  InboxClosePolicy,
  Message,
  MessageDraft,
  MessageKind,
  ReceiveOptions
} from "./messages.js";
export { CancelPayloadSchema, DelegationPayloadSchema, TaskReplySchema } from "./protocol.js";
export type { CancelPayload, DelegationPayload, TaskReply } from "./protocol.js";
export { TaskScheduler, errorKey, progressKey, resultKey } from "./scheduler.js";
export type {
  SchedulerHealth,
  SchedulerOptions,
  SchedulerState,
  SubmitTaskInput,
  TaskEvent,
  TaskEventType,
  TaskFallback,
  TaskRecord,
  TaskRecordWithDependents,
  TaskStatus
} from "./scheduler.js";
export { SchedulerWatchdog } from "./watchdog.js";
export type { WatchdogTarget } from "./watchdog.js";
