import { NoopAuditSink, type AuditSink } from "./audit.js";
import { InvalidRequestError } from "./errors.js";
import type { KnowledgePersistence } from "./knowledge-file-store.js";
import { logger } from "./logger.js";

export interface KnowledgeEntry {
  readonly key: string;
  readonly value: unknown;
  readonly version: number;
  readonly writerId: string;
  readonly writtenAt: string;
}

export interface KnowledgeChange {
  type: "put" | "delete";
  key: string;
  version: number;
  entry: KnowledgeEntry | null;
}

export type CompareAndSetResult =
  | { status: "ok"; version: number }
  | { status: "conflict"; currentVersion: number };

export type KnowledgeUpdater = (
  current: unknown,
  entry: KnowledgeEntry | undefined
) => unknown | Promise<unknown>;

/** Read/write surface shared by the store and its namespaced views. */
export interface KnowledgeView {
  get(key: string): KnowledgeEntry | undefined;
  getValue(key: string): unknown;
  put(key: string, value: unknown, writerId?: string): number;
  compareAndSet(key: string, expectedVersion: number, value: unknown, writerId?: string): CompareAndSetResult;
  update(key: string, updater: KnowledgeUpdater, writerId?: string): Promise<number>;
  delete(key: string): boolean;
  keys(prefix?: string): string[];
  subscribe(pattern: string): KnowledgeSubscription;
}

interface KnowledgeStoreOptions {
  now?: () => Date;
  audit?: AuditSink;
  persistence?: KnowledgePersistence;
  /** Changes a subscription holds for a slow reader before the oldest are dropped. */
  subscriptionBufferSize?: number;
}

const SYSTEM_WRITER = "system";
const MAX_UPDATE_ATTEMPTS = 16;
const DEFAULT_SUBSCRIPTION_BUFFER = 1_000;

/**
 * Shared key/value store with a version per key. Each write replaces a frozen
 * entry, so a reader holds either the old entry or the new one.
 */
export class KnowledgeStore implements KnowledgeView {
  private readonly entries = new Map<string, KnowledgeEntry>();
  private readonly lastVersions = new Map<string, number>();
  private readonly keyQueues = new Map<string, Promise<void>>();
  private readonly subscriptions = new Set<KnowledgeSubscription>();
  private readonly now: () => Date;
  private readonly audit: AuditSink;
  private readonly persistence: KnowledgePersistence | null;
  private readonly subscriptionBufferSize: number;
  private persistQueue: Promise<void> = Promise.resolve();
  private closed = false;

  constructor(options?: KnowledgeStoreOptions) {
    this.now = options?.now ?? (() => new Date());
    this.audit = options?.audit ?? new NoopAuditSink();
    this.persistence = options?.persistence ?? null;
    this.subscriptionBufferSize = Math.max(1, options?.subscriptionBufferSize ?? DEFAULT_SUBSCRIPTION_BUFFER);
  }

  /** Loads persisted entries. Existing in-memory entries with the same key are replaced. */
  async restore(): Promise<number> {
    if (!this.persistence) {
      return 0;
    }

    const stored = await this.persistence.load();
    for (const entry of stored) {
      this.entries.set(entry.key, Object.freeze({ ...entry }));
      this.lastVersions.set(entry.key, Math.max(entry.version, this.lastVersions.get(entry.key) ?? 0));
    }

    logger.info({ count: stored.length }, "knowledge entries restored");
    return stored.length;
  }

  get(key: string): KnowledgeEntry | undefined {
    return this.entries.get(key);
  }

  getValue(key: string): unknown {
    return this.entries.get(key)?.value;
  }

  put(key: string, value: unknown, writerId: string = SYSTEM_WRITER): number {
    this.ensureWritable(key);
    return this.write(key, value, writerId);
  }

  compareAndSet(
    key: string,
    expectedVersion: number,
    value: unknown,
    writerId: string = SYSTEM_WRITER
  ): CompareAndSetResult {
    this.ensureWritable(key);
    const currentVersion = this.entries.get(key)?.version ?? 0;
    if (currentVersion !== expectedVersion) {
      logger.debug({ key, expectedVersion, currentVersion }, "knowledge compare-and-set conflict");
      return { status: "conflict", currentVersion };
    }

    return { status: "ok", version: this.write(key, value, writerId) };
  }

  /**
   * Read-modify-write on one key. Updates to the same key run one at a time;
   * a direct `put` landing while the updater runs makes it run again on the
   * newer value.
   */
  async update(key: string, updater: KnowledgeUpdater, writerId: string = SYSTEM_WRITER): Promise<number> {
    this.ensureWritable(key);
    const previous = this.keyQueues.get(key) ?? Promise.resolve();

    const operation = previous.then(async () => {
      for (let attempt = 1; attempt <= MAX_UPDATE_ATTEMPTS; attempt += 1) {
        const current = this.entries.get(key);
        const next = await updater(current?.value, current);
        const result = this.compareAndSet(key, current?.version ?? 0, next, writerId);
        if (result.status === "ok") {
          return result.version;
        }
      }

      throw new InvalidRequestError(`Update on ${key} kept conflicting after ${MAX_UPDATE_ATTEMPTS} attempts`);
    });

    const tail = operation.then(
      () => undefined,
      () => undefined
    );
    this.keyQueues.set(key, tail);

    try {
      return await operation;
    } finally {
      if (this.keyQueues.get(key) === tail) {
        this.keyQueues.delete(key);
      }
    }
  }

  delete(key: string): boolean {
    this.ensureWritable(key);
    const existing = this.entries.get(key);
    if (!existing) {
      return false;
    }

    this.entries.delete(key);
    this.notify({ type: "delete", key, version: existing.version, entry: null });
    this.schedulePersist();
    return true;
  }

  keys(prefix = ""): string[] {
    return [...this.entries.keys()].filter((key) => key.startsWith(prefix)).sort();
  }

  snapshot(): KnowledgeEntry[] {
    return [...this.entries.values()].sort((a, b) => a.key.localeCompare(b.key));
  }

  namespace(prefix: string): KnowledgeNamespace {
    return new KnowledgeNamespace(this, prefix);
  }

  /**
   * Lazy stream of changes whose key matches `pattern` (`*` matches any run of
   * characters). Ends when the store closes or the consumer stops iterating.
   */
  subscribe(pattern: string): KnowledgeSubscription {
    const subscription = new KnowledgeSubscription(
      compilePattern(pattern),
      (sub) => {
        this.subscriptions.delete(sub);
      },
      this.subscriptionBufferSize
    );

    if (this.closed) {
      subscription.end();
      return subscription;
    }

    this.subscriptions.add(subscription);
    return subscription;
  }

  get subscriberCount(): number {
    return this.subscriptions.size;
  }

  async flush(): Promise<void> {
    await this.persistQueue;
  }

  async close(): Promise<void> {
    this.closed = true;
    for (const subscription of [...this.subscriptions]) {
      subscription.end();
    }
    this.subscriptions.clear();
    await this.flush();
  }

  private ensureWritable(key: string): void {
    if (this.closed) {
      throw new InvalidRequestError("Knowledge store is closed");
    }
    if (key.trim().length === 0) {
      throw new InvalidRequestError("Knowledge key is required");
    }
  }

  private write(key: string, value: unknown, writerId: string): number {
    const version = (this.lastVersions.get(key) ?? 0) + 1;
    const entry: KnowledgeEntry = Object.freeze({
      key,
      value,
      version,
      writerId,
      writtenAt: this.now().toISOString()
    });

    this.entries.set(key, entry);
    this.lastVersions.set(key, version);
    this.notify({ type: "put", key, version, entry });
    this.schedulePersist();
    void this.audit.record({
      eventType: "knowledge_written",
      actor: writerId,
      payload: { key, version }
    });

    return version;
  }

  private notify(change: KnowledgeChange): void {
    for (const subscription of this.subscriptions) {
      subscription.push(change);
    }
  }

  private schedulePersist(): void {
    const persistence = this.persistence;
    if (!persistence) {
      return;
    }

    this.persistQueue = this.persistQueue
      .then(() => persistence.save(this.snapshot()))
      .catch((error: unknown) => {
        logger.error({ error }, "failed to persist knowledge entries");
      });
  }
}

/** Prefix-scoped view, used for per-agent and per-conversation memory. */
export class KnowledgeNamespace implements KnowledgeView {
  constructor(
    private readonly store: KnowledgeStore,
    readonly prefix: string
  ) {}

  get(key: string): KnowledgeEntry | undefined {
    return this.store.get(this.qualify(key));
  }

  getValue(key: string): unknown {
    return this.store.getValue(this.qualify(key));
  }

  put(key: string, value: unknown, writerId?: string): number {
    return this.store.put(this.qualify(key), value, writerId);
  }

  compareAndSet(key: string, expectedVersion: number, value: unknown, writerId?: string): CompareAndSetResult {
    return this.store.compareAndSet(this.qualify(key), expectedVersion, value, writerId);
  }

  update(key: string, updater: KnowledgeUpdater, writerId?: string): Promise<number> {
    return this.store.update(this.qualify(key), updater, writerId);
  }

  delete(key: string): boolean {
    return this.store.delete(this.qualify(key));
  }

  keys(prefix = ""): string[] {
    const scope = this.qualify("");
    return this.store.keys(this.qualify(prefix)).map((key) => key.slice(scope.length));
  }

  /** Events carry fully qualified keys. */
  subscribe(pattern: string): KnowledgeSubscription {
    return this.store.subscribe(this.qualify(pattern));
  }

  clear(): number {
    const keys = this.store.keys(this.qualify(""));
    for (const key of keys) {
      this.store.delete(key);
    }
    return keys.length;
  }

  private qualify(key: string): string {
    return `${this.prefix}:${key}`;
  }
}

type IteratorWaiter = (result: IteratorResult<KnowledgeChange>) => void;

/**
 * Lazy stream of changes matching one pattern. A reader that falls more than
 * `maxBuffered` changes behind loses the oldest ones; `droppedCount` says how many.
 */
export class KnowledgeSubscription implements AsyncIterableIterator<KnowledgeChange> {
  private readonly buffer: KnowledgeChange[] = [];
  private readonly waiters: IteratorWaiter[] = [];
  private dropped = 0;
  private done = false;

  constructor(
    private readonly matcher: RegExp,
    private readonly onEnd: (subscription: KnowledgeSubscription) => void,
    private readonly maxBuffered = DEFAULT_SUBSCRIPTION_BUFFER
  ) {}

  get droppedCount(): number {
    return this.dropped;
  }

  push(change: KnowledgeChange): void {
    if (this.done || !this.matcher.test(change.key)) {
      return;
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ done: false, value: change });
      return;
    }

    if (this.buffer.length >= this.maxBuffered) {
      this.buffer.shift();
      this.dropped += 1;
      if (this.dropped === 1) {
        logger.warn(
          { pattern: this.matcher.source, maxBuffered: this.maxBuffered },
          "knowledge subscriber lagging; dropping oldest changes"
        );
      }
    }
    this.buffer.push(change);
  }

  /** Stops the stream; changes already buffered are still yielded. */
  end(): void {
    if (this.done) {
      return;
    }

    this.done = true;
    this.onEnd(this);
    for (const waiter of this.waiters.splice(0)) {
      waiter({ done: true, value: undefined });
    }
  }

  next(): Promise<IteratorResult<KnowledgeChange>> {
    const buffered = this.buffer.shift();
    if (buffered) {
      return Promise.resolve({ done: false, value: buffered });
    }
    if (this.done) {
      return Promise.resolve({ done: true, value: undefined });
    }

    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  return(): Promise<IteratorResult<KnowledgeChange>> {
    this.buffer.length = 0;
    this.end();
    return Promise.resolve({ done: true, value: undefined });
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<KnowledgeChange> {
    return this;
  }
}

function compilePattern(pattern: string): RegExp {
  const source = pattern
    .split("*")
    .map((part) => part.replace(/[.+?^${}()|[\]\\]/g, "\\$&"))
    .join(".*");
  return new RegExp(`^${source}$`);
}
