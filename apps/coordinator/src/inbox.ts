import type { Message } from "./messages.js";

interface PendingReceive {
  resolve: (message: Message | null) => void;
  timeout: NodeJS.Timeout | null;
}

/**
 * Bounded FIFO queue owned by one agent. A blocked receiver is handed the next
 * message directly, so a waiting receiver never sees the queue non-empty.
 */
export class Inbox {
  private readonly queue: Message[] = [];
  private readonly waiters: PendingReceive[] = [];
  private closed = false;

  constructor(
    readonly ownerId: string,
    readonly capacity: number
  ) {}

  get size(): number {
    return this.queue.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  hasRoom(): boolean {
    return this.waiters.length > 0 || this.queue.length < this.capacity;
  }

  /** Returns false when the inbox is at capacity and nobody is waiting. */
  offer(message: Message): boolean {
    if (this.closed) {
      return false;
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      if (waiter.timeout) {
        clearTimeout(waiter.timeout);
      }
      waiter.resolve(message);
      return true;
    }

    if (this.queue.length >= this.capacity) {
      return false;
    }

    this.queue.push(message);
    return true;
  }

  poll(): Message | null {
    return this.queue.shift() ?? null;
  }

  /** Waits for the next message. Resolves null on timeout, abort, or close. */
  take(timeoutMs?: number, signal?: AbortSignal): Promise<Message | null> {
    const next = this.poll();
    if (next || this.closed || signal?.aborted) {
      return Promise.resolve(next);
    }

    return new Promise((resolve) => {
      const waiter: PendingReceive = { resolve, timeout: null };
      const giveUp = (): void => {
        const index = this.waiters.indexOf(waiter);
        if (index < 0) {
          return;
        }
        this.waiters.splice(index, 1);
        if (waiter.timeout) {
          clearTimeout(waiter.timeout);
        }
        signal?.removeEventListener("abort", giveUp);
        resolve(null);
      };

      waiter.resolve = (message) => {
        signal?.removeEventListener("abort", giveUp);
        resolve(message);
      };
      if (timeoutMs !== undefined) {
        waiter.timeout = setTimeout(giveUp, Math.max(0, timeoutMs));
      }
      signal?.addEventListener("abort", giveUp, { once: true });
      this.waiters.push(waiter);
    });
  }

  /** Closes the inbox, wakes every blocked receiver with null, and returns what was still queued. */
  close(): Message[] {
    this.closed = true;

    for (const waiter of this.waiters.splice(0)) {
      if (waiter.timeout) {
        clearTimeout(waiter.timeout);
      }
      waiter.resolve(null);
    }

    return this.queue.splice(0);
  }
}
