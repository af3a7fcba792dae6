import { NoopAuditSink, type AuditSink } from "./audit.js";
import { logger } from "./logger.js";

export interface WatchdogTarget {
  getLastPassAt(): Date | null;
  wake(reason: string): void;
}

interface WatchdogOptions {
  intervalMs: number;
  stallThresholdMs: number;
  now?: () => Date;
}

/**
 * Drives a scheduling pass on every tick so that backoff expiry and recovered
 * agents are noticed without an external trigger. Reports a stall when no pass
 * has run for `stallThresholdMs`.
 */
export class SchedulerWatchdog {
  private readonly options: Required<WatchdogOptions>;
  private timer?: NodeJS.Timeout;
  private stalled = false;

  constructor(
    private readonly scheduler: WatchdogTarget,
    options?: Partial<WatchdogOptions>,
    private readonly audit: AuditSink = new NoopAuditSink()
  ) {
    const intervalMs = options?.intervalMs ?? 1_000;
    this.options = {
      intervalMs,
      stallThresholdMs: options?.stallThresholdMs ?? intervalMs * 3,
      now: options?.now ?? (() => new Date())
    };
  }

  get isRunning(): boolean {
    return this.timer !== undefined;
  }

  start(): void {
    if (this.timer) {
      return;
    }

    this.timer = setInterval(() => {
      this.tick();
    }, this.options.intervalMs);

    logger.info(
      { intervalMs: this.options.intervalMs, stallThresholdMs: this.options.stallThresholdMs },
      "scheduler watchdog started"
    );
    void this.audit.record({
      eventType: "watchdog_started",
      actor: "watchdog",
      payload: {
        intervalMs: this.options.intervalMs,
        stallThresholdMs: this.options.stallThresholdMs
      }
    });
  }

  stop(): void {
    if (!this.timer) {
      return;
    }

    clearInterval(this.timer);
    this.timer = undefined;
    logger.info("scheduler watchdog stopped");
    void this.audit.record({
      eventType: "watchdog_stopped",
      actor: "watchdog"
    });
  }

  tick(): void {
    const lastPassAt = this.scheduler.getLastPassAt();
    const elapsedMs = lastPassAt ? this.options.now().getTime() - lastPassAt.getTime() : null;

    if (elapsedMs !== null && elapsedMs >= this.options.stallThresholdMs) {
      if (!this.stalled) {
        this.stalled = true;
        logger.warn({ elapsedMs, stallThresholdMs: this.options.stallThresholdMs }, "scheduler appears stalled; issuing wake");
        void this.audit.record({
          eventType: "watchdog_stall_detected",
          actor: "watchdog",
          payload: { elapsedMs, stallThresholdMs: this.options.stallThresholdMs }
        });
      }
    } else {
      this.stalled = false;
    }

    this.scheduler.wake("watchdog_tick");
  }
}
