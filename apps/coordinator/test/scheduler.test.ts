import { afterEach, describe, expect, test, vi } from "vitest";
import { AgentRegistry } from "../src/agents.js";
import {
  CyclicDependencyError,
  InvalidDependencyError,
  InvalidRequestError,
  SchedulerFaultError,
  ShuttingDownError
} from "../src/errors.js";
import { KnowledgeStore } from "../src/knowledge-store.js";
import { MessageBus } from "../src/message-bus.js";
import { SCHEDULER_ID, type Message } from "../src/messages.js";
import { TaskScheduler, type SchedulerOptions, type TaskEvent } from "../src/scheduler.js";

const schedulers: TaskScheduler[] = [];

function createHarness(options?: SchedulerOptions) {
  const bus = new MessageBus();
  const knowledge = new KnowledgeStore();
  const audit = { record: vi.fn(async () => {}) };
  const registry = new AgentRegistry(bus, knowledge);
  const scheduler = new TaskScheduler(registry, bus, knowledge, audit, { retryBackoffMs: 0, ...options });
  schedulers.push(scheduler);
  return { bus, knowledge, registry, audit, scheduler };
}

type Harness = ReturnType<typeof createHarness>;

async function nextMessage(harness: Harness, agentId: string): Promise<Message | null> {
  return harness.bus.receive(agentId, { blocking: false });
}

/** Sends a reply from an agent and lets the scheduler process its inbox. */
async function reply(
  harness: Harness,
  agentId: string,
  taskId: string,
  payload: unknown,
  kind: "response" | "feedback" = "response"
): Promise<void> {
  harness.bus.send({ kind, senderId: agentId, recipientId: SCHEDULER_ID, correlationId: taskId, payload });
  await deliver(harness);
}

async function deliver(harness: Harness): Promise<void> {
  for (;;) {
    const message = await harness.bus.receive(SCHEDULER_ID, { blocking: false });
    if (!message) {
      return;
    }
    harness.scheduler.handleMessage(message);
  }
}

describe("TaskScheduler", () => {
  afterEach(async () => {
    await Promise.all(schedulers.map((scheduler) => scheduler.stop()));
    schedulers.length = 0;
    vi.useRealTimers();
  });

  describe("submission", () => {
    test("makes a task without dependencies ready immediately", () => {
      const { scheduler } = createHarness();

      const task = scheduler.submit({ id: "t1", description: "collect sources", capability: "search" });

      expect(task).toMatchObject({ id: "t1", status: "ready", priority: 0, attempts: 0, sequence: 1 });
      expect(scheduler.status("t1")).toBe("ready");
    });

    test("rejects a dependency cycle and leaves the table unchanged", () => {
      const { scheduler } = createHarness();
      scheduler.submit({ id: "A", capability: "search" });

      expect(() =>
        scheduler.submitMany([
          { id: "B", capability: "search", dependencies: ["C"] },
          { id: "C", capability: "search", dependencies: ["B"] }
        ])
      ).toThrow("Task dependencies create a cycle: B -> C -> B");
      expect(() => scheduler.submit({ id: "S", capability: "search", dependencies: ["S"] })).toThrow(
        CyclicDependencyError
      );

      expect(scheduler.list().map((task) => task.id)).toEqual(["A"]);
    });

    test("rejects unknown dependencies and duplicate ids atomically", () => {
      const { scheduler } = createHarness();
      scheduler.submit({ id: "A", capability: "search" });

      expect(() =>
        scheduler.submitMany([
          { id: "B", capability: "search" },
          { id: "C", capability: "search", dependencies: ["missing"] }
        ])
      ).toThrow(InvalidDependencyError);
      expect(() => scheduler.submit({ id: "A", capability: "search" })).toThrow("Task id already exists: A");
      expect(() => scheduler.submit({ capability: "  " })).toThrow(InvalidRequestError);
      expect(() => scheduler.submit({ capability: "search", priority: 1.5 })).toThrow(
        "Task priority must be an integer"
      );

      expect(scheduler.list().map((task) => task.id)).toEqual(["A"]);
    });

    test("accepts batch members that depend on each other in any order", () => {
      const { scheduler } = createHarness();

      const records = scheduler.submitMany([
        { id: "report", capability: "write", dependencies: ["research"] },
        { id: "research", capability: "search" }
      ]);

      expect(records.map((task) => [task.id, task.status])).toEqual([
        ["report", "pending"],
        ["research", "ready"]
      ]);
      expect(scheduler.getWithDependents("research").dependents).toEqual(["report"]);
    });
  });

  describe("dispatch", () => {
    test("dispatches the higher priority task first even when submitted later", async () => {
      const harness = createHarness();
      const { scheduler, registry } = harness;
      scheduler.submit({ id: "A", capability: "search", priority: 5 });
      scheduler.submit({ id: "B", capability: "search", priority: 10 });

      registry.register("researcher", ["search"], { id: "r1" });

      expect(scheduler.get("B")).toMatchObject({ status: "dispatched", assignedAgentId: "r1", attempts: 1 });
      expect(scheduler.status("A")).toBe("ready");
      const delegation = await nextMessage(harness, "r1");
      expect(delegation).toMatchObject({
        kind: "delegation",
        senderId: SCHEDULER_ID,
        correlationId: "B",
        payload: { taskId: "B", capability: "search", priority: 10, attempt: 1, inputs: {} }
      });
      expect(registry.lookup("r1")).toMatchObject({ status: "busy", currentTaskId: "B" });
    });

    test("breaks priority ties by submission order", () => {
      const { scheduler, registry } = createHarness();
      scheduler.submit({ id: "first", capability: "search", priority: 1 });
      scheduler.submit({ id: "second", capability: "search", priority: 1 });

      registry.register("researcher", ["search"], { id: "r1" });

      expect(scheduler.status("first")).toBe("dispatched");
      expect(scheduler.status("second")).toBe("ready");
    });

    test("never assigns one agent twice across repeated passes", () => {
      const { scheduler, registry, bus } = createHarness();
      registry.register("researcher", ["search"], { id: "r1" });
      scheduler.submit({ id: "one", capability: "search" });
      scheduler.submit({ id: "two", capability: "search" });

      scheduler.wake("test");
      scheduler.wake("test");

      expect(bus.depth("r1")).toBe(1);
      expect(scheduler.list().filter((task) => task.status === "dispatched")).toHaveLength(1);
    });

    test("only dispatches to agents advertising the capability", () => {
      const { scheduler, registry } = createHarness();
      registry.register("analyzer", ["analyze"], { id: "a1" });

      scheduler.submit({ id: "t1", capability: "search" });

      expect(scheduler.status("t1")).toBe("ready");
      expect(registry.lookup("a1")?.status).toBe("idle");
    });

    test("reports capacity exhaustion without failing the task", () => {
      const { scheduler, audit } = createHarness({ capacityWarningPasses: 3 });
      const events: TaskEvent[] = [];
      scheduler.subscribe((event) => events.push(event));

      scheduler.submit({ id: "t1", capability: "translate" });
      scheduler.wake("test");
      scheduler.wake("test");

      const exhausted = events.filter((event) => event.type === "capacity_exhausted");
      expect(exhausted).toHaveLength(1);
      expect(exhausted[0].error?.code).toBe("CAPACITY_EXHAUSTED");
      expect(scheduler.get("t1")).toMatchObject({ status: "ready", unplacedPasses: 3 });
      expect(audit.record).toHaveBeenCalledWith(
        expect.objectContaining({ eventType: "task_capacity_exhausted" })
      );
    });
  });

  describe("completion and dependencies", () => {
    test("a task becomes ready exactly when all dependencies complete", async () => {
      const harness = createHarness();
      const { scheduler, registry, knowledge } = harness;
      registry.register("researcher", ["search"], { id: "a1" });
      registry.register("researcher", ["search"], { id: "a2" });

      scheduler.submitMany([
        { id: "X", capability: "search" },
        { id: "Y", capability: "search" },
        { id: "Z", capability: "search", dependencies: ["X", "Y"] }
      ]);
      await nextMessage(harness, "a1");
      await nextMessage(harness, "a2");

      await reply(harness, "a1", "X", { ok: true, result: "x-result", attempt: 1 });
      expect(scheduler.status("X")).toBe("completed");
      expect(scheduler.status("Z")).toBe("pending");
      expect(knowledge.get("task:X:result")).toMatchObject({ value: "x-result", writerId: "a1" });

      await reply(harness, "a2", "Y", { ok: true, result: "y-result", attempt: 1 });
      expect(scheduler.get("Z")).toMatchObject({ status: "dispatched", assignedAgentId: "a1" });
      const delegation = await nextMessage(harness, "a1");
      expect(delegation?.payload).toMatchObject({ taskId: "Z", inputs: { X: "x-result", Y: "y-result" } });
      expect(registry.lookup("a2")).toMatchObject({ status: "idle", completedTasks: 1 });
    });

    test("resolves waiters with the completed task", async () => {
      const harness = createHarness();
      harness.registry.register("researcher", ["search"], { id: "r1" });
      harness.scheduler.submit({ id: "t1", capability: "search" });

      const outcome = harness.scheduler.waitFor("t1");
      await reply(harness, "r1", "t1", { ok: true, result: { pages: 3 } });

      await expect(outcome).resolves.toMatchObject({ id: "t1", status: "completed", result: { pages: 3 } });
    });

    test("stores progress feedback without settling the task", async () => {
      const harness = createHarness();
      harness.registry.register("researcher", ["search"], { id: "r1" });
      harness.scheduler.submit({ id: "t1", capability: "search" });
      const events: string[] = [];
      harness.scheduler.subscribe((event) => events.push(event.type));

      await reply(harness, "r1", "t1", { progress: 0.5, attempt: 1 }, "feedback");

      expect(harness.scheduler.status("t1")).toBe("dispatched");
      expect(harness.knowledge.getValue("task:t1:progress")).toBe(0.5);
      expect(events).toEqual(["progress"]);
    });

    test("answers status queries addressed to the scheduler", async () => {
      const harness = createHarness();
      harness.registry.register("researcher", ["search"], { id: "r1" });
      harness.scheduler.submit({ id: "t1", capability: "search" });
      await nextMessage(harness, "r1");

      const query = harness.bus.send({
        kind: "query",
        senderId: "r1",
        recipientId: SCHEDULER_ID,
        payload: { taskId: "t1" }
      });
      await deliver(harness);

      expect(await nextMessage(harness, "r1")).toMatchObject({
        kind: "response",
        correlationId: query.id,
        payload: { ok: true, result: { taskId: "t1", status: "dispatched" } }
      });
    });
  });

  describe("failures", () => {
    test("fails terminally after exactly maxRetries + 1 attempts", async () => {
      const harness = createHarness({ maxRetries: 2 });
      const { scheduler, registry, knowledge } = harness;
      registry.register("executor", ["run"], { id: "e1" });
      scheduler.submit({ id: "T", capability: "run" });
      const outcome = expect(scheduler.waitFor("T")).rejects.toThrow("Task T ended failed: boom");

      for (let attempt = 1; attempt <= 3; attempt += 1) {
        const delegation = await nextMessage(harness, "e1");
        expect(delegation?.payload).toMatchObject({ taskId: "T", attempt });
        await reply(harness, "e1", "T", { ok: false, error: "boom", attempt });
      }

      await outcome;
      expect(scheduler.get("T")).toMatchObject({ status: "failed", attempts: 3, retryCount: 2, error: "boom" });
      expect(await nextMessage(harness, "e1")).toBeNull();
      expect(knowledge.getValue("task:T:error")).toEqual({ error: "boom", attempts: 3 });
      expect(registry.lookup("e1")).toMatchObject({ status: "idle", failedTasks: 3 });
    });

    test("waits out an exponential backoff before retrying", async () => {
      vi.useFakeTimers();
      const harness = createHarness({ retryBackoffMs: 100, retryBackoffMaxMs: 150, maxRetries: 3 });
      const { scheduler, registry } = harness;
      registry.register("executor", ["run"], { id: "e1" });
      scheduler.submit({ id: "T", capability: "run" });
      await nextMessage(harness, "e1");

      await reply(harness, "e1", "T", { ok: false, error: "flaky", attempt: 1 });
      const afterFirst = scheduler.get("T");
      expect(afterFirst.status).toBe("ready");
      expect(Date.parse(afterFirst.retryAt ?? "") - Date.now()).toBe(100);

      await vi.advanceTimersByTimeAsync(99);
      expect(scheduler.status("T")).toBe("ready");
      await vi.advanceTimersByTimeAsync(1);
      expect(scheduler.get("T")).toMatchObject({ status: "dispatched", attempts: 2 });

      await nextMessage(harness, "e1");
      await reply(harness, "e1", "T", { ok: false, error: "flaky", attempt: 2 });
      expect(Date.parse(scheduler.get("T").retryAt ?? "") - Date.now()).toBe(150);
    });

    test("marks an unresponsive agent failed and discards its late reply", async () => {
      vi.useFakeTimers();
      const harness = createHarness({ dispatchTimeoutMs: 1_000 });
      const { scheduler, registry, audit } = harness;
      registry.register("executor", ["run"], { id: "e1" });
      scheduler.submit({ id: "T", capability: "run" });

      await vi.advanceTimersByTimeAsync(1_000);

      expect(registry.lookup("e1")?.status).toBe("failed");
      expect(scheduler.get("T")).toMatchObject({
        status: "ready",
        attempts: 1,
        error: "Agent e1 did not answer task T within 1000ms"
      });

      await reply(harness, "e1", "T", { ok: true, result: "too late", attempt: 1 });
      expect(scheduler.status("T")).toBe("ready");
      expect(audit.record).toHaveBeenCalledWith(expect.objectContaining({ eventType: "task_reply_discarded" }));

      registry.recover("e1");
      expect(scheduler.get("T")).toMatchObject({ status: "dispatched", attempts: 2, agentHistory: ["e1", "e1"] });
    });

    test("discards a reply without an attempt number once the task was re-dispatched", async () => {
      vi.useFakeTimers();
      const harness = createHarness({ dispatchTimeoutMs: 1_000 });
      const { scheduler, registry } = harness;
      registry.register("executor", ["run"], { id: "e1" });
      scheduler.submit({ id: "T", capability: "run" });

      await vi.advanceTimersByTimeAsync(1_000);
      registry.recover("e1");
      expect(scheduler.get("T")).toMatchObject({ status: "dispatched", attempts: 2 });

      await reply(harness, "e1", "T", { ok: true, result: "from the first attempt" });
      expect(scheduler.get("T")).toMatchObject({ status: "dispatched", attempts: 2, result: null });

      await reply(harness, "e1", "T", { ok: true, result: "second", attempt: 2 });
      expect(scheduler.get("T")).toMatchObject({ status: "completed", result: "second" });
    });

    test("treats a malformed reply as a failed attempt", async () => {
      const harness = createHarness({ maxRetries: 0 });
      harness.registry.register("executor", ["run"], { id: "e1" });
      harness.scheduler.submit({ id: "T", capability: "run" });

      await reply(harness, "e1", "T", { ok: "yes" });

      expect(harness.scheduler.get("T")).toMatchObject({ status: "failed", error: "Malformed reply payload" });
    });

    test("ignores replies from an agent the task is not assigned to", async () => {
      const harness = createHarness();
      harness.registry.register("executor", ["run"], { id: "e1" });
      harness.registry.register("executor", ["run"], { id: "e2" });
      harness.scheduler.submit({ id: "T", capability: "run" });

      await reply(harness, "e2", "T", { ok: true, result: "spoofed" });

      expect(harness.scheduler.get("T")).toMatchObject({ status: "dispatched", assignedAgentId: "e1" });
    });

    test("cancels dependents transitively when a task fails for good", async () => {
      const harness = createHarness({ maxRetries: 0 });
      harness.registry.register("executor", ["run"], { id: "e1" });
      harness.scheduler.submitMany([
        { id: "A", capability: "run" },
        { id: "B", capability: "run", dependencies: ["A"] },
        { id: "C", capability: "run", dependencies: ["B"] }
      ]);
      const outcome = expect(harness.scheduler.waitFor("C")).rejects.toThrow(
        "Task C ended cancelled: dependency_failed:A"
      );

      await reply(harness, "e1", "A", { ok: false, error: "broken" });

      await outcome;
      expect(harness.scheduler.get("B")).toMatchObject({ status: "cancelled", cancelReason: "dependency_failed:A" });
      harness.scheduler.submit({ id: "D", capability: "run", dependencies: ["A"] });
      expect(harness.scheduler.get("D")).toMatchObject({ status: "cancelled", cancelReason: "dependency_failed:A" });
    });

    test("substitutes a per-task fallback result so dependents proceed", async () => {
      const harness = createHarness({ maxRetries: 0 });
      harness.registry.register("executor", ["run"], { id: "e1" });
      harness.scheduler.submitMany([
        { id: "A", capability: "run", fallback: { result: "default" } },
        { id: "B", capability: "run", dependencies: ["A"] }
      ]);
      await nextMessage(harness, "e1");

      await reply(harness, "e1", "A", { ok: false, error: "broken" });

      expect(harness.scheduler.get("A")).toMatchObject({ status: "failed", fallbackApplied: true });
      expect(harness.knowledge.getValue("task:A:result")).toBe("default");
      expect(harness.scheduler.status("B")).toBe("dispatched");
      expect((await nextMessage(harness, "e1"))?.payload).toMatchObject({ taskId: "B", inputs: { A: "default" } });
    });

    test("applies the global fallback policy", async () => {
      const harness = createHarness({
        maxRetries: 0,
        onDependencyFailure: "fallback",
        fallbackResult: { skipped: true }
      });
      harness.scheduler.submitMany([
        { id: "A", capability: "run" },
        { id: "B", capability: "other", dependencies: ["A"] }
      ]);
      harness.registry.register("executor", ["run"], { id: "e1" });

      await reply(harness, "e1", "A", { ok: false, error: "broken" });

      expect(harness.knowledge.getValue("task:A:result")).toEqual({ skipped: true });
      expect(harness.scheduler.status("B")).toBe("ready");
    });

    test("retries a task whose agent was retired", () => {
      const { scheduler, registry } = createHarness();
      registry.register("executor", ["run"], { id: "e1" });
      scheduler.submit({ id: "T", capability: "run" });

      registry.retire("e1");
      scheduler.handleAgentRetired("e1");
      expect(scheduler.get("T")).toMatchObject({ status: "ready", error: "Agent e1 was retired" });

      registry.register("executor", ["run"], { id: "e2" });
      expect(scheduler.get("T")).toMatchObject({ status: "dispatched", assignedAgentId: "e2", attempts: 2 });
    });
  });

  describe("cancellation", () => {
    test("cancels an in-flight task, frees its agent and discards the late result", async () => {
      const harness = createHarness();
      const { scheduler, registry, knowledge } = harness;
      registry.register("executor", ["run"], { id: "e1" });
      scheduler.submitMany([
        { id: "T", capability: "run" },
        { id: "D", capability: "other", dependencies: ["T"] }
      ]);
      await nextMessage(harness, "e1");

      const cancelled = scheduler.cancel("T");

      expect(cancelled).toMatchObject({ status: "cancelled", cancelReason: "cancelled_by_request" });
      expect(scheduler.get("D")).toMatchObject({ status: "cancelled", cancelReason: "dependency_cancelled:T" });
      expect(registry.lookup("e1")?.status).toBe("idle");
      expect(await nextMessage(harness, "e1")).toMatchObject({
        kind: "feedback",
        correlationId: "T",
        payload: { action: "cancel", taskId: "T", reason: "cancelled_by_request" }
      });

      await reply(harness, "e1", "T", { ok: true, result: "late", attempt: 1 });
      expect(scheduler.status("T")).toBe("cancelled");
      expect(knowledge.get("task:T:result")).toBeUndefined();
      expect(scheduler.cancel("T").cancelReason).toBe("cancelled_by_request");
    });
  });

  describe("lifecycle", () => {
    test("drains by cancelling queued work and refusing submissions", async () => {
      const harness = createHarness();
      const { scheduler, registry } = harness;
      registry.register("executor", ["run"], { id: "e1" });
      scheduler.submit({ id: "running", capability: "run" });
      scheduler.submit({ id: "queued", capability: "run" });

      expect(scheduler.beginDrain()).toBe(1);
      expect(scheduler.get("queued")).toMatchObject({ status: "cancelled", cancelReason: "shutdown" });
      expect(() => scheduler.submit({ capability: "run" })).toThrow(ShuttingDownError);
      expect(scheduler.health()).toMatchObject({ state: "draining", accepting: false });

      const settled = scheduler.waitForSettled(1_000);
      await reply(harness, "e1", "running", { ok: true, result: 1 });
      await expect(settled).resolves.toBe(true);
      expect(scheduler.status("running")).toBe("completed");
    });

    test("does not retry while draining", async () => {
      const harness = createHarness({ maxRetries: 5 });
      harness.registry.register("executor", ["run"], { id: "e1" });
      harness.scheduler.submit({ id: "T", capability: "run" });
      harness.scheduler.beginDrain();

      await reply(harness, "e1", "T", { ok: false, error: "late failure" });

      expect(harness.scheduler.get("T")).toMatchObject({ status: "failed", attempts: 1 });
    });

    test("reports whether dispatched work settled within the grace period", async () => {
      const harness = createHarness();
      harness.registry.register("executor", ["run"], { id: "e1" });
      harness.scheduler.submit({ id: "T", capability: "run" });

      await expect(harness.scheduler.waitForSettled(5)).resolves.toBe(false);
      expect(harness.scheduler.cancelDispatched("shutdown_grace_expired")).toBe(1);
      expect(harness.scheduler.get("T").cancelReason).toBe("shutdown_grace_expired");
      await expect(harness.scheduler.waitForSettled(5)).resolves.toBe(true);
    });

    test("halts dispatch on an invariant violation", () => {
      const { scheduler, registry, audit } = createHarness();
      registry.register("executor", ["run"], { id: "e1" });
      scheduler.submit({ id: "T", capability: "run" });
      vi.spyOn(registry, "lookup").mockReturnValue(undefined);

      scheduler.wake("test");

      const health = scheduler.health();
      expect(health.state).toBe("faulted");
      expect(health.fault).toBe("Scheduler fault: task T is assigned to unregistered agent e1");
      expect(() => scheduler.submit({ capability: "run" })).toThrow(SchedulerFaultError);
      expect(audit.record).toHaveBeenCalledWith(expect.objectContaining({ eventType: "scheduler_fault" }));
    });

    test("counts tasks by status in its health report", () => {
      const { scheduler, registry } = createHarness();
      registry.register("executor", ["run"], { id: "e1" });
      scheduler.submitMany([
        { id: "a", capability: "run" },
        { id: "b", capability: "run" },
        { id: "c", capability: "run", dependencies: ["a"] }
      ]);

      expect(scheduler.health()).toMatchObject({
        state: "running",
        accepting: true,
        fault: null,
        counts: { pending: 1, ready: 1, dispatched: 1, completed: 0, failed: 0, cancelled: 0 }
      });
    });
  });
});
