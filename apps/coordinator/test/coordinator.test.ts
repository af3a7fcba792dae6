import { afterEach, describe, expect, test, vi } from "vitest";
import type { DelegationContext } from "../src/agent-worker.js";
import type { AuditEventInput } from "../src/audit.js";
import { Coordinator } from "../src/coordinator.js";
import type { CoordinatorConfigInput } from "../src/config.js";
import { InvalidRequestError, ShuttingDownError, TaskTerminallyFailedError } from "../src/errors.js";
import type { KnowledgeEntry } from "../src/knowledge-store.js";
import type { DelegationPayload } from "../src/protocol.js";

const coordinators: Coordinator[] = [];

function createCoordinator(config: CoordinatorConfigInput = {}, persistence?: {
  load: () => Promise<KnowledgeEntry[]>;
  save: (entries: KnowledgeEntry[]) => Promise<void>;
}) {
  const coordinator = new Coordinator(
    {
      receiveTimeoutMs: 20,
      tickIntervalMs: 50,
      retryBackoffMs: 0,
      shutdownGraceMs: 0,
      ...config
    },
    { persistence }
  );
  coordinators.push(coordinator);
  return coordinator;
}

function waitForAbort(context: DelegationContext): Promise<never> {
  return new Promise((_resolve, reject) => {
    context.signal.addEventListener("abort", () => {
      reject(new Error("aborted"));
    });
  });
}

describe("Coordinator", () => {
  afterEach(async () => {
    await Promise.all(coordinators.map((coordinator) => coordinator.shutdown(0)));
    coordinators.length = 0;
  });

  test("runs dependent tasks in order and hands results downstream", async () => {
    const coordinator = createCoordinator();
    const delegations: DelegationPayload[] = [];
    const agentId = coordinator.registerAgent("researcher", ["search"], {
      executor: {
        handle: async (delegation) => {
          delegations.push(delegation);
          return `${delegation.taskId}-done`;
        }
      }
    });
    await coordinator.start();

    coordinator.submitTasks([
      { id: "T1", capability: "search", priority: 1 },
      { id: "T2", capability: "search", priority: 5, dependencies: ["T1"] }
    ]);
    const finished = await coordinator.waitForTask("T2");

    expect(delegations.map((delegation) => delegation.taskId)).toEqual(["T1", "T2"]);
    expect(delegations[1]?.inputs).toEqual({ T1: "T1-done" });
    expect(finished).toMatchObject({ status: "completed", result: "T2-done", agentHistory: [agentId] });
    expect(coordinator.getTask("T1").dependents).toEqual(["T2"]);
    expect(coordinator.getKnowledge("task:T1:result")).toMatchObject({ value: "T1-done", writerId: agentId });
    expect(coordinator.listTasks("completed").map((task) => task.id)).toEqual(["T1", "T2"]);
  });

  test("rejects waiters when a task fails for good", async () => {
    const coordinator = createCoordinator({ maxRetries: 0 });
    coordinator.registerAgent("executor", ["run"], {
      executor: {
        handle: async () => {
          throw new Error("tool crashed");
        }
      }
    });
    await coordinator.start();

    const taskId = coordinator.submitTask({ id: "job-1", capability: "run" });

    await expect(coordinator.waitForTask(taskId)).rejects.toThrow(TaskTerminallyFailedError);
    await expect(coordinator.waitForTask(taskId)).rejects.toThrow("Task job-1 ended failed: tool crashed");
    expect(coordinator.getKnowledge("task:job-1:error")?.value).toEqual({ error: "tool crashed", attempts: 1 });
  });

  test("cancels queued work on shutdown and refuses new submissions", async () => {
    const coordinator = createCoordinator();
    await coordinator.start();
    coordinator.submitTask({ id: "queued", capability: "search" });

    await coordinator.shutdown();

    expect(coordinator.getTask("queued")).toMatchObject({ status: "cancelled", cancelReason: "shutdown" });
    expect(() => coordinator.submitTask({ capability: "search" })).toThrow(ShuttingDownError);
    expect(() => coordinator.broadcast("late")).toThrow(ShuttingDownError);
    expect(coordinator.health().status).toBe("stopped");
  });

  test("lets in-flight work finish within the grace period", async () => {
    const coordinator = createCoordinator();
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    coordinator.registerAgent("analyzer", ["analyze"], {
      executor: {
        handle: async () => {
          await gate;
          return "analysis";
        }
      }
    });
    await coordinator.start();
    coordinator.submitTask({ id: "in-flight", capability: "analyze" });
    expect(coordinator.getTaskStatus("in-flight")).toBe("dispatched");

    const stopping = coordinator.shutdown(5_000);
    release();
    await stopping;

    expect(coordinator.getTask("in-flight")).toMatchObject({ status: "completed", result: "analysis" });
    expect(coordinator.listAgents().map((agent) => agent.status)).toEqual(["stopped"]);
  });

  test("cancels in-flight work once the grace period expires", async () => {
    const coordinator = createCoordinator();
    coordinator.registerAgent("analyzer", ["analyze"], {
      executor: { handle: (_delegation, context) => waitForAbort(context) }
    });
    await coordinator.start();
    coordinator.submitTask({ id: "slow", capability: "analyze" });

    await coordinator.shutdown(30);

    expect(coordinator.getTask("slow")).toMatchObject({
      status: "cancelled",
      cancelReason: "shutdown_grace_expired"
    });
  });

  test("stops the watchdog while draining so the grace period is not reported as a stall", async () => {
    const audit = { record: vi.fn(async (_event: AuditEventInput) => {}) };
    const coordinator = new Coordinator(
      { receiveTimeoutMs: 20, tickIntervalMs: 10, retryBackoffMs: 0 },
      { audit }
    );
    coordinators.push(coordinator);
    coordinator.registerAgent("analyzer", ["analyze"], {
      executor: { handle: (_delegation, context) => waitForAbort(context) }
    });
    await coordinator.start();
    coordinator.submitTask({ id: "slow", capability: "analyze" });

    await coordinator.shutdown(100);

    const eventTypes = audit.record.mock.calls.map(([event]) => event.eventType);
    expect(eventTypes).toContain("watchdog_stopped");
    expect(eventTypes).not.toContain("watchdog_stall_detected");
    expect(coordinator.getTask("slow").cancelReason).toBe("shutdown_grace_expired");
  });

  test("shutdown is idempotent", async () => {
    const coordinator = createCoordinator();
    await coordinator.start();

    const first = coordinator.shutdown();
    const second = coordinator.shutdown();

    expect(second).toBe(first);
    await first;
  });

  test("broadcasts to every registered agent", async () => {
    const coordinator = createCoordinator();
    const onBroadcast = vi.fn();
    coordinator.registerAgent("researcher", ["search"], { id: "r1", executor: { handle: async () => null, onBroadcast } });
    coordinator.registerAgent("analyzer", ["analyze"], { id: "a1", executor: { handle: async () => null, onBroadcast } });
    await coordinator.start();

    const report = coordinator.broadcast({ topic: "kickoff" });

    expect(report.delivered).toEqual(["r1", "a1"]);
    await vi.waitFor(() => {
      expect(onBroadcast).toHaveBeenCalledTimes(2);
    });
  });

  test("shares knowledge with compare-and-set semantics", async () => {
    const coordinator = createCoordinator();

    expect(coordinator.putKnowledge("plan:goal", "draft")).toBe(1);
    expect(coordinator.compareAndSetKnowledge("plan:goal", 0, "stale")).toEqual({
      status: "conflict",
      currentVersion: 1
    });
    expect(coordinator.compareAndSetKnowledge("plan:goal", 1, "final")).toEqual({ status: "ok", version: 2 });
    await expect(coordinator.updateKnowledge("plan:count", (current) => (typeof current === "number" ? current : 0) + 1)).resolves.toBe(1);
    expect(coordinator.getKnowledge("plan:goal")).toMatchObject({ value: "final", version: 2, writerId: "coordinator" });
  });

  test("restores persisted knowledge on start and flushes writes on shutdown", async () => {
    const persistence = {
      load: vi.fn(async (): Promise<KnowledgeEntry[]> => [
        { key: "facts:restored", value: 42, version: 3, writerId: "r1", writtenAt: "2026-01-01T00:00:00.000Z" }
      ]),
      save: vi.fn(async (_entries: KnowledgeEntry[]) => {})
    };
    const coordinator = createCoordinator({}, persistence);

    await coordinator.start();
    expect(coordinator.getKnowledge("facts:restored")).toMatchObject({ value: 42, version: 3 });

    expect(coordinator.putKnowledge("facts:restored", 43)).toBe(4);
    await coordinator.shutdown();

    const saved = persistence.save.mock.calls.at(-1)?.[0] ?? [];
    expect(saved.map((entry) => [entry.key, entry.value])).toEqual([["facts:restored", 43]]);
    expect(persistence.load).toHaveBeenCalledTimes(1);
  });

  test("only hands out inboxes of agents served out of process", async () => {
    const coordinator = createCoordinator();
    coordinator.registerAgent("researcher", ["search"], { id: "remote-1" });
    coordinator.registerAgent("executor", ["run"], { id: "local-1", executor: { handle: async () => null } });
    coordinator.sendMessage({ kind: "query", senderId: "ops", recipientId: "remote-1", payload: "ping" });

    expect(() => coordinator.receive("scheduler")).toThrow(InvalidRequestError);
    expect(() => coordinator.receive("local-1")).toThrow("Inbox of local-1 is read by its in-process worker");
    await expect(coordinator.receive("remote-1", { blocking: false })).resolves.toMatchObject({ payload: "ping" });
  });

  test("reports health and retires agents", async () => {
    const coordinator = createCoordinator();
    coordinator.registerAgent("planner", ["plan"], { id: "p1" });
    await coordinator.start();

    expect(coordinator.health()).toMatchObject({
      status: "ok",
      state: "running",
      agents: { idle: 1, busy: 0, failed: 0, stopped: 0 },
      watchdogRunning: true
    });

    coordinator.retireAgent("p1");
    expect(coordinator.getAgent("p1").status).toBe("stopped");
  });
});
