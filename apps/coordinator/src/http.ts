import express from "express";
import { z } from "zod";
import type { Coordinator } from "./coordinator.js";
import { ConflictError, CoordinationError, InvalidRequestError, NotFoundError } from "./errors.js";
import { logger } from "./logger.js";
import type { SubmitTaskInput } from "./scheduler.js";

const TASK_STATUSES = ["pending", "ready", "dispatched", "completed", "failed", "cancelled"] as const;
const MESSAGE_KINDS = ["query", "response", "delegation", "feedback", "broadcast"] as const;
const MAX_RECEIVE_TIMEOUT_MS = 30_000;

const SubmitTaskBodySchema = z.object({
  id: z.string().min(1).optional(),
  description: z.unknown().optional(),
  capability: z.string().min(1),
  priority: z.number().int().optional(),
  dependencies: z.array(z.string().min(1)).optional(),
  fallback: z.object({ result: z.unknown() }).optional()
});

const SubmitBatchBodySchema = z.object({
  tasks: z.array(SubmitTaskBodySchema).min(1)
});

const CancelTaskBodySchema = z.object({
  reason: z.string().min(1).optional()
});

const RegisterAgentBodySchema = z.object({
  role: z.string().min(1),
  capabilities: z.array(z.string()).min(1),
  id: z.string().min(1).optional(),
  inboxCapacity: z.number().int().positive().optional(),
  subscribeBroadcast: z.boolean().optional()
});

const SendMessageBodySchema = z.object({
  kind: z.enum(MESSAGE_KINDS),
  senderId: z.string().min(1),
  recipientId: z.string().min(1),
  payload: z.unknown().optional(),
  correlationId: z.string().min(1).nullable().optional()
});

const BroadcastBodySchema = z.object({
  senderId: z.string().min(1).optional(),
  payload: z.unknown().optional()
});

const PutKnowledgeBodySchema = z.object({
  value: z.unknown(),
  writerId: z.string().min(1).optional(),
  expectedVersion: z.number().int().nonnegative().optional()
});

const ListTasksQuerySchema = z.object({
  status: z.enum(TASK_STATUSES).optional()
});

const ReceiveQuerySchema = z.object({
  timeoutMs: z.coerce.number().int().nonnegative().max(MAX_RECEIVE_TIMEOUT_MS).optional()
});

const RetireQuerySchema = z.object({
  policy: z.enum(["drain", "discard"]).default("discard")
});

type SubmitTaskBody = z.infer<typeof SubmitTaskBodySchema>;
type RouteHandler = (req: express.Request, res: express.Response) => void | Promise<void>;

function parseInput<T extends z.ZodTypeAny>(schema: T, input: unknown): z.infer<T> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
      .join("; ");
    throw new InvalidRequestError(`Invalid request: ${detail}`);
  }
  return parsed.data;
}

function toSubmitInput(body: SubmitTaskBody): SubmitTaskInput {
  return {
    id: body.id,
    description: body.description,
    capability: body.capability,
    priority: body.priority,
    dependencies: body.dependencies,
    fallback: body.fallback ? { result: body.fallback.result } : undefined
  };
}

function respondWithError(error: unknown, res: express.Response, operation: string): void {
  if (error instanceof CoordinationError) {
    res.status(error.statusCode).json({ error: error.message, code: error.code });
    return;
  }

  logger.error({ error, operation }, "coordinator route failed");
  res.status(500).json({ error: "Internal server error" });
}

function route(operation: string, handler: RouteHandler): express.RequestHandler {
  return (req, res) => {
    void Promise.resolve()
      .then(() => handler(req, res))
      .catch((error: unknown) => {
        respondWithError(error, res, operation);
      });
  };
}

/** HTTP surface for out-of-process executors and observers. */
export function createCoordinatorApp(coordinator: Coordinator): express.Express {
  const app = express();
  app.use(express.json());

  app.get("/health", (_req, res) => {
    const health = coordinator.health();
    res.status(health.status === "ok" ? 200 : 503).json({
      ...health,
      service: "agent-mesh",
      now: new Date().toISOString()
    });
  });

  app.get(
    "/tasks",
    route("list_tasks", (req, res) => {
      const { status } = parseInput(ListTasksQuerySchema, req.query);
      res.json({ records: coordinator.listTasks(status) });
    })
  );

  app.get(
    "/tasks/:id",
    route("get_task", (req, res) => {
      res.json({ record: coordinator.getTask(req.params.id) });
    })
  );

  app.post(
    "/tasks",
    route("submit_task", (req, res) => {
      const body = parseInput(SubmitTaskBodySchema, req.body);
      const taskId = coordinator.submitTask(toSubmitInput(body));
      res.status(201).json({ taskId, record: coordinator.getTask(taskId) });
    })
  );

  app.post(
    "/tasks/batch",
    route("submit_tasks", (req, res) => {
      const body = parseInput(SubmitBatchBodySchema, req.body);
      const taskIds = coordinator.submitTasks(body.tasks.map(toSubmitInput));
      res.status(201).json({ taskIds });
    })
  );

  app.post(
    "/tasks/:id/cancel",
    route("cancel_task", (req, res) => {
      const body = parseInput(CancelTaskBodySchema, req.body ?? {});
      res.json({ record: coordinator.cancelTask(req.params.id, body.reason) });
    })
  );

  app.post(
    "/agents",
    route("register_agent", (req, res) => {
      const body = parseInput(RegisterAgentBodySchema, req.body);
      const agentId = coordinator.registerAgent(body.role, body.capabilities, {
        id: body.id,
        inboxCapacity: body.inboxCapacity,
        subscribeBroadcast: body.subscribeBroadcast
      });
      res.status(201).json({ agentId, record: coordinator.getAgent(agentId) });
    })
  );

  app.get("/agents", (_req, res) => {
    res.json({ records: coordinator.listAgents() });
  });

  app.get(
    "/agents/:id",
    route("get_agent", (req, res) => {
      res.json({ record: coordinator.getAgent(req.params.id) });
    })
  );

  app.delete(
    "/agents/:id",
    route("retire_agent", (req, res) => {
      const { policy } = parseInput(RetireQuerySchema, req.query);
      const drained = coordinator.retireAgent(req.params.id, policy);
      res.json({ agentId: req.params.id, drained });
    })
  );

  app.post(
    "/agents/:id/recover",
    route("recover_agent", (req, res) => {
      const recovered = coordinator.recoverAgent(req.params.id);
      res.json({ recovered, record: coordinator.getAgent(req.params.id) });
    })
  );

  app.get(
    "/agents/:id/messages",
    route("receive_message", async (req, res) => {
      const { timeoutMs } = parseInput(ReceiveQuerySchema, req.query);
      const abort = new AbortController();
      res.on("close", () => {
        if (!res.writableFinished) {
          abort.abort();
        }
      });

      const message = await coordinator.receive(req.params.id, {
        blocking: timeoutMs !== undefined,
        timeoutMs,
        signal: abort.signal
      });
      if (abort.signal.aborted) {
        logger.debug({ agentId: req.params.id }, "receive abandoned by client");
        return;
      }
      res.json({ message });
    })
  );

  app.post(
    "/messages",
    route("send_message", (req, res) => {
      const body = parseInput(SendMessageBodySchema, req.body);
      const message = coordinator.sendMessage(body);
      res.status(202).json({ message });
    })
  );

  app.post(
    "/broadcast",
    route("broadcast", (req, res) => {
      const body = parseInput(BroadcastBodySchema, req.body);
      const report = coordinator.broadcast(body.payload, body.senderId);
      res.status(202).json(report);
    })
  );

  app.get(
    "/knowledge/:key",
    route("get_knowledge", (req, res) => {
      const entry = coordinator.getKnowledge(req.params.key);
      if (!entry) {
        throw new NotFoundError(`Knowledge key not found: ${req.params.key}`);
      }
      res.json({ entry });
    })
  );

  app.put(
    "/knowledge/:key",
    route("put_knowledge", (req, res) => {
      const key = req.params.key;
      const body = parseInput(PutKnowledgeBodySchema, req.body);

      if (body.expectedVersion === undefined) {
        const version = coordinator.putKnowledge(key, body.value, body.writerId);
        res.json({ key, version });
        return;
      }

      const result = coordinator.compareAndSetKnowledge(key, body.expectedVersion, body.value, body.writerId);
      if (result.status === "conflict") {
        throw new ConflictError(key, body.expectedVersion, result.currentVersion);
      }
      res.json({ key, version: result.version });
    })
  );

  const handleMalformedBody: express.ErrorRequestHandler = (error: unknown, _req, res, next) => {
    if (error instanceof SyntaxError) {
      res.status(400).json({ error: "Malformed JSON body", code: "INVALID_REQUEST" });
      return;
    }
    next(error);
  };
  app.use(handleMalformedBody);

  return app;
}
